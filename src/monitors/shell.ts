import { spawn } from 'child_process';
import { existsSync } from 'fs';

export interface CommandOutput {
    exitCode: number;
    stdout: string;
    stderr: string;
}

export class CommandError extends Error {
    constructor(
        readonly argv: readonly string[],
        readonly output: CommandOutput,
    ) {
        super(`command ${JSON.stringify(argv)} exited with status ${output.exitCode}: ${output.stderr.trim()}`);
        this.name = 'CommandError';
    }
}

/**
 * Runs argv to completion. Resolves whatever the exit status; rejects only
 * when the process cannot be started.
 */
export function run(argv: readonly string[]): Promise<CommandOutput> {
    const [cmd, ...args] = argv;
    if (cmd === undefined) {
        return Promise.reject(new Error('empty command'));
    }

    return new Promise((resolve, reject) => {
        const child = spawn(cmd, args, { stdio: ['ignore', 'pipe', 'pipe'] });
        let stdout = '';
        let stderr = '';
        child.stdout.on('data', (d: Buffer) => (stdout += d.toString()));
        child.stderr.on('data', (d: Buffer) => (stderr += d.toString()));
        child.on('error', reject);
        child.on('close', (code) => {
            resolve({ exitCode: code ?? 1, stdout, stderr });
        });
    });
}

/** Throws CommandError on a non-zero exit. */
export async function shOrThrow(...argv: string[]): Promise<CommandOutput> {
    const output = await run(argv);
    if (output.exitCode !== 0) {
        throw new CommandError(argv, output);
    }
    return output;
}

/** Trimmed stdout of a command that must succeed. */
export async function shOut(...argv: string[]): Promise<string> {
    const output = await shOrThrow(...argv);
    return output.stdout.trim();
}

export function pathExists(path: string): boolean {
    return existsSync(path);
}

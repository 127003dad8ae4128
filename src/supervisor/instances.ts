import { logger } from '../config/logger.js';
import { SCRIPT_NAME } from '../commands/usage.js';
import { CommandError, run } from '../monitors/shell.js';

/** pgrep arguments in, matching pids out. */
export type ProcessSearch = (args: string[]) => Promise<number[]>;

export type Kill = (pid: number, signal: NodeJS.Signals) => void;

/** pgrep wrapper: status 1 means no match, anything else but 0 is an error. */
export async function pgrep(args: string[]): Promise<number[]> {
    const argv = ['pgrep', ...args];
    const output = await run(argv);

    switch (output.exitCode) {
        case 0:
            return output.stdout
                .split('\n')
                .filter((line) => line.trim() !== '')
                .map((line) => parseInt(line, 10));
        case 1:
            return [];
        default:
            throw new CommandError(argv, output);
    }
}

function escapeRegex(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Matches the command line of `<script> run <target> [monitors...]`. */
export function instancePattern(scriptName: string, target: string): string {
    return `([^ ]+/)?${escapeRegex(scriptName)} +run +${escapeRegex(target)}( .*)?$`;
}

export interface InstanceOptions {
    scriptName?: string;
    pid?: number;
    user?: string;
    search?: ProcessSearch;
    kill?: Kill;
}

export async function findOtherInstances(target: string, options: InstanceOptions = {}): Promise<number[]> {
    const scriptName = options.scriptName ?? SCRIPT_NAME;
    const pid = options.pid ?? process.pid;
    const user = options.user ?? process.env.USER;
    const search = options.search ?? pgrep;

    const args = user ? ['-u', user] : [];
    args.push('-f', instancePattern(scriptName, target));

    const pids = await search(args);
    return pids.filter((other) => other !== pid);
}

/**
 * Sends SIGINT to every other instance running for the target, so only the
 * newest one keeps publishing.
 */
export async function killOtherInstances(target: string, options: InstanceOptions = {}): Promise<number[]> {
    const kill = options.kill ?? ((pid, signal) => process.kill(pid, signal));
    const others = await findOtherInstances(target, options);

    for (const pid of others) {
        logger.info({ pid, target }, 'stopping other instance');
        kill(pid, 'SIGINT');
    }
    return others;
}

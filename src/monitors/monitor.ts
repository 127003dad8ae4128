import { spawn } from 'child_process';
import { createInterface } from 'readline';
import { Channel } from '../bus/channel.js';
import { logger } from '../config/logger.js';
import { ConfigError, errorMessage } from '../errors.js';
import type { Metrics } from '../metrics/counter.js';
import type { ComputeFn, MonitorContext, MonitorKind, MonitorParams, ThreadFn } from './types.js';

function sentinel(id: string, label: string, word: 'BUG' | 'EXIT'): string {
    return label ? `${label}${word}` : `${id} ${word}`;
}

abstract class BaseMonitor {
    abstract readonly kind: MonitorKind;

    constructor(readonly id: string) { }

    abstract run(ctx: MonitorContext): Promise<void>;
}

/**
 * Recomputes every `intervalMs`, or straight away when triggered.
 */
export class ComputedMonitor extends BaseMonitor {
    readonly kind = 'computed';
    private triggers = new Channel<void>();

    constructor(
        id: string,
        readonly label: string,
        readonly intervalMs: number,
        private compute: ComputeFn,
    ) {
        super(id);
    }

    /** Cuts the current wait short. A trigger during a compute wakes the next wait. */
    trigger(): void {
        this.triggers.send();
    }

    /** One compute cycle turned into the text to publish. */
    async computeText(metrics: Metrics): Promise<string | null> {
        let computed: string | null | undefined;
        try {
            computed = await this.compute();
        } catch (err) {
            logger.warn({ id: this.id, error: errorMessage(err) }, 'exception in compute');
            metrics.incrementMonitorBugs();
            return sentinel(this.id, this.label, 'BUG');
        }
        return computed ? `${this.label}${computed}` : null;
    }

    async run(ctx: MonitorContext): Promise<never> {
        for (;;) {
            ctx.emit(await this.computeText(ctx.metrics));
            const woken = await this.triggers.receiveWithin(this.intervalMs);
            if (woken.kind === 'value') {
                logger.debug({ id: this.id }, 'triggered');
            }
        }
    }
}

export interface ProcessExit {
    code: number | null;
    signal: NodeJS.Signals | null;
}

/**
 * Spawns argv and hands each stdout and stderr line to its handler as it
 * arrives. Resolves when the process has exited and both streams are closed.
 */
export function runHandlingLines(
    argv: readonly string[],
    handleStdout: (line: string) => void,
    handleStderr: (line: string) => void,
): Promise<ProcessExit> {
    const [cmd, ...args] = argv;
    if (cmd === undefined) {
        return Promise.reject(new Error('empty command'));
    }

    return new Promise((resolve, reject) => {
        const child = spawn(cmd, args, { stdio: ['ignore', 'pipe', 'pipe'] });
        child.on('error', reject);
        createInterface({ input: child.stdout }).on('line', handleStdout);
        createInterface({ input: child.stderr }).on('line', handleStderr);
        child.on('close', (code, signal) => resolve({ code, signal }));
    });
}

/**
 * Publishes each line of a long-running command. Ends for good, with an EXIT
 * fragment, when the command does.
 */
export class StreamedMonitor extends BaseMonitor {
    readonly kind = 'streamed';

    constructor(
        id: string,
        readonly label: string,
        readonly command: readonly string[],
    ) {
        super(id);
    }

    async run(ctx: MonitorContext): Promise<void> {
        const handleStdout = (line: string) => {
            ctx.emit(line ? `${this.label}${line}` : null);
        };
        const handleStderr = (line: string) => {
            logger.warn({ id: this.id, stderr: line }, 'monitor stderr');
        };

        try {
            const exit = await runHandlingLines(this.command, handleStdout, handleStderr);
            logger.warn({ id: this.id, status: exit.code, signal: exit.signal }, 'process exited');
        } catch (err) {
            logger.warn({ id: this.id, command: this.command, error: errorMessage(err) }, 'error starting command');
        }

        ctx.metrics.incrementMonitorExits();
        ctx.emit(sentinel(this.id, this.label, 'EXIT'));
    }
}

/** Runs an arbitrary body that emits on its own schedule. */
export class CustomMonitor extends BaseMonitor {
    readonly kind = 'custom';

    constructor(
        id: string,
        private thread: ThreadFn,
    ) {
        super(id);
    }

    async run(ctx: MonitorContext): Promise<void> {
        try {
            await this.thread(ctx);
        } catch (err) {
            logger.error({ id: this.id, error: errorMessage(err) }, 'custom monitor failed');
            ctx.metrics.incrementMonitorBugs();
            ctx.emit(sentinel(this.id, '', 'BUG'));
        }
    }
}

export type Monitor = ComputedMonitor | StreamedMonitor | CustomMonitor;

/**
 * Builds the monitor variant matching the given params.
 *
 * - computed: id, label, intervalMs, compute
 * - streamed: id, label, command
 * - custom: id, thread
 *
 * Any other combination throws a ConfigError naming the id.
 */
export function makeMonitor(params: MonitorParams): Monitor {
    const { id, label, intervalMs, compute, command, thread } = params;
    if (id && label !== undefined && intervalMs !== undefined && compute && !thread && command === undefined) {
        if (!(intervalMs > 0)) {
            throw new ConfigError(`make-monitor: interval must be positive for monitor with id ${id}`);
        }
        return new ComputedMonitor(id, label, intervalMs, compute);
    }

    if (id && label !== undefined && command !== undefined && command.length > 0 && intervalMs === undefined && !compute && !thread) {
        return new StreamedMonitor(id, label, command);
    }

    if (id && thread && label === undefined && intervalMs === undefined && !compute && command === undefined) {
        return new CustomMonitor(id, thread);
    }

    throw new ConfigError(`make-monitor: invalid combination of params for monitor with id ${id || '(unknown)'}`);
}

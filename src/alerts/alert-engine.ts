import { Channel } from '../bus/channel.js';
import { logger } from '../config/logger.js';
import type { Emit } from '../bus/result-bus.js';
import { TARGETS } from '../targets.js';
import type { MonitorContext, MonitorParams } from '../monitors/types.js';

export interface AlertOp {
    op: 'add' | 'remove';
    reason: string;
}

/** Texts shown in turn while alerts are active. */
export interface BlinkPair {
    on: string;
    off: string;
}

/** What other monitors get to raise and clear alerts. */
export interface AlertControl {
    add(reason: string): void;
    remove(reason: string): void;
}

export interface AlertEngineOptions {
    /** Timer used while nothing blinks. */
    idleMs: number;
    /** Half-period of the blink; defaults to the target's. */
    blinkMs?: number;
}

/**
 * `null` for an empty set, otherwise the sorted reasons between emphasis
 * markers and a blank string of the same width.
 */
export function displayPair(reasons: ReadonlySet<string>): BlinkPair | null {
    if (reasons.size === 0) return null;
    const on = `*** ${[...reasons].sort().join(', ')} ***`;
    return { on, off: ' '.repeat(on.length) };
}

/**
 * Blinking fragment listing the active alert reasons.
 *
 * A controller loop owns the reason set and sends display pairs to a blinker
 * loop, which alternates the pair on a timer and goes quiet when the set
 * empties.
 */
export class AlertEngine implements AlertControl {
    // Latest unapplied op per reason; bounded by the number of distinct reasons
    private queued = new Map<string, AlertOp['op']>();
    private wake: (() => void) | null = null;

    constructor(private options: AlertEngineOptions) { }

    add(reason: string): void {
        this.enqueue({ op: 'add', reason });
    }

    remove(reason: string): void {
        this.enqueue({ op: 'remove', reason });
    }

    /** Reasons with a request the controller has not applied yet. */
    get pending(): number {
        return this.queued.size;
    }

    private enqueue({ op, reason }: AlertOp): void {
        this.queued.delete(reason);
        this.queued.set(reason, op);
        const wake = this.wake;
        this.wake = null;
        wake?.();
    }

    /** Waits for at least one request, then takes everything queued. */
    private async takeQueued(): Promise<AlertOp[]> {
        if (this.queued.size === 0) {
            await new Promise<void>((resolve) => {
                this.wake = resolve;
            });
        }
        const ops = [...this.queued].map(([reason, op]) => ({ op, reason }));
        this.queued.clear();
        return ops;
    }

    /** Custom monitor params running this engine under `id`. */
    monitorParams(id = 'alert'): MonitorParams {
        return { id, thread: (ctx) => this.run(ctx) };
    }

    async run(ctx: MonitorContext): Promise<void> {
        const blinkMs = this.options.blinkMs ?? TARGETS[ctx.target].blinkMs;
        const pairs = new Channel<BlinkPair | null>();
        await Promise.all([this.runController(pairs), this.runBlinker(pairs, blinkMs, ctx.emit)]);
    }

    private async runController(pairs: Channel<BlinkPair | null>): Promise<never> {
        const alerts = new Set<string>();
        let shown = displayKey(alerts);

        for (;;) {
            // Requests that queued up meanwhile are applied as one change
            for (const { op, reason } of await this.takeQueued()) {
                if (op === 'add') {
                    alerts.add(reason);
                } else {
                    alerts.delete(reason);
                }
            }

            const key = displayKey(alerts);
            if (key !== shown) {
                shown = key;
                logger.debug({ alerts: [...alerts] }, 'alerts changed');
                pairs.send(displayPair(alerts));
            }
        }
    }

    private async runBlinker(pairs: Channel<BlinkPair | null>, blinkMs: number, emit: Emit): Promise<never> {
        let delay = this.options.idleMs;
        let front: string | null = null;
        let back: string | null = null;

        for (;;) {
            const received = await pairs.receiveWithin(delay);

            if (received.kind === 'value') {
                const pair = received.value;
                if (pair === null) {
                    front = back = null;
                    delay = this.options.idleMs;
                    emit(null);
                } else {
                    front = pair.on;
                    back = pair.off;
                    delay = blinkMs;
                    emit(front);
                }
            } else if (front !== null && back !== null) {
                [front, back] = [back, front];
                emit(front);
            }
        }
    }
}

function displayKey(alerts: ReadonlySet<string>): string {
    return JSON.stringify([...alerts].sort());
}

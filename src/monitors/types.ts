import type { Emit } from '../bus/result-bus.js';
import type { Metrics } from '../metrics/counter.js';
import type { TargetName } from '../targets.js';

export type MonitorKind = 'computed' | 'streamed' | 'custom';

/** What a Computed monitor calls each cycle. Empty or absent text hides it. */
export type ComputeFn = () => string | null | undefined | Promise<string | null | undefined>;

export interface MonitorContext {
    target: TargetName;
    emit: Emit;
    metrics: Metrics;
}

/** Body of a Custom monitor; produces its own results through `ctx.emit`. */
export type ThreadFn = (ctx: MonitorContext) => Promise<void>;

/**
 * Loose description of a monitor as written in the monitor table or the user
 * config. `makeMonitor` decides which variant it is, or rejects it.
 */
export interface MonitorParams {
    id?: string;
    /** Prefix for every fragment. `''` counts as given. */
    label?: string;
    /** Defaults to true. */
    enabled?: boolean;
    intervalMs?: number;
    compute?: ComputeFn;
    command?: readonly string[];
    thread?: ThreadFn;
}

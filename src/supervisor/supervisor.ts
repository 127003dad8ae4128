import { BarAssembler, type AssemblerOptions } from '../bar/assembler.js';
import type { Publisher } from '../bar/publisher.js';
import { ResultBus } from '../bus/result-bus.js';
import { logger } from '../config/logger.js';
import { errorMessage } from '../errors.js';
import { Metrics } from '../metrics/counter.js';
import type { Monitor } from '../monitors/monitor.js';
import type { TargetName } from '../targets.js';
import { TriggerWatcher } from '../triggers/watcher.js';

export interface SupervisorOptions {
    target: TargetName;
    monitors: readonly Monitor[];
    publisher: Publisher;
    watchDir: string;
    pollMs: number;
    assembler: AssemblerOptions;
    metrics?: Metrics;
}

/**
 * Runs every monitor and the trigger watcher, and feeds their results to the
 * assembler.
 */
export class Supervisor {
    readonly bus = new ResultBus();
    readonly metrics: Metrics;
    readonly assembler: BarAssembler;
    readonly watcher: TriggerWatcher;

    constructor(private options: SupervisorOptions) {
        this.metrics = options.metrics ?? new Metrics();
        this.assembler = new BarAssembler(
            options.monitors.map((m) => m.id),
            options.publisher,
            this.metrics,
            options.assembler,
        );
        this.watcher = new TriggerWatcher(options.watchDir, options.monitors, this.metrics, options.pollMs);
    }

    /** Starts each monitor once. Monitors report their own failures as results. */
    startMonitors(): void {
        for (const monitor of this.options.monitors) {
            const running: Promise<void> = monitor.run({
                target: this.options.target,
                emit: this.bus.emitterFor(monitor.id),
                metrics: this.metrics,
            });
            void running
                .then(() => {
                    logger.info({ id: monitor.id }, 'monitor ended');
                })
                .catch((err: unknown) => {
                    logger.error({ id: monitor.id, error: errorMessage(err) }, 'monitor crashed');
                });
        }
    }

    /**
     * Runs until the assembler fails, which is the only way out besides a
     * signal.
     */
    async run(): Promise<never> {
        this.startMonitors();
        void this.watcher.run().catch((err: unknown) => {
            logger.error({ error: errorMessage(err) }, 'trigger watcher stopped');
        });
        return this.assembler.run(this.bus);
    }
}

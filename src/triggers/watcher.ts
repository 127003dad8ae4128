import { mkdir, readdir, rm } from 'fs/promises';
import { join } from 'path';
import { logger } from '../config/logger.js';
import { errorMessage } from '../errors.js';
import { Metrics } from '../metrics/counter.js';
import type { Monitor } from '../monitors/monitor.js';

export const DEFAULT_POLL_MS = 200;

/**
 * Polls a watch directory for marker files. Each file is deleted and its name
 * is the id of the monitor to wake.
 */
export class TriggerWatcher {
    private monitors: Map<string, Monitor>;

    constructor(
        private dir: string,
        monitors: readonly Monitor[],
        private metrics: Metrics,
        private pollMs = DEFAULT_POLL_MS,
    ) {
        this.monitors = new Map(monitors.map((m) => [m.id, m]));
    }

    /** Wakes the monitor, or logs why it cannot. */
    trigger(id: string): boolean {
        const monitor = this.monitors.get(id);

        if (!monitor) {
            logger.warn({ id }, 'trigger-monitor: no monitor with id');
            this.metrics.incrementTriggersDropped();
            return false;
        }

        if (monitor.kind !== 'computed') {
            logger.warn({ id, kind: monitor.kind }, 'trigger-monitor: monitor does not support triggers');
            this.metrics.incrementTriggersDropped();
            return false;
        }

        monitor.trigger();
        this.metrics.incrementTriggersDelivered();
        return true;
    }

    /** One pass over the directory. Returns the ids found, in directory order. */
    async scanOnce(): Promise<string[]> {
        const entries = await readdir(this.dir, { withFileTypes: true });
        const ids: string[] = [];

        for (const entry of entries) {
            if (entry.isDirectory()) continue;
            const id = entry.name;
            logger.info({ id }, 'trigger');
            await rm(join(this.dir, id), { force: true });
            this.trigger(id);
            ids.push(id);
        }

        return ids;
    }

    async run(): Promise<never> {
        await mkdir(this.dir, { recursive: true });

        for (;;) {
            try {
                await this.scanOnce();
            } catch (err) {
                logger.error({ dir: this.dir, error: errorMessage(err) }, 'trigger scan failed');
            }
            await new Promise((resolve) => setTimeout(resolve, this.pollMs));
        }
    }
}

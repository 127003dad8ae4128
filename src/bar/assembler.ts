import { logger } from '../config/logger.js';
import { PublishError, errorMessage } from '../errors.js';
import { Metrics } from '../metrics/counter.js';
import type { MonitorResult, ResultBus } from '../bus/result-bus.js';
import type { Publisher } from './publisher.js';

export interface AssemblerOptions {
    maxFragmentWidth: number;
    separator: string;
}

export const DEFAULT_ASSEMBLER_OPTIONS: AssemblerOptions = {
    maxFragmentWidth: 40,
    separator: ' | ',
};

export function truncate(text: string, width: number): string {
    const chars = Array.from(text);
    return chars.length <= width ? text : chars.slice(0, width).join('');
}

/**
 * Owns the latest-value table and turns it into the published line. Only the
 * consumer loop in `run` mutates the table.
 */
export class BarAssembler {
    private results = new Map<string, string>();
    private displayOrder: string[];
    private lastBar: string | null = null;

    /**
     * @param declaredOrder monitor ids as declared; the last one renders leftmost
     */
    constructor(
        declaredOrder: readonly string[],
        private publisher: Publisher,
        private metrics: Metrics,
        private options: AssemblerOptions = DEFAULT_ASSEMBLER_OPTIONS,
    ) {
        this.displayOrder = [...declaredOrder].reverse();
    }

    apply(result: MonitorResult): void {
        if (result.text) {
            this.results.set(result.id, result.text);
        } else {
            this.results.delete(result.id);
        }
    }

    render(): string {
        const visible = this.fragments().map(([, text]) => text);
        return ` ${visible.join(this.options.separator)} `;
    }

    /** Visible fragments in display order, already truncated. */
    fragments(): Array<[string, string]> {
        const fragments: Array<[string, string]> = [];
        for (const id of this.displayOrder) {
            const text = this.results.get(id);
            if (text) {
                fragments.push([id, truncate(text, this.options.maxFragmentWidth)]);
            }
        }
        return fragments;
    }

    get currentBar(): string | null {
        return this.lastBar;
    }

    /** Applies one result and republishes. Throws PublishError on failure. */
    async consume(result: MonitorResult): Promise<void> {
        logger.debug({ id: result.id, text: result.text }, 'consuming');
        this.metrics.incrementResultsReceived();
        this.apply(result);

        const bar = this.render();
        try {
            await this.publisher.publish(bar);
        } catch (err) {
            logger.error({ error: errorMessage(err) }, 'error invoking publisher, exiting');
            throw new PublishError(`error invoking publisher: ${errorMessage(err)}`, err);
        }

        this.lastBar = bar;
        this.metrics.incrementBarsPublished();
    }

    /** Consumer loop; only ever ends by throwing. */
    async run(bus: ResultBus): Promise<never> {
        for (;;) {
            await this.consume(await bus.receive());
        }
    }
}

import { EventEmitter } from 'events';
import { logger } from '../config/logger.js';

export const TERMINATION_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

/** Logs the signal so shutdown warnings in the log have a visible cause. */
export function installSignalHandlers(
    exit: (code: number) => never = process.exit,
    source: EventEmitter = process,
): void {
    for (const signal of TERMINATION_SIGNALS) {
        source.on(signal, () => {
            logger.warn({ signal }, `received ${signal}, exiting`);
            exit(1);
        });
    }
}

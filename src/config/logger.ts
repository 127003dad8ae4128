import pino, { type Logger } from 'pino';
import { loadConfig } from './env.js';

const config = loadConfig();

export interface LogSettings {
    level: string;
    /** Pretty lines appended to this file instead of stdout. */
    file?: string;
}

function createLogger(settings: LogSettings): Logger {
    if (settings.level === 'silent') {
        return pino({ level: 'silent' });
    }

    if (settings.file) {
        return pino({
            level: settings.level,
            transport: {
                target: 'pino-pretty',
                options: {
                    destination: settings.file,
                    mkdir: true,
                    append: true,
                    colorize: false,
                    translateTime: 'SYS:yyyy/mm/dd HH:MM:ss.l',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return pino({
        level: settings.level,
        transport:
            process.env.NODE_ENV !== 'production'
                ? {
                    target: 'pino-pretty',
                    options: {
                        colorize: true,
                        translateTime: 'SYS:standard',
                        ignore: 'pid,hostname',
                    },
                }
                : undefined,
    });
}

export let logger: Logger = createLogger({ level: config.log.level });

/**
 * Rebinds the shared logger once the target is known. Modules read `logger`
 * through the live binding, so they pick up the new destination.
 */
export function setupLogging(settings: LogSettings, bindings: Record<string, string> = {}): Logger {
    logger = createLogger(settings).child(bindings);
    return logger;
}

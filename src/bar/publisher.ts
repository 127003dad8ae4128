import { writeFile } from 'fs/promises';
import { logger } from '../config/logger.js';
import { shOrThrow } from '../monitors/shell.js';

/**
 * Display surface for the composed bar. A rejected publish is fatal to the
 * process, so implementations must not swallow their own failures.
 */
export interface Publisher {
    publish(bar: string): Promise<void>;
}

/** Sets the X root window name, which dwm shows as its status text. */
export class RootWindowPublisher implements Publisher {
    async publish(bar: string): Promise<void> {
        await shOrThrow('xsetroot', '-name', bar);
    }
}

/**
 * Overwrites a file with the bar. tmux reads it with
 * `status-right "#(cat ~/.tmux-bar)"`.
 */
export class FilePublisher implements Publisher {
    constructor(private path: string) { }

    async publish(bar: string): Promise<void> {
        await writeFile(this.path, bar, 'utf-8');
    }
}

export class StreamPublisher implements Publisher {
    constructor(private stream: NodeJS.WritableStream = process.stdout) { }

    publish(bar: string): Promise<void> {
        return new Promise((resolve, reject) => {
            this.stream.write(`${bar}\n`, (err) => (err ? reject(err) : resolve()));
        });
    }
}

/** Only logs the bar; useful while working on monitors. */
export class LogPublisher implements Publisher {
    async publish(bar: string): Promise<void> {
        logger.info({ bar }, 'bar');
    }
}

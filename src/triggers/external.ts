import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { AppConfig } from '../config/env.js';
import { ConfigError } from '../errors.js';
import { TARGET_NAMES, watchDir } from '../targets.js';

/**
 * Asks running instances to refresh monitors now, by creating an empty marker
 * file per monitor in the watch directory of every target.
 *
 * @returns the marker files written
 */
export async function triggerExternally(
    config: AppConfig,
    requestedIds: readonly string[],
    knownIds: readonly string[],
): Promise<string[]> {
    const unknown = requestedIds.filter((id) => !knownIds.includes(id));
    if (unknown.length > 0) {
        throw new ConfigError(`unknown monitor: ${unknown.join(' ')}`);
    }

    const written: string[] = [];
    for (const id of requestedIds) {
        for (const target of TARGET_NAMES) {
            const dir = watchDir(config, target);
            await mkdir(dir, { recursive: true });
            const path = join(dir, id);
            await writeFile(path, '');
            written.push(path);
        }
    }
    return written;
}

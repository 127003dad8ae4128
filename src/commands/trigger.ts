import type { AppConfig } from '../config/env.js';
import { UsageError } from '../errors.js';
import { triggerExternally } from '../triggers/external.js';
import { loadMonitorCatalog, monitorIds } from './catalog.js';
import { usageText } from './usage.js';

export async function triggerCommand(args: readonly string[], config: AppConfig): Promise<number> {
    const { specs } = loadMonitorCatalog(config);
    const known = monitorIds(specs);

    if (args.length === 0) {
        throw new UsageError(usageText(known));
    }

    await triggerExternally(config, args, known);
    return 0;
}

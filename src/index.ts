#!/usr/bin/env node
import { loadConfig } from './config/env.js';
import { logger } from './config/logger.js';
import { errorMessage, exitCodeOf, UsageError } from './errors.js';
import { loadMonitorCatalog, monitorIds } from './commands/catalog.js';
import { logCommand } from './commands/log.js';
import { runCommand } from './commands/run.js';
import { triggerCommand } from './commands/trigger.js';
import { usageText } from './commands/usage.js';

async function main(argv: readonly string[]): Promise<number> {
    const [command, ...args] = argv;
    const config = loadConfig();

    switch (command) {
        case 'run':
            return runCommand(args, config);
        case 'trigger':
            return triggerCommand(args, config);
        case 'log':
            return logCommand(args, config);
        default:
            throw new UsageError(usageText(monitorIds(loadMonitorCatalog(config).specs)));
    }
}

main(process.argv.slice(2))
    .then((code) => {
        process.exit(code);
    })
    .catch((err: unknown) => {
        if (!(err instanceof UsageError)) {
            logger.error({ error: errorMessage(err) }, 'exiting');
        }
        console.error(errorMessage(err));
        process.exit(exitCodeOf(err));
    });

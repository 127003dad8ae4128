import { mkdirSync } from 'fs';
import { v4 as uuidv4 } from 'uuid';
import { StatusServer } from '../api/server.js';
import type { AppConfig } from '../config/env.js';
import { logger, setupLogging, type LogSettings } from '../config/logger.js';
import { UsageError } from '../errors.js';
import { selectMonitors } from '../monitors/registry.js';
import { killOtherInstances } from '../supervisor/instances.js';
import { installSignalHandlers } from '../supervisor/signals.js';
import { Supervisor } from '../supervisor/supervisor.js';
import { TARGET_NAMES, TARGETS, isTargetName, logPath, watchDir, type TargetName } from '../targets.js';
import { loadMonitorCatalog, monitorIds } from './catalog.js';
import { usageText } from './usage.js';

/** Watch directories exist for every target, since `trigger` writes to all of them. */
function ensureWatchDirs(config: AppConfig): void {
    for (const target of TARGET_NAMES) {
        mkdirSync(watchDir(config, target), { recursive: true });
    }
}

/** Targets that log to stdout keep it; the others log to `<cacheDir>/<target>.log`. */
export function logSettings(config: AppConfig, target: TargetName): LogSettings {
    const spec = TARGETS[target];
    const level = config.log.level === 'silent' ? 'silent' : (spec.logLevel ?? config.log.level);
    return spec.logToStdout ? { level } : { level, file: logPath(config, target) };
}

function startLogging(config: AppConfig, target: TargetName): void {
    const settings = logSettings(config, target);
    if (settings.file) {
        console.log('logging to', settings.file);
    }
    setupLogging(settings, { target, run_id: uuidv4() });
}

/**
 * `run TARGET [MONITOR...]`: becomes the only instance for the target and
 * publishes until killed or until publishing fails.
 */
export async function runCommand(args: readonly string[], config: AppConfig): Promise<never> {
    const [target, ...requested] = args;
    const catalog = loadMonitorCatalog(config);

    if (!isTargetName(target)) {
        throw new UsageError(usageText(monitorIds(catalog.specs)));
    }

    ensureWatchDirs(config);
    startLogging(config, target);
    logger.info('starting');

    // Monitors are validated before another instance is stopped
    const monitors = selectMonitors(catalog.specs, requested);

    installSignalHandlers();
    await killOtherInstances(target);

    const supervisor = new Supervisor({
        target,
        monitors,
        publisher: TARGETS[target].createPublisher(config),
        watchDir: watchDir(config, target),
        pollMs: config.triggers.pollMs,
        assembler: config.bar,
    });

    if (config.http.port > 0) {
        const server = new StatusServer(config.http.port, target, supervisor.metrics, supervisor.assembler);
        await server.start();
    }

    return supervisor.run();
}

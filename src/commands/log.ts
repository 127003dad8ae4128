import { spawn } from 'child_process';
import type { AppConfig } from '../config/env.js';
import { UsageError } from '../errors.js';
import { isTargetName, logPath } from '../targets.js';
import { loadMonitorCatalog, monitorIds } from './catalog.js';
import { usageText } from './usage.js';

export const DEFAULT_LOG_VIEWER = ['less', '-S', '+F'];

/** Opens the target's log file in a viewer; resolves with the viewer's exit code. */
export async function logCommand(args: readonly string[], config: AppConfig): Promise<number> {
    const [target, ...command] = args;
    if (!isTargetName(target)) {
        throw new UsageError(usageText(monitorIds(loadMonitorCatalog(config).specs)));
    }

    const [viewer, ...viewerArgs] = command.length > 0 ? command : DEFAULT_LOG_VIEWER;
    return new Promise((resolve, reject) => {
        const child = spawn(viewer, [...viewerArgs, logPath(config, target)], { stdio: 'inherit' });
        child.on('error', reject);
        child.on('close', (code) => resolve(code ?? 1));
    });
}

import { logger } from '../config/logger.js';
import { ConfigError, FatalError } from '../errors.js';
import { makeMonitor, type Monitor } from './monitor.js';
import type { MonitorParams } from './types.js';

export function findDuplicateIds(specs: readonly MonitorParams[]): string[] {
    const counts = new Map<string, number>();
    for (const spec of specs) {
        if (spec.id) counts.set(spec.id, (counts.get(spec.id) ?? 0) + 1);
    }
    return [...counts].filter(([, n]) => n > 1).map(([id]) => id);
}

/**
 * Turns the declared monitor table into the monitors to run.
 *
 * With a non-empty `only`, exactly those monitors run whatever their
 * `enabled` flag says; otherwise every enabled one does. Declaration order is
 * kept, since it is the display order.
 */
export function selectMonitors(specs: readonly MonitorParams[], only: readonly string[] = []): Monitor[] {
    const duplicateIds = findDuplicateIds(specs);
    if (duplicateIds.length > 0) {
        throw new ConfigError(`duplicate monitor ids in monitor-specs: ${duplicateIds.join(', ')}`);
    }

    const validIds = new Set(specs.map((spec) => spec.id));
    const invalidIds = only.filter((id) => !validIds.has(id));
    if (invalidIds.length > 0) {
        throw new ConfigError(`aborting - unknown monitors: ${invalidIds.join(' ')}`);
    }

    // Every declared monitor is validated, so a broken one fails even while disabled
    const built = specs.map((spec) => ({ spec, monitor: makeMonitor(spec) }));

    const requested = new Set(only);
    const active = built
        .filter(({ spec, monitor }) => (requested.size > 0 ? requested.has(monitor.id) : spec.enabled !== false))
        .map(({ monitor }) => monitor);

    logger.info({ monitors: active.map((m) => m.id) }, 'enabled monitors');

    if (active.length === 0) {
        throw new FatalError('no monitors');
    }
    return active;
}

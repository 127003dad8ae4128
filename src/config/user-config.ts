import { existsSync, readFileSync } from 'fs';
import { logger } from './logger.js';
import { ConfigError, errorMessage } from '../errors.js';
import { SchemaValidator, USER_CONFIG_SCHEMA_ID } from '../contracts/schema-validator.js';
import { shOut } from '../monitors/shell.js';
import type { MonitorParams } from '../monitors/types.js';

export interface MonitorOverride {
    enabled?: boolean;
    label?: string;
    interval_ms?: number;
}

export interface ExtraMonitor {
    id: string;
    label: string;
    enabled?: boolean;
    interval_ms?: number;
    /** Run with `sh -c` each interval; trimmed stdout is the fragment. */
    shell?: string;
    /** Long-running command whose stdout lines are the fragment. */
    command?: string[];
}

export interface UserConfig {
    monitors?: Record<string, MonitorOverride>;
    extra_monitors?: ExtraMonitor[];
}

/**
 * Reads the user configuration file. A missing file means no overrides;
 * malformed JSON or a schema violation is a ConfigError.
 */
export function loadUserConfig(path: string, validator: SchemaValidator): UserConfig {
    if (!existsSync(path)) {
        logger.debug({ path }, 'No user config');
        return {};
    }

    let data: unknown;
    try {
        data = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
        throw new ConfigError(`Failed to load user config from ${path}: ${errorMessage(err)}`);
    }

    const result = validator.validate<UserConfig>(USER_CONFIG_SCHEMA_ID, data);
    if (!result.valid) {
        throw new ConfigError(`Invalid user config ${path}: ${result.errors}`);
    }

    logger.info({ path }, 'User config loaded');
    return result.value;
}

function extraMonitorParams(extra: ExtraMonitor): MonitorParams {
    const { shell } = extra;
    return {
        id: extra.id,
        label: extra.label,
        enabled: extra.enabled,
        intervalMs: extra.interval_ms,
        compute: shell === undefined ? undefined : () => shOut('sh', '-c', shell),
        command: extra.command,
    };
}

/**
 * Overrides built-in monitors and appends the extra ones. Overriding an id
 * that is not declared is a ConfigError.
 */
export function applyUserConfig(specs: readonly MonitorParams[], user: UserConfig): MonitorParams[] {
    const overrides = user.monitors ?? {};
    const declared = new Set(specs.map((spec) => spec.id));

    const unknown = Object.keys(overrides).filter((id) => !declared.has(id));
    if (unknown.length > 0) {
        throw new ConfigError(`user config overrides unknown monitors: ${unknown.join(', ')}`);
    }

    const merged = specs.map((spec) => {
        const override = spec.id === undefined ? undefined : overrides[spec.id];
        if (!override) return spec;
        return {
            ...spec,
            ...(override.enabled !== undefined && { enabled: override.enabled }),
            ...(override.label !== undefined && { label: override.label }),
            ...(override.interval_ms !== undefined && { intervalMs: override.interval_ms }),
        };
    });

    return [...merged, ...(user.extra_monitors ?? []).map(extraMonitorParams)];
}

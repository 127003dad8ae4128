import { homedir } from 'os';
import { AlertEngine } from '../alerts/alert-engine.js';
import type { AppConfig } from '../config/env.js';
import { applyUserConfig, loadUserConfig } from '../config/user-config.js';
import { SchemaValidator } from '../contracts/schema-validator.js';
import { builtinMonitorSpecs } from '../monitors/specs.js';
import type { MonitorParams } from '../monitors/types.js';

export interface MonitorCatalog {
    specs: MonitorParams[];
    alerts: AlertEngine;
}

/** Built-in monitors with the user's overrides and extra monitors applied. */
export function loadMonitorCatalog(config: AppConfig): MonitorCatalog {
    const validator = new SchemaValidator(config.paths.contracts);
    validator.loadSchemas();
    const userConfig = loadUserConfig(config.paths.userConfig, validator);

    const alerts = new AlertEngine({ idleMs: config.alerts.idleMs });
    const specs = applyUserConfig(builtinMonitorSpecs({ config, alerts, home: homedir() }), userConfig);
    return { specs, alerts };
}

export function monitorIds(specs: readonly MonitorParams[]): string[] {
    return specs.flatMap((spec) => (spec.id ? [spec.id] : []));
}

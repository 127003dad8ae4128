import type { AlertControl } from '../../alerts/alert-engine.js';
import type { ComputeFn } from '../types.js';

export const BATTERY_ALERT_REASON = 'power';

export interface BatteryThresholds {
    /** Below this while discharging the `power` alert blinks. */
    alertPercent: number;
    /** Below this while discharging the machine is powered off. */
    powerOffPercent: number;
}

export const DEFAULT_BATTERY_THRESHOLDS: BatteryThresholds = {
    alertPercent: 15,
    powerOffPercent: 5,
};

export interface BatteryState {
    status: string;
    percent: number;
    /** `HH:MM` until charged or empty, when acpi knows it. */
    duration?: string;
}

// Battery 0: Charging, 85%, 00:15:35 until charged
// Battery 0: Discharging, 85%, 07:55:04 remaining
// Battery 0: Full, 100%
const ACPI_PATTERN = /Battery 0:\s+(\w+), (\d+)%(, +(\d\d:\d\d)(?::\d\d))?/;

export function parseAcpi(output: string): BatteryState {
    const match = ACPI_PATTERN.exec(output);
    if (!match) {
        throw new Error(`unexpected acpi output: ${output}`);
    }
    const [, status, percent, , duration] = match;
    return { status, percent: parseInt(percent, 10), duration };
}

const STATUS_CODES: Record<string, string> = {
    Charging: 'C',
    Discharging: 'D',
};

/** `85% D 07:55`; null once full. */
export function formatBattery(state: BatteryState): string | null {
    if (state.status === 'Full') return null;
    const code = STATUS_CODES[state.status] ?? state.status;
    return [`${state.percent}%`, code, state.duration].filter(Boolean).join(' ');
}

export type BatteryAction = 'alert' | 'clear' | 'power-off';

export function batteryAction(state: BatteryState, thresholds: BatteryThresholds): BatteryAction {
    if (state.status !== 'Discharging') return 'clear';
    if (state.percent < thresholds.powerOffPercent) return 'power-off';
    return state.percent < thresholds.alertPercent ? 'alert' : 'clear';
}

export interface BatteryDeps {
    readAcpi: () => Promise<string>;
    powerOff: () => Promise<unknown>;
    alerts: AlertControl;
    thresholds?: BatteryThresholds;
}

export function batteryCompute(deps: BatteryDeps): ComputeFn {
    const thresholds = deps.thresholds ?? DEFAULT_BATTERY_THRESHOLDS;

    return async () => {
        const state = parseAcpi(await deps.readAcpi());

        switch (batteryAction(state, thresholds)) {
            case 'power-off':
                await deps.powerOff();
                break;
            case 'alert':
                deps.alerts.add(BATTERY_ALERT_REASON);
                break;
            case 'clear':
                deps.alerts.remove(BATTERY_ALERT_REASON);
                break;
        }

        return formatBattery(state);
    };
}

import { config } from 'dotenv';
import { existsSync } from 'fs';
import { homedir } from 'os';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';

// Load .env file if present
config();

export interface AppConfig {
    paths: {
        cacheDir: string;
        userConfig: string;
        contracts: string;
        tmuxBar: string;
    };
    bar: {
        maxFragmentWidth: number;
        separator: string;
    };
    triggers: {
        pollMs: number;
    };
    alerts: {
        idleMs: number;
    };
    wifi: {
        homeSsid: string;
    };
    http: {
        port: number;
    };
    log: {
        level: string;
    };
}

function getEnv(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new Error(`Invalid number for environment variable ${key}: ${value}`);
    }
    return parsed;
}

/**
 * Directory holding package.json, found by walking up from this module so it
 * resolves the same from src/ and from dist/src/.
 */
export function findPackageRoot(start = dirname(fileURLToPath(import.meta.url))): string {
    let dir = start;
    for (;;) {
        if (existsSync(join(dir, 'package.json'))) return dir;
        const parent = resolve(dir, '..');
        if (parent === dir) return start;
        dir = parent;
    }
}

export function loadConfig(): AppConfig {
    const home = homedir();

    return {
        paths: {
            cacheDir: getEnv('STATUS_BAR_CACHE_DIR', join(home, '.cache', 'status-bar')),
            userConfig: getEnv('STATUS_BAR_CONFIG', join(home, '.config', 'status-bar', 'config.json')),
            contracts: getEnv('CONTRACTS_PATH', join(findPackageRoot(), 'contracts')),
            tmuxBar: getEnv('TMUX_BAR_PATH', join(home, '.tmux-bar')),
        },
        bar: {
            maxFragmentWidth: getEnvNumber('MAX_FRAGMENT_WIDTH', 40),
            separator: ' | ',
        },
        triggers: {
            pollMs: getEnvNumber('TRIGGER_POLL_MS', 200),
        },
        alerts: {
            idleMs: getEnvNumber('ALERT_IDLE_MS', 600000), // 10 minutes
        },
        wifi: {
            homeSsid: getEnv('WIFI_HOME_SSID', ''),
        },
        http: {
            port: getEnvNumber('HTTP_PORT', 0),
        },
        log: {
            level: getEnv('LOG_LEVEL', 'info'),
        },
    };
}

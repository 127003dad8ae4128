import { join } from 'path';
import type { AppConfig } from './config/env.js';
import {
    FilePublisher,
    LogPublisher,
    RootWindowPublisher,
    StreamPublisher,
    type Publisher,
} from './bar/publisher.js';

export const TARGET_NAMES = ['dwm', 'tmux', 'stdout', 'debug'] as const;

export type TargetName = (typeof TARGET_NAMES)[number];

export interface TargetSpec {
    name: TargetName;
    createPublisher(config: AppConfig): Publisher;
    /** Alert blink half-period. */
    blinkMs: number;
    logLevel?: string;
    logToStdout?: boolean;
}

const DEFAULT_BLINK_MS = 500;

export const TARGETS: Record<TargetName, TargetSpec> = {
    dwm: {
        name: 'dwm',
        createPublisher: () => new RootWindowPublisher(),
        blinkMs: DEFAULT_BLINK_MS,
    },
    // tmux.conf:
    //   set -g status-interval 1
    //   set -g status-right "#(cat ~/.tmux-bar)"
    //   set -g status-right-length 200
    tmux: {
        name: 'tmux',
        createPublisher: (config) => new FilePublisher(config.paths.tmuxBar),
        blinkMs: 1000,
    },
    stdout: {
        name: 'stdout',
        createPublisher: () => new StreamPublisher(),
        blinkMs: DEFAULT_BLINK_MS,
    },
    debug: {
        name: 'debug',
        createPublisher: () => new LogPublisher(),
        blinkMs: DEFAULT_BLINK_MS,
        logLevel: 'debug',
        logToStdout: true,
    },
};

export function isTargetName(name: string | undefined): name is TargetName {
    return TARGET_NAMES.some((target) => target === name);
}

/** Directory the TriggerWatcher of this target polls for marker files. */
export function watchDir(config: AppConfig, target: TargetName): string {
    return join(config.paths.cacheDir, target);
}

export function logPath(config: AppConfig, target: TargetName): string {
    return join(config.paths.cacheDir, `${target}.log`);
}

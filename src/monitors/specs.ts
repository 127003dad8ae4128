import { readFile } from 'fs/promises';
import { platform } from 'os';
import { join } from 'path';
import type { AlertEngine } from '../alerts/alert-engine.js';
import type { AppConfig } from '../config/env.js';
import { batteryCompute } from './builtin/battery.js';
import { findWifiInterface, wifiText } from './builtin/network.js';
import { pendingUpdatesText, runningDomains, statusCommand } from './builtin/status.js';
import {
    diskPercent,
    memoryPercent,
    mountNames,
    parseTemperature,
    percentAtLeast,
    temperatureText,
} from './builtin/system.js';
import { formatTime } from './builtin/time.js';
import { parseVolume } from './builtin/volume.js';
import { pathExists, shOrThrow, shOut } from './shell.js';
import type { MonitorParams } from './types.js';

const seconds = (n: number) => n * 1000;
const minutes = (n: number) => n * 60 * 1000;

export interface SpecDeps {
    config: AppConfig;
    alerts: AlertEngine;
    home: string;
}

/**
 * The built-in monitor table. Order is display order from right to left, so
 * monitors that change often sit at the end, on the left of the bar.
 */
export function builtinMonitorSpecs({ config, alerts, home }: SpecDeps): MonitorParams[] {
    const homeBin = (name: string) => join(home, 'bin', name);
    const tempPath = '/sys/class/thermal/thermal_zone0/temp';
    const wifiInterface = findWifiInterface();
    const os = platform();

    return [
        // Blinking alerts, raised and cleared by other monitors (battery)
        alerts.monitorParams('alert'),

        {
            id: 'alert-test',
            enabled: false,
            label: 'test: ',
            intervalMs: seconds(2),
            compute: () => {
                if (pathExists('/tmp/alert-test')) {
                    alerts.add('present');
                } else {
                    alerts.remove('present');
                }
                return null;
            },
        },

        {
            id: 'stderr-test',
            enabled: false,
            label: 'test: ',
            command: [
                'bash',
                '-c',
                'for i in $(seq 2); do echo stdout $i; echo stderr $i 1>&2; sleep 2; done; echo quitting; exit 6',
            ],
        },

        {
            id: 'time',
            label: '',
            intervalMs: seconds(1),
            compute: () => formatTime(new Date()),
        },

        // The same clock as a streamed and as a custom monitor
        {
            id: 'time-with-command',
            enabled: false,
            label: 'time: ',
            command: ['bash', '-c', 'while :; do date; sleep 1; done'],
        },
        {
            id: 'time-with-thread',
            enabled: false,
            thread: async (ctx) => {
                for (;;) {
                    ctx.emit(`time: ${formatTime(new Date())}`);
                    await new Promise((resolve) => setTimeout(resolve, seconds(1)));
                }
            },
        },

        {
            id: 'volume',
            enabled: pathExists('/usr/bin/pactl'),
            label: 'vol: ',
            intervalMs: seconds(10),
            compute: async () => parseVolume(await shOut('pactl', 'list', 'sinks')),
        },

        {
            id: 'brightness',
            enabled: pathExists(homeBin('laptop')),
            label: 'lcd: ',
            intervalMs: seconds(60),
            compute: async () => `${await shOut('laptop', 'brightness', 'percent')}%`,
        },

        {
            id: 'profile',
            enabled: pathExists(homeBin('laptop')),
            label: 'prof: ',
            intervalMs: seconds(60),
            compute: statusCommand(['laptop', 'profile', 'adjust']),
        },

        {
            id: 'battery',
            enabled: pathExists('/usr/bin/acpi'),
            label: 'batt: ',
            intervalMs: seconds(10),
            compute: batteryCompute({
                readAcpi: () => shOut('acpi', '-b'),
                powerOff: () => shOrThrow('sudo', 'poweroff'),
                alerts,
            }),
        },

        {
            id: 'temperature',
            enabled: pathExists(tempPath),
            label: 'temp: ',
            intervalMs: seconds(60),
            compute: async () => temperatureText(parseTemperature(await readFile(tempPath, 'utf-8'))),
        },

        {
            id: 'arch',
            enabled: pathExists('/usr/bin/pacman'),
            label: 'arch: ',
            intervalMs: minutes(60),
            compute: async () => pendingUpdatesText(await shOut('arch', 'pending')),
        },

        {
            id: 'secrets',
            enabled: pathExists(join(home, '.secrets')),
            label: 'secrets: ',
            intervalMs: minutes(10),
            compute: statusCommand(['secrets', 'status']),
        },

        {
            id: 'security',
            enabled: pathExists(homeBin('security')),
            label: 'sec: ',
            intervalMs: minutes(10),
            compute: statusCommand(['security', '-q']),
        },

        {
            id: 'cloud',
            enabled: pathExists(homeBin('gcloud2')),
            label: 'cloud: ',
            intervalMs: minutes(5),
            compute: statusCommand(['gcloud2', 'status']),
        },

        {
            id: 'vpn',
            enabled: pathExists(homeBin('vpn')),
            label: 'vpn: ',
            intervalMs: seconds(60),
            compute: statusCommand(['vpn', 'status'], 'off'),
        },

        {
            id: 'mounts',
            enabled: pathExists('/proc/mounts'),
            label: 'mnt: ',
            intervalMs: seconds(30),
            compute: async () => mountNames(await readFile('/proc/mounts', 'utf-8')),
        },

        {
            id: 'git',
            enabled: pathExists(homeBin('git-status')),
            label: 'git: ',
            intervalMs: minutes(60),
            compute: statusCommand(['git-status', 'status']),
        },

        // Down, weak signal, or SSID when away from home
        {
            id: 'wifi',
            enabled: wifiInterface !== undefined && pathExists('/usr/bin/iw'),
            label: 'wifi: ',
            intervalMs: seconds(10),
            compute: async () => {
                const link = await shOut('iw', 'dev', wifiInterface ?? 'wlan0', 'link');
                return wifiText(link, config.wifi.homeSsid);
            },
        },

        {
            id: 'vm',
            enabled: pathExists('/usr/bin/virsh'),
            label: '',
            intervalMs: minutes(1),
            compute: async () => runningDomains(await shOut('virsh', 'list', '--state-running', '--name')),
        },

        {
            id: 'disk',
            enabled: pathExists('/bin/df') || pathExists('/usr/bin/df'),
            label: 'disk: ',
            intervalMs: minutes(5),
            compute: async () => percentAtLeast(diskPercent(await shOut('df', '/'))),
        },

        {
            id: 'memory',
            enabled: pathExists('/proc/meminfo'),
            label: 'mem: ',
            intervalMs: seconds(30),
            compute: async () => percentAtLeast(memoryPercent(await readFile('/proc/meminfo', 'utf-8'))),
        },

        {
            id: 'cpu',
            enabled: (os === 'linux' && pathExists('/usr/bin/pidstat')) || os === 'darwin',
            label: 'cpu: ',
            // sampling period in seconds, total cpu threshold in percent
            command: ['status-bar-cpu', '5', '30'],
        },

        {
            id: 'dnsmasq',
            enabled: pathExists('/usr/bin/dnsmasq'),
            label: 'dnsmasq: ',
            command: ['status-bar-dnsmasq'],
        },
    ];
}

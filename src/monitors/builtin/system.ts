import { basename } from 'path';

/** Millidegrees from a thermal zone file to whole degrees. */
export function parseTemperature(content: string): number {
    const milli = parseInt(content.trim(), 10);
    if (isNaN(milli)) {
        throw new Error(`unexpected thermal zone content: ${content}`);
    }
    return Math.round(milli / 1000);
}

export function temperatureText(celsius: number, threshold = 55): string | null {
    return celsius > threshold ? `${celsius}C` : null;
}

/** Used memory as a whole percentage of MemTotal. */
export function memoryPercent(meminfo: string): number {
    const total = /MemTotal:\s+(\d+)\s/.exec(meminfo);
    const available = /MemAvailable:\s+(\d+)\s/.exec(meminfo);
    if (!total || !available) {
        throw new Error('MemTotal or MemAvailable missing from meminfo');
    }
    const totalKb = parseInt(total[1], 10);
    const availableKb = parseInt(available[1], 10);
    return Math.trunc(((totalKb - availableKb) / totalKb) * 100);
}

/** First `NN%` in `df` output, the header's `Use%` having no digits. */
export function diskPercent(df: string): number {
    const match = /(\d+)%/.exec(df);
    if (!match) {
        throw new Error('no usage percentage in df output');
    }
    return parseInt(match[1], 10);
}

export function percentAtLeast(percent: number, threshold = 50): string | null {
    return percent >= threshold ? `${percent}%` : null;
}

/** Names of everything mounted under /mnt, comma separated. */
export function mountNames(procMounts: string): string {
    return procMounts
        .split('\n')
        .map((line) => /^\S+\s+(\S+)\s/.exec(line)?.[1])
        .filter((mountPoint): mountPoint is string => mountPoint !== undefined && mountPoint.startsWith('/mnt/'))
        .map((mountPoint) => basename(mountPoint))
        .join(', ');
}

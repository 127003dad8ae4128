import { readdirSync } from 'fs';

/** First `wl*` interface under /sys/class/net, if any. */
export function findWifiInterface(netDir = '/sys/class/net'): string | undefined {
    try {
        return readdirSync(netDir).find((name) => name.startsWith('wl'));
    } catch {
        return undefined;
    }
}

const LINK_PATTERN = /SSID:\s+(\S+)\s[\s\S]*signal:\s+-(\d+) dBm/;

/**
 * Fragment for `iw dev <if> link` output: the SSID when away from home and
 * the link quality when away or weak, `down` when disconnected, null when
 * nothing is worth showing.
 */
export function wifiText(iwLink: string, homeSsid: string, qualityThreshold = 30): string | null {
    const match = LINK_PATTERN.exec(iwLink);

    if (match) {
        const [, ssid, signal] = match;
        const notHome = ssid !== homeSsid;
        const quality = Math.trunc((90 - parseInt(signal, 10)) * (100 / 60));
        if (!notHome && quality >= qualityThreshold) return null;
        return `${notHome ? `${ssid} ` : ''}${quality}%`;
    }

    if (iwLink.trim() === 'Not connected.') return 'down';

    throw new Error(`unexpected iw output: ${iwLink}`);
}

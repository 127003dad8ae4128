import { shOut } from '../shell.js';
import type { ComputeFn } from '../types.js';

/**
 * Runs a helper that prints `healthy` when all is well, and shows whatever it
 * prints otherwise.
 */
export function statusCommand(argv: readonly string[], healthy = 'ok'): ComputeFn {
    return async () => {
        const out = await shOut(...argv);
        return out === healthy ? null : out;
    };
}

export function pendingUpdatesText(output: string, threshold = 100): string | null {
    const pending = parseInt(output.trim(), 10);
    if (isNaN(pending)) {
        throw new Error(`unexpected pending count: ${output}`);
    }
    return pending > threshold ? `${pending} updates` : null;
}

/** Running libvirt domains from `virsh list --name`, space separated. */
export function runningDomains(output: string): string | null {
    const names = output.split('\n').map((line) => line.trim()).filter(Boolean);
    return names.length > 0 ? names.join(' ') : null;
}

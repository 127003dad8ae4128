/**
 * Volume of the first sink in `pactl list sinks` output, e.g. `50%`.
 *
 * The volume line reads `\tVolume: front-left: 32768 /  50% / -18.06 dB, ...`;
 * split on single spaces the percentage is the sixth field.
 */
export function parseVolume(pactlSinks: string): string {
    const line = pactlSinks.split('\n').find((l) => l.includes('Volume: '));
    const volume = line?.split(' ')[5];
    if (!volume) {
        throw new Error('no volume line in pactl output');
    }
    return volume;
}

import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import { AlertEngine, displayPair } from '../../../src/alerts/alert-engine.js';
import { Metrics } from '../../../src/metrics/counter.js';
import type { TargetName } from '../../../src/targets.js';

const IDLE_MS = 600000;

function startEngine(options: { blinkMs?: number; target?: TargetName } = {}) {
    const emitted: Array<string | null> = [];
    const engine = new AlertEngine({ idleMs: IDLE_MS, blinkMs: options.blinkMs });
    void engine.run({
        target: options.target ?? 'stdout',
        emit: (text) => emitted.push(text),
        metrics: new Metrics(),
    });
    return { engine, emitted };
}

const settle = () => vi.advanceTimersByTimeAsync(0);

describe('displayPair', () => {
    it('should be null for no alerts', () => {
        expect(displayPair(new Set())).toBeNull();
    });

    it('should sort reasons and pad the off text to the same width', () => {
        expect(displayPair(new Set(['power', 'disk']))).toEqual({
            on: '*** disk, power ***',
            off: ' '.repeat(19),
        });
    });
});

describe('AlertEngine', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('should show a new alert at once and blink it', async () => {
        const { engine, emitted } = startEngine({ blinkMs: 500 });

        engine.add('x');
        await settle();
        expect(emitted).toEqual(['*** x ***']);

        await vi.advanceTimersByTimeAsync(500);
        expect(emitted).toEqual(['*** x ***', '         ']);

        await vi.advanceTimersByTimeAsync(500);
        expect(emitted).toEqual(['*** x ***', '         ', '*** x ***']);
    });

    it('should apply requests that arrive together as one change', async () => {
        const { engine, emitted } = startEngine({ blinkMs: 500 });

        engine.add('y');
        engine.add('x');
        await settle();

        expect(emitted).toEqual(['*** x, y ***']);
    });

    it('should show nothing for an alert added and removed at once', async () => {
        const { engine, emitted } = startEngine({ blinkMs: 500 });

        engine.add('x');
        engine.remove('x');
        await settle();
        await vi.advanceTimersByTimeAsync(2000);

        expect(emitted).toEqual([]);
    });

    it('should clear the fragment and go quiet when the last alert is removed', async () => {
        const { engine, emitted } = startEngine({ blinkMs: 500 });

        engine.add('x');
        await settle();
        engine.remove('x');
        await settle();
        expect(emitted).toEqual(['*** x ***', null]);

        await vi.advanceTimersByTimeAsync(IDLE_MS * 2);
        expect(emitted).toEqual(['*** x ***', null]);
    });

    it('should show a swapped alert even though the count is unchanged', async () => {
        const { engine, emitted } = startEngine({ blinkMs: 500 });

        engine.add('a');
        await settle();
        engine.remove('a');
        engine.add('b');
        await settle();

        expect(emitted).toEqual(['*** a ***', '*** b ***']);
    });

    it('should ignore adding an alert that is already shown', async () => {
        const { engine, emitted } = startEngine({ blinkMs: 500 });

        engine.add('x');
        await settle();
        engine.add('x');
        await settle();
        expect(emitted).toEqual(['*** x ***']);

        await vi.advanceTimersByTimeAsync(500);
        expect(emitted).toEqual(['*** x ***', '         ']);
    });

    it('should ignore removing an unknown alert', async () => {
        const { engine, emitted } = startEngine({ blinkMs: 500 });

        engine.remove('ghost');
        await settle();

        expect(emitted).toEqual([]);
    });

    it('should keep blinking while alerts stay active', async () => {
        const { engine, emitted } = startEngine({ blinkMs: 500 });

        engine.add('power');
        await settle();
        for (let i = 0; i < 4; i++) {
            await vi.advanceTimersByTimeAsync(500);
        }

        const on = '*** power ***';
        const off = ' '.repeat(on.length);
        expect(emitted).toEqual([on, off, on, off, on]);
    });

    it('should blink at the target rate when none is given', async () => {
        const { engine, emitted } = startEngine({ target: 'tmux' });

        engine.add('x');
        await settle();
        await vi.advanceTimersByTimeAsync(500);
        expect(emitted).toHaveLength(1);

        await vi.advanceTimersByTimeAsync(500);
        expect(emitted).toHaveLength(2);
    });

    it('should keep one request per reason while nothing runs the engine', () => {
        const engine = new AlertEngine({ idleMs: IDLE_MS });

        for (let i = 0; i < 8640; i++) {
            if (i % 2 === 0) {
                engine.add('power');
            } else {
                engine.remove('power');
            }
        }
        engine.add('disk');

        expect(engine.pending).toBe(2);
    });

    it('should apply only the latest request per reason', async () => {
        const { engine, emitted } = startEngine({ blinkMs: 500 });

        engine.add('x');
        engine.remove('x');
        engine.add('x');
        await settle();

        expect(emitted).toEqual(['*** x ***']);
        expect(engine.pending).toBe(0);
    });

    it('should run as a custom monitor', () => {
        const engine = new AlertEngine({ idleMs: IDLE_MS });
        const params = engine.monitorParams();

        expect(params.id).toBe('alert');
        expect(params.thread).toBeTypeOf('function');
        expect(params.label).toBeUndefined();
    });
});

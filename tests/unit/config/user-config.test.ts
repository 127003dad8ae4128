import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig } from '../../../src/config/env.js';
import { applyUserConfig, loadUserConfig } from '../../../src/config/user-config.js';
import { SchemaValidator } from '../../../src/contracts/schema-validator.js';
import { ConfigError } from '../../../src/errors.js';
import { Metrics } from '../../../src/metrics/counter.js';
import { ComputedMonitor, StreamedMonitor, makeMonitor } from '../../../src/monitors/monitor.js';
import type { MonitorParams } from '../../../src/monitors/types.js';

describe('loadUserConfig', () => {
    let dir: string;
    let validator: SchemaValidator;

    beforeAll(() => {
        dir = mkdtempSync(join(tmpdir(), 'status-bar-user-config-'));
        validator = new SchemaValidator(loadConfig().paths.contracts);
        validator.loadSchemas();
    });

    afterAll(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should treat a missing file as no overrides', () => {
        expect(loadUserConfig(join(dir, 'absent.json'), validator)).toEqual({});
    });

    it('should load a valid file', () => {
        const path = join(dir, 'valid.json');
        writeFileSync(path, JSON.stringify({ monitors: { vm: { enabled: false } } }));

        expect(loadUserConfig(path, validator)).toEqual({ monitors: { vm: { enabled: false } } });
    });

    it('should fail on malformed JSON', () => {
        const path = join(dir, 'malformed.json');
        writeFileSync(path, '{ "monitors": ');

        expect(() => loadUserConfig(path, validator)).toThrow(ConfigError);
        expect(() => loadUserConfig(path, validator)).toThrow(`Failed to load user config from ${path}`);
    });

    it('should fail on a schema violation', () => {
        const path = join(dir, 'invalid.json');
        writeFileSync(path, JSON.stringify({ monitors: { vm: { enabled: 'no' } } }));

        expect(() => loadUserConfig(path, validator)).toThrow(`Invalid user config ${path}`);
    });
});

describe('applyUserConfig', () => {
    const specs: MonitorParams[] = [
        { id: 'time', label: '', intervalMs: 1000, compute: () => 'now' },
        { id: 'vm', label: '', intervalMs: 60000, compute: () => 'vm1' },
    ];

    it('should leave specs alone without overrides', () => {
        expect(applyUserConfig(specs, {})).toEqual(specs);
    });

    it('should override enabled, label and interval', () => {
        const merged = applyUserConfig(specs, {
            monitors: {
                time: { label: 't: ', interval_ms: 5000 },
                vm: { enabled: false },
            },
        });

        expect(merged[0]).toMatchObject({ id: 'time', label: 't: ', intervalMs: 5000 });
        expect(merged[1]).toMatchObject({ id: 'vm', label: '', intervalMs: 60000, enabled: false });
    });

    it('should reject overrides of undeclared monitors', () => {
        expect(() => applyUserConfig(specs, { monitors: { nope: { enabled: true } } })).toThrow(
            'user config overrides unknown monitors: nope',
        );
    });

    it('should append extra monitors after the built-in ones', () => {
        const merged = applyUserConfig(specs, {
            extra_monitors: [
                { id: 'uptime', label: 'up: ', interval_ms: 60000, shell: 'echo 3 days' },
                { id: 'journal', label: 'log: ', command: ['journalctl', '-f'] },
            ],
        });

        expect(merged.map((spec) => spec.id)).toEqual(['time', 'vm', 'uptime', 'journal']);
        expect(makeMonitor(merged[2])).toBeInstanceOf(ComputedMonitor);
        expect(makeMonitor(merged[3])).toBeInstanceOf(StreamedMonitor);
    });

    it('should run shell monitors through sh', async () => {
        const [extra] = applyUserConfig([], {
            extra_monitors: [{ id: 'uptime', label: 'up: ', interval_ms: 60000, shell: 'echo "3 days"' }],
        });
        const monitor = makeMonitor(extra);
        if (!(monitor instanceof ComputedMonitor)) {
            throw new Error('expected a computed monitor');
        }

        expect(await monitor.computeText(new Metrics())).toBe('up: 3 days');
    });

    it('should reject an extra monitor with both shell and command', () => {
        const [extra] = applyUserConfig([], {
            extra_monitors: [{ id: 'both', label: 'b: ', interval_ms: 1000, shell: 'true', command: ['true'] }],
        });
        expect(() => makeMonitor(extra)).toThrow('make-monitor: invalid combination of params for monitor with id both');
    });
});

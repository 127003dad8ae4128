import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig } from '../../../src/config/env.js';
import type { UserConfig } from '../../../src/config/user-config.js';
import { SchemaValidator, USER_CONFIG_SCHEMA_ID } from '../../../src/contracts/schema-validator.js';
import { ConfigError } from '../../../src/errors.js';

describe('SchemaValidator', () => {
    let validator: SchemaValidator;

    beforeAll(() => {
        validator = new SchemaValidator(loadConfig().paths.contracts);
        validator.loadSchemas();
    });

    describe('user config', () => {
        it('should accept overrides and extra monitors', () => {
            const config = {
                monitors: {
                    time: { label: '' },
                    memory: { interval_ms: 60000 },
                    vm: { enabled: false },
                },
                extra_monitors: [
                    { id: 'uptime', label: 'up: ', interval_ms: 60000, shell: 'uptime' },
                    { id: 'journal', label: 'log: ', command: ['journalctl', '-f'] },
                ],
            };

            const result = validator.validate<UserConfig>(USER_CONFIG_SCHEMA_ID, config);
            expect(result).toEqual({ valid: true, value: config });
        });

        it('should accept an empty config', () => {
            expect(validator.validate(USER_CONFIG_SCHEMA_ID, {}).valid).toBe(true);
        });

        it('should reject a non-integer interval', () => {
            const result = validator.validate(USER_CONFIG_SCHEMA_ID, {
                monitors: { time: { interval_ms: 'soon' } },
            });

            expect(result.valid).toBe(false);
            if (!result.valid) {
                expect(result.errors).toContain('must be integer');
            }
        });

        it('should reject intervals below 100 ms', () => {
            const result = validator.validate(USER_CONFIG_SCHEMA_ID, {
                monitors: { time: { interval_ms: 10 } },
            });
            expect(result.valid).toBe(false);
        });

        it('should reject unknown top-level properties', () => {
            const result = validator.validate(USER_CONFIG_SCHEMA_ID, { colours: 'dark' });

            expect(result.valid).toBe(false);
            if (!result.valid) {
                expect(result.errors).toContain('must NOT have additional properties');
            }
        });

        it('should reject extra monitor ids that cannot name a marker file', () => {
            const result = validator.validate(USER_CONFIG_SCHEMA_ID, {
                extra_monitors: [{ id: 'a/b', label: '', shell: 'true' }],
            });
            expect(result.valid).toBe(false);
        });

        it('should require a label on extra monitors', () => {
            const result = validator.validate(USER_CONFIG_SCHEMA_ID, {
                extra_monitors: [{ id: 'uptime', shell: 'uptime' }],
            });
            expect(result.valid).toBe(false);
        });
    });

    it('should report an unknown schema', () => {
        expect(validator.validate('https://example.com/nope.json', {})).toEqual({
            valid: false,
            errors: 'Schema not found: https://example.com/nope.json',
        });
    });

    it('should refuse to validate before schemas are loaded', () => {
        const fresh = new SchemaValidator(loadConfig().paths.contracts);
        expect(fresh.validate(USER_CONFIG_SCHEMA_ID, {})).toEqual({ valid: false, errors: 'Schemas not loaded' });
    });

    describe('loadSchemas', () => {
        let dir: string;

        beforeAll(() => {
            dir = mkdtempSync(join(tmpdir(), 'status-bar-contracts-'));
        });

        afterAll(() => {
            rmSync(dir, { recursive: true, force: true });
        });

        it('should fail for a missing directory', () => {
            const missing = new SchemaValidator(join(dir, 'missing'));
            expect(() => missing.loadSchemas()).toThrow(ConfigError);
        });

        it('should fail for malformed schema files', () => {
            const broken = join(dir, 'broken');
            mkdirSync(broken);
            writeFileSync(join(broken, 'bad.json'), '{ not json');

            expect(() => new SchemaValidator(broken).loadSchemas()).toThrow('failed to load schema');
        });

        it('should load nested schemas and skip those without $id', () => {
            const nested = join(dir, 'nested');
            mkdirSync(join(nested, 'inner'), { recursive: true });
            writeFileSync(
                join(nested, 'inner', 'thing.json'),
                JSON.stringify({ $id: 'https://example.com/thing.json', type: 'string' }),
            );
            writeFileSync(join(nested, 'anonymous.json'), JSON.stringify({ type: 'number' }));

            const loaded = new SchemaValidator(nested);
            loaded.loadSchemas();

            expect(loaded.validate('https://example.com/thing.json', 'text').valid).toBe(true);
            expect(loaded.validate('https://example.com/thing.json', 5).valid).toBe(false);
        });
    });
});

import Ajv2020Lib from 'ajv/dist/2020.js';
import type { SchemaObject } from 'ajv';

const Ajv2020 = Ajv2020Lib.default;
import { readFileSync, existsSync, readdirSync } from 'fs';
import { join } from 'path';
import { logger } from '../config/logger.js';
import { ConfigError, errorMessage } from '../errors.js';

export const USER_CONFIG_SCHEMA_ID = 'https://example.com/status-bar/schemas/config.json';

export type ValidationResult<T> =
    | { valid: true; value: T }
    | { valid: false; errors: string };

export class SchemaValidator {
    private ajv: InstanceType<typeof Ajv2020>;
    private schemasLoaded = false;

    constructor(private contractsPath: string) {
        this.ajv = new Ajv2020({
            strict: false,
            allErrors: true,
        });
    }

    /**
     * Load every JSON schema under the contracts directory. A missing
     * directory or an unreadable schema is a configuration error.
     */
    loadSchemas(): void {
        if (!existsSync(this.contractsPath)) {
            throw new ConfigError(`contracts directory not found: ${this.contractsPath}`);
        }

        const files = this.getAllJsonFiles(this.contractsPath);
        logger.debug({ count: files.length, path: this.contractsPath }, 'Loading schemas');

        for (const file of files) {
            let schema: SchemaObject;
            try {
                schema = JSON.parse(readFileSync(file, 'utf-8'));
            } catch (err) {
                throw new ConfigError(`failed to load schema ${file}: ${errorMessage(err)}`);
            }

            if (typeof schema.$id === 'string') {
                this.ajv.addSchema(schema);
                logger.debug({ $id: schema.$id, file }, 'Schema loaded');
            } else {
                logger.warn({ file }, 'Schema missing $id, skipped');
            }
        }

        this.schemasLoaded = true;
    }

    private getAllJsonFiles(dir: string): string[] {
        const files: string[] = [];

        for (const entry of readdirSync(dir, { withFileTypes: true })) {
            const fullPath = join(dir, entry.name);

            if (entry.isDirectory()) {
                files.push(...this.getAllJsonFiles(fullPath));
            } else if (entry.isFile() && entry.name.endsWith('.json')) {
                files.push(fullPath);
            }
        }

        return files;
    }

    /**
     * Validate data against a schema by its $id. On success the data comes
     * back typed as the schema describes it.
     */
    validate<T>(schemaId: string, data: unknown): ValidationResult<T> {
        if (!this.schemasLoaded) {
            return { valid: false, errors: 'Schemas not loaded' };
        }

        if (!this.ajv.getSchema(schemaId)) {
            return { valid: false, errors: `Schema not found: ${schemaId}` };
        }

        if (this.ajv.validate<T>(schemaId, data)) {
            return { valid: true, value: data };
        }
        return { valid: false, errors: this.ajv.errorsText(this.ajv.errors) };
    }
}

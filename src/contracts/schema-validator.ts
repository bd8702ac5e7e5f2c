import Ajv2020Lib from 'ajv/dist/2020.js';
import addFormatsLib from 'ajv-formats';

const Ajv2020 = Ajv2020Lib.default;
const addFormats = addFormatsLib.default;
import { readFileSync, existsSync, readdirSync } from 'fs';
import { join } from 'path';
import { logger } from '../config/logger.js';

const SCHEMA_BASE = 'https://heartwatch.example.com/schemas/requests';

export const SchemaIds = {
    credentials: `${SCHEMA_BASE}/credentials.json`,
    contactCreate: `${SCHEMA_BASE}/contact-create.json`,
    simulation: `${SCHEMA_BASE}/simulation.json`,
    alertCreate: `${SCHEMA_BASE}/alert-create.json`,
} as const;

export type SchemaId = (typeof SchemaIds)[keyof typeof SchemaIds];

export interface ValidationResult {
    valid: boolean;
    errors?: string;
}

function hasId(schema: unknown): schema is { $id: string } {
    return typeof schema === 'object' && schema !== null && '$id' in schema && typeof schema.$id === 'string';
}

export class SchemaValidator {
    private ajv: InstanceType<typeof Ajv2020>;
    private schemasLoaded = false;

    constructor(private contractsPath: string) {
        this.ajv = new Ajv2020({
            validateSchema: false,
            strict: false,
            allErrors: true,
        });
        addFormats(this.ajv);
    }

    /**
     * Load all JSON schemas from the contracts directory
     */
    loadSchemas(): void {
        if (!existsSync(this.contractsPath)) {
            logger.error({ path: this.contractsPath }, 'Contracts directory not found');
            return;
        }

        const files = this.getAllJsonFiles(this.contractsPath);
        logger.info({ count: files.length, path: this.contractsPath }, 'Loading schemas');

        files.forEach((file) => {
            try {
                const schema: unknown = JSON.parse(readFileSync(file, 'utf-8'));

                if (hasId(schema)) {
                    this.ajv.addSchema(schema);
                    logger.debug({ $id: schema.$id, file }, 'Schema loaded');
                } else {
                    logger.warn({ file }, 'Schema missing $id, skipped');
                }
            } catch (err) {
                logger.error({ file, error: err }, 'Failed to load schema');
            }
        });

        this.schemasLoaded = true;
        logger.info('All schemas loaded successfully');
    }

    /**
     * Recursively get all JSON files from a directory
     */
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
     * Validate data against a schema by its $id
     */
    validate(schemaId: SchemaId, data: unknown): ValidationResult {
        if (!this.schemasLoaded) {
            logger.warn('Schemas not loaded, validation will fail');
            return {
                valid: false,
                errors: 'Schemas not loaded',
            };
        }

        const validateFn = this.ajv.getSchema(schemaId);

        if (!validateFn) {
            logger.error({ schemaId }, 'Schema not found');
            return {
                valid: false,
                errors: `Schema not found: ${schemaId}`,
            };
        }

        if (!validateFn(data)) {
            return {
                valid: false,
                errors: this.ajv.errorsText(validateFn.errors),
            };
        }

        return { valid: true };
    }
}

import { SchemaIds, SchemaValidator } from '../../../src/contracts/schema-validator.js';

describe('SchemaValidator', () => {
    let validator: SchemaValidator;

    beforeAll(() => {
        validator = new SchemaValidator('./contracts');
        validator.loadSchemas();
    });

    describe('Credentials', () => {
        it('should accept an email and password', () => {
            const result = validator.validate(SchemaIds.credentials, {
                email: 'person@example.com',
                password: 'test-secret',
            });

            expect(result.valid).toBe(true);
            expect(result.errors).toBeUndefined();
        });

        it('should reject a missing password', () => {
            const result = validator.validate(SchemaIds.credentials, { email: 'person@example.com' });

            expect(result.valid).toBe(false);
            expect(result.errors).toContain('password');
        });

        it('should reject an invalid email format', () => {
            const result = validator.validate(SchemaIds.credentials, {
                email: 'not-an-email',
                password: 'test-secret',
            });

            expect(result.valid).toBe(false);
            expect(result.errors).toContain('format');
        });
    });

    describe('Contact', () => {
        it('should accept a name with optional phone and empty email', () => {
            const result = validator.validate(SchemaIds.contactCreate, { name: 'Alice', phone: '555-0100', email: '' });

            expect(result.valid).toBe(true);
        });

        it('should reject a blank name', () => {
            expect(validator.validate(SchemaIds.contactCreate, { name: '   ' }).valid).toBe(false);
        });

        it('should reject unknown properties', () => {
            expect(validator.validate(SchemaIds.contactCreate, { name: 'Alice', nickname: 'Al' }).valid).toBe(false);
        });
    });

    describe('Simulation', () => {
        it('should accept an empty body and known modes', () => {
            expect(validator.validate(SchemaIds.simulation, {}).valid).toBe(true);
            expect(validator.validate(SchemaIds.simulation, { mode: 'attack' }).valid).toBe(true);
        });

        it('should reject an unknown mode', () => {
            expect(validator.validate(SchemaIds.simulation, { mode: 'panic' }).valid).toBe(false);
        });
    });

    describe('Alert', () => {
        it('should reject a non-string location', () => {
            expect(validator.validate(SchemaIds.alertCreate, { location: 42 }).valid).toBe(false);
        });
    });

    it('should report schemas that are not loaded', () => {
        const unloaded = new SchemaValidator('./contracts');

        expect(unloaded.validate(SchemaIds.simulation, {})).toEqual({ valid: false, errors: 'Schemas not loaded' });
    });
});

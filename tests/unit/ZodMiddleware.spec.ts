/**
 * Unit Tests: Zod Middleware and request schemas
 *
 * @see libs/validation/zod-middleware.ts
 * @see libs/validation/schema.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { z } from 'zod';
import { validate, createValidator, SchemaValidationError } from '../../libs/validation/zod-middleware.js';
import { LoginFormSchema, PingRequestSchema } from '../../libs/validation/schema.js';

describe('Zod Middleware', () => {
    const TestSchema = z.object({
        host: z.string(),
        retries: z.number().int().nonnegative()
    });

    it('should validate correct input', () => {
        const input = { host: '10.0.0.1', retries: 0 };

        assert.deepStrictEqual(validate(TestSchema, input, 'test-context'), input);
    });

    it('should reject invalid input with issue paths', () => {
        assert.throws(
            () => validate(TestSchema, { host: 5, retries: -1 }, 'test-context'),
            (err: unknown) => {
                assert.ok(err instanceof SchemaValidationError);
                assert.strictEqual(err.statusCode, 400);
                assert.strictEqual(err.context, 'test-context');
                assert.deepStrictEqual(err.issues.map(issue => issue.path), ['host', 'retries']);
                assert.ok(err.message.startsWith('Validation Violation in test-context'));
                return true;
            }
        );
    });

    it('should create reusable validator factory', () => {
        const validateTest = createValidator(TestSchema);

        assert.strictEqual(validateTest({ host: 'a', retries: 2 }, 'factory-test').retries, 2);
    });
});

describe('PingRequestSchema', () => {
    it('should accept an absent host list', () => {
        assert.deepStrictEqual(validate(PingRequestSchema, {}, 'ping'), {});
    });

    it('should keep host entries of any type for per-host filtering', () => {
        assert.deepStrictEqual(
            validate(PingRequestSchema, { hosts: ['10.0.0.1', 5, null] }, 'ping'),
            { hosts: ['10.0.0.1', 5, null] }
        );
    });

    it('should reject a host list that is not an array', () => {
        assert.throws(() => validate(PingRequestSchema, { hosts: '10.0.0.1' }, 'ping'), SchemaValidationError);
    });

    it('should reject unknown fields', () => {
        assert.throws(() => validate(PingRequestSchema, { hosts: [], user: 'root' }, 'ping'), SchemaValidationError);
    });
});

describe('LoginFormSchema', () => {
    it('should require both fields', () => {
        assert.throws(() => validate(LoginFormSchema, { username: 'admin' }, 'login'), SchemaValidationError);
    });
});

/**
 * Unit Tests: Zod Middleware and instruction schemas
 *
 * @see libs/validation/zod-middleware.ts
 * @see libs/validation/schema.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createValidator, validate, ValidationError } from '../../libs/validation/zod-middleware.js';
import {
    CloseComboRequestSchema,
    CreateComboRequestSchema,
    IdentitySchema,
    VerifyComboRequestSchema
} from '../../libs/validation/schema.js';
import { ALICE, UPPERCUT } from './helpers.js';

describe('Zod Middleware', () => {
    it('should validate a correct create payload', () => {
        const result = validate(CreateComboRequestSchema, { ...UPPERCUT }, 'test-context');
        assert.deepStrictEqual(result, UPPERCUT);
    });

    it('should reject invalid input with detailed error', () => {
        assert.throws(
            () => validate(CreateComboRequestSchema, { ...UPPERCUT, damage: -1 }, 'test-context'),
            (err: unknown) => {
                assert.ok(err instanceof ValidationError);
                assert.strictEqual(err.context, 'test-context');
                assert.strictEqual(err.statusCode, 400);
                assert.deepStrictEqual(err.issues.map(i => i.path), ['damage']);
                assert.ok(err.message.startsWith('Validation Violation in test-context'));
                return true;
            }
        );
    });

    it('should reject missing required fields', () => {
        assert.throws(
            () => validate(CreateComboRequestSchema, { name: 'x' }, 'partial-test'),
            /Validation Violation/
        );
    });

    it('should reject unknown fields on instruction payloads', () => {
        assert.throws(
            () => validate(VerifyComboRequestSchema, { moves: [1], extra: true }, 'strict-test'),
            ValidationError
        );
    });

    it('should leave domain ranges to the combo guards', () => {
        // damage 0 and 21 moves are wire-valid; the guards report them with their own kinds
        const create = validate(CreateComboRequestSchema, { ...UPPERCUT, damage: 0 }, 'ctx');
        assert.strictEqual(create.damage, 0);

        const verify = validate(VerifyComboRequestSchema, { moves: new Array(21).fill(3) }, 'ctx');
        assert.strictEqual(verify.moves.length, 21);
    });

    it('should reject moves outside a byte', () => {
        assert.throws(() => validate(VerifyComboRequestSchema, { moves: [256] }, 'ctx'), ValidationError);
    });

    it('should accept only base58 32-byte identities', () => {
        assert.strictEqual(validate(IdentitySchema, ALICE, 'ctx'), ALICE);
        assert.throws(() => validate(IdentitySchema, 'not-a-key', 'ctx'), ValidationError);
        assert.throws(
            () => validate(CloseComboRequestSchema, { destination: '0OIl' }, 'ctx'),
            ValidationError
        );
    });

    it('should create reusable validator factory', () => {
        const validateClose = createValidator(CloseComboRequestSchema);
        const valid = validateClose({ destination: ALICE }, 'factory-test');

        assert.strictEqual(valid.destination, ALICE);
    });
});

/**
 * Unit Tests: Combo guards
 *
 * @see libs/combo/guards.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { onlyOwner, validateComboData, verifyMoveSequence } from '../../libs/combo/guards.js';
import { ComboRecord } from '../../libs/combo/combo.js';
import { ALICE, BOB, UPPERCUT } from './helpers.js';

function reasonOf(result: ReturnType<typeof validateComboData>): string | undefined {
    return result.allowed ? undefined : result.reason;
}

describe('validateComboData', () => {
    it('allows the example combo', () => {
        assert.deepStrictEqual(validateComboData(UPPERCUT), { allowed: true });
    });

    it('measures the name in UTF-8 bytes', () => {
        assert.strictEqual(reasonOf(validateComboData({ ...UPPERCUT, name: 'a'.repeat(64) })), undefined);
        assert.strictEqual(reasonOf(validateComboData({ ...UPPERCUT, name: 'a'.repeat(65) })), 'NameTooLong');
        // 22 three-byte characters = 66 bytes
        assert.strictEqual(reasonOf(validateComboData({ ...UPPERCUT, name: '拳'.repeat(22) })), 'NameTooLong');
    });

    it('enforces damage within [1, 1000]', () => {
        assert.strictEqual(reasonOf(validateComboData({ ...UPPERCUT, damage: 0 })), 'InvalidDamage');
        assert.strictEqual(reasonOf(validateComboData({ ...UPPERCUT, damage: 1001 })), 'InvalidDamage');
        assert.strictEqual(reasonOf(validateComboData({ ...UPPERCUT, damage: 1.5 })), 'InvalidDamage');
        assert.strictEqual(reasonOf(validateComboData({ ...UPPERCUT, damage: 1 })), undefined);
        assert.strictEqual(reasonOf(validateComboData({ ...UPPERCUT, damage: 1000 })), undefined);
    });

    it('enforces meter gain within [1, 100]', () => {
        assert.strictEqual(reasonOf(validateComboData({ ...UPPERCUT, meterGain: 0 })), 'InvalidMeterGain');
        assert.strictEqual(reasonOf(validateComboData({ ...UPPERCUT, meterGain: 101 })), 'InvalidMeterGain');
        assert.strictEqual(reasonOf(validateComboData({ ...UPPERCUT, meterGain: 1 })), undefined);
        assert.strictEqual(reasonOf(validateComboData({ ...UPPERCUT, meterGain: 100 })), undefined);
    });

    it('enforces move count within [1, 20]', () => {
        assert.strictEqual(reasonOf(validateComboData({ ...UPPERCUT, moveCount: 0 })), 'InvalidMoveCount');
        assert.strictEqual(reasonOf(validateComboData({ ...UPPERCUT, moveCount: 21 })), 'InvalidMoveCount');
        assert.strictEqual(reasonOf(validateComboData({ ...UPPERCUT, moveCount: 1 })), undefined);
        assert.strictEqual(reasonOf(validateComboData({ ...UPPERCUT, moveCount: 20 })), undefined);
    });

    it('reports the first failing check in name, damage, meter, moves order', () => {
        const allBad = { name: 'a'.repeat(65), damage: 0, meterGain: 0, moveCount: 0, characterId: 0 };
        assert.strictEqual(reasonOf(validateComboData(allBad)), 'NameTooLong');
        assert.strictEqual(reasonOf(validateComboData({ ...allBad, name: 'ok' })), 'InvalidDamage');
        assert.strictEqual(reasonOf(validateComboData({ ...allBad, name: 'ok', damage: 5 })), 'InvalidMeterGain');
    });

    it('places no bound on characterId', () => {
        assert.strictEqual(reasonOf(validateComboData({ ...UPPERCUT, characterId: 255 })), undefined);
    });
});

describe('verifyMoveSequence', () => {
    it('allows up to 20 moves, including none', () => {
        assert.deepStrictEqual(verifyMoveSequence([]), { allowed: true });
        assert.deepStrictEqual(verifyMoveSequence(new Array(20).fill(1)), { allowed: true });
    });

    it('denies 21 moves with TooManyMoves', () => {
        const result = verifyMoveSequence(new Array(21).fill(1));
        assert.deepStrictEqual(result, { allowed: false, reason: 'TooManyMoves', details: '21 moves supplied' });
    });
});

describe('onlyOwner', () => {
    const record: ComboRecord = {
        ...UPPERCUT,
        address: BOB,
        owner: ALICE,
        createdAt: 0,
        fingerprint: '00'.repeat(32),
        verificationCount: 0,
        bump: 255
    };

    it('allows the owner', () => {
        assert.deepStrictEqual(onlyOwner(record, ALICE), { allowed: true });
    });

    it('denies anyone else with Unauthorized', () => {
        const result = onlyOwner(record, BOB);
        assert.strictEqual(result.allowed, false);
        assert.strictEqual(result.allowed ? undefined : result.reason, 'Unauthorized');
    });
});

/**
 * Unit Tests: In-memory allocation layer
 *
 * @see libs/ledger/memoryLedger.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { InMemoryLedger } from '../../libs/ledger/memoryLedger.js';
import { AllocationError } from '../../libs/ledger/errors.js';
import { ALICE, BOB, PROGRAM_ID } from './helpers.js';

const SLOT = 'slot-1';

function allocationError(code: AllocationError['code'], statusCode: number) {
    return (err: unknown) => err instanceof AllocationError && err.code === code && err.statusCode === statusCode;
}

describe('InMemoryLedger', () => {
    it('creates zeroed allocations funded with the deposit', () => {
        const ledger = new InMemoryLedger({ deposit: 500 });
        const allocation = ledger.createIfAbsent({ address: SLOT, programId: PROGRAM_ID, space: 16 });

        assert.strictEqual(allocation.value, 500);
        assert.strictEqual(allocation.programId, PROGRAM_ID);
        assert.ok(allocation.data.equals(Buffer.alloc(16)));
        assert.deepStrictEqual(ledger.touchedAddresses(), [SLOT]);
    });

    it('refuses to allocate an occupied slot', () => {
        const ledger = new InMemoryLedger({ deposit: 500 });
        ledger.createIfAbsent({ address: SLOT, programId: PROGRAM_ID, space: 16 });

        assert.throws(
            () => ledger.createIfAbsent({ address: SLOT, programId: PROGRAM_ID, space: 16 }),
            allocationError('ACCOUNT_ALREADY_IN_USE', 409)
        );
    });

    it('zero-pads short writes and rejects oversized ones', () => {
        const ledger = new InMemoryLedger({ deposit: 500 });
        ledger.createIfAbsent({ address: SLOT, programId: PROGRAM_ID, space: 4 });

        ledger.write(SLOT, Buffer.from([0xaa, 0xbb]));
        assert.strictEqual(ledger.get(SLOT)?.data.toString('hex'), 'aabb0000');

        assert.throws(() => ledger.write(SLOT, Buffer.alloc(5)), allocationError('ACCOUNT_DATA_TOO_LARGE', 500));
        assert.strictEqual(ledger.get(SLOT)?.data.toString('hex'), 'aabb0000');
    });

    it('does not hand out its internal buffers', () => {
        const ledger = new InMemoryLedger({ deposit: 500 });
        ledger.createIfAbsent({ address: SLOT, programId: PROGRAM_ID, space: 4 });

        const view = ledger.get(SLOT);
        view?.data.fill(0xff);

        assert.strictEqual(ledger.get(SLOT)?.data.toString('hex'), '00000000');
    });

    it('moves the whole value to the destination on reclaim', () => {
        const ledger = new InMemoryLedger({ deposit: 500, balances: [[ALICE, 100]] });
        ledger.createIfAbsent({ address: SLOT, programId: PROGRAM_ID, space: 4 });

        assert.strictEqual(ledger.reclaim(SLOT, ALICE), 500);
        assert.strictEqual(ledger.balanceOf(ALICE), 600);
        assert.strictEqual(ledger.get(SLOT), undefined);
        assert.deepStrictEqual(ledger.touchedIdentities(), [ALICE]);
    });

    it('reports missing allocations', () => {
        const ledger = new InMemoryLedger({ deposit: 500 });

        assert.throws(() => ledger.write(SLOT, Buffer.alloc(1)), allocationError('ACCOUNT_NOT_FOUND', 404));
        assert.throws(() => ledger.reclaim(SLOT, BOB), allocationError('ACCOUNT_NOT_FOUND', 404));
        assert.strictEqual(ledger.balanceOf(BOB), 0);
    });

    it('starts from seeded allocations without marking them touched', () => {
        const ledger = new InMemoryLedger({
            deposit: 500,
            allocations: [{ address: SLOT, programId: PROGRAM_ID, value: 900, data: Buffer.alloc(4) }]
        });

        assert.strictEqual(ledger.get(SLOT)?.value, 900);
        assert.deepStrictEqual(ledger.touchedAddresses(), []);
    });
});

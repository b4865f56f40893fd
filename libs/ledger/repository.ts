/**
 * PostgreSQL persistence for allocations and balances.
 * All queries use parameterized statements and explicit column lists.
 */

import { Queryable } from '../db/index.js';
import { logger } from '../logging/logger.js';
import { Allocation } from './allocation.js';
import { AllocationError } from './errors.js';
import { InMemoryLedger } from './memoryLedger.js';

interface AllocationRow {
    address: string;
    program_id: string;
    value: string;
    data: Buffer;
}

interface BalanceRow {
    identity: string;
    balance: string;
}

const UNIQUE_VIOLATION = '23505';

/**
 * Loads and row-locks the given allocations for the rest of the transaction.
 * Missing addresses are simply absent from the result.
 */
export async function lockAllocations(client: Queryable, addresses: readonly string[]): Promise<Allocation[]> {
    if (addresses.length === 0) return [];

    const result = await client.query<AllocationRow>(
        `SELECT address, program_id, value, data
         FROM combo_allocations
         WHERE address = ANY($1)
         ORDER BY address
         FOR UPDATE`,
        [addresses]
    );

    return result.rows.map(mapRowToAllocation);
}

/**
 * Row-locks the balances of the given identities. Missing rows are created at
 * zero first so that FOR UPDATE always has a row to lock.
 */
export async function lockBalances(client: Queryable, identities: readonly string[]): Promise<Array<[string, number]>> {
    if (identities.length === 0) return [];

    await client.query(
        `INSERT INTO ledger_balances (identity, balance)
         SELECT identity, 0 FROM unnest($1::text[]) AS identity
         ORDER BY identity
         ON CONFLICT (identity) DO NOTHING`,
        [[...identities].sort()]
    );

    const result = await client.query<BalanceRow>(
        `SELECT identity, balance
         FROM ledger_balances
         WHERE identity = ANY($1)
         ORDER BY identity
         FOR UPDATE`,
        [identities]
    );

    return result.rows.map((row): [string, number] => [row.identity, Number(row.balance)]);
}

/**
 * Unlocked point read.
 */
export async function findAllocation(client: Queryable, address: string): Promise<Allocation | null> {
    const result = await client.query<AllocationRow>(
        `SELECT address, program_id, value, data
         FROM combo_allocations
         WHERE address = $1
         LIMIT 1`,
        [address]
    );

    const row = result.rows[0];
    return row ? mapRowToAllocation(row) : null;
}

export async function findBalance(client: Queryable, identity: string): Promise<number> {
    const result = await client.query<BalanceRow>(
        `SELECT identity, balance FROM ledger_balances WHERE identity = $1 LIMIT 1`,
        [identity]
    );

    const row = result.rows[0];
    return row ? Number(row.balance) : 0;
}

/**
 * Writes back every allocation and balance the working ledger touched.
 * `preexisting` holds the addresses that were present when the rows were locked:
 * those are updated or deleted, anything else is inserted.
 */
export async function persistLedgerChanges(
    client: Queryable,
    ledger: InMemoryLedger,
    preexisting: ReadonlySet<string>
): Promise<void> {
    for (const address of ledger.touchedAddresses()) {
        const allocation = ledger.get(address);

        if (!allocation) {
            if (preexisting.has(address)) {
                await client.query(`DELETE FROM combo_allocations WHERE address = $1`, [address]);
            }
            continue;
        }

        if (preexisting.has(address)) {
            await client.query(
                `UPDATE combo_allocations
                 SET value = $2, data = $3, updated_at = NOW()
                 WHERE address = $1`,
                [address, allocation.value, allocation.data]
            );
        } else {
            await insertAllocation(client, allocation);
        }
    }

    for (const identity of ledger.touchedIdentities()) {
        await client.query(
            `INSERT INTO ledger_balances (identity, balance)
             VALUES ($1, $2)
             ON CONFLICT (identity) DO UPDATE SET balance = EXCLUDED.balance, updated_at = NOW()`,
            [identity, ledger.balanceOf(identity)]
        );
    }
}

async function insertAllocation(client: Queryable, allocation: Allocation): Promise<void> {
    try {
        await client.query(
            `INSERT INTO combo_allocations (address, program_id, value, data)
             VALUES ($1, $2, $3, $4)`,
            [allocation.address, allocation.programId, allocation.value, allocation.data]
        );
    } catch (err: unknown) {
        if (typeof err === 'object' && err !== null && 'code' in err && err.code === UNIQUE_VIOLATION) {
            logger.info({ address: allocation.address }, 'Concurrent allocation detected at insert');
            throw new AllocationError(
                'ACCOUNT_ALREADY_IN_USE',
                allocation.address,
                `Allocation ${allocation.address} already in use`
            );
        }
        throw err;
    }
}

function mapRowToAllocation(row: AllocationRow): Allocation {
    return {
        address: row.address,
        programId: row.program_id,
        value: Number(row.value),
        data: row.data
    };
}

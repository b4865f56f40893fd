import { deriveComboAddress } from '../combo/address.js';
import { CloseComboResult, ComboRecord, CreateComboInput, Identity } from '../combo/combo.js';
import { BufferedEventSink, EventSink } from '../combo/events.js';
import { ComboProgram } from '../combo/program.js';
import { Db } from '../db/index.js';
import { Clock, systemClock } from '../ledger/clock.js';
import { InMemoryLedger } from '../ledger/memoryLedger.js';
import {
    findAllocation,
    findBalance,
    lockAllocations,
    lockBalances,
    persistLedgerChanges
} from '../ledger/repository.js';
import { getInstructionLogger } from '../logging/logger.js';
import { ComboHost, InstructionContext, InstructionName } from './host.js';

export interface PostgresComboHostOptions {
    readonly db: Db;
    readonly programId: Identity;
    readonly deposit: number;
    readonly events: EventSink;
    readonly clock?: Clock;
}

interface InstructionKeys {
    readonly allocations: readonly Identity[];
    readonly balances: readonly Identity[];
}

/**
 * PostgreSQL-backed host.
 *
 * Each instruction runs in one transaction: lock the rows it addresses,
 * run the synchronous core over an in-memory working set, write the touched
 * rows back, commit. Notifications are forwarded after COMMIT only.
 */
export class PostgresComboHost implements ComboHost {
    private readonly db: Db;
    private readonly programId: Identity;
    private readonly deposit: number;
    private readonly events: EventSink;
    private readonly clock: Clock;

    constructor(options: PostgresComboHostOptions) {
        this.db = options.db;
        this.programId = options.programId;
        this.deposit = options.deposit;
        this.events = options.events;
        this.clock = options.clock ?? systemClock;
    }

    async createCombo(context: InstructionContext, input: CreateComboInput): Promise<ComboRecord> {
        const { address } = deriveComboAddress(context.signer, this.programId);
        return this.execute(
            'create_combo',
            context,
            { allocations: [address], balances: [] },
            (program) => program.createCombo(context.signer, input)
        );
    }

    async verifyCombo(context: InstructionContext, address: Identity, moves: readonly number[]): Promise<ComboRecord> {
        return this.execute(
            'verify_combo',
            context,
            { allocations: [address], balances: [] },
            (program) => program.verifyCombo(context.signer, address, moves)
        );
    }

    async closeCombo(context: InstructionContext, address: Identity, destination: Identity): Promise<CloseComboResult> {
        return this.execute(
            'close_combo',
            context,
            { allocations: [address], balances: [destination] },
            (program) => program.closeCombo(context.signer, address, destination)
        );
    }

    async getCombo(address: Identity): Promise<ComboRecord | undefined> {
        const allocation = await findAllocation(this.db, address);
        if (!allocation) return undefined;
        return this.programOver(new InMemoryLedger({ deposit: this.deposit, allocations: [allocation] }), new BufferedEventSink())
            .getCombo(address);
    }

    async getComboByOwner(owner: Identity): Promise<ComboRecord | undefined> {
        return this.getCombo(deriveComboAddress(owner, this.programId).address);
    }

    async balanceOf(identity: Identity): Promise<number> {
        return findBalance(this.db, identity);
    }

    private async execute<T>(
        instruction: InstructionName,
        context: InstructionContext,
        keys: InstructionKeys,
        body: (program: ComboProgram) => T
    ): Promise<T> {
        const log = getInstructionLogger({ ...context, instruction });
        const pending = new BufferedEventSink();

        let result: T;
        try {
            result = await this.db.transaction(async (tx) => {
                const allocations = await lockAllocations(tx, keys.allocations);
                const balances = await lockBalances(tx, keys.balances);
                const ledger = new InMemoryLedger({ deposit: this.deposit, allocations, balances });

                const value = body(this.programOver(ledger, pending));

                await persistLedgerChanges(tx, ledger, new Set(allocations.map((a) => a.address)));
                return value;
            });
        } catch (error) {
            log.warn({ error, discardedEvents: pending.drain().length }, 'Instruction rolled back');
            throw error;
        }

        for (const event of pending.drain()) {
            this.events.emit(event);
        }
        log.info('Instruction committed');
        return result;
    }

    private programOver(ledger: InMemoryLedger, events: EventSink): ComboProgram {
        return new ComboProgram({ programId: this.programId, ledger, clock: this.clock, events });
    }
}

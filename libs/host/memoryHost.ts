import { CloseComboResult, ComboRecord, CreateComboInput, Identity } from '../combo/combo.js';
import { BufferedEventSink, EventSink } from '../combo/events.js';
import { ComboProgram } from '../combo/program.js';
import { Clock, systemClock } from '../ledger/clock.js';
import { InMemoryLedger } from '../ledger/memoryLedger.js';
import { getInstructionLogger } from '../logging/logger.js';
import { ComboHost, InstructionContext, InstructionName } from './host.js';

export interface InMemoryComboHostOptions {
    readonly programId: Identity;
    readonly deposit: number;
    readonly events: EventSink;
    readonly clock?: Clock;
    readonly ledger?: InMemoryLedger;
}

/**
 * Single-process host. Each instruction runs to completion inside one
 * synchronous call, which is all the mutual exclusion it needs.
 */
export class InMemoryComboHost implements ComboHost {
    readonly ledger: InMemoryLedger;
    private readonly program: ComboProgram;
    private readonly pending = new BufferedEventSink();
    private readonly events: EventSink;

    constructor(options: InMemoryComboHostOptions) {
        this.ledger = options.ledger ?? new InMemoryLedger({ deposit: options.deposit });
        this.events = options.events;
        this.program = new ComboProgram({
            programId: options.programId,
            ledger: this.ledger,
            clock: options.clock ?? systemClock,
            events: this.pending
        });
    }

    async createCombo(context: InstructionContext, input: CreateComboInput): Promise<ComboRecord> {
        return this.execute('create_combo', context, () => this.program.createCombo(context.signer, input));
    }

    async verifyCombo(context: InstructionContext, address: Identity, moves: readonly number[]): Promise<ComboRecord> {
        return this.execute('verify_combo', context, () => this.program.verifyCombo(context.signer, address, moves));
    }

    async closeCombo(context: InstructionContext, address: Identity, destination: Identity): Promise<CloseComboResult> {
        return this.execute('close_combo', context, () => this.program.closeCombo(context.signer, address, destination));
    }

    async getCombo(address: Identity): Promise<ComboRecord | undefined> {
        return this.program.getCombo(address);
    }

    async getComboByOwner(owner: Identity): Promise<ComboRecord | undefined> {
        return this.program.getComboByOwner(owner);
    }

    async balanceOf(identity: Identity): Promise<number> {
        return this.ledger.balanceOf(identity);
    }

    private execute<T>(instruction: InstructionName, context: InstructionContext, body: () => T): T {
        const log = getInstructionLogger({ ...context, instruction });
        let result: T;
        try {
            result = body();
        } catch (error) {
            const discarded = this.pending.drain().length;
            log.warn({ error, discardedEvents: discarded }, 'Instruction failed');
            throw error;
        }

        for (const event of this.pending.drain()) {
            this.events.emit(event);
        }
        log.info('Instruction committed');
        return result;
    }
}

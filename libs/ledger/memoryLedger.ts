import { Allocation, AllocationLayer, CreateAllocationRequest } from './allocation.js';
import { AllocationError } from './errors.js';

export interface InMemoryLedgerOptions {
    /** Value deposited into every new allocation */
    readonly deposit: number;
    readonly allocations?: Iterable<Allocation>;
    readonly balances?: Iterable<readonly [string, number]>;
}

/**
 * Map-backed allocation layer.
 *
 * Also serves as the per-instruction working set of the PostgreSQL host:
 * seeded with the locked rows, then read back through touchedAddresses()
 * and touchedIdentities() to find what must be written.
 */
export class InMemoryLedger implements AllocationLayer {
    private readonly deposit: number;
    private readonly allocations = new Map<string, Allocation>();
    private readonly balances = new Map<string, number>();
    private readonly touchedAllocationSet = new Set<string>();
    private readonly touchedBalanceSet = new Set<string>();

    constructor(options: InMemoryLedgerOptions) {
        this.deposit = options.deposit;
        for (const allocation of options.allocations ?? []) {
            this.allocations.set(allocation.address, copyAllocation(allocation));
        }
        for (const [identity, balance] of options.balances ?? []) {
            this.balances.set(identity, balance);
        }
    }

    get(address: string): Allocation | undefined {
        const allocation = this.allocations.get(address);
        return allocation ? copyAllocation(allocation) : undefined;
    }

    createIfAbsent(request: CreateAllocationRequest): Allocation {
        const { address, programId, space } = request;

        if (this.allocations.has(address)) {
            throw new AllocationError(
                'ACCOUNT_ALREADY_IN_USE',
                address,
                `Allocation ${address} already in use`
            );
        }

        const allocation: Allocation = {
            address,
            programId,
            value: this.deposit,
            data: Buffer.alloc(space)
        };
        this.allocations.set(address, allocation);
        this.touchedAllocationSet.add(address);
        return copyAllocation(allocation);
    }

    write(address: string, data: Buffer): void {
        const current = this.require(address);
        if (data.length > current.data.length) {
            throw new AllocationError(
                'ACCOUNT_DATA_TOO_LARGE',
                address,
                `Write of ${data.length} bytes exceeds allocation size ${current.data.length}`
            );
        }

        const next = Buffer.alloc(current.data.length);
        data.copy(next);
        this.allocations.set(address, { ...current, data: next });
        this.touchedAllocationSet.add(address);
    }

    reclaim(address: string, destination: string): number {
        const current = this.require(address);

        this.balances.set(destination, this.balanceOf(destination) + current.value);
        this.allocations.delete(address);

        this.touchedAllocationSet.add(address);
        this.touchedBalanceSet.add(destination);
        return current.value;
    }

    balanceOf(identity: string): number {
        return this.balances.get(identity) ?? 0;
    }

    /** Addresses created, written or reclaimed since construction. */
    touchedAddresses(): string[] {
        return [...this.touchedAllocationSet];
    }

    /** Identities whose balance changed since construction. */
    touchedIdentities(): string[] {
        return [...this.touchedBalanceSet];
    }

    private require(address: string): Allocation {
        const allocation = this.allocations.get(address);
        if (!allocation) {
            throw new AllocationError('ACCOUNT_NOT_FOUND', address, `Allocation ${address} not found`);
        }
        return allocation;
    }
}

function copyAllocation(allocation: Allocation): Allocation {
    return { ...allocation, data: Buffer.from(allocation.data) };
}

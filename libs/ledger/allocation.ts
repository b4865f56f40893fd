/**
 * Storage Allocation Layer
 *
 * Fixed-size byte allocations owned by a program, each backed by a deposit
 * value that is returned to a destination when the allocation is reclaimed.
 * The combo core calls into this interface; it never implements it.
 */

export interface Allocation {
    readonly address: string;
    /** Program that owns and may write the allocation */
    readonly programId: string;
    /** Deposit held by the allocation */
    readonly value: number;
    readonly data: Buffer;
}

export interface CreateAllocationRequest {
    readonly address: string;
    readonly programId: string;
    readonly space: number;
}

export interface AllocationLayer {
    get(address: string): Allocation | undefined;

    /**
     * Allocates `space` zeroed bytes at `address`.
     * Throws AllocationError ACCOUNT_ALREADY_IN_USE if the slot is taken.
     */
    createIfAbsent(request: CreateAllocationRequest): Allocation;

    /** Overwrites the allocation's bytes in place (zero-padded to its size). */
    write(address: string, data: Buffer): void;

    /**
     * Moves the allocation's whole value to `destination`, zeroes it and vacates the slot.
     * Returns the value moved.
     */
    reclaim(address: string, destination: string): number;

    balanceOf(identity: string): number;
}

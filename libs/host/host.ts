/**
 * Host runtime contract.
 *
 * A host authenticates the signer, gives each instruction exclusive access to
 * the allocations it touches, and forwards the instruction's notifications
 * to the event sink only once the instruction has committed.
 */

import { CloseComboResult, ComboRecord, CreateComboInput, Identity } from '../combo/combo.js';

export interface InstructionContext {
    /** Request ID for correlation */
    readonly requestId: string;
    /** Identity the host has already authenticated */
    readonly signer: Identity;
}

export interface ComboHost {
    createCombo(context: InstructionContext, input: CreateComboInput): Promise<ComboRecord>;
    verifyCombo(context: InstructionContext, address: Identity, moves: readonly number[]): Promise<ComboRecord>;
    closeCombo(context: InstructionContext, address: Identity, destination: Identity): Promise<CloseComboResult>;
    getCombo(address: Identity): Promise<ComboRecord | undefined>;
    getComboByOwner(owner: Identity): Promise<ComboRecord | undefined>;
    balanceOf(identity: Identity): Promise<number>;
}

export type InstructionName = 'create_combo' | 'verify_combo' | 'close_combo';

import { PublicKey } from '@solana/web3.js';
import { CreateComboInput } from '../../libs/combo/combo.js';

/**
 * Deterministic identities for tests: 32 bytes of `fill`.
 */
export function identity(fill: number): string {
    return new PublicKey(Buffer.alloc(32, fill)).toBase58();
}

export const PROGRAM_ID = identity(9);
export const ALICE = identity(1);
export const BOB = identity(2);
export const CAROL = identity(3);

export const DEPOSIT = 2_672_640;

export const UPPERCUT: CreateComboInput = {
    name: 'uppercut_combo',
    damage: 250,
    meterGain: 30,
    moveCount: 4,
    characterId: 7
};

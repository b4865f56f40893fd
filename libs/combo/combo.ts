/**
 * Combo Record Model
 *
 * One record per owning identity, stored at the address derived from
 * ("combo", owner) under the registry program id.
 */

/** Base58-encoded 32-byte public key. */
export type Identity = string;

export const COMBO_SEED = 'combo';

/** Fixed allocation size for every combo record. */
export const COMBO_ALLOCATION_SIZE = 256;

export const COMBO_LIMITS = {
    maxNameBytes: 64,
    minDamage: 1,
    maxDamage: 1000,
    minMeterGain: 1,
    maxMeterGain: 100,
    minMoveCount: 1,
    maxMoveCount: 20,
    maxVerificationMoves: 20
} as const;

/**
 * Semantic fields supplied at creation. The fingerprint covers exactly these.
 */
export interface ComboFields {
    readonly name: string;
    readonly damage: number;
    readonly meterGain: number;
    readonly moveCount: number;
    readonly characterId: number;
}

export interface ComboRecord extends ComboFields {
    /** Derived storage address */
    readonly address: Identity;
    /** Creator; immutable */
    readonly owner: Identity;
    /** Unix seconds */
    readonly createdAt: number;
    /** SHA-256 over the creation fields, hex */
    readonly fingerprint: string;
    readonly verificationCount: number;
    /** Unix seconds; absent until the first verification */
    readonly lastVerifiedAt?: number;
    /** Nonce the address derivation settled on */
    readonly bump: number;
}

export type CreateComboInput = ComboFields;

export interface CloseComboResult {
    readonly address: Identity;
    readonly destination: Identity;
    readonly reclaimed: number;
}

import { PublicKey } from '@solana/web3.js';
import { COMBO_SEED, Identity } from './combo.js';

export interface DerivedAddress {
    readonly address: Identity;
    readonly bump: number;
}

/**
 * Derives the single record slot for `owner` from the seeds ("combo", owner)
 * under `programId`. The bump is the first nonce, counting down from 255,
 * that yields an off-curve address.
 */
export function deriveComboAddress(owner: Identity, programId: Identity): DerivedAddress {
    const [address, bump] = PublicKey.findProgramAddressSync(
        [Buffer.from(COMBO_SEED), new PublicKey(owner).toBuffer()],
        new PublicKey(programId)
    );
    return { address: address.toBase58(), bump };
}

export function isValidIdentity(value: string): boolean {
    try {
        return new PublicKey(value).toBase58() === value;
    } catch {
        return false;
    }
}

import crypto from 'crypto';
import { PublicKey } from '@solana/web3.js';
import { COMBO_ALLOCATION_SIZE, COMBO_LIMITS, ComboRecord, Identity } from './combo.js';
import { ComboError } from './errors.js';

/**
 * Combo account layout inside its 256-byte allocation (little-endian, zero-padded):
 *
 *   discriminator     [8]
 *   owner             [32]
 *   characterId       u8
 *   name              u32 length + UTF-8 bytes
 *   damage            u32
 *   meterGain         u32
 *   moveCount         u8
 *   createdAt         i64
 *   fingerprint       [32]
 *   verificationCount u32
 *   lastVerifiedAt    u8 tag + i64
 *   bump              u8
 */
export const COMBO_ACCOUNT_DISCRIMINATOR = crypto.createHash('sha256')
    .update('account:ComboAccount')
    .digest()
    .subarray(0, 8);

export type ComboAccountState = Omit<ComboRecord, 'address'>;

export function encodeComboAccount(state: ComboAccountState): Buffer {
    const nameBytes = Buffer.from(state.name, 'utf8');
    if (nameBytes.length > COMBO_LIMITS.maxNameBytes) {
        throw new ComboError('NameTooLong', `${nameBytes.length} bytes`);
    }

    const out = Buffer.alloc(COMBO_ALLOCATION_SIZE);
    let offset = 0;

    COMBO_ACCOUNT_DISCRIMINATOR.copy(out, offset);
    offset += 8;
    new PublicKey(state.owner).toBuffer().copy(out, offset);
    offset += 32;
    offset = out.writeUInt8(state.characterId, offset);
    offset = out.writeUInt32LE(nameBytes.length, offset);
    offset += nameBytes.copy(out, offset);
    offset = out.writeUInt32LE(state.damage, offset);
    offset = out.writeUInt32LE(state.meterGain, offset);
    offset = out.writeUInt8(state.moveCount, offset);
    offset = out.writeBigInt64LE(BigInt(state.createdAt), offset);
    offset += Buffer.from(state.fingerprint, 'hex').copy(out, offset);
    offset = out.writeUInt32LE(state.verificationCount, offset);
    if (state.lastVerifiedAt === undefined) {
        offset = out.writeUInt8(0, offset);
        offset += 8;
    } else {
        offset = out.writeUInt8(1, offset);
        offset = out.writeBigInt64LE(BigInt(state.lastVerifiedAt), offset);
    }
    out.writeUInt8(state.bump, offset);

    return out;
}

export function decodeComboAccount(address: Identity, data: Buffer): ComboRecord {
    if (data.length < 8 || !data.subarray(0, 8).equals(COMBO_ACCOUNT_DISCRIMINATOR)) {
        throw new ComboError('AccountDidNotDeserialize', `discriminator mismatch at ${address}`);
    }

    try {
        let offset = 8;
        const owner = new PublicKey(data.subarray(offset, offset + 32)).toBase58();
        offset += 32;
        const characterId = data.readUInt8(offset);
        offset += 1;
        const nameLength = data.readUInt32LE(offset);
        offset += 4;
        if (nameLength > COMBO_LIMITS.maxNameBytes) {
            throw new RangeError(`name length ${nameLength} out of bounds`);
        }
        const name = data.subarray(offset, offset + nameLength).toString('utf8');
        offset += nameLength;
        const damage = data.readUInt32LE(offset);
        offset += 4;
        const meterGain = data.readUInt32LE(offset);
        offset += 4;
        const moveCount = data.readUInt8(offset);
        offset += 1;
        const createdAt = Number(data.readBigInt64LE(offset));
        offset += 8;
        const fingerprint = data.subarray(offset, offset + 32).toString('hex');
        offset += 32;
        const verificationCount = data.readUInt32LE(offset);
        offset += 4;
        const hasLastVerified = data.readUInt8(offset) === 1;
        offset += 1;
        const lastVerifiedAt = Number(data.readBigInt64LE(offset));
        offset += 8;
        const bump = data.readUInt8(offset);

        return {
            address,
            owner,
            characterId,
            name,
            damage,
            meterGain,
            moveCount,
            createdAt,
            fingerprint,
            verificationCount,
            ...(hasLastVerified ? { lastVerifiedAt } : {}),
            bump
        };
    } catch (err: unknown) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ComboError('AccountDidNotDeserialize', reason);
    }
}

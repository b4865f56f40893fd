import crypto from 'crypto';
import { ComboFields } from './combo.js';

/**
 * Canonical byte layout hashed into the fingerprint:
 * name (raw UTF-8) | damage (u32 LE) | meterGain (u32 LE) | moveCount (u8) | characterId (u8)
 */
export function canonicalComboBytes(
    name: string,
    damage: number,
    meterGain: number,
    moveCount: number,
    characterId: number
): Buffer {
    assertWireInteger('damage', damage, 0xffffffff);
    assertWireInteger('meterGain', meterGain, 0xffffffff);
    assertWireInteger('moveCount', moveCount, 0xff);
    assertWireInteger('characterId', characterId, 0xff);

    const nameBytes = Buffer.from(name, 'utf8');
    const tail = Buffer.alloc(10);
    tail.writeUInt32LE(damage, 0);
    tail.writeUInt32LE(meterGain, 4);
    tail.writeUInt8(moveCount, 8);
    tail.writeUInt8(characterId, 9);
    return Buffer.concat([nameBytes, tail]);
}

/**
 * Buffer writers truncate fractions and turn NaN into 0; reject instead.
 */
function assertWireInteger(field: string, value: number, max: number): void {
    if (!Number.isInteger(value) || value < 0 || value > max) {
        throw new RangeError(`${field} must be an integer in [0, ${max}], got ${value}`);
    }
}

/**
 * 32-byte SHA-256 digest over the canonical layout.
 * Throws a RangeError for values that do not fit their wire widths.
 */
export function computeFingerprint(
    name: string,
    damage: number,
    meterGain: number,
    moveCount: number,
    characterId: number
): Buffer {
    return crypto.createHash('sha256')
        .update(canonicalComboBytes(name, damage, meterGain, moveCount, characterId))
        .digest();
}

export function fingerprintOf(fields: ComboFields): string {
    return computeFingerprint(
        fields.name,
        fields.damage,
        fields.meterGain,
        fields.moveCount,
        fields.characterId
    ).toString('hex');
}

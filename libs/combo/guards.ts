/**
 * Combo Guards
 *
 * Pre-flight checks run at the top of each combo operation, before any
 * allocation is touched. A denial aborts the operation with no mutation.
 */

import { logger } from '../logging/logger.js';
import { COMBO_LIMITS, ComboFields, ComboRecord, Identity } from './combo.js';
import { ComboErrorKind } from './errors.js';

export type ComboGuardResult =
    | { allowed: true }
    | { allowed: false; reason: ComboGuardDenyReason; details: string };

export type ComboGuardDenyReason = Extract<
    ComboErrorKind,
    'NameTooLong' | 'InvalidDamage' | 'InvalidMeterGain' | 'InvalidMoveCount' | 'TooManyMoves' | 'Unauthorized'
>;

/**
 * Field validation for Create. Checks run in a fixed order and the first
 * failure wins.
 */
export function validateComboData(fields: ComboFields): ComboGuardResult {
    const { name, damage, meterGain, moveCount } = fields;

    const nameBytes = Buffer.byteLength(name, 'utf8');
    if (nameBytes > COMBO_LIMITS.maxNameBytes) {
        return deny('validateComboData', 'NameTooLong', `name is ${nameBytes} bytes`);
    }

    if (!inRange(damage, COMBO_LIMITS.minDamage, COMBO_LIMITS.maxDamage)) {
        return deny('validateComboData', 'InvalidDamage', `damage ${damage}`);
    }

    if (!inRange(meterGain, COMBO_LIMITS.minMeterGain, COMBO_LIMITS.maxMeterGain)) {
        return deny('validateComboData', 'InvalidMeterGain', `meter gain ${meterGain}`);
    }

    if (!inRange(moveCount, COMBO_LIMITS.minMoveCount, COMBO_LIMITS.maxMoveCount)) {
        return deny('validateComboData', 'InvalidMoveCount', `move count ${moveCount}`);
    }

    logger.debug({ guard: 'validateComboData', name }, 'Combo guard passed');
    return { allowed: true };
}

/**
 * Length bound on a submitted verification sequence. The moves themselves
 * are not compared with the stored combo.
 */
export function verifyMoveSequence(moves: readonly number[]): ComboGuardResult {
    if (moves.length > COMBO_LIMITS.maxVerificationMoves) {
        return deny('verifyMoveSequence', 'TooManyMoves', `${moves.length} moves supplied`);
    }

    logger.debug({ guard: 'verifyMoveSequence', movesCount: moves.length }, 'Combo guard passed');
    return { allowed: true };
}

/**
 * Only the creator of a record may reclaim it.
 */
export function onlyOwner(record: ComboRecord, signer: Identity): ComboGuardResult {
    if (record.owner !== signer) {
        return deny('onlyOwner', 'Unauthorized', `signer ${signer} is not the owner of ${record.address}`);
    }

    logger.debug({ guard: 'onlyOwner', address: record.address }, 'Combo guard passed');
    return { allowed: true };
}

function inRange(value: number, min: number, max: number): boolean {
    return Number.isInteger(value) && value >= min && value <= max;
}

function deny(guard: string, reason: ComboGuardDenyReason, details: string): ComboGuardResult {
    logger.warn({ guard, reason, details }, 'Combo guard denied request');
    return { allowed: false, reason, details };
}

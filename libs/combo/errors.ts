/**
 * Combo error taxonomy. Codes are stable and surface verbatim to callers.
 */
export const COMBO_ERRORS = {
    NameTooLong: { code: 300, message: 'Combo name too long', statusCode: 400 },
    InvalidDamage: { code: 301, message: 'Invalid damage value', statusCode: 400 },
    InvalidMeterGain: { code: 302, message: 'Invalid meter gain value', statusCode: 400 },
    InvalidMoveCount: { code: 303, message: 'Invalid move count', statusCode: 400 },
    TooManyMoves: { code: 304, message: 'Too many moves', statusCode: 400 },
    Unauthorized: { code: 305, message: 'Unauthorized', statusCode: 403 },
    AccountDidNotDeserialize: { code: 306, message: 'Failed to deserialize the account', statusCode: 422 }
} as const;

export type ComboErrorKind = keyof typeof COMBO_ERRORS;

export class ComboError extends Error {
    readonly code: number;
    readonly statusCode: number;

    constructor(public readonly kind: ComboErrorKind, details?: string) {
        const entry = COMBO_ERRORS[kind];
        super(details ? `${entry.message}: ${details}` : entry.message);
        this.name = 'ComboError';
        this.code = entry.code;
        this.statusCode = entry.statusCode;
    }
}

export type AllocationErrorCode =
    | 'ACCOUNT_ALREADY_IN_USE'
    | 'ACCOUNT_NOT_FOUND'
    | 'ACCOUNT_DATA_TOO_LARGE';

const STATUS_BY_CODE: Record<AllocationErrorCode, number> = {
    ACCOUNT_ALREADY_IN_USE: 409,
    ACCOUNT_NOT_FOUND: 404,
    ACCOUNT_DATA_TOO_LARGE: 500
};

/**
 * Raised by the allocation layer, never by the combo core itself.
 */
export class AllocationError extends Error {
    readonly statusCode: number;

    constructor(
        public readonly code: AllocationErrorCode,
        public readonly address: string,
        message: string
    ) {
        super(message);
        this.name = 'AllocationError';
        this.statusCode = STATUS_BY_CODE[code];
    }
}

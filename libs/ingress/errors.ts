import { ComboError } from '../combo/errors.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { AllocationError } from '../ledger/errors.js';
import { ValidationError, ValidationIssue } from '../validation/zod-middleware.js';

export class UnauthenticatedError extends Error {
    readonly code = 'UNAUTHENTICATED';
    readonly statusCode = 401;

    constructor(message: string) {
        super(message);
        this.name = 'UnauthenticatedError';
    }
}

export interface ErrorResponseBody {
    error: string;
    message: string;
    code?: number;
    issues?: ValidationIssue[];
    incidentId?: string;
}

export interface ErrorResponse {
    status: number;
    body: ErrorResponseBody;
}

/**
 * Maps any thrown value onto the HTTP response the ingress returns.
 * Domain and validation errors surface verbatim; everything else is sanitized.
 */
export function toErrorResponse(err: unknown, contextLabel: string): ErrorResponse {
    if (err instanceof ComboError) {
        return {
            status: err.statusCode,
            body: { error: err.kind, code: err.code, message: err.message }
        };
    }

    if (err instanceof AllocationError) {
        return {
            status: err.statusCode,
            body: { error: err.code, message: err.message }
        };
    }

    if (err instanceof ValidationError) {
        return {
            status: err.statusCode,
            body: { error: err.code, message: `Invalid request in ${err.context}`, issues: err.issues }
        };
    }

    if (err instanceof UnauthenticatedError) {
        return {
            status: err.statusCode,
            body: { error: err.code, message: err.message }
        };
    }

    if (err instanceof SyntaxError) {
        return {
            status: 400,
            body: { error: 'MALFORMED_JSON', message: 'Request body is not valid JSON' }
        };
    }

    const sanitized = ErrorSanitizer.sanitize(err, contextLabel);
    return {
        status: 500,
        body: { error: 'INTERNAL', message: sanitized.publicMessage, incidentId: sanitized.incidentId }
    };
}

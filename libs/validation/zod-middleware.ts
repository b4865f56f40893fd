import { ZodSchema } from 'zod';
import { logger } from '../logging/logger.js';

export interface ValidationIssue {
    path: string;
    message: string;
}

export class ValidationError extends Error {
    readonly code = 'VALIDATION_FAILED';
    readonly statusCode = 400;

    constructor(public readonly context: string, public readonly issues: ValidationIssue[]) {
        super(`Validation Violation in ${context}: ${JSON.stringify(issues)}`);
        this.name = 'ValidationError';
    }
}

/**
 * Fail-closed ingress validation: returns the parsed value or throws a ValidationError.
 */
export function validate<T>(schema: ZodSchema<T>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({
            context,
            errors: errorDetails
        }, "Input Validation Failure");

        throw new ValidationError(context, errorDetails);
    }

    return result.data;
}

/**
 * Factory for creating reusable validators.
 */
export const createValidator = <T>(schema: ZodSchema<T>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};

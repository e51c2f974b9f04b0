import type { ZodTypeAny, output } from 'zod';
import { logger } from '../logging/logger.js';

export interface ValidationIssue {
    path: string;
    message: string;
}

export class SchemaValidationError extends Error {
    readonly code = 'INVALID_REQUEST';
    readonly statusCode = 400;

    constructor(readonly context: string, readonly issues: ValidationIssue[]) {
        super(`Validation Violation in ${context}: ${JSON.stringify(issues)}`);
        this.name = 'SchemaValidationError';
    }
}

/**
 * Parses data against schema, throwing a SchemaValidationError on failure.
 * Used for fail-closed ingress validation.
 */
export function validate<S extends ZodTypeAny>(schema: S, data: unknown, context: string): output<S> {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        // Issues only: the payload itself may carry credentials
        logger.warn({
            context,
            errors: errorDetails
        }, "Input Validation Failure");

        throw new SchemaValidationError(context, errorDetails);
    }

    return result.data;
}

/**
 * Factory for reusable validators.
 */
export const createValidator = <S extends ZodTypeAny>(schema: S) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};

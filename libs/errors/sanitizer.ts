import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Wraps unexpected internal errors in a generic public message plus an
 * incidentId that ties the response to the full log entry.
 */
export class PlatformError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: 'SEC' | 'OPS' = 'OPS',
        options?: { cause?: unknown; contextLabel?: string }
    ) {
        super(publicMessage);
        this.name = 'PlatformError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.cause = options?.cause;

        // Log the full internal details with the IncidentID
        logger.error({
            incidentId: this.incidentId,
            category: this.category,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a sanitized PlatformError.
     */
    sanitize: (err: unknown, contextLabel: string): PlatformError => {
        if (err instanceof PlatformError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else if (err && typeof err === 'object' && 'message' in err) {
            const errObj = err as Record<string, unknown>;
            if (typeof errObj.message === 'string') {
                originalErrorMessage = errObj.message;
            }
            if (typeof errObj.stack === 'string') {
                originalErrorStack = errObj.stack;
            }
        } else {
            originalErrorMessage = String(err);
        }

        return new PlatformError(
            `An internal error occurred. Please report reference: ${contextLabel}`,
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            'OPS',
            { cause: err, contextLabel }
        );
    }
};

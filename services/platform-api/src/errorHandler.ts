import type { Request, Response, NextFunction } from 'express';
import { ErrorSanitizer } from '../../../libs/errors/sanitizer.js';
import { SchemaValidationError } from '../../../libs/validation/zod-middleware.js';

/**
 * Last middleware in the chain: nothing a request does may take the
 * process down, and raw internals never reach the response.
 */
export function errorHandler() {
    return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
        if (res.headersSent) {
            next(err);
            return;
        }

        if (err instanceof SchemaValidationError) {
            res.status(err.statusCode).json({ success: false, error: 'Invalid request body', issues: err.issues });
            return;
        }

        // body-parser rejects unparseable or oversized payloads with a 4xx status
        const status = clientErrorStatus(err);
        if (status !== undefined) {
            res.status(status).json({ success: false, error: 'Malformed request body' });
            return;
        }

        const sanitized = ErrorSanitizer.sanitize(err, `PlatformApi:${req.method} ${req.path}`);
        res.status(500).json({
            success: false,
            error: sanitized.publicMessage,
            incidentId: sanitized.incidentId
        });
    };
}

function clientErrorStatus(err: unknown): number | undefined {
    if (!err || typeof err !== 'object' || !('status' in err)) {
        return undefined;
    }
    const status = err.status;
    return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

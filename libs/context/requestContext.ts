import { AsyncLocalStorage } from 'node:async_hooks';
import crypto from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';

/**
 * Request Context Container
 * AsyncLocalStorage-backed for concurrent request isolation.
 *
 * Only the request boundary (middleware below) should call run().
 * Downstream code only calls get() / tryGet().
 */
export interface RequestScope {
    readonly requestId: string;
    readonly method: string;
    readonly path: string;
}

const storage = new AsyncLocalStorage<RequestScope>();

export const REQUEST_ID_HEADER = 'x-request-id';

export class RequestContext {
    /**
     * Establish the request scope for the lifetime of fn.
     */
    public static run<T>(scope: RequestScope, fn: () => T): T {
        return storage.run(Object.freeze({ ...scope }), fn);
    }

    /**
     * Current request scope. Throws if called outside run().
     */
    public static get(): RequestScope {
        const ctx = storage.getStore();
        if (!ctx) {
            throw new Error("MISSING_REQUEST_CONTEXT: No request scope established");
        }
        return ctx;
    }

    /**
     * Current request scope, or undefined outside a request (startup, tests).
     */
    public static tryGet(): RequestScope | undefined {
        return storage.getStore();
    }
}

/**
 * Express middleware: reuses an incoming x-request-id (or mints one),
 * echoes it back and runs the rest of the chain inside the scope.
 */
export function requestContextMiddleware() {
    return (req: Request, res: Response, next: NextFunction): void => {
        const header = req.headers[REQUEST_ID_HEADER];
        const requestId = typeof header === 'string' && header.trim() !== ''
            ? header.trim()
            : crypto.randomUUID();

        res.setHeader(REQUEST_ID_HEADER, requestId);

        RequestContext.run({ requestId, method: req.method, path: req.path }, () => next());
    };
}

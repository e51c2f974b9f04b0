/**
 * Failure taxonomy of the ping pipeline.
 *
 * Every class carries a stable code and the HTTP status the front end
 * answers with. A non-zero exit of the playbook is not an error.
 */

export type PingErrorCode =
    | 'VALIDATION_ERROR'
    | 'NOT_FOUND'
    | 'IO_ERROR'
    | 'BINARY_MISSING'
    | 'TIMEOUT';

export abstract class PingPipelineError extends Error {
    abstract readonly code: PingErrorCode;
    abstract readonly statusCode: number;
}

/**
 * No candidate host survived IPv4 validation.
 */
export class HostValidationError extends PingPipelineError {
    readonly code = 'VALIDATION_ERROR';
    readonly statusCode = 400;

    constructor(message = 'No valid IPv4 hosts provided') {
        super(message);
        this.name = 'HostValidationError';
    }
}

/**
 * Playbook or static inventory file is missing.
 */
export class NotFoundError extends PingPipelineError {
    readonly code = 'NOT_FOUND';
    readonly statusCode = 500;

    constructor(readonly resource: 'playbook' | 'inventory', readonly filePath: string) {
        super(`${resource === 'playbook' ? 'Playbook' : 'Inventory'} not found: ${filePath}`);
        this.name = 'NotFoundError';
    }
}

/**
 * Temporary inventory could not be written.
 */
export class InventoryIOError extends PingPipelineError {
    readonly code = 'IO_ERROR';
    readonly statusCode = 500;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'InventoryIOError';
    }
}

export type ExecutionErrorKind = 'BINARY_MISSING' | 'TIMEOUT';

/**
 * The playbook process could not be started, or outlived its timeout.
 */
export class ExecutionError extends PingPipelineError {
    readonly code: ExecutionErrorKind;
    readonly statusCode: number;

    constructor(
        readonly kind: ExecutionErrorKind,
        message: string,
        readonly partialOutput: { stdout: string; stderr: string } = { stdout: '', stderr: '' },
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'ExecutionError';
        this.code = kind;
        this.statusCode = kind === 'TIMEOUT' ? 504 : 502;
    }
}

/**
 * Centralized Redaction Configuration
 * Keys whose values must never reach the logs.
 */
export const REDACT_KEYS = [
    // Login form and headers (root and nested)
    'authorization', '*.authorization',
    'cookie', '*.cookie',
    'password', '*.password',
    'token', '*.token',
    'secret', '*.secret',

    // SSH material handed to the playbook runner
    'privateKey', '*.privateKey',
    'private_key', '*.private_key',
    'passphrase', '*.passphrase'
];

export const REDACT_CENSOR = '[REDACTED]';

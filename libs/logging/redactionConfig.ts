/**
 * Centralized Redaction Configuration
 * Keys that must never reach the log sink in clear text.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'password', '*.password',
    'secret', '*.secret',
    'secretKey', '*.secretKey',
    'privateKey', '*.privateKey',
    'signature', '*.signature',

    // Database connection
    'DB_PASSWORD', '*.DB_PASSWORD',
    'connectionString', '*.connectionString'
];

export const REDACT_CENSOR = '[REDACTED]';

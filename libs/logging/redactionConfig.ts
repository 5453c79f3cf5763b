/**
 * Centralized Redaction Configuration
 * Keys that must never reach a log line: bearer credentials, keystore
 * passphrases and raw key material.
 */
export const REDACT_KEYS = [
    // Credentials (Root and Nested)
    'authorization', '*.authorization',
    'headers.authorization', '*.headers.authorization',
    'token', '*.token',
    'secret', '*.secret',
    'password', '*.password',
    'passphrase', '*.passphrase',

    // Key material (Root and Nested)
    'key', '*.key',
    'privateKey', '*.privateKey',
    'pfx', '*.pfx'
];

export const REDACT_CENSOR = '[REDACTED]';

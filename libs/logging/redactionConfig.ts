/**
 * Centralized Redaction Configuration
 * Keys that must never reach the log stream in clear text.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'headers.authorization', '*.headers.authorization',
    'token', '*.token',
    'access_token', '*.access_token',
    'refresh_token', '*.refresh_token',
    'password', '*.password',
    'secret', '*.secret',
    'jwtSecret', '*.jwtSecret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',
    'rawToken', '*.rawToken'
];

export const REDACT_CENSOR = '[REDACTED]';

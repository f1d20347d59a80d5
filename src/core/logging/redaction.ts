/**
 * Redaction configuration for pino.
 *
 * Covers credentials at the top level of a log entry or one object deep.
 */
export const REDACTION_CONFIG = {
  paths: [
    'token',
    'secret',
    'password',
    'apiKey',
    'authorization',

    '*.token',
    '*.secret',
    '*.password',
    '*.apiKey',
  ],
  censor: '[REDACTED]',
};

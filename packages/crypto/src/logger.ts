/**
 * @journal-vault/crypto - Logging
 *
 * Structured logging via pino. Key material and plaintext are never logged.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger };

/**
 * Create the package logger. Level comes from LOG_LEVEL, defaulting to 'info'.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: 'journal-vault-crypto',
    level: process.env.LOG_LEVEL ?? 'info',
    ...options,
  });
}

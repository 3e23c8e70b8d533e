import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Structured logger for the chain service client
 *
 * - LOG_LEVEL controls verbosity (trace, debug, info, warn, error, fatal)
 * - ISO timestamps, level emitted as its label
 * - Signatures and key material are redacted if they end up in a log object
 */
export function createLogger(
  options: { level?: string; name?: string } = {}
): Logger {
  return pino({
    name: options.name ?? 'chain-service',
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['signature', '*.signature', 'privateKey', '*.privateKey', '*.mnemonic'],
      censor: '[REDACTED]',
    },
  });
}

export const logger = createLogger();

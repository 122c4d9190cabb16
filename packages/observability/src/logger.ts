import { pino, stdSerializers } from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';

export type { Logger };

/**
 * Redact credential-like fields the host may attach to call context
 * - Signatures and authorization headers
 * - Key material and seeds
 */
const REDACTION_PATHS = [
  'signature',
  'origin.signature',
  'authorization',
  'Authorization',
  'headers.authorization',
  'privateKey',
  'seed',
  'secret',
];

/**
 * Make ledger values JSON friendly
 * - bigint becomes a decimal string
 * - Uint8Array becomes 0x-prefixed hex
 */
export function normalizeLogValue(value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Uint8Array) {
    return `0x${Buffer.from(value).toString('hex')}`;
  }
  if (value instanceof Error || value instanceof Date) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(normalizeLogValue);
  }
  if (value && typeof value === 'object') {
    return normalizeLogRecord(value);
  }
  return value;
}

function normalizeLogRecord(record: object): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(record)) {
    result[key] = normalizeLogValue(entry);
  }
  return result;
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Level from LOG_LEVEL (default info)
 * - Redaction of credential-like fields
 * - bigint and byte values normalized before serialization
 */
export function createLogger(options?: LoggerOptions, destination?: DestinationStream): Logger {
  const config: LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      log: normalizeLogRecord,
    },
    ...options,
  };

  return destination ? pino(config, destination) : pino(config);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();

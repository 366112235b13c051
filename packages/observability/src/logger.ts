import pino from 'pino';

/**
 * Redact credentials that may travel with ledger requests
 * - Authorization headers forwarded by the gateway
 * - Secrets and tokens in configuration dumps
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'req.headers.Authorization',
  'headers.authorization',
  'headers.Authorization',
  'authorization',
  'Authorization',
  'password',
  'token',
  'secret',
  'apiKey',
  'api_key',
];

/**
 * Convert values JSON cannot carry into loggable ones.
 * Ledger amounts are bigint fixed-point integers and are written as decimal strings.
 */
export function toLoggable(value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(toLoggable);
  }
  if (value instanceof Error || value instanceof Date) {
    return value;
  }
  if (value && typeof value === 'object') {
    return toLoggableRecord({ ...value });
  }
  return value;
}

/**
 * Apply {@link toLoggable} to every field of a log object
 */
export function toLoggableRecord(object: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(object)) {
    result[key] = toLoggable(entry);
  }
  return result;
}

export type Logger = pino.Logger;

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels
 * - Automatic redaction of credentials
 * - bigint fields rendered as decimal strings
 * - Structured JSON output with ISO timestamps
 */
export function createLogger(
  options?: pino.LoggerOptions,
  destination?: pino.DestinationStream
): Logger {
  const config: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      req: pino.stdSerializers.req,
      res: pino.stdSerializers.res,
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      log: toLoggableRecord,
    },
    ...options,
  };

  return destination ? pino(config, destination) : pino(config);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();

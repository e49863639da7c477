/**
 * Console logger with automatic sensitive data redaction.
 * Credentials and tokens passed in log data are never printed.
 */

/** Keys whose values are replaced before logging (compared lowercase) */
const SENSITIVE_FIELDS = new Set([
  'apitoken',
  'api_token',
  'token',
  'access',
  'refresh',
  'password',
  'secret',
  'authorization',
  'bearer',
  'otp',
  'access_token',
  'refresh_token',
]);

/**
 * Recursively redacts sensitive fields from a value, returning a copy.
 */
export function redactSensitive<T>(value: T): T;
export function redactSensitive(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitive(item));
  }

  const result: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(value)) {
    result[key] = SENSITIVE_FIELDS.has(key.toLowerCase()) ? '[REDACTED]' : redactSensitive(val);
  }
  return result;
}

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/** Logger interface */
export interface Logger {
  namespace: string;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** Emit debug lines (default: false) */
  debug?: boolean;
}

/**
 * Formats one log line: `[timestamp] [LEVEL] [namespace] message {data}`.
 */
export function formatLogLine(level: LogLevel, namespace: string, message: string, data?: Record<string, unknown>, now: Date = new Date()): string {
  const prefix = `[${now.toISOString()}] [${level}] [${namespace}]`;
  if (data) {
    return `${prefix} ${message} ${JSON.stringify(redactSensitive(data))}`;
  }
  return `${prefix} ${message}`;
}

/**
 * Creates a namespaced logger. Debug output is dropped unless enabled.
 */
export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const debugEnabled = options.debug ?? false;

  return {
    namespace,
    info(message, data) {
      console.info(formatLogLine('INFO', namespace, message, data));
    },
    warn(message, data) {
      console.warn(formatLogLine('WARN', namespace, message, data));
    },
    error(message, data) {
      console.error(formatLogLine('ERROR', namespace, message, data));
    },
    debug(message, data) {
      if (!debugEnabled) return;
      console.debug(formatLogLine('DEBUG', namespace, message, data));
    },
  };
}

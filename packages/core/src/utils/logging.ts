/**
 * Logging Utilities - Safe serialization and redaction for log metadata
 */

import type { Logger } from '../interfaces/logger.js';

const SENSITIVE_HEADERS = ['authorization', 'proxy-authorization', 'api-key', 'x-api-key', 'password', 'token', 'cookie', 'set-cookie'];

/**
 * Console-backed logger used when debug output is requested without an injected logger
 */
export function defaultLogger(prefix = '[http]'): Logger {
  return {
    debug: (m: string, meta?: Record<string, unknown>) => console.debug(`${prefix}[debug]`, m, meta),
    info: (m: string, meta?: Record<string, unknown>) => console.info(`${prefix}[info]`, m, meta),
    warn: (m: string, meta?: Record<string, unknown>) => console.warn(`${prefix}[warn]`, m, meta),
    error: (m: string, meta?: Record<string, unknown>) => console.error(`${prefix}[error]`, m, meta),
  };
}

/**
 * Safely serialize objects for logging
 * Prevents circular reference errors and safely handles various object types.
 */
export function serializeForLog(obj: unknown): unknown {
  try {
    if (obj === null || obj === undefined) return obj;
    if (typeof obj !== 'object') return obj;
    return JSON.parse(JSON.stringify(obj));
  } catch (err) {
    const errorMsg = err instanceof Error ? err.message : 'unknown error';
    return `[Unserializable object: ${errorMsg}]`;
  }
}

/**
 * Truncate a string to a maximum length
 * If the string exceeds maxLength, appends "..." to indicate truncation.
 */
export function truncateString(str: string, maxLength: number = 500): string {
  if (str.length <= maxLength) return str;
  return str.substring(0, maxLength) + '...';
}

/**
 * Sanitize sensitive headers from logging
 * Masks values of headers that typically carry credentials or session state.
 * Repeated headers are joined with ", ".
 */
export function sanitizeHeadersForLog(
  headers?: Readonly<Record<string, string | string[] | number | boolean | undefined>>
): Record<string, string> | undefined {
  if (!headers) return undefined;

  const sanitized: Record<string, string> = {};

  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    if (SENSITIVE_HEADERS.includes(key.toLowerCase())) {
      sanitized[key] = 'REDACTED';
    } else {
      sanitized[key] = Array.isArray(value) ? value.join(', ') : String(value);
    }
  }

  return sanitized;
}

/**
 * Decode the start of a body for debug output
 */
export function previewBody(body: string | Uint8Array | undefined, maxLength: number = 200): string | undefined {
  if (body === undefined) return undefined;
  const text = typeof body === 'string' ? body : Buffer.from(body).toString('utf8');
  return text.slice(0, maxLength);
}

/**
 * Create a safe log object from an error
 * Extracts relevant error information in a standardized format suitable for logging.
 */
export function errorToLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      type: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  if (typeof error === 'object' && error !== null) {
    const serialized = serializeForLog(error);
    return typeof serialized === 'object' && serialized !== null
      ? { ...serialized }
      : { type: 'object', message: String(serialized) };
  }

  return {
    type: typeof error,
    message: String(error),
  };
}

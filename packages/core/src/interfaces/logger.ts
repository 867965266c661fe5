/**
 * Logger
 * Minimal structured logger injected into engines, clients and processors.
 * Any logger with these four methods (pino, winston, console wrappers) fits.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

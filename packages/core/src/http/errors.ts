import type { Verb } from '../interfaces/http-engine.js';

/**
 * Transport Error Type
 * Raised by HttpEngine implementations when no HTTP response was obtained
 * (connection refused, DNS failure, timeout, aborted socket).
 * HTTP error statuses are NOT transport errors; they come back as responses.
 */
export class TransportError extends Error {
  /**
   * Low-level error code when the engine exposes one (e.g. ECONNREFUSED, ETIMEDOUT)
   */
  readonly code?: string;

  /**
   * The request that failed
   */
  readonly request: { method: Verb; url: string };

  constructor(
    message: string,
    request: { method: Verb; url: string },
    opts?: { code?: string; cause?: unknown }
  ) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    Object.setPrototypeOf(this, TransportError.prototype);
    this.name = 'TransportError';
    this.request = request;
    if (opts?.code !== undefined) {
      this.code = opts.code;
    }
  }
}

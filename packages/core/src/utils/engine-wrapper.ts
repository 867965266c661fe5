/**
 * Engine Wrappers & Utilities
 * Higher-order functions for enhancing HTTP engines with cross-cutting concerns
 */

import type { BuiltRequest, EngineResponse, EngineWrapper, HttpEngine } from '../interfaces/http-engine.js';
import type { Logger } from '../interfaces/logger.js';
import { errorToLog } from './logging.js';

/**
 * Create a wrapper that logs every round trip with timing information
 *
 * Usage:
 * ```typescript
 * const traced = withEngineTracing(createAxiosEngine(), logger);
 *
 * // [trace] GET https://api.example.com/items started
 * // [trace] GET https://api.example.com/items completed in 145ms
 * ```
 *
 * @param engine The engine to wrap
 * @param logger Logger receiving the trace lines
 */
export function withEngineTracing(engine: HttpEngine, logger: Logger): HttpEngine {
  return {
    async execute(request: BuiltRequest): Promise<EngineResponse> {
      const startTime = Date.now();
      const label = `${request.method} ${request.url}`;

      logger.debug(`[trace] ${label} started`, { method: request.method });

      try {
        const response = await engine.execute(request);
        const duration = Date.now() - startTime;
        logger.info(`[trace] ${label} completed in ${duration}ms`, {
          method: request.method,
          duration,
          status: response.status,
        });
        return response;
      } catch (error) {
        const duration = Date.now() - startTime;
        logger.error(`[trace] ${label} failed after ${duration}ms`, {
          method: request.method,
          duration,
          error: errorToLog(error),
        });
        throw error;
      }
    },
  };
}

/**
 * Compose multiple engine wrappers together
 *
 * Wrappers are applied left-to-right (first wrapper is innermost)
 *
 * Usage:
 * ```typescript
 * const engine = composeEngineWrappers(createAxiosEngine(), [
 *   (e) => withResponseCache(e, cache),
 *   (e) => withEngineTracing(e, logger),
 * ]);
 * ```
 */
export function composeEngineWrappers(engine: HttpEngine, wrappers: readonly EngineWrapper[]): HttpEngine {
  return wrappers.reduce((wrapped, wrapper) => wrapper(wrapped), engine);
}

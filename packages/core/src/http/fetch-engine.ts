import type { BuiltRequest, EngineResponse, HttpEngine } from '../interfaces/http-engine.js';
import type { Logger } from '../interfaces/logger.js';
import { TransportError } from './errors.js';
import { defaultLogger, previewBody, sanitizeHeadersForLog } from '../utils/logging.js';

export interface FetchEngineOptions {
  timeoutMs?: number;
  // fetchFn can be provided for environments where `fetch` is not global, and for tests
  fetchFn?: typeof fetch;
  debug?: boolean;
  debugFullBody?: boolean;
  logger?: Logger;
}

/**
 * Collect fetch headers; repeated names (set-cookie) become arrays
 */
function collectHeaders(headers: Headers): Record<string, string | string[]> {
  const out: Record<string, string | string[]> = {};
  headers.forEach((value, key) => {
    const existing = out[key];
    if (existing === undefined) out[key] = value;
    else if (Array.isArray(existing)) existing.push(value);
    else out[key] = [existing, value];
  });
  return out;
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && err.name === 'TimeoutError') return 'ETIMEDOUT';
  if (err instanceof Error && err.name === 'AbortError') return 'ECONNABORTED';
  const cause = err instanceof Error ? err.cause : undefined;
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

/**
 * Create a HttpEngine backed by the Fetch API.
 * Every HTTP status resolves; network failures and timeouts reject as TransportError.
 */
export function createFetchEngine(opts: FetchEngineOptions = {}): HttpEngine {
  const fetchFn = opts.fetchFn ?? globalThis.fetch;
  if (!fetchFn) throw new Error('fetch is not available in this environment; provide fetchFn');

  const timeoutMs = opts.timeoutMs ?? 30_000;
  const resolvedDebug = opts.debug ?? (process.env.HTTP_DEBUG === '1');
  const resolvedFull = opts.debugFullBody ?? (process.env.HTTP_DEBUG_FULL === '1');
  const log = opts.logger ?? defaultLogger();

  return {
    async execute(request: BuiltRequest): Promise<EngineResponse> {
      const body = request.body?.data;
      if (resolvedDebug) log.debug('request', { method: request.method, url: request.url, headers: sanitizeHeadersForLog(request.headers), bodyLength: body ? Buffer.byteLength(body) : 0, bodyPreview: resolvedFull ? previewBody(body) : undefined });

      let res: Response;
      try {
        res = await fetchFn(request.url, {
          method: request.method,
          headers: { ...request.headers },
          body,
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (err) {
        if (resolvedDebug) log.debug('error', { method: request.method, url: request.url, error: err instanceof Error ? err.message : String(err) });
        const message = err instanceof Error ? err.message : String(err);
        throw new TransportError(message, { method: request.method, url: request.url }, { code: errorCode(err), cause: err });
      }

      const bytes = new Uint8Array(await res.arrayBuffer());
      const headers = collectHeaders(res.headers);
      if (resolvedDebug) log.debug('response', { status: res.status, headers: sanitizeHeadersForLog(headers), bodyLength: bytes.length, bodyPreview: resolvedFull ? previewBody(bytes) : undefined });

      return {
        status: res.status,
        statusText: res.statusText,
        headers,
        body: bytes,
      };
    },
  };
}

export default createFetchEngine;

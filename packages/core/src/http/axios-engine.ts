import axios, { type AxiosInstance, type AxiosProxyConfig, type AxiosRequestConfig } from "axios";
import { Agent as HttpsAgent } from "node:https";
import type { BuiltRequest, EngineResponse, HttpEngine } from "../interfaces/http-engine.js";
import type { Logger } from '../interfaces/logger.js';
import { TransportError } from './errors.js';
import { defaultLogger, previewBody, sanitizeHeadersForLog } from '../utils/logging.js';

export interface TlsOptions {
  /** PEM-encoded CA bundle to trust */
  ca?: string;
  /** PEM-encoded client certificate */
  cert?: string;
  /** PEM-encoded client key */
  key?: string;
  rejectUnauthorized?: boolean;
}

export interface AxiosEngineOptions {
  axiosInstance?: AxiosInstance;
  /** Deadline per request; with an axiosInstance, the instance's own timeout applies unless set */
  timeoutMs?: number;
  proxy?: AxiosProxyConfig;
  tls?: TlsOptions;
  debug?: boolean;
  debugFullBody?: boolean;
  logger?: Logger;
}

export function toBuffer(data: string | Uint8Array): Buffer {
  return typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data);
}

function toBytes(data: unknown): Uint8Array {
  if (data === undefined || data === null) return new Uint8Array(0);
  if (data instanceof Uint8Array) return data;
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  if (typeof data === 'string') return Buffer.from(data, 'utf8');
  return Buffer.from(JSON.stringify(data), 'utf8');
}

/**
 * Flatten axios response headers into plain lower-case keys.
 * Values axios keeps as numbers or booleans are stringified; set-cookie stays an array.
 */
export function normalizeHeaders(raw: object): Record<string, string | string[]> {
  const out: Record<string, string | string[]> = {};
  const entries: Array<[string, unknown]> = Object.entries(raw);
  for (const [key, value] of entries) {
    if (value === undefined || value === null || typeof value === 'function') continue;
    const lk = key.toLowerCase();
    if (Array.isArray(value)) out[lk] = value.map((v) => String(v));
    else out[lk] = String(value);
  }
  return out;
}

/**
 * Transport settings sent with every request, so they also apply to a caller's axiosInstance
 */
function transportConfig(opts: AxiosEngineOptions): AxiosRequestConfig {
  const timeout = opts.timeoutMs ?? (opts.axiosInstance ? undefined : 30_000);
  return {
    ...(timeout !== undefined && { timeout }),
    ...(opts.proxy && { proxy: opts.proxy }),
    ...(opts.tls && { httpsAgent: new HttpsAgent(opts.tls) }),
  };
}

/**
 * Create a HttpEngine backed by Axios.
 * - Reads every body as bytes (`responseType: 'arraybuffer'`).
 * - Resolves every HTTP status; only requests without a response reject, as TransportError.
 */
export function createAxiosEngine(opts: AxiosEngineOptions = {}): HttpEngine {
  const instance: AxiosInstance = opts.axiosInstance ?? axios.create();
  const transport = transportConfig(opts);

  const resolvedDebug = opts.debug ?? (process.env.HTTP_DEBUG === '1');
  const resolvedFull = opts.debugFullBody ?? (process.env.HTTP_DEBUG_FULL === '1');
  const log = opts.logger ?? defaultLogger();

  return {
    async execute(request: BuiltRequest): Promise<EngineResponse> {
      if (resolvedDebug) {
        const bodyData = request.body?.data;
        log.debug('request', {
          method: request.method,
          url: request.url,
          headers: sanitizeHeadersForLog(request.headers),
          bodyLength: bodyData ? Buffer.byteLength(bodyData) : 0,
          bodyPreview: resolvedFull ? previewBody(bodyData) : undefined,
        });
      }

      try {
        const res = await instance.request<unknown>({
          ...transport,
          method: request.method,
          url: request.url,
          headers: { ...request.headers },
          data: request.body ? toBuffer(request.body.data) : undefined,
          responseType: 'arraybuffer',
          validateStatus: () => true,
        });

        const body = toBytes(res.data);
        const headers = normalizeHeaders(res.headers);
        if (resolvedDebug) {
          log.debug('response', {
            status: res.status,
            statusText: res.statusText,
            headers: sanitizeHeadersForLog(headers),
            bodyLength: body.length,
            bodyPreview: resolvedFull ? previewBody(body) : undefined,
          });
        }

        return {
          status: res.status,
          statusText: res.statusText ?? '',
          headers,
          body,
        };
      } catch (err) {
        if (resolvedDebug) {
          log.debug('error', {
            method: request.method,
            url: request.url,
            error: err instanceof Error ? err.message : String(err),
          });
        }

        if (axios.isAxiosError(err)) {
          throw new TransportError(err.message, { method: request.method, url: request.url }, {
            code: err.code,
            cause: err,
          });
        }

        // Non-axios error, rethrow as-is
        throw err;
      }
    },
  };
}

export default createAxiosEngine;

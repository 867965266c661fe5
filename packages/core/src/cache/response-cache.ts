import type { BuiltRequest, EngineResponse, HttpEngine } from '../interfaces/http-engine.js';

/**
 * A stored response with its freshness deadline and the request header
 * values named by its Vary header.
 */
export interface CacheEntry {
  response: EngineResponse;
  /** Epoch milliseconds after which the entry is stale */
  expiresAt: number;
  vary: Record<string, string | undefined>;
}

/**
 * ResponseCache
 * Storage for engine responses keyed by request
 */
export interface ResponseCache {
  get(key: string): CacheEntry | undefined;
  set(key: string, entry: CacheEntry): void;
  delete(key: string): void;
  clear(): void;
}

/**
 * InMemoryResponseCache
 * Bounded cache; the least recently used entry is evicted first.
 */
export class InMemoryResponseCache implements ResponseCache {
  private entries = new Map<string, CacheEntry>();

  constructor(readonly maxEntries: number = 100) {}

  get size(): number {
    return this.entries.size;
  }

  get(key: string): CacheEntry | undefined {
    const hit = this.entries.get(key);
    if (hit === undefined) return undefined;
    // re-insert to mark as most recently used
    this.entries.delete(key);
    this.entries.set(key, hit);
    return hit;
  }

  set(key: string, entry: CacheEntry): void {
    this.entries.delete(key);
    this.entries.set(key, entry);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }
}

export interface ResponseCacheOptions {
  /** Freshness of responses that carry no max-age directive (default 60s) */
  defaultTtlMs?: number;
}

export const DEFAULT_CACHE_TTL_MS = 60_000;

export function cacheKey(request: BuiltRequest): string {
  return `${request.method} ${request.url}`;
}

function requestHeader(request: BuiltRequest, name: string): string | undefined {
  for (const [key, value] of Object.entries(request.headers)) {
    if (key.toLowerCase() === name) return value;
  }
  return undefined;
}

function joined(value: string | string[] | undefined): string {
  return Array.isArray(value) ? value.join(',') : value ?? '';
}

/**
 * Parse a Cache-Control value into lower-cased directives
 */
export function parseCacheControl(value: string | string[] | undefined): Map<string, string | undefined> {
  const directives = new Map<string, string | undefined>();
  for (const part of joined(value).split(',')) {
    const [name, arg] = part.split('=', 2);
    const key = name.trim().toLowerCase();
    if (key === '') continue;
    directives.set(key, arg === undefined ? undefined : arg.trim().replace(/^"|"$/g, ''));
  }
  return directives;
}

function varyNames(response: EngineResponse): string[] {
  return joined(response.headers['vary'])
    .split(',')
    .map((name) => name.trim().toLowerCase())
    .filter((name) => name !== '');
}

/**
 * Requests that carry credentials, or ask to skip caches, never touch the cache
 */
function isCacheableRequest(request: BuiltRequest): boolean {
  if (request.method !== 'GET') return false;
  if (requestHeader(request, 'authorization') !== undefined) return false;
  if (requestHeader(request, 'cookie') !== undefined) return false;
  const directives = parseCacheControl(requestHeader(request, 'cache-control'));
  return !directives.has('no-store') && !directives.has('no-cache');
}

/**
 * Freshness lifetime in ms, or undefined when the response must not be stored
 */
function freshnessMs(response: EngineResponse, defaultTtlMs: number): number | undefined {
  if (response.status < 200 || response.status >= 300) return undefined;
  if (varyNames(response).includes('*')) return undefined;

  const directives = parseCacheControl(response.headers['cache-control']);
  if (directives.has('no-store') || directives.has('no-cache') || directives.has('private')) return undefined;

  const maxAge = directives.get('max-age');
  if (maxAge === undefined) return defaultTtlMs > 0 ? defaultTtlMs : undefined;
  const seconds = Number.parseInt(maxAge, 10);
  return Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : undefined;
}

function varyMatches(entry: CacheEntry, request: BuiltRequest): boolean {
  return Object.entries(entry.vary).every(([name, value]) => requestHeader(request, name) === value);
}

function copyResponse(response: EngineResponse): EngineResponse {
  const headers: Record<string, string | string[]> = {};
  for (const [name, value] of Object.entries(response.headers)) {
    headers[name] = Array.isArray(value) ? [...value] : value;
  }
  return { ...response, headers, body: Uint8Array.from(response.body) };
}

/**
 * Serve repeated GET requests from the cache.
 *
 * Stored: 2xx responses to GET requests without Authorization or Cookie headers.
 * Not stored: Cache-Control no-store, no-cache, private, max-age=0, and Vary: *.
 * Entries live for max-age seconds, or defaultTtlMs when the response gives none.
 * Every caller gets its own copy of the response.
 */
export function withResponseCache(
  engine: HttpEngine,
  cache: ResponseCache,
  opts: ResponseCacheOptions = {}
): HttpEngine {
  const defaultTtlMs = opts.defaultTtlMs ?? DEFAULT_CACHE_TTL_MS;

  return {
    async execute(request: BuiltRequest): Promise<EngineResponse> {
      if (!isCacheableRequest(request)) return engine.execute(request);

      const key = cacheKey(request);
      const hit = cache.get(key);
      if (hit) {
        if (hit.expiresAt > Date.now() && varyMatches(hit, request)) return copyResponse(hit.response);
        cache.delete(key);
      }

      const response = await engine.execute(request);
      const ttl = freshnessMs(response, defaultTtlMs);
      if (ttl !== undefined) {
        const vary: Record<string, string | undefined> = {};
        for (const name of varyNames(response)) vary[name] = requestHeader(request, name);
        cache.set(key, { response: copyResponse(response), expiresAt: Date.now() + ttl, vary });
      }
      return response;
    },
  };
}

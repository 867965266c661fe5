import { Cookie, CookieJar } from 'tough-cookie';
import type { StorageProvider } from '../interfaces/storage.js';
import type { ClientResponse } from '../http/response.js';
import { DEFAULT_COOKIES_KEY, type CookiePolicy } from './config.js';

export interface CookieHandlerOptions {
  storage: StorageProvider;
  jar?: CookieJar;
  /** Storage key used by save() and load() */
  key?: string;
  policy?: CookiePolicy;
}

/**
 * Create a cookie jar powered by `tough-cookie`.
 * Public suffixes (`.com`, `.co.uk`) are always rejected.
 */
export function createCookieJar(): CookieJar {
  return new CookieJar(undefined, { rejectPublicSuffixes: true });
}

/**
 * ClientCookieHandler
 *
 * Attaches `Cookie` headers to outgoing requests and records `Set-Cookie`
 * headers from responses. With the `reject-all` policy nothing is recorded,
 * but cookies set by hand are still sent.
 */
export class ClientCookieHandler {
  private jar: CookieJar;
  private readonly storage: StorageProvider;
  readonly key: string;
  readonly policy: CookiePolicy;

  constructor(opts: CookieHandlerOptions) {
    this.jar = opts.jar ?? createCookieJar();
    this.storage = opts.storage;
    this.key = opts.key ?? DEFAULT_COOKIES_KEY;
    this.policy = opts.policy ?? 'accept-all';
  }

  getJar(): CookieJar {
    return this.jar;
  }

  /**
   * Cookie header value for a url, or undefined when no cookie matches
   */
  async cookieHeaderFor(url: string): Promise<string | undefined> {
    const header = await this.jar.getCookieString(url);
    return header === '' ? undefined : header;
  }

  /**
   * Record every Set-Cookie header of a response against its request url.
   * Malformed cookies are skipped, as a browser would.
   */
  async storeFromResponse(response: ClientResponse): Promise<void> {
    if (this.policy === 'reject-all') return;
    for (const raw of response.headerValues('set-cookie')) {
      await this.jar.setCookie(raw, response.request.url, { ignoreError: true });
    }
  }

  async getCookies(url: string): Promise<Cookie[]> {
    return this.jar.getCookies(url);
  }

  async setCookie(cookie: string | Cookie, url: string): Promise<void> {
    await this.jar.setCookie(cookie, url);
  }

  async clear(): Promise<void> {
    await this.jar.removeAllCookies();
  }

  /**
   * Persist the jar through the storage provider under `key`
   */
  async save(): Promise<void> {
    const serialized = await this.jar.serialize();
    await this.storage.write(this.key, JSON.stringify(serialized));
  }

  /**
   * Replace the jar with the one stored under `key`.
   * Returns false and keeps the current jar when nothing is stored.
   */
  async load(): Promise<boolean> {
    const stored = await this.storage.read(this.key);
    if (stored === null) return false;
    this.jar = await CookieJar.deserialize(stored);
    return true;
  }
}

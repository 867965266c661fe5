import { describe, it, expect } from 'vitest';
import { ClientCookieHandler } from '../cookie-handler.js';
import { ClientResponse } from '../../http/response.js';
import { InMemoryStorageProvider } from '../../stores/in-memory.js';
import { toEngineResponse } from '../../__tests__/helpers/fake-engine.js';

const URL_ROOT = 'https://api.example.com/';

function responseWithCookies(cookies: string[]): ClientResponse {
  return new ClientResponse(
    { method: 'GET', url: 'https://api.example.com/login', headers: {} },
    toEngineResponse({ headers: { 'set-cookie': cookies } })
  );
}

describe('ClientCookieHandler', () => {
  it('returns no header when the jar is empty', async () => {
    const handler = new ClientCookieHandler({ storage: new InMemoryStorageProvider() });
    expect(await handler.cookieHeaderFor(URL_ROOT)).toBeUndefined();
  });

  it('stores Set-Cookie headers against the request url', async () => {
    const handler = new ClientCookieHandler({ storage: new InMemoryStorageProvider() });

    await handler.storeFromResponse(responseWithCookies(['session=abc; Path=/']));

    const cookies = await handler.getCookies(URL_ROOT);
    expect(cookies.map((c) => `${c.key}=${c.value}`)).toEqual(['session=abc']);
    expect(await handler.cookieHeaderFor('https://api.example.com/profile')).toBe('session=abc');
    expect(await handler.cookieHeaderFor('https://other.example.org/')).toBeUndefined();
  });

  it('ignores Set-Cookie headers with the reject-all policy', async () => {
    const handler = new ClientCookieHandler({ storage: new InMemoryStorageProvider(), policy: 'reject-all' });

    await handler.storeFromResponse(responseWithCookies(['session=abc; Path=/']));

    expect(await handler.getCookies(URL_ROOT)).toHaveLength(0);
  });

  it('clear removes every cookie', async () => {
    const handler = new ClientCookieHandler({ storage: new InMemoryStorageProvider() });
    await handler.setCookie('session=abc', URL_ROOT);

    await handler.clear();

    expect(await handler.cookieHeaderFor(URL_ROOT)).toBeUndefined();
  });

  it('saves and loads the jar through the storage provider', async () => {
    const storage = new InMemoryStorageProvider();
    const first = new ClientCookieHandler({ storage, key: 'shop.cookies' });
    await first.setCookie('session=abc; Path=/', URL_ROOT);
    await first.save();

    const second = new ClientCookieHandler({ storage, key: 'shop.cookies' });
    const loaded = await second.load();

    expect(loaded).toBe(true);
    expect(await second.cookieHeaderFor(URL_ROOT)).toBe('session=abc');
    expect(await storage.read('shop.cookies')).toContain('"key":"session"');
  });

  it('load keeps the current jar when nothing is stored', async () => {
    const handler = new ClientCookieHandler({ storage: new InMemoryStorageProvider() });
    await handler.setCookie('session=abc', URL_ROOT);

    expect(await handler.load()).toBe(false);
    expect(await handler.cookieHeaderFor(URL_ROOT)).toBe('session=abc');
  });
});

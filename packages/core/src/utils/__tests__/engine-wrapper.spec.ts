import { describe, it, expect } from 'vitest';
import { composeEngineWrappers, withEngineTracing } from '../engine-wrapper.js';
import type { BuiltRequest, HttpEngine } from '../../interfaces/http-engine.js';
import { FakeEngine } from '../../__tests__/helpers/fake-engine.js';
import { createSpyLogger } from '../../__tests__/helpers/spy-logger.js';

const request: BuiltRequest = { method: 'GET', url: 'https://api.example.com/items', headers: {} };

describe('withEngineTracing', () => {
  it('logs start and completion', async () => {
    const logger = createSpyLogger();
    const traced = withEngineTracing(new FakeEngine(() => ({ status: 204 })), logger);

    const response = await traced.execute(request);

    expect(response.status).toBe(204);
    expect(logger.debug).toHaveBeenCalledWith('[trace] GET https://api.example.com/items started', { method: 'GET' });
    expect(logger.info).toHaveBeenCalledWith(
      expect.stringMatching(/completed in \d+ms$/),
      expect.objectContaining({ status: 204 })
    );
  });

  it('logs failures and rethrows the original error', async () => {
    const logger = createSpyLogger();
    const failure = new Error('dns lookup failed');
    const traced = withEngineTracing(
      new FakeEngine(() => {
        throw failure;
      }),
      logger
    );

    await expect(traced.execute(request)).rejects.toBe(failure);
    expect(logger.error).toHaveBeenCalledWith(
      expect.stringMatching(/^\[trace\] GET https:\/\/api\.example\.com\/items failed after \d+ms$/),
      expect.objectContaining({ error: expect.objectContaining({ message: 'dns lookup failed' }) })
    );
  });
});

describe('composeEngineWrappers', () => {
  it('returns the engine unchanged without wrappers', () => {
    const engine = new FakeEngine();
    expect(composeEngineWrappers(engine, [])).toBe(engine);
  });

  it('applies wrappers left to right, first innermost', async () => {
    const order: string[] = [];
    const tag =
      (name: string) =>
      (inner: HttpEngine): HttpEngine => ({
        execute: async (req) => {
          order.push(`${name}:before`);
          const res = await inner.execute(req);
          order.push(`${name}:after`);
          return res;
        },
      });

    await composeEngineWrappers(new FakeEngine(), [tag('a'), tag('b')]).execute(request);

    expect(order).toEqual(['b:before', 'a:before', 'a:after', 'b:after']);
  });
});

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ClientBuilder } from '../../client/client-builder.js';
import { getMethod, jsonPostMethod, postMethod } from '../../request/methods.js';
import { HeaderParams, Params } from '../../params/params.js';
import { ProcessorStoppedError, ValidationError } from '../../errors/index.js';
import { FakeEngine } from '../../__tests__/helpers/fake-engine.js';

const Item = z.object({ id: z.number(), name: z.string() });

function setup(body: unknown = { id: 1, name: 'box' }) {
  const engine = new FakeEngine(() => ({ body }));
  const client = new ClientBuilder().baseUrl('https://api.example.com').engine(engine).build({});
  return { engine, client };
}

describe('SingleParamsProcessor', () => {
  it('returns exactly one mapped result from a single round trip', async () => {
    const { engine, client } = setup();

    const result = await client.send(Item, getMethod({ url: '/items/1' }), {
      query: new Params({ expand: 'tags' }),
      headers: new HeaderParams({ Accept: 'application/json' }),
    });

    expect(result.toArray()).toEqual([{ id: 1, name: 'box' }]);
    expect(engine.requests).toHaveLength(1);
    expect(engine.requests[0]).toEqual({
      method: 'GET',
      url: 'https://api.example.com/items/1?expand=tags',
      headers: { Accept: 'application/json', 'User-Agent': 'httpframe/0.1' },
    });
  });

  it('uses the method response mapper', async () => {
    const { client } = setup('id=7');
    const method = getMethod({ url: '/raw', responseMapper: (response) => response.text().split('=')[1] });

    const result = await client.send(z.string(), method);

    expect(result.first()).toBe('7');
  });

  it('sends form bodies for post methods', async () => {
    const { engine, client } = setup();

    await client.send(Item, postMethod({ url: '/items' }), { body: new Params({ name: 'box', qty: '2' }) });

    expect(engine.requests[0].body).toEqual({ contentType: 'application/x-www-form-urlencoded', data: 'name=box&qty=2' });
  });

  it('sends json bodies for jsonPost methods', async () => {
    const { engine, client } = setup();

    await client.send(Item, jsonPostMethod({ customUrl: 'https://other.example.com/items' }), {
      body: new Params({ name: 'box' }),
    });

    expect(engine.requests[0].url).toBe('https://other.example.com/items');
    expect(engine.requests[0].body).toEqual({ contentType: 'application/json; charset=utf-8', data: '{"name":"box"}' });
  });

  it('rejects results that do not match the expected schema', async () => {
    const { client } = setup({ id: 'one' });

    await expect(client.send(Item, getMethod({ url: '/items/1' }))).rejects.toBeInstanceOf(ValidationError);
    await expect(client.send(Item, getMethod({ url: '/items/1' }))).rejects.toThrow(
      'Response of GET https://api.example.com/items/1 does not match the expected type'
    );
  });

  it('returns nothing when interrupted before it starts', async () => {
    const { engine, client } = setup();
    const processor = client.createProcessor(Item, getMethod({ url: '/items/1' }));

    processor.interrupt();
    const result = await processor.process({});

    expect(result.size).toBe(0);
    expect(engine.requests).toHaveLength(0);
    expect(processor.state).toBe('stopped-by-interrupt');
  });

  it('runs only once', async () => {
    const { client } = setup();
    const processor = client.createProcessor(Item, getMethod({ url: '/items/1' }));

    await processor.process({});

    expect(processor.state).toBe('stopped-by-limit');
    await expect(processor.process({})).rejects.toThrow(ProcessorStoppedError);
  });
});

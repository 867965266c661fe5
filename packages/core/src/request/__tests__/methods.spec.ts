import { describe, it, expect } from 'vitest';
import {
  customMethod,
  defineMethod,
  deleteMethod,
  getMethod,
  jsonPostMethod,
  jsonPutMethod,
  postMethod,
  putMethod,
} from '../methods.js';
import { MethodRegistry, builtinBinding, isMethodKind } from '../method-registry.js';
import { UnknownMethodError, UrlNotSetError, ValidationError } from '../../errors/index.js';

describe('method definitions', () => {
  it('factories set the kind', () => {
    expect(getMethod({ url: '/a' }).kind).toBe('get');
    expect(postMethod({ url: '/a' }).kind).toBe('post');
    expect(putMethod({ url: '/a' }).kind).toBe('put');
    expect(deleteMethod({ url: '/a' }).kind).toBe('delete');
    expect(jsonPostMethod({ url: '/a' }).kind).toBe('jsonPost');
    expect(jsonPutMethod({ url: '/a' }).kind).toBe('jsonPut');
    expect(customMethod('custom:search', { url: '/a' }).kind).toBe('custom:search');
  });

  it('returns a frozen definition', () => {
    const method = getMethod({ customUrl: 'https://api.example.com/items' });
    expect(Object.isFrozen(method)).toBe(true);
    expect(method.customUrl).toBe('https://api.example.com/items');
  });

  it('requires a url', () => {
    expect(() => defineMethod('get', {})).toThrow(UrlNotSetError);
  });

  it('rejects url and customUrl together', () => {
    expect(() => defineMethod('get', { url: '/a', customUrl: 'https://api.example.com/a' })).toThrow(ValidationError);
  });

  it('rejects a zero step', () => {
    const define = () =>
      getMethod({
        url: '/items',
        countable: { target: 'query', paramName: 'page', initialCount: 1, step: 0, limit: () => true },
      });
    expect(define).toThrow(ValidationError);
    expect(define).toThrow(/step must not be zero/);
  });

  it('rejects a non-integer initial count', () => {
    expect(() =>
      getMethod({
        url: '/items',
        countable: { target: 'query', paramName: 'page', initialCount: 1.5, step: 1, limit: () => true },
      })
    ).toThrow(/Invalid countable spec/);
  });

  it('accepts a negative step', () => {
    const method = getMethod({
      url: '/items',
      countable: { target: 'query', paramName: 'offset', initialCount: 100, step: -10, limit: () => true },
    });
    expect(method.countable?.step).toBe(-10);
  });
});

describe('MethodRegistry', () => {
  it('resolves built-in kinds', () => {
    const registry = new MethodRegistry();
    expect(registry.resolve({ kind: 'get' })).toEqual({ verb: 'GET', bodyEncoding: 'none' });
    expect(registry.resolve({ kind: 'post' })).toEqual({ verb: 'POST', bodyEncoding: 'form' });
    expect(registry.resolve({ kind: 'jsonPut' })).toEqual({ verb: 'PUT', bodyEncoding: 'json' });
    expect(registry.resolveVerb({ kind: 'delete' })).toBe('DELETE');
  });

  it('binds every built-in kind', () => {
    expect(builtinBinding('jsonPost')).toEqual({ verb: 'POST', bodyEncoding: 'json' });
    expect(builtinBinding('put')).toEqual({ verb: 'PUT', bodyEncoding: 'form' });
    expect(isMethodKind('jsonPost')).toBe(true);
    expect(isMethodKind('patch')).toBe(false);
  });

  it('resolves registered custom kinds', () => {
    const registry = new MethodRegistry().register('custom:search', { verb: 'POST', bodyEncoding: 'json' });
    expect(registry.has('custom:search')).toBe(true);
    expect(registry.resolve(customMethod('custom:search', { url: '/search' }))).toEqual({
      verb: 'POST',
      bodyEncoding: 'json',
    });
  });

  it('throws UnknownMethodError for unregistered kinds', () => {
    const registry = new MethodRegistry();
    expect(registry.has('custom:missing')).toBe(false);
    expect(() => registry.resolve({ kind: 'custom:missing' })).toThrow(UnknownMethodError);
    expect(() => registry.resolve({ kind: 'patch' })).toThrow("Method kind 'patch' is not registered");
  });
});

import { describe, it, expect } from 'vitest';
import { RequestDescriptor } from '../request-descriptor.js';
import { MissingBodyError, UrlNotSetError } from '../../errors/index.js';

const FORM = 'application/x-www-form-urlencoded';

describe('RequestDescriptor', () => {
  describe('url slots', () => {
    it('getUrl prefers the relative url', () => {
      const descriptor = new RequestDescriptor({
        method: 'GET',
        relativeUrl: '/items',
        absoluteUrl: 'https://other.example.com/items',
      });
      expect(descriptor.getUrl()).toBe('/items');
    });

    it('resolveUrl prefers the absolute url over base + relative', () => {
      const descriptor = new RequestDescriptor({
        method: 'GET',
        baseUrl: 'https://api.example.com',
        relativeUrl: '/items',
        absoluteUrl: 'https://other.example.com/items',
      });
      expect(descriptor.resolveUrl()).toBe('https://other.example.com/items');
    });

    it('setUrl replaces the configured slot and leaves the original untouched', () => {
      const original = new RequestDescriptor({ method: 'GET', absoluteUrl: 'https://api.example.com/a' });
      const changed = original.setUrl('https://api.example.com/b');

      expect(changed.absoluteUrl).toBe('https://api.example.com/b');
      expect(changed.relativeUrl).toBeNull();
      expect(original.absoluteUrl).toBe('https://api.example.com/a');
    });

    it('throws UrlNotSetError when neither slot is set', () => {
      const descriptor = new RequestDescriptor({ method: 'GET', baseUrl: 'https://api.example.com' });
      expect(() => descriptor.getUrl()).toThrow(UrlNotSetError);
      expect(() => descriptor.setUrl('/x')).toThrow(UrlNotSetError);
      expect(() => descriptor.build()).toThrow(UrlNotSetError);
    });
  });

  describe('query', () => {
    it('appends encoded pairs in order', () => {
      const url = new RequestDescriptor({ method: 'GET', baseUrl: 'https://api.example.com', relativeUrl: '/items' })
        .withQuery('page', '1')
        .withQuery('tag', 'a b')
        .withQuery('page', '2')
        .resolveUrl();
      expect(url).toBe('https://api.example.com/items?page=1&tag=a+b&page=2');
    });

    it('extends a url that already has a query string', () => {
      const url = new RequestDescriptor({ method: 'GET', absoluteUrl: 'https://api.example.com/items?sort=asc' })
        .withQuery('page', '2')
        .resolveUrl();
      expect(url).toBe('https://api.example.com/items?sort=asc&page=2');
    });
  });

  describe('headers', () => {
    it('replaces a header regardless of case', () => {
      const descriptor = new RequestDescriptor({ method: 'GET', relativeUrl: '/' })
        .withHeader('X-Trace', '1')
        .withHeader('Accept', 'text/plain')
        .withHeader('x-trace', '2');
      expect(descriptor.headers).toEqual([
        ['Accept', 'text/plain'],
        ['x-trace', '2'],
      ]);
    });
  });

  describe('build', () => {
    it('drops the body for GET', () => {
      const built = new RequestDescriptor({ method: 'GET', baseUrl: 'https://api.example.com', relativeUrl: '/items' })
        .withBody({ contentType: FORM, data: 'a=1' })
        .build();
      expect(built).toEqual({ method: 'GET', url: 'https://api.example.com/items', headers: {} });
    });

    it('drops the body for DELETE', () => {
      const built = new RequestDescriptor({ method: 'DELETE', absoluteUrl: 'https://api.example.com/items/1' })
        .withBody({ contentType: FORM, data: 'a=1' })
        .build();
      expect(built.body).toBeUndefined();
    });

    it('rejects POST and PUT without a body', () => {
      const post = new RequestDescriptor({ method: 'POST', relativeUrl: '/items' });
      const put = new RequestDescriptor({ method: 'PUT', relativeUrl: '/items' });
      expect(() => post.build()).toThrow(MissingBodyError);
      expect(() => post.build()).toThrow("Can't send POST without body");
      expect(() => put.build()).toThrow("Can't send PUT without body");
    });

    it('adds Content-Type from the body', () => {
      const built = new RequestDescriptor({ method: 'POST', baseUrl: 'https://api.example.com', relativeUrl: '/items' })
        .withBody({ contentType: FORM, data: 'name=box' })
        .build();
      expect(built).toEqual({
        method: 'POST',
        url: 'https://api.example.com/items',
        headers: { 'Content-Type': FORM },
        body: { contentType: FORM, data: 'name=box' },
      });
    });

    it('keeps an explicit content-type header', () => {
      const built = new RequestDescriptor({ method: 'PUT', relativeUrl: '/items/1' })
        .withHeader('content-type', 'text/plain')
        .withBody({ contentType: FORM, data: 'name=box' })
        .build();
      expect(built.headers).toEqual({ 'content-type': 'text/plain' });
    });

    it('withMethod switches the body rule', () => {
      const post = new RequestDescriptor({ method: 'POST', relativeUrl: '/items' }).withBody({ contentType: FORM, data: 'a=1' });
      expect(post.withMethod('DELETE').build()).toEqual({ method: 'DELETE', url: '/items', headers: {} });
      expect(post.method).toBe('POST');
    });

    it('is deterministic for the same descriptor', () => {
      const descriptor = new RequestDescriptor({ method: 'GET', relativeUrl: '/a' }).withQuery('q', '1');
      expect(descriptor.build()).toEqual(descriptor.build());
    });
  });
});

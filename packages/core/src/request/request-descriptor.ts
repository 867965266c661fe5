/**
 * Request Descriptor
 *
 * Immutable description of one request: verb, URL slots, headers, query and body.
 * Every modifier returns a new descriptor, so a descriptor can be folded through
 * a chain of params modifications without aliasing.
 */

import type { BuiltRequest, RequestBody, Verb } from '../interfaces/http-engine.js';
import { MissingBodyError, UnknownMethodError, UrlNotSetError } from '../errors/index.js';

export type HeaderPair = readonly [name: string, value: string];
export type QueryPair = readonly [key: string, value: string];

export interface RequestDescriptorInit {
  method: Verb;
  /** Prefix for the relative url; ignored when an absolute url is set */
  baseUrl?: string;
  relativeUrl?: string | null;
  absoluteUrl?: string | null;
  body?: RequestBody | null;
  headers?: ReadonlyArray<HeaderPair>;
  query?: ReadonlyArray<QueryPair>;
}

export class RequestDescriptor {
  readonly method: Verb;
  readonly baseUrl: string;
  readonly relativeUrl: string | null;
  readonly absoluteUrl: string | null;
  readonly body: RequestBody | null;
  readonly headers: ReadonlyArray<HeaderPair>;
  readonly query: ReadonlyArray<QueryPair>;

  constructor(init: RequestDescriptorInit) {
    this.method = init.method;
    this.baseUrl = init.baseUrl ?? '';
    this.relativeUrl = init.relativeUrl ?? null;
    this.absoluteUrl = init.absoluteUrl ?? null;
    this.body = init.body ?? null;
    this.headers = init.headers ?? [];
    this.query = init.query ?? [];
  }

  private copy(changes: Partial<RequestDescriptorInit>): RequestDescriptor {
    return new RequestDescriptor({
      method: this.method,
      baseUrl: this.baseUrl,
      relativeUrl: this.relativeUrl,
      absoluteUrl: this.absoluteUrl,
      body: this.body,
      headers: this.headers,
      query: this.query,
      ...changes,
    });
  }

  /**
   * The configured url: relative if present, otherwise absolute
   * @throws UrlNotSetError when neither slot is set
   */
  getUrl(): string {
    if (this.relativeUrl !== null) return this.relativeUrl;
    if (this.absoluteUrl !== null) return this.absoluteUrl;
    throw new UrlNotSetError();
  }

  /**
   * Replace the url in whichever slot was configured at construction
   * @throws UrlNotSetError when neither slot is active
   */
  setUrl(value: string): RequestDescriptor {
    if (this.relativeUrl !== null) return this.copy({ relativeUrl: value });
    if (this.absoluteUrl !== null) return this.copy({ absoluteUrl: value });
    throw new UrlNotSetError();
  }

  withMethod(method: Verb): RequestDescriptor {
    return this.copy({ method });
  }

  /**
   * Set a header, replacing any existing header with the same name (case-insensitive)
   */
  withHeader(name: string, value: string): RequestDescriptor {
    const lower = name.toLowerCase();
    const kept = this.headers.filter(([n]) => n.toLowerCase() !== lower);
    return this.copy({ headers: [...kept, [name, value]] });
  }

  /**
   * Append a query parameter; repeated keys are kept in order
   */
  withQuery(key: string, value: string): RequestDescriptor {
    return this.copy({ query: [...this.query, [key, value]] });
  }

  withBody(body: RequestBody | null): RequestDescriptor {
    return this.copy({ body });
  }

  /**
   * Final URL: absolute url if set, else baseUrl + relativeUrl, plus the encoded query
   */
  resolveUrl(): string {
    let url: string;
    if (this.absoluteUrl !== null) url = this.absoluteUrl;
    else if (this.relativeUrl !== null) url = `${this.baseUrl}${this.relativeUrl}`;
    else throw new UrlNotSetError();

    if (this.query.length === 0) return url;
    const qs = new URLSearchParams(this.query.map(([k, v]): [string, string] => [k, v])).toString();
    return `${url}${url.includes('?') ? '&' : '?'}${qs}`;
  }

  /**
   * Produce the engine-native request. Does not execute anything.
   * @throws UrlNotSetError when no url slot is set
   * @throws MissingBodyError for POST/PUT without a body
   */
  build(): BuiltRequest {
    const url = this.resolveUrl();
    const headers: Record<string, string> = {};
    for (const [name, value] of this.headers) headers[name] = value;

    switch (this.method) {
      case 'GET':
      case 'DELETE':
        return { method: this.method, url, headers };
      case 'POST':
      case 'PUT': {
        if (this.body === null) throw new MissingBodyError(this.method);
        const hasContentType = Object.keys(headers).some((n) => n.toLowerCase() === 'content-type');
        if (!hasContentType) headers['Content-Type'] = this.body.contentType;
        return { method: this.method, url, headers, body: this.body };
      }
      default:
        return unreachableVerb(this.method);
    }
  }
}

function unreachableVerb(verb: never): never {
  throw new UnknownMethodError(String(verb));
}

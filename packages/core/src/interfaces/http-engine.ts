/**
 * HTTP verbs understood by the framework.
 * JSON variants are not verbs; they are method kinds bound to POST/PUT.
 */
export type Verb = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Request body, already encoded
 */
export interface RequestBody {
  /**
   * Value sent as Content-Type unless the request sets one explicitly
   */
  readonly contentType: string;

  /**
   * Encoded payload (form string, JSON string or raw bytes)
   */
  readonly data: string | Uint8Array;
}

/**
 * Engine-native request produced by RequestDescriptor.build()
 *
 * GET and DELETE requests never carry a body.
 */
export interface BuiltRequest {
  readonly method: Verb;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: RequestBody;
}

/**
 * Standardized engine response
 *
 * Every HttpEngine implementation (axios, fetch, custom) normalizes to this shape.
 * Non-2xx statuses are responses, not errors; only transport failures reject.
 */
export interface EngineResponse {
  /**
   * HTTP status code (e.g., 200, 404, 500)
   */
  status: number;

  statusText: string;

  /**
   * Response headers (lower-case keys, repeated headers such as set-cookie as arrays)
   */
  headers: Record<string, string | string[]>;

  /**
   * Raw response body; empty when the server sent none
   */
  body: Uint8Array;
}

/**
 * HttpEngine interface
 * The wrapped HTTP implementation. It owns connections, TLS, redirects and timeouts;
 * the framework only asks it to execute one built request.
 */
export interface HttpEngine {
  /**
   * Execute a single round trip
   * @throws TransportError when no response could be obtained
   */
  execute(request: BuiltRequest): Promise<EngineResponse>;
}

/**
 * Higher-order function that decorates an engine (tracing, caching, ...)
 */
export type EngineWrapper = (engine: HttpEngine) => HttpEngine;

import type { BuiltRequest } from './http-engine.js';
import type { ClientResponse } from '../http/response.js';

/**
 * RequestProcessor
 * Pre-send hook applied by Client.processAndSend (skipped by Client.send(request)).
 * Returns the request to send; processors run in registration order.
 */
export interface RequestProcessor {
  process(request: BuiltRequest): BuiltRequest | Promise<BuiltRequest>;
}

/**
 * ResponseProcessor
 * Post-receive hook applied to every response the client gets back.
 * Throwing rejects the call that produced the response.
 */
export interface ResponseProcessor {
  process(response: ClientResponse): void | Promise<void>;
}

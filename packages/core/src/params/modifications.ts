/**
 * Params modifications
 *
 * A modification folds one named params bag into a request descriptor.
 * The processor applies them in params order:
 *   descriptor = entries(namedParams).reduce(applyOne, initial)
 */

import type { Params, NamedParams } from './params.js';
import type { RequestDescriptor } from '../request/request-descriptor.js';
import type { BodyEncoding } from '../request/method-registry.js';
import { KeyNotFoundError } from '../errors/index.js';

export type Modification = (params: Params, descriptor: RequestDescriptor) => RequestDescriptor;

export type Modifications = ReadonlyMap<string, Modification>;

/**
 * Names of the params bags understood by the default modifications
 */
export const ParamNames = {
  QUERY: 'query',
  HEADERS: 'headers',
  BODY: 'body',
} as const;

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';
export const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';

export function applyQuery(params: Params, descriptor: RequestDescriptor): RequestDescriptor {
  let next = descriptor;
  for (const [key, value] of params) next = next.withQuery(key, value);
  return next;
}

export function applyHeaders(params: Params, descriptor: RequestDescriptor): RequestDescriptor {
  let next = descriptor;
  for (const [name, value] of params) next = next.withHeader(name, value);
  return next;
}

export function formBody(params: Params): string {
  return new URLSearchParams(Array.from(params, ([k, v]): [string, string] => [k, v])).toString();
}

export function jsonBody(params: Params): string {
  return JSON.stringify(params.toRecord());
}

/**
 * Body modification for the given encoding. Methods without a body policy
 * still get a form body; the verb's build rule drops it for GET/DELETE.
 */
export function bodyModification(encoding: BodyEncoding): Modification {
  if (encoding === 'json') {
    return (params, descriptor) =>
      descriptor.withBody({ contentType: JSON_CONTENT_TYPE, data: jsonBody(params) });
  }
  return (params, descriptor) =>
    descriptor.withBody({ contentType: FORM_CONTENT_TYPE, data: formBody(params) });
}

export function defaultModifications(encoding: BodyEncoding): Modifications {
  return new Map<string, Modification>([
    [ParamNames.QUERY, applyQuery],
    [ParamNames.HEADERS, applyHeaders],
    [ParamNames.BODY, bodyModification(encoding)],
  ]);
}

/**
 * Fold every named params bag into the descriptor
 * @throws KeyNotFoundError when a bag has no modification
 */
export function applyModifications(
  initial: RequestDescriptor,
  namedParams: NamedParams,
  modifications: Modifications
): RequestDescriptor {
  return Object.entries(namedParams).reduce((descriptor, [name, params]) => {
    const modify = modifications.get(name);
    if (!modify) throw new KeyNotFoundError(name, 'params modifications');
    return modify(params, descriptor);
  }, initial);
}

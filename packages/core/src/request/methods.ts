/**
 * Method definitions
 * Declarative description of one logical endpoint: kind, url, response mapper
 * and an optional countable (paginated) parameter.
 */

import { z } from 'zod';
import type { ClientResponse } from '../http/response.js';
import type { CustomMethodKind, MethodKind } from './method-registry.js';
import { UrlNotSetError, ValidationError } from '../errors/index.js';

/**
 * Converts a raw response into a domain value
 */
export type ResponseMapper<T> = (response: ClientResponse) => T;

/**
 * Decides whether the paginated loop stops. Returning true stops the loop and
 * the response that triggered the stop is discarded.
 */
export type LimitPredicate = (count: number, response: ClientResponse) => boolean;

export interface CountableSpec {
  /** Name of the params bag holding the cursor, e.g. "query" */
  target: string;
  /** Key of the cursor entry inside that bag, e.g. "page" */
  paramName: string;
  initialCount: number;
  step: number;
  limit: LimitPredicate;
}

export interface MethodDefinition<T = unknown> {
  readonly kind: MethodKind | CustomMethodKind;
  /** Relative url, appended to the client's base url */
  readonly url?: string;
  /** Absolute url used instead of base url + url */
  readonly customUrl?: string;
  readonly responseMapper?: ResponseMapper<T>;
  readonly countable?: CountableSpec;
}

export type MethodOptions<T = unknown> = Omit<MethodDefinition<T>, 'kind'>;

const CountableSpecSchema = z.object({
  target: z.string().min(1),
  paramName: z.string().min(1),
  initialCount: z.number().int(),
  step: z.number().int().refine((step) => step !== 0, 'step must not be zero'),
  limit: z.custom<LimitPredicate>((value) => typeof value === 'function', 'limit must be a function'),
});

/**
 * Validate and freeze a method definition
 * @throws UrlNotSetError when neither url nor customUrl is given
 * @throws ValidationError when both are given or the countable spec is malformed
 */
export function defineMethod<T = unknown>(
  kind: MethodKind | CustomMethodKind,
  options: MethodOptions<T>
): MethodDefinition<T> {
  const hasUrl = options.url !== undefined;
  const hasCustomUrl = options.customUrl !== undefined;

  if (!hasUrl && !hasCustomUrl) {
    throw new UrlNotSetError();
  }
  if (hasUrl && hasCustomUrl) {
    throw new ValidationError('Method definition must set either url or customUrl, not both', {
      url: options.url,
      customUrl: options.customUrl,
    });
  }

  if (options.countable) {
    const parsed = CountableSpecSchema.safeParse(options.countable);
    if (!parsed.success) {
      throw new ValidationError(`Invalid countable spec: ${parsed.error.message}`, {
        issues: parsed.error.issues,
      });
    }
  }

  return Object.freeze({ kind, ...options });
}

export function getMethod<T = unknown>(options: MethodOptions<T>): MethodDefinition<T> {
  return defineMethod('get', options);
}

export function postMethod<T = unknown>(options: MethodOptions<T>): MethodDefinition<T> {
  return defineMethod('post', options);
}

export function putMethod<T = unknown>(options: MethodOptions<T>): MethodDefinition<T> {
  return defineMethod('put', options);
}

export function deleteMethod<T = unknown>(options: MethodOptions<T>): MethodDefinition<T> {
  return defineMethod('delete', options);
}

export function jsonPostMethod<T = unknown>(options: MethodOptions<T>): MethodDefinition<T> {
  return defineMethod('jsonPost', options);
}

export function jsonPutMethod<T = unknown>(options: MethodOptions<T>): MethodDefinition<T> {
  return defineMethod('jsonPut', options);
}

/**
 * Definition for a kind registered with MethodRegistry.register
 */
export function customMethod<T = unknown>(kind: CustomMethodKind, options: MethodOptions<T>): MethodDefinition<T> {
  return defineMethod(kind, options);
}

import type { Verb } from '../interfaces/http-engine.js';
import { UnknownMethodError } from '../errors/index.js';

/**
 * Built-in method kinds. JSON variants bind to POST/PUT with a JSON body.
 */
export type MethodKind = 'get' | 'post' | 'put' | 'delete' | 'jsonPost' | 'jsonPut';

/**
 * Kinds added through MethodRegistry.register are namespaced so they can never
 * shadow a built-in kind.
 */
export type CustomMethodKind = `custom:${string}`;

export type BodyEncoding = 'none' | 'form' | 'json';

export interface MethodBinding {
  verb: Verb;
  bodyEncoding: BodyEncoding;
}

export const METHOD_KINDS: readonly MethodKind[] = ['get', 'post', 'put', 'delete', 'jsonPost', 'jsonPut'];

export function isMethodKind(kind: string): kind is MethodKind {
  const kinds: readonly string[] = METHOD_KINDS;
  return kinds.includes(kind);
}

/**
 * Verb and body policy of a built-in kind. Adding a kind to MethodKind fails
 * to compile until it is handled here.
 */
export function builtinBinding(kind: MethodKind): MethodBinding {
  switch (kind) {
    case 'get':
      return { verb: 'GET', bodyEncoding: 'none' };
    case 'delete':
      return { verb: 'DELETE', bodyEncoding: 'none' };
    case 'post':
      return { verb: 'POST', bodyEncoding: 'form' };
    case 'put':
      return { verb: 'PUT', bodyEncoding: 'form' };
    case 'jsonPost':
      return { verb: 'POST', bodyEncoding: 'json' };
    case 'jsonPut':
      return { verb: 'PUT', bodyEncoding: 'json' };
    default:
      return unknownKind(kind);
  }
}

function unknownKind(kind: never): never {
  throw new UnknownMethodError(String(kind));
}

/**
 * MethodRegistry
 * Resolves a method definition's kind to its verb and body policy.
 */
export class MethodRegistry {
  private readonly custom = new Map<CustomMethodKind, MethodBinding>();

  register(kind: CustomMethodKind, binding: MethodBinding): this {
    this.custom.set(kind, { ...binding });
    return this;
  }

  has(kind: string): boolean {
    return isMethodKind(kind) || (isCustomKind(kind) && this.custom.has(kind));
  }

  /**
   * @throws UnknownMethodError for kinds that are neither built in nor registered
   */
  resolve(definition: { kind: string }): MethodBinding {
    const { kind } = definition;
    if (isMethodKind(kind)) return builtinBinding(kind);

    const binding = isCustomKind(kind) ? this.custom.get(kind) : undefined;
    if (!binding) throw new UnknownMethodError(kind);
    return binding;
  }

  resolveVerb(definition: { kind: string }): Verb {
    return this.resolve(definition).verb;
  }
}

function isCustomKind(kind: string): kind is CustomMethodKind {
  return kind.startsWith('custom:');
}

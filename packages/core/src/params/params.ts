import { KeyNotFoundError } from '../errors/index.js';

export type ParamPair = readonly [key: string, value: string];

export type ParamsInput = Iterable<ParamPair> | Readonly<Record<string, string>>;

function isPairIterable(input: ParamsInput): input is Iterable<ParamPair> {
  return Symbol.iterator in input;
}

/**
 * Params
 * Ordered key/value pairs used for query strings and form bodies.
 * Repeated keys are allowed and keep their order.
 */
export class Params implements Iterable<ParamPair> {
  protected readonly pairs: Array<[string, string]> = [];

  constructor(input: ParamsInput = []) {
    const source = isPairIterable(input) ? input : Object.entries(input);
    for (const [key, value] of source) this.pairs.push([key, value]);
  }

  /**
   * Key comparison; HeaderParams overrides it to ignore case
   */
  protected matches(a: string, b: string): boolean {
    return a === b;
  }

  protected get containerName(): string {
    return 'params';
  }

  get size(): number {
    return this.pairs.length;
  }

  has(key: string): boolean {
    return this.pairs.some(([k]) => this.matches(k, key));
  }

  get(key: string): string | undefined {
    return this.pairs.find(([k]) => this.matches(k, key))?.[1];
  }

  add(key: string, value: string): this {
    this.pairs.push([key, value]);
    return this;
  }

  /**
   * Replace the value of the first entry with this key
   * @throws KeyNotFoundError when no entry has the key
   */
  replace(key: string, value: string): this {
    const entry = this.pairs.find(([k]) => this.matches(k, key));
    if (!entry) throw new KeyNotFoundError(key, this.containerName);
    entry[1] = value;
    return this;
  }

  clone(): Params {
    return new Params(this.pairs);
  }

  /**
   * Plain object view; for repeated keys the last value wins
   */
  toRecord(): Record<string, string> {
    return Object.fromEntries(this.pairs);
  }

  [Symbol.iterator](): Iterator<ParamPair> {
    return this.pairs.map(([k, v]): ParamPair => [k, v])[Symbol.iterator]();
  }
}

/**
 * HeaderParams
 * Header flavour of Params: keys match case-insensitively
 */
export class HeaderParams extends Params {
  protected override matches(a: string, b: string): boolean {
    return a.toLowerCase() === b.toLowerCase();
  }

  protected override get containerName(): string {
    return 'headers';
  }

  override clone(): HeaderParams {
    return new HeaderParams(this.pairs);
  }
}

/**
 * Named params bags passed to a params processor, e.g. { query, headers, body }.
 * Insertion order is the order modifications are applied in.
 */
export type NamedParams = Readonly<Record<string, Params>>;

export function cloneNamedParams(namedParams: NamedParams): Record<string, Params> {
  const copy: Record<string, Params> = {};
  for (const [name, params] of Object.entries(namedParams)) copy[name] = params.clone();
  return copy;
}

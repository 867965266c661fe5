import type { BuiltRequest, EngineResponse } from '../interfaces/http-engine.js';
import { SessionInterruptedError } from '../errors/index.js';

/**
 * ClientResponse
 * Raw response handle returned by the client facade and passed to limit
 * predicates, response mappers and response processors.
 * The body is fully buffered, so it can be read any number of times.
 */
export class ClientResponse {
  private decoded?: string;

  constructor(
    readonly request: BuiltRequest,
    private readonly raw: EngineResponse
  ) {}

  get status(): number {
    return this.raw.status;
  }

  get statusText(): string {
    return this.raw.statusText;
  }

  /**
   * True for 2xx statuses
   */
  get ok(): boolean {
    return this.raw.status >= 200 && this.raw.status < 300;
  }

  get headers(): Readonly<Record<string, string | string[]>> {
    return this.raw.headers;
  }

  get body(): Uint8Array {
    return this.raw.body;
  }

  /**
   * All values of a header, matched case-insensitively
   */
  headerValues(name: string): string[] {
    const wanted = name.toLowerCase();
    const values: string[] = [];
    for (const [key, value] of Object.entries(this.raw.headers)) {
      if (key.toLowerCase() !== wanted) continue;
      if (Array.isArray(value)) values.push(...value);
      else values.push(value);
    }
    return values;
  }

  /**
   * First value of a header, matched case-insensitively
   */
  header(name: string): string | undefined {
    return this.headerValues(name)[0];
  }

  text(): string {
    if (this.decoded === undefined) {
      this.decoded = Buffer.from(this.raw.body).toString('utf8');
    }
    return this.decoded;
  }

  /**
   * Parse the body as JSON
   * @throws SyntaxError when the body is not valid JSON
   */
  json(): unknown {
    return JSON.parse(this.text());
  }

  /**
   * True when the body is missing or whitespace only
   */
  isEmpty(): boolean {
    return this.raw.body.length === 0 || this.text().trim() === '';
  }

  /**
   * Assert the response still belongs to an authorized session.
   * A string check passes when the body contains it; a function check is called with the body text.
   * @throws SessionInterruptedError when the body is empty or the check fails
   */
  ensureAuthorized(check: string | ((body: string) => boolean)): this {
    if (this.isEmpty()) {
      throw new SessionInterruptedError("Is unauthorized", this.status);
    }

    const body = this.text();
    const authorized = typeof check === 'string' ? body.includes(check) : check(body);
    if (!authorized) {
      throw new SessionInterruptedError("Is unauthorized", this.status);
    }

    return this;
  }
}

/**
 * Mapper used when a method definition has none:
 * empty body -> null, JSON body -> parsed value, anything else -> text
 */
export function defaultResponseMapper(response: ClientResponse): unknown {
  if (response.isEmpty()) return null;
  const text = response.text();
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

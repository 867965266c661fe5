/**
 * Client
 *
 * Facade over an HttpEngine. Simple verb calls build one descriptor and return
 * the raw response; send(expected, method, params) runs a params processor and
 * returns every mapped result.
 *
 * Every execution goes through the same pipeline:
 *   cookies -> engine -> Set-Cookie -> response processors
 * processAndSend additionally applies the User-Agent and the request processors.
 */

import type { z } from 'zod';
import type { BuiltRequest, HttpEngine, Verb } from '../interfaces/http-engine.js';
import type { Logger } from '../interfaces/logger.js';
import type { StorageProvider } from '../interfaces/storage.js';
import { ClientResponse, defaultResponseMapper } from '../http/response.js';
import { RequestDescriptor } from '../request/request-descriptor.js';
import { MethodRegistry, builtinBinding, type MethodBinding } from '../request/method-registry.js';
import type { MethodDefinition, ResponseMapper } from '../request/methods.js';
import { HeaderParams, Params, type NamedParams, type ParamsInput } from '../params/params.js';
import {
  JSON_CONTENT_TYPE,
  ParamNames,
  applyModifications,
  defaultModifications,
} from '../params/modifications.js';
import type { ParamsProcessor, RequestSender } from '../processor/params-processor.js';
import { SingleParamsProcessor } from '../processor/single-params-processor.js';
import { CountableParamsProcessor } from '../processor/countable-params-processor.js';
import type { ResponseConsumer } from '../processor/response-consumer.js';
import { ValidationError } from '../errors/index.js';
import { errorToLog } from '../utils/logging.js';
import type { ClientCookieHandler } from './cookie-handler.js';
import { ProcessorStore } from './processor-store.js';

export const DEFAULT_USER_AGENT = 'httpframe/0.1';

export interface ClientOptions {
  engine: HttpEngine;
  cookieHandler: ClientCookieHandler;
  storage: StorageProvider;
  baseUrl?: string;
  userAgent?: string;
  processorStore?: ProcessorStore;
  registry?: MethodRegistry;
  logger?: Logger;
}

export type ParamsArg = Params | ParamsInput;

function toParams(input: ParamsArg | undefined): Params {
  if (input instanceof Params) return input;
  return new Params(input);
}

function toHeaders(input: ParamsArg | undefined): HeaderParams {
  if (input instanceof HeaderParams) return input;
  return new HeaderParams(input);
}

/**
 * Named params for a body call; without a body the descriptor keeps none and build() rejects it
 */
function withBody(body: ParamsArg | undefined, namedParams: NamedParams): NamedParams {
  return body === undefined ? namedParams : { ...namedParams, [ParamNames.BODY]: toParams(body) };
}

function withRequestHeader(request: BuiltRequest, name: string, value: string): BuiltRequest {
  const lower = name.toLowerCase();
  const headers: Record<string, string> = {};
  for (const [key, existing] of Object.entries(request.headers)) {
    if (key.toLowerCase() !== lower) headers[key] = existing;
  }
  headers[name] = value;
  return { ...request, headers };
}

function findHeader(request: BuiltRequest, name: string): string | undefined {
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(request.headers)) {
    if (key.toLowerCase() === lower) return value;
  }
  return undefined;
}

function isSchema<S extends z.ZodType>(arg: BuiltRequest | S): arg is S {
  return 'safeParse' in arg;
}

export class Client implements RequestSender {
  private baseUrl: string;
  private userAgent: string;
  private readonly engine: HttpEngine;
  private readonly cookieHandler: ClientCookieHandler;
  private readonly storage: StorageProvider;
  private readonly processorStore: ProcessorStore;
  private readonly registry: MethodRegistry;
  private readonly logger?: Logger;

  constructor(opts: ClientOptions) {
    this.engine = opts.engine;
    this.cookieHandler = opts.cookieHandler;
    this.storage = opts.storage;
    this.baseUrl = opts.baseUrl ?? '';
    this.userAgent = opts.userAgent ?? DEFAULT_USER_AGENT;
    this.processorStore = opts.processorStore ?? new ProcessorStore();
    this.registry = opts.registry ?? new MethodRegistry();
    this.logger = opts.logger;
  }

  get coreEngine(): HttpEngine {
    return this.engine;
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  /**
   * Affects requests built after the call, including later iterations of a running processor
   */
  changeBaseUrl(baseUrl: string): this {
    this.baseUrl = baseUrl;
    return this;
  }

  getUserAgent(): string {
    return this.userAgent;
  }

  withUserAgent(agent: string = DEFAULT_USER_AGENT): this {
    this.userAgent = agent;
    return this;
  }

  getCookieHandler(): ClientCookieHandler {
    return this.cookieHandler;
  }

  getProcessorStore(): ProcessorStore {
    return this.processorStore;
  }

  getStorageProvider(): StorageProvider {
    return this.storage;
  }

  getMethodRegistry(): MethodRegistry {
    return this.registry;
  }

  async get(url = '', customUrl?: string, query?: ParamsArg, headers?: ParamsArg): Promise<ClientResponse> {
    return this.simple('get', url, customUrl, {
      [ParamNames.QUERY]: toParams(query),
      [ParamNames.HEADERS]: toHeaders(headers),
    });
  }

  async delete(url = '', customUrl?: string, query?: ParamsArg, headers?: ParamsArg): Promise<ClientResponse> {
    return this.simple('delete', url, customUrl, {
      [ParamNames.QUERY]: toParams(query),
      [ParamNames.HEADERS]: toHeaders(headers),
    });
  }

  /**
   * POST a form-encoded body
   * @throws MissingBodyError when no body is given
   */
  async post(url = '', customUrl?: string, body?: ParamsArg, headers?: ParamsArg): Promise<ClientResponse> {
    return this.simple('post', url, customUrl, withBody(body, { [ParamNames.HEADERS]: toHeaders(headers) }));
  }

  /**
   * PUT a form-encoded body
   * @throws MissingBodyError when no body is given
   */
  async put(url = '', customUrl?: string, body?: ParamsArg, headers?: ParamsArg): Promise<ClientResponse> {
    return this.simple('put', url, customUrl, withBody(body, { [ParamNames.HEADERS]: toHeaders(headers) }));
  }

  /**
   * POST a JSON document given as a string
   * @throws MissingBodyError when no document is given
   */
  async jsonPost(url = '', customUrl?: string, json?: string, headers?: ParamsArg): Promise<ClientResponse> {
    return this.json('POST', url, customUrl, json, headers);
  }

  async jsonPut(url = '', customUrl?: string, json?: string, headers?: ParamsArg): Promise<ClientResponse> {
    return this.json('PUT', url, customUrl, json, headers);
  }

  /**
   * send(request): execute an already built request as is. Request processors
   * and the User-Agent are skipped; cookies and response processors still apply.
   *
   * send(expected, method, params): run the method through a params processor
   * and validate every mapped result against `expected`.
   */
  send(request: BuiltRequest): Promise<ClientResponse>;
  send<S extends z.ZodType>(
    expected: S,
    method: MethodDefinition,
    namedParams?: NamedParams
  ): Promise<ResponseConsumer<z.output<S>>>;
  async send<S extends z.ZodType>(
    arg: BuiltRequest | S,
    method?: MethodDefinition,
    namedParams: NamedParams = {}
  ): Promise<ClientResponse | ResponseConsumer<z.output<S>>> {
    if (!isSchema(arg)) return this.execute(arg);
    if (!method) {
      throw new ValidationError('send(expected, method) requires a method definition');
    }
    return this.createProcessor(arg, method).process(namedParams);
  }

  /**
   * Processor for a method definition, so the caller can interrupt() it.
   * Countable definitions get the paginated loop, the rest a single round trip.
   * @throws UnknownMethodError when the definition's kind is not registered
   */
  createProcessor<S extends z.ZodType>(expected: S, method: MethodDefinition): ParamsProcessor<z.output<S>> {
    const binding = this.registry.resolve(method);
    const mapper = this.validatingMapper(expected, method.responseMapper ?? defaultResponseMapper, binding);
    const opts = { method, binding, sender: this, mapper, logger: this.logger };

    if (method.countable) {
      return new CountableParamsProcessor({ ...opts, countable: method.countable });
    }
    return new SingleParamsProcessor(opts);
  }

  /**
   * Apply the User-Agent and the request processors, then execute
   */
  async processAndSend(request: RequestDescriptor | BuiltRequest): Promise<ClientResponse> {
    const built =
      request instanceof RequestDescriptor
        ? request.withHeader('User-Agent', this.userAgent).build()
        : withRequestHeader(request, 'User-Agent', this.userAgent);

    const processed = await this.processorStore.applyRequestProcessors(built);
    return this.execute(processed);
  }

  private async simple(
    kind: 'get' | 'delete' | 'post' | 'put',
    url: string,
    customUrl: string | undefined,
    namedParams: NamedParams
  ): Promise<ClientResponse> {
    const binding = builtinBinding(kind);
    const descriptor = applyModifications(
      this.descriptor(binding.verb, url, customUrl),
      namedParams,
      defaultModifications(binding.bodyEncoding)
    );
    return this.processAndSend(descriptor);
  }

  private async json(
    verb: Verb,
    url: string,
    customUrl: string | undefined,
    json: string | undefined,
    headers?: ParamsArg
  ): Promise<ClientResponse> {
    const initial = this.descriptor(verb, url, customUrl);
    const descriptor = applyModifications(
      json === undefined ? initial : initial.withBody({ contentType: JSON_CONTENT_TYPE, data: json }),
      { [ParamNames.HEADERS]: toHeaders(headers) },
      defaultModifications('json')
    );
    return this.processAndSend(descriptor);
  }

  private descriptor(verb: Verb, url: string, customUrl: string | undefined): RequestDescriptor {
    return new RequestDescriptor({
      method: verb,
      baseUrl: this.baseUrl,
      relativeUrl: customUrl === undefined ? url : null,
      absoluteUrl: customUrl ?? null,
    });
  }

  private validatingMapper<S extends z.ZodType>(
    expected: S,
    mapper: ResponseMapper<unknown>,
    binding: MethodBinding
  ): ResponseMapper<z.output<S>> {
    return (response) => {
      const parsed = expected.safeParse(mapper(response));
      if (!parsed.success) {
        throw new ValidationError(
          `Response of ${binding.verb} ${response.request.url} does not match the expected type`,
          { status: response.status, issues: parsed.error.issues }
        );
      }
      return parsed.data;
    };
  }

  private async execute(request: BuiltRequest): Promise<ClientResponse> {
    const withCookies = await this.attachCookies(request);
    this.logger?.debug('sending request', { method: withCookies.method, url: withCookies.url });

    try {
      const raw = await this.engine.execute(withCookies);
      const response = new ClientResponse(withCookies, raw);
      await this.cookieHandler.storeFromResponse(response);
      await this.processorStore.applyResponseProcessors(response);

      this.logger?.debug('received response', {
        method: withCookies.method,
        url: withCookies.url,
        status: response.status,
      });
      return response;
    } catch (err) {
      this.logger?.error('request failed', {
        method: withCookies.method,
        url: withCookies.url,
        error: errorToLog(err),
      });
      throw err;
    }
  }

  private async attachCookies(request: BuiltRequest): Promise<BuiltRequest> {
    const stored = await this.cookieHandler.cookieHeaderFor(request.url);
    if (stored === undefined) return request;
    const existing = findHeader(request, 'Cookie');
    return withRequestHeader(request, 'Cookie', existing ? `${existing}; ${stored}` : stored);
  }
}

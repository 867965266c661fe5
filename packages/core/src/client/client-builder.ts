import type { CookieJar } from 'tough-cookie';
import type { EngineWrapper, HttpEngine } from '../interfaces/http-engine.js';
import type { Logger } from '../interfaces/logger.js';
import type { StorageProvider } from '../interfaces/storage.js';
import type { RequestProcessor, ResponseProcessor } from '../interfaces/processors.js';
import { createAxiosEngine } from '../http/axios-engine.js';
import { MethodRegistry, type CustomMethodKind, type MethodBinding } from '../request/method-registry.js';
import { InMemoryStorageProvider } from '../stores/in-memory.js';
import { withResponseCache, type ResponseCache } from '../cache/response-cache.js';
import { composeEngineWrappers, withEngineTracing } from '../utils/engine-wrapper.js';
import { defaultLogger } from '../utils/logging.js';
import { ValidationError } from '../errors/index.js';
import {
  hasEngineOptions,
  parseClientConfig,
  resolveEnvConfig,
  totalTimeoutMs,
  type ClientConfigInput,
  type CookiePolicy,
  type ProxyConfig,
} from './config.js';
import { ClientCookieHandler } from './cookie-handler.js';
import { ProcessorStore } from './processor-store.js';
import { Client } from './client.js';

type TlsInput = NonNullable<ClientConfigInput['tls']>;

/**
 * ClientBuilder
 *
 * Collects options, validates them with ClientConfigSchema on build() and
 * assembles the engine stack:
 *   base engine (axios unless one is given) -> cache -> custom wrappers -> tracing
 *
 * Usage:
 * ```typescript
 * const client = new ClientBuilder()
 *   .baseUrl('https://api.example.com')
 *   .allTimeouts(10_000)
 *   .addRequestProcessor({ process: (req) => ({ ...req, headers: { ...req.headers, 'X-Api-Key': 'test-key' } }) })
 *   .build();
 * ```
 */
export class ClientBuilder {
  private input: ClientConfigInput = {};
  private customEngine?: HttpEngine;
  private jar?: CookieJar;
  private responseCache?: ResponseCache;
  private storage?: StorageProvider;
  private injectedLogger?: Logger;
  private traced = false;
  private readonly wrappers: EngineWrapper[] = [];
  private readonly requestProcessors: RequestProcessor[] = [];
  private readonly responseProcessors: ResponseProcessor[] = [];
  private readonly methods: Array<[CustomMethodKind, MethodBinding]> = [];

  baseUrl(baseUrl: string): this {
    this.input = { ...this.input, baseUrl };
    return this;
  }

  connectTimeout(ms: number): this {
    this.input = { ...this.input, connectTimeoutMs: ms };
    return this;
  }

  readTimeout(ms: number): this {
    this.input = { ...this.input, readTimeoutMs: ms };
    return this;
  }

  writeTimeout(ms: number): this {
    this.input = { ...this.input, writeTimeoutMs: ms };
    return this;
  }

  /**
   * Set connect, read and write timeouts at once. The engine deadline is their sum.
   */
  allTimeouts(ms: number): this {
    return this.connectTimeout(ms).readTimeout(ms).writeTimeout(ms);
  }

  proxy(proxy: ProxyConfig): this {
    this.input = { ...this.input, proxy };
    return this;
  }

  tls(tls: TlsInput): this {
    this.input = { ...this.input, tls };
    return this;
  }

  userAgent(agent: string): this {
    this.input = { ...this.input, userAgent: agent };
    return this;
  }

  cookiePolicy(policy: CookiePolicy): this {
    this.input = { ...this.input, cookiePolicy: policy };
    return this;
  }

  cookiesKey(key: string): this {
    this.input = { ...this.input, cookiesKey: key };
    return this;
  }

  cookieJar(jar: CookieJar): this {
    this.jar = jar;
    return this;
  }

  cache(cache: ResponseCache): this {
    this.responseCache = cache;
    return this;
  }

  storageProvider(storage: StorageProvider): this {
    this.storage = storage;
    return this;
  }

  /**
   * Use a custom engine instead of axios. Cannot be combined with timeouts, proxy or tls.
   */
  engine(engine: HttpEngine): this {
    this.customEngine = engine;
    return this;
  }

  addEngineWrapper(wrapper: EngineWrapper): this {
    this.wrappers.push(wrapper);
    return this;
  }

  /**
   * Log every round trip with its duration
   */
  tracing(enabled = true): this {
    this.traced = enabled;
    return this;
  }

  logger(logger: Logger): this {
    this.injectedLogger = logger;
    return this;
  }

  debug(enabled = true, fullBody = false): this {
    this.input = { ...this.input, debug: enabled, debugFullBody: fullBody };
    return this;
  }

  addRequestProcessor(processor: RequestProcessor): this {
    this.requestProcessors.push(processor);
    return this;
  }

  addResponseProcessor(processor: ResponseProcessor): this {
    this.responseProcessors.push(processor);
    return this;
  }

  registerMethod(kind: CustomMethodKind, binding: MethodBinding): this {
    this.methods.push([kind, binding]);
    return this;
  }

  /**
   * @throws ValidationError when the options are invalid or engine options are combined with a custom engine
   */
  build(env: NodeJS.ProcessEnv = process.env): Client {
    const config = parseClientConfig(this.input);
    const envConfig = resolveEnvConfig(env);
    const debug = config.debug ?? envConfig.debug;
    const debugFullBody = config.debugFullBody ?? envConfig.debugFullBody;
    const logger = this.injectedLogger ?? (debug ? defaultLogger() : undefined);

    if (this.customEngine && hasEngineOptions(config)) {
      throw new ValidationError('Timeouts, proxy and tls cannot be combined with a custom engine', {
        connectTimeoutMs: config.connectTimeoutMs,
        readTimeoutMs: config.readTimeoutMs,
        writeTimeoutMs: config.writeTimeoutMs,
        proxy: config.proxy !== undefined,
        tls: config.tls !== undefined,
      });
    }

    const base =
      this.customEngine ??
      createAxiosEngine({
        timeoutMs: totalTimeoutMs(config, envConfig),
        proxy: config.proxy,
        tls: config.tls,
        debug,
        debugFullBody,
        logger,
      });

    const wrappers: EngineWrapper[] = [];
    const cache = this.responseCache;
    if (cache) wrappers.push((engine) => withResponseCache(engine, cache));
    wrappers.push(...this.wrappers);
    if (this.traced) {
      const traceLogger = logger ?? defaultLogger();
      wrappers.push((engine) => withEngineTracing(engine, traceLogger));
    }

    const storage = this.storage ?? new InMemoryStorageProvider();
    const cookieHandler = new ClientCookieHandler({
      storage,
      jar: this.jar,
      key: config.cookiesKey,
      policy: config.cookiePolicy,
    });

    const processorStore = new ProcessorStore();
    for (const processor of this.requestProcessors) processorStore.registerRequestProcessor(processor);
    for (const processor of this.responseProcessors) processorStore.registerResponseProcessor(processor);

    const registry = new MethodRegistry();
    for (const [kind, binding] of this.methods) registry.register(kind, binding);

    return new Client({
      engine: composeEngineWrappers(base, wrappers),
      cookieHandler,
      storage,
      baseUrl: config.baseUrl,
      userAgent: config.userAgent,
      processorStore,
      registry,
      logger,
    });
  }
}

/**
 * Client with default options for a base url
 */
export function createSimpleClient(baseUrl: string): Client {
  return new ClientBuilder().baseUrl(baseUrl).build();
}

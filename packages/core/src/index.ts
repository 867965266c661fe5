// Interfaces and contracts
export * from './interfaces/index.js';

// Errors
export {
  UrlNotSetError,
  MissingBodyError,
  UnknownMethodError,
  KeyNotFoundError,
  SessionInterruptedError,
  ProcessorStoppedError,
  ValidationError,
} from './errors/index.js';
export { TransportError } from './http/errors.js';

// Requests and methods
export { RequestDescriptor, type RequestDescriptorInit, type HeaderPair, type QueryPair } from './request/request-descriptor.js';
export {
  MethodRegistry,
  METHOD_KINDS,
  isMethodKind,
  builtinBinding,
  type MethodKind,
  type CustomMethodKind,
  type BodyEncoding,
  type MethodBinding,
} from './request/method-registry.js';
export * from './request/methods.js';

// Params
export { Params, HeaderParams, cloneNamedParams, type ParamPair, type ParamsInput, type NamedParams } from './params/params.js';
export { Countable } from './params/countable.js';
export * from './params/modifications.js';

// Processing
export * from './processor/params-processor.js';
export { SingleParamsProcessor } from './processor/single-params-processor.js';
export { CountableParamsProcessor } from './processor/countable-params-processor.js';
export { ResponseConsumer, collect } from './processor/response-consumer.js';

// Client
export { Client, DEFAULT_USER_AGENT, type ClientOptions, type ParamsArg } from './client/client.js';
export { ClientBuilder, createSimpleClient } from './client/client-builder.js';
export * from './client/config.js';
export { ClientCookieHandler, createCookieJar, type CookieHandlerOptions } from './client/cookie-handler.js';
export { ProcessorStore } from './client/processor-store.js';

// Persistence
export * from './stores/index.js';
export * from './cache/response-cache.js';

// Http engines (convenience exports)
export { createAxiosEngine, type AxiosEngineOptions, type TlsOptions } from './http/axios-engine.js';
export { createFetchEngine, type FetchEngineOptions } from './http/fetch-engine.js';
export { ClientResponse, defaultResponseMapper } from './http/response.js';

// Utilities
export * from './utils/index.js';

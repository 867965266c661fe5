export type { Verb, RequestBody, BuiltRequest, EngineResponse, HttpEngine, EngineWrapper } from './http-engine.js';
export type { Logger } from './logger.js';
export type { StorageProvider } from './storage.js';
export type { RequestProcessor, ResponseProcessor } from './processors.js';

/**
 * Params Processor
 *
 * Turns a method definition plus named params into executed requests and
 * mapped results. A processor runs its loop once; interrupt() is a one-way,
 * cooperative stop read at iteration boundaries.
 */

import type { BuiltRequest } from '../interfaces/http-engine.js';
import type { Logger } from '../interfaces/logger.js';
import type { ClientResponse } from '../http/response.js';
import type { MethodDefinition, ResponseMapper } from '../request/methods.js';
import type { MethodBinding } from '../request/method-registry.js';
import type { NamedParams } from '../params/params.js';
import { RequestDescriptor } from '../request/request-descriptor.js';
import { applyModifications, defaultModifications, type Modifications } from '../params/modifications.js';
import { ProcessorStoppedError } from '../errors/index.js';
import type { ResponseConsumer } from './response-consumer.js';

/**
 * What a processor needs from the client: the current base url and a way to
 * send a request through the request processors.
 */
export interface RequestSender {
  getBaseUrl(): string;
  processAndSend(request: RequestDescriptor | BuiltRequest): Promise<ClientResponse>;
}

export type ProcessorState = 'running' | 'stopped-by-limit' | 'stopped-by-interrupt' | 'failed';

export interface ParamsProcessorOptions<T> {
  method: MethodDefinition<unknown>;
  binding: MethodBinding;
  sender: RequestSender;
  mapper: ResponseMapper<T>;
  /** Defaults to query/headers/body modifications for the binding's body encoding */
  modifications?: Modifications;
  logger?: Logger;
}

export abstract class ParamsProcessor<T> {
  protected readonly method: MethodDefinition<unknown>;
  protected readonly binding: MethodBinding;
  protected readonly sender: RequestSender;
  protected readonly mapper: ResponseMapper<T>;
  protected readonly modifications: Modifications;
  protected readonly logger?: Logger;

  private readonly controller = new AbortController();
  private currentState: ProcessorState = 'running';
  private started = false;

  constructor(opts: ParamsProcessorOptions<T>) {
    this.method = opts.method;
    this.binding = opts.binding;
    this.sender = opts.sender;
    this.mapper = opts.mapper;
    this.modifications = opts.modifications ?? defaultModifications(opts.binding.bodyEncoding);
    this.logger = opts.logger;
  }

  get state(): ProcessorState {
    return this.currentState;
  }

  /**
   * True once interrupt() was called while the processor was running
   */
  get interrupted(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Run the loop and return every mapped result in iteration order.
   * Errors from the engine, a limit predicate or the mapper propagate and
   * discard everything accumulated so far.
   */
  abstract process(namedParams: NamedParams): Promise<ResponseConsumer<T>>;

  /**
   * Same as process(), scheduled on the next macrotask.
   * Dropping the returned promise does not interrupt the loop.
   */
  processAsync(namedParams: NamedParams): Promise<ResponseConsumer<T>> {
    return new Promise((resolve, reject) => {
      setImmediate(() => {
        this.process(namedParams).then(resolve, reject);
      });
    });
  }

  /**
   * Request a stop at the next iteration boundary. Idempotent; ignored once stopped.
   */
  interrupt(): void {
    if (this.currentState !== 'running') return;
    this.controller.abort();
  }

  /**
   * Mark the loop as started
   * @throws ProcessorStoppedError when the loop already ran
   */
  protected begin(): void {
    if (this.started) throw new ProcessorStoppedError(this.currentState);
    this.started = true;
  }

  protected finish(state: Exclude<ProcessorState, 'running'>): void {
    this.currentState = state;
  }

  /**
   * Fresh descriptor for one iteration: verb and url slots from the method
   * definition, then every named params bag folded in
   */
  protected createDescriptor(namedParams: NamedParams): RequestDescriptor {
    const initial = new RequestDescriptor({
      method: this.binding.verb,
      baseUrl: this.sender.getBaseUrl(),
      relativeUrl: this.method.url ?? null,
      absoluteUrl: this.method.customUrl ?? null,
    });
    return applyModifications(initial, namedParams, this.modifications);
  }
}

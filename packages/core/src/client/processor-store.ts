import type { BuiltRequest } from '../interfaces/http-engine.js';
import type { RequestProcessor, ResponseProcessor } from '../interfaces/processors.js';
import type { ClientResponse } from '../http/response.js';

/**
 * ProcessorStore
 * Request and response hooks of one client, run in registration order.
 */
export class ProcessorStore {
  private readonly requestProcessors: RequestProcessor[] = [];
  private readonly responseProcessors: ResponseProcessor[] = [];

  registerRequestProcessor(processor: RequestProcessor): this {
    this.requestProcessors.push(processor);
    return this;
  }

  registerResponseProcessor(processor: ResponseProcessor): this {
    this.responseProcessors.push(processor);
    return this;
  }

  getRequestProcessors(): readonly RequestProcessor[] {
    return [...this.requestProcessors];
  }

  getResponseProcessors(): readonly ResponseProcessor[] {
    return [...this.responseProcessors];
  }

  async applyRequestProcessors(request: BuiltRequest): Promise<BuiltRequest> {
    let current = request;
    for (const processor of this.requestProcessors) {
      current = await processor.process(current);
    }
    return current;
  }

  async applyResponseProcessors(response: ClientResponse): Promise<void> {
    for (const processor of this.responseProcessors) {
      await processor.process(response);
    }
  }
}

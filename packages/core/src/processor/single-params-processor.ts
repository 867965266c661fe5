import type { NamedParams } from '../params/params.js';
import { ParamsProcessor } from './params-processor.js';
import { ResponseConsumer } from './response-consumer.js';

/**
 * SingleParamsProcessor
 * Methods without a countable param: one build, one round trip, one mapped result.
 */
export class SingleParamsProcessor<T> extends ParamsProcessor<T> {
  async process(namedParams: NamedParams): Promise<ResponseConsumer<T>> {
    this.begin();

    if (this.interrupted) {
      this.finish('stopped-by-interrupt');
      return ResponseConsumer.empty<T>();
    }

    try {
      const descriptor = this.createDescriptor(namedParams);
      const response = await this.sender.processAndSend(descriptor);
      const result = ResponseConsumer.of(this.mapper(response));
      this.finish('stopped-by-limit');
      return result;
    } catch (err) {
      this.finish('failed');
      throw err;
    }
  }
}

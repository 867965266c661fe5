import type { CountableSpec } from '../request/methods.js';
import { cloneNamedParams, type NamedParams } from '../params/params.js';
import { Countable } from '../params/countable.js';
import { KeyNotFoundError } from '../errors/index.js';
import { ParamsProcessor, type ParamsProcessorOptions } from './params-processor.js';
import { ResponseConsumer, collect } from './response-consumer.js';

/**
 * CountableParamsProcessor
 *
 * Paginated loop driven by a countable param. Each iteration:
 * 1. writes the current count into target[paramName] and builds a fresh descriptor
 * 2. sends it through the client (request processors apply)
 * 3. stops when limit(count, response) is true; that response is NOT mapped
 * 4. otherwise maps and keeps the response, then advances count by step
 * 5. stops before the next iteration if interrupt() was called meanwhile
 *
 * The caller's params are cloned per call, never mutated.
 */
export class CountableParamsProcessor<T> extends ParamsProcessor<T> {
  private readonly spec: CountableSpec;

  constructor(opts: ParamsProcessorOptions<T> & { countable: CountableSpec }) {
    super(opts);
    this.spec = opts.countable;
  }

  async process(namedParams: NamedParams): Promise<ResponseConsumer<T>> {
    this.begin();

    const countable = Countable.fromSpec(this.spec);
    const params = cloneNamedParams(namedParams);
    const target = params[countable.target];
    const pages: ResponseConsumer<T>[] = [];

    try {
      if (!target) throw new KeyNotFoundError(countable.target, 'named params');

      while (!this.interrupted) {
        target.replace(countable.paramName, countable.format());
        const descriptor = this.createDescriptor(params);
        const response = await this.sender.processAndSend(descriptor);

        this.logger?.debug('countable iteration', {
          param: countable.paramName,
          count: countable.count,
          status: response.status,
        });

        if (!countable.shouldContinue(response)) {
          this.finish('stopped-by-limit');
          this.logger?.info('countable loop stopped by limit', {
            param: countable.paramName,
            count: countable.count,
            results: pages.length,
          });
          return collect(pages);
        }

        pages.push(ResponseConsumer.of(this.mapper(response)));
        countable.advance();
      }
    } catch (err) {
      this.finish('failed');
      throw err;
    }

    this.finish('stopped-by-interrupt');
    this.logger?.info('countable loop interrupted', {
      param: countable.paramName,
      count: countable.count,
      results: pages.length,
    });
    return collect(pages);
  }
}

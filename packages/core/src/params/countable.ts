import type { ClientResponse } from '../http/response.js';
import type { CountableSpec, LimitPredicate } from '../request/methods.js';

/**
 * Countable
 * Cursor state of one paginated run. Created fresh for every process() call
 * from the method's CountableSpec; only the processing loop advances it.
 */
export class Countable {
  private current: number;

  constructor(
    readonly target: string,
    readonly paramName: string,
    initialCount: number,
    readonly step: number,
    private readonly limit: LimitPredicate
  ) {
    this.current = initialCount;
  }

  static fromSpec(spec: CountableSpec): Countable {
    return new Countable(spec.target, spec.paramName, spec.initialCount, spec.step, spec.limit);
  }

  get count(): number {
    return this.current;
  }

  /**
   * Value written into the params entry for the current iteration
   */
  format(): string {
    return String(this.current);
  }

  /**
   * The negation of the limit predicate: false means the loop stops here
   */
  shouldContinue(response: ClientResponse): boolean {
    return !this.limit(this.current, response);
  }

  advance(): void {
    this.current += this.step;
  }
}

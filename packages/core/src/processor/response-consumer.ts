type EntryState<T> = { resolved: true; value: T } | { resolved: false; supplier: () => T };

/**
 * One accumulated result; shared between consumers after a merge so a lazy
 * supplier runs at most once.
 */
class Entry<T> {
  constructor(private state: EntryState<T>) {}

  get(): T {
    const state = this.state;
    if (state.resolved) return state.value;
    const value = state.supplier();
    this.state = { resolved: true, value };
    return value;
  }
}

/**
 * ResponseConsumer
 * Ordered accumulator of mapped results. Entries may be eager values or lazy
 * suppliers; a lazy entry is resolved on first read and memoised.
 */
export class ResponseConsumer<T> implements Iterable<T> {
  private readonly entries: Entry<T>[] = [];

  static empty<T>(): ResponseConsumer<T> {
    return new ResponseConsumer<T>();
  }

  static of<T>(...values: T[]): ResponseConsumer<T> {
    const consumer = new ResponseConsumer<T>();
    for (const value of values) consumer.append(value);
    return consumer;
  }

  static lazy<T>(supplier: () => T): ResponseConsumer<T> {
    return new ResponseConsumer<T>().appendLazy(supplier);
  }

  get size(): number {
    return this.entries.length;
  }

  append(value: T): this {
    this.entries.push(new Entry<T>({ resolved: true, value }));
    return this;
  }

  appendLazy(supplier: () => T): this {
    this.entries.push(new Entry<T>({ resolved: false, supplier }));
    return this;
  }

  /**
   * Append every entry of another consumer, keeping laziness
   */
  merge(other: ResponseConsumer<T>): this {
    for (const entry of other.entries) this.entries.push(entry);
    return this;
  }

  first(): T | undefined {
    return this.entries.length > 0 ? this.entries[0].get() : undefined;
  }

  toArray(): T[] {
    return this.entries.map((entry) => entry.get());
  }

  *[Symbol.iterator](): Iterator<T> {
    for (const entry of this.entries) yield entry.get();
  }
}

/**
 * Merge consumers in order into a new consumer. No de-duplication.
 */
export function collect<T>(consumers: Iterable<ResponseConsumer<T>>): ResponseConsumer<T> {
  const merged = ResponseConsumer.empty<T>();
  for (const consumer of consumers) merged.merge(consumer);
  return merged;
}

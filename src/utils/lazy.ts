/**
 * A cell computed on first read and reused afterwards. A computation that
 * throws leaves the cell empty, so the next read retries it.
 */
export class Lazy<T> {
  private state: { readonly value: T } | undefined;

  constructor(private readonly compute: () => T) {}

  get value(): T {
    if (!this.state) {
      this.state = { value: this.compute() };
    }
    return this.state.value;
  }

  get isResolved(): boolean {
    return this.state !== undefined;
  }
}

/**
 * A sequence loaded lazily on first iteration. The loaded items are kept only
 * once a pass runs to completion; later passes replay them without reloading.
 */
export class ReplayableSequence<T> implements Iterable<T> {
  private items: readonly T[] | undefined;

  constructor(private readonly load: () => Iterable<T>) {}

  *[Symbol.iterator](): Generator<T, void, undefined> {
    if (this.items) {
      yield* this.items;
      return;
    }
    const collected: T[] = [];
    for (const item of this.load()) {
      collected.push(item);
      yield item;
    }
    this.items = collected;
  }

  get isMaterialized(): boolean {
    return this.items !== undefined;
  }
}

/**
 * Ordered, append-only view over an array owned by a parent record.
 * Handles returned from the slice share the underlying records.
 */
export class Slice<O, W = O> {
  constructor(
    private readonly orig: O[],
    private readonly newOrig: () => O,
    private readonly wrap: (orig: O) => W
  ) {}

  get length(): number {
    return this.orig.length;
  }

  /** Append a zero-valued child and return a handle to it. */
  appendEmpty(): W {
    const child = this.newOrig();
    this.orig.push(child);
    return this.wrap(child);
  }

  at(index: number): W {
    const child = this.orig[index];
    if (child === undefined) {
      throw new RangeError(`index ${index} out of range [0, ${this.orig.length})`);
    }
    return this.wrap(child);
  }

  *[Symbol.iterator](): IterableIterator<W> {
    for (const child of this.orig) yield this.wrap(child);
  }
}

export function identity<T>(value: T): T {
  return value;
}

/**
 * Insertion-ordered set of candidates.
 *
 * Iteration order is first-occurrence order; re-adding an existing value
 * neither moves it nor duplicates it. Stages hand these to each other so
 * output order stays reproducible for identical inputs.
 */
export class OrderedSet<T> implements Iterable<T> {
  private readonly members = new Set<T>();
  private readonly order: T[] = [];

  constructor(initial?: Iterable<T>) {
    if (initial) {
      this.addAll(initial);
    }
  }

  /** Returns true when the value was not present before. */
  add(value: T): boolean {
    if (this.members.has(value)) return false;
    this.members.add(value);
    this.order.push(value);
    return true;
  }

  /** Adds every value, returning how many were new. */
  addAll(values: Iterable<T>): number {
    let added = 0;
    for (const value of values) {
      if (this.add(value)) added += 1;
    }
    return added;
  }

  has(value: T): boolean {
    return this.members.has(value);
  }

  get size(): number {
    return this.order.length;
  }

  toArray(): T[] {
    return this.order.slice();
  }

  [Symbol.iterator](): Iterator<T> {
    return this.order[Symbol.iterator]();
  }
}

/**
 * First-seen-order deduplication of a sequence.
 */
export function dedupeOrdered<T>(values: Iterable<T>): T[] {
  return new OrderedSet(values).toArray();
}

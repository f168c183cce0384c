/**
 * Set of plain records compared by value.
 *
 * Each member is stored under a canonical key built by `keyOf`, so two
 * records with the same fields count once no matter which object instance
 * was added first.
 */
export class ValueSet<T> implements Iterable<T> {
  private readonly items = new Map<string, T>();

  constructor(
    private readonly keyOf: (value: T) => string,
    values: Iterable<T> = []
  ) {
    for (const value of values) {
      this.add(value);
    }
  }

  get size(): number {
    return this.items.size;
  }

  add(value: T): this {
    const key = this.keyOf(value);
    if (!this.items.has(key)) {
      this.items.set(key, value);
    }
    return this;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items.values();
  }

  /**
   * New set holding the members of both sets. Neither operand is modified.
   */
  union(other: ValueSet<T>): ValueSet<T> {
    const result = new ValueSet(this.keyOf, this.items.values());
    for (const value of other) {
      result.add(value);
    }
    return result;
  }

  /**
   * Independent copy; `copyValue` decides how deep each member is copied.
   */
  clone(copyValue: (value: T) => T): ValueSet<T> {
    const result = new ValueSet(this.keyOf);
    for (const value of this.items.values()) {
      result.add(copyValue(value));
    }
    return result;
  }

  /**
   * Members ordered by their canonical key, so serialized output is stable.
   */
  sortedValues(): T[] {
    return [...this.items.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, value]) => value);
  }
}

export type ConstSet<T> = Pick<Set<T>, 'size' | 'has'> & Iterable<T>;

/**
 * Add every item of `source` to `target`, skipping `except`.
 * @returns whether `target` grew
 */
export function addAll<T>(
  target: Set<T>,
  source: Iterable<T>,
  except?: T
): boolean {
  const before = target.size;
  for (const item of source) {
    if (item !== except) {
      target.add(item);
    }
  }
  return target.size > before;
}

export function setsAreEqual<T>(s1: ConstSet<T>, s2: ConstSet<T>) {
  if (s1.size !== s2.size) {
    return false;
  }
  for (const s of s1) {
    if (!s2.has(s)) {
      return false;
    }
  }
  return true;
}

/**
 * An immutable set of small integers whose identity is its sorted members,
 * so that two sets built in different orders hash to the same key.
 */
export class NumberSet implements ConstSet<number> {
  private data: Set<number>;
  private sorted: number[] | undefined;
  constructor(items: Iterable<number> = []) {
    this.data = new Set(items);
  }
  get size(): number {
    return this.data.size;
  }

  [Symbol.iterator]() {
    return this.data[Symbol.iterator]();
  }

  has(a: number): boolean {
    return this.data.has(a);
  }
  equals(other: NumberSet): boolean {
    return setsAreEqual(this, other);
  }

  toSortedArray(): readonly number[] {
    if (!this.sorted) {
      this.sorted = Array.from(this.data.values()).sort((a, b) => a - b);
    }
    return this.sorted;
  }

  hash(): string {
    return `{${this.toSortedArray().join(',')}}`;
  }
}

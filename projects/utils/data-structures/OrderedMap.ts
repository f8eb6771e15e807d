/**
 * A map that remembers the order keys were first pushed in.
 */
export class OrderedMap<K, V> {
  private keyMap: Map<K, V> = new Map();
  private keyList: K[] = [];

  has(key: K) {
    return this.keyMap.has(key);
  }

  get(key: K) {
    return this.keyMap.get(key);
  }

  push(key: K, value: V) {
    if (this.keyMap.has(key)) {
      throw new Error(`key ${String(key)} already in map`);
    }
    this.keyMap.set(key, value);
    this.keyList.push(key);
  }

  keys(): IterableIterator<K> {
    return this.keyList[Symbol.iterator]();
  }

  *entries(): Generator<[number, K, V]> {
    for (const [i, key] of this.keyList.entries()) {
      yield [i, key, this.keyMap.get(key) as V];
    }
  }
}

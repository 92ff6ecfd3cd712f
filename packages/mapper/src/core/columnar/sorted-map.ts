export type Comparator<K> = (a: K, b: K) => number

/**
 * A map that keeps its keys ordered by a comparator.
 *
 * Backed by parallel sorted arrays with binary search. Rows hold a handful
 * of families and qualifiers, so insertion cost is not a concern.
 */
export class SortedMap<K, V> implements Iterable<[K, V]> {
  private readonly sortedKeys: K[] = []
  private readonly sortedValues: V[] = []

  constructor(
    private readonly compare: Comparator<K>,
    entries?: Iterable<readonly [K, V]>,
  ) {
    if (entries) {
      for (const [key, value] of entries) this.set(key, value)
    }
  }

  get size(): number {
    return this.sortedKeys.length
  }

  get(key: K): V | undefined {
    const { found, index } = this.search(key)
    return found ? this.sortedValues[index] : undefined
  }

  has(key: K): boolean {
    return this.search(key).found
  }

  set(key: K, value: V): this {
    const { found, index } = this.search(key)

    if (found) {
      this.sortedValues[index] = value
    } else {
      this.sortedKeys.splice(index, 0, key)
      this.sortedValues.splice(index, 0, value)
    }

    return this
  }

  /** Returns the value under key, inserting create() first when absent. */
  getOrCreate(key: K, create: () => V): V {
    const { found, index } = this.search(key)
    const existing = found ? this.sortedValues[index] : undefined
    if (existing !== undefined) return existing

    const value = create()
    this.set(key, value)
    return value
  }

  delete(key: K): boolean {
    const { found, index } = this.search(key)
    if (!found) return false

    this.sortedKeys.splice(index, 1)
    this.sortedValues.splice(index, 1)
    return true
  }

  /** Entry with the smallest key in comparator order */
  first(): [K, V] | undefined {
    return this.entryAt(0)
  }

  /** Entry with the largest key in comparator order */
  last(): [K, V] | undefined {
    return this.entryAt(this.sortedKeys.length - 1)
  }

  *keys(): IterableIterator<K> {
    yield* this.sortedKeys
  }

  *values(): IterableIterator<V> {
    yield* this.sortedValues
  }

  *entries(): IterableIterator<[K, V]> {
    for (let i = 0; i < this.sortedKeys.length; i++) {
      const entry = this.entryAt(i)
      if (entry) yield entry
    }
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries()
  }

  private entryAt(index: number): [K, V] | undefined {
    if (index < 0 || index >= this.sortedKeys.length) return undefined

    const key = this.sortedKeys[index]
    const value = this.sortedValues[index]
    if (key === undefined || value === undefined) return undefined

    return [key, value]
  }

  private search(key: K): { found: boolean; index: number } {
    let lo = 0
    let hi = this.sortedKeys.length

    while (lo < hi) {
      const mid = (lo + hi) >>> 1
      const candidate = this.sortedKeys[mid]
      if (candidate === undefined) break

      const cmp = this.compare(candidate, key)
      if (cmp === 0) return { found: true, index: mid }
      if (cmp < 0) lo = mid + 1
      else hi = mid
    }

    return { found: false, index: lo }
  }
}

import { compareBytes, utf8 } from "@rowmap/codec"
import { SortedMap } from "./sorted-map"

/**
 * Timestamp used for cells whose version the store should assign on write.
 */
export const LATEST_TIMESTAMP = Number.MAX_SAFE_INTEGER

const newestFirst = (a: number, b: number): number => b - a

type Name = string | Uint8Array

function toKey(name: Name): Uint8Array {
  return typeof name === "string" ? utf8(name) : name
}

/**
 * Versions of one column, iterated newest first.
 */
export class VersionMap extends SortedMap<number, Uint8Array> {
  constructor(entries?: Iterable<readonly [number, Uint8Array]>) {
    super(newestFirst, entries)
  }

  /** Value with the greatest timestamp */
  latest(): Uint8Array | undefined {
    return this.first()?.[1]
  }
}

/**
 * Qualifier → versions within one family, in byte order.
 */
export class FamilyMap extends SortedMap<Uint8Array, VersionMap> {
  constructor() {
    super(compareBytes)
  }

  column(qualifier: Name): VersionMap | undefined {
    return this.get(toKey(qualifier))
  }
}

/**
 * Family → qualifier → timestamp → value bytes for one row.
 *
 * @example
 * ```ts
 * const columns = new ColumnarMap()
 *   .put("main", "name", LATEST_TIMESTAMP, utf8("Ada"))
 *
 * columns.column("main", "name")?.latest()
 * ```
 */
export class ColumnarMap extends SortedMap<Uint8Array, FamilyMap> {
  constructor() {
    super(compareBytes)
  }

  family(name: Name): FamilyMap | undefined {
    return this.get(toKey(name))
  }

  column(family: Name, qualifier: Name): VersionMap | undefined {
    return this.family(family)?.column(qualifier)
  }

  put(family: Name, qualifier: Name, timestamp: number, value: Uint8Array): this {
    this.getOrCreate(toKey(family), () => new FamilyMap())
      .getOrCreate(toKey(qualifier), () => new VersionMap())
      .set(timestamp, value)

    return this
  }

  /** Number of (family, qualifier, timestamp) entries */
  cellCount(): number {
    let count = 0
    for (const family of this.values()) {
      for (const versions of family.values()) count += versions.size
    }
    return count
  }
}

import type { CodecFlags, TypeDescriptor } from "@rowmap/codec"

/**
 * How a field's value is laid out in cells.
 *
 * - `single`: one value, one column, latest version wins on read
 * - `multi_version`: a `Map<timestamp, value>` history of one column
 * - `list`: an array whose elements each get their own qualifier in one family
 */
export type ColumnMode = "single" | "multi_version" | "list"

export type FamilyOptions = {
  /** Versions the store keeps per column. Default: 1 */
  readonly maxVersions?: number
}

/**
 * A field-to-column declaration, as produced by {@link column} or written by hand.
 */
export type ColumnDeclaration = {
  readonly family: string
  /** Defaults to the field name. Ignored for `list` columns. */
  readonly qualifier?: string
  readonly mode: ColumnMode
  /** Value type; the element type for `multi_version` and `list` */
  readonly type: TypeDescriptor
  /**
   * For `list` columns: the property (or zero-argument method) of each
   * element whose value becomes that element's qualifier.
   */
  readonly idAccessor?: string
  readonly codecFlags?: CodecFlags
  /** Marks the field as ephemeral. Mapping such a field is rejected. */
  readonly transient?: boolean
  /** Marks the field as class-level state. Mapping such a field is rejected. */
  readonly static?: boolean
}

export type RowKeyDeclaration<T> = {
  /** Fields the row key is built from; they must be set when writing. */
  readonly fields: readonly (keyof T & string)[]
  /** Type returned by `composeRowKey()` */
  readonly type: TypeDescriptor
}

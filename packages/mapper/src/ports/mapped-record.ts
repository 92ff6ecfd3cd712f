/**
 * An orderable, byte-serializable value identifying one record.
 */
export type RowKeyValue = string | number | bigint

/**
 * The contract every mapped record class implements.
 *
 * @example
 * ```ts
 * class Citizen implements MappedRecord<string> {
 *   countryCode?: string
 *   uid?: number
 *
 *   composeRowKey() {
 *     return `${this.countryCode}#${this.uid}`
 *   }
 *
 *   parseRowKey(rowKey: string) {
 *     const [country, uid] = rowKey.split("#")
 *     this.countryCode = country
 *     this.uid = Number(uid)
 *   }
 * }
 * ```
 */
export interface MappedRecord<K extends RowKeyValue = RowKeyValue> {
  /** Build the row key from the record's own fields. */
  composeRowKey(): K

  /**
   * Populate the row-key fields of a freshly constructed record.
   * Called exactly once per read, before any column is assigned.
   */
  parseRowKey(rowKey: K): void
}

/**
 * A record class. It must be constructible without arguments; this is
 * checked when the table definition is validated.
 */
export type RecordClass<T extends MappedRecord> = new (...args: never[]) => T

export function isRowKeyValue(value: unknown): value is RowKeyValue {
  return typeof value === "string" || typeof value === "number" || typeof value === "bigint"
}

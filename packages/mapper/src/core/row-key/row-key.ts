import { type Codec, describeType, toHex } from "@rowmap/codec"
import { type MappedRecord, type RowKeyValue, isRowKeyValue } from "../../ports/mapped-record"
import { RecordError } from "../errors/record-error"
import type { ResolvedTable } from "../metadata/resolve-metadata"

/**
 * Compose and serialize the row key of a record.
 *
 * @throws RecordError `row_key_compose_failed` when composeRowKey() throws,
 *   `row_key_cant_be_empty` when it yields nothing, `codec_failed` when the
 *   value cannot be serialized
 */
export function composeRowKey(resolved: ResolvedTable, record: MappedRecord, codec: Codec): Uint8Array {
  const { recordType, codecFlags } = resolved.table

  let rowKey: unknown
  try {
    rowKey = record.composeRowKey()
  } catch (err) {
    throw RecordError.rowKeyComposeFailed({ recordType, cause: err })
  }

  if (rowKey === null || rowKey === undefined || String(rowKey) === "") {
    throw RecordError.rowKeyCantBeEmpty({ recordType })
  }

  let bytes: Uint8Array
  try {
    bytes = codec.serialize(rowKey, resolved.rowKey.type, codecFlags)
  } catch (err) {
    throw RecordError.codecFailed({ context: { recordType, field: "rowKey" }, cause: err })
  }

  if (bytes.length === 0) {
    throw RecordError.rowKeyCantBeEmpty({ recordType })
  }

  return bytes
}

/**
 * Decode row-key bytes into the declared row-key type.
 *
 * @throws RecordError `row_key_parse_failed` carrying the raw bytes and target type
 */
export function decodeRowKey(resolved: ResolvedTable, bytes: Uint8Array, codec: Codec): RowKeyValue {
  const parseFailed = (cause?: unknown) =>
    RecordError.rowKeyParseFailed({
      recordType: resolved.table.recordType,
      bytes: toHex(bytes),
      type: describeType(resolved.rowKey.type),
      cause,
    })

  let value: unknown
  try {
    value = codec.deserialize(bytes, resolved.rowKey.type, resolved.table.codecFlags)
  } catch (err) {
    throw parseFailed(err)
  }

  if (!isRowKeyValue(value)) throw parseFailed()
  return value
}

/**
 * Decode row-key bytes and hand the value to the record's parseRowKey().
 */
export function applyRowKey(
  resolved: ResolvedTable,
  record: MappedRecord,
  bytes: Uint8Array,
  codec: Codec,
): void {
  const rowKey = decodeRowKey(resolved, bytes, codec)

  try {
    record.parseRowKey(rowKey)
  } catch (err) {
    throw RecordError.rowKeyParseFailed({
      recordType: resolved.table.recordType,
      bytes: toHex(bytes),
      type: describeType(resolved.rowKey.type),
      cause: err,
    })
  }
}

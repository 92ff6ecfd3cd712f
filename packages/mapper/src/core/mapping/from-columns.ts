import type { Codec } from "@rowmap/codec"
import type { MappedRecord, RecordClass } from "../../ports/mapped-record"
import type { ColumnarMap, FamilyMap } from "../columnar/columnar-map"
import { RecordError } from "../errors/record-error"
import type { ResolvedField, ResolvedTable } from "../metadata/resolve-metadata"
import { applyRowKey } from "../row-key/row-key"
import { FieldCodec } from "./encode"

/**
 * Build a record from its row key and columns.
 *
 * Columns the record does not map are ignored and fields without a column
 * keep their constructor defaults. When some fields fail to decode, the rest
 * are still assigned before the first failure is thrown.
 *
 * @throws RecordError `row_key_parse_failed`, `record_not_instantiable`, or
 *   `field_conversion_failed` naming every field that could not be read
 */
export function fromColumns<T extends MappedRecord>(
  recordClass: RecordClass<T>,
  resolved: ResolvedTable,
  rowKey: Uint8Array,
  columns: ColumnarMap,
  codec: Codec,
): T {
  const { recordType } = resolved.table

  let record: T
  try {
    record = new recordClass()
  } catch (err) {
    throw RecordError.recordNotInstantiable({ recordType, cause: err })
  }

  applyRowKey(resolved, record, rowKey, codec)

  const fieldCodec = new FieldCodec(codec, recordType)
  const failures: { field: string; cause: unknown }[] = []

  for (const field of resolved.fields) {
    const family = columns.family(field.family)
    if (!family || family.size === 0) continue

    try {
      readField(field, family, record, fieldCodec)
    } catch (err) {
      failures.push({ field: field.field, cause: err })
    }
  }

  const [first] = failures
  if (first) {
    throw RecordError.fieldConversionFailed({
      recordType,
      field: first.field,
      failedFields: failures.map((f) => f.field),
      cause: first.cause,
    })
  }

  return record
}

function readField(field: ResolvedField, family: FamilyMap, record: object, fieldCodec: FieldCodec): void {
  switch (field.mode) {
    case "single": {
      const latest = family.column(field.qualifier)?.latest()
      if (!latest || latest.length === 0) return

      field.accessor.set(record, fieldCodec.decode(field, latest))
      return
    }

    case "multi_version": {
      const versions = family.column(field.qualifier)
      if (!versions || versions.size === 0) return

      // VersionMap iterates newest first; the field holds oldest first.
      const history = new Map<number, unknown>()
      for (const [timestamp, bytes] of [...versions].reverse()) {
        if (bytes.length === 0) continue
        history.set(timestamp, fieldCodec.decode(field, bytes))
      }

      field.accessor.set(record, history)
      return
    }

    case "list": {
      const elements: unknown[] = []
      for (const versions of family.values()) {
        const latest = versions.latest()
        if (!latest || latest.length === 0) continue

        elements.push(fieldCodec.decode(field, latest))
      }

      field.accessor.set(record, elements)
      return
    }
  }
}

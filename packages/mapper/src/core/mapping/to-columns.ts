import { type Codec, utf8 } from "@rowmap/codec"
import type { Logger } from "@rowmap/logger"
import type { MappedRecord } from "../../ports/mapped-record"
import type { ListFieldMapping } from "../../ports/metadata"
import { ColumnarMap, LATEST_TIMESTAMP } from "../columnar/columnar-map"
import { RecordError } from "../errors/record-error"
import type { ResolvedField, ResolvedTable } from "../metadata/resolve-metadata"
import { FieldCodec } from "./encode"

/**
 * Convert a record into its columns.
 *
 * Fields are visited in metadata order. Values that serialize to zero bytes
 * are left out, so an absent column and an empty value read back the same.
 *
 * @throws RecordError when a row-key field is unset, a value does not match
 *   its column mode, a codec call fails, or no column is produced
 */
export function toColumns(
  resolved: ResolvedTable,
  record: MappedRecord,
  codec: Codec,
  logger: Logger,
): ColumnarMap {
  const { recordType } = resolved.table

  for (const field of resolved.rowKey.fields) {
    const value: unknown = Reflect.get(record, field)
    if (value === null || value === undefined) {
      throw RecordError.rowKeyCantBeEmpty({ recordType, field })
    }
  }

  const writer = new ColumnWriter(recordType, new FieldCodec(codec, recordType), logger)

  for (const field of resolved.fields) {
    const value = field.accessor.get(record)

    switch (field.mode) {
      case "single":
        writer.single(field, field.qualifier, value)
        break
      case "multi_version":
        writer.versions(field, field.qualifier, value)
        break
      case "list":
        writer.list(field, value)
        break
    }
  }

  if (writer.columns.size === 0) {
    throw RecordError.allColumnsNull({ recordType })
  }

  return writer.columns
}

class ColumnWriter {
  readonly columns = new ColumnarMap()

  constructor(
    private readonly recordType: string,
    private readonly fieldCodec: FieldCodec,
    private readonly logger: Logger,
  ) {}

  single(field: ResolvedField, qualifier: string, value: unknown): void {
    const bytes = this.fieldCodec.encode(field, value)
    if (this.omitEmpty(field, qualifier, bytes)) return

    this.columns.put(field.family, qualifier, LATEST_TIMESTAMP, bytes)
  }

  versions(field: ResolvedField, qualifier: string, value: unknown): void {
    if (value === null || value === undefined) return

    if (!(value instanceof Map)) {
      throw RecordError.fieldValueInvalid({
        recordType: this.recordType,
        field: field.field,
        reason: "must be a Map of timestamp to value",
      })
    }
    if (value.size === 0) {
      throw RecordError.fieldMultiVersionEmpty({ recordType: this.recordType, field: field.field })
    }

    for (const [timestamp, version] of value) {
      if (version === null || version === undefined) continue

      if (typeof timestamp !== "number" || !Number.isSafeInteger(timestamp) || timestamp < 0) {
        throw RecordError.fieldValueInvalid({
          recordType: this.recordType,
          field: field.field,
          reason: `has an invalid timestamp ${String(timestamp)}`,
        })
      }

      const bytes = this.fieldCodec.encode(field, version)
      if (this.omitEmpty(field, qualifier, bytes)) continue

      this.columns.put(field.family, qualifier, timestamp, bytes)
    }
  }

  list(field: ResolvedField & ListFieldMapping, value: unknown): void {
    if (value === null || value === undefined) return

    if (!Array.isArray(value)) {
      throw RecordError.fieldValueInvalid({
        recordType: this.recordType,
        field: field.field,
        reason: "must be an array",
      })
    }

    value.forEach((element: unknown, index) => {
      if (element === null || element === undefined) return

      const qualifier = this.qualifierOf(field, element, index)
      const bytes = this.fieldCodec.encode(field, element)
      if (this.omitEmpty(field, qualifier, bytes)) return

      this.columns.put(field.family, utf8(qualifier), LATEST_TIMESTAMP, bytes)
    })
  }

  private qualifierOf(field: ListFieldMapping, element: unknown, index: number): string {
    const member: unknown =
      typeof element === "object" && element !== null ? Reflect.get(element, field.idAccessor) : undefined
    const id: unknown = typeof member === "function" ? Reflect.apply(member, element, []) : member

    if (id === null || id === undefined || String(id) === "") {
      throw RecordError.fieldValueInvalid({
        recordType: this.recordType,
        field: field.field,
        index,
        reason: `element ${index} has no value for identifier "${field.idAccessor}"`,
      })
    }

    return String(id)
  }

  private omitEmpty(field: ResolvedField, qualifier: string, bytes: Uint8Array): boolean {
    if (bytes.length > 0) return false

    this.logger.trace("Omitting empty column", {
      field: field.field,
      family: field.family,
      qualifier,
    })
    return true
  }
}

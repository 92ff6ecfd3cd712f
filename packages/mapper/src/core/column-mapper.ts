import { type Codec, type CodecFlags, type TypeDescriptor, BestFitCodec, describeType } from "@rowmap/codec"
import { rootCause, toAppError } from "@rowmap/errors"
import { type Logger, createNullLogger } from "@rowmap/logger"
import type { MapFailed, ReadResult, WriteResult } from "../ports/map-result"
import type { MappedRecord, RowKeyValue } from "../ports/mapped-record"
import type { FieldMapping } from "../ports/metadata"
import { type Cell, type RowData, fromCells, toCells } from "./columnar/cells"
import type { TableDefinition } from "./declare/define-table"
import { RecordError } from "./errors/record-error"
import { fromColumns } from "./mapping/from-columns"
import { toColumns } from "./mapping/to-columns"
import { type ResolvedTable, resolveMetadata, toFieldMapping } from "./metadata/resolve-metadata"
import { composeRowKey, decodeRowKey } from "./row-key/row-key"
import { validateTable } from "./validation/validate-table"

export type ColumnMapperDeps = {
  /** Default: a BestFitCodec with no default flags */
  codec?: Codec
  /** Default: a NullLogger */
  logger?: Logger
}

/**
 * Converts records to and from wide-column rows.
 *
 * Holds only a codec and a logger, so one instance can serve every table
 * and caller. Each definition is validated on first use; a DefinitionError
 * is thrown from that call and from every later call with the same definition.
 *
 * @example
 * ```ts
 * const mapper = new ColumnMapper()
 *
 * const row = mapper.writeValue(Users, user)
 * const copy = mapper.readValue(Users, row)
 * ```
 */
export class ColumnMapper {
  private readonly codec: Codec
  private readonly logger: Logger

  constructor(deps: ColumnMapperDeps = {}) {
    this.codec = deps.codec ?? new BestFitCodec()
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "column-mapper" })
  }

  // Definitions

  /** Throws the first DefinitionError of the definition, if any. */
  validate<T extends MappedRecord>(definition: TableDefinition<T>): void {
    this.prepare(definition)
  }

  isValid<T extends MappedRecord>(definition: TableDefinition<T>): boolean {
    try {
      this.prepare(definition)
      return true
    } catch {
      return false
    }
  }

  getColumnFamiliesAndVersions<T extends MappedRecord>(definition: TableDefinition<T>): Map<string, number> {
    return new Map(this.prepare(definition).table.families)
  }

  /** Column-mapped fields keyed by field name, in declaration order */
  getMappedFields<T extends MappedRecord>(definition: TableDefinition<T>): Map<string, FieldMapping> {
    const resolved = this.prepare(definition)
    return new Map(resolved.fields.map((field) => [field.field, toFieldMapping(field)]))
  }

  // Row keys

  getRowKey<T extends MappedRecord>(definition: TableDefinition<T>, record: T): Uint8Array {
    return composeRowKey(this.prepare(definition), record, this.codec)
  }

  parseRowKey<T extends MappedRecord>(definition: TableDefinition<T>, rowKey: Uint8Array): RowKeyValue {
    return decodeRowKey(this.prepare(definition), rowKey, this.codec)
  }

  /**
   * Serialize a single value, e.g. to build a scan boundary or a filter operand.
   *
   * @throws RecordError `codec_failed` when the codec cannot encode the value
   */
  toBytes(value: unknown, type: TypeDescriptor, flags?: CodecFlags): Uint8Array {
    try {
      return this.codec.serialize(value, type, flags)
    } catch (err) {
      throw RecordError.codecFailed({ context: { type: describeType(type) }, cause: err })
    }
  }

  // Writing

  writeValue<T extends MappedRecord>(definition: TableDefinition<T>, record: T): RowData {
    const resolved = this.prepare(definition)
    return this.write(resolved, record)
  }

  /**
   * Write each record independently. A record that cannot be mapped yields a
   * `failed` result; a DefinitionError is still thrown for the whole call.
   */
  writeValues<T extends MappedRecord>(
    definition: TableDefinition<T>,
    records: readonly T[],
  ): WriteResult<RowData>[] {
    const resolved = this.prepare(definition)

    return records.map((record, index): WriteResult<RowData> => {
      try {
        return { kind: "ok", value: this.write(resolved, record) }
      } catch (err) {
        return this.failed(resolved, "write", index, err)
      }
    })
  }

  writeCells<T extends MappedRecord>(definition: TableDefinition<T>, record: T): Cell[] {
    return toCells(this.writeValue(definition, record))
  }

  // Reading

  /**
   * Build a record from a stored row.
   *
   * @param rowKey - overrides the row's own key
   * @returns undefined when the row is absent or has no data
   */
  readValue<T extends MappedRecord>(
    definition: TableDefinition<T>,
    row: RowData | undefined,
    rowKey?: Uint8Array,
  ): T | undefined {
    const resolved = this.prepare(definition)
    return this.read(definition, resolved, row, rowKey)
  }

  readValues<T extends MappedRecord>(
    definition: TableDefinition<T>,
    rows: readonly (RowData | undefined)[],
  ): ReadResult<T>[] {
    const resolved = this.prepare(definition)

    return rows.map((row, index): ReadResult<T> => {
      try {
        const record = this.read(definition, resolved, row)
        return record === undefined ? { kind: "empty" } : { kind: "ok", value: record }
      } catch (err) {
        return this.failed(resolved, "read", index, err)
      }
    })
  }

  /**
   * Build a record from the cells of one row.
   *
   * @param rowKey - default: the row of the first cell
   */
  readCells<T extends MappedRecord>(
    definition: TableDefinition<T>,
    cells: readonly Cell[],
    rowKey?: Uint8Array,
  ): T | undefined {
    const key = rowKey ?? cells[0]?.row
    if (key === undefined) return undefined

    return this.readValue(definition, { rowKey: key, columns: fromCells(cells) })
  }

  private prepare<T extends MappedRecord>(definition: TableDefinition<T>): ResolvedTable {
    const resolved = resolveMetadata(definition, this.logger)

    try {
      validateTable(definition.recordClass, resolved, this.codec)
    } catch (err) {
      this.logger.error("Table definition is invalid", {
        operation: "validate",
        recordType: resolved.table.recordType,
        table: resolved.table.name,
        err,
      })
      throw err
    }

    return resolved
  }

  private write(resolved: ResolvedTable, record: MappedRecord): RowData {
    const rowKey = composeRowKey(resolved, record, this.codec)
    const columns = toColumns(resolved, record, this.codec, this.logger)
    return { rowKey, columns }
  }

  private read<T extends MappedRecord>(
    definition: TableDefinition<T>,
    resolved: ResolvedTable,
    row: RowData | undefined,
    rowKey?: Uint8Array,
  ): T | undefined {
    if (!row) return undefined

    const key = rowKey ?? row.rowKey
    if (key.length === 0 || row.columns.size === 0) return undefined

    return fromColumns(definition.recordClass, resolved, key, row.columns, this.codec)
  }

  private failed(
    resolved: ResolvedTable,
    operation: "write" | "read",
    index: number,
    err: unknown,
  ): MapFailed {
    const error = toAppError(err)
    const root = rootCause(error)

    this.logger.warn(`Could not ${operation} record in batch`, {
      operation,
      recordType: resolved.table.recordType,
      table: resolved.table.name,
      index,
      err: error,
      rootCause: root instanceof Error ? root.message : String(root),
    })

    return { kind: "failed", error }
  }
}

import type { Logger } from "@rowmap/logger"
import type { ColumnDeclaration } from "../../ports/declaration"
import type { MappedRecord } from "../../ports/mapped-record"
import type { FieldMapping, RowKeyMetadata, TableMetadata } from "../../ports/metadata"
import type { TableDefinition } from "../declare/define-table"

export type FieldAccessor = {
  get(record: object): unknown
  set(record: object, value: unknown): void
}

export type ResolvedField = FieldMapping & { readonly accessor: FieldAccessor }

export type ResolvedTable = {
  readonly table: TableMetadata
  /** Column-mapped fields in declaration order */
  readonly fields: readonly ResolvedField[]
  readonly rowKey: RowKeyMetadata
}

const DEFAULT_MAX_VERSIONS = 1

const resolved = new WeakMap<object, ResolvedTable>()

/**
 * Resolve and memoize the mapping metadata of a table definition.
 *
 * Resolution is synchronous and deterministic; repeated calls with the same
 * definition return the same object. No validation happens here.
 */
export function resolveMetadata<T extends MappedRecord>(
  definition: TableDefinition<T>,
  logger?: Logger,
): ResolvedTable {
  const cached = resolved.get(definition)
  if (cached) return cached

  const metadata = buildMetadata(definition)
  resolved.set(definition, metadata)

  logger?.debug("Resolved table metadata", {
    operation: "resolve",
    recordType: metadata.table.recordType,
    table: metadata.table.name,
    fieldCount: metadata.fields.length,
  })

  return metadata
}

function buildMetadata<T extends MappedRecord>(definition: TableDefinition<T>): ResolvedTable {
  const families = new Map<string, number>()
  for (const [family, options] of Object.entries(definition.families)) {
    families.set(family, options.maxVersions ?? DEFAULT_MAX_VERSIONS)
  }

  const rowKey: RowKeyMetadata = Object.freeze({
    fields: Object.freeze([...definition.rowKey.fields]),
    type: definition.rowKey.type,
  })

  const table: TableMetadata = Object.freeze({
    name: definition.name,
    recordType: definition.recordType,
    families,
    codecFlags: definition.codecFlags,
    rowKey,
  })

  const fields = definition.columns.map(([field, column]) =>
    Object.freeze(toResolvedField(field, column, definition.codecFlags)),
  )

  return Object.freeze({ table, fields: Object.freeze(fields), rowKey })
}

function toResolvedField(
  field: string,
  column: ColumnDeclaration,
  tableFlags: TableMetadata["codecFlags"],
): ResolvedField {
  const base = {
    field,
    family: column.family,
    type: column.type,
    codecFlags: Object.freeze({ ...tableFlags, ...column.codecFlags }),
    transient: column.transient ?? false,
    static: column.static ?? false,
    accessor: accessorFor(field),
  }

  switch (column.mode) {
    case "single":
      return { ...base, mode: "single", qualifier: column.qualifier ?? field }
    case "multi_version":
      return { ...base, mode: "multi_version", qualifier: column.qualifier ?? field }
    case "list":
      return { ...base, mode: "list", idAccessor: column.idAccessor ?? "" }
  }
}

function accessorFor(field: string): FieldAccessor {
  return {
    get: (record) => Reflect.get(record, field),
    set: (record, value) => {
      Reflect.set(record, field, value)
    },
  }
}

/**
 * Public view of a resolved field, without its accessor.
 */
export function toFieldMapping(field: ResolvedField): FieldMapping {
  const { accessor: _accessor, ...mapping } = field
  return mapping
}

import type { CodecFlags } from "@rowmap/codec"
import type { ColumnDeclaration, FamilyOptions, RowKeyDeclaration } from "../../ports/declaration"
import type { MappedRecord, RecordClass } from "../../ports/mapped-record"
import { ColumnBuilder } from "./column"

export type TableDeclaration<T> = {
  /** Table name. Default: the record class name */
  readonly name?: string
  readonly families: Readonly<Record<string, FamilyOptions>>
  readonly rowKey: RowKeyDeclaration<T>
  /** Flags for the row key and the base flags of every column */
  readonly codecFlags?: CodecFlags
  readonly fields: { readonly [F in keyof T & string]?: ColumnBuilder | ColumnDeclaration }
}

/**
 * A record class bound to its table declaration.
 *
 * Definitions are identity-keyed: metadata and validation results are
 * cached per definition object, so define each table once at startup.
 */
export class TableDefinition<T extends MappedRecord> {
  readonly name: string
  readonly recordType: string
  readonly families: Readonly<Record<string, FamilyOptions>>
  readonly rowKey: RowKeyDeclaration<T>
  readonly codecFlags: CodecFlags
  /** Field declarations in declaration order */
  readonly columns: ReadonlyArray<readonly [field: string, column: ColumnDeclaration]>

  constructor(
    readonly recordClass: RecordClass<T>,
    declaration: TableDeclaration<T>,
  ) {
    this.recordType = recordClass.name
    this.name = declaration.name ?? recordClass.name
    this.families = { ...declaration.families }
    this.rowKey = { fields: [...declaration.rowKey.fields], type: declaration.rowKey.type }
    this.codecFlags = { ...declaration.codecFlags }

    const columns: [string, ColumnDeclaration][] = []
    for (const [field, input] of Object.entries<ColumnBuilder | ColumnDeclaration | undefined>(
      declaration.fields,
    )) {
      if (input === undefined) continue
      columns.push([field, input instanceof ColumnBuilder ? input.declaration : input])
    }
    this.columns = columns

    Object.freeze(this)
  }
}

/**
 * Bind a record class to its column layout.
 *
 * @example
 * ```ts
 * const Users = defineTable(User, {
 *   name: "users",
 *   families: { main: {}, history: { maxVersions: 10 } },
 *   rowKey: { fields: ["id"], type: t.string() },
 *   fields: {
 *     name: column("main").type(t.string()),
 *     prices: column("history", "price").versions(t.float64()),
 *   },
 * })
 * ```
 */
export function defineTable<T extends MappedRecord>(
  recordClass: RecordClass<T>,
  declaration: TableDeclaration<NoInfer<T>>,
): TableDefinition<T> {
  return new TableDefinition(recordClass, declaration)
}

import type { CodecFlags, TypeDescriptor } from "@rowmap/codec"
import type { ColumnMode } from "./declaration"

type FieldMappingBase = {
  readonly field: string
  readonly family: string
  readonly mode: ColumnMode
  readonly type: TypeDescriptor
  /** Table flags overlaid with the column's own flags */
  readonly codecFlags: CodecFlags
  readonly transient: boolean
  readonly static: boolean
}

export type SingleFieldMapping = FieldMappingBase & {
  readonly mode: "single"
  readonly qualifier: string
}

export type VersionedFieldMapping = FieldMappingBase & {
  readonly mode: "multi_version"
  readonly qualifier: string
}

export type ListFieldMapping = FieldMappingBase & {
  readonly mode: "list"
  readonly idAccessor: string
}

export type FieldMapping = SingleFieldMapping | VersionedFieldMapping | ListFieldMapping

export type RowKeyMetadata = {
  readonly fields: readonly string[]
  readonly type: TypeDescriptor
}

export type TableMetadata = {
  readonly name: string
  /** Name of the record class */
  readonly recordType: string
  /** Family name → max versions */
  readonly families: ReadonlyMap<string, number>
  readonly codecFlags: CodecFlags
  readonly rowKey: RowKeyMetadata
}

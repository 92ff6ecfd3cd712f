export {
  type CreateColumnMapperDeps,
  createColumnMapper,
} from "./config/create-column-mapper"
export {
  ENV_PREFIX,
  type LoadMapperConfigOptions,
  loadMapperConfig,
  MapperConfig,
} from "./config/mapper-config"
export { type MapperSettings, mapperConfigSchema } from "./config/schema"
export { type Cell, fromCells, type RowData, toCells } from "./core/columnar/cells"
export { ColumnarMap, FamilyMap, LATEST_TIMESTAMP, VersionMap } from "./core/columnar/columnar-map"
export { type Comparator, SortedMap } from "./core/columnar/sorted-map"
export { ColumnMapper, type ColumnMapperDeps } from "./core/column-mapper"
export { column, ColumnBuilder, ColumnStart } from "./core/declare/column"
export { defineTable, type TableDeclaration, TableDefinition } from "./core/declare/define-table"
export { DefinitionError, type DefinitionErrorCode } from "./core/errors/definition-error"
export { RecordError, type RecordErrorCode } from "./core/errors/record-error"
export {
  type FieldAccessor,
  type ResolvedField,
  type ResolvedTable,
  resolveMetadata,
} from "./core/metadata/resolve-metadata"
export type {
  ColumnDeclaration,
  ColumnMode,
  FamilyOptions,
  RowKeyDeclaration,
} from "./ports/declaration"
export type { MapEmpty, MapFailed, MapOk, ReadResult, WriteResult } from "./ports/map-result"
export { isRowKeyValue, type MappedRecord, type RecordClass, type RowKeyValue } from "./ports/mapped-record"
export type {
  FieldMapping,
  ListFieldMapping,
  RowKeyMetadata,
  SingleFieldMapping,
  TableMetadata,
  VersionedFieldMapping,
} from "./ports/metadata"

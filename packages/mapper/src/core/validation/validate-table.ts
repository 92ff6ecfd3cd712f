import { type Codec, type TypeKind, describeType } from "@rowmap/codec"
import type { MappedRecord, RecordClass } from "../../ports/mapped-record"
import { DefinitionError } from "../errors/definition-error"
import type { ResolvedField, ResolvedTable } from "../metadata/resolve-metadata"

const validatedByCodec = new WeakMap<Codec, WeakSet<ResolvedTable>>()

/** Own properties every class has before any static member is declared. */
const FUNCTION_OWN_KEYS: ReadonlySet<string> = new Set(["length", "name", "prototype"])

/** Types whose decoded value is a string, number or bigint. */
const ROW_KEY_KINDS: ReadonlySet<TypeKind> = new Set<TypeKind>([
  "string",
  "decimal",
  "int16",
  "int32",
  "int64",
  "float32",
  "float64",
  "custom",
])

/**
 * Check a resolved table against the structural rules, throwing the first
 * DefinitionError found. Success is remembered per (table, codec) pair.
 *
 * Rules run in order:
 * 1. zero-argument constructor
 * 2. no transient or static field is mapped
 * 3. every family is declared
 * 4. every type is readable by the codec, single-version types are nullable,
 *    list fields name an identifier accessor, the row-key type decodes to a
 *    row-key value
 * 5. no column (or list-owned family) is mapped twice
 * 6. at least one column field
 * 7. at least one row-key field
 */
export function validateTable<T extends MappedRecord>(
  recordClass: RecordClass<T>,
  resolved: ResolvedTable,
  codec: Codec,
): void {
  let validated = validatedByCodec.get(codec)
  if (validated?.has(resolved)) return

  const { recordType } = resolved.table

  assertConstructible(recordClass, recordType)
  for (const field of resolved.fields) assertMappable(recordClass, recordType, field)
  for (const field of resolved.fields) assertFamilyDeclared(resolved, field)
  for (const field of resolved.fields) assertTypeSupported(recordType, field, codec)
  assertRowKeyTypeSupported(resolved, codec)
  assertNoCollisions(recordType, resolved.fields)

  if (resolved.fields.length === 0) {
    throw DefinitionError.missingColumnFields({ recordType })
  }
  if (resolved.rowKey.fields.length === 0) {
    throw DefinitionError.missingRowKeyField({ recordType })
  }

  if (!validated) {
    validated = new WeakSet()
    validatedByCodec.set(codec, validated)
  }
  validated.add(resolved)
}

function assertConstructible(recordClass: RecordClass<MappedRecord>, recordType: string): void {
  if (typeof recordClass !== "function" || recordClass.prototype === undefined || recordClass.length > 0) {
    throw DefinitionError.noAccessibleConstructor({ recordType })
  }
}

function assertMappable(recordClass: RecordClass<MappedRecord>, recordType: string, field: ResolvedField): void {
  if (field.transient) {
    throw DefinitionError.transientFieldMapped({ recordType, field: field.field })
  }
  if (field.static || isStaticMember(recordClass, field.field)) {
    throw DefinitionError.staticFieldMapped({ recordType, field: field.field })
  }
}

/**
 * Own property of the class other than the built-in `length`, `name` and
 * `prototype`. A `static name = ...` replaces the built-in, which is a
 * read-only, non-enumerable data property.
 */
function isStaticMember(recordClass: RecordClass<MappedRecord>, key: string): boolean {
  const descriptor = Object.getOwnPropertyDescriptor(recordClass, key)
  if (!descriptor) return false
  if (!FUNCTION_OWN_KEYS.has(key)) return true

  const builtIn = "value" in descriptor && descriptor.writable === false && descriptor.enumerable === false
  return !builtIn
}

function assertFamilyDeclared(resolved: ResolvedTable, field: ResolvedField): void {
  if (!resolved.table.families.has(field.family)) {
    throw DefinitionError.columnFamilyNotConfigured({
      recordType: resolved.table.recordType,
      field: field.field,
      family: field.family,
    })
  }
}

function assertTypeSupported(recordType: string, field: ResolvedField, codec: Codec): void {
  const type = describeType(field.type)

  if (!codec.canDeserialize(field.type)) {
    throw DefinitionError.unsupportedFieldType({
      recordType,
      field: field.field,
      type,
      reason: "the codec cannot read it back",
    })
  }

  if (field.mode === "single" && !field.type.nullable) {
    throw DefinitionError.primitiveFieldMapped({ recordType, field: field.field, type })
  }

  if (field.mode === "list" && field.idAccessor === "") {
    throw DefinitionError.unsupportedFieldType({
      recordType,
      field: field.field,
      type,
      reason: "list columns need an element identifier accessor",
    })
  }
}

function assertRowKeyTypeSupported(resolved: ResolvedTable, codec: Codec): void {
  if (!ROW_KEY_KINDS.has(resolved.rowKey.type.kind)) {
    throw DefinitionError.unsupportedFieldType({
      recordType: resolved.table.recordType,
      field: "rowKey",
      type: describeType(resolved.rowKey.type),
      reason: "row keys must decode to a string, number or bigint",
    })
  }

  if (!codec.canDeserialize(resolved.rowKey.type)) {
    throw DefinitionError.unsupportedFieldType({
      recordType: resolved.table.recordType,
      field: "rowKey",
      type: describeType(resolved.rowKey.type),
      reason: "the codec cannot read the row key back",
    })
  }
}

function assertNoCollisions(recordType: string, fields: readonly ResolvedField[]): void {
  const columns = new Map<string, string>()
  const families = new Map<string, { field: string; list: boolean }>()

  for (const field of fields) {
    const owner = families.get(field.family)

    if (owner && (owner.list || field.mode === "list")) {
      throw DefinitionError.duplicateColumnMapping({
        recordType,
        field: field.field,
        family: field.family,
        conflictsWith: owner.field,
      })
    }
    if (!owner) families.set(field.family, { field: field.field, list: field.mode === "list" })

    if (field.mode === "list") continue

    const key = JSON.stringify([field.family, field.qualifier])
    const taken = columns.get(key)
    if (taken !== undefined) {
      throw DefinitionError.duplicateColumnMapping({
        recordType,
        field: field.field,
        family: field.family,
        qualifier: field.qualifier,
        conflictsWith: taken,
      })
    }
    columns.set(key, field.field)
  }
}

import { BaseError } from "@rowmap/errors"

export type DefinitionErrorCode =
  | "no_accessible_constructor"
  | "transient_field_mapped"
  | "static_field_mapped"
  | "column_family_not_configured"
  | "unsupported_field_type"
  | "primitive_field_mapped"
  | "duplicate_column_mapping"
  | "missing_column_fields"
  | "missing_row_key_field"

type FieldInput = { recordType: string; field: string }

/**
 * A table definition that can never be mapped. Raised once, when the
 * definition is first validated; fix the declaration and restart.
 */
export class DefinitionError extends BaseError<DefinitionErrorCode> {
  static noAccessibleConstructor(input: { recordType: string; cause?: unknown }): DefinitionError {
    return new DefinitionError(
      `Record class ${input.recordType} has no accessible zero-argument constructor`,
      {
        code: "no_accessible_constructor",
        scope: "definition",
        context: { recordType: input.recordType },
        cause: input.cause,
      },
    )
  }

  static transientFieldMapped(input: FieldInput): DefinitionError {
    return new DefinitionError(
      `Field ${input.recordType}.${input.field} is transient and cannot be mapped to a column`,
      { code: "transient_field_mapped", scope: "definition", context: input },
    )
  }

  static staticFieldMapped(input: FieldInput): DefinitionError {
    return new DefinitionError(
      `Field ${input.recordType}.${input.field} is static and cannot be mapped to a column`,
      { code: "static_field_mapped", scope: "definition", context: input },
    )
  }

  static columnFamilyNotConfigured(input: FieldInput & { family: string }): DefinitionError {
    return new DefinitionError(
      `Field ${input.recordType}.${input.field} maps to family "${input.family}", which is not declared on the table`,
      { code: "column_family_not_configured", scope: "definition", context: input },
    )
  }

  static unsupportedFieldType(input: FieldInput & { type: string; reason: string }): DefinitionError {
    return new DefinitionError(
      `Field ${input.recordType}.${input.field} of type ${input.type} is not supported: ${input.reason}`,
      { code: "unsupported_field_type", scope: "definition", context: input },
    )
  }

  static primitiveFieldMapped(input: FieldInput & { type: string }): DefinitionError {
    return new DefinitionError(
      `Field ${input.recordType}.${input.field} has non-nullable type ${input.type}; single-version columns need a nullable type`,
      { code: "primitive_field_mapped", scope: "definition", context: input },
    )
  }

  static duplicateColumnMapping(
    input: FieldInput & { family: string; qualifier?: string; conflictsWith: string },
  ): DefinitionError {
    const target =
      input.qualifier === undefined ? `family "${input.family}"` : `column ${input.family}:${input.qualifier}`

    return new DefinitionError(
      `Fields ${input.recordType}.${input.conflictsWith} and ${input.recordType}.${input.field} both map to ${target}`,
      { code: "duplicate_column_mapping", scope: "definition", context: input },
    )
  }

  static missingColumnFields(input: { recordType: string }): DefinitionError {
    return new DefinitionError(`Record class ${input.recordType} maps no fields to columns`, {
      code: "missing_column_fields",
      scope: "definition",
      context: input,
    })
  }

  static missingRowKeyField(input: { recordType: string }): DefinitionError {
    return new DefinitionError(`Record class ${input.recordType} declares no row-key field`, {
      code: "missing_row_key_field",
      scope: "definition",
      context: input,
    })
  }
}

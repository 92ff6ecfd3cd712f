import { type ErrorContext, BaseError } from "@rowmap/errors"

export type RecordErrorCode =
  | "row_key_cant_be_empty"
  | "row_key_compose_failed"
  | "row_key_parse_failed"
  | "record_not_instantiable"
  | "all_columns_null"
  | "field_multi_version_empty"
  | "field_value_invalid"
  | "field_conversion_failed"
  | "codec_failed"

type RecordInput = { recordType: string }
type FieldInput = RecordInput & { field: string }

/**
 * A single record (or row) could not be mapped. Other records in the same
 * batch are unaffected.
 */
export class RecordError extends BaseError<RecordErrorCode> {
  static rowKeyCantBeEmpty(input: RecordInput & { field?: string }): RecordError {
    const message =
      input.field === undefined
        ? `Row key of ${input.recordType} is empty`
        : `Row key of ${input.recordType} is empty: field ${input.field} is not set`

    return new RecordError(message, { code: "row_key_cant_be_empty", scope: "record", context: input })
  }

  static rowKeyComposeFailed(input: RecordInput & { cause: unknown }): RecordError {
    return new RecordError(`Could not compose row key of ${input.recordType}`, {
      code: "row_key_compose_failed",
      scope: "record",
      context: { recordType: input.recordType },
      cause: input.cause,
    })
  }

  static rowKeyParseFailed(
    input: RecordInput & { bytes: string; type: string; cause?: unknown },
  ): RecordError {
    return new RecordError(`Could not parse row key of ${input.recordType} as ${input.type}`, {
      code: "row_key_parse_failed",
      scope: "record",
      context: { recordType: input.recordType, bytes: input.bytes, type: input.type },
      cause: input.cause,
    })
  }

  static recordNotInstantiable(input: RecordInput & { cause: unknown }): RecordError {
    return new RecordError(`Could not construct an instance of ${input.recordType}`, {
      code: "record_not_instantiable",
      scope: "record",
      context: { recordType: input.recordType },
      cause: input.cause,
    })
  }

  static allColumnsNull(input: RecordInput): RecordError {
    return new RecordError(`Every column field of ${input.recordType} is empty; nothing to write`, {
      code: "all_columns_null",
      scope: "record",
      context: input,
    })
  }

  static fieldMultiVersionEmpty(input: FieldInput): RecordError {
    return new RecordError(
      `Multi-version field ${input.recordType}.${input.field} holds an empty map; leave it unset instead`,
      { code: "field_multi_version_empty", scope: "record", context: input },
    )
  }

  static fieldValueInvalid(input: FieldInput & { reason: string; index?: number }): RecordError {
    return new RecordError(`Field ${input.recordType}.${input.field} ${input.reason}`, {
      code: "field_value_invalid",
      scope: "record",
      context: input,
    })
  }

  static fieldConversionFailed(
    input: FieldInput & { failedFields: readonly string[]; cause: unknown },
  ): RecordError {
    const others = input.failedFields.length > 1 ? ` (failed fields: ${input.failedFields.join(", ")})` : ""

    return new RecordError(`Could not read field ${input.recordType}.${input.field}${others}`, {
      code: "field_conversion_failed",
      scope: "record",
      context: {
        recordType: input.recordType,
        field: input.field,
        failedFields: [...input.failedFields],
      },
      cause: input.cause,
    })
  }

  static codecFailed(input: { context: ErrorContext; cause: unknown }): RecordError {
    const message = input.cause instanceof Error ? input.cause.message : "Codec failed"

    return new RecordError(message, {
      code: "codec_failed",
      scope: "record",
      context: input.context,
      cause: input.cause,
    })
  }
}

import type { Codec, TypeDescriptor } from "@rowmap/codec"
import type { ErrorContext } from "@rowmap/errors"
import { RecordError } from "../errors/record-error"
import type { ResolvedField } from "../metadata/resolve-metadata"

/**
 * Codec calls for one field. Any codec failure surfaces as `codec_failed`
 * with the field's coordinates in context.
 */
export class FieldCodec {
  constructor(
    private readonly codec: Codec,
    private readonly recordType: string,
  ) {}

  encode(field: ResolvedField, value: unknown, type: TypeDescriptor = field.type): Uint8Array {
    try {
      return this.codec.serialize(value, type, field.codecFlags)
    } catch (err) {
      throw RecordError.codecFailed({ context: this.contextOf(field), cause: err })
    }
  }

  decode(field: ResolvedField, bytes: Uint8Array): unknown {
    try {
      return this.codec.deserialize(bytes, field.type, field.codecFlags)
    } catch (err) {
      throw RecordError.codecFailed({ context: this.contextOf(field), cause: err })
    }
  }

  private contextOf(field: ResolvedField): ErrorContext {
    return {
      recordType: this.recordType,
      field: field.field,
      family: field.family,
      ...(field.mode !== "list" && { qualifier: field.qualifier }),
    }
  }
}

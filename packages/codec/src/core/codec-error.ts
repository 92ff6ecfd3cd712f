import { BaseError } from "@rowmap/errors"
import type { TypeDescriptor } from "../ports/type-descriptor"
import { describeType } from "./types"
import { toHex } from "./bytes"

export type CodecErrorCode = "serialization_failed" | "deserialization_failed"

export class CodecError extends BaseError<CodecErrorCode> {
  static serialization(input: { type: TypeDescriptor; cause?: unknown }): CodecError {
    return new CodecError(`Could not serialize value as ${describeType(input.type)}`, {
      code: "serialization_failed",
      scope: "codec",
      context: { type: describeType(input.type) },
      cause: input.cause,
    })
  }

  static deserialization(input: {
    type: TypeDescriptor
    bytes: Uint8Array
    cause?: unknown
  }): CodecError {
    return new CodecError(
      `Could not deserialize ${input.bytes.length} bytes as ${describeType(input.type)}`,
      {
        code: "deserialization_failed",
        scope: "codec",
        context: { type: describeType(input.type), bytes: toHex(input.bytes) },
        cause: input.cause,
      },
    )
  }
}

export { BestFitCodec, type BestFitCodecOptions, SERIALIZE_AS_STRING } from "./core/best-fit-codec"
export { bytesEqual, compareBytes, EMPTY_BYTES, fromUtf8, toHex, utf8 } from "./core/bytes"
export { CodecError, type CodecErrorCode } from "./core/codec-error"
export { describeType, t } from "./core/types"
export type { Codec, CodecFlags } from "./ports/codec"
export type {
  CustomDescriptor,
  JsonDescriptor,
  ScalarDescriptor,
  ScalarKind,
  TypeDescriptor,
  TypeKind,
} from "./ports/type-descriptor"

import superjson from "superjson"
import type { Codec, CodecFlags } from "../ports/codec"
import type { ScalarKind, TypeDescriptor } from "../ports/type-descriptor"
import { EMPTY_BYTES, fromUtf8, utf8 } from "./bytes"
import { CodecError } from "./codec-error"
import {
  decodeBoolean,
  decodeDate,
  decodeFloat32,
  decodeFloat64,
  decodeInt16,
  decodeInt32,
  decodeInt64,
  encodeBoolean,
  encodeDate,
  encodeFloat32,
  encodeFloat64,
  encodeInt16,
  encodeInt32,
  encodeInt64,
  toInt16,
  toInt32,
  toInt64,
  toValidDate,
} from "./fixed-width"

/**
 * When `"true"`, numeric, boolean and date values are stored as their text
 * form instead of fixed-width binary. Useful for row keys that must sort
 * or read naturally in store shells.
 */
export const SERIALIZE_AS_STRING = "serializeAsString"

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/
const INTEGER_PATTERN = /^[+-]?\d+$/
const NON_FINITE_TEXT: ReadonlySet<string> = new Set(["NaN", "Infinity", "-Infinity"])

const TEXT_CAPABLE: ReadonlySet<ScalarKind> = new Set<ScalarKind>([
  "boolean",
  "int16",
  "int32",
  "int64",
  "float32",
  "float64",
  "date",
])

export type BestFitCodecOptions = {
  /** Flags applied beneath every per-call flag set */
  defaultFlags?: CodecFlags
}

/**
 * The default codec.
 *
 * Picks the most compact encoding the declared type allows: fixed-width
 * big-endian binary for numbers, booleans and dates, UTF-8 for text and
 * decimals, and superjson text for composite values.
 */
export class BestFitCodec implements Codec {
  private readonly defaultFlags: CodecFlags

  constructor(opts: BestFitCodecOptions = {}) {
    this.defaultFlags = Object.freeze({ ...opts.defaultFlags })
  }

  serialize(value: unknown, type: TypeDescriptor, flags?: CodecFlags): Uint8Array {
    if (value === null || value === undefined) return EMPTY_BYTES

    try {
      return this.encode(value, type, this.asString(flags))
    } catch (cause) {
      throw CodecError.serialization({ type, cause })
    }
  }

  deserialize(bytes: Uint8Array, type: TypeDescriptor, flags?: CodecFlags): unknown {
    if (bytes.length === 0) return null

    try {
      return this.decode(bytes, type, this.asString(flags))
    } catch (cause) {
      throw CodecError.deserialization({ type, bytes, cause })
    }
  }

  canDeserialize(type: TypeDescriptor): boolean {
    return type.kind !== "custom"
  }

  private asString(flags?: CodecFlags): boolean {
    const merged = { ...this.defaultFlags, ...flags }
    return merged[SERIALIZE_AS_STRING] === "true"
  }

  private encode(value: unknown, type: TypeDescriptor, asString: boolean): Uint8Array {
    if (type.kind === "custom") {
      throw new TypeError(`No built-in encoding for custom type ${type.name}`)
    }

    if (type.kind === "json") {
      return utf8(superjson.stringify(value))
    }

    if (asString && TEXT_CAPABLE.has(type.kind)) {
      return utf8(encodeText(value, type.kind))
    }

    switch (type.kind) {
      case "string":
        if (typeof value !== "string") throw new TypeError(`Expected string, got ${typeof value}`)
        return utf8(value)
      case "decimal":
        return utf8(toDecimalText(value))
      case "bytes":
        if (!(value instanceof Uint8Array)) throw new TypeError("Expected Uint8Array")
        return new Uint8Array(value)
      case "boolean":
        return encodeBoolean(value)
      case "int16":
        return encodeInt16(value)
      case "int32":
        return encodeInt32(value)
      case "int64":
        return encodeInt64(value)
      case "float32":
        return encodeFloat32(value)
      case "float64":
        return encodeFloat64(value)
      case "date":
        return encodeDate(value)
    }
  }

  private decode(bytes: Uint8Array, type: TypeDescriptor, asString: boolean): unknown {
    if (type.kind === "custom") {
      throw new TypeError(`No built-in decoding for custom type ${type.name}`)
    }

    if (type.kind === "json") {
      return superjson.parse(fromUtf8(bytes))
    }

    if (asString && TEXT_CAPABLE.has(type.kind)) {
      return decodeText(fromUtf8(bytes), type.kind)
    }

    switch (type.kind) {
      case "string":
        return fromUtf8(bytes)
      case "decimal":
        return toDecimalText(fromUtf8(bytes))
      case "bytes":
        return new Uint8Array(bytes)
      case "boolean":
        return decodeBoolean(bytes)
      case "int16":
        return decodeInt16(bytes)
      case "int32":
        return decodeInt32(bytes)
      case "int64":
        return decodeInt64(bytes)
      case "float32":
        return decodeFloat32(bytes)
      case "float64":
        return decodeFloat64(bytes)
      case "date":
        return decodeDate(bytes)
    }
  }
}

function toDecimalText(value: unknown): string {
  const text =
    typeof value === "number" || typeof value === "bigint" ? String(value) : value

  if (typeof text !== "string" || !DECIMAL_PATTERN.test(text)) {
    throw new TypeError(`Expected a decimal, got ${String(value)}`)
  }
  return text
}

function encodeText(value: unknown, kind: ScalarKind): string {
  switch (kind) {
    case "boolean":
      if (typeof value !== "boolean") throw new TypeError(`Expected boolean, got ${typeof value}`)
      return String(value)
    case "int16":
      return String(toInt16(value))
    case "int32":
      return String(toInt32(value))
    case "int64":
      return toInt64(value).toString()
    case "date":
      return toValidDate(value).toISOString()
    default:
      if (typeof value !== "number") throw new TypeError(`Expected ${kind}, got ${typeof value}`)
      return String(value)
  }
}

function decodeText(text: string, kind: ScalarKind): unknown {
  switch (kind) {
    case "boolean":
      if (text !== "true" && text !== "false") throw new TypeError(`Not a boolean: ${text}`)
      return text === "true"
    case "int16":
      return toInt16(parseIntegerText(text))
    case "int32":
      return toInt32(parseIntegerText(text))
    case "int64":
      if (!INTEGER_PATTERN.test(text)) throw new TypeError(`Not an integer: ${text}`)
      return toInt64(BigInt(text))
    case "date":
      return toValidDate(new Date(text))
    default:
      if (!DECIMAL_PATTERN.test(text) && !NON_FINITE_TEXT.has(text)) {
        throw new TypeError(`Not a number: ${text}`)
      }
      return Number(text)
  }
}

function parseIntegerText(text: string): number {
  if (!INTEGER_PATTERN.test(text)) throw new TypeError(`Not an integer: ${text}`)
  return Number(text)
}

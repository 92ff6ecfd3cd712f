/**
 * Value kinds with a fixed binary or text encoding.
 */
export type ScalarKind =
  | "string"
  | "boolean"
  | "int16"
  | "int32"
  | "int64"
  | "float32"
  | "float64"
  | "decimal"
  | "bytes"
  | "date"

type DescriptorBase = {
  /**
   * Whether the declared type can hold "no value".
   *
   * @remarks
   * Non-nullable ("primitive") types cannot back a single-version column:
   * a missing cell must be representable on read.
   */
  readonly nullable: boolean
}

export type ScalarDescriptor = DescriptorBase & {
  readonly kind: ScalarKind
}

/**
 * Composite values (objects, arrays, maps, sets...) stored in one structured
 * encoding. `name` is informational, used in error messages.
 */
export type JsonDescriptor = DescriptorBase & {
  readonly kind: "json"
  readonly name?: string
}

/**
 * An application-specific value type. Only custom codecs can handle these.
 */
export type CustomDescriptor = DescriptorBase & {
  readonly kind: "custom"
  readonly name: string
}

/**
 * The declared type of a stored value. The codec picks an encoding from this
 * alone, so no type tags are written into payloads.
 */
export type TypeDescriptor = ScalarDescriptor | JsonDescriptor | CustomDescriptor

export type TypeKind = TypeDescriptor["kind"]

import type {
  CustomDescriptor,
  JsonDescriptor,
  ScalarDescriptor,
  ScalarKind,
  TypeDescriptor,
} from "../ports/type-descriptor"

function scalar(kind: ScalarKind): ScalarDescriptor {
  return Object.freeze({ kind, nullable: true })
}

/**
 * Type descriptor factories used in table declarations.
 *
 * @example
 * ```ts
 * column("main").type(t.int32())
 * column("main").type(t.notNull(t.int32())) // rejected for single-version columns
 * column("prefs").type(t.json("Preferences"))
 * ```
 */
export const t = {
  string: (): ScalarDescriptor => scalar("string"),
  boolean: (): ScalarDescriptor => scalar("boolean"),
  int16: (): ScalarDescriptor => scalar("int16"),
  int32: (): ScalarDescriptor => scalar("int32"),
  /** 64-bit integer; values read back as `bigint` */
  int64: (): ScalarDescriptor => scalar("int64"),
  float32: (): ScalarDescriptor => scalar("float32"),
  float64: (): ScalarDescriptor => scalar("float64"),
  /** Arbitrary-precision decimal held as a string */
  decimal: (): ScalarDescriptor => scalar("decimal"),
  bytes: (): ScalarDescriptor => scalar("bytes"),
  date: (): ScalarDescriptor => scalar("date"),

  json: (name?: string): JsonDescriptor =>
    Object.freeze(name === undefined ? { kind: "json", nullable: true } : { kind: "json", nullable: true, name }),

  custom: (name: string): CustomDescriptor => Object.freeze({ kind: "custom", nullable: true, name }),

  notNull: <D extends TypeDescriptor>(type: D): D => Object.freeze<D>({ ...type, nullable: false }),
} as const

/**
 * Human-readable type name for messages, e.g. `int32`, `json<Address>`, `custom<Money>!`.
 */
export function describeType(type: TypeDescriptor): string {
  const base =
    type.kind === "custom" || (type.kind === "json" && type.name !== undefined)
      ? `${type.kind}<${type.name}>`
      : type.kind

  return type.nullable ? base : `${base}!`
}

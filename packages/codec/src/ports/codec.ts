import type { TypeDescriptor } from "./type-descriptor"

/**
 * String flags passed through to the codec from table and column declarations.
 *
 * @example
 * ```ts
 * { serializeAsString: "true" }
 * ```
 */
export type CodecFlags = Readonly<Record<string, string>>

/**
 * Codec converts field values to and from the bytes stored in cells.
 *
 * @remarks
 * Implementations must be deterministic: the same declared type always picks
 * the same encoding. Failures are reported as `CodecError`.
 *
 * - `serialize` returns zero-length bytes for `null` and `undefined`. The
 *   mapper treats zero-length output as "no value" and omits the cell.
 * - `deserialize` returns `null` for zero-length input.
 */
export interface Codec {
  serialize(value: unknown, type: TypeDescriptor, flags?: CodecFlags): Uint8Array

  deserialize(bytes: Uint8Array, type: TypeDescriptor, flags?: CodecFlags): unknown

  /**
   * Whether values of this declared type can be read back.
   * Checked once per field when a table definition is validated.
   */
  canDeserialize(type: TypeDescriptor): boolean
}

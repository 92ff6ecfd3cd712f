const INT16_MIN = -32_768
const INT16_MAX = 32_767
const INT32_MIN = -2_147_483_648
const INT32_MAX = 2_147_483_647

function view(size: number): [Uint8Array, DataView] {
  const bytes = new Uint8Array(size)
  return [bytes, new DataView(bytes.buffer)]
}

function readView(bytes: Uint8Array, size: number, what: string): DataView {
  if (bytes.length !== size) {
    throw new RangeError(`${what} needs exactly ${size} bytes, got ${bytes.length}`)
  }
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
}

function assertInteger(value: unknown, min: number, max: number, what: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
    throw new TypeError(`Expected ${what}, got ${String(value)}`)
  }
  return value
}

export function toInt16(value: unknown): number {
  return assertInteger(value, INT16_MIN, INT16_MAX, "int16")
}

export function toInt32(value: unknown): number {
  return assertInteger(value, INT32_MIN, INT32_MAX, "int32")
}

export function toInt64(value: unknown): bigint {
  if (typeof value === "number" && Number.isSafeInteger(value)) return BigInt(value)

  if (typeof value === "bigint" && BigInt.asIntN(64, value) === value) return value

  throw new TypeError(`Expected int64, got ${String(value)}`)
}

export function encodeBoolean(value: unknown): Uint8Array {
  if (typeof value !== "boolean") throw new TypeError(`Expected boolean, got ${typeof value}`)

  return Uint8Array.of(value ? 0xff : 0x00)
}

export function decodeBoolean(bytes: Uint8Array): boolean {
  readView(bytes, 1, "boolean")
  return bytes[0] !== 0
}

export function encodeInt16(value: unknown): Uint8Array {
  const [bytes, dv] = view(2)
  dv.setInt16(0, toInt16(value))
  return bytes
}

export function decodeInt16(bytes: Uint8Array): number {
  return readView(bytes, 2, "int16").getInt16(0)
}

export function encodeInt32(value: unknown): Uint8Array {
  const [bytes, dv] = view(4)
  dv.setInt32(0, toInt32(value))
  return bytes
}

export function decodeInt32(bytes: Uint8Array): number {
  return readView(bytes, 4, "int32").getInt32(0)
}

export function encodeInt64(value: unknown): Uint8Array {
  const [bytes, dv] = view(8)
  dv.setBigInt64(0, toInt64(value))
  return bytes
}

export function decodeInt64(bytes: Uint8Array): bigint {
  return readView(bytes, 8, "int64").getBigInt64(0)
}

export function encodeFloat32(value: unknown): Uint8Array {
  if (typeof value !== "number") throw new TypeError(`Expected float32, got ${typeof value}`)

  const [bytes, dv] = view(4)
  dv.setFloat32(0, value)
  return bytes
}

export function decodeFloat32(bytes: Uint8Array): number {
  return readView(bytes, 4, "float32").getFloat32(0)
}

export function encodeFloat64(value: unknown): Uint8Array {
  if (typeof value !== "number") throw new TypeError(`Expected float64, got ${typeof value}`)

  const [bytes, dv] = view(8)
  dv.setFloat64(0, value)
  return bytes
}

export function decodeFloat64(bytes: Uint8Array): number {
  return readView(bytes, 8, "float64").getFloat64(0)
}

export function toValidDate(value: unknown): Date {
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
    throw new TypeError("Expected a valid Date")
  }
  return value
}

export function encodeDate(value: unknown): Uint8Array {
  return encodeInt64(toValidDate(value).getTime())
}

export function decodeDate(bytes: Uint8Array): Date {
  return toValidDate(new Date(Number(decodeInt64(bytes))))
}

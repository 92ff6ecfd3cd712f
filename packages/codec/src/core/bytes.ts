const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true })

export const EMPTY_BYTES: Uint8Array = new Uint8Array(0)

export function utf8(text: string): Uint8Array {
  return encoder.encode(text)
}

/**
 * Decode UTF-8, throwing a TypeError on malformed input.
 */
export function fromUtf8(bytes: Uint8Array): string {
  return decoder.decode(bytes)
}

/**
 * Unsigned lexicographic comparison; a proper prefix sorts first.
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const len = Math.min(a.length, b.length)

  for (let i = 0; i < len; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0)
    if (diff !== 0) return diff
  }

  return a.length - b.length
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return compareBytes(a, b) === 0
}

export function toHex(bytes: Uint8Array): string {
  let out = ""
  for (const b of bytes) {
    out += b.toString(16).padStart(2, "0")
  }
  return out
}

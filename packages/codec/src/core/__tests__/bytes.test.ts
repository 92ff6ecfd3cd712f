import { bytesEqual, compareBytes, fromUtf8, toHex, utf8 } from "../bytes"

describe("compareBytes", () => {
  it("orders by unsigned byte value", () => {
    expect(compareBytes(Uint8Array.of(0x01), Uint8Array.of(0xff))).toBeLessThan(0)
    expect(compareBytes(Uint8Array.of(0x80), Uint8Array.of(0x7f))).toBeGreaterThan(0)
  })

  it("sorts a proper prefix first", () => {
    expect(compareBytes(utf8("ab"), utf8("abc"))).toBeLessThan(0)
    expect(compareBytes(utf8("abc"), utf8("ab"))).toBeGreaterThan(0)
  })

  it("returns zero for equal content", () => {
    expect(compareBytes(utf8("cf"), utf8("cf"))).toBe(0)
    expect(bytesEqual(utf8("cf"), utf8("cf"))).toBe(true)
  })

  it("compares views by their own window", () => {
    const backing = Uint8Array.of(9, 1, 2, 9)
    const window = backing.subarray(1, 3)

    expect(compareBytes(window, Uint8Array.of(1, 2))).toBe(0)
  })
})

describe("utf8", () => {
  it("round-trips text", () => {
    expect(fromUtf8(utf8("qualifier-é"))).toBe("qualifier-é")
  })

  it("throws on malformed input", () => {
    expect(() => fromUtf8(Uint8Array.of(0xc3))).toThrow(TypeError)
  })
})

describe("toHex", () => {
  it("renders two lowercase digits per byte", () => {
    expect(toHex(Uint8Array.of(0, 15, 255))).toBe("000fff")
  })
})

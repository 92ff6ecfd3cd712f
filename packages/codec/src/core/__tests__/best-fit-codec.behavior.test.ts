import { catchError } from "../../tests/utils/catch-error"
import { BestFitCodec, SERIALIZE_AS_STRING } from "../best-fit-codec"
import { utf8 } from "../bytes"
import { CodecError } from "../codec-error"
import { t } from "../types"

describe("BestFitCodec", () => {
  const codec = new BestFitCodec()

  describe("fixed-width encodings", () => {
    it("stores booleans in one byte", () => {
      expect(codec.serialize(true, t.boolean())).toEqual(Uint8Array.of(0xff))
      expect(codec.serialize(false, t.boolean())).toEqual(Uint8Array.of(0x00))
    })

    it("reads any non-zero byte as true", () => {
      expect(codec.deserialize(Uint8Array.of(0x01), t.boolean())).toBe(true)
      expect(codec.deserialize(Uint8Array.of(0x00), t.boolean())).toBe(false)
    })

    it("stores int16 and int32 big-endian", () => {
      expect(codec.serialize(258, t.int16())).toEqual(Uint8Array.of(0x01, 0x02))
      expect(codec.serialize(1, t.int32())).toEqual(Uint8Array.of(0, 0, 0, 1))
      expect(codec.serialize(-1, t.int32())).toEqual(Uint8Array.of(0xff, 0xff, 0xff, 0xff))
    })

    it("stores int64 in eight bytes and reads it back as bigint", () => {
      const bytes = codec.serialize(5, t.int64())

      expect(bytes).toEqual(Uint8Array.of(0, 0, 0, 0, 0, 0, 0, 5))
      expect(codec.deserialize(bytes, t.int64())).toBe(5n)
    })

    it("keeps int64 values beyond the safe integer range", () => {
      const big = 9_007_199_254_740_993n

      const bytes = codec.serialize(big, t.int64())

      expect(codec.deserialize(bytes, t.int64())).toBe(big)
    })

    it("stores floats as IEEE-754 big-endian", () => {
      expect(codec.serialize(1.5, t.float32())).toEqual(Uint8Array.of(0x3f, 0xc0, 0, 0))
      expect(codec.serialize(1.5, t.float64())).toEqual(
        Uint8Array.of(0x3f, 0xf8, 0, 0, 0, 0, 0, 0),
      )
      expect(codec.deserialize(Uint8Array.of(0x3f, 0xc0, 0, 0), t.float32())).toBe(1.5)
    })

    it("stores dates as epoch milliseconds", () => {
      const bytes = codec.serialize(new Date(1000), t.date())

      expect(bytes).toEqual(Uint8Array.of(0, 0, 0, 0, 0, 0, 0x03, 0xe8))
      expect(codec.deserialize(bytes, t.date())).toEqual(new Date(1000))
    })
  })

  describe("text encodings", () => {
    it("stores strings as UTF-8", () => {
      expect(codec.serialize("héllo", t.string())).toEqual(
        Uint8Array.of(0x68, 0xc3, 0xa9, 0x6c, 0x6c, 0x6f),
      )
    })

    it("stores decimals as their text", () => {
      expect(codec.serialize("12.50", t.decimal())).toEqual(utf8("12.50"))
      expect(codec.serialize(0.1, t.decimal())).toEqual(utf8("0.1"))
      expect(codec.deserialize(utf8("12.50"), t.decimal())).toBe("12.50")
    })

    it("rejects text that is not a decimal", () => {
      const err = catchError(() => codec.serialize("12,50", t.decimal()))

      expect(err).toMatchObject({ code: "serialization_failed" })
    })
  })

  describe("bytes", () => {
    it("copies bytes in both directions", () => {
      const raw = Uint8Array.of(1, 2, 3)

      const stored = codec.serialize(raw, t.bytes())
      const read = codec.deserialize(stored, t.bytes())

      expect(stored).toEqual(raw)
      expect(stored).not.toBe(raw)
      expect(read).toEqual(raw)
      expect(read).not.toBe(stored)
    })
  })

  describe("composite values", () => {
    it("keeps dates, maps and bigints inside json values", () => {
      const value = {
        seenAt: new Date(0),
        counts: new Map([["views", 3]]),
        total: 10n,
      }

      const bytes = codec.serialize(value, t.json("Stats"))

      expect(codec.deserialize(bytes, t.json("Stats"))).toEqual(value)
    })

    it("round-trips arrays", () => {
      const bytes = codec.serialize([1, "two", null], t.json())

      expect(codec.deserialize(bytes, t.json())).toEqual([1, "two", null])
    })
  })

  describe("serializeAsString", () => {
    const flags = { [SERIALIZE_AS_STRING]: "true" }

    it("stores numbers as text", () => {
      expect(codec.serialize(42, t.int32(), flags)).toEqual(utf8("42"))
      expect(codec.deserialize(utf8("42"), t.int32(), flags)).toBe(42)
    })

    it("stores int64 as text and reads bigint", () => {
      expect(codec.serialize(9_007_199_254_740_993n, t.int64(), flags)).toEqual(
        utf8("9007199254740993"),
      )
      expect(codec.deserialize(utf8("-7"), t.int64(), flags)).toBe(-7n)
    })

    it("stores booleans and dates as text", () => {
      expect(codec.serialize(true, t.boolean(), flags)).toEqual(utf8("true"))
      expect(codec.serialize(new Date(0), t.date(), flags)).toEqual(
        utf8("1970-01-01T00:00:00.000Z"),
      )
      expect(codec.deserialize(utf8("1970-01-01T00:00:00.000Z"), t.date(), flags)).toEqual(
        new Date(0),
      )
    })

    it("rejects non-integer text for integer kinds", () => {
      const err = catchError(() => codec.deserialize(utf8("4.5"), t.int32(), flags))

      expect(err).toMatchObject({ code: "deserialization_failed" })
    })

    it("leaves strings untouched", () => {
      expect(codec.serialize("42", t.string(), flags)).toEqual(utf8("42"))
    })

    it("lets per-call flags override the defaults", () => {
      const textCodec = new BestFitCodec({ defaultFlags: flags })

      expect(textCodec.serialize(1, t.int32())).toEqual(utf8("1"))
      expect(textCodec.serialize(1, t.int32(), { [SERIALIZE_AS_STRING]: "false" })).toEqual(
        Uint8Array.of(0, 0, 0, 1),
      )
    })
  })

  describe("failures", () => {
    it("rejects integers out of range", () => {
      expect(catchError(() => codec.serialize(2 ** 31, t.int32()))).toMatchObject({
        code: "serialization_failed",
      })
      expect(catchError(() => codec.serialize(2n ** 63n, t.int64()))).toMatchObject({
        code: "serialization_failed",
      })
    })

    it("rejects fractions for integer kinds", () => {
      expect(catchError(() => codec.serialize(1.5, t.int16()))).toBeInstanceOf(CodecError)
    })

    it("rejects stored dates outside the representable range", () => {
      const bytes = Uint8Array.of(0x40, 0, 0, 0, 0, 0, 0, 0)

      expect(catchError(() => codec.deserialize(bytes, t.date()))).toMatchObject({
        code: "deserialization_failed",
        context: { type: "date", bytes: "4000000000000000" },
      })
    })

    it("applies integer ranges to stored text", () => {
      const flags = { [SERIALIZE_AS_STRING]: "true" }

      expect(catchError(() => codec.deserialize(utf8("99999"), t.int16(), flags))).toMatchObject({
        code: "deserialization_failed",
      })
      expect(catchError(() => codec.deserialize(utf8("2147483648"), t.int32(), flags))).toMatchObject({
        code: "deserialization_failed",
      })
      expect(
        catchError(() => codec.deserialize(utf8("99999999999999999999999"), t.int64(), flags)),
      ).toMatchObject({ code: "deserialization_failed" })
      expect(catchError(() => codec.serialize(99_999, t.int16(), flags))).toMatchObject({
        code: "serialization_failed",
      })
    })

    it("accepts only decimal digits in stored number text", () => {
      const flags = { [SERIALIZE_AS_STRING]: "true" }

      for (const [text, type] of [
        ["0x10", t.int32()],
        ["1e3", t.int16()],
        ["0b11", t.int64()],
        ["0x1p3", t.float64()],
        [" 12", t.float64()],
      ] as const) {
        expect(catchError(() => codec.deserialize(utf8(text), type, flags))).toMatchObject({
          code: "deserialization_failed",
        })
      }
      expect(codec.deserialize(utf8("-12.5e2"), t.float64(), flags)).toBe(-1250)
      expect(codec.deserialize(utf8("NaN"), t.float32(), flags)).toBeNaN()
    })

    it("reports the byte length and hex on wrong-width input", () => {
      const err = catchError(() => codec.deserialize(Uint8Array.of(1, 2, 3), t.int32()))

      expect(err).toBeInstanceOf(CodecError)
      expect(err).toMatchObject({
        code: "deserialization_failed",
        message: "Could not deserialize 3 bytes as int32",
        context: { type: "int32", bytes: "010203" },
      })
    })

    it("rejects malformed UTF-8", () => {
      const err = catchError(() => codec.deserialize(Uint8Array.of(0xff), t.string()))

      expect(err).toMatchObject({ code: "deserialization_failed" })
    })

    it("rejects malformed json", () => {
      const err = catchError(() => codec.deserialize(utf8("{"), t.json()))

      expect(err).toMatchObject({ code: "deserialization_failed" })
    })

    it("keeps the underlying error as cause", () => {
      const err = catchError(() => codec.serialize("x", t.boolean()))

      expect(err).toBeInstanceOf(CodecError)
      expect(err instanceof CodecError && err.cause).toBeInstanceOf(TypeError)
    })
  })

  describe("custom types", () => {
    it("cannot deserialize custom types", () => {
      expect(codec.canDeserialize(t.custom("Money"))).toBe(false)
    })

    it("refuses to serialize custom types", () => {
      const err = catchError(() => codec.serialize({ cents: 1 }, t.custom("Money")))

      expect(err).toMatchObject({
        code: "serialization_failed",
        context: { type: "custom<Money>" },
      })
    })
  })
})

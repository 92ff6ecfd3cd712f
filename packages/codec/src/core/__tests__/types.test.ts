import { describeType, t } from "../types"

describe("t", () => {
  it("builds nullable descriptors by default", () => {
    expect(t.int32()).toEqual({ kind: "int32", nullable: true })
    expect(t.json()).toEqual({ kind: "json", nullable: true })
    expect(t.json("Address")).toEqual({ kind: "json", nullable: true, name: "Address" })
  })

  it("notNull() returns a non-nullable copy", () => {
    const base = t.float64()

    const primitive = t.notNull(base)

    expect(primitive).toEqual({ kind: "float64", nullable: false })
    expect(base.nullable).toBe(true)
  })

  it("freezes descriptors", () => {
    expect(Object.isFrozen(t.string())).toBe(true)
    expect(Object.isFrozen(t.notNull(t.string()))).toBe(true)
  })
})

describe("describeType", () => {
  it("names scalar kinds", () => {
    expect(describeType(t.int64())).toBe("int64")
  })

  it("includes json and custom names", () => {
    expect(describeType(t.json("Address"))).toBe("json<Address>")
    expect(describeType(t.json())).toBe("json")
    expect(describeType(t.custom("Money"))).toBe("custom<Money>")
  })

  it("marks non-nullable types", () => {
    expect(describeType(t.notNull(t.int32()))).toBe("int32!")
  })
})

import { utf8 } from "@rowmap/codec"
import { fromCells, toCells } from "../cells"
import { ColumnarMap, LATEST_TIMESTAMP, VersionMap } from "../columnar-map"

const text = (value: string) => utf8(value)
const names = (keys: Iterable<Uint8Array>) => [...keys].map((k) => new TextDecoder().decode(k))

describe("VersionMap", () => {
  it("iterates newest first", () => {
    const versions = new VersionMap([
      [10, text("a")],
      [30, text("c")],
      [20, text("b")],
    ])

    expect([...versions.keys()]).toEqual([30, 20, 10])
  })

  it("returns the value with the greatest timestamp as latest", () => {
    const versions = new VersionMap([
      [10, text("a")],
      [30, text("c")],
    ])

    expect(versions.latest()).toEqual(text("c"))
    expect(new VersionMap().latest()).toBeUndefined()
  })
})

describe("ColumnarMap", () => {
  it("orders families and qualifiers by unsigned bytes", () => {
    const columns = new ColumnarMap()
      .put("b", "q", 1, text("1"))
      .put("a", "z", 1, text("2"))
      .put("a", "aa", 1, text("3"))
      .put("a", "a", 1, text("4"))

    expect(names(columns.keys())).toEqual(["a", "b"])
    expect(names(columns.family("a")?.keys() ?? [])).toEqual(["a", "aa", "z"])
  })

  it("treats string and byte names as the same key", () => {
    const columns = new ColumnarMap().put("main", utf8("name"), LATEST_TIMESTAMP, text("Ada"))

    expect(columns.column(utf8("main"), "name")?.latest()).toEqual(text("Ada"))
    expect(columns.column("main", "missing")).toBeUndefined()
    expect(columns.column("other", "name")).toBeUndefined()
  })

  it("counts every stored version", () => {
    const columns = new ColumnarMap()
      .put("f", "q1", 1, text("a"))
      .put("f", "q1", 2, text("b"))
      .put("g", "q2", 1, text("c"))

    expect(columns.cellCount()).toBe(3)
  })
})

describe("cells", () => {
  const rowKey = utf8("row-1")

  it("flattens by family, qualifier, then newest version", () => {
    const columns = new ColumnarMap()
      .put("g", "x", 5, text("g"))
      .put("f", "y", 1, text("old"))
      .put("f", "y", 2, text("new"))

    const cells = toCells({ rowKey, columns })

    expect(cells.map((c) => [new TextDecoder().decode(c.family), new TextDecoder().decode(c.qualifier), c.timestamp])).toEqual([
      ["f", "y", 2],
      ["f", "y", 1],
      ["g", "x", 5],
    ])
    expect(cells.every((c) => c.row === rowKey)).toBe(true)
  })

  it("groups cells back into the same columns", () => {
    const columns = new ColumnarMap()
      .put("f", "y", 1, text("old"))
      .put("f", "y", 2, text("new"))

    const regrouped = fromCells(toCells({ rowKey, columns }))

    expect(regrouped.column("f", "y")?.latest()).toEqual(text("new"))
    expect(regrouped.cellCount()).toBe(2)
  })
})

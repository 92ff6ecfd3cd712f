import { t } from "@rowmap/codec"
import type { Logger } from "@rowmap/logger"
import { type MockProxy, mock } from "vitest-mock-extended"
import { Citizen, Citizens, citizen } from "../../../tests/fixtures/citizen"
import { column } from "../../declare/column"
import { defineTable } from "../../declare/define-table"
import { resolveMetadata, toFieldMapping } from "../resolve-metadata"

describe("resolveMetadata", () => {
  let logger: MockProxy<Logger>

  beforeEach(() => {
    logger = mock<Logger>()
  })

  it("returns the same object for repeated resolutions", () => {
    expect(resolveMetadata(Citizens)).toBe(resolveMetadata(Citizens))
  })

  it("logs only the first resolution of a definition", () => {
    const definition = defineTable(Citizen, {
      families: { main: {} },
      rowKey: { fields: ["uid"], type: t.string() },
      fields: { name: column("main").type(t.string()) },
    })

    resolveMetadata(definition, logger)
    resolveMetadata(definition, logger)

    expect(logger.debug).toHaveBeenCalledOnce()
    expect(logger.debug).toHaveBeenCalledWith("Resolved table metadata", {
      operation: "resolve",
      recordType: "Citizen",
      table: "Citizen",
      fieldCount: 1,
    })
  })

  it("resolves table metadata with default max versions", () => {
    const { table } = resolveMetadata(Citizens)

    expect(table.name).toBe("citizens")
    expect(table.recordType).toBe("Citizen")
    expect([...table.families]).toEqual([
      ["main", 1],
      ["optional", 3],
      ["tracked", 10],
      ["phones", 1],
    ])
    expect(table.rowKey).toEqual({ fields: ["countryCode", "uid"], type: t.string() })
  })

  it("defaults qualifiers to field names", () => {
    const fields = resolveMetadata(Citizens).fields.map(toFieldMapping)

    expect(fields[0]).toEqual({
      field: "name",
      family: "main",
      qualifier: "name",
      mode: "single",
      type: t.string(),
      codecFlags: {},
      transient: false,
      static: false,
    })
    expect(fields[2]).toMatchObject({ field: "active", qualifier: "is_active" })
    expect(fields[7]).toMatchObject({ field: "phones", mode: "list", idAccessor: "number" })
  })

  it("overlays column flags on table flags", () => {
    const definition = defineTable(Citizen, {
      families: { main: {} },
      codecFlags: { serializeAsString: "true", region: "eu" },
      rowKey: { fields: ["uid"], type: t.string() },
      fields: { age: column("main").type(t.int32()).flags({ serializeAsString: "false" }) },
    })

    const [age] = resolveMetadata(definition).fields

    expect(age?.codecFlags).toEqual({ serializeAsString: "false", region: "eu" })
    expect(resolveMetadata(definition).table.codecFlags).toEqual({ serializeAsString: "true", region: "eu" })
  })

  it("generates accessors that read and write the named field", () => {
    const [name] = resolveMetadata(Citizens).fields
    const record = citizen({ name: "Ada" })

    expect(name?.accessor.get(record)).toBe("Ada")
    name?.accessor.set(record, "Grace")
    expect(record.name).toBe("Grace")
  })
})

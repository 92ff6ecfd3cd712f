import { CodecError, t } from "@rowmap/codec"
import { isAppError, serializeError } from "@rowmap/errors"
import { DefinitionError } from "../definition-error"
import { RecordError } from "../record-error"

describe("RecordError", () => {
  it("names the unset row-key field", () => {
    const err = RecordError.rowKeyCantBeEmpty({ recordType: "Citizen", field: "uid" })

    expect(err.message).toBe("Row key of Citizen is empty: field uid is not set")
    expect(err.context).toEqual({ recordType: "Citizen", field: "uid" })
    expect(err.isOperational).toBe(true)
    expect(isAppError(err)).toBe(true)
  })

  it("lists other failed fields in the conversion message", () => {
    const single = RecordError.fieldConversionFailed({
      recordType: "Citizen",
      field: "age",
      failedFields: ["age"],
      cause: new Error("bad"),
    })
    const several = RecordError.fieldConversionFailed({
      recordType: "Citizen",
      field: "age",
      failedFields: ["age", "active"],
      cause: new Error("bad"),
    })

    expect(single.message).toBe("Could not read field Citizen.age")
    expect(several.message).toBe("Could not read field Citizen.age (failed fields: age, active)")
  })

  it("carries the codec message when wrapping codec failures", () => {
    const cause = CodecError.serialization({ type: t.int32() })

    const err = RecordError.codecFailed({ context: { recordType: "Citizen", field: "age" }, cause })

    expect(err.message).toBe("Could not serialize value as int32")
    expect(serializeError(err)).toMatchObject({
      code: "codec_failed",
      scope: "record",
      context: { recordType: "Citizen", field: "age" },
      cause: { code: "serialization_failed", scope: "codec" },
    })
  })
})

describe("DefinitionError", () => {
  it("describes column and family collisions", () => {
    const column = DefinitionError.duplicateColumnMapping({
      recordType: "Citizen",
      field: "b",
      family: "main",
      qualifier: "q",
      conflictsWith: "a",
    })
    const family = DefinitionError.duplicateColumnMapping({
      recordType: "Citizen",
      field: "b",
      family: "phones",
      conflictsWith: "a",
    })

    expect(column.message).toBe("Fields Citizen.a and Citizen.b both map to column main:q")
    expect(family.message).toBe('Fields Citizen.a and Citizen.b both map to family "phones"')
  })

  it("is structural rather than operational", () => {
    const err = DefinitionError.missingRowKeyField({ recordType: "Citizen" })

    expect(err.scope).toBe("definition")
    expect(err.isOperational).toBe(false)
    expect(err.message).toBe("Record class Citizen declares no row-key field")
  })
})

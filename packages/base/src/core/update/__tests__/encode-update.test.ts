import { UpdateOpBrand } from "../../../ports/update"
import { encodeUpdate } from "../encode-update"
import { isUpdateOperation, util } from "../update-ops"

describe("util", () => {
  it("increments by one unless told otherwise", () => {
    expect(util.increment().value).toBe(1)
    expect(util.increment(-2.5).value).toBe(-2.5)
  })

  it("wraps single values for append and prepend", () => {
    expect(util.append("x").values).toEqual(["x"])
    expect(util.prepend(0).values).toEqual([0])
    expect(util.append(null).values).toEqual([null])
  })

  it("keeps lists as they are, copied", () => {
    const values = [1, 2]
    const op = util.append(values)

    expect(op.values).toEqual([1, 2])
    expect(op.values).not.toBe(values)
  })

  it("brands every operation", () => {
    expect(util.trim()[UpdateOpBrand]).toBe(true)
    expect(isUpdateOperation(util.trim())).toBe(true)
  })

  it("does not mistake plain data for an operation", () => {
    expect(isUpdateOperation({ kind: "trim" })).toBe(false)
    expect(isUpdateOperation(["trim"])).toBe(false)
    expect(isUpdateOperation(null)).toBe(false)
  })
})

describe("encodeUpdate", () => {
  it("sorts one attribute per operation kind into its bucket", () => {
    const payload = encodeUpdate({
      nickname: util.trim(),
      visits: util.increment(5),
      tags: util.append([1, 2]),
      history: util.prepend(0),
    })

    expect(payload).toEqual({
      set: {},
      increment: { visits: 5 },
      append: { tags: [1, 2] },
      prepend: { history: [0] },
      delete: ["nickname"],
    })
  })

  it("sets plain values, including nested paths and objects", () => {
    const payload = encodeUpdate({
      name: "Ada",
      "profile.age": 36,
      address: { city: "London" },
      flags: [true, false],
      note: null,
      kind: { kind: "trim" },
    })

    expect(payload.set).toEqual({
      name: "Ada",
      "profile.age": 36,
      address: { city: "London" },
      flags: [true, false],
      note: null,
      kind: { kind: "trim" },
    })
    expect(payload.delete).toEqual([])
  })

  it("keeps delete in insertion order", () => {
    const payload = encodeUpdate({ b: util.trim(), a: util.trim(), c: util.trim() })

    expect(payload.delete).toEqual(["b", "a", "c"])
  })

  it("produces all five empty buckets for an empty request", () => {
    expect(encodeUpdate({})).toEqual({
      set: {},
      increment: {},
      append: {},
      prepend: {},
      delete: [],
    })
  })
})

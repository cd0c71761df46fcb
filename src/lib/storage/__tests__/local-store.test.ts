import { describe, it, expect, beforeEach, afterEach, vi } from "vitest"
import { KeyValuePatternStore, MemoryStorage } from "../local-store"
import type { PatternDocument } from "../types"
import { createLayoutState, ensureMappingTable } from "@/lib/led-mapping/mappingState"
import { PatternFormatError } from "@/lib/errors"

describe("KeyValuePatternStore", () => {
  let storage: MemoryStorage
  let store: KeyValuePatternStore

  const makeDocument = (id: string): PatternDocument => ({
    id,
    name: `Pattern ${id}`,
    createdAt: 1000,
    updatedAt: 1000,
    layout: ensureMappingTable(createLayoutState({ kind: "circle", ledCount: 8, radius: 3 }, 9, 9))
      .state,
    wiring: null,
  })

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {})
    vi.spyOn(console, "warn").mockImplementation(() => {})
    storage = new MemoryStorage()
    store = new KeyValuePatternStore(storage, "test:patterns")
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("should save and load a pattern", async () => {
    const doc = makeDocument("a")
    await store.save(doc)

    const loaded = await store.get("a")
    expect(loaded?.name).toBe("Pattern a")
    expect(loaded?.layout.spec).toEqual(doc.layout.spec)
    expect(loaded?.layout.table?.coordinates).toEqual(doc.layout.table?.coordinates)
    expect(loaded?.wiring).toBeNull()
  })

  it("should store the document's own updatedAt", async () => {
    vi.spyOn(Date, "now").mockReturnValue(9999)
    await store.save({ ...makeDocument("a"), updatedAt: 1234 })

    expect((await store.get("a"))?.updatedAt).toBe(1234)
    expect((await store.list())[0].updatedAt).toBe(1234)
  })

  it("should return null for an unknown id", async () => {
    expect(await store.get("missing")).toBeNull()
  })

  it("should list metadata for every saved pattern", async () => {
    await store.save(makeDocument("a"))
    await store.save(makeDocument("b"))

    const list = await store.list()
    expect(list.map((meta) => meta.id)).toEqual(["a", "b"])
    expect(Object.keys(list[0]).sort()).toEqual(["createdAt", "id", "name", "updatedAt"])
  })

  it("should keep the wiring target", async () => {
    const wiring = {
      width: 9,
      height: 9,
      mode: "column_serpentine" as const,
      startCorner: "top_right" as const,
      flipX: false,
      flipY: true,
    }
    await store.save({ ...makeDocument("a"), wiring })

    expect((await store.get("a"))?.wiring).toEqual(wiring)
  })

  it("should regenerate a stored table that no longer matches the grid", async () => {
    await store.save(makeDocument("a"))

    // Simulate an older save where the grid was changed by hand
    const raw = JSON.parse(storage.getItem("test:patterns") ?? "{}")
    raw.a.layout.gridWidth = 11
    raw.a.layout.gridHeight = 11
    storage.setItem("test:patterns", JSON.stringify(raw))

    const loaded = await store.get("a")
    expect(loaded?.layout.table?.gridWidth).toBe(11)
    expect(console.log).toHaveBeenCalledWith("[PatternStore] regenerated mapping table for pattern a")
  })

  it("should throw for a malformed stored pattern", async () => {
    storage.setItem("test:patterns", JSON.stringify({ a: { id: "a" } }))

    await expect(store.get("a")).rejects.toThrow(PatternFormatError)
  })

  it("should reset storage that is not valid JSON", async () => {
    storage.setItem("test:patterns", "not json")

    expect(await store.list()).toEqual([])
    expect(storage.getItem("test:patterns")).toBeNull()
  })

  it("should delete and clear patterns", async () => {
    await store.save(makeDocument("a"))
    await store.save(makeDocument("b"))

    await store.delete("a")
    expect((await store.list()).map((meta) => meta.id)).toEqual(["b"])

    await store.clear()
    expect(await store.list()).toEqual([])
  })
})

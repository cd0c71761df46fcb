import { describe, it, expect, beforeEach, afterEach, vi } from "vitest"
import {
  createLayoutState,
  ensureMappingTable,
  isMappingStale,
  resizeLayoutGrid,
  updateLayoutSpec,
} from "../mappingState"
import { createMappingTable } from "../layoutMapper"
import type { LayoutSpec } from "../types"
import { ConfigurationError, MappingValidationError } from "@/lib/errors"

describe("layout state", () => {
  const circle: LayoutSpec = { kind: "circle", ledCount: 8, radius: 3 }
  const sharedCells: LayoutSpec = {
    kind: "custom_positions",
    unit: "grid",
    positions: [
      { x: 0, y: 0 },
      { x: 0, y: 0 },
    ],
  }

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {})
    vi.spyOn(console, "warn").mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("should start without a table", () => {
    const state = createLayoutState(circle, 9, 9)

    expect(state.table).toBeNull()
    expect(state.version).toBe(1)
    expect(isMappingStale(state)).toBe(true)
  })

  describe("ensureMappingTable", () => {
    it("should generate a table on first use", () => {
      const result = ensureMappingTable(createLayoutState(circle, 9, 9))

      expect(result.regenerated).toBe(true)
      expect(result.table.coordinates).toHaveLength(8)
      expect(result.state.table).toBe(result.table)
      expect(result.state.tableVersion).toBe(1)
      expect(isMappingStale(result.state)).toBe(false)
    })

    it("should reuse a current table without regenerating", () => {
      const first = ensureMappingTable(createLayoutState(circle, 9, 9))
      const second = ensureMappingTable(first.state)

      expect(second.regenerated).toBe(false)
      expect(second.table).toBe(first.table)
      expect(second.state).toBe(first.state)
    })

    it("should regenerate after the layout spec changes and leave the old state untouched", () => {
      const first = ensureMappingTable(createLayoutState(circle, 9, 9))
      const edited = updateLayoutSpec(first.state, { ...circle, ledCount: 12 })

      expect(edited.version).toBe(2)
      expect(isMappingStale(edited)).toBe(true)

      const second = ensureMappingTable(edited)
      expect(second.regenerated).toBe(true)
      expect(second.table.coordinates).toHaveLength(12)
      expect(first.state.table?.coordinates).toHaveLength(8)
    })

    it("should regenerate for the new grid after a resize", () => {
      const first = ensureMappingTable(createLayoutState({ kind: "rectangular" }, 4, 4))
      const resized = resizeLayoutGrid(first.state, 6, 3)
      const second = ensureMappingTable(resized)

      expect(second.regenerated).toBe(true)
      expect(second.table.gridWidth).toBe(6)
      expect(second.table.gridHeight).toBe(3)
      expect(second.table.coordinates).toHaveLength(18)
    })

    it("should regenerate a stored table that no longer fits the grid", () => {
      const stale = createMappingTable("circle", 9, 9, [{ x: 20, y: 20 }])
      const state = { ...createLayoutState(circle, 9, 9), table: stale, tableVersion: 1 }

      const result = ensureMappingTable(state)

      expect(result.regenerated).toBe(true)
      expect(result.table.coordinates).toHaveLength(8)
      expect(console.log).toHaveBeenCalledWith(
        expect.stringContaining("[MappingTable] regenerating circle table: Mapping table length (1)"),
      )
    })

    it("should throw ConfigurationError for an invalid spec", () => {
      const state = createLayoutState({ kind: "circle", ledCount: 0 }, 9, 9)

      expect(() => ensureMappingTable(state)).toThrow(ConfigurationError)
      expect(state.table).toBeNull()
    })

    it("should warn about shared cells but keep the table", () => {
      const result = ensureMappingTable(createLayoutState(sharedCells, 3, 3))

      expect(result.issues).toHaveLength(1)
      expect(console.warn).toHaveBeenCalledWith(
        "[MappingTable] 1 LED(s) share a grid cell in the custom_positions layout",
      )
    })

    it("should throw MappingValidationError for shared cells under strict uniqueness", () => {
      const state = createLayoutState(sharedCells, 3, 3)

      expect(() => ensureMappingTable(state, { strictUniqueness: true })).toThrow(
        MappingValidationError,
      )
    })
  })

  describe("resizeLayoutGrid", () => {
    it("should return the same state when the size does not change", () => {
      const state = createLayoutState(circle, 9, 9)

      expect(resizeLayoutGrid(state, 9, 9)).toBe(state)
    })

    it("should bump the version on a real resize", () => {
      const state = createLayoutState(circle, 9, 9)

      expect(resizeLayoutGrid(state, 10, 9).version).toBe(2)
    })
  })
})

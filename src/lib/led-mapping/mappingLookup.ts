/**
 * Lookups over a published mapping table, plus reading LED colors out of a
 * row-major design buffer and painting them back for preview.
 */

import type { GridCoordinate, MappingTable } from "./types"
import { IndexOutOfRangeError, SizeMismatchError } from "@/lib/errors"
import { cellKey } from "./utils/geometry"

// Tables are frozen, so a reverse index per table instance never goes stale
const cellIndexCache = new WeakMap<MappingTable, Map<string, number>>()

/**
 * Cell -> first LED index that maps to it. Later LEDs sharing a cell are
 * not listed.
 */
export function buildCellIndex(table: MappingTable): Map<string, number> {
  const cached = cellIndexCache.get(table)
  if (cached) return cached

  const index = new Map<string, number>()
  table.coordinates.forEach((cell, ledIndex) => {
    const key = cellKey(cell.x, cell.y)
    if (!index.has(key)) index.set(key, ledIndex)
  })

  cellIndexCache.set(table, index)
  return index
}

/** First LED index whose cell is (x, y), or null when the cell is unmapped. */
export function gridToLedIndex(x: number, y: number, table: MappingTable): number | null {
  return buildCellIndex(table).get(cellKey(x, y)) ?? null
}

/**
 * @throws IndexOutOfRangeError when ledIndex is not in [0, N)
 */
export function ledIndexToGrid(ledIndex: number, table: MappingTable): GridCoordinate {
  const cell = Number.isInteger(ledIndex) ? table.coordinates[ledIndex] : undefined
  if (!cell) {
    throw new IndexOutOfRangeError(ledIndex, table.coordinates.length)
  }
  return cell
}

export function isMapped(x: number, y: number, table: MappingTable): boolean {
  return buildCellIndex(table).has(cellKey(x, y))
}

/** Cells no LED reads from, in row-major order. Used to dim the editor overlay. */
export function unmappedCells(table: MappingTable): GridCoordinate[] {
  const index = buildCellIndex(table)
  const cells: GridCoordinate[] = []
  for (let y = 0; y < table.gridHeight; y++) {
    for (let x = 0; x < table.gridWidth; x++) {
      if (!index.has(cellKey(x, y))) cells.push({ x, y })
    }
  }
  return cells
}

/**
 * Read the LED-ordered color sequence from a row-major W×H design buffer.
 * @throws SizeMismatchError when the buffer does not match the table's grid
 */
export function sampleLedColors<T>(grid: readonly T[], table: MappingTable): T[] {
  const expected = table.gridWidth * table.gridHeight
  if (grid.length !== expected) {
    throw new SizeMismatchError(expected, grid.length)
  }
  return table.coordinates.map((cell) => grid[cell.y * table.gridWidth + cell.x])
}

/**
 * Paint LED colors back onto a W×H grid for preview. When several LEDs share
 * a cell the highest LED index wins.
 */
export function renderPreviewGrid<T>(
  ledColors: readonly T[],
  table: MappingTable,
  fill: T,
): T[] {
  if (ledColors.length !== table.coordinates.length) {
    throw new SizeMismatchError(table.coordinates.length, ledColors.length)
  }

  const grid = new Array<T>(table.gridWidth * table.gridHeight).fill(fill)
  table.coordinates.forEach((cell, ledIndex) => {
    grid[cell.y * table.gridWidth + cell.x] = ledColors[ledIndex]
  })
  return grid
}

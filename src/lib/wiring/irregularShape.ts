/**
 * Active-cell helpers for irregular matrices (boards with holes or gaps).
 * A missing cell list means the whole rectangle is populated.
 */

import type { GridCoordinate } from "@/lib/led-mapping/types"
import { cellKey } from "@/lib/led-mapping/utils/geometry"

/** mask[y][x] is true where an LED sits; cells outside the grid are ignored. */
export function maskFromCells(
  cells: readonly GridCoordinate[],
  width: number,
  height: number,
): boolean[][] {
  const mask = Array.from({ length: height }, () => new Array<boolean>(width).fill(false))
  for (const { x, y } of cells) {
    if (x >= 0 && x < width && y >= 0 && y < height) {
      mask[y][x] = true
    }
  }
  return mask
}

/** Active cells in row-major order. */
export function cellsFromMask(mask: readonly (readonly boolean[])[]): GridCoordinate[] {
  const cells: GridCoordinate[] = []
  mask.forEach((row, y) => {
    row.forEach((active, x) => {
      if (active) cells.push({ x, y })
    })
  })
  return cells
}

export function isCellActive(
  x: number,
  y: number,
  width: number,
  height: number,
  activeCells?: readonly GridCoordinate[],
): boolean {
  if (x < 0 || x >= width || y < 0 || y >= height) return false
  if (!activeCells) return true
  return activeCells.some((c) => c.x === x && c.y === y)
}

/** Stable key for a cell set, independent of the order the cells were listed in. */
export function activeCellsKey(activeCells: readonly GridCoordinate[]): string {
  return Array.from(new Set(activeCells.map((c) => cellKey(c.x, c.y))))
    .sort()
    .join("|")
}

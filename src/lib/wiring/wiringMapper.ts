/**
 * Wiring mapper - translates between design order (row-major, top-left first)
 * and the order in which the physical strip receives color data.
 *
 * The design buffer is never reordered in place; every transform returns a
 * fresh array.
 */

import type { GridCoordinate } from "@/lib/led-mapping/types"
import type { StartCorner, WiringMode, WiringPermutation, WiringSpec } from "./types"
import { ConfigurationError, SizeMismatchError } from "@/lib/errors"
import { cellKey } from "@/lib/led-mapping/utils/geometry"

function range(from: number, to: number): number[] {
  const values: number[] = []
  if (from <= to) {
    for (let v = from; v <= to; v++) values.push(v)
  } else {
    for (let v = from; v >= to; v--) values.push(v)
  }
  return values
}

function cornerAxes(
  corner: StartCorner,
  width: number,
  height: number,
): { xs: number[]; ys: number[] } {
  const fromLeft = corner === "top_left" || corner === "bottom_left"
  const fromTop = corner === "top_left" || corner === "top_right"
  return {
    xs: fromLeft ? range(0, width - 1) : range(width - 1, 0),
    ys: fromTop ? range(0, height - 1) : range(height - 1, 0),
  }
}

/**
 * Cells in the order the strip visits them, before flips are applied.
 * Serpentine variants reverse every other line, starting in the corner's
 * direction.
 */
export function buildTraversalPath(
  width: number,
  height: number,
  mode: WiringMode,
  startCorner: StartCorner,
): GridCoordinate[] {
  const { xs, ys } = cornerAxes(startCorner, width, height)
  const xsReversed = [...xs].reverse()
  const ysReversed = [...ys].reverse()
  const path: GridCoordinate[] = []

  switch (mode) {
    case "row_major":
    case "serpentine":
      ys.forEach((y, row) => {
        const line = mode === "serpentine" && row % 2 === 1 ? xsReversed : xs
        for (const x of line) path.push({ x, y })
      })
      break

    case "column_major":
    case "column_serpentine":
      xs.forEach((x, column) => {
        const line = mode === "column_serpentine" && column % 2 === 1 ? ysReversed : ys
        for (const y of line) path.push({ x, y })
      })
      break
  }

  return path
}

function invert(order: readonly number[], size: number): number[] {
  const inverse = new Array<number>(size).fill(-1)
  order.forEach((designIndex, hardwareIndex) => {
    inverse[designIndex] = hardwareIndex
  })
  return inverse
}

function freezePermutation(width: number, height: number, order: number[]): WiringPermutation {
  return Object.freeze({
    width,
    height,
    order: Object.freeze(order),
    inverse: Object.freeze(invert(order, width * height)),
  })
}

function requireGrid(width: number, height: number): void {
  if (!Number.isInteger(width) || width < 1 || !Number.isInteger(height) || height < 1) {
    throw new ConfigurationError(`Invalid wiring grid size: ${width}x${height}`)
  }
}

/**
 * Build the hardware -> design permutation for a wiring spec. Flips mirror
 * each visited cell and compose with any mode / corner.
 */
export function buildPermutation(spec: WiringSpec): WiringPermutation {
  const { width, height } = spec
  requireGrid(width, height)

  let path = buildTraversalPath(width, height, spec.mode, spec.startCorner).map(({ x, y }) => ({
    x: spec.flipX ? width - 1 - x : x,
    y: spec.flipY ? height - 1 - y : y,
  }))

  if (spec.activeCells) {
    const active = new Set(spec.activeCells.map((c) => cellKey(c.x, c.y)))
    path = path.filter((c) => active.has(cellKey(c.x, c.y)))
  }

  return freezePermutation(
    width,
    height,
    path.map(({ x, y }) => y * width + x),
  )
}

/**
 * Wrap an explicit hardware -> design order (e.g. read from a hand-wired
 * board description).
 * @throws ConfigurationError unless the order is a bijection over [0, W·H)
 */
export function permutationFromOrder(
  order: readonly number[],
  width: number,
  height: number,
): WiringPermutation {
  requireGrid(width, height)
  const size = width * height
  if (order.length !== size) {
    throw new ConfigurationError(`Custom order has ${order.length} entries, expected ${size}`)
  }

  const seen = new Set<number>()
  for (const designIndex of order) {
    if (!Number.isInteger(designIndex) || designIndex < 0 || designIndex >= size) {
      throw new ConfigurationError(`Custom order entry ${designIndex} is outside 0..${size - 1}`)
    }
    if (seen.has(designIndex)) {
      throw new ConfigurationError(`Custom order visits design index ${designIndex} twice`)
    }
    seen.add(designIndex)
  }

  return freezePermutation(width, height, [...order])
}

/**
 * pixels'[hw] = pixels[order[hw]]
 * @throws SizeMismatchError unless pixels.length === W·H
 */
export function designToHardware<T>(
  pixels: readonly T[],
  permutation: WiringPermutation,
): T[] {
  const expected = permutation.width * permutation.height
  if (pixels.length !== expected) {
    throw new SizeMismatchError(expected, pixels.length)
  }
  return permutation.order.map((designIndex) => pixels[designIndex])
}

/**
 * Inverse of designToHardware. Cells without an LED (irregular shapes) take
 * `fill`, which is then required.
 * @throws SizeMismatchError unless pixels.length matches the strip length
 */
export function hardwareToDesign<T>(
  pixels: readonly T[],
  permutation: WiringPermutation,
  fill?: T,
): T[] {
  if (pixels.length !== permutation.order.length) {
    throw new SizeMismatchError(permutation.order.length, pixels.length)
  }

  const design: T[] = []
  permutation.inverse.forEach((hardwareIndex, designIndex) => {
    if (hardwareIndex >= 0) {
      design.push(pixels[hardwareIndex])
    } else if (fill !== undefined) {
      design.push(fill)
    } else {
      throw new ConfigurationError(
        `Design cell ${designIndex} has no LED; a fill value is required`,
      )
    }
  })
  return design
}

/** Hardware index feeding design cell (x, y), or -1 when the cell is not wired. */
export function getHardwareIndex(x: number, y: number, permutation: WiringPermutation): number {
  if (x < 0 || x >= permutation.width || y < 0 || y >= permutation.height) return -1
  return permutation.inverse[y * permutation.width + x]
}

/**
 * Re-order a buffer captured in one wiring into another, e.g. a file exported
 * for serpentine panels being flashed onto row-major ones.
 */
export function convertWiring<T>(
  pixels: readonly T[],
  from: WiringPermutation,
  to: WiringPermutation,
  fill?: T,
): T[] {
  if (from.width !== to.width || from.height !== to.height) {
    throw new ConfigurationError(
      `Cannot convert ${from.width}x${from.height} wiring into ${to.width}x${to.height}`,
    )
  }
  return designToHardware(hardwareToDesign(pixels, from, fill), to)
}

/**
 * Polar / cartesian helpers for placing LEDs on the design grid.
 *
 * Convention: the grid center is ((W-1)/2, (H-1)/2), angle 0 points along +x
 * and angles grow clockwise on screen because y grows downward.
 */

import type { GridCoordinate } from "../types"
import { AUTO_RADIUS_MARGIN, MIN_AUTO_RADIUS } from "@/lib/constants"

export function degToRad(deg: number): number {
  return (deg * Math.PI) / 180
}

export function gridCenter(width: number, height: number): { x: number; y: number } {
  return { x: (width - 1) / 2, y: (height - 1) / 2 }
}

/** Largest radius that leaves a one-cell margin inside the grid. */
export function autoRadius(width: number, height: number): number {
  return Math.max(Math.min(width, height) / 2 - AUTO_RADIUS_MARGIN, MIN_AUTO_RADIUS)
}

export function polarToCartesian(
  angleDeg: number,
  radius: number,
  centerX: number,
  centerY: number,
): { x: number; y: number } {
  const theta = degToRad(angleDeg)
  return {
    x: centerX + radius * Math.cos(theta),
    y: centerY + radius * Math.sin(theta),
  }
}

/**
 * Math.round rounds -2.5 to -2; LED positions need symmetric rounding so a
 * layout mirrored through the center lands on mirrored cells.
 */
export function roundHalfAwayFromZero(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value))
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value))
}

/** Round a continuous position to its cell and clamp it into the grid. */
export function snapToGrid(
  x: number,
  y: number,
  width: number,
  height: number,
): GridCoordinate {
  // `+ 0` folds -0 into 0
  return {
    x: clamp(roundHalfAwayFromZero(x), 0, width - 1) + 0,
    y: clamp(roundHalfAwayFromZero(y), 0, height - 1) + 0,
  }
}

export function distanceFromCenter(
  cell: GridCoordinate,
  width: number,
  height: number,
): number {
  const center = gridCenter(width, height)
  return Math.hypot(cell.x - center.x, cell.y - center.y)
}

export function cellKey(x: number, y: number): string {
  return `${x},${y}`
}

/**
 * Wiring types: how an LED strip / PCB trace walks across a W×H matrix.
 */

import type { GridCoordinate } from "@/lib/led-mapping/types"

export type WiringMode = "row_major" | "serpentine" | "column_major" | "column_serpentine"

export type StartCorner = "top_left" | "top_right" | "bottom_left" | "bottom_right"

export const WIRING_MODES: readonly WiringMode[] = [
  "row_major",
  "serpentine",
  "column_major",
  "column_serpentine",
] as const

export const START_CORNERS: readonly StartCorner[] = [
  "top_left",
  "top_right",
  "bottom_left",
  "bottom_right",
] as const

export interface WiringSpec {
  width: number
  height: number
  mode: WiringMode
  startCorner: StartCorner
  flipX: boolean
  flipY: boolean
  // Irregular shapes: only these cells carry an LED. Absent means every cell.
  activeCells?: GridCoordinate[]
}

/**
 * order[hardwareIndex] = design index (y * width + x).
 * inverse[designIndex] = hardware index, or -1 for cells without an LED.
 */
export interface WiringPermutation {
  readonly width: number
  readonly height: number
  readonly order: readonly number[]
  readonly inverse: readonly number[]
}

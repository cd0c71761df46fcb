/**
 * Export utilities: turn design-order RGB grids into the byte stream the
 * firmware pushes down the strip, one LED after another.
 */

import type { LayoutState } from "@/lib/led-mapping/types"
import type { WiringSpec } from "@/lib/wiring/types"
import type { LedMappingEngine } from "@/lib/led-mapping/LedMappingEngine"
import { DEFAULT_MAX_CELL_VALUE } from "@/lib/constants"

export type RgbColor = [number, number, number]

export const BYTES_PER_LED = 3

function toByte(channel: number): number {
  if (!Number.isFinite(channel)) return 0
  return Math.max(0, Math.min(DEFAULT_MAX_CELL_VALUE, Math.round(channel)))
}

/** Pack LED-ordered colors as R,G,B bytes. */
export function packRgb(ledColors: readonly RgbColor[]): Uint8Array {
  const bytes = new Uint8Array(ledColors.length * BYTES_PER_LED)
  ledColors.forEach(([r, g, b], i) => {
    bytes[i * BYTES_PER_LED] = toByte(r)
    bytes[i * BYTES_PER_LED + 1] = toByte(g)
    bytes[i * BYTES_PER_LED + 2] = toByte(b)
  })
  return bytes
}

export interface EncodedFrame {
  bytes: Uint8Array
  ledCount: number
  // Layout state after the mapping table was ensured
  state: LayoutState
}

/**
 * Encode one design grid: layout stage, then wiring stage when a wiring
 * spec is given.
 */
export function encodeHardwareFrame(
  grid: readonly RgbColor[],
  state: LayoutState,
  engine: LedMappingEngine,
  wiring?: WiringSpec,
): EncodedFrame {
  const frame = engine.toHardwareOrder(grid, state, wiring)
  return {
    bytes: packRgb(frame.ledColors),
    ledCount: frame.ledColors.length,
    state: frame.state,
  }
}

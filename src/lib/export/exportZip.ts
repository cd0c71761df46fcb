/**
 * Zip export: bundles hardware-ordered frames with the layout they were
 * mapped through.
 *
 * Structure:
 *   <patternName>/
 *     mapping.json         ← layout spec, mapping table, wiring
 *     frames/frame-NNNN.bin ← one R,G,B byte stream per frame
 */

import { zipSync, strToU8 } from "fflate"
import type { LayoutState } from "@/lib/led-mapping/types"
import type { WiringSpec } from "@/lib/wiring/types"
import type { LedMappingEngine } from "@/lib/led-mapping/LedMappingEngine"
import type { RgbColor } from "./exportUtils"
import { BYTES_PER_LED, encodeHardwareFrame } from "./exportUtils"
import { serializePatternLayout } from "@/lib/storage/pattern-codec"

export interface FramesZipOptions {
  patternName?: string
  wiring?: WiringSpec
}

export interface FramesZipResult {
  zip: Uint8Array
  // Layout state with the table the frames were encoded against
  state: LayoutState
}

function frameFilename(index: number): string {
  return `frame-${String(index).padStart(4, "0")}.bin`
}

export function exportFramesZip(
  frames: readonly (readonly RgbColor[])[],
  state: LayoutState,
  engine: LedMappingEngine,
  options: FramesZipOptions = {},
): FramesZipResult {
  const name = options.patternName || "ledmap"

  // Ensure once so every frame reads through the same table
  const { state: ensured } = engine.ensureLayout(state)

  const zipEntries: Record<string, Uint8Array> = {}
  let ledCount = 0

  frames.forEach((grid, index) => {
    const encoded = encodeHardwareFrame(grid, ensured, engine, options.wiring)
    ledCount = encoded.ledCount
    zipEntries[`${name}/frames/${frameFilename(index)}`] = encoded.bytes
  })

  const manifest = {
    name,
    frameCount: frames.length,
    ledCount,
    bytesPerLed: BYTES_PER_LED,
    layout: serializePatternLayout(ensured),
    wiring: options.wiring ?? null,
  }
  zipEntries[`${name}/mapping.json`] = strToU8(JSON.stringify(manifest, null, 2))

  return { zip: zipSync(zipEntries), state: ensured }
}

/**
 * LedMappingEngine - orchestrates the two mapping stages used before preview
 * and hardware export:
 *
 *   design grid --(layout mapping table)--> LED order --(wiring permutation)--> strip order
 *
 * The wiring stage only applies to layouts whose LED order covers the full
 * rectangle (rectangular); other topologies already come out in strip order.
 */

import type { EnsureMappingResult } from "./mappingState"
import type { LayoutState } from "./types"
import type { WiringPermutation, WiringSpec } from "@/lib/wiring/types"
import { ensureMappingTable } from "./mappingState"
import { sampleLedColors } from "./mappingLookup"
import { PermutationCache } from "@/lib/wiring/PermutationCache"
import { designToHardware, hardwareToDesign } from "@/lib/wiring/wiringMapper"
import { ConfigurationError, LedMappingError } from "@/lib/errors"
import { DEFAULT_PERMUTATION_CACHE_SIZE } from "@/lib/constants"

export interface LedMappingEngineOptions {
  debugMode?: boolean
  // Reject layouts where two LEDs land on the same cell
  strictUniqueness?: boolean
  permutationCacheSize?: number
}

export interface HardwareFrame<T> {
  ledColors: T[]
  // Layout state after ensureMappingTable; publish it if it changed
  state: LayoutState
  regenerated: boolean
}

function wrapError(action: string, error: unknown): Error {
  if (error instanceof LedMappingError) return error
  return new LedMappingError(
    `Failed to ${action}: ${error instanceof Error ? error.message : "Unknown error"}`,
    "GENERATION_ERROR",
  )
}

export class LedMappingEngine {
  private permutations: PermutationCache

  private options: Required<LedMappingEngineOptions>

  constructor(options: LedMappingEngineOptions = {}) {
    this.options = {
      debugMode: false,
      strictUniqueness: false,
      permutationCacheSize: DEFAULT_PERMUTATION_CACHE_SIZE,
      ...options,
    }
    this.permutations = new PermutationCache(this.options.permutationCacheSize)
  }

  /**
   * Ensure the layout has a current, valid mapping table
   */
  ensureLayout(state: LayoutState): EnsureMappingResult {
    try {
      const startTime = this.options.debugMode ? performance.now() : 0
      const result = ensureMappingTable(state, {
        strictUniqueness: this.options.strictUniqueness,
      })

      if (this.options.debugMode) {
        const duration = performance.now() - startTime
        console.log(
          `[LayoutMapper] ensureLayout: ${duration.toFixed(2)}ms, ${result.table.coordinates.length} LEDs, regenerated=${result.regenerated}`,
        )
      }

      return result
    } catch (error) {
      throw wrapError("ensure mapping table", error)
    }
  }

  /**
   * Memoized wiring permutation
   */
  getPermutation(wiring: WiringSpec): WiringPermutation {
    try {
      return this.permutations.get(wiring)
    } catch (error) {
      throw wrapError("build wiring permutation", error)
    }
  }

  /**
   * Read a row-major design grid into the order the hardware receives it.
   */
  toHardwareOrder<T>(
    grid: readonly T[],
    state: LayoutState,
    wiring?: WiringSpec,
  ): HardwareFrame<T> {
    const ensured = this.ensureLayout(state)
    const ledColors = sampleLedColors(grid, ensured.table)

    if (!wiring) {
      return { ledColors, state: ensured.state, regenerated: ensured.regenerated }
    }

    // Wiring composes only with rectangular layouts; other kinds are already in strip order
    if (state.spec.kind !== "rectangular") {
      throw new ConfigurationError(
        `Wiring order only applies to rectangular layouts, got ${state.spec.kind}`,
      )
    }
    if (wiring.width !== state.gridWidth || wiring.height !== state.gridHeight) {
      throw new ConfigurationError(
        `Wiring is ${wiring.width}x${wiring.height} but the grid is ${state.gridWidth}x${state.gridHeight}`,
      )
    }

    return {
      ledColors: designToHardware(ledColors, this.getPermutation(wiring)),
      state: ensured.state,
      regenerated: ensured.regenerated,
    }
  }

  /**
   * Unwrap a hardware-ordered buffer (e.g. an imported firmware dump) back
   * into design order for editing.
   */
  toDesignOrder<T>(hardwarePixels: readonly T[], wiring: WiringSpec, fill?: T): T[] {
    return hardwareToDesign(hardwarePixels, this.getPermutation(wiring), fill)
  }

  clearCaches(): void {
    this.permutations.clear()
  }

  getStats() {
    return {
      permutations: this.permutations.getStats(),
      options: { ...this.options },
    }
  }

  updateOptions(options: Partial<LedMappingEngineOptions>): void {
    const previousSize = this.options.permutationCacheSize
    this.options = { ...this.options, ...options }
    if (this.options.permutationCacheSize !== previousSize) {
      this.permutations = new PermutationCache(this.options.permutationCacheSize)
    }
  }
}

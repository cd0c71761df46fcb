/**
 * types.ts
 *
 * Storage schema types for LED patterns
 *
 * Primary responsibilities:
 * - Define data shapes for persistence: SerializedPatternLayout, PatternMetadata, PatternDocument
 */

import type { LayoutSpec, LayoutState } from "@/lib/led-mapping/types"
import type { WiringSpec } from "@/lib/wiring/types"

export const PATTERN_FORMAT_VERSION = 1

/**
 * Layout spec plus the mapping table derived from it, as written to disk
 */
export interface SerializedPatternLayout {
  formatVersion: number
  spec: LayoutSpec
  gridWidth: number
  gridHeight: number
  version: number
  /** Spec version the table was generated from */
  tableVersion: number | null
  /** Grid size the table was generated for; differs from gridWidth/Height after a resize */
  tableGridWidth: number | null
  tableGridHeight: number | null
  /** mappingTable[ledIndex] = [x, y] */
  mappingTable: Array<[number, number]> | null
}

/**
 * Metadata for a saved pattern
 */
export interface PatternMetadata {
  /** Unique identifier for the pattern */
  id: string
  /** User-defined name of the pattern */
  name: string
  /** Timestamp (ms since epoch) when created */
  createdAt: number
  /** Timestamp (ms since epoch) when last updated */
  updatedAt: number
}

/**
 * Full runtime document: metadata, layout and the export wiring target
 */
export interface PatternDocument extends PatternMetadata {
  layout: LayoutState
  wiring: WiringSpec | null
}

export interface InnerPatternDocument extends PatternMetadata {
  layout: SerializedPatternLayout
  wiring: WiringSpec | null
}

/**
 * LED layout mapping - main export file
 */

export * from "./types"
export { generateMappingTable, createMappingTable, rayRadii, resolvePositionTransform } from "./layoutMapper"
export {
  buildCellIndex,
  gridToLedIndex,
  ledIndexToGrid,
  isMapped,
  unmappedCells,
  sampleLedColors,
  renderPreviewGrid,
} from "./mappingLookup"
export {
  createLayoutState,
  updateLayoutSpec,
  resizeLayoutGrid,
  isMappingStale,
  ensureMappingTable,
} from "./mappingState"
export type { EnsureMappingResult } from "./mappingState"
export { validateMappingTable } from "./utils/validation"
export type { MappingValidationOptions } from "./utils/validation"
export { validateLayoutSpec, validateGridSize, expectedLedCount, requiresUniqueCells } from "./utils/layoutSpec"
export { LedMappingEngine } from "./LedMappingEngine"
export type { LedMappingEngineOptions, HardwareFrame } from "./LedMappingEngine"
export type { PositionTransform } from "./layoutMapper"

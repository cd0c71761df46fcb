/**
 * Wiring mapper - main export file
 */

export * from "./types"
export {
  buildTraversalPath,
  buildPermutation,
  permutationFromOrder,
  designToHardware,
  hardwareToDesign,
  getHardwareIndex,
  convertWiring,
} from "./wiringMapper"
export { PermutationCache, permutationCacheKey } from "./PermutationCache"
export { maskFromCells, cellsFromMask, isCellActive, activeCellsKey } from "./irregularShape"

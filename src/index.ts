export * from "./lib/led-mapping"
export * from "./lib/wiring"
export * from "./lib/errors"
export * from "./lib/constants"
export type {
  PatternDocument,
  PatternMetadata,
  SerializedPatternLayout,
} from "./lib/storage/types"
export { PATTERN_FORMAT_VERSION } from "./lib/storage/types"
export type { PatternStore } from "./lib/storage/store"
export { patternStore } from "./lib/storage/store"
export { KeyValuePatternStore, MemoryStorage } from "./lib/storage/local-store"
export type { KeyValueStorage } from "./lib/storage/local-store"
export {
  serializePatternLayout,
  deserializePatternLayout,
  parseLayoutSpec,
  parseWiringSpec,
} from "./lib/storage/pattern-codec"
export { packRgb, encodeHardwareFrame, BYTES_PER_LED } from "./lib/export/exportUtils"
export type { RgbColor, EncodedFrame } from "./lib/export/exportUtils"
export { exportFramesZip } from "./lib/export/exportZip"
export type { FramesZipOptions, FramesZipResult } from "./lib/export/exportZip"

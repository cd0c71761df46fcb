/**
 * Core type definitions for LED layout mapping
 *
 * A layout describes how physical LEDs sit over the logical W×H design grid.
 * The mapping table is the single source of truth for reading LED colors
 * out of that grid: table.coordinates[ledIndex] = cell.
 */

// === Grid Data Model ===

export interface GridCoordinate {
  x: number
  y: number
}

export interface GridSize {
  width: number
  height: number
}

// === Layout Specs ===

export type LayoutKind =
  | "rectangular"
  | "circle"
  | "ring"
  | "arc"
  | "multi_ring"
  | "radial_rays"
  | "custom_positions"

export interface RectangularLayout {
  kind: "rectangular"
}

interface AngularLayoutBase {
  ledCount: number
  // Defaults to max(min(W, H) / 2 - 1, 0.5)
  radius?: number
  startAngle?: number
  endAngle?: number
}

export interface CircleLayout extends AngularLayoutBase {
  kind: "circle"
}

export interface RingLayout extends AngularLayoutBase {
  kind: "ring"
  // Bounds only; LEDs sit on the outer radius
  innerRadius: number
}

export interface ArcLayout extends AngularLayoutBase {
  kind: "arc"
  startAngle: number
  endAngle: number
}

export interface MultiRingLayout {
  kind: "multi_ring"
  ringCount: number
  // Ring-major order follows these arrays as given; radii are not sorted
  ringLedCounts: number[]
  ringRadii: number[]
  startAngle?: number
}

export type RadialDirection = "outward" | "inward"

export interface RadialRaysLayout {
  kind: "radial_rays"
  rayCount: number
  ledsPerRay: number
  // Defaults to 360 / rayCount
  raySpacingAngle?: number
  startAngle?: number
  innerRadius?: number
  outerRadius?: number
  // "outward": LED 0 of each ray is innermost
  direction?: RadialDirection
}

export type PositionUnit = "grid" | "mm" | "inch"

export interface CustomPositionsLayout {
  kind: "custom_positions"
  positions: Array<{ x: number; y: number }>
  unit: PositionUnit
  // Grid position that the position origin lands on
  center?: { x: number; y: number }
  // Grid units per position unit; auto-fitted for mm / inch when absent
  scale?: number
}

export type LayoutSpec =
  | RectangularLayout
  | CircleLayout
  | RingLayout
  | ArcLayout
  | MultiRingLayout
  | RadialRaysLayout
  | CustomPositionsLayout

// === Mapping Table ===

export interface MappingTable {
  readonly kind: LayoutKind
  readonly gridWidth: number
  readonly gridHeight: number
  readonly coordinates: readonly GridCoordinate[]
}

/** Layout spec plus the table published for it. */
export interface LayoutState {
  spec: LayoutSpec
  gridWidth: number
  gridHeight: number
  // Bumped on every spec or grid mutation
  version: number
  table: MappingTable | null
  // Version the table was generated from
  tableVersion: number | null
}

// === Validation ===

export type ValidationSeverity = "error" | "warning"

export type ValidationIssueCode =
  | "length"
  | "bounds"
  | "non_integer"
  | "collision"
  | "grid_size"
  | "kind"

export interface ValidationIssue {
  severity: ValidationSeverity
  code: ValidationIssueCode
  message: string
  ledIndex?: number
  cell?: GridCoordinate
}

export interface MappingValidationResult {
  valid: boolean
  issues: ValidationIssue[]
}

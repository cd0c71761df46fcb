/**
 * Geometry and unit constants for LED layout mapping
 */

// Angles are in degrees; 0 points along +x, increasing clockwise on screen
export const DEFAULT_START_ANGLE = 0
export const DEFAULT_END_ANGLE = 360
export const FULL_TURN_DEGREES = 360

// Auto radius = min(width, height) / 2 - margin, never below the minimum
export const AUTO_RADIUS_MARGIN = 1
export const MIN_AUTO_RADIUS = 0.5

// Physical positions (mm / inch) are fitted into 90% of the grid
export const CUSTOM_POSITION_FIT_RATIO = 0.9
export const MM_PER_INCH = 25.4

export const DEFAULT_PERMUTATION_CACHE_SIZE = 64

// Color channels are clamped to one byte when encoding frames
export const DEFAULT_MAX_CELL_VALUE = 255

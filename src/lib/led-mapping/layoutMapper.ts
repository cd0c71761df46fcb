/**
 * Layout mapper - generates LED index -> grid cell tables for non-rectangular
 * LED topologies (circles, rings, arcs, concentric rings, radial rays and
 * custom PCB positions).
 *
 * The design grid stays rectangular; a layout is only a lens over it. Every
 * generator is deterministic: the same spec and grid size always produce the
 * same table.
 */

import type {
  ArcLayout,
  CircleLayout,
  CustomPositionsLayout,
  GridCoordinate,
  LayoutSpec,
  MappingTable,
  MultiRingLayout,
  RadialRaysLayout,
  RingLayout,
} from "./types"
import { validateLayoutSpec } from "./utils/layoutSpec"
import { autoRadius, gridCenter, polarToCartesian, snapToGrid } from "./utils/geometry"
import {
  CUSTOM_POSITION_FIT_RATIO,
  DEFAULT_END_ANGLE,
  DEFAULT_START_ANGLE,
  FULL_TURN_DEGREES,
  MM_PER_INCH,
} from "@/lib/constants"

/**
 * Generate the mapping table for a layout: table.coordinates[ledIndex] = cell.
 * @throws ConfigurationError when the layout spec is invalid for its kind; no partial
 * table is ever returned
 */
export function generateMappingTable(
  spec: LayoutSpec,
  gridWidth: number,
  gridHeight: number,
): MappingTable {
  validateLayoutSpec(spec, gridWidth, gridHeight)

  return createMappingTable(
    spec.kind,
    gridWidth,
    gridHeight,
    layoutCoordinates(spec, gridWidth, gridHeight),
  )
}

function layoutCoordinates(
  spec: LayoutSpec,
  width: number,
  height: number,
): GridCoordinate[] {
  switch (spec.kind) {
    case "rectangular":
      return rectangularCoordinates(width, height)
    case "circle":
    case "ring":
    case "arc":
      return angularCoordinates(spec, width, height)
    case "multi_ring":
      return multiRingCoordinates(spec, width, height)
    case "radial_rays":
      return radialRayCoordinates(spec, width, height)
    case "custom_positions":
      return customPositionCoordinates(spec, width, height)
  }
}

/** Freeze a coordinate list into a publishable table. */
export function createMappingTable(
  kind: LayoutSpec["kind"],
  gridWidth: number,
  gridHeight: number,
  coordinates: GridCoordinate[],
): MappingTable {
  return Object.freeze({
    kind,
    gridWidth,
    gridHeight,
    coordinates: Object.freeze(coordinates.map((c) => Object.freeze({ x: c.x, y: c.y }))),
  })
}

function rectangularCoordinates(width: number, height: number): GridCoordinate[] {
  const coordinates: GridCoordinate[] = []
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      coordinates.push({ x, y })
    }
  }
  return coordinates
}

/**
 * LEDs evenly spaced over [start, end): angle_i = start + i * (end - start) / n.
 * A full 360° circle therefore never places two LEDs on the seam.
 */
function ringPositions(
  ledCount: number,
  radius: number,
  startAngle: number,
  endAngle: number,
  width: number,
  height: number,
): GridCoordinate[] {
  const center = gridCenter(width, height)
  const step = (endAngle - startAngle) / ledCount
  const positions: GridCoordinate[] = []

  for (let i = 0; i < ledCount; i++) {
    const { x, y } = polarToCartesian(startAngle + i * step, radius, center.x, center.y)
    positions.push(snapToGrid(x, y, width, height))
  }

  return positions
}

// Flat ring: LEDs sit on the outer radius, innerRadius only bounds the shape
function angularCoordinates(
  spec: CircleLayout | RingLayout | ArcLayout,
  width: number,
  height: number,
): GridCoordinate[] {
  return ringPositions(
    spec.ledCount,
    spec.radius ?? autoRadius(width, height),
    spec.startAngle ?? DEFAULT_START_ANGLE,
    spec.endAngle ?? DEFAULT_END_ANGLE,
    width,
    height,
  )
}

/**
 * Ring-major: every LED of ring 0 precedes ring 1. Ring order is the array
 * order, so callers that want LED 0 on the outside pass decreasing radii.
 */
function multiRingCoordinates(
  spec: MultiRingLayout,
  width: number,
  height: number,
): GridCoordinate[] {
  const startAngle = spec.startAngle ?? DEFAULT_START_ANGLE
  const coordinates: GridCoordinate[] = []

  for (let ring = 0; ring < spec.ringCount; ring++) {
    coordinates.push(
      ...ringPositions(
        spec.ringLedCounts[ring],
        spec.ringRadii[ring],
        startAngle,
        startAngle + FULL_TURN_DEGREES,
        width,
        height,
      ),
    )
  }

  return coordinates
}

/**
 * Radius of each LED along a ray, index 0 first.
 *
 * Without innerRadius the LEDs split the ray into equal steps ending at the
 * outer radius: r_j = (j + 1) * outer / n. With innerRadius they span
 * [inner, outer] inclusive.
 */
export function rayRadii(spec: RadialRaysLayout, width: number, height: number): number[] {
  const outer = spec.outerRadius ?? autoRadius(width, height)
  const n = spec.ledsPerRay
  const radii: number[] = []

  for (let j = 0; j < n; j++) {
    if (spec.innerRadius === undefined) {
      radii.push(((j + 1) * outer) / n)
    } else if (n === 1) {
      radii.push(spec.innerRadius)
    } else {
      radii.push(spec.innerRadius + (j * (outer - spec.innerRadius)) / (n - 1))
    }
  }

  return spec.direction === "inward" ? radii.reverse() : radii
}

// Ray-major: every LED of ray 0 precedes ray 1
function radialRayCoordinates(
  spec: RadialRaysLayout,
  width: number,
  height: number,
): GridCoordinate[] {
  const center = gridCenter(width, height)
  const spacing = spec.raySpacingAngle ?? FULL_TURN_DEGREES / spec.rayCount
  const startAngle = spec.startAngle ?? DEFAULT_START_ANGLE
  const radii = rayRadii(spec, width, height)
  const coordinates: GridCoordinate[] = []

  for (let ray = 0; ray < spec.rayCount; ray++) {
    const angle = startAngle + ray * spacing
    for (const radius of radii) {
      const { x, y } = polarToCartesian(angle, radius, center.x, center.y)
      coordinates.push(snapToGrid(x, y, width, height))
    }
  }

  return coordinates
}

export interface PositionTransform {
  // Grid units per (converted) position unit
  scale: number
  offsetX: number
  offsetY: number
  // Converts a raw position value into the unit `scale` applies to
  unitFactor: number
}

/**
 * Work out how raw custom positions land on the grid.
 *
 * Grid units are taken as absolute cells unless a center / scale is given.
 * Physical units (mm, inch -> mm) are fitted into the grid and centered on
 * it; an explicit scale (grid units per mm) or center overrides the fit.
 */
export function resolvePositionTransform(
  spec: CustomPositionsLayout,
  width: number,
  height: number,
): PositionTransform {
  if (spec.unit === "grid") {
    return {
      scale: spec.scale ?? 1,
      offsetX: spec.center?.x ?? 0,
      offsetY: spec.center?.y ?? 0,
      unitFactor: 1,
    }
  }

  const unitFactor = spec.unit === "inch" ? MM_PER_INCH : 1
  let minX = Infinity
  let maxX = -Infinity
  let minY = Infinity
  let maxY = -Infinity
  // Looped rather than spread: position lists can exceed the argument limit
  for (const p of spec.positions) {
    minX = Math.min(minX, p.x * unitFactor)
    maxX = Math.max(maxX, p.x * unitFactor)
    minY = Math.min(minY, p.y * unitFactor)
    maxY = Math.max(maxY, p.y * unitFactor)
  }
  const spanX = maxX - minX
  const spanY = maxY - minY

  let scale = spec.scale
  if (scale === undefined) {
    const fits: number[] = []
    if (spanX > 0) fits.push((width * CUSTOM_POSITION_FIT_RATIO) / spanX)
    if (spanY > 0) fits.push((height * CUSTOM_POSITION_FIT_RATIO) / spanY)
    scale = fits.length > 0 ? Math.min(...fits) : 1
  }

  const center = gridCenter(width, height)
  return {
    scale,
    offsetX: spec.center?.x ?? center.x - ((minX + maxX) / 2) * scale,
    offsetY: spec.center?.y ?? center.y - ((minY + maxY) / 2) * scale,
    unitFactor,
  }
}

// LED order is exactly the caller's position order
function customPositionCoordinates(
  spec: CustomPositionsLayout,
  width: number,
  height: number,
): GridCoordinate[] {
  const { scale, offsetX, offsetY, unitFactor } = resolvePositionTransform(spec, width, height)

  return spec.positions.map((pos) =>
    snapToGrid(
      pos.x * unitFactor * scale + offsetX,
      pos.y * unitFactor * scale + offsetY,
      width,
      height,
    ),
  )
}

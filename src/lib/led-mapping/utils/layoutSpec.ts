/**
 * Parameter checks for layout specs.
 * Every check throws ConfigurationError before any table is produced.
 */

import type { LayoutSpec } from "../types"
import { ConfigurationError } from "@/lib/errors"
import { autoRadius } from "./geometry"
import {
  DEFAULT_END_ANGLE,
  DEFAULT_START_ANGLE,
  FULL_TURN_DEGREES,
} from "@/lib/constants"

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`)
  }
}

function requireFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a finite number, got ${value}`)
  }
}

function requireNonNegative(name: string, value: number): void {
  requireFinite(name, value)
  if (value < 0) {
    throw new ConfigurationError(`${name} must be >= 0, got ${value}`)
  }
}

function requirePositive(name: string, value: number): void {
  requireFinite(name, value)
  if (value <= 0) {
    throw new ConfigurationError(`${name} must be > 0, got ${value}`)
  }
}

function validateAngleRange(startAngle: number, endAngle: number): void {
  requireFinite("startAngle", startAngle)
  requireFinite("endAngle", endAngle)
  if (endAngle <= startAngle) {
    throw new ConfigurationError(
      `endAngle (${endAngle}) must be greater than startAngle (${startAngle})`,
    )
  }
  if (endAngle - startAngle > FULL_TURN_DEGREES) {
    throw new ConfigurationError(
      `Angle range ${startAngle}..${endAngle} spans more than ${FULL_TURN_DEGREES} degrees`,
    )
  }
}

export function validateGridSize(width: number, height: number): void {
  requirePositiveInteger("gridWidth", width)
  requirePositiveInteger("gridHeight", height)
}

/**
 * Validate a layout spec against a grid size.
 * @throws ConfigurationError on the first invalid parameter
 */
export function validateLayoutSpec(
  spec: LayoutSpec,
  gridWidth: number,
  gridHeight: number,
): void {
  validateGridSize(gridWidth, gridHeight)

  switch (spec.kind) {
    case "rectangular":
      return

    case "circle":
    case "ring":
    case "arc": {
      requirePositiveInteger("ledCount", spec.ledCount)
      if (spec.radius !== undefined) requirePositive("radius", spec.radius)
      validateAngleRange(
        spec.startAngle ?? DEFAULT_START_ANGLE,
        spec.endAngle ?? DEFAULT_END_ANGLE,
      )
      if (spec.kind === "ring") {
        requireNonNegative("innerRadius", spec.innerRadius)
        const outer = spec.radius ?? autoRadius(gridWidth, gridHeight)
        if (spec.innerRadius >= outer) {
          throw new ConfigurationError(
            `innerRadius (${spec.innerRadius}) must be < radius (${outer})`,
          )
        }
      }
      return
    }

    case "multi_ring": {
      requirePositiveInteger("ringCount", spec.ringCount)
      if (spec.ringLedCounts.length !== spec.ringCount) {
        throw new ConfigurationError(
          `ringLedCounts length (${spec.ringLedCounts.length}) must match ringCount (${spec.ringCount})`,
        )
      }
      if (spec.ringRadii.length !== spec.ringCount) {
        throw new ConfigurationError(
          `ringRadii length (${spec.ringRadii.length}) must match ringCount (${spec.ringCount})`,
        )
      }
      spec.ringLedCounts.forEach((count, i) =>
        requirePositiveInteger(`ringLedCounts[${i}]`, count),
      )
      spec.ringRadii.forEach((radius, i) => requireNonNegative(`ringRadii[${i}]`, radius))
      if (spec.startAngle !== undefined) requireFinite("startAngle", spec.startAngle)
      return
    }

    case "radial_rays": {
      requirePositiveInteger("rayCount", spec.rayCount)
      requirePositiveInteger("ledsPerRay", spec.ledsPerRay)
      if (spec.raySpacingAngle !== undefined) {
        requirePositive("raySpacingAngle", spec.raySpacingAngle)
      }
      if (spec.startAngle !== undefined) requireFinite("startAngle", spec.startAngle)
      if (spec.innerRadius !== undefined) requireNonNegative("innerRadius", spec.innerRadius)
      if (spec.outerRadius !== undefined) requirePositive("outerRadius", spec.outerRadius)
      if (
        spec.innerRadius !== undefined &&
        spec.outerRadius !== undefined &&
        spec.innerRadius >= spec.outerRadius
      ) {
        throw new ConfigurationError(
          `innerRadius (${spec.innerRadius}) must be < outerRadius (${spec.outerRadius})`,
        )
      }
      return
    }

    case "custom_positions": {
      if (spec.positions.length === 0) {
        throw new ConfigurationError("custom_positions layout needs at least one position")
      }
      spec.positions.forEach((pos, i) => {
        requireFinite(`positions[${i}].x`, pos.x)
        requireFinite(`positions[${i}].y`, pos.y)
      })
      if (spec.unit !== "grid" && spec.unit !== "mm" && spec.unit !== "inch") {
        throw new ConfigurationError(`Unknown position unit: ${String(spec.unit)}`)
      }
      if (spec.scale !== undefined) requirePositive("scale", spec.scale)
      if (spec.center) {
        requireFinite("center.x", spec.center.x)
        requireFinite("center.y", spec.center.y)
      }
      return
    }
  }
}

/** Number of LEDs a layout drives on the given grid. */
export function expectedLedCount(
  spec: LayoutSpec,
  gridWidth: number,
  gridHeight: number,
): number {
  switch (spec.kind) {
    case "rectangular":
      return gridWidth * gridHeight
    case "circle":
    case "ring":
    case "arc":
      return spec.ledCount
    case "multi_ring":
      return spec.ringLedCounts.reduce((sum, count) => sum + count, 0)
    case "radial_rays":
      return spec.rayCount * spec.ledsPerRay
    case "custom_positions":
      return spec.positions.length
  }
}

/** Layouts whose cells must be distinct; collisions there are errors, not warnings. */
export function requiresUniqueCells(spec: LayoutSpec): boolean {
  return spec.kind === "rectangular"
}

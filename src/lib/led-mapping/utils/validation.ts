/**
 * Mapping table validation.
 * Errors mean the table cannot be used and must be regenerated; warnings
 * (shared cells) are reported but the table is still usable.
 */

import type {
  LayoutSpec,
  MappingTable,
  MappingValidationResult,
  ValidationIssue,
} from "../types"
import { cellKey } from "./geometry"
import { expectedLedCount, requiresUniqueCells } from "./layoutSpec"

export interface MappingValidationOptions {
  // Treat shared cells as errors for every layout kind
  strictUniqueness?: boolean
}

export function validateMappingTable(
  table: MappingTable,
  spec: LayoutSpec,
  gridWidth: number,
  gridHeight: number,
  options: MappingValidationOptions = {},
): MappingValidationResult {
  const issues: ValidationIssue[] = []

  if (table.gridWidth !== gridWidth || table.gridHeight !== gridHeight) {
    issues.push({
      severity: "error",
      code: "grid_size",
      message: `Table was generated for ${table.gridWidth}x${table.gridHeight}, grid is ${gridWidth}x${gridHeight}`,
    })
  }

  if (table.kind !== spec.kind) {
    issues.push({
      severity: "error",
      code: "kind",
      message: `Table was generated for a ${table.kind} layout, spec is ${spec.kind}`,
    })
  }

  const expected = expectedLedCount(spec, gridWidth, gridHeight)
  if (table.coordinates.length !== expected) {
    issues.push({
      severity: "error",
      code: "length",
      message: `Mapping table length (${table.coordinates.length}) != expected LED count (${expected})`,
    })
  }

  const collisionSeverity =
    options.strictUniqueness || requiresUniqueCells(spec) ? "error" : "warning"
  const firstOwner = new Map<string, number>()

  table.coordinates.forEach((cell, ledIndex) => {
    if (!Number.isInteger(cell.x) || !Number.isInteger(cell.y)) {
      issues.push({
        severity: "error",
        code: "non_integer",
        ledIndex,
        message: `LED ${ledIndex} has non-integer grid coordinates: (${cell.x}, ${cell.y})`,
      })
      return
    }

    if (cell.x < 0 || cell.x >= gridWidth || cell.y < 0 || cell.y >= gridHeight) {
      issues.push({
        severity: "error",
        code: "bounds",
        ledIndex,
        cell,
        message: `LED ${ledIndex} maps outside the ${gridWidth}x${gridHeight} grid: (${cell.x}, ${cell.y})`,
      })
      return
    }

    const key = cellKey(cell.x, cell.y)
    const owner = firstOwner.get(key)
    if (owner === undefined) {
      firstOwner.set(key, ledIndex)
    } else {
      issues.push({
        severity: collisionSeverity,
        code: "collision",
        ledIndex,
        cell,
        message: `LED ${ledIndex} shares cell (${cell.x}, ${cell.y}) with LED ${owner}`,
      })
    }
  })

  return {
    valid: !issues.some((issue) => issue.severity === "error"),
    issues,
  }
}

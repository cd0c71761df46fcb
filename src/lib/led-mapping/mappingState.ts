/**
 * Layout state lifecycle: spec edits bump a version, and ensureMappingTable is
 * the one place that decides whether the published table can be reused.
 *
 * States are frozen and replaced whole, never patched, so a reader holding a
 * state always sees a complete table.
 */

import type { LayoutSpec, LayoutState, MappingTable, ValidationIssue } from "./types"
import { generateMappingTable } from "./layoutMapper"
import { validateMappingTable } from "./utils/validation"
import type { MappingValidationOptions } from "./utils/validation"
import { MappingValidationError } from "@/lib/errors"

export interface EnsureMappingResult {
  state: LayoutState
  table: MappingTable
  regenerated: boolean
  // Issues found on the returned table; only warnings, since it is valid
  issues: ValidationIssue[]
}

function freezeState(state: LayoutState): LayoutState {
  return Object.freeze({ ...state })
}

export function createLayoutState(
  spec: LayoutSpec,
  gridWidth: number,
  gridHeight: number,
): LayoutState {
  return freezeState({
    spec,
    gridWidth,
    gridHeight,
    version: 1,
    table: null,
    tableVersion: null,
  })
}

/** New state for an edited spec; the old table stays attached but is stale. */
export function updateLayoutSpec(state: LayoutState, spec: LayoutSpec): LayoutState {
  return freezeState({ ...state, spec, version: state.version + 1 })
}

export function resizeLayoutGrid(
  state: LayoutState,
  gridWidth: number,
  gridHeight: number,
): LayoutState {
  if (state.gridWidth === gridWidth && state.gridHeight === gridHeight) return state
  return freezeState({ ...state, gridWidth, gridHeight, version: state.version + 1 })
}

export function isMappingStale(state: LayoutState): boolean {
  return state.table === null || state.tableVersion !== state.version
}

/**
 * Return the state's table if it is current and valid, otherwise regenerate.
 *
 * @throws ConfigurationError when the layout spec itself is invalid (never retried)
 * @throws MappingValidationError when a freshly generated table fails
 * validation (only possible with strictUniqueness)
 */
export function ensureMappingTable(
  state: LayoutState,
  options: MappingValidationOptions = {},
): EnsureMappingResult {
  const { spec, gridWidth, gridHeight } = state
  let staleReason = "no table"

  if (state.table) {
    const check = validateMappingTable(state.table, spec, gridWidth, gridHeight, options)
    if (check.valid && !isMappingStale(state)) {
      return { state, table: state.table, regenerated: false, issues: check.issues }
    }
    staleReason = check.valid
      ? `spec version ${state.version} != table version ${state.tableVersion}`
      : check.issues
          .filter((issue) => issue.severity === "error")
          .map((issue) => issue.message)
          .join("; ")
  }

  console.log(`[MappingTable] regenerating ${spec.kind} table: ${staleReason}`)

  const table = generateMappingTable(spec, gridWidth, gridHeight)
  const check = validateMappingTable(table, spec, gridWidth, gridHeight, options)

  if (!check.valid) {
    throw new MappingValidationError(
      `Generated ${spec.kind} table is invalid for a ${gridWidth}x${gridHeight} grid`,
      check.issues,
    )
  }

  const collisions = check.issues.filter((issue) => issue.code === "collision")
  if (collisions.length > 0) {
    console.warn(
      `[MappingTable] ${collisions.length} LED(s) share a grid cell in the ${spec.kind} layout`,
    )
  }

  return {
    state: freezeState({ ...state, table, tableVersion: state.version }),
    table,
    regenerated: true,
    issues: check.issues,
  }
}

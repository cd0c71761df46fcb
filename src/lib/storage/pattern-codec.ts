/**
 * pattern-codec.ts
 *
 * Converts layout state and wiring specs to and from their JSON shapes.
 * Decoding checks structure only; parameter validity is left to
 * ensureMappingTable, which also decides whether the stored table is stale.
 */

import type {
  GridCoordinate,
  LayoutSpec,
  LayoutState,
  MappingTable,
  PositionUnit,
  RadialDirection,
} from "@/lib/led-mapping/types"
import type { StartCorner, WiringMode, WiringSpec } from "@/lib/wiring/types"
import type { SerializedPatternLayout } from "./types"
import { PATTERN_FORMAT_VERSION } from "./types"
import { createMappingTable } from "@/lib/led-mapping/layoutMapper"
import { START_CORNERS, WIRING_MODES } from "@/lib/wiring/types"
import { PatternFormatError } from "@/lib/errors"

type JsonRecord = Record<string, unknown>

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function readNumber(obj: JsonRecord, key: string, context: string): number {
  const value = obj[key]
  if (typeof value !== "number") {
    throw new PatternFormatError(`${context}.${key} must be a number`)
  }
  return value
}

function readOptionalNumber(obj: JsonRecord, key: string, context: string): number | undefined {
  return obj[key] === undefined || obj[key] === null ? undefined : readNumber(obj, key, context)
}

function readNullableNumber(obj: JsonRecord, key: string, context: string): number | null {
  return readOptionalNumber(obj, key, context) ?? null
}

function readBoolean(obj: JsonRecord, key: string, context: string): boolean {
  const value = obj[key]
  if (typeof value !== "boolean") {
    throw new PatternFormatError(`${context}.${key} must be a boolean`)
  }
  return value
}

function readNumberArray(obj: JsonRecord, key: string, context: string): number[] {
  const value = obj[key]
  if (!Array.isArray(value) || !value.every((v): v is number => typeof v === "number")) {
    throw new PatternFormatError(`${context}.${key} must be an array of numbers`)
  }
  return value
}

function readPoint(value: unknown, context: string): GridCoordinate {
  if (!isRecord(value)) {
    throw new PatternFormatError(`${context} must be an {x, y} object`)
  }
  return { x: readNumber(value, "x", context), y: readNumber(value, "y", context) }
}

function readOneOf<T extends string>(
  obj: JsonRecord,
  key: string,
  allowed: readonly T[],
  context: string,
): T {
  const value = obj[key]
  const match = allowed.find((candidate) => candidate === value)
  if (match === undefined) {
    throw new PatternFormatError(`${context}.${key} must be one of ${allowed.join(", ")}`)
  }
  return match
}

const POSITION_UNITS: readonly PositionUnit[] = ["grid", "mm", "inch"]
const RADIAL_DIRECTIONS: readonly RadialDirection[] = ["outward", "inward"]

export function parseLayoutSpec(input: unknown): LayoutSpec {
  const ctx = "layout.spec"
  if (!isRecord(input)) {
    throw new PatternFormatError(`${ctx} must be an object`)
  }
  const value = input

  const angular = () => ({
    ledCount: readNumber(value, "ledCount", ctx),
    radius: readOptionalNumber(value, "radius", ctx),
    startAngle: readOptionalNumber(value, "startAngle", ctx),
    endAngle: readOptionalNumber(value, "endAngle", ctx),
  })

  switch (value.kind) {
    case "rectangular":
      return { kind: "rectangular" }
    case "circle":
      return { kind: "circle", ...angular() }
    case "ring":
      return { kind: "ring", ...angular(), innerRadius: readNumber(value, "innerRadius", ctx) }
    case "arc":
      return {
        kind: "arc",
        ...angular(),
        startAngle: readNumber(value, "startAngle", ctx),
        endAngle: readNumber(value, "endAngle", ctx),
      }
    case "multi_ring":
      return {
        kind: "multi_ring",
        ringCount: readNumber(value, "ringCount", ctx),
        ringLedCounts: readNumberArray(value, "ringLedCounts", ctx),
        ringRadii: readNumberArray(value, "ringRadii", ctx),
        startAngle: readOptionalNumber(value, "startAngle", ctx),
      }
    case "radial_rays":
      return {
        kind: "radial_rays",
        rayCount: readNumber(value, "rayCount", ctx),
        ledsPerRay: readNumber(value, "ledsPerRay", ctx),
        raySpacingAngle: readOptionalNumber(value, "raySpacingAngle", ctx),
        startAngle: readOptionalNumber(value, "startAngle", ctx),
        innerRadius: readOptionalNumber(value, "innerRadius", ctx),
        outerRadius: readOptionalNumber(value, "outerRadius", ctx),
        direction:
          value.direction === undefined
            ? undefined
            : readOneOf(value, "direction", RADIAL_DIRECTIONS, ctx),
      }
    case "custom_positions": {
      const positions = value.positions
      if (!Array.isArray(positions)) {
        throw new PatternFormatError(`${ctx}.positions must be an array`)
      }
      return {
        kind: "custom_positions",
        positions: positions.map((p, i) => readPoint(p, `${ctx}.positions[${i}]`)),
        unit: readOneOf(value, "unit", POSITION_UNITS, ctx),
        center: value.center === undefined ? undefined : readPoint(value.center, `${ctx}.center`),
        scale: readOptionalNumber(value, "scale", ctx),
      }
    }
    default:
      throw new PatternFormatError(`Unknown layout kind: ${String(value.kind)}`)
  }
}

export function parseWiringSpec(value: unknown): WiringSpec {
  const ctx = "wiring"
  if (!isRecord(value)) {
    throw new PatternFormatError(`${ctx} must be an object`)
  }

  const spec: WiringSpec = {
    width: readNumber(value, "width", ctx),
    height: readNumber(value, "height", ctx),
    mode: readOneOf<WiringMode>(value, "mode", WIRING_MODES, ctx),
    startCorner: readOneOf<StartCorner>(value, "startCorner", START_CORNERS, ctx),
    flipX: readBoolean(value, "flipX", ctx),
    flipY: readBoolean(value, "flipY", ctx),
  }

  if (value.activeCells !== undefined) {
    const cells = value.activeCells
    if (!Array.isArray(cells)) {
      throw new PatternFormatError(`${ctx}.activeCells must be an array`)
    }
    spec.activeCells = cells.map((c, i) => readPoint(c, `${ctx}.activeCells[${i}]`))
  }

  return spec
}

function parseTablePairs(value: unknown): Array<[number, number]> {
  if (!Array.isArray(value)) {
    throw new PatternFormatError("layout.mappingTable must be an array of [x, y] pairs")
  }
  return value.map((pair, i): [number, number] => {
    if (
      !Array.isArray(pair) ||
      pair.length !== 2 ||
      typeof pair[0] !== "number" ||
      typeof pair[1] !== "number"
    ) {
      throw new PatternFormatError(`layout.mappingTable[${i}] must be an [x, y] pair`)
    }
    return [pair[0], pair[1]]
  })
}

export function serializePatternLayout(state: LayoutState): SerializedPatternLayout {
  const { table } = state
  return {
    formatVersion: PATTERN_FORMAT_VERSION,
    spec: state.spec,
    gridWidth: state.gridWidth,
    gridHeight: state.gridHeight,
    version: state.version,
    tableVersion: table ? state.tableVersion : null,
    tableGridWidth: table ? table.gridWidth : null,
    tableGridHeight: table ? table.gridHeight : null,
    mappingTable: table ? table.coordinates.map((c): [number, number] => [c.x, c.y]) : null,
  }
}

/**
 * Decode a stored layout. The stored table is attached as-is; callers must
 * pass the result through ensureMappingTable before reading from it.
 */
export function deserializePatternLayout(value: unknown): LayoutState {
  if (!isRecord(value)) {
    throw new PatternFormatError("layout must be an object")
  }

  const ctx = "layout"
  const formatVersion = readNumber(value, "formatVersion", ctx)
  if (formatVersion > PATTERN_FORMAT_VERSION) {
    throw new PatternFormatError(
      `Pattern layout format ${formatVersion} is newer than supported (${PATTERN_FORMAT_VERSION})`,
    )
  }

  const spec = parseLayoutSpec(value.spec)
  const gridWidth = readNumber(value, "gridWidth", ctx)
  const gridHeight = readNumber(value, "gridHeight", ctx)

  let table: MappingTable | null = null
  if (value.mappingTable !== undefined && value.mappingTable !== null) {
    const pairs = parseTablePairs(value.mappingTable)
    table = createMappingTable(
      spec.kind,
      readNullableNumber(value, "tableGridWidth", ctx) ?? gridWidth,
      readNullableNumber(value, "tableGridHeight", ctx) ?? gridHeight,
      pairs.map(([x, y]) => ({ x, y })),
    )
  }

  return Object.freeze({
    spec,
    gridWidth,
    gridHeight,
    version: readNumber(value, "version", ctx),
    table,
    tableVersion: table ? readNullableNumber(value, "tableVersion", ctx) : null,
  })
}

import { atom, computed, map } from "nanostores"
import type { LayoutSpec, LayoutState, MappingTable } from "@/lib/led-mapping/types"
import type { WiringSpec } from "@/lib/wiring/types"
import type { PatternDocument } from "@/lib/storage/types"
import type { PatternStore } from "@/lib/storage/store"
import { patternStore } from "@/lib/storage/store"
import { LedMappingEngine } from "@/lib/led-mapping/LedMappingEngine"
import {
  createLayoutState,
  resizeLayoutGrid,
  updateLayoutSpec,
} from "@/lib/led-mapping/mappingState"
import { unmappedCells } from "@/lib/led-mapping/mappingLookup"

export interface PatternMetaState {
  id: string
  name: string
  createdAt: number
  updatedAt: number
}

export type LoadingState = "idle" | "loading" | "ready" | "error"

export const engine = new LedMappingEngine()

// Core stores. Layout and wiring values are frozen and only ever replaced via
// set(), so a render pass and an export pass never observe a half-built table.
export const $loadingState = atom<LoadingState>("idle")
export const $patternMeta = map<PatternMetaState>({
  id: "",
  name: "",
  createdAt: 0,
  updatedAt: 0,
})
export const $layoutState = atom<LayoutState>(
  createLayoutState({ kind: "rectangular" }, 16, 16),
)
export const $wiring = atom<WiringSpec | null>(null)

export const $mappingTable = computed($layoutState, (state): MappingTable | null =>
  state.tableVersion === state.version ? state.table : null,
)

export const $unmappedCells = computed($mappingTable, (table) =>
  table ? unmappedCells(table) : [],
)

/**
 * Return a current mapping table, regenerating and publishing it when stale
 */
export function ensureActiveMappingTable(): MappingTable {
  const result = engine.ensureLayout($layoutState.get())
  if (result.regenerated) {
    $layoutState.set(result.state)
  }
  return result.table
}

// Candidate states are generated before anything is published, so a rejected
// spec or size leaves the previous layout and its table in place.
function publishLayout(candidate: LayoutState): MappingTable {
  const result = engine.ensureLayout(candidate)
  $layoutState.set(result.state)
  return result.table
}

export function setLayoutSpec(spec: LayoutSpec): MappingTable {
  return publishLayout(updateLayoutSpec($layoutState.get(), spec))
}

export function resizeGrid(width: number, height: number): MappingTable {
  const table = publishLayout(resizeLayoutGrid($layoutState.get(), width, height))

  const wiring = $wiring.get()
  if (wiring && (wiring.width !== width || wiring.height !== height)) {
    $wiring.set({ ...wiring, width, height, activeCells: undefined })
  }

  return table
}

export function setWiring(wiring: WiringSpec | null): void {
  $wiring.set(wiring)
}

// State management functions
export async function loadPattern(
  patternId: string,
  store: PatternStore = patternStore,
): Promise<boolean> {
  $loadingState.set("loading")

  try {
    const stored = await store.get(patternId)
    if (!stored) {
      $loadingState.set("ready")
      return false
    }

    $patternMeta.set({
      id: stored.id,
      name: stored.name,
      createdAt: stored.createdAt,
      updatedAt: stored.updatedAt,
    })
    $layoutState.set(stored.layout)
    $wiring.set(stored.wiring)
    $loadingState.set("ready")
    return true
  } catch (error) {
    console.error("Failed to load pattern:", error)
    $loadingState.set("error")
    throw error
  }
}

export async function savePattern(store: PatternStore = patternStore): Promise<void> {
  const meta = $patternMeta.get()
  if (!meta.id) return

  const updatedAt = Date.now()
  const document: PatternDocument = {
    ...meta,
    updatedAt,
    layout: $layoutState.get(),
    wiring: $wiring.get(),
  }

  await store.save(document)
  $patternMeta.setKey("updatedAt", updatedAt)
}

/**
 * store.ts
 *
 * Storage interface for LED patterns
 *
 * Primary responsibilities:
 * - Define PatternStore interface
 * - Provide the default store instance
 */

import type { PatternDocument, PatternMetadata } from "./types"
import { KeyValuePatternStore, MemoryStorage } from "./local-store"

/**
 * Interface for persistent pattern storage operations
 */
export interface PatternStore {
  /** List all saved pattern metadata */
  list(): Promise<PatternMetadata[]>
  /** Retrieve a pattern by ID with its mapping table checked (and regenerated if stale) */
  get(id: string): Promise<PatternDocument | null>
  /** Save or update a pattern */
  save(doc: PatternDocument): Promise<void>
  /** Delete a pattern by ID */
  delete(id: string): Promise<void>
  /** Clear all saved patterns */
  clear(): Promise<void>
}

/**
 * Default store instance for application usage
 */
export const patternStore: PatternStore = new KeyValuePatternStore(new MemoryStorage())

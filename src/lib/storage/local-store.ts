/**
 * Key/value implementation of PatternStore.
 *
 * Works against anything shaped like the Web Storage API; MemoryStorage is
 * the in-process backend used when no persistent one is supplied.
 */

import type { PatternStore } from "./store"
import type { InnerPatternDocument, PatternDocument, PatternMetadata } from "./types"
import {
  deserializePatternLayout,
  isRecord,
  parseWiringSpec,
  serializePatternLayout,
} from "./pattern-codec"
import { ensureMappingTable } from "@/lib/led-mapping/mappingState"
import { PatternFormatError } from "@/lib/errors"

const STORAGE_KEY = "ledmap:patterns"

export interface KeyValueStorage {
  getItem(key: string): string | null
  setItem(key: string, value: string): void
  removeItem(key: string): void
}

export class MemoryStorage implements KeyValueStorage {
  private items = new Map<string, string>()

  getItem(key: string): string | null {
    return this.items.get(key) ?? null
  }

  setItem(key: string, value: string): void {
    this.items.set(key, value)
  }

  removeItem(key: string): void {
    this.items.delete(key)
  }
}

function isInnerDocument(value: unknown): value is InnerPatternDocument {
  return (
    isRecord(value) &&
    typeof value.id === "string" &&
    typeof value.name === "string" &&
    typeof value.createdAt === "number" &&
    typeof value.updatedAt === "number" &&
    isRecord(value.layout)
  )
}

/**
 * PatternStore backed by a single JSON record in a key/value storage
 */
export class KeyValuePatternStore implements PatternStore {
  private storage: KeyValueStorage
  private storageKey: string

  constructor(storage: KeyValueStorage, storageKey: string = STORAGE_KEY) {
    this.storage = storage
    this.storageKey = storageKey
  }

  private readStorage(): Record<string, unknown> {
    const json = this.storage.getItem(this.storageKey)
    if (!json) {
      return {}
    }
    try {
      const data: unknown = JSON.parse(json)
      if (isRecord(data)) {
        return data
      }
      console.warn("[PatternStore] stored patterns are not an object, resetting storage")
    } catch (error) {
      console.warn("[PatternStore] failed to parse stored patterns, resetting storage:", error)
    }
    this.storage.removeItem(this.storageKey)
    return {}
  }

  private writeStorage(data: Record<string, unknown>): void {
    this.storage.setItem(this.storageKey, JSON.stringify(data))
  }

  async list(): Promise<PatternMetadata[]> {
    const data = this.readStorage()
    return Object.values(data)
      .filter(isInnerDocument)
      .map(({ id, name, createdAt, updatedAt }) => ({
        id,
        name,
        createdAt,
        updatedAt,
      }))
  }

  async get(id: string): Promise<PatternDocument | null> {
    const data = this.readStorage()
    const doc = data[id]
    if (doc === undefined) return null
    if (!isInnerDocument(doc)) {
      throw new PatternFormatError(`Stored pattern ${id} is malformed`)
    }

    // Never trust the stored table: the grid may have been resized since save
    const { state, regenerated } = ensureMappingTable(deserializePatternLayout(doc.layout))
    if (regenerated) {
      console.log(`[PatternStore] regenerated mapping table for pattern ${id}`)
    }

    return {
      id: doc.id,
      name: doc.name,
      createdAt: doc.createdAt,
      updatedAt: doc.updatedAt,
      layout: state,
      wiring: doc.wiring ? parseWiringSpec(doc.wiring) : null,
    }
  }

  async save(doc: PatternDocument): Promise<void> {
    const data = this.readStorage()

    const serialized: InnerPatternDocument = {
      id: doc.id,
      name: doc.name,
      createdAt: doc.createdAt,
      updatedAt: doc.updatedAt,
      layout: serializePatternLayout(doc.layout),
      wiring: doc.wiring,
    }

    data[doc.id] = serialized
    this.writeStorage(data)
    console.log("[PatternStore] saved:", doc.id)
  }

  async delete(id: string): Promise<void> {
    const data = this.readStorage()
    if (data[id] !== undefined) {
      delete data[id]
      this.writeStorage(data)
      console.log("[PatternStore] deleted:", id)
    }
  }

  async clear(): Promise<void> {
    this.storage.removeItem(this.storageKey)
  }
}

/**
 * PermutationCache - memoizes wiring permutations per
 * (width, height, mode, corner, flipX, flipY, active cells) so redraw loops
 * never rebuild them.
 *
 * Permutations are frozen; handing the same instance to a render pass and an
 * export pass at once is safe.
 */

import type { WiringPermutation, WiringSpec } from "./types"
import { buildPermutation } from "./wiringMapper"
import { activeCellsKey } from "./irregularShape"
import { DEFAULT_PERMUTATION_CACHE_SIZE } from "@/lib/constants"

export function permutationCacheKey(spec: WiringSpec): string {
  const base = [
    `${spec.width}x${spec.height}`,
    spec.mode,
    spec.startCorner,
    spec.flipX ? "fx" : "-",
    spec.flipY ? "fy" : "-",
  ].join(":")
  return spec.activeCells ? `${base}:${activeCellsKey(spec.activeCells)}` : base
}

export class PermutationCache {
  private readonly maxSize: number

  private entries = new Map<string, WiringPermutation>()

  // Access tracking for LRU eviction
  private accessOrder: string[] = []

  private hits = 0
  private misses = 0

  constructor(maxSize: number = DEFAULT_PERMUTATION_CACHE_SIZE) {
    this.maxSize = Math.max(1, maxSize)
  }

  /**
   * Get the permutation for a spec, building it on a miss
   */
  get(spec: WiringSpec): WiringPermutation {
    const key = permutationCacheKey(spec)
    const cached = this.entries.get(key)

    if (cached) {
      this.hits++
      this.updateAccessOrder(key)
      return cached
    }

    this.misses++
    const permutation = buildPermutation(spec)
    this.entries.set(key, permutation)
    this.updateAccessOrder(key)
    this.evictIfNecessary()
    return permutation
  }

  has(spec: WiringSpec): boolean {
    return this.entries.has(permutationCacheKey(spec))
  }

  clear(): void {
    this.entries.clear()
    this.accessOrder = []
    this.hits = 0
    this.misses = 0
  }

  getStats(): { size: number; hits: number; misses: number; hitRatio: number } {
    const lookups = this.hits + this.misses
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      hitRatio: lookups === 0 ? 0 : this.hits / lookups,
    }
  }

  private updateAccessOrder(key: string): void {
    const index = this.accessOrder.indexOf(key)
    if (index >= 0) {
      this.accessOrder.splice(index, 1)
    }
    this.accessOrder.push(key)
  }

  private evictIfNecessary(): void {
    while (this.entries.size > this.maxSize) {
      const lruKey = this.accessOrder.shift()
      if (lruKey === undefined) break
      this.entries.delete(lruKey)
      console.log(`[WiringCache] evicted ${lruKey}`)
    }
  }
}

import type { CacheEntry } from "./cache-entry"
import type { CacheKey } from "./cache-key"
import type { CacheResult } from "./cache-result"
import type { Bytes } from "./units"

export type CacheStored = {
  kind: "stored"

  /** Keys removed to make room, in eviction order. */
  evicted: CacheKey[]
}

export type CacheRejected = {
  kind: "rejected"

  /**
   * - `"too_large"`: the entry alone exceeds `maxSizeBytes`.
   * - `"invalid_size"`: size is negative or not finite.
   */
  reason: "too_large" | "invalid_size"
}

export type CacheWriteResult = CacheStored | CacheRejected

export type CacheStats = {
  entries: number
  totalSize: Bytes
  maxEntries?: number
  maxSizeBytes?: Bytes
}

/**
 * Synchronous, bounded key/value store where each entry carries a size.
 *
 * @remarks
 * - Operations never throw; a missing entry is a miss and an entry that
 *   cannot fit is reported as `rejected`.
 * - After every mutation the resident entries satisfy the configured
 *   capacity. Eviction happens inside `set`.
 * - The entry being written is never evicted by its own `set`.
 */
export interface SizedCache<T> {
  /**
   * Look up an entry and record the access (recency, `lastAccessMs`).
   */
  get(key: CacheKey): CacheResult<CacheEntry<T>>

  /**
   * Insert or replace the entry for `key`, evicting others as needed.
   * A replaced entry is re-inserted, so it becomes the newest under both
   * eviction policies.
   */
  set(key: CacheKey, value: T, size: Bytes): CacheWriteResult

  /**
   * Check for an entry without recording an access.
   */
  has(key: CacheKey): boolean

  /**
   * Remove one entry. Returns `true` if it was present.
   */
  invalidate(key: CacheKey): boolean

  /**
   * Remove every entry.
   */
  clear(): void

  stats(): CacheStats
}

import { createEvictionMap } from "../../core/eviction/create-eviction-map"
import type { EvictionMap } from "../../core/eviction/eviction-map"
import { type Clock, SystemClock } from "../../core/time/clock"
import type { CacheCapacity } from "../../ports/cache-capacity"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult } from "../../ports/cache-result"
import type { CacheStats, CacheWriteResult, SizedCache } from "../../ports/sized-cache"
import type { Bytes, Milliseconds } from "../../ports/units"

export type StoredEntry<T> = {
  value: T
  size: Bytes
  lastAccessMs: Milliseconds
}

export type MemorySizedCacheDeps<T> = {
  clock: Clock
  store: EvictionMap<CacheKey, StoredEntry<T>>
}

export class MemorySizedCache<T> implements SizedCache<T> {
  private totalSize: Bytes = 0

  public constructor(
    private readonly deps: MemorySizedCacheDeps<T>,
    private readonly capacity: CacheCapacity,
  ) {
    assertCapacity(capacity)
  }

  get(key: CacheKey): CacheResult<CacheEntry<T>> {
    const stored = this.deps.store.get(key)

    if (stored === undefined) return { kind: "miss" }

    stored.lastAccessMs = this.deps.clock.nowMs()

    return { kind: "hit", value: toEntry(key, stored) }
  }

  set(key: CacheKey, value: T, size: Bytes): CacheWriteResult {
    if (!Number.isFinite(size) || size < 0) {
      return { kind: "rejected", reason: "invalid_size" }
    }

    const { maxSizeBytes } = this.capacity

    if (maxSizeBytes !== undefined && size > maxSizeBytes) {
      return { kind: "rejected", reason: "too_large" }
    }

    this.remove(key)

    const evicted = this.ensureCapacityFor(size)

    this.deps.store.set(key, { value, size, lastAccessMs: this.deps.clock.nowMs() })
    this.totalSize += size

    return { kind: "stored", evicted }
  }

  has(key: CacheKey): boolean {
    return this.deps.store.has(key)
  }

  invalidate(key: CacheKey): boolean {
    return this.remove(key)
  }

  clear(): void {
    this.deps.store.clear()
    this.totalSize = 0
  }

  stats(): CacheStats {
    return {
      entries: this.deps.store.size(),
      totalSize: this.totalSize,
      ...(this.capacity.maxEntries !== undefined && {
        maxEntries: this.capacity.maxEntries,
      }),
      ...(this.capacity.maxSizeBytes !== undefined && {
        maxSizeBytes: this.capacity.maxSizeBytes,
      }),
    }
  }

  private remove(key: CacheKey): boolean {
    const stored = this.deps.store.peek(key)

    if (stored === undefined) return false

    this.deps.store.delete(key)
    this.totalSize -= stored.size

    return true
  }

  private hasCapacityFor(size: Bytes): boolean {
    const { maxEntries, maxSizeBytes } = this.capacity

    if (maxEntries !== undefined && this.deps.store.size() + 1 > maxEntries) return false
    if (maxSizeBytes !== undefined && this.totalSize + size > maxSizeBytes) return false

    return true
  }

  // Callers remove `key` before this runs, so the incoming entry is never a victim.
  private ensureCapacityFor(size: Bytes): CacheKey[] {
    const evicted: CacheKey[] = []

    while (!this.hasCapacityFor(size)) {
      const victim = this.deps.store.victim()

      if (victim === undefined) break

      this.remove(victim)
      evicted.push(victim)
    }

    return evicted
  }
}

function toEntry<T>(key: CacheKey, stored: StoredEntry<T>): CacheEntry<T> {
  return Object.freeze({
    key,
    value: stored.value,
    size: stored.size,
    lastAccessMs: stored.lastAccessMs,
  })
}

function assertCapacity(capacity: CacheCapacity): void {
  const { maxEntries, maxSizeBytes } = capacity

  if (maxEntries === undefined && maxSizeBytes === undefined) {
    throw new RangeError("Cache capacity needs maxEntries, maxSizeBytes, or both.")
  }

  if (maxEntries !== undefined && (!Number.isInteger(maxEntries) || maxEntries < 1)) {
    throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}.`)
  }

  if (maxSizeBytes !== undefined && (!Number.isFinite(maxSizeBytes) || maxSizeBytes <= 0)) {
    throw new RangeError(`maxSizeBytes must be a positive number, got ${maxSizeBytes}.`)
  }
}

export type CreateMemorySizedCacheOptions = {
  capacity: CacheCapacity
  policy?: CacheEvictionPolicy
  clock?: Clock
}

export function createMemorySizedCache<T>(
  opts: CreateMemorySizedCacheOptions,
): MemorySizedCache<T> {
  return new MemorySizedCache<T>(
    {
      clock: opts.clock ?? new SystemClock(),
      store: createEvictionMap<CacheKey, StoredEntry<T>>(opts.policy ?? "lru"),
    },
    opts.capacity,
  )
}

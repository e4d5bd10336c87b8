export {
  createMemorySizedCache,
  type CreateMemorySizedCacheOptions,
  MemorySizedCache,
  type MemorySizedCacheDeps,
  type StoredEntry,
} from "./adapters/memory/memory-sized-cache"
export { createEvictionMap } from "./core/eviction/create-eviction-map"
export type { EvictionMap } from "./core/eviction/eviction-map"
export { FifoMemoryMap } from "./core/eviction/fifo-memory-map"
export { LruMemoryMap } from "./core/eviction/lru-memory-map"
export { type Clock, SystemClock } from "./core/time/clock"
export type { CacheCapacity } from "./ports/cache-capacity"
export type { CacheEntry } from "./ports/cache-entry"
export {
  type CacheEvictionPolicy,
  cacheEvictionPolicies,
} from "./ports/cache-eviction-policy"
export type { CacheKey } from "./ports/cache-key"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type {
  CacheRejected,
  CacheStats,
  CacheStored,
  CacheWriteResult,
  SizedCache,
} from "./ports/sized-cache"
export type { Bytes, Milliseconds } from "./ports/units"

import type { Bytes } from "./units"

/**
 * Bounds for a sized cache. At least one must be set; when both are set,
 * eviction runs until both hold.
 */
export type CacheCapacity = {
  /** Maximum number of resident entries. */
  maxEntries?: number

  /** Maximum sum of entry sizes. */
  maxSizeBytes?: Bytes
}

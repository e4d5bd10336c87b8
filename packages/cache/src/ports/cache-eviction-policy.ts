export const cacheEvictionPolicies = ["lru", "fifo"] as const

/**
 * - `"lru"`: evict the entry that was read or written least recently.
 * - `"fifo"`: evict in insertion order; reads do not refresh an entry.
 */
export type CacheEvictionPolicy = (typeof cacheEvictionPolicies)[number]

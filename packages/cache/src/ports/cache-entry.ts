import type { CacheKey } from "./cache-key"
import type { Bytes, Milliseconds } from "./units"

/**
 * Read-only view of a resident cache entry.
 *
 * Each `get` returns a fresh frozen record; mutating the cache later does not
 * change a record already handed out.
 */
export type CacheEntry<T> = Readonly<{
  key: CacheKey
  value: T

  /** Approximate cost in bytes, as given to `set`. */
  size: Bytes

  /** Clock time of the last `get` or `set` for this key. */
  lastAccessMs: Milliseconds
}>

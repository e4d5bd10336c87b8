/**
 * Map-like storage that also knows which key to evict next.
 *
 * Ordering rules (LRU, FIFO) live behind this interface so the sized cache
 * only deals with capacity accounting.
 */
export interface EvictionMap<K, V> {
  /**
   * Retrieve the value for the given key.
   *
   * Implementations may update ordering as a side effect (touch-on-read).
   */
  get(key: K): V | undefined

  /**
   * Retrieve the value without touching ordering.
   */
  peek(key: K): V | undefined

  /**
   * Insert or update the value for the given key.
   */
  set(key: K, value: V): void

  /**
   * Remove the key. Returns true if it was present.
   */
  delete(key: K): boolean

  has(key: K): boolean

  size(): number

  /**
   * The key that should be evicted next, or `undefined` if empty. Does not
   * remove it.
   */
  victim(): K | undefined

  clear(): void
}

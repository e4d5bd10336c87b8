import type { EvictionMap } from "./eviction-map"

/**
 * Insertion-ordered map. `set` on a present key keeps its original position;
 * delete the key first to move it to the back.
 */
export class FifoMemoryMap<K, V> implements EvictionMap<K, V> {
  private readonly map = new Map<K, V>()

  get(key: K): V | undefined {
    return this.map.get(key)
  }

  peek(key: K): V | undefined {
    return this.map.get(key)
  }

  set(key: K, value: V): void {
    this.map.set(key, value)
  }

  delete(key: K): boolean {
    return this.map.delete(key)
  }

  has(key: K): boolean {
    return this.map.has(key)
  }

  size(): number {
    return this.map.size
  }

  victim(): K | undefined {
    for (const key of this.map.keys()) return key

    return undefined
  }

  clear(): void {
    this.map.clear()
  }
}

import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import type { EvictionMap } from "./eviction-map"
import { FifoMemoryMap } from "./fifo-memory-map"
import { LruMemoryMap } from "./lru-memory-map"

export function createEvictionMap<K, V>(policy: CacheEvictionPolicy): EvictionMap<K, V> {
  switch (policy) {
    case "lru":
      return new LruMemoryMap<K, V>()
    case "fifo":
      return new FifoMemoryMap<K, V>()
  }
}

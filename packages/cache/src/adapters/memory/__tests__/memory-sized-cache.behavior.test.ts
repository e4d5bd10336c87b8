import { FifoMemoryMap } from "../../../core/eviction/fifo-memory-map"
import { LruMemoryMap } from "../../../core/eviction/lru-memory-map"
import type { CacheCapacity } from "../../../ports/cache-capacity"
import { images, keys, type TestImage } from "../../../tests/utils/cache-test-helpers"
import { ManualTestClock } from "../../../tests/utils/manual-test-clock"
import {
  createMemorySizedCache,
  MemorySizedCache,
  type StoredEntry,
} from "../memory-sized-cache"

describe("MemorySizedCache", () => {
  let clock: ManualTestClock

  beforeEach(() => {
    clock = new ManualTestClock(new Date("2024-01-01T00:00:00.000Z"))
  })

  const lruCache = (maxEntries: number) =>
    new MemorySizedCache<TestImage>({ clock, store: new LruMemoryMap() }, { maxEntries })

  describe("LRU eviction", () => {
    it("with capacity 2, inserting A, B, C evicts A", () => {
      const cache = lruCache(2)

      cache.set(keys.a(), images.a(), 1)
      cache.set(keys.b(), images.b(), 1)
      const res = cache.set(keys.c(), images.c(), 1)

      expect(res).toStrictEqual({ kind: "stored", evicted: [keys.a()] })
      expect(cache.get(keys.a())).toStrictEqual({ kind: "miss" })
      expect(cache.has(keys.b())).toBe(true)
      expect(cache.has(keys.c())).toBe(true)
    })

    it("a read refreshes recency", () => {
      const cache = lruCache(2)

      cache.set(keys.a(), images.a(), 1)
      cache.set(keys.b(), images.b(), 1)
      cache.get(keys.a())
      cache.set(keys.c(), images.c(), 1)

      expect(cache.has(keys.a())).toBe(true)
      expect(cache.has(keys.b())).toBe(false)
    })

    it("has() does not refresh recency", () => {
      const cache = lruCache(2)

      cache.set(keys.a(), images.a(), 1)
      cache.set(keys.b(), images.b(), 1)
      cache.has(keys.a())
      cache.set(keys.c(), images.c(), 1)

      expect(cache.has(keys.a())).toBe(false)
    })

    it("evicts several entries in recency order to fit a large one", () => {
      const cache = new MemorySizedCache<TestImage>(
        { clock, store: new LruMemoryMap() },
        { maxSizeBytes: 100 },
      )

      cache.set(keys.a(), images.a(), 30)
      cache.set(keys.b(), images.b(), 30)
      cache.set(keys.c(), images.c(), 30)
      cache.get(keys.a())

      const res = cache.set(keys.d(), images.d(), 70)

      expect(res).toStrictEqual({ kind: "stored", evicted: [keys.b(), keys.c()] })
      expect(cache.stats()).toMatchObject({ entries: 2, totalSize: 100 })
    })
  })

  describe("FIFO eviction", () => {
    it("a read does not protect the oldest entry", () => {
      const cache = new MemorySizedCache<TestImage>(
        { clock, store: new FifoMemoryMap() },
        { maxEntries: 2 },
      )

      cache.set(keys.a(), images.a(), 1)
      cache.set(keys.b(), images.b(), 1)
      cache.get(keys.a())
      cache.set(keys.c(), images.c(), 1)

      expect(cache.has(keys.a())).toBe(false)
      expect(cache.has(keys.b())).toBe(true)
    })
  })

  describe("access bookkeeping", () => {
    it("records lastAccessMs from the injected clock on set and get", () => {
      const cache = lruCache(2)

      cache.set(keys.a(), images.a(), 1)
      clock.advanceMs(250)

      const res = cache.get(keys.a())

      expect(res).toStrictEqual({
        kind: "hit",
        value: {
          key: keys.a(),
          value: images.a(),
          size: 1,
          lastAccessMs: new Date("2024-01-01T00:00:00.250Z").getTime(),
        },
      })
    })

    it("returns frozen records that later writes do not change", () => {
      const cache = lruCache(2)

      cache.set(keys.a(), images.a(), 1)
      const first = cache.get(keys.a())

      cache.set(keys.a(), images.b(), 2)

      expect(first.kind === "hit" && Object.isFrozen(first.value)).toBe(true)
      expect(first.kind === "hit" && first.value.value).toStrictEqual(images.a())
      expect(first.kind === "hit" && first.value.size).toBe(1)
    })
  })

  describe("capacity validation", () => {
    const create = (capacity: CacheCapacity) =>
      new MemorySizedCache<TestImage>(
        { clock, store: new LruMemoryMap<string, StoredEntry<TestImage>>() },
        capacity,
      )

    it("throws RangeError when no bound is given", () => {
      expect(() => create({})).toThrow(RangeError)
    })

    it("throws RangeError for non-positive or fractional maxEntries", () => {
      expect(() => create({ maxEntries: 0 })).toThrow(RangeError)
      expect(() => create({ maxEntries: 1.5 })).toThrow(RangeError)
    })

    it("throws RangeError for non-positive maxSizeBytes", () => {
      expect(() => create({ maxSizeBytes: -10 })).toThrow(RangeError)
    })
  })

  describe("createMemorySizedCache", () => {
    it("defaults to LRU ordering", () => {
      const cache = createMemorySizedCache<TestImage>({ capacity: { maxEntries: 2 }, clock })

      cache.set(keys.a(), images.a(), 1)
      cache.set(keys.b(), images.b(), 1)
      cache.get(keys.a())
      cache.set(keys.c(), images.c(), 1)

      expect(cache.has(keys.a())).toBe(true)
      expect(cache.has(keys.b())).toBe(false)
    })

    it("honors the fifo policy", () => {
      const cache = createMemorySizedCache<TestImage>({
        capacity: { maxEntries: 2 },
        policy: "fifo",
        clock,
      })

      cache.set(keys.a(), images.a(), 1)
      cache.set(keys.b(), images.b(), 1)
      cache.get(keys.a())
      cache.set(keys.c(), images.c(), 1)

      expect(cache.has(keys.a())).toBe(false)
    })

    it("moves a replaced entry to the back of the fifo queue", () => {
      const cache = createMemorySizedCache<TestImage>({
        capacity: { maxEntries: 2 },
        policy: "fifo",
        clock,
      })

      cache.set(keys.a(), images.a(), 1)
      cache.set(keys.b(), images.b(), 1)
      cache.set(keys.a(), images.c(), 1)
      const write = cache.set(keys.d(), images.d(), 1)

      expect(write).toEqual({ kind: "stored", evicted: [keys.b()] })
      expect(cache.has(keys.a())).toBe(true)
    })
  })
})

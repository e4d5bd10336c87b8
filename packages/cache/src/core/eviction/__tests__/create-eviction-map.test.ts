import { createEvictionMap } from "../create-eviction-map"
import { FifoMemoryMap } from "../fifo-memory-map"
import { LruMemoryMap } from "../lru-memory-map"

describe("createEvictionMap", () => {
  it("returns an LRU map for lru", () => {
    expect(createEvictionMap("lru")).toBeInstanceOf(LruMemoryMap)
  })

  it("returns a FIFO map for fifo", () => {
    expect(createEvictionMap("fifo")).toBeInstanceOf(FifoMemoryMap)
  })
})

import { FifoMemoryMap } from "../fifo-memory-map"
import { runEvictionMapContractTests } from "./eviction-map"

runEvictionMapContractTests("FifoMemoryMap", () => new FifoMemoryMap<string, unknown>())

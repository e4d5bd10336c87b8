import {
  type Bytes,
  type CacheCapacity,
  type CacheEvictionPolicy,
  cacheEvictionPolicies,
  type Milliseconds,
} from "@picfetch/cache"
import { type LogLevelName, logLevelNames } from "@picfetch/logger"
import { z } from "zod/mini"

const positiveNumber = () => z.coerce.number().check(z.positive())

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "image-loader"),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  IMAGE_CACHE_MAX_ENTRIES: z.optional(positiveNumber()),
  IMAGE_CACHE_MAX_SIZE_BYTES: z._default(positiveNumber(), 50 * 1024 * 1024),
  IMAGE_CACHE_EVICTION: z._default(z.enum(cacheEvictionPolicies), "lru"),

  IMAGE_FETCH_TIMEOUT_MS: z._default(positiveNumber(), 15_000),
  IMAGE_FETCH_MAX_BYTES: z._default(positiveNumber(), 20 * 1024 * 1024),

  IMAGE_LOADER_ABORT_UNOBSERVED: z._default(z.stringbool(), false),
})

export type EnvConfig = z.infer<typeof envSchema>

export type ImageLoaderConfig = {
  app: {
    env: string
    serviceName: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
  }

  cache: {
    policy: CacheEvictionPolicy
    capacity: CacheCapacity
  }

  fetch: {
    timeoutMs: Milliseconds
    maxResponseBytes: Bytes
  }

  loader: {
    abortUnobservedFetches: boolean
  }
}

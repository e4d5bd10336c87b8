import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { z } from "zod/mini"
import { ConfigError } from "./config.errors"
import { type EnvConfig, envSchema, type ImageLoaderConfig } from "./schema"

export function mapEnvToConfig(env: EnvConfig): ImageLoaderConfig {
  return {
    app: {
      env: env.APP_ENV,
      serviceName: env.SERVICE_NAME,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
    cache: {
      policy: env.IMAGE_CACHE_EVICTION,
      capacity: {
        maxSizeBytes: env.IMAGE_CACHE_MAX_SIZE_BYTES,
        ...(env.IMAGE_CACHE_MAX_ENTRIES !== undefined && {
          maxEntries: env.IMAGE_CACHE_MAX_ENTRIES,
        }),
      },
    },
    fetch: {
      timeoutMs: env.IMAGE_FETCH_TIMEOUT_MS,
      maxResponseBytes: env.IMAGE_FETCH_MAX_BYTES,
    },
    loader: {
      abortUnobservedFetches: env.IMAGE_LOADER_ABORT_UNOBSERVED,
    },
  }
}

async function readDotenv(file: string): Promise<Record<string, string>> {
  try {
    return parse(await fs.readFile(file, "utf-8"))
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return {}
    throw err
  }
}

/**
 * Reads `.env.${NODE_ENV}` from `cwd` when present, then lets `env` override
 * it. Throws {@link ConfigError} when the merged values fail validation.
 */
export async function loadImageLoaderConfig(
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd(),
): Promise<ImageLoaderConfig> {
  const fileValues = await readDotenv(path.resolve(cwd, `.env.${env.NODE_ENV ?? "development"}`))

  const merged: Record<string, unknown> = { ...fileValues }

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) merged[key] = value
  }

  const result = envSchema.safeParse(merged)

  if (!result.success) {
    throw ConfigError.invalid(z.prettifyError(result.error), result.error)
  }

  return mapEnvToConfig(result.data)
}

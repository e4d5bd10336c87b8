import { type Clock, createMemorySizedCache, SystemClock } from "@picfetch/cache"
import { createPinoLogger, type Logger } from "@picfetch/logger"
import { MicrotaskDelivery } from "../adapters/delivery/microtask-delivery"
import { HttpImageFetcher } from "../adapters/http/http-image-fetcher"
import { SharpImageDecoder } from "../adapters/sharp/sharp-image-decoder"
import { type ImageLoaderConfig, loadImageLoaderConfig } from "../config"
import { ImageLoader } from "../core/image-loader"
import type { DecodedImage } from "../model/decoded-image"
import type { DeliveryContext } from "../ports/delivery-context"
import type { ImageCache } from "../ports/image-cache"
import type { ImageDecoder } from "../ports/image-decoder"
import type { ImageFetcher } from "../ports/image-fetcher"

export type ImageLoaderServices = {
  config: ImageLoaderConfig
  logger: Logger
  clock: Clock
  cache: ImageCache
  fetcher: ImageFetcher
  decoder: ImageDecoder
  delivery: DeliveryContext
  loader: ImageLoader
}

export type ImageLoaderServiceOverrides = Partial<
  Omit<ImageLoaderServices, "config" | "loader">
>

/**
 * Wires one cache and one loader. Loaders created elsewhere can share the
 * returned `cache` to reuse its entries.
 */
export function createImageLoaderServices(
  config: ImageLoaderConfig,
  overrides: ImageLoaderServiceOverrides = {},
): ImageLoaderServices {
  const logger =
    overrides.logger ??
    createPinoLogger(
      {},
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.app.serviceName, env: config.app.env },
    )

  const clock = overrides.clock ?? new SystemClock()

  const cache =
    overrides.cache ??
    createMemorySizedCache<DecodedImage>({
      capacity: config.cache.capacity,
      policy: config.cache.policy,
      clock,
    })

  const fetcher =
    overrides.fetcher ??
    new HttpImageFetcher(
      {},
      { timeoutMs: config.fetch.timeoutMs, maxResponseBytes: config.fetch.maxResponseBytes },
    )

  const decoder = overrides.decoder ?? new SharpImageDecoder()
  const delivery = overrides.delivery ?? new MicrotaskDelivery()

  const loader = new ImageLoader(
    { cache, fetcher, decoder, delivery, logger, clock },
    { abortUnobservedFetches: config.loader.abortUnobservedFetches },
  )

  return { config, logger, clock, cache, fetcher, decoder, delivery, loader }
}

export async function createImageLoaderFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ImageLoaderServiceOverrides = {},
  cwd?: string,
): Promise<ImageLoaderServices> {
  const config = await loadImageLoaderConfig(env, cwd)

  return createImageLoaderServices(config, overrides)
}

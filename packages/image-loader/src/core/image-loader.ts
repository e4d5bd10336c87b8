import type { CacheKey, Clock } from "@picfetch/cache"
import { toAppError } from "@picfetch/errors"
import type { Logger } from "@picfetch/logger"
import { copyDecodedImage, type DecodedImage } from "../model/decoded-image"
import { ImageLoadError } from "../model/image-load.errors"
import {
  type FailedState,
  isTerminal,
  type LoadState,
  type TerminalLoadState,
} from "../model/load-state"
import type { DeliveryContext } from "../ports/delivery-context"
import type { ImageCache } from "../ports/image-cache"
import type { ImageDecoder } from "../ports/image-decoder"
import type { FetchedImage, ImageFetcher } from "../ports/image-fetcher"
import type { LoadHandle, LoadObserver } from "../ports/load-observer"
import { parseImageKey } from "./image-key"
import { type Flight, InFlightRegistry } from "./inflight-registry"
import { LoadRequest } from "./load-request"

export type ImageLoaderDeps = {
  cache: ImageCache
  fetcher: ImageFetcher
  decoder: ImageDecoder
  delivery: DeliveryContext
  logger: Logger
  clock: Clock
}

export type ImageLoaderOptions = {
  /**
   * Abort a fetch once every observer of its key has detached. When off, the
   * fetch completes and fills the cache without notifying anyone.
   * @default false
   */
  abortUnobservedFetches: boolean
}

/**
 * Loads remote images through a shared cache.
 *
 * Cache hits and invalid keys are answered synchronously from `load`. A miss
 * publishes `loading` synchronously, then one fetch per key serves every
 * observer that asks for it while the fetch is in flight. Terminal states of
 * a flight are delivered to all of its observers in a single task on the
 * delivery context.
 */
export class ImageLoader {
  private readonly inflight = new InFlightRegistry()
  private readonly logger: Logger

  constructor(
    private readonly deps: ImageLoaderDeps,
    private readonly opts: Partial<ImageLoaderOptions> = {},
  ) {
    this.logger = deps.logger.child({ module: "image-loader" })
  }

  get inFlightCount(): number {
    return this.inflight.size
  }

  load(url: string, observer: LoadObserver): LoadHandle {
    const parsed = parseImageKey(url)

    if (parsed.kind === "invalid") {
      const request = this.createRequest(url, observer)

      this.logger.debug("Rejected image key", { key: url, reason: parsed.reason })
      request.publish({
        status: "failed",
        key: url,
        error: ImageLoadError.invalidKey({ url, reason: parsed.reason }),
      })

      return request
    }

    const { key } = parsed
    const request = this.createRequest(key, observer)
    const cached = this.deps.cache.get(key)

    if (cached.kind === "hit") {
      this.logger.debug("Image served from cache", { key })
      request.publish(
        forObserver({ status: "loaded", key, image: cached.value.value, source: "cache" }),
      )

      return request
    }

    const existing = this.inflight.get(key)

    if (existing) {
      this.inflight.join(existing, request)
      this.logger.debug("Joined in-flight image load", { key, flightId: existing.id })
      request.publish({ status: "loading", key })

      return request
    }

    const flight = this.inflight.begin(key, request, this.deps.clock.nowMs())

    request.publish({ status: "loading", key })
    void this.runFlight(flight)

    return request
  }

  /**
   * Promise form of {@link load}. Resolves with the first terminal state and
   * never rejects.
   */
  request(url: string): Promise<TerminalLoadState> {
    return new Promise((resolve) => {
      this.load(url, (state) => {
        if (isTerminal(state)) resolve(state)
      })
    })
  }

  /**
   * Drops the cached image for `url`. In-flight loads are unaffected and
   * will store their result when they complete.
   */
  invalidate(url: string): boolean {
    const parsed = parseImageKey(url)

    if (parsed.kind === "invalid") return false

    return this.deps.cache.invalidate(parsed.key)
  }

  private createRequest(key: string, observer: LoadObserver): LoadRequest {
    return new LoadRequest(key, observer, {
      onDetach: (request) => this.handleDetach(request),
      onObserverError: (err, state) => {
        this.logger.error("Image load observer threw", {
          key,
          state: state.status,
          err: toAppError(err, "observer_error"),
        })
      },
    })
  }

  private handleDetach(request: LoadRequest): void {
    const flight = this.inflight.leave(request)

    if (!flight || flight.requests.size > 0) return
    if (!this.opts.abortUnobservedFetches) return

    this.logger.debug("Aborting unobserved image load", { key: flight.key, flightId: flight.id })
    this.inflight.retire(flight)
    flight.controller.abort()
  }

  private async runFlight(flight: Flight): Promise<void> {
    const outcome = await this.resolveFlight(flight)
    const requests = this.inflight.settle(flight)

    if (requests.length === 0) {
      this.logger.debug("Image load finished without observers", {
        key: flight.key,
        flightId: flight.id,
        outcome: outcome.status,
      })

      return
    }

    this.deps.delivery.dispatch(() => {
      for (const request of requests) request.publish(forObserver(outcome))
    })
  }

  /** Fetch, decode and store. Never rejects. */
  private async resolveFlight(flight: Flight): Promise<TerminalLoadState> {
    const { key } = flight
    const log = this.logger.child({ key, flightId: flight.id })

    log.info("Fetching image")

    let response: FetchedImage

    try {
      response = await this.deps.fetcher.fetch(key, { signal: flight.controller.signal })
    } catch (err) {
      return this.fail(log, flight, asNetworkError(key, err, flight.controller.signal))
    }

    if (response.status < 200 || response.status > 299) {
      return this.fail(log, flight, ImageLoadError.httpStatus({ url: key, status: response.status }))
    }

    let image: DecodedImage

    try {
      image = await this.deps.decoder.decode({
        url: key,
        bytes: response.bytes,
        contentType: response.contentType,
      })
    } catch (err) {
      return this.fail(log, flight, asDecodeError(key, response.contentType, err))
    }

    if (flight.controller.signal.aborted) {
      return this.fail(log, flight, ImageLoadError.transportFailure({ url: key, reason: "aborted" }))
    }

    this.store(log, key, image)

    log.info("Image loaded", {
      status: response.status,
      durationMs: this.elapsed(flight),
      size: image.byteLength,
      format: image.format,
    })

    return { status: "loaded", key, image, source: "network" }
  }

  private store(log: Logger, key: CacheKey, image: DecodedImage): void {
    const write = this.deps.cache.set(key, image, image.byteLength)

    if (write.kind === "rejected") {
      log.warn("Image not cached", { reason: write.reason, size: image.byteLength })
    } else if (write.evicted.length > 0) {
      log.debug("Evicted cached images", { evicted: write.evicted })
    }
  }

  private fail(log: Logger, flight: Flight, error: ImageLoadError): FailedState {
    log.warn("Image load failed", { durationMs: this.elapsed(flight), err: error })

    return { status: "failed", key: flight.key, error }
  }

  private elapsed(flight: Flight): number {
    return this.deps.clock.nowMs() - flight.startedAtMs
  }
}

/** Each observer gets its own bytes; the cached image is never handed out. */
function forObserver(state: LoadState): LoadState {
  if (state.status !== "loaded") return state

  return { ...state, image: copyDecodedImage(state.image) }
}

function asNetworkError(url: string, err: unknown, signal: AbortSignal): ImageLoadError {
  if (err instanceof ImageLoadError) return err

  return ImageLoadError.transportFailure({
    url,
    reason: signal.aborted ? "aborted" : isTimeout(err) ? "timeout" : "transport",
    cause: err,
  })
}

function asDecodeError(
  url: string,
  contentType: string | undefined,
  err: unknown,
): ImageLoadError {
  if (err instanceof ImageLoadError) return err

  return ImageLoadError.decodeFailure({ url, reason: "unreadable", contentType, cause: err })
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && err.name === "TimeoutError"
}

import type { Bytes, CacheKey, Milliseconds } from "@picfetch/cache"
import { ImageLoadError, type NetworkFailureReason } from "../../model/image-load.errors"
import type { FetchImageOptions, FetchedImage, ImageFetcher } from "../../ports/image-fetcher"

export type HttpImageFetcherDeps = {
  /** @default globalThis.fetch */
  fetch?: typeof globalThis.fetch
}

export type HttpImageFetcherOptions = {
  timeoutMs: Milliseconds
  maxResponseBytes: Bytes

  /** Extra request headers. `accept` defaults to `image/*`. */
  headers?: Record<string, string>
}

const ACCEPT = "image/*"

export class HttpImageFetcher implements ImageFetcher {
  private readonly fetchFn: typeof globalThis.fetch

  constructor(
    deps: HttpImageFetcherDeps,
    private readonly opts: HttpImageFetcherOptions,
  ) {
    this.fetchFn = deps.fetch ?? globalThis.fetch
  }

  async fetch(url: CacheKey, opts: FetchImageOptions = {}): Promise<FetchedImage> {
    const timeout = AbortSignal.timeout(this.opts.timeoutMs)
    const signal = opts.signal ? AbortSignal.any([opts.signal, timeout]) : timeout

    let response: Response

    try {
      response = await this.fetchFn(url, {
        method: "GET",
        redirect: "follow",
        headers: { accept: ACCEPT, ...this.opts.headers },
        signal,
      })
    } catch (err) {
      throw ImageLoadError.transportFailure({ url, reason: failureReason(err, opts.signal), cause: err })
    }

    const contentType = response.headers.get("content-type") ?? undefined

    if (!response.ok) {
      await response.body?.cancel()

      return { status: response.status, contentType, bytes: new Uint8Array() }
    }

    const { maxResponseBytes } = this.opts
    const declared = Number(response.headers.get("content-length") ?? Number.NaN)

    if (Number.isFinite(declared) && declared > maxResponseBytes) {
      await response.body?.cancel()

      throw ImageLoadError.responseTooLarge({ url, maxBytes: maxResponseBytes, actualBytes: declared })
    }

    const bytes = await this.readBody(url, response, opts.signal)

    return { status: response.status, contentType, bytes }
  }

  /**
   * Reads the body chunk by chunk and stops as soon as it grows past
   * `maxResponseBytes`, whatever the response declared.
   */
  private async readBody(
    url: CacheKey,
    response: Response,
    signal: AbortSignal | undefined,
  ): Promise<Uint8Array> {
    if (response.body === null) return new Uint8Array()

    const { maxResponseBytes } = this.opts
    const reader = response.body.getReader()
    const chunks: Uint8Array[] = []
    let total = 0

    try {
      for (;;) {
        const { done, value } = await reader.read()

        if (done) break

        total += value.byteLength

        if (total > maxResponseBytes) {
          await reader.cancel()

          throw ImageLoadError.responseTooLarge({ url, maxBytes: maxResponseBytes, actualBytes: total })
        }

        chunks.push(value)
      }
    } catch (err) {
      if (err instanceof ImageLoadError) throw err

      throw ImageLoadError.transportFailure({ url, reason: failureReason(err, signal), cause: err })
    }

    const bytes = new Uint8Array(total)
    let offset = 0

    for (const chunk of chunks) {
      bytes.set(chunk, offset)
      offset += chunk.byteLength
    }

    return bytes
  }
}

function failureReason(err: unknown, signal: AbortSignal | undefined): NetworkFailureReason {
  if (signal?.aborted) return "aborted"
  if (err instanceof Error && err.name === "TimeoutError") return "timeout"

  return "transport"
}

import type { CacheKey } from "@picfetch/cache"

export type FetchedImage = {
  /** HTTP status of the final response, after redirects. */
  status: number
  contentType: string | undefined

  /** Response body. Empty for non-2xx responses. */
  bytes: Uint8Array
}

export type FetchImageOptions = {
  signal?: AbortSignal
}

/**
 * Retrieves the raw bytes behind an image key.
 *
 * Resolves for every HTTP response, successful or not; the caller decides
 * what a status means. Rejects on transport failures, timeouts and aborts.
 */
export interface ImageFetcher {
  fetch(url: CacheKey, opts?: FetchImageOptions): Promise<FetchedImage>
}

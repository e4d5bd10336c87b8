import { BaseError } from "@picfetch/errors"

export type ImageLoadErrorCode = "invalid_key" | "network_error" | "decode_error"

export type InvalidKeyReason = "empty" | "malformed" | "unsupported_protocol"

export type NetworkFailureReason = "transport" | "timeout" | "aborted"

export type DecodeFailureReason = "empty_body" | "unreadable" | "unsupported_format"

/**
 * Failure delivered to observers in a `failed` load state.
 *
 * - `invalid_key`: the URL could not be used as a key; nothing was fetched.
 * - `network_error`: transport failure, timeout, non-2xx status or an
 *   oversized body. Retryable by calling `load` again.
 * - `decode_error`: bytes arrived but are not a supported image.
 */
export class ImageLoadError extends BaseError<ImageLoadErrorCode> {
  static invalidKey(input: { url: string; reason: InvalidKeyReason }): ImageLoadError {
    return new ImageLoadError(`Invalid image URL: ${JSON.stringify(input.url)}`, {
      code: "invalid_key",
      context: { url: input.url, reason: input.reason },
    })
  }

  static transportFailure(input: {
    url: string
    reason: NetworkFailureReason
    cause?: unknown
  }): ImageLoadError {
    return new ImageLoadError(`Failed to fetch image (${input.reason}): ${input.url}`, {
      code: "network_error",
      context: { url: input.url, reason: input.reason },
      cause: input.cause,
      isRetryable: true,
    })
  }

  static httpStatus(input: { url: string; status: number }): ImageLoadError {
    return new ImageLoadError(`Image request returned HTTP ${input.status}: ${input.url}`, {
      code: "network_error",
      context: { url: input.url, reason: "http_status", status: input.status },
      isRetryable: input.status === 408 || input.status === 429 || input.status >= 500,
    })
  }

  static responseTooLarge(input: {
    url: string
    maxBytes: number
    actualBytes: number
  }): ImageLoadError {
    return new ImageLoadError(
      `Image response exceeds ${input.maxBytes} bytes: ${input.url}`,
      {
        code: "network_error",
        context: {
          url: input.url,
          reason: "too_large",
          maxBytes: input.maxBytes,
          actualBytes: input.actualBytes,
        },
      },
    )
  }

  static decodeFailure(input: {
    url: string
    reason: DecodeFailureReason
    contentType?: string | undefined
    cause?: unknown
  }): ImageLoadError {
    return new ImageLoadError(`Could not decode image (${input.reason}): ${input.url}`, {
      code: "decode_error",
      context: {
        url: input.url,
        reason: input.reason,
        ...(input.contentType !== undefined && { contentType: input.contentType }),
      },
      cause: input.cause,
    })
  }
}

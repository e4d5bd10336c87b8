import type { CacheKey } from "@picfetch/cache"
import type { InvalidKeyReason } from "../model/image-load.errors"

export type ParsedImageKey =
  | { kind: "valid"; key: CacheKey }
  | { kind: "invalid"; reason: InvalidKeyReason }

const supportedProtocols = new Set(["http:", "https:"])

/**
 * Normalizes a URL into a cache key.
 *
 * Host case, default ports and percent-encoding are normalized by the URL
 * parser. The fragment is dropped since it never reaches the server.
 */
export function parseImageKey(input: string): ParsedImageKey {
  const trimmed = input.trim()

  if (trimmed.length === 0) return { kind: "invalid", reason: "empty" }

  let url: URL

  try {
    url = new URL(trimmed)
  } catch {
    return { kind: "invalid", reason: "malformed" }
  }

  if (!supportedProtocols.has(url.protocol)) {
    return { kind: "invalid", reason: "unsupported_protocol" }
  }

  url.hash = ""

  return { kind: "valid", key: url.href }
}

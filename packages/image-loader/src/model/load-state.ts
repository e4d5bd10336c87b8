import type { CacheKey } from "@picfetch/cache"
import type { DecodedImage } from "./decoded-image"
import type { ImageLoadError } from "./image-load.errors"

export type LoadingState = {
  status: "loading"
  key: CacheKey
}

export type LoadedState = {
  status: "loaded"
  key: CacheKey
  image: DecodedImage

  /** `"cache"` when served without a fetch. */
  source: "cache" | "network"
}

export type FailedState = {
  status: "failed"

  /** Normalized key, or the raw input when the key itself was invalid. */
  key: string
  error: ImageLoadError
}

export type LoadState = LoadingState | LoadedState | FailedState

export type TerminalLoadState = LoadedState | FailedState

export type LoadStatus = "idle" | LoadState["status"]

export function isTerminal(state: LoadState): state is TerminalLoadState {
  return state.status !== "loading"
}

import type { LoadState, LoadStatus } from "../model/load-state"

export type LoadObserver = (state: LoadState) => void

export interface LoadHandle {
  readonly key: string
  readonly status: LoadStatus

  /**
   * Stops notifications to this observer. Other observers of the same key
   * are unaffected. Calling it again is a no-op.
   */
  detach(): void
}

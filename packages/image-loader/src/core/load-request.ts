import type { LoadState, LoadStatus } from "../model/load-state"
import type { LoadHandle, LoadObserver } from "../ports/load-observer"

export type LoadRequestHooks = {
  onDetach(request: LoadRequest): void
  onObserverError(err: unknown, state: LoadState): void
}

/**
 * One caller's interest in a key. Moves `idle → loading → loaded | failed`
 * and never leaves a terminal status.
 */
export class LoadRequest implements LoadHandle {
  private current: LoadStatus = "idle"
  private attached = true

  constructor(
    readonly key: string,
    private readonly observer: LoadObserver,
    private readonly hooks: LoadRequestHooks,
  ) {}

  get status(): LoadStatus {
    return this.current
  }

  get isAttached(): boolean {
    return this.attached
  }

  get isSettled(): boolean {
    return this.current === "loaded" || this.current === "failed"
  }

  publish(state: LoadState): void {
    if (!this.attached || this.isSettled) return

    this.current = state.status

    try {
      this.observer(state)
    } catch (err) {
      this.hooks.onObserverError(err, state)
    }
  }

  detach(): void {
    if (!this.attached) return

    this.attached = false

    if (!this.isSettled) this.hooks.onDetach(this)
  }
}

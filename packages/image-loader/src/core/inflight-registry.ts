import type { CacheKey, Milliseconds } from "@picfetch/cache"
import type { LoadRequest } from "./load-request"

export type Flight = {
  readonly id: string
  readonly key: CacheKey
  readonly startedAtMs: Milliseconds
  readonly controller: AbortController
  readonly requests: Set<LoadRequest>
}

/**
 * At most one flight per key. A flight leaves the registry when it settles,
 * so a later load of the same key starts a fresh fetch.
 */
export class InFlightRegistry {
  private readonly flights = new Map<CacheKey, Flight>()
  private sequence = 0

  get size(): number {
    return this.flights.size
  }

  get(key: CacheKey): Flight | undefined {
    return this.flights.get(key)
  }

  begin(key: CacheKey, request: LoadRequest, startedAtMs: Milliseconds): Flight {
    const flight: Flight = {
      id: `${key}#${++this.sequence}`,
      key,
      startedAtMs,
      controller: new AbortController(),
      requests: new Set([request]),
    }

    this.flights.set(key, flight)

    return flight
  }

  join(flight: Flight, request: LoadRequest): void {
    flight.requests.add(request)
  }

  /**
   * Removes `request` from its flight. Returns the flight when the request
   * belonged to one.
   */
  leave(request: LoadRequest): Flight | undefined {
    const flight = this.flights.get(request.key)

    if (!flight?.requests.delete(request)) return undefined

    return flight
  }

  /**
   * Removes the flight so the next load of its key starts a new one.
   */
  retire(flight: Flight): void {
    if (this.flights.get(flight.key) === flight) this.flights.delete(flight.key)
  }

  /**
   * Retires the flight and returns the requests still attached to it.
   */
  settle(flight: Flight): LoadRequest[] {
    this.retire(flight)

    return [...flight.requests].filter((request) => request.isAttached)
  }
}

export type InFlightKey = string

/**
 * - "leader": this caller ran the work
 * - "inflight": this caller joined work another caller started
 */
export type FlightSource = "leader" | "inflight"

export interface FlightResult<T> {
  value: T

  /** Whether this caller ran the work */
  isLeader: boolean

  /** Callers that joined the flight, excluding the leader */
  sharedWith: number

  source: FlightSource
}

/**
 * Deduplicates concurrent async work by key.
 *
 * While a flight for a key is pending, further `run` calls for that key join
 * it instead of starting their own, and settle with the same value or the
 * same rejection. Nothing is remembered once the flight settles.
 *
 * @example
 * ```ts
 * const auth = new MemorySingleflight<AccessToken>()
 *
 * // one login request no matter how many callers arrive together
 * const [a, b] = await Promise.all([
 *   auth.run("token", () => login()),
 *   auth.run("token", () => login()),
 * ])
 * a.value === b.value // true
 * ```
 */
export interface Singleflight<T> {
  run(key: InFlightKey, fn: () => Promise<T>): Promise<FlightResult<T>>

  /**
   * Detach the pending flight for `key`. Callers already waiting on it still
   * get its outcome; the next `run` starts a new flight.
   */
  forget(key: InFlightKey): void

  /** Number of pending flights. */
  readonly size: number
}

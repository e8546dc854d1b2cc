import type { Milliseconds } from "./time"

/**
 * Source of wall-clock time.
 *
 * Everything that expires (tokens, cached secrets) reads time through a Clock
 * so tests can move time forward without waiting.
 */
export interface Clock {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds
}

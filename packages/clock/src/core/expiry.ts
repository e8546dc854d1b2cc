import type { Clock } from "../ports/clock"
import { type Milliseconds, type Seconds, secondsToMs } from "../ports/time"

export type Expiring<T> = Readonly<{
  value: T
  expiresAtMs: Milliseconds
}>

/** Wraps `value` so it expires `ttl` seconds from now. */
export function expiresIn<T>(clock: Clock, value: T, ttl: Seconds): Expiring<T> {
  return { value, expiresAtMs: clock.nowMs() + secondsToMs(ttl) }
}

/** Strictly before expiry; an entry is stale at the exact expiry instant. */
export function isLive<T>(clock: Clock, entry: Expiring<T> | null): entry is Expiring<T> {
  return entry !== null && clock.nowMs() < entry.expiresAtMs
}

import type { Clock } from "../ports/clock"
import { type Milliseconds, type Seconds, secondsToMs } from "../ports/time"

/** Manually driven clock. Time only moves when a test moves it. */
export class FakeClock implements Clock {
  private time: Milliseconds

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  advanceSeconds(seconds: Seconds): void {
    this.advance(secondsToMs(seconds))
  }

  set(ms: Milliseconds): void {
    this.time = ms
  }
}

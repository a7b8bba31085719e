import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/**
 * Manually driven clock. `sleep()` never waits: it records the requested
 * delay and moves time forward by it.
 */
export class FakeClock implements Clock {
  private time: Milliseconds
  private readonly recorded: Milliseconds[] = []

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

  set(ms: Milliseconds): void {
    this.time = ms
  }

  /** Delays passed to `sleep()` so far, in call order. */
  sleeps(): Milliseconds[] {
    return [...this.recorded]
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return

    this.recorded.push(ms)
    this.advance(ms)
  }
}

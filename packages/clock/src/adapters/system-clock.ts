import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/** Wall-clock time and real timers. */
export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): Milliseconds {
    return Date.now()
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const settle = () => {
        clearTimeout(timer)
        signal?.removeEventListener("abort", settle)
        resolve()
      }

      const timer = setTimeout(settle, ms)
      signal?.addEventListener("abort", settle, { once: true })
    })
  }
}

import type { Milliseconds } from "./time"

export type TimeSource = {
  /** Current time as a Date; prefer `nowMs()` for arithmetic. */
  now(): Date

  /** Milliseconds since Unix epoch. */
  nowMs(): Milliseconds
}

export interface Sleeper {
  /** Delay for `ms` milliseconds. Resolves early if `signal` is aborted. */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper

/**
 * Counters the service attaches to each generation response.
 * Absent when the service leaves them out.
 */
export type UsageCounters = {
  bitsUsed?: number
  bitsLeft?: number
  requestsLeft?: number
  /** How long the service asks clients to wait before the next request. */
  advisoryDelayMs?: number
}

export type GenerationResult<T> = {
  data: T
  completionTime?: Date
  usage: UsageCounters
}

export type UsageStatus = "running" | "stopped" | "paused" | (string & {})

export type UsageSnapshot = {
  status?: UsageStatus
  creationTime?: Date
  bitsLeft: number
  requestsLeft: number
  totalBits?: number
  totalRequests?: number
}

/** Last quota counters seen on any response, kept by the client between calls. */
export type QuotaSnapshot = {
  bitsLeft?: number
  requestsLeft?: number
  observedAt: Date
}

import type { IdGenerator } from "../ports/id-generator"

/**
 * Monotonic integer ids, `start`, `start + 1`, ... Each call returns an
 * independent counter.
 */
export const sequence = (start = 1): IdGenerator<number> => {
  let next = start
  return { generate: () => next++ }
}

import type {
  DecimalFractionParams,
  IntegerBase,
  IntegerParams,
  IntegerSequenceParams,
  StringParams,
} from "../../ports/methods"
import { perSequence } from "../validation/validate-params"

/**
 * Post-conditions on generated data. Each function returns the problems
 * found; an empty list means the data matches what was asked for.
 */

function checkCount(problems: string[], label: string, actual: number, expected: number) {
  if (actual !== expected) {
    problems.push(`expected ${expected} ${label}, got ${actual}`)
  }
}

function decodeInteger(value: number | string, base: IntegerBase): number | undefined {
  if (typeof value === "number") return base === 10 ? value : undefined

  const digits = base === 16 ? /^-?[0-9a-f]+$/i : base === 8 ? /^-?[0-7]+$/ : /^-?[01]+$/
  if (base === 10 || !digits.test(value)) return undefined
  return Number.parseInt(value, base)
}

function checkIntegers(
  problems: string[],
  label: string,
  values: readonly (number | string)[],
  bounds: { min: number; max: number; base: IntegerBase; replacement: boolean },
) {
  const seen = new Set<number>()

  for (const value of values) {
    const decoded = decodeInteger(value, bounds.base)

    if (decoded === undefined) {
      problems.push(`${label} value ${String(value)} is not a base-${bounds.base} integer`)
    } else if (decoded < bounds.min || decoded > bounds.max) {
      problems.push(`${label} value ${decoded} is outside [${bounds.min}, ${bounds.max}]`)
    } else if (!bounds.replacement && seen.has(decoded)) {
      problems.push(`${label} value ${decoded} repeats although replacement is off`)
    }

    if (decoded !== undefined) seen.add(decoded)
  }
}

export function checkIntegersResult(
  params: IntegerParams,
  data: readonly (number | string)[],
): string[] {
  const problems: string[] = []

  checkCount(problems, "integers", data.length, params.n)
  checkIntegers(problems, "integer", data, {
    min: params.min,
    max: params.max,
    base: params.base ?? 10,
    replacement: params.replacement ?? true,
  })

  return problems
}

export function checkIntegerSequencesResult(
  params: IntegerSequenceParams,
  data: readonly (readonly (number | string)[])[],
): string[] {
  const problems: string[] = []

  checkCount(problems, "sequences", data.length, params.n)
  if (problems.length > 0) return problems

  const lengths = perSequence(params.length, params.n)
  const mins = perSequence(params.min, params.n)
  const maxes = perSequence(params.max, params.n)
  const replacements = perSequence(params.replacement ?? true, params.n)
  const bases = perSequence<IntegerBase>(params.base ?? 10, params.n)

  data.forEach((sequence, i) => {
    checkCount(problems, `values in sequence ${i}`, sequence.length, lengths[i] ?? 0)
    checkIntegers(problems, `sequence ${i}`, sequence, {
      min: mins[i] ?? 0,
      max: maxes[i] ?? 0,
      base: bases[i] ?? 10,
      replacement: replacements[i] ?? true,
    })
  })

  return problems
}

function checkRepeats<T>(
  problems: string[],
  label: string,
  values: readonly T[],
  format: (value: T) => string,
) {
  const seen = new Set<T>()

  for (const value of values) {
    if (seen.has(value)) {
      problems.push(`${label} ${format(value)} repeats although replacement is off`)
    }
    seen.add(value)
  }
}

export function checkFractionsResult(
  params: DecimalFractionParams,
  data: readonly number[],
): string[] {
  const problems: string[] = []

  checkCount(problems, "fractions", data.length, params.n)
  for (const value of data) {
    if (value < 0 || value >= 1) problems.push(`fraction ${value} is outside [0, 1)`)
  }
  if (params.replacement === false) checkRepeats(problems, "fraction", data, String)

  return problems
}

export function checkStringsResult(params: StringParams, data: readonly string[]): string[] {
  const problems: string[] = []
  const alphabet = new Set(params.characters)

  checkCount(problems, "strings", data.length, params.n)
  for (const value of data) {
    const chars = [...value]

    if (chars.length !== params.length) {
      problems.push(`string "${value}" has length ${chars.length}, expected ${params.length}`)
    } else if (!chars.every((c) => alphabet.has(c))) {
      problems.push(`string "${value}" uses characters outside the requested set`)
    }
  }
  if (params.replacement === false) checkRepeats(problems, "string", data, (v) => `"${v}"`)

  return problems
}

export function checkCountResult(label: string, n: number, data: readonly unknown[]): string[] {
  const problems: string[] = []

  checkCount(problems, label, data.length, n)

  return problems
}

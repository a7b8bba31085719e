import type {
  BlobParams,
  DecimalFractionParams,
  GaussianParams,
  IntegerBase,
  IntegerParams,
  IntegerSequenceParams,
  RpcMethod,
  StringParams,
  UuidParams,
} from "../../ports/methods"
import { ValidationError } from "../errors"

/**
 * Documented Basic API limits.
 * @see {@link https://api.random.org/json-rpc/4/basic | Basic API}
 */
export const limits = {
  maxCount: 10_000,
  integerBound: 1_000_000_000,
  maxSequenceLength: 10_000,
  maxSequenceTotal: 10_000,
  minDecimalPlaces: 1,
  maxDecimalPlaces: 14,
  gaussianBound: 1_000_000,
  minSignificantDigits: 2,
  maxSignificantDigits: 14,
  maxStringLength: 32,
  maxCharacters: 128,
  maxUuids: 1000,
  maxBlobs: 100,
  maxBlobBits: 1_048_576,
} as const

const integerBases: readonly IntegerBase[] = [2, 8, 10, 16]

type Issues = string[]

function checkInteger(issues: Issues, name: string, value: number, min: number, max: number) {
  if (!Number.isSafeInteger(value)) {
    issues.push(`${name} must be an integer, got ${value}`)
  } else if (value < min || value > max) {
    issues.push(`${name} must be within [${min}, ${max}], got ${value}`)
  }
}

function checkNumber(issues: Issues, name: string, value: number, min: number, max: number) {
  if (!Number.isFinite(value)) {
    issues.push(`${name} must be a finite number, got ${value}`)
  } else if (value < min || value > max) {
    issues.push(`${name} must be within [${min}, ${max}], got ${value}`)
  }
}

function checkBase(issues: Issues, name: string, base: number) {
  if (!integerBases.some((b) => b === base)) {
    issues.push(`${name} must be one of ${integerBases.join(", ")}, got ${base}`)
  }
}

function failOn(method: RpcMethod, issues: Issues): void {
  if (issues.length > 0) throw new ValidationError(method, issues)
}

/**
 * Spreads a per-sequence field to one entry per sequence. Arrays must
 * already have length `n`.
 */
export function perSequence<T>(value: T | T[], n: number): T[] {
  return Array.isArray(value) ? value : Array.from({ length: n }, () => value)
}

function checkPerSequence<T>(issues: Issues, name: string, value: T | T[], n: number) {
  if (Array.isArray(value) && value.length !== n) {
    issues.push(`${name} must have one entry per sequence (${n}), got ${value.length}`)
    return false
  }
  return true
}

export function validateIntegers(params: IntegerParams): void {
  const issues: Issues = []
  const { n, min, max } = params

  checkInteger(issues, "n", n, 1, limits.maxCount)
  checkInteger(issues, "min", min, -limits.integerBound, limits.integerBound)
  checkInteger(issues, "max", max, -limits.integerBound, limits.integerBound)
  if (params.base !== undefined) checkBase(issues, "base", params.base)

  if (issues.length === 0) {
    if (min > max) {
      issues.push(`min (${min}) must not exceed max (${max})`)
    } else if (params.replacement === false && n > max - min + 1) {
      issues.push(`cannot draw ${n} distinct integers from [${min}, ${max}]`)
    }
  }

  failOn("generateIntegers", issues)
}

export function validateIntegerSequences(params: IntegerSequenceParams): void {
  const issues: Issues = []
  const { n } = params

  checkInteger(issues, "n", n, 1, limits.maxCount)
  failOn("generateIntegerSequences", issues)

  const shaped = [
    checkPerSequence(issues, "length", params.length, n),
    checkPerSequence(issues, "min", params.min, n),
    checkPerSequence(issues, "max", params.max, n),
    params.replacement === undefined ||
      checkPerSequence(issues, "replacement", params.replacement, n),
    params.base === undefined || checkPerSequence(issues, "base", params.base, n),
  ].every(Boolean)

  if (shaped) {
    const lengths = perSequence(params.length, n)
    const mins = perSequence(params.min, n)
    const maxes = perSequence(params.max, n)
    const replacements = perSequence(params.replacement ?? true, n)
    const bases = params.base === undefined ? [] : perSequence(params.base, n)

    let total = 0
    for (let i = 0; i < n; i++) {
      const before = issues.length
      const length = lengths[i] ?? 0
      const min = mins[i] ?? 0
      const max = maxes[i] ?? 0

      checkInteger(issues, `length[${i}]`, length, 1, limits.maxSequenceLength)
      checkInteger(issues, `min[${i}]`, min, -limits.integerBound, limits.integerBound)
      checkInteger(issues, `max[${i}]`, max, -limits.integerBound, limits.integerBound)
      const base = bases[i]
      if (base !== undefined) checkBase(issues, `base[${i}]`, base)

      if (issues.length === before) {
        total += length
        if (min > max) {
          issues.push(`min[${i}] (${min}) must not exceed max[${i}] (${max})`)
        } else if (replacements[i] === false && length > max - min + 1) {
          issues.push(`sequence ${i} cannot hold ${length} distinct integers from [${min}, ${max}]`)
        }
      }
    }

    if (total > limits.maxSequenceTotal) {
      issues.push(`sequences may hold at most ${limits.maxSequenceTotal} integers in total, got ${total}`)
    }
  }

  failOn("generateIntegerSequences", issues)
}

export function validateDecimalFractions(params: DecimalFractionParams): void {
  const issues: Issues = []

  checkInteger(issues, "n", params.n, 1, limits.maxCount)
  checkInteger(
    issues,
    "decimalPlaces",
    params.decimalPlaces,
    limits.minDecimalPlaces,
    limits.maxDecimalPlaces,
  )

  if (
    issues.length === 0 &&
    params.replacement === false &&
    params.n > 10 ** params.decimalPlaces
  ) {
    issues.push(
      `cannot draw ${params.n} distinct fractions with ${params.decimalPlaces} decimal places`,
    )
  }

  failOn("generateDecimalFractions", issues)
}

export function validateGaussians(params: GaussianParams): void {
  const issues: Issues = []

  checkInteger(issues, "n", params.n, 1, limits.maxCount)
  checkNumber(issues, "mean", params.mean, -limits.gaussianBound, limits.gaussianBound)
  checkNumber(
    issues,
    "standardDeviation",
    params.standardDeviation,
    -limits.gaussianBound,
    limits.gaussianBound,
  )
  checkInteger(
    issues,
    "significantDigits",
    params.significantDigits,
    limits.minSignificantDigits,
    limits.maxSignificantDigits,
  )

  failOn("generateGaussians", issues)
}

export function validateStrings(params: StringParams): void {
  const issues: Issues = []
  const alphabet = [...params.characters]

  checkInteger(issues, "n", params.n, 1, limits.maxCount)
  checkInteger(issues, "length", params.length, 1, limits.maxStringLength)

  if (alphabet.length < 1 || alphabet.length > limits.maxCharacters) {
    issues.push(
      `characters must hold 1 to ${limits.maxCharacters} characters, got ${alphabet.length}`,
    )
  }

  if (
    issues.length === 0 &&
    params.replacement === false &&
    params.n > alphabet.length ** params.length
  ) {
    issues.push(
      `cannot draw ${params.n} distinct strings of length ${params.length} from ${alphabet.length} characters`,
    )
  }

  failOn("generateStrings", issues)
}

export function validateUuids(params: UuidParams): void {
  const issues: Issues = []

  checkInteger(issues, "n", params.n, 1, limits.maxUuids)

  failOn("generateUUIDs", issues)
}

export function validateBlobs(params: BlobParams): void {
  const issues: Issues = []

  checkInteger(issues, "n", params.n, 1, limits.maxBlobs)
  checkInteger(issues, "size", params.size, 1, limits.maxBlobBits)

  if (params.format !== undefined && params.format !== "base64" && params.format !== "hex") {
    issues.push(`format must be "base64" or "hex", got ${String(params.format)}`)
  }

  if (issues.length === 0) {
    if (params.size % 8 !== 0) {
      issues.push(`size must be a multiple of 8 bits, got ${params.size}`)
    } else if (params.n * params.size > limits.maxBlobBits) {
      issues.push(
        `blobs may total at most ${limits.maxBlobBits} bits, got ${params.n * params.size}`,
      )
    }
  }

  failOn("generateBlobs", issues)
}

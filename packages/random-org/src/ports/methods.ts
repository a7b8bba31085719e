/**
 * Operations of the RANDOM.ORG JSON-RPC Basic API (release 4).
 * @see {@link https://api.random.org/json-rpc/4/basic | Basic API}
 */
export const rpcMethods = [
  "generateIntegers",
  "generateIntegerSequences",
  "generateDecimalFractions",
  "generateGaussians",
  "generateStrings",
  "generateUUIDs",
  "generateBlobs",
  "getUsage",
] as const

export type RpcMethod = (typeof rpcMethods)[number]

export type RequestId = string | number

export type IntegerBase = 2 | 8 | 10 | 16
export type BlobFormat = "base64" | "hex"

export type IntegerParams = {
  /** How many integers, 1..10000 */
  n: number
  /** Lower bound, inclusive, -1e9..1e9 */
  min: number
  /** Upper bound, inclusive, -1e9..1e9 */
  max: number
  /** `false` draws without repeats. @default true */
  replacement?: boolean
  /** Encoding of the returned values. Anything but 10 returns strings. @default 10 */
  base?: IntegerBase
}

export type DecimalIntegerParams = Omit<IntegerParams, "base"> & { base?: 10 }
export type EncodedIntegerParams = Omit<IntegerParams, "base"> & { base: 2 | 8 | 16 }

/**
 * Every field except `n` is either one value for all sequences or an array
 * with one entry per sequence.
 */
export type IntegerSequenceParams = {
  n: number
  length: number | number[]
  min: number | number[]
  max: number | number[]
  replacement?: boolean | boolean[]
  base?: IntegerBase | IntegerBase[]
}

export type DecimalIntegerSequenceParams = Omit<IntegerSequenceParams, "base"> & {
  base?: 10
}

export type DecimalFractionParams = {
  n: number
  /** 1..14 */
  decimalPlaces: number
  replacement?: boolean
}

export type GaussianParams = {
  n: number
  /** -1e6..1e6 */
  mean: number
  /** -1e6..1e6 */
  standardDeviation: number
  /** 2..14 */
  significantDigits: number
}

export type StringParams = {
  n: number
  /** Length of each string, 1..32 */
  length: number
  /** Alphabet to draw from, 1..128 characters */
  characters: string
  replacement?: boolean
}

export type UuidParams = {
  /** 1..1000 */
  n: number
}

export type BlobParams = {
  /** 1..100 */
  n: number
  /** Size of each blob in bits, a multiple of 8, 1..1048576 */
  size: number
  /** Wire encoding; results are always decoded to bytes. @default "base64" */
  format?: BlobFormat
}

export type CallOptions = {
  /** JSON-RPC id for this call; defaults to the client's id generator. */
  id?: RequestId
  signal?: AbortSignal
}

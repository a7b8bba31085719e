import { z } from "zod"

/** Parses the service's "2011-10-10 13:19:12Z" timestamps. */
export function parseServiceTime(value: string): Date | undefined {
  const date = new Date(value.includes("T") ? value : value.replace(" ", "T"))
  return Number.isNaN(date.getTime()) ? undefined : date
}

const serviceTime = z.string().transform((value, ctx) => {
  const date = parseServiceTime(value)
  if (date) return date

  ctx.issues.push({ code: "custom", message: "invalid timestamp", input: value })
  return z.NEVER
})

const counters = {
  bitsUsed: z.number().int().nonnegative().optional(),
  bitsLeft: z.number().int().optional(),
  requestsLeft: z.number().int().optional(),
  advisoryDelay: z.number().nonnegative().optional(),
}

export type WireCounters = {
  bitsUsed?: number
  bitsLeft?: number
  requestsLeft?: number
  advisoryDelay?: number
}

function generation<T extends z.ZodType>(data: T) {
  return z.object({
    random: z.object({
      data,
      completionTime: serviceTime.optional(),
    }),
    ...counters,
  })
}

export const decimalIntegersResult = generation(z.array(z.number().int()))
export const encodedIntegersResult = generation(z.array(z.string()))
export const integerSequencesResult = generation(
  z.array(z.array(z.union([z.number().int(), z.string()]))),
)
export const numbersResult = generation(z.array(z.number()))
export const stringsResult = generation(z.array(z.string()))
export const uuidsResult = generation(z.array(z.guid()))

export const usageResult = z.object({
  status: z.string().optional(),
  creationTime: serviceTime.optional(),
  bitsLeft: z.number().int(),
  requestsLeft: z.number().int(),
  totalBits: z.number().int().optional(),
  totalRequests: z.number().int().optional(),
})

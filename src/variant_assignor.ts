import { z } from 'zod'
import { serializeContext } from './context.ts'
import { crc32 } from './hashing.ts'
import { EmptyVariantWeightsError, InvalidVariantWeightsError } from './errors.ts'
import type { ContextInput, VariantWeights } from './types.ts'

const weightsSchema = z.array(z.tuple([z.string().min(1), z.number().int().nonnegative()]))

export function weightEntries(weights: VariantWeights): Array<[string, number]> {
  return weights instanceof Map ? [...weights.entries()] : Object.entries(weights)
}

/**
 * Reject weight tables that are malformed or do not sum to exactly 100.
 * Returns the entries in declaration order.
 */
export function assertValidWeights(feature: string, weights: VariantWeights): Array<[string, number]> {
  const parsed = weightsSchema.safeParse(weightEntries(weights))
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new InvalidVariantWeightsError(
      `Variant weights for "${feature}" are invalid: ${issue?.message ?? 'malformed'}.`
    )
  }

  const total = parsed.data.reduce((sum, [, weight]) => sum + weight, 0)
  if (total !== 100) throw InvalidVariantWeightsError.mustSumTo100(feature, total)

  return parsed.data
}

/**
 * Deterministically pick a variant for `(feature, context)`.
 *
 * The bucket is `|crc32("{feature}|{context}")| % 100`; the first variant whose
 * cumulative weight exceeds it wins. Tables that sum below 100 fall back to the
 * last declared variant, so the function never fails on a non-empty table.
 */
export function calculateVariant(
  feature: string,
  context: ContextInput,
  weights: VariantWeights
): string {
  const entries = weightEntries(weights)
  const last = entries[entries.length - 1]
  if (!last) throw new EmptyVariantWeightsError(feature)

  const bucket = variantBucket(feature, context)

  let cumulative = 0
  for (const [variant, weight] of entries) {
    cumulative += weight
    if (bucket < cumulative) return variant
  }

  return last[0]
}

export function variantBucket(feature: string, context: ContextInput): number {
  return Math.abs(crc32(`${feature}|${serializeContext(context)}`)) % 100
}

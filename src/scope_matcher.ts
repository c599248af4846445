import { found, MISSING } from './types.ts'
import type FeatureScope from './feature_scope.ts'
import type { Lookup, ScopeRecord } from './types.ts'

/**
 * Pick the scoped record that applies to a context scope.
 *
 * A record applies when its kind equals the context's and each of its non-null
 * dimensions equals the context's value. Among matches the record with the
 * fewest wildcards wins, then the one with the most pinned dimensions, then the
 * most recently written. `records` must be ordered oldest write first.
 */
export function resolveScopedValue(records: readonly ScopeRecord[], scope: FeatureScope): Lookup {
  let best: ScopeRecord | undefined

  for (const record of records) {
    if (!scope.matches(record.scope)) continue
    if (!best || outranksOrTies(record, best)) best = record
  }

  return best ? found(best.value) : MISSING
}

function outranksOrTies(candidate: ScopeRecord, current: ScopeRecord): boolean {
  const wildcards = candidate.scope.wildcards() - current.scope.wildcards()
  if (wildcards !== 0) return wildcards < 0

  const pinned =
    Object.keys(candidate.scope.definedConstraints()).length -
    Object.keys(current.scope.definedConstraints()).length
  if (pinned !== 0) return pinned > 0

  return candidate.updatedAt.getTime() >= current.updatedAt.getTime()
}

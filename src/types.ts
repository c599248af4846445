import type FlagContext from './context.ts'
import type FeatureScope from './feature_scope.ts'

// ── Context ──────────────────────────────────────────────────────────────

export type ContextId = string | number

/** Scalars serialize to their string cast. */
export type ScalarContext = string | number | boolean | bigint

/** Anything `resolveContext()` accepts. */
export type ContextInput = FlagContext | Contextable | Identifiable | ScalarContext | object | null | undefined

/** An object that knows how to describe itself as a flag context. */
export interface Contextable {
  toFlagContext(): FlagContext
}

/** Any object with an id. The type defaults to `constructor.name`. */
export interface Identifiable {
  id: ContextId
  contextType?: () => string
  contextScope?: () => FeatureScope | null
}

/** Serialized context string, e.g. 'User|42', '__global__'. */
export type ContextKey = string

/** The sentinel used for the null context and for values that apply to everyone. */
export const GLOBAL_CONTEXT = '__global__'

/** Context keys starting with this hold group-level values, not entity values. */
export const GROUP_CONTEXT_PREFIX = '__group__|'

// ── Values ───────────────────────────────────────────────────────────────

export type FeatureValue =
  | boolean
  | string
  | number
  | null
  | { [key: string]: unknown }
  | unknown[]

/** Insertion order decides bucket boundaries. */
export type VariantWeights = Record<string, number> | Map<string, number>

/** A lookup result that keeps "nothing found" apart from a stored falsy value. */
export type Lookup<T = unknown> = { found: true; value: T } | { found: false }

export const MISSING: Lookup<never> = { found: false }

export function found<T>(value: T): Lookup<T> {
  return { found: true, value }
}

/** `false`, `null` and `undefined` are the off-states; everything else is on. */
export function isActiveValue(value: unknown): boolean {
  return value !== false && value !== null && value !== undefined
}

// ── Stored values ────────────────────────────────────────────────────────

export interface StoredFeature {
  feature: string
  context: ContextKey
  value: unknown
  createdAt: Date
  updatedAt: Date
}

export interface ScopeRecord {
  feature: string
  scope: FeatureScope
  value: unknown
  updatedAt: Date
}

// ── Events ───────────────────────────────────────────────────────────────

export interface FlagEventMap {
  'flag:resolved': { feature: string; context: ContextKey; value: unknown }
  'flag:activated': { feature: string; context: ContextKey; value: unknown }
  'flag:deactivated': { feature: string; context: ContextKey; oldValue: unknown }
  'flag:purged': { features: string[] | null }
  'flag:unknown': { feature: string; context: ContextKey }
  'flag:circular': { feature: string; dependency: string; context: ContextKey }
}

export type FlagEvent = keyof FlagEventMap

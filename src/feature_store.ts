import type FeatureScope from './feature_scope.ts'
import type { ContextKey, ScopeRecord, StoredFeature } from './types.ts'

/** Contract that every feature flag storage driver must implement. */
export interface FeatureStore {
  readonly name: string

  /** Retrieve the stored value. Returns `undefined` if not yet resolved. */
  get(feature: string, context: ContextKey): Promise<unknown | undefined>

  /** Store a resolved value (upsert). */
  set(feature: string, context: ContextKey, value: unknown): Promise<void>

  /**
   * Rewrite every stored value of the feature and record `value` under the
   * global sentinel, which applies to contexts with no value of their own.
   * Group-level values (`__group__|<name>` contexts) are left as they are.
   */
  setForAllContexts(feature: string, value: unknown): Promise<void>

  /** Remove the stored value for a feature+context pair. */
  forget(feature: string, context: ContextKey): Promise<void>

  /** Remove ALL stored values (and scoped records) for a feature. */
  purge(feature: string): Promise<void>

  /** Remove all stored values for all features. */
  purgeAll(): Promise<void>

  /** List all distinct feature names that have stored values. */
  featureNames(): Promise<string[]>

  /** List all stored records for a feature. */
  allFor(feature: string): Promise<StoredFeature[]>

  /** Upsert a scoped activation; a rewrite becomes the most recent record. */
  setScoped(feature: string, scope: FeatureScope, value: unknown): Promise<void>

  /** Scoped records for a feature, oldest write first. */
  scopedFor(feature: string): Promise<ScopeRecord[]>

  forgetScoped(feature: string, scope: FeatureScope): Promise<void>
}

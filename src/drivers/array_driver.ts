import type FeatureScope from '../feature_scope.ts'
import type { FeatureStore } from '../feature_store.ts'
import { GLOBAL_CONTEXT, GROUP_CONTEXT_PREFIX } from '../types.ts'
import type { ContextKey, ScopeRecord, StoredFeature } from '../types.ts'

/** In-memory feature store for testing. */
export class ArrayDriver implements FeatureStore {
  readonly name = 'array'
  private data = new Map<string, { value: unknown; createdAt: Date; updatedAt: Date }>()
  private scoped = new Map<string, ScopeRecord[]>()

  private key(feature: string, context: ContextKey): string {
    return `${feature}\0${context}`
  }

  async get(feature: string, context: ContextKey): Promise<unknown | undefined> {
    return this.data.get(this.key(feature, context))?.value
  }

  async set(feature: string, context: ContextKey, value: unknown): Promise<void> {
    const existing = this.data.get(this.key(feature, context))
    const now = new Date()
    this.data.set(this.key(feature, context), {
      value,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    })
  }

  async setForAllContexts(feature: string, value: unknown): Promise<void> {
    const now = new Date()
    for (const [key, entry] of this.data) {
      if (!key.startsWith(`${feature}\0`)) continue
      if (splitKey(key).context.startsWith(GROUP_CONTEXT_PREFIX)) continue
      this.data.set(key, { ...entry, value, updatedAt: now })
    }
    await this.set(feature, GLOBAL_CONTEXT, value)
  }

  async forget(feature: string, context: ContextKey): Promise<void> {
    this.data.delete(this.key(feature, context))
  }

  async purge(feature: string): Promise<void> {
    for (const key of this.data.keys()) {
      if (key.startsWith(`${feature}\0`)) this.data.delete(key)
    }
    this.scoped.delete(feature)
  }

  async purgeAll(): Promise<void> {
    this.data.clear()
    this.scoped.clear()
  }

  async featureNames(): Promise<string[]> {
    const names = new Set<string>()
    for (const key of this.data.keys()) {
      names.add(splitKey(key).feature)
    }
    for (const [feature, records] of this.scoped) {
      if (records.length > 0) names.add(feature)
    }
    return [...names]
  }

  async allFor(feature: string): Promise<StoredFeature[]> {
    const results: StoredFeature[] = []
    for (const [key, entry] of this.data) {
      if (key.startsWith(`${feature}\0`)) {
        results.push({
          feature,
          context: splitKey(key).context,
          value: entry.value,
          createdAt: entry.createdAt,
          updatedAt: entry.updatedAt,
        })
      }
    }
    return results
  }

  async setScoped(feature: string, scope: FeatureScope, value: unknown): Promise<void> {
    const records = this.withoutScope(feature, scope)
    records.push({ feature, scope, value, updatedAt: new Date() })
    this.scoped.set(feature, records)
  }

  async scopedFor(feature: string): Promise<ScopeRecord[]> {
    return [...(this.scoped.get(feature) ?? [])]
  }

  async forgetScoped(feature: string, scope: FeatureScope): Promise<void> {
    this.scoped.set(feature, this.withoutScope(feature, scope))
  }

  private withoutScope(feature: string, scope: FeatureScope): ScopeRecord[] {
    const identity = scope.toKey()
    return (this.scoped.get(feature) ?? []).filter(r => r.scope.toKey() !== identity)
  }
}

function splitKey(key: string): { feature: string; context: ContextKey } {
  const index = key.indexOf('\0')
  return { feature: key.slice(0, index), context: key.slice(index + 1) }
}

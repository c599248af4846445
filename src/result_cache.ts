import { found, MISSING } from './types.ts'
import type { ContextKey, Lookup } from './types.ts'

export interface CacheEntry {
  feature: string
  context: ContextKey
  globalContext: ContextKey
  value: unknown
}

/**
 * Resolved values for one unit of work, in insertion order.
 *
 * Lookups scan linearly; working sets are one request or job wide and the
 * manager flushes between them.
 */
export default class ResultCache {
  private entries: CacheEntry[] = []

  get size(): number {
    return this.entries.length
  }

  lookup(feature: string, context: ContextKey, globalContext: ContextKey): Lookup {
    const entry = this.entries.find(
      e => e.feature === feature && e.context === context && e.globalContext === globalContext
    )
    return entry ? found(entry.value) : MISSING
  }

  /** Update in place (keeping position) or append. */
  put(feature: string, context: ContextKey, globalContext: ContextKey, value: unknown): void {
    const entry = this.entries.find(
      e => e.feature === feature && e.context === context && e.globalContext === globalContext
    )
    if (entry) {
      entry.value = value
    } else {
      this.entries.push({ feature, context, globalContext, value })
    }
  }

  /** Drop the entries of `features` for one context (every global context). */
  forget(features: Iterable<string>, context: ContextKey): void {
    const names = new Set(features)
    this.entries = this.entries.filter(e => !(names.has(e.feature) && e.context === context))
  }

  forgetFeatures(features: Iterable<string>): void {
    const names = new Set(features)
    this.entries = this.entries.filter(e => !names.has(e.feature))
  }

  forgetContext(context: ContextKey): void {
    this.entries = this.entries.filter(e => e.context !== context)
  }

  flush(): void {
    this.entries = []
  }

  all(): readonly CacheEntry[] {
    return this.entries
  }
}

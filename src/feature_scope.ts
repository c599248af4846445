export type ScopeValue = string | number | boolean | null

export type ScopeConstraints = Readonly<Record<string, ScopeValue>>

/**
 * A hierarchical scope map, e.g. `{ company: 3, org: 2, team: null }`.
 *
 * On a context it describes where the entity sits. On a stored record a `null`
 * dimension is a wildcard that matches any value the context carries.
 */
export default class FeatureScope {
  constructor(
    readonly kind: string,
    readonly constraints: ScopeConstraints
  ) {}

  static fromJSON(data: { kind: string; scopes: ScopeConstraints }): FeatureScope {
    return new FeatureScope(data.kind, data.scopes)
  }

  /** The non-wildcard dimensions. */
  definedConstraints(): Record<string, Exclude<ScopeValue, null>> {
    const defined: Record<string, Exclude<ScopeValue, null>> = {}
    for (const [key, value] of Object.entries(this.constraints)) {
      if (value !== null) defined[key] = value
    }
    return defined
  }

  wildcards(): number {
    return Object.values(this.constraints).filter(value => value === null).length
  }

  /**
   * Whether `record` applies to this (context) scope: same kind, and every
   * non-null dimension of the record is present here with the same value.
   */
  matches(record: FeatureScope): boolean {
    if (this.kind !== record.kind) return false

    for (const [key, value] of Object.entries(record.definedConstraints())) {
      if (!Object.hasOwn(this.constraints, key)) return false
      if (this.constraints[key] !== value) return false
    }
    return true
  }

  /** Stable identity: kind plus dimensions sorted by name. */
  toKey(): string {
    const parts = Object.keys(this.constraints)
      .sort()
      .map(key => `${key}=${String(this.constraints[key] ?? 'null')}`)
    return `${this.kind}:${parts.join('|')}`
  }

  toJSON(): { kind: string; scopes: ScopeConstraints } {
    return { kind: this.kind, scopes: this.constraints }
  }
}

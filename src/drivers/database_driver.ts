import type { Sql } from 'postgres'
import FeatureScope from '../feature_scope.ts'
import type { ScopeConstraints } from '../feature_scope.ts'
import type { FeatureStore } from '../feature_store.ts'
import { GLOBAL_CONTEXT, GROUP_CONTEXT_PREFIX } from '../types.ts'
import type { ContextKey, ScopeRecord, StoredFeature } from '../types.ts'

export interface DatabaseDriverOptions {
  table?: string
  scopeTable?: string
}

interface FeatureRow {
  feature: string
  context: string
  value: unknown
  created_at: Date
  updated_at: Date
}

interface ScopeRow {
  feature: string
  kind: string
  scope: unknown
  value: unknown
  updated_at: Date
}

/**
 * PostgreSQL-backed feature store using `_flag_features` and `_flag_feature_scopes`.
 * JSONB columns come back parsed by the `postgres` client.
 */
export class DatabaseDriver implements FeatureStore {
  readonly name = 'database'
  private table: string
  private scopeTable: string

  constructor(
    private sql: Sql,
    options: DatabaseDriverOptions = {}
  ) {
    this.table = options.table ?? '_flag_features'
    this.scopeTable = options.scopeTable ?? '_flag_feature_scopes'
  }

  async ensureTable(): Promise<void> {
    await this.sql`
      CREATE TABLE IF NOT EXISTS ${this.sql(this.table)} (
        "id"         BIGSERIAL PRIMARY KEY,
        "feature"    VARCHAR(255) NOT NULL,
        "context"    VARCHAR(255) NOT NULL,
        "value"      JSONB NOT NULL DEFAULT 'true',
        "created_at" TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        "updated_at" TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        UNIQUE ("feature", "context")
      )
    `

    await this.sql`
      CREATE TABLE IF NOT EXISTS ${this.sql(this.scopeTable)} (
        "id"         BIGSERIAL PRIMARY KEY,
        "feature"    VARCHAR(255) NOT NULL,
        "kind"       VARCHAR(255) NOT NULL,
        "scope_key"  TEXT NOT NULL,
        "scope"      JSONB NOT NULL,
        "value"      JSONB NOT NULL DEFAULT 'true',
        "created_at" TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        "updated_at" TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        UNIQUE ("feature", "scope_key")
      )
    `
  }

  async get(feature: string, context: ContextKey): Promise<unknown | undefined> {
    const rows = await this.sql<Pick<FeatureRow, 'value'>[]>`
      SELECT "value" FROM ${this.sql(this.table)}
      WHERE "feature" = ${feature} AND "context" = ${context}
      LIMIT 1
    `
    const row = rows[0]
    return row ? row.value : undefined
  }

  async set(feature: string, context: ContextKey, value: unknown): Promise<void> {
    const jsonValue = JSON.stringify(value)
    await this.sql`
      INSERT INTO ${this.sql(this.table)} ("feature", "context", "value", "created_at", "updated_at")
      VALUES (${feature}, ${context}, ${jsonValue}::jsonb, NOW(), NOW())
      ON CONFLICT ("feature", "context")
      DO UPDATE SET "value" = ${jsonValue}::jsonb, "updated_at" = NOW()
    `
  }

  async setForAllContexts(feature: string, value: unknown): Promise<void> {
    const jsonValue = JSON.stringify(value)
    await this.sql`
      UPDATE ${this.sql(this.table)}
      SET "value" = ${jsonValue}::jsonb, "updated_at" = NOW()
      WHERE "feature" = ${feature} AND NOT starts_with("context", ${GROUP_CONTEXT_PREFIX})
    `
    await this.set(feature, GLOBAL_CONTEXT, value)
  }

  async forget(feature: string, context: ContextKey): Promise<void> {
    await this.sql`
      DELETE FROM ${this.sql(this.table)}
      WHERE "feature" = ${feature} AND "context" = ${context}
    `
  }

  async purge(feature: string): Promise<void> {
    await this.sql`DELETE FROM ${this.sql(this.table)} WHERE "feature" = ${feature}`
    await this.sql`DELETE FROM ${this.sql(this.scopeTable)} WHERE "feature" = ${feature}`
  }

  async purgeAll(): Promise<void> {
    await this.sql`DELETE FROM ${this.sql(this.table)}`
    await this.sql`DELETE FROM ${this.sql(this.scopeTable)}`
  }

  async featureNames(): Promise<string[]> {
    const rows = await this.sql<Pick<FeatureRow, 'feature'>[]>`
      SELECT "feature" FROM ${this.sql(this.table)}
      UNION
      SELECT "feature" FROM ${this.sql(this.scopeTable)}
      ORDER BY "feature"
    `
    return rows.map(r => r.feature)
  }

  async allFor(feature: string): Promise<StoredFeature[]> {
    const rows = await this.sql<FeatureRow[]>`
      SELECT "feature", "context", "value", "created_at", "updated_at"
      FROM ${this.sql(this.table)}
      WHERE "feature" = ${feature}
      ORDER BY "context"
    `

    return rows.map(row => ({
      feature: row.feature,
      context: row.context,
      value: row.value,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    }))
  }

  async setScoped(feature: string, scope: FeatureScope, value: unknown): Promise<void> {
    const jsonValue = JSON.stringify(value)
    const jsonScope = JSON.stringify(scope.constraints)
    await this.sql`
      INSERT INTO ${this.sql(this.scopeTable)}
        ("feature", "kind", "scope_key", "scope", "value", "created_at", "updated_at")
      VALUES (${feature}, ${scope.kind}, ${scope.toKey()}, ${jsonScope}::jsonb, ${jsonValue}::jsonb, NOW(), NOW())
      ON CONFLICT ("feature", "scope_key")
      DO UPDATE SET "value" = ${jsonValue}::jsonb, "updated_at" = clock_timestamp()
    `
  }

  async scopedFor(feature: string): Promise<ScopeRecord[]> {
    const rows = await this.sql<ScopeRow[]>`
      SELECT "feature", "kind", "scope", "value", "updated_at"
      FROM ${this.sql(this.scopeTable)}
      WHERE "feature" = ${feature}
      ORDER BY "updated_at", "id"
    `

    return rows.map(row => ({
      feature: row.feature,
      scope: new FeatureScope(row.kind, parseConstraints(row.scope)),
      value: row.value,
      updatedAt: row.updated_at,
    }))
  }

  async forgetScoped(feature: string, scope: FeatureScope): Promise<void> {
    await this.sql`
      DELETE FROM ${this.sql(this.scopeTable)}
      WHERE "feature" = ${feature} AND "scope_key" = ${scope.toKey()}
    `
  }
}

function parseConstraints(raw: unknown): ScopeConstraints {
  const constraints: Record<string, string | number | boolean | null> = {}
  if (raw === null || typeof raw !== 'object') return constraints

  for (const [key, value] of Object.entries(raw)) {
    if (
      value === null ||
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    ) {
      constraints[key] = value
    }
  }
  return constraints
}

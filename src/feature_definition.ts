import type FlagContext from './context.ts'
import type FlagManager from './flag_manager.ts'
import type { FeatureValue, VariantWeights } from './types.ts'

// ── Resolvers ────────────────────────────────────────────────────────────

/** A closure that resolves a feature value for a context. May be async. */
export type FeatureResolver<T = unknown> = (
  context: FlagContext,
  globalContext?: unknown
) => T | Promise<T>

/** Tagged by the arity the closure declared when it was defined. */
export type Resolver =
  | { kind: 'static'; value: unknown }
  | { kind: 'unary'; fn: (context: FlagContext) => unknown }
  | { kind: 'binary'; fn: (context: FlagContext, globalContext: unknown) => unknown }

export function isFeatureResolver(value: unknown): value is FeatureResolver {
  return typeof value === 'function'
}

export function toResolver(input: FeatureResolver | FeatureValue): Resolver {
  if (!isFeatureResolver(input)) return { kind: 'static', value: input }
  return input.length >= 2 ? { kind: 'binary', fn: input } : { kind: 'unary', fn: input }
}

export async function invokeResolver(
  resolver: Resolver,
  context: FlagContext,
  globalContext: unknown
): Promise<unknown> {
  switch (resolver.kind) {
    case 'static':
      return resolver.value
    case 'unary':
      return resolver.fn(context)
    case 'binary':
      return resolver.fn(context, globalContext)
  }
}

// ── Class-based features ─────────────────────────────────────────────────

/** A class-based feature with a `resolve` method. */
export interface FeatureClass {
  resolve(context: FlagContext, globalContext: unknown): unknown
}

export interface FeatureClassConstructor {
  key?: string
  requires?: readonly string[]
  new (): FeatureClass
}

// ── Definitions ──────────────────────────────────────────────────────────

export interface FeatureDefinition {
  name: string
  resolver: Resolver
  dependencies: readonly string[]
  expiresAt: Date | null
  variantWeights: VariantWeights | null
}

export interface DefineOptions {
  requires?: string | readonly string[]
  expiresAt?: Date | null
  variants?: VariantWeights
}

export function isExpired(definition: FeatureDefinition, now = Date.now()): boolean {
  return definition.expiresAt !== null && definition.expiresAt.getTime() < now
}

export function isExpiringSoon(definition: FeatureDefinition, days: number, now = Date.now()): boolean {
  if (definition.expiresAt === null) return false
  const at = definition.expiresAt.getTime()
  return at >= now && at <= now + days * 86_400_000
}

/**
 * Fluent definition, created by `manager.feature(name)`. Nothing is
 * registered until `resolver()` or `register()` is called.
 *
 * @example
 * manager.feature('advanced-reports')
 *   .requires('reports')
 *   .expiresAfter({ days: 30 })
 *   .resolver(ctx => ctx.type === 'Team')
 */
export class PendingFeatureDefinition {
  private dependencies: string[] = []
  private expiry: Date | null = null
  private weights: VariantWeights | null = null

  constructor(
    private manager: FlagManager,
    private name: string
  ) {}

  requires(...features: Array<string | readonly string[]>): this {
    this.dependencies = features.flat()
    return this
  }

  expiresAt(date: Date): this {
    this.expiry = date
    return this
  }

  expiresAfter({ days = 0, hours = 0, minutes = 0 }: { days?: number; hours?: number; minutes?: number }): this {
    const ms = ((days * 24 + hours) * 60 + minutes) * 60_000
    return this.expiresAt(new Date(Date.now() + ms))
  }

  variants(weights: VariantWeights): this {
    this.weights = weights
    return this
  }

  resolver(resolver: FeatureResolver | FeatureValue): void {
    this.manager.define(this.name, resolver, this.options())
  }

  /** Register with a `false` resolver; useful for variant-only or stored-only features. */
  register(): void {
    this.resolver(false)
  }

  private options(): DefineOptions {
    return {
      requires: this.dependencies,
      expiresAt: this.expiry,
      ...(this.weights ? { variants: this.weights } : {}),
    }
  }
}

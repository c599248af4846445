import { EventEmitter } from 'node:events'
import postgres from 'postgres'
import type { Sql } from 'postgres'
import FlagContext, { resolveContext, serializeContext } from './context.ts'
import type FeatureScope from './feature_scope.ts'
import { parseFlagConfig } from './config.ts'
import type { DriverConfig, FlagConfig, FlagConfigInput } from './config.ts'
import type { FeatureStore } from './feature_store.ts'
import { DatabaseDriver } from './drivers/database_driver.ts'
import { ArrayDriver } from './drivers/array_driver.ts'
import { ArrayGroupRepository } from './groups/array_group_repository.ts'
import { ArrayMembershipRepository } from './groups/array_membership_repository.ts'
import type { GroupMembershipRepository, GroupRepository } from './group_repository.ts'
import GroupMembershipResolver, { groupContextKey } from './group_resolver.ts'
import GroupManager from './group_manager.ts'
import DependencyResolver from './dependency_resolver.ts'
import ResultCache from './result_cache.ts'
import { resolveScopedValue } from './scope_matcher.ts'
import { assertValidWeights, calculateVariant, weightEntries } from './variant_assignor.ts'
import {
  PendingFeatureDefinition,
  invokeResolver,
  isExpired,
  isExpiringSoon,
  toResolver,
} from './feature_definition.ts'
import type {
  DefineOptions,
  FeatureClassConstructor,
  FeatureDefinition,
  FeatureResolver,
} from './feature_definition.ts'
import { ConfigurationError } from './errors.ts'
import PendingContextualFeature from './pending_context.ts'
import { GLOBAL_CONTEXT, isActiveValue } from './types.ts'
import type {
  ContextInput,
  ContextKey,
  FeatureValue,
  FlagEvent,
  FlagEventMap,
  VariantWeights,
} from './types.ts'

export interface FlagManagerOptions {
  /** Client for `database` drivers. Without one, each driver connects with its `url`. */
  sql?: Sql
  groups?: GroupRepository
  memberships?: GroupMembershipRepository
}

/**
 * The resolution engine. Each instance owns its definitions, its global
 * context and its result cache; give every concurrent unit of work its own
 * instance or flush the cache between units.
 */
export default class FlagManager {
  readonly config: FlagConfig
  private sql: Sql | undefined
  private ownedClients: Sql[] = []
  private stores = new Map<string, FeatureStore>()
  private extensions = new Map<string, (config: DriverConfig) => FeatureStore>()
  private definitions = new Map<string, FeatureDefinition>()
  private cache = new ResultCache()
  private emitter = new EventEmitter()
  private currentGlobalContext: unknown = null
  private globalKey: ContextKey = GLOBAL_CONTEXT
  private dependencies: DependencyResolver
  private groupResolver: GroupMembershipResolver
  private configuredGroups: Promise<void> | undefined

  constructor(config: FlagConfigInput = {}, options: FlagManagerOptions = {}) {
    this.config = parseFlagConfig(config)
    this.sql = options.sql
    this.dependencies = new DependencyResolver(
      this.definitions,
      (feature, context, visiting) => this.dependencyActive(feature, context, visiting),
      (feature, dependency, context) =>
        this.emit('flag:circular', { feature, dependency, context: context.serialize() })
    )
    this.groupResolver = new GroupMembershipResolver(
      options.groups ?? new ArrayGroupRepository(),
      options.memberships ?? new ArrayMembershipRepository()
    )
  }

  // ── Feature definitions ────────────────────────────────────────────

  define(name: string, resolver: FeatureResolver | FeatureValue, options: DefineOptions = {}): void {
    if (options.variants) assertValidWeights(name, options.variants)

    const requires = options.requires ?? []
    this.register({
      name,
      resolver: toResolver(resolver),
      dependencies: typeof requires === 'string' ? [requires] : [...requires],
      expiresAt: options.expiresAt ?? null,
      variantWeights: options.variants ?? null,
    })
  }

  defineClass(feature: FeatureClassConstructor): void {
    const key = feature.key ?? toKebab(feature.name)
    this.define(key, (context, globalContext) => new feature().resolve(context, globalContext), {
      requires: feature.requires ?? [],
    })
  }

  /** Fluent definition: `manager.feature('x').requires('y').resolver(fn)`. */
  feature(name: string): PendingFeatureDefinition {
    return new PendingFeatureDefinition(this, name)
  }

  /** Attach a weight table. Weights must sum to 100. */
  defineVariant(name: string, weights: VariantWeights): void {
    assertValidWeights(name, weights)
    const existing = this.definitions.get(name)
    this.register({
      name,
      resolver: existing?.resolver ?? toResolver(false),
      dependencies: existing?.dependencies ?? [],
      expiresAt: existing?.expiresAt ?? null,
      variantWeights: weights,
    })
  }

  /** Get all defined feature names. */
  defined(): string[] {
    return [...this.definitions.keys()]
  }

  definition(name: string): FeatureDefinition | undefined {
    return this.definitions.get(name)
  }

  serializeContext(context: ContextInput): ContextKey {
    return serializeContext(context)
  }

  // ── Core resolution ────────────────────────────────────────────────

  /** Features nobody defined or stored resolve to `false` and emit `flag:unknown`. */
  get(feature: string, context?: ContextInput): Promise<unknown> {
    return this.resolve(feature, resolveContext(context), new Set())
  }

  value(feature: string, context?: ContextInput): Promise<unknown> {
    return this.get(feature, context)
  }

  async active(feature: string, context?: ContextInput): Promise<boolean> {
    return isActiveValue(await this.value(feature, context))
  }

  async inactive(feature: string, context?: ContextInput): Promise<boolean> {
    return !(await this.active(feature, context))
  }

  async when<TActive, TInactive>(
    feature: string,
    onActive: (value: unknown) => TActive | Promise<TActive>,
    onInactive: () => TInactive | Promise<TInactive>,
    context?: ContextInput
  ): Promise<TActive | TInactive> {
    const value = await this.value(feature, context)
    return isActiveValue(value) ? onActive(value) : onInactive()
  }

  for(context: ContextInput): PendingContextualFeature {
    return new PendingContextualFeature(this, context)
  }

  // ── Batch operations ───────────────────────────────────────────────

  /** Resolve every (feature, context) pair; results keep the order of the contexts. */
  async getAll(features: Record<string, ContextInput[]>): Promise<Record<string, unknown[]>> {
    const result: Record<string, unknown[]> = {}
    for (const [feature, contexts] of Object.entries(features)) {
      const values: unknown[] = []
      for (const context of contexts) values.push(await this.value(feature, context))
      result[feature] = values
    }
    return result
  }

  async values(features: string[], context?: ContextInput): Promise<Map<string, unknown>> {
    const result = new Map<string, unknown>()
    for (const f of features) result.set(f, await this.value(f, context))
    return result
  }

  /** Resolve ahead of time so later checks in this unit of work hit the cache. */
  async load(features: string[], contexts: ContextInput[]): Promise<void> {
    for (const context of contexts) {
      for (const f of features) await this.value(f, context)
    }
  }

  /** Get all stored feature names. */
  async stored(): Promise<string[]> {
    return this.store().featureNames()
  }

  // ── Manual activation/deactivation ─────────────────────────────────

  async set(feature: string, context: ContextInput, value: unknown): Promise<void> {
    const contextKey = serializeContext(context)
    const store = this.store()
    const oldValue = await store.get(feature, contextKey)

    await store.set(feature, contextKey, value)
    this.cache.forget([feature, ...this.dependencies.dependentsOf(feature)], contextKey)

    this.notify(feature, contextKey, value, oldValue)
  }

  async activate(feature: string, value?: unknown, context?: ContextInput): Promise<void> {
    return this.set(feature, context, value !== undefined ? value : true)
  }

  async deactivate(feature: string, context?: ContextInput): Promise<void> {
    return this.set(feature, context, false)
  }

  async setForAllContexts(feature: string, value: unknown): Promise<void> {
    const store = this.store()
    const oldValue = await store.get(feature, GLOBAL_CONTEXT)

    await store.setForAllContexts(feature, value)
    this.cache.forgetFeatures([feature, ...this.dependencies.dependentsOf(feature)])

    this.notify(feature, GLOBAL_CONTEXT, value, oldValue)
  }

  async activateForEveryone(feature: string, value?: unknown): Promise<void> {
    return this.setForAllContexts(feature, value !== undefined ? value : true)
  }

  async deactivateForEveryone(feature: string): Promise<void> {
    return this.setForAllContexts(feature, false)
  }

  async delete(feature: string, context?: ContextInput): Promise<void> {
    const contextKey = serializeContext(context)
    const store = this.store()
    const oldValue = await store.get(feature, contextKey)

    await store.forget(feature, contextKey)
    this.cache.forget([feature, ...this.dependencies.dependentsOf(feature)], contextKey)

    this.emit('flag:deactivated', { feature, context: contextKey, oldValue })
  }

  // ── Scoped activation ──────────────────────────────────────────────

  async activateForScope(feature: string, scope: FeatureScope, value: unknown = true): Promise<void> {
    await this.store().setScoped(feature, scope, value)
    this.cache.forgetFeatures([feature, ...this.dependencies.dependentsOf(feature)])
    this.notify(feature, `scope:${scope.toKey()}`, value, undefined)
  }

  async deactivateForScope(feature: string, scope: FeatureScope): Promise<void> {
    return this.activateForScope(feature, scope, false)
  }

  async forgetScope(feature: string, scope: FeatureScope): Promise<void> {
    await this.store().forgetScoped(feature, scope)
    this.cache.forgetFeatures([feature, ...this.dependencies.dependentsOf(feature)])
  }

  // ── Variants ───────────────────────────────────────────────────────

  /** The variant assigned to the context, or `null` when the feature resolves to a non-string. */
  async variant(name: string, context?: ContextInput): Promise<string | null> {
    if (!this.definitions.get(name)?.variantWeights) return null
    const value = await this.value(name, context)
    return typeof value === 'string' ? value : null
  }

  getVariants(name: string): Record<string, number> {
    const weights = this.definitions.get(name)?.variantWeights
    return weights ? Object.fromEntries(weightEntries(weights)) : {}
  }

  variantNames(name: string): string[] {
    return Object.keys(this.getVariants(name))
  }

  calculateVariant(feature: string, context: ContextInput, weights: VariantWeights): string {
    return calculateVariant(feature, context, weights)
  }

  // ── Dependencies ───────────────────────────────────────────────────

  getDependencies(feature: string): string[] {
    return this.dependencies.getDependencies(feature)
  }

  dependenciesMet(feature: string, context?: ContextInput): Promise<boolean> {
    return this.dependencies.dependenciesMet(feature, resolveContext(context))
  }

  // ── Expiration ─────────────────────────────────────────────────────

  isExpired(feature: string): boolean {
    const definition = this.definitions.get(feature)
    return definition ? isExpired(definition) : false
  }

  expiresAt(feature: string): Date | null {
    return this.definitions.get(feature)?.expiresAt ?? null
  }

  isExpiringSoon(feature: string, days: number): boolean {
    const definition = this.definitions.get(feature)
    return definition ? isExpiringSoon(definition, days) : false
  }

  expiringSoon(days: number): string[] {
    return [...this.definitions.values()]
      .filter(definition => isExpiringSoon(definition, days))
      .map(definition => definition.name)
  }

  // ── Groups ─────────────────────────────────────────────────────────

  groups(): GroupManager {
    return new GroupManager(this.groupResolver, () => this.bootGroups(), {
      features: features => this.forgetFeatures(features),
      context: contextKey => this.cache.forgetContext(contextKey),
    })
  }

  /** Store a group-level value for every feature of the group. */
  async activateGroup(name: string, value: unknown = true): Promise<void> {
    await this.bootGroups()
    const features = await this.groupResolver.groups.get(name)
    const store = this.store()
    for (const feature of features) {
      await store.set(feature, groupContextKey(name), value)
      this.notify(feature, groupContextKey(name), value, undefined)
    }
    this.forgetFeatures(features)
  }

  async deactivateGroup(name: string): Promise<void> {
    return this.activateGroup(name, false)
  }

  async activateGroupForEveryone(name: string): Promise<void> {
    await this.bootGroups()
    for (const feature of await this.groupResolver.groups.get(name)) {
      await this.setForAllContexts(feature, true)
    }
  }

  async deactivateGroupForEveryone(name: string): Promise<void> {
    await this.bootGroups()
    for (const feature of await this.groupResolver.groups.get(name)) {
      await this.setForAllContexts(feature, false)
    }
  }

  /** Every feature of the group is active for the context. An empty group counts as active. */
  async activeInGroup(name: string, context?: ContextInput): Promise<boolean> {
    await this.bootGroups()
    for (const feature of await this.groupResolver.groups.get(name)) {
      if (!(await this.active(feature, context))) return false
    }
    return true
  }

  async someActiveInGroup(name: string, context?: ContextInput): Promise<boolean> {
    await this.bootGroups()
    for (const feature of await this.groupResolver.groups.get(name)) {
      if (await this.active(feature, context)) return true
    }
    return false
  }

  // ── Global context ─────────────────────────────────────────────────

  /** Set the tenant/environment axis passed to two-argument resolvers. Flushes the cache. */
  setGlobalContext(value: ContextInput): void {
    this.globalKey = serializeContext(value ?? null)
    this.currentGlobalContext = value ?? null
    this.cache.flush()
  }

  globalContext(): unknown {
    return this.currentGlobalContext
  }

  clearGlobalContext(): void {
    this.setGlobalContext(null)
  }

  // ── Events ─────────────────────────────────────────────────────────

  on<K extends FlagEvent>(event: K, listener: (payload: FlagEventMap[K]) => void): this {
    this.emitter.on(event, listener)
    return this
  }

  off<K extends FlagEvent>(event: K, listener: (payload: FlagEventMap[K]) => void): this {
    this.emitter.off(event, listener)
    return this
  }

  // ── Cleanup ────────────────────────────────────────────────────────

  /** Purge the given features, or everything when called without arguments. */
  async purge(features?: string | string[]): Promise<void> {
    if (features === undefined) return this.purgeAll()

    const names = typeof features === 'string' ? [features] : features
    const store = this.store()
    for (const name of names) await store.purge(name)
    this.forgetFeatures(names)

    this.emit('flag:purged', { features: names })
  }

  async purgeAll(): Promise<void> {
    await this.store().purgeAll()
    this.cache.flush()
    this.emit('flag:purged', { features: null })
  }

  // ── Driver management ──────────────────────────────────────────────

  store(name?: string): FeatureStore {
    const key = name ?? this.config.default

    let store = this.stores.get(key)
    if (store) return store

    const driverConfig = this.config.drivers[key]
    if (!driverConfig) {
      throw new ConfigurationError(`Flag driver "${key}" is not configured.`)
    }

    store = this.createStore(key, driverConfig)
    this.stores.set(key, store)
    return store
  }

  extend(name: string, factory: (config: DriverConfig) => FeatureStore): void {
    this.extensions.set(name, factory)
  }

  // ── Cache ──────────────────────────────────────────────────────────

  /** Call at the end of every request, job or other unit of work. */
  flushCache(): void {
    this.cache.flush()
  }

  cached(): ResultCache {
    return this.cache
  }

  // ── Table setup ────────────────────────────────────────────────────

  async ensureTables(): Promise<void> {
    const store = this.store()
    if (store instanceof DatabaseDriver) {
      await store.ensureTable()
    }
  }

  /** Close database connections this manager opened itself. */
  async close(): Promise<void> {
    await Promise.all(this.ownedClients.map(client => client.end()))
    this.ownedClients = []
  }

  // ── Private helpers ────────────────────────────────────────────────

  /**
   * Cache → expiry → dependencies → active exact stored value → group
   * activation → inactive exact stored value → scoped records → value for
   * everyone → resolver (persisted).
   */
  private async resolve(feature: string, context: FlagContext, visiting: Set<string>): Promise<unknown> {
    const contextKey = context.serialize()
    const globalKey = this.globalKey

    const cached = this.cache.lookup(feature, contextKey, globalKey)
    if (cached.found) return cached.value

    const remember = (value: unknown): unknown => {
      this.cache.put(feature, contextKey, globalKey, value)
      return value
    }

    const definition = this.definitions.get(feature)

    if (definition && isExpired(definition)) return remember(false)

    if (definition && definition.dependencies.length > 0) {
      if (!(await this.dependencies.dependenciesMet(feature, context, visiting))) {
        return remember(false)
      }
    }

    const store = this.store()
    const stored = await store.get(feature, contextKey)
    if (isActiveValue(stored)) return remember(stored)

    await this.bootGroups()
    const grouped = await this.groupResolver.resolve(feature, context, (f, group) =>
      store.get(f, groupContextKey(group))
    )
    if (grouped.found) return remember(grouped.value)

    if (stored !== undefined) return remember(stored)

    if (context.scope) {
      const scoped = resolveScopedValue(await store.scopedFor(feature), context.scope)
      if (scoped.found) return remember(scoped.value)
    }

    if (!context.isGlobal()) {
      const everyone = await store.get(feature, GLOBAL_CONTEXT)
      if (everyone !== undefined) return remember(everyone)
    }

    if (!definition) {
      this.emit('flag:unknown', { feature, context: contextKey })
      return remember(false)
    }

    const value = await this.evaluate(definition, context)
    await store.set(feature, contextKey, value)
    this.emit('flag:resolved', { feature, context: contextKey, value })

    return remember(value)
  }

  private async evaluate(definition: FeatureDefinition, context: FlagContext): Promise<unknown> {
    if (definition.variantWeights) {
      return calculateVariant(definition.name, context, definition.variantWeights)
    }

    const value = await invokeResolver(definition.resolver, context, this.currentGlobalContext)
    return value === undefined ? null : value
  }

  private async dependencyActive(
    feature: string,
    context: FlagContext,
    visiting: Set<string>
  ): Promise<boolean> {
    return isActiveValue(await this.resolve(feature, context, visiting))
  }

  private register(definition: FeatureDefinition): void {
    this.definitions.set(definition.name, definition)
    this.forgetFeatures([definition.name])
  }

  private forgetFeatures(features: string[]): void {
    const dependents = features.flatMap(f => this.dependencies.dependentsOf(f))
    this.cache.forgetFeatures([...features, ...dependents])
  }

  private notify(feature: string, context: ContextKey, value: unknown, oldValue: unknown): void {
    if (value === false) {
      this.emit('flag:deactivated', { feature, context, oldValue })
    } else {
      this.emit('flag:activated', { feature, context, value })
    }
  }

  private emit<K extends FlagEvent>(event: K, payload: FlagEventMap[K]): void {
    if (this.config.events) this.emitter.emit(event, payload)
  }

  private bootGroups(): Promise<void> {
    this.configuredGroups ??= this.defineConfiguredGroups()
    return this.configuredGroups
  }

  private async defineConfiguredGroups(): Promise<void> {
    for (const [name, group] of Object.entries(this.config.groups)) {
      await this.groupResolver.groups.define(name, group.features, group.metadata)
    }
  }

  private createStore(name: string, config: DriverConfig): FeatureStore {
    const driverName = config.driver

    const extension = this.extensions.get(driverName)
    if (extension) return extension(config)

    switch (driverName) {
      case 'database':
        return new DatabaseDriver(this.connection(name, config), {
          table: config.table,
          scopeTable: config.scopeTable,
        })
      case 'array':
        return new ArrayDriver()
      default:
        throw new ConfigurationError(
          `Unknown flag driver "${driverName}". Register it with FlagManager.extend().`
        )
    }
  }

  private connection(name: string, config: DriverConfig): Sql {
    if (this.sql) return this.sql
    if (!config.url) {
      throw new ConfigurationError(
        `Flag driver "${name}" needs a "url" or an sql client passed to the FlagManager.`
      )
    }
    const client = postgres(config.url)
    this.ownedClients.push(client)
    return client
  }
}

function toKebab(name: string): string {
  return name
    .replace(/([a-z])([A-Z])/g, '$1-$2')
    .replace(/[\s_]+/g, '-')
    .toLowerCase()
}

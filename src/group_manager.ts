import { resolveContext } from './context.ts'
import type GroupMembershipResolver from './group_resolver.ts'
import type { ContextInput, ContextKey } from './types.ts'

/** Cache eviction hooks the manager hands to its group façade. */
export interface GroupInvalidation {
  features(features: string[]): void
  context(context: ContextKey): void
}

/**
 * Group definitions and memberships, created by `manager.groups()`.
 * Every write evicts the cached results it can change.
 */
export default class GroupManager {
  constructor(
    private resolver: GroupMembershipResolver,
    private ready: () => Promise<void>,
    private invalidate: GroupInvalidation
  ) {}

  // ── Definitions ──────────────────────────────────────────────────────

  async define(name: string, features: string[], metadata?: Record<string, unknown>): Promise<void> {
    await this.ready()
    const previous = (await this.resolver.groups.exists(name)) ? await this.resolver.groups.get(name) : []
    await this.resolver.groups.define(name, features, metadata)
    this.invalidate.features([...previous, ...features])
  }

  async get(name: string): Promise<string[]> {
    await this.ready()
    return this.resolver.groups.get(name)
  }

  async metadata(name: string): Promise<Record<string, unknown>> {
    await this.ready()
    return this.resolver.groups.metadata(name)
  }

  async all(): Promise<Record<string, string[]>> {
    await this.ready()
    return this.resolver.groups.all()
  }

  async exists(name: string): Promise<boolean> {
    await this.ready()
    return this.resolver.groups.exists(name)
  }

  async update(name: string, features: string[]): Promise<void> {
    await this.ready()
    const previous = await this.resolver.groups.get(name)
    await this.resolver.groups.update(name, features)
    this.invalidate.features([...previous, ...features])
  }

  async add(name: string, features: string[]): Promise<void> {
    await this.ready()
    await this.resolver.groups.addFeatures(name, features)
    this.invalidate.features(features)
  }

  async remove(name: string, features: string[]): Promise<void> {
    await this.ready()
    await this.resolver.groups.removeFeatures(name, features)
    this.invalidate.features(features)
  }

  /** Delete the group. Memberships that point at it are skipped during resolution. */
  async delete(name: string): Promise<void> {
    await this.ready()
    if (!(await this.resolver.groups.exists(name))) return
    const features = await this.resolver.groups.get(name)
    await this.resolver.groups.delete(name)
    this.invalidate.features(features)
  }

  // ── Memberships ──────────────────────────────────────────────────────

  async assign(group: string, context: ContextInput): Promise<void> {
    const ctx = resolveContext(context)
    await this.resolver.assign(group, ctx)
    this.invalidate.context(ctx.serialize())
  }

  async assignMany(group: string, contexts: ContextInput[]): Promise<void> {
    for (const context of contexts) await this.assign(group, context)
  }

  async unassign(group: string, context: ContextInput): Promise<void> {
    const ctx = resolveContext(context)
    await this.resolver.unassign(group, ctx)
    this.invalidate.context(ctx.serialize())
  }

  async unassignMany(group: string, contexts: ContextInput[]): Promise<void> {
    for (const context of contexts) await this.unassign(group, context)
  }

  isInGroup(group: string, context: ContextInput): Promise<boolean> {
    return this.resolver.isInGroup(group, resolveContext(context))
  }

  groupsFor(context: ContextInput): Promise<string[]> {
    return this.resolver.groupsFor(resolveContext(context))
  }

  members(group: string): Promise<ContextKey[]> {
    return this.resolver.memberships.members(group)
  }

  /** Remove every member of the group. */
  async clearMembers(group: string): Promise<void> {
    const members = await this.resolver.memberships.members(group)
    await this.resolver.memberships.clear(group)
    for (const member of members) this.invalidate.context(member)
  }
}

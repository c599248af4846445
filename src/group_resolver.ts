import type FlagContext from './context.ts'
import type { GroupMembershipRepository, GroupRepository } from './group_repository.ts'
import { GroupNotFoundError } from './errors.ts'
import { found, GROUP_CONTEXT_PREFIX, MISSING } from './types.ts'
import type { ContextKey, Lookup } from './types.ts'

/** Serialized key under which a group-level activation is stored. */
export function groupContextKey(group: string): ContextKey {
  return `${GROUP_CONTEXT_PREFIX}${group}`
}

/** Reads the group-level value stored for a feature. */
export type GroupValueReader = (feature: string, group: string) => Promise<unknown>

export default class GroupMembershipResolver {
  constructor(
    readonly groups: GroupRepository,
    readonly memberships: GroupMembershipRepository
  ) {}

  isInGroup(group: string, context: FlagContext): Promise<boolean> {
    return this.memberships.isInGroup(group, context)
  }

  groupsFor(context: FlagContext): Promise<string[]> {
    return this.memberships.groupsFor(context)
  }

  assign(group: string, context: FlagContext): Promise<void> {
    return this.memberships.assign(group, context)
  }

  unassign(group: string, context: FlagContext): Promise<void> {
    return this.memberships.unassign(group, context)
  }

  /**
   * First active group-level value for `feature` among the context's groups,
   * in assignment order. Memberships pointing at deleted groups are skipped.
   */
  async resolve(feature: string, context: FlagContext, read: GroupValueReader): Promise<Lookup> {
    for (const group of await this.memberships.groupsFor(context)) {
      let features: string[]
      try {
        features = await this.groups.get(group)
      } catch (err) {
        if (err instanceof GroupNotFoundError) continue
        throw err
      }

      if (!features.includes(feature)) continue

      const value = await read(feature, group)
      if (value !== false && value !== null && value !== undefined) return found(value)
    }

    return MISSING
  }
}

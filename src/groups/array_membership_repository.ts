import type FlagContext from '../context.ts'
import type { GroupMembershipRepository } from '../group_repository.ts'
import type { ContextKey } from '../types.ts'

/** In-memory group membership, indexed both ways to keep assignment order. */
export class ArrayMembershipRepository implements GroupMembershipRepository {
  private byGroup = new Map<string, ContextKey[]>()
  private byContext = new Map<ContextKey, string[]>()

  async assign(group: string, context: FlagContext): Promise<void> {
    const key = context.serialize()
    const members = this.byGroup.get(group) ?? []
    if (members.includes(key)) return

    this.byGroup.set(group, [...members, key])
    this.byContext.set(key, [...(this.byContext.get(key) ?? []), group])
  }

  async unassign(group: string, context: FlagContext): Promise<void> {
    this.remove(group, context.serialize())
  }

  async isInGroup(group: string, context: FlagContext): Promise<boolean> {
    return this.byGroup.get(group)?.includes(context.serialize()) ?? false
  }

  async members(group: string): Promise<ContextKey[]> {
    return [...(this.byGroup.get(group) ?? [])]
  }

  async groupsFor(context: FlagContext): Promise<string[]> {
    return [...(this.byContext.get(context.serialize()) ?? [])]
  }

  async clear(group: string): Promise<void> {
    for (const key of this.byGroup.get(group) ?? []) this.remove(group, key)
  }

  private remove(group: string, key: ContextKey): void {
    this.byGroup.set(group, (this.byGroup.get(group) ?? []).filter(k => k !== key))
    this.byContext.set(key, (this.byContext.get(key) ?? []).filter(g => g !== group))
  }
}

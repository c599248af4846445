import type FlagContext from './context.ts'
import type { ContextKey } from './types.ts'

/** Contract for storing named feature groups. */
export interface GroupRepository {
  define(name: string, features: string[], metadata?: Record<string, unknown>): Promise<void>

  /** Throws `GroupNotFoundError` when the group does not exist. */
  get(name: string): Promise<string[]>

  metadata(name: string): Promise<Record<string, unknown>>

  all(): Promise<Record<string, string[]>>

  exists(name: string): Promise<boolean>

  delete(name: string): Promise<void>

  /** Replace the feature list. Throws `GroupNotFoundError` for unknown groups. */
  update(name: string, features: string[]): Promise<void>

  addFeatures(name: string, features: string[]): Promise<void>

  removeFeatures(name: string, features: string[]): Promise<void>
}

/** Contract for the many-to-many relation between serialized contexts and group names. */
export interface GroupMembershipRepository {
  assign(group: string, context: FlagContext): Promise<void>

  unassign(group: string, context: FlagContext): Promise<void>

  isInGroup(group: string, context: FlagContext): Promise<boolean>

  /** Serialized contexts in the group, in assignment order. */
  members(group: string): Promise<ContextKey[]>

  /** Group names of the context, in assignment order. */
  groupsFor(context: FlagContext): Promise<string[]>

  clear(group: string): Promise<void>
}

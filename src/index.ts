// Manager
export { default, default as FlagManager } from './flag_manager.ts'
export type { FlagManagerOptions } from './flag_manager.ts'

// Configuration
export { flagConfigSchema, parseFlagConfig } from './config.ts'
export type { FlagConfig, FlagConfigInput, DriverConfig } from './config.ts'

// Context
export { default as FlagContext, resolveContext, serializeContext } from './context.ts'
export { default as FeatureScope } from './feature_scope.ts'
export type { ScopeConstraints, ScopeValue } from './feature_scope.ts'

// Store interface
export type { FeatureStore } from './feature_store.ts'

// Drivers
export { DatabaseDriver } from './drivers/database_driver.ts'
export type { DatabaseDriverOptions } from './drivers/database_driver.ts'
export { ArrayDriver } from './drivers/array_driver.ts'

// Groups
export { default as GroupManager } from './group_manager.ts'
export { default as GroupMembershipResolver, groupContextKey } from './group_resolver.ts'
export type { GroupMembershipRepository, GroupRepository } from './group_repository.ts'
export { ArrayGroupRepository } from './groups/array_group_repository.ts'
export { ArrayMembershipRepository } from './groups/array_membership_repository.ts'

// Resolution parts
export { default as DependencyResolver } from './dependency_resolver.ts'
export { default as ResultCache } from './result_cache.ts'
export { resolveScopedValue } from './scope_matcher.ts'
export { calculateVariant, variantBucket } from './variant_assignor.ts'
export { crc32 } from './hashing.ts'

// Fluent APIs
export { PendingFeatureDefinition } from './feature_definition.ts'
export { default as PendingContextualFeature } from './pending_context.ts'

// Commands
export { register as registerCommands } from './commands/flag_commands.ts'
export type { ManagerFactory } from './commands/flag_commands.ts'

// Errors
export {
  FlagError,
  ConfigurationError,
  CannotSerializeContextError,
  InvalidVariantWeightsError,
  EmptyVariantWeightsError,
  GroupNotFoundError,
} from './errors.ts'

// Types
export type {
  DefineOptions,
  FeatureClass,
  FeatureClassConstructor,
  FeatureDefinition,
  FeatureResolver,
} from './feature_definition.ts'
export type {
  ContextId,
  ContextInput,
  ContextKey,
  Contextable,
  FeatureValue,
  FlagEvent,
  FlagEventMap,
  Identifiable,
  Lookup,
  ScopeRecord,
  StoredFeature,
  VariantWeights,
} from './types.ts'
export { GLOBAL_CONTEXT, isActiveValue } from './types.ts'

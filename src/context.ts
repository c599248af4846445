import FeatureScope from './feature_scope.ts'
import { CannotSerializeContextError } from './errors.ts'
import { contentHash } from './hashing.ts'
import { GLOBAL_CONTEXT } from './types.ts'
import type { ContextId, ContextInput, ContextKey, Contextable, Identifiable } from './types.ts'

/**
 * The entity a feature is evaluated against. Immutable; build one per call or
 * let `resolveContext()` derive it from whatever the caller passed.
 */
export default class FlagContext {
  /** Scope records only match contexts of the same kind. */
  readonly kind: string
  private readonly key: ContextKey

  constructor(
    readonly id: ContextId | null,
    readonly type: string,
    readonly scope: FeatureScope | null = null,
    key?: ContextKey
  ) {
    this.kind = scope ? scope.kind : type.toLowerCase()
    this.key = key ?? `${type}|${id === null ? 'null' : String(id)}`
  }

  static of(type: string, id: ContextId, scope?: FeatureScope | null): FlagContext {
    return new FlagContext(id, type, scope ?? null)
  }

  /** The null context. Values stored for it apply to everyone. */
  static global(): FlagContext {
    return new FlagContext(null, GLOBAL_CONTEXT, null, GLOBAL_CONTEXT)
  }

  withScope(scope: FeatureScope | null): FlagContext {
    return new FlagContext(this.id, this.type, scope, this.key)
  }

  isGlobal(): boolean {
    return this.key === GLOBAL_CONTEXT
  }

  serialize(): ContextKey {
    return this.key
  }

  toString(): string {
    return this.key
  }
}

// ── Resolution ───────────────────────────────────────────────────────────

export function isContextable(value: object): value is Contextable {
  return 'toFlagContext' in value && typeof value.toFlagContext === 'function'
}

export function isIdentifiable(value: object): value is Identifiable {
  return 'id' in value && (typeof value.id === 'string' || typeof value.id === 'number')
}

/**
 * Normalize any supported context shape:
 * `null` → the global sentinel, scalars → their string cast,
 * objects with an id → `"{type}|{id}"`, other structured values → a content hash.
 */
export function resolveContext(input: ContextInput): FlagContext {
  if (input instanceof FlagContext) return input
  if (input === null || input === undefined) return FlagContext.global()

  switch (typeof input) {
    case 'string':
    case 'number':
    case 'boolean':
    case 'bigint': {
      const key = String(input)
      return new FlagContext(key, typeof input, null, key)
    }
    case 'object':
      return resolveObjectContext(input)
    default:
      throw new CannotSerializeContextError(typeof input)
  }
}

function resolveObjectContext(input: object): FlagContext {
  if (isContextable(input)) return input.toFlagContext()

  if (isIdentifiable(input)) {
    const type =
      typeof input.contextType === 'function' ? input.contextType() : input.constructor.name
    const scope = typeof input.contextScope === 'function' ? input.contextScope() : null
    return new FlagContext(input.id, type, scope)
  }

  let hash: string
  try {
    hash = contentHash(input)
  } catch (err) {
    throw new CannotSerializeContextError(input.constructor?.name ?? 'object', { cause: err })
  }
  return new FlagContext(hash, 'object', null, hash)
}

export function serializeContext(input: ContextInput): ContextKey {
  return resolveContext(input).serialize()
}

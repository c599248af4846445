import { describe, test, expect, beforeEach, vi } from 'vitest'
import FlagManager from '../src/flag_manager.ts'
import FlagContext from '../src/context.ts'
import { ArrayDriver } from '../src/drivers/array_driver.ts'
import PendingContextualFeature from '../src/pending_context.ts'
import { ConfigurationError } from '../src/errors.ts'
import { GLOBAL_CONTEXT } from '../src/types.ts'
import { groupContextKey } from '../src/group_resolver.ts'
import type { FeatureClass } from '../src/feature_definition.ts'

// ── Fixtures ─────────────────────────────────────────────────────────────

class User {
  constructor(readonly id: number) {}
}

class Team {
  constructor(readonly id: number) {}
}

let manager: FlagManager

beforeEach(() => {
  manager = new FlagManager()
})

// ── Tests ────────────────────────────────────────────────────────────────

describe('FlagManager', () => {
  // ── Configuration ──────────────────────────────────────────────────

  test('applies configuration defaults', () => {
    expect(manager.config.default).toBe('array')
    expect(manager.config.events).toBe(true)
    expect(manager.config.drivers).toEqual({ array: { driver: 'array' } })
  })

  test('instances do not share state', async () => {
    const other = new FlagManager()
    manager.define('feat', true)

    expect(manager.defined()).toEqual(['feat'])
    expect(other.defined()).toEqual([])
  })

  // ── Feature definitions ────────────────────────────────────────────

  test('define with boolean', async () => {
    manager.define('always-on', true)
    manager.define('always-off', false)

    expect(await manager.active('always-on')).toBe(true)
    expect(await manager.active('always-off')).toBe(false)
  })

  test('define with closure', async () => {
    manager.define('half-users', ctx => typeof ctx.id === 'number' && ctx.id % 2 === 0)

    expect(await manager.active('half-users', new User(42))).toBe(true)
    expect(await manager.active('half-users', new User(43))).toBe(false)
  })

  test('define with async closure', async () => {
    manager.define('async-feat', async () => 'variant-a')

    expect(await manager.value('async-feat')).toBe('variant-a')
  })

  test('defineClass with static key', async () => {
    class BetaFeature implements FeatureClass {
      static readonly key = 'beta'
      resolve() {
        return true
      }
    }

    manager.defineClass(BetaFeature)
    expect(manager.defined()).toEqual(['beta'])
    expect(await manager.active('beta')).toBe(true)
  })

  test('defineClass infers key from class name', async () => {
    class NewDashboard implements FeatureClass {
      resolve(context: FlagContext) {
        return context.type === 'Team'
      }
    }

    manager.defineClass(NewDashboard)
    expect(await manager.active('new-dashboard', new Team(1))).toBe(true)
    expect(await manager.active('new-dashboard', new User(1))).toBe(false)
  })

  test('defineClass passes the global context and requires', async () => {
    class Regional implements FeatureClass {
      static readonly requires = ['base']
      resolve(_context: FlagContext, globalContext: unknown) {
        return globalContext === 'eu'
      }
    }

    manager.define('base', true)
    manager.defineClass(Regional)
    manager.setGlobalContext('eu')

    expect(manager.getDependencies('regional')).toEqual(['base'])
    expect(await manager.active('regional', new User(1))).toBe(true)
  })

  test('feature() registers through the fluent builder', async () => {
    manager.define('reports', true)
    manager
      .feature('advanced-reports')
      .requires('reports')
      .resolver(ctx => ctx.type === 'Team')

    expect(manager.getDependencies('advanced-reports')).toEqual(['reports'])
    expect(await manager.active('advanced-reports', new Team(3))).toBe(true)
  })

  test('defined() lists all feature names', () => {
    manager.define('a', true)
    manager.define('b', false)
    manager.define('c', () => true)

    expect(manager.defined()).toEqual(['a', 'b', 'c'])
  })

  test('unknown features resolve to false without persisting', async () => {
    expect(await manager.value('nope', new User(1))).toBe(false)
    expect(await manager.active('nope')).toBe(false)
    expect(await manager.store().get('nope', 'User|1')).toBeUndefined()
    expect(await manager.stored()).toEqual([])
  })

  test('defining an unknown feature replaces its cached false', async () => {
    expect(await manager.value('late', new User(1))).toBe(false)

    manager.define('late', 'ready')
    expect(await manager.value('late', new User(1))).toBe('ready')
  })

  test('stored values resolve without a definition', async () => {
    await manager.activate('legacy', 'on', new User(1))

    expect(await manager.value('legacy', new User(1))).toBe('on')
  })

  // ── Resolution ─────────────────────────────────────────────────────

  test('value resolves once and caches', async () => {
    const resolver = vi.fn(() => 'result')
    manager.define('cached', resolver)

    expect(await manager.value('cached', new User(1))).toBe('result')
    expect(await manager.value('cached', new User(1))).toBe('result')
    expect(resolver).toHaveBeenCalledTimes(1)
  })

  test('get and value resolve the same result', async () => {
    manager.define('plan', ctx => `plan-${String(ctx.id)}`)

    expect(await manager.get('plan', new User(4))).toBe('plan-4')
    expect(await manager.value('plan', new User(4))).toBe('plan-4')
  })

  test('resolver errors propagate', async () => {
    manager.define('broken', () => {
      throw new Error('resolver failed')
    })

    await expect(manager.value('broken', new User(1))).rejects.toThrow('resolver failed')
    expect(await manager.store().get('broken', 'User|1')).toBeUndefined()
  })

  test('value persists to store', async () => {
    manager.define('persisted', 'stored-value')

    await manager.value('persisted', new User(1))
    expect(await manager.store().get('persisted', 'User|1')).toBe('stored-value')
  })

  test('persisted values survive a cache flush', async () => {
    const resolver = vi.fn(() => true)
    manager.define('sticky', resolver)

    await manager.value('sticky', new User(1))
    manager.flushCache()
    await manager.value('sticky', new User(1))

    expect(resolver).toHaveBeenCalledTimes(1)
  })

  test('undefined resolver results are stored as null', async () => {
    manager.define('empty', () => undefined)

    expect(await manager.value('empty', new User(1))).toBeNull()
    expect(await manager.store().get('empty', 'User|1')).toBeNull()
    expect(await manager.active('empty', new User(1))).toBe(false)
  })

  test('inactive is inverse of active', async () => {
    manager.define('on', true)
    manager.define('off', false)

    expect(await manager.inactive('on')).toBe(false)
    expect(await manager.inactive('off')).toBe(true)
  })

  test('rich values preserved', async () => {
    manager.define('config', { theme: 'dark', limit: 10 })
    manager.define('zero', 0)

    expect(await manager.value('config')).toEqual({ theme: 'dark', limit: 10 })
    expect(await manager.active('zero')).toBe(true)
  })

  test('when executes onActive when active', async () => {
    manager.define('plan', 'pro')

    const result = await manager.when(
      'plan',
      value => `active:${String(value)}`,
      () => 'inactive'
    )
    expect(result).toBe('active:pro')
  })

  test('when executes onInactive when inactive', async () => {
    manager.define('off', false)

    const result = await manager.when(
      'off',
      () => 'active',
      () => 'inactive'
    )
    expect(result).toBe('inactive')
  })

  // ── Contextual API ─────────────────────────────────────────────────

  test('for() returns PendingContextualFeature', () => {
    expect(manager.for(new User(1))).toBeInstanceOf(PendingContextualFeature)
  })

  test('for(context).active() checks that context', async () => {
    manager.define('team-only', ctx => ctx.type === 'Team')

    expect(await manager.for(new Team(1)).active('team-only')).toBe(true)
    expect(await manager.for(new User(1)).active('team-only')).toBe(false)
  })

  test('for(context).activate() stores for that context', async () => {
    manager.define('feat', false)

    await manager.for(new User(7)).activate('feat')

    expect(await manager.active('feat', new User(7))).toBe(true)
    expect(await manager.active('feat', new User(8))).toBe(false)
  })

  test('for(context).values() returns batch', async () => {
    manager.define('a', true)
    manager.define('b', 'blue')

    const values = await manager.for(new User(1)).values(['a', 'b'])
    expect([...values.entries()]).toEqual([
      ['a', true],
      ['b', 'blue'],
    ])
  })

  // ── Manual activation ──────────────────────────────────────────────

  test('activate overrides stored value', async () => {
    manager.define('feat', false)
    expect(await manager.active('feat', new User(1))).toBe(false)

    await manager.activate('feat', undefined, new User(1))
    expect(await manager.active('feat', new User(1))).toBe(true)
  })

  test('deactivate overrides stored value', async () => {
    manager.define('feat', true)
    expect(await manager.active('feat', new User(1))).toBe(true)

    await manager.deactivate('feat', new User(1))
    expect(await manager.active('feat', new User(1))).toBe(false)
  })

  test('activate with rich value', async () => {
    manager.define('limit', 5)
    await manager.activate('limit', 50, new User(1))

    expect(await manager.value('limit', new User(1))).toBe(50)
  })

  test('set writes an exact value for a context', async () => {
    manager.define('plan', 'free')
    await manager.set('plan', FlagContext.of('User', 9), 'enterprise')

    expect(await manager.value('plan', new User(9))).toBe('enterprise')
    expect(await manager.store().get('plan', 'User|9')).toBe('enterprise')
  })

  test('activateForEveryone stores at the global context', async () => {
    manager.define('launch', false)
    await manager.activateForEveryone('launch')

    expect(await manager.store().get('launch', GLOBAL_CONTEXT)).toBe(true)
    expect(await manager.active('launch', new User(123))).toBe(true)
  })

  test('deactivateForEveryone overrides values stored per context', async () => {
    manager.define('feat', true)
    await manager.value('feat', new User(1))
    await manager.deactivateForEveryone('feat')

    expect(await manager.active('feat', new User(1))).toBe(false)
    expect(await manager.active('feat', new User(2))).toBe(false)
  })

  test('setForAllContexts serves the new value without calling the resolver', async () => {
    const resolver = vi.fn(() => 'old')
    manager.define('banner', resolver)

    expect(await manager.value('banner', new User(1))).toBe('old')
    await manager.setForAllContexts('banner', 'new')

    expect(await manager.value('banner', new User(1))).toBe('new')
    expect(await manager.value('banner', new User(2))).toBe('new')
    expect(resolver).toHaveBeenCalledTimes(1)
  })

  test('delete clears the stored value for a context', async () => {
    const resolver = vi.fn(() => true)
    manager.define('feat', resolver)

    await manager.value('feat', new User(1))
    await manager.delete('feat', new User(1))

    expect(await manager.store().get('feat', 'User|1')).toBeUndefined()
    await manager.value('feat', new User(1))
    expect(resolver).toHaveBeenCalledTimes(2)
  })

  test('for(context).forget() deletes through the manager', async () => {
    await manager.activate('feat', true, new User(1))
    await manager.for(new User(1)).forget('feat')

    expect(await manager.store().get('feat', 'User|1')).toBeUndefined()
  })

  // ── Batch operations ───────────────────────────────────────────────

  test('values() resolves multiple features', async () => {
    manager.define('a', true)
    manager.define('b', false)
    manager.define('c', 'hello')

    const values = await manager.values(['a', 'b', 'c'])
    expect(values.get('a')).toBe(true)
    expect(values.get('b')).toBe(false)
    expect(values.get('c')).toBe('hello')
  })

  test('getAll() resolves per feature and context', async () => {
    manager.define('even', ctx => typeof ctx.id === 'number' && ctx.id % 2 === 0)
    manager.define('on', true)

    const result = await manager.getAll({
      even: [new User(1), new User(2)],
      on: [new User(1)],
    })
    expect(result).toEqual({ even: [false, true], on: [true] })
  })

  test('stored() lists feature names in store', async () => {
    manager.define('x', true)
    manager.define('y', false)

    await manager.value('x')
    await manager.value('y')

    expect((await manager.stored()).sort()).toEqual(['x', 'y'])
  })

  test('load() pre-caches values for multiple contexts', async () => {
    const resolver = vi.fn(() => true)
    manager.define('feat', resolver)

    await manager.load(['feat'], [new User(1), new User(2)])
    expect(resolver).toHaveBeenCalledTimes(2)

    await manager.active('feat', new User(1))
    await manager.active('feat', new User(2))
    expect(resolver).toHaveBeenCalledTimes(2)
  })

  // ── Cleanup ────────────────────────────────────────────────────────

  test('purge clears all contexts for a feature', async () => {
    manager.define('feat', true)
    manager.define('other', true)
    await manager.value('feat', new User(1))
    await manager.value('feat', new User(2))
    await manager.value('other', new User(1))

    await manager.purge('feat')

    expect(await manager.stored()).toEqual(['other'])
  })

  test('purge without arguments clears everything', async () => {
    manager.define('a', true)
    await manager.value('a')

    await manager.purge()

    expect(await manager.stored()).toEqual([])
    expect(manager.cached().size).toBe(0)
  })

  test('purgeAll clears everything', async () => {
    manager.define('a', true)
    manager.define('b', true)
    await manager.value('a')
    await manager.value('b')

    await manager.purgeAll()

    expect(await manager.stored()).toEqual([])
  })

  test('set evicts the cached result instead of caching the written value', async () => {
    manager.define('feat', 'resolved')
    await manager.value('feat', new User(1))
    expect(manager.cached().size).toBe(1)

    await manager.set('feat', new User(1), 'written')

    expect(manager.cached().size).toBe(0)
    expect(await manager.value('feat', new User(1))).toBe('written')
  })

  test('flushCache forces re-read from store', async () => {
    manager.define('feat', 'original')
    await manager.value('feat', new User(1))

    await manager.store().set('feat', 'User|1', 'changed')
    expect(await manager.value('feat', new User(1))).toBe('original')

    manager.flushCache()
    expect(await manager.value('feat', new User(1))).toBe('changed')
  })

  // ── Expiration ─────────────────────────────────────────────────────

  test('expired features resolve to false without persisting', async () => {
    const resolver = vi.fn(() => true)
    manager.define('old-promo', resolver, { expiresAt: new Date(Date.now() - 60_000) })

    expect(await manager.active('old-promo', new User(1))).toBe(false)
    expect(resolver).not.toHaveBeenCalled()
    expect(await manager.store().get('old-promo', 'User|1')).toBeUndefined()
  })

  test('expiration queries', () => {
    const soon = new Date(Date.now() + 2 * 86_400_000)
    const later = new Date(Date.now() + 30 * 86_400_000)
    manager.define('soon', true, { expiresAt: soon })
    manager.define('later', true, { expiresAt: later })
    manager.define('past', true, { expiresAt: new Date(Date.now() - 1000) })
    manager.define('forever', true)

    expect(manager.isExpired('past')).toBe(true)
    expect(manager.isExpired('soon')).toBe(false)
    expect(manager.expiresAt('soon')).toBe(soon)
    expect(manager.expiresAt('forever')).toBeNull()
    expect(manager.isExpiringSoon('soon', 7)).toBe(true)
    expect(manager.isExpiringSoon('later', 7)).toBe(false)
    expect(manager.expiringSoon(7)).toEqual(['soon'])
  })

  test('expiresAfter sets a relative expiry', () => {
    manager.feature('trial').expiresAfter({ days: 3 }).resolver(true)

    expect(manager.isExpiringSoon('trial', 4)).toBe(true)
    expect(manager.isExpiringSoon('trial', 2)).toBe(false)
  })

  // ── Global context ─────────────────────────────────────────────────

  test('two-argument resolvers receive the global context', async () => {
    const seen: unknown[] = []
    manager.define('regional', (_ctx, globalContext) => {
      seen.push(globalContext)
      return true
    })

    manager.setGlobalContext({ tenant: 'acme' })
    await manager.value('regional', new User(1))

    expect(seen).toEqual([{ tenant: 'acme' }])
    expect(manager.globalContext()).toEqual({ tenant: 'acme' })
  })

  test('changing the global context flushes the cache', async () => {
    manager.define('feat', true)
    await manager.value('feat', new User(1))
    expect(manager.cached().size).toBe(1)

    manager.setGlobalContext('eu')
    expect(manager.cached().size).toBe(0)

    manager.clearGlobalContext()
    expect(manager.globalContext()).toBeNull()
  })

  // ── Events ─────────────────────────────────────────────────────────

  test('emits activation and deactivation events', async () => {
    const activated = vi.fn()
    const deactivated = vi.fn()
    manager.on('flag:activated', activated).on('flag:deactivated', deactivated)

    await manager.activate('feat', 'on', new User(1))
    await manager.deactivate('feat', new User(1))

    expect(activated).toHaveBeenCalledWith({ feature: 'feat', context: 'User|1', value: 'on' })
    expect(deactivated).toHaveBeenCalledWith({ feature: 'feat', context: 'User|1', oldValue: 'on' })
  })

  test('emits flag:resolved only when the resolver runs', async () => {
    const resolved = vi.fn()
    manager.on('flag:resolved', resolved)
    manager.define('feat', 'v')

    await manager.value('feat', new User(1))
    await manager.value('feat', new User(1))

    expect(resolved).toHaveBeenCalledTimes(1)
    expect(resolved).toHaveBeenCalledWith({ feature: 'feat', context: 'User|1', value: 'v' })
  })

  test('emits flag:unknown and flag:purged', async () => {
    const unknown = vi.fn()
    const purged = vi.fn()
    manager.on('flag:unknown', unknown).on('flag:purged', purged)

    expect(await manager.value('ghost')).toBe(false)
    await manager.purge(['a', 'b'])
    await manager.purgeAll()

    expect(unknown).toHaveBeenCalledWith({ feature: 'ghost', context: GLOBAL_CONTEXT })
    expect(purged.mock.calls).toEqual([[{ features: ['a', 'b'] }], [{ features: null }]])
  })

  test('off() removes a listener', async () => {
    const listener = vi.fn()
    manager.on('flag:activated', listener)
    manager.off('flag:activated', listener)

    await manager.activate('feat')
    expect(listener).not.toHaveBeenCalled()
  })

  test('events can be disabled', async () => {
    const quiet = new FlagManager({ events: false })
    const listener = vi.fn()
    quiet.on('flag:activated', listener)

    await quiet.activate('feat')
    expect(listener).not.toHaveBeenCalled()
  })

  // ── Driver management ──────────────────────────────────────────────

  test('store() returns array driver', () => {
    expect(manager.store()).toBeInstanceOf(ArrayDriver)
    expect(manager.store().name).toBe('array')
  })

  test('store instances are cached', () => {
    expect(manager.store()).toBe(manager.store())
  })

  test('throws on unconfigured driver', () => {
    expect(() => manager.store('redis')).toThrow(ConfigurationError)
    expect(() => manager.store('redis')).toThrow('Flag driver "redis" is not configured.')
  })

  test('throws on unknown driver kind', () => {
    const custom = new FlagManager({ drivers: { kv: { driver: 'kv' } } })
    expect(() => custom.store('kv')).toThrow(
      'Unknown flag driver "kv". Register it with FlagManager.extend().'
    )
  })

  test('extend registers custom driver', () => {
    const driver = new ArrayDriver()
    const custom = new FlagManager({ default: 'kv', drivers: { kv: { driver: 'kv' } } })
    custom.extend('kv', () => driver)

    expect(custom.store()).toBe(driver)
  })

  test('ensureTables is a no-op for the array driver', async () => {
    await expect(manager.ensureTables()).resolves.toBeUndefined()
  })
})

// ── ArrayDriver ──────────────────────────────────────────────────────────

describe('ArrayDriver', () => {
  test('get/set round-trip', async () => {
    const driver = new ArrayDriver()
    await driver.set('feat', 'User|1', { limit: 3 })
    expect(await driver.get('feat', 'User|1')).toEqual({ limit: 3 })
  })

  test('get returns undefined for missing', async () => {
    const driver = new ArrayDriver()
    expect(await driver.get('feat', 'User|1')).toBeUndefined()
  })

  test('stored false is kept apart from missing', async () => {
    const driver = new ArrayDriver()
    await driver.set('feat', 'User|1', false)
    expect(await driver.get('feat', 'User|1')).toBe(false)
  })

  test('setForAllContexts rewrites every context and the global value', async () => {
    const driver = new ArrayDriver()
    await driver.set('feat', 'User|1', 'a')
    await driver.set('feat', 'User|2', 'b')
    await driver.set('other', 'User|1', 'c')

    await driver.setForAllContexts('feat', 'z')

    expect(await driver.get('feat', 'User|1')).toBe('z')
    expect(await driver.get('feat', 'User|2')).toBe('z')
    expect(await driver.get('feat', GLOBAL_CONTEXT)).toBe('z')
    expect(await driver.get('other', 'User|1')).toBe('c')
  })

  test('setForAllContexts leaves group-level values alone', async () => {
    const driver = new ArrayDriver()
    await driver.set('feat', 'User|1', 'a')
    await driver.set('feat', groupContextKey('beta'), 'blue')

    await driver.setForAllContexts('feat', 'z')

    expect(await driver.get('feat', 'User|1')).toBe('z')
    expect(await driver.get('feat', groupContextKey('beta'))).toBe('blue')
  })

  test('forget removes entry', async () => {
    const driver = new ArrayDriver()
    await driver.set('feat', 'User|1', true)
    await driver.forget('feat', 'User|1')
    expect(await driver.get('feat', 'User|1')).toBeUndefined()
  })

  test('purgeAll clears everything', async () => {
    const driver = new ArrayDriver()
    await driver.set('a', 'User|1', true)
    await driver.set('b', 'User|1', true)
    await driver.purgeAll()
    expect(await driver.featureNames()).toEqual([])
  })

  test('featureNames returns distinct names', async () => {
    const driver = new ArrayDriver()
    await driver.set('a', 'User|1', true)
    await driver.set('a', 'User|2', true)
    await driver.set('b', 'User|1', true)
    expect(await driver.featureNames()).toEqual(['a', 'b'])
  })

  test('allFor returns all records for a feature', async () => {
    const driver = new ArrayDriver()
    await driver.set('feat', 'User|1', true)
    await driver.set('feat', 'User|2', false)
    await driver.set('other', 'User|1', true)

    const records = await driver.allFor('feat')
    expect(records.map(r => [r.feature, r.context, r.value])).toEqual([
      ['feat', 'User|1', true],
      ['feat', 'User|2', false],
    ])
    expect(records[0]?.createdAt).toBeInstanceOf(Date)
  })
})

import type FlagManager from './flag_manager.ts'
import type { ContextInput } from './types.ts'

/** Fluent contextual feature check, created by `manager.for(context)`. */
export default class PendingContextualFeature {
  constructor(
    private manager: FlagManager,
    private context: ContextInput
  ) {}

  value(feature: string): Promise<unknown> {
    return this.manager.value(feature, this.context)
  }

  active(feature: string): Promise<boolean> {
    return this.manager.active(feature, this.context)
  }

  inactive(feature: string): Promise<boolean> {
    return this.manager.inactive(feature, this.context)
  }

  when<A, I>(
    feature: string,
    onActive: (value: unknown) => A | Promise<A>,
    onInactive: () => I | Promise<I>
  ): Promise<A | I> {
    return this.manager.when(feature, onActive, onInactive, this.context)
  }

  variant(feature: string): Promise<string | null> {
    return this.manager.variant(feature, this.context)
  }

  activate(feature: string, value?: unknown): Promise<void> {
    return this.manager.activate(feature, value, this.context)
  }

  deactivate(feature: string): Promise<void> {
    return this.manager.deactivate(feature, this.context)
  }

  forget(feature: string): Promise<void> {
    return this.manager.delete(feature, this.context)
  }

  values(features: string[]): Promise<Map<string, unknown>> {
    return this.manager.values(features, this.context)
  }

  load(features: string[]): Promise<void> {
    return this.manager.load(features, [this.context])
  }
}

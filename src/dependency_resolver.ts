import type FlagContext from './context.ts'
import type { FeatureDefinition } from './feature_definition.ts'

/** Whether `feature` is active for `context`, continuing the caller's traversal. */
export type DependencyCheck = (
  feature: string,
  context: FlagContext,
  visiting: Set<string>
) => Promise<boolean>

export type CircularDependencyHandler = (feature: string, dependency: string, context: FlagContext) => void

/**
 * Depth-first prerequisite checks.
 *
 * `visiting` holds the features on the current path and belongs to one
 * top-level resolution; a dependency already on the path closes a cycle and is
 * reported as unmet.
 */
export default class DependencyResolver {
  constructor(
    private definitions: ReadonlyMap<string, FeatureDefinition>,
    private check: DependencyCheck,
    private onCircular: CircularDependencyHandler = () => {}
  ) {}

  getDependencies(feature: string): string[] {
    return [...(this.definitions.get(feature)?.dependencies ?? [])]
  }

  async dependenciesMet(
    feature: string,
    context: FlagContext,
    visiting: Set<string> = new Set()
  ): Promise<boolean> {
    const dependencies = this.getDependencies(feature)
    if (dependencies.length === 0) return true

    visiting.add(feature)
    try {
      for (const dependency of dependencies) {
        if (visiting.has(dependency)) {
          this.onCircular(feature, dependency, context)
          return false
        }
        if (!(await this.check(dependency, context, visiting))) return false
      }
      return true
    } finally {
      visiting.delete(feature)
    }
  }

  /** Every feature that requires `feature`, directly or through a chain. */
  dependentsOf(feature: string): string[] {
    const dependents = new Set<string>()
    const queue = [feature]

    while (queue.length > 0) {
      const current = queue.shift()
      for (const definition of this.definitions.values()) {
        if (
          current !== undefined &&
          definition.dependencies.includes(current) &&
          !dependents.has(definition.name) &&
          definition.name !== feature
        ) {
          dependents.add(definition.name)
          queue.push(definition.name)
        }
      }
    }

    return [...dependents]
  }
}

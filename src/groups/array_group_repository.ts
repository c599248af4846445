import type { GroupRepository } from '../group_repository.ts'
import { GroupNotFoundError } from '../errors.ts'

/** In-memory group repository. */
export class ArrayGroupRepository implements GroupRepository {
  private groups = new Map<string, { features: string[]; metadata: Record<string, unknown> }>()

  async define(name: string, features: string[], metadata: Record<string, unknown> = {}): Promise<void> {
    this.groups.set(name, { features: [...features], metadata })
  }

  async get(name: string): Promise<string[]> {
    return [...this.find(name).features]
  }

  async metadata(name: string): Promise<Record<string, unknown>> {
    return this.find(name).metadata
  }

  async all(): Promise<Record<string, string[]>> {
    const result: Record<string, string[]> = {}
    for (const [name, group] of this.groups) result[name] = [...group.features]
    return result
  }

  async exists(name: string): Promise<boolean> {
    return this.groups.has(name)
  }

  async delete(name: string): Promise<void> {
    this.groups.delete(name)
  }

  async update(name: string, features: string[]): Promise<void> {
    this.find(name).features = [...features]
  }

  async addFeatures(name: string, features: string[]): Promise<void> {
    const group = this.find(name)
    group.features = [...new Set([...group.features, ...features])]
  }

  async removeFeatures(name: string, features: string[]): Promise<void> {
    const group = this.find(name)
    group.features = group.features.filter(f => !features.includes(f))
  }

  private find(name: string): { features: string[]; metadata: Record<string, unknown> } {
    const group = this.groups.get(name)
    if (!group) throw new GroupNotFoundError(name)
    return group
  }
}

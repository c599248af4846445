import { z } from 'zod'
import { ConfigurationError } from './errors.ts'

export const driverConfigSchema = z.object({
  driver: z.string().min(1),
  /** Connection string for the `database` driver when no client is injected. */
  url: z.string().optional(),
  table: z.string().optional(),
  scopeTable: z.string().optional(),
})

export const groupConfigSchema = z.object({
  features: z.array(z.string()),
  metadata: z.record(z.string(), z.unknown()).default({}),
})

export const flagConfigSchema = z.object({
  /** The default feature flag storage driver. */
  default: z.string().default('array'),
  drivers: z.record(z.string(), driverConfigSchema).default({ array: { driver: 'array' } }),
  /** Emit `flag:*` events. */
  events: z.boolean().default(true),
  /** Groups defined when the manager boots. */
  groups: z.record(z.string(), groupConfigSchema).default({}),
})

export type FlagConfig = z.output<typeof flagConfigSchema>
export type FlagConfigInput = z.input<typeof flagConfigSchema>
export type DriverConfig = z.output<typeof driverConfigSchema>

export function parseFlagConfig(input: unknown): FlagConfig {
  const result = flagConfigSchema.safeParse(input ?? {})
  if (!result.success) {
    const issue = result.error.issues[0]
    const path = issue && issue.path.length > 0 ? issue.path.join('.') : 'flag'
    throw new ConfigurationError(
      `Invalid flag configuration at "${path}": ${issue?.message ?? 'unknown error'}`
    )
  }
  return result.data
}

import type { FlagConfigInput } from '../../src/config.ts'

export default {
  /** The default feature flag storage driver. */
  default: process.env.FLAG_DRIVER ?? 'database',

  drivers: {
    database: {
      driver: 'database',
      url: process.env.DATABASE_URL,
    },

    array: {
      driver: 'array',
    },
  },

  groups: {
    beta: {
      features: [],
      metadata: { description: 'Early access features' },
    },
  },
} satisfies FlagConfigInput

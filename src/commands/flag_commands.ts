import type { Command } from 'commander'
import chalk from 'chalk'
import type FlagManager from '../flag_manager.ts'

/** Builds the manager a command runs against. The command closes it when done. */
export type ManagerFactory = () => FlagManager | Promise<FlagManager>

export function register(program: Command, boot: ManagerFactory): void {
  program
    .command('flag:setup')
    .description('Create the feature flag storage tables')
    .action(() =>
      run(boot, async manager => {
        console.log(chalk.dim('Creating feature tables...'))
        await manager.ensureTables()
        console.log(chalk.green('Feature tables created successfully.'))
      })
    )

  program
    .command('flag:purge [feature]')
    .description('Purge stored feature flag values')
    .option('--all', 'Purge all features')
    .action((feature: string | undefined, options: { all?: boolean }) =>
      run(boot, async manager => {
        if (options.all || !feature) {
          console.log(chalk.dim('Purging all feature flags...'))
          await manager.purgeAll()
          console.log(chalk.green('All feature flags purged.'))
        } else {
          console.log(chalk.dim(`Purging feature "${feature}"...`))
          await manager.purge(feature)
          console.log(chalk.green(`Feature "${feature}" purged.`))
        }
      })
    )

  program
    .command('flag:list')
    .description('List all stored feature flags')
    .action(() =>
      run(boot, async manager => {
        const names = await manager.stored()

        if (names.length === 0) {
          console.log(chalk.dim('No stored feature flags.'))
          return
        }

        console.log(chalk.bold(`Stored feature flags (${names.length}):\n`))
        const store = manager.store()
        for (const name of names) {
          const records = await store.allFor(name)
          const scoped = await store.scopedFor(name)
          const count = records.length + scoped.length
          console.log(`  ${chalk.cyan(name)} ${chalk.dim(`(${count} value${count === 1 ? '' : 's'})`)}`)
          for (const r of records) {
            console.log(`    ${chalk.dim(r.context)} -> ${describe(r.value)}`)
          }
          for (const r of scoped) {
            console.log(`    ${chalk.dim(`scope ${r.scope.toKey()}`)} -> ${describe(r.value)}`)
          }
        }
      })
    )
}

async function run(boot: ManagerFactory, action: (manager: FlagManager) => Promise<void>): Promise<void> {
  let manager: FlagManager | undefined
  try {
    manager = await boot()
    await action(manager)
  } catch (err) {
    console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`))
    process.exitCode = 1
  } finally {
    if (manager) await manager.close()
  }
}

function describe(value: unknown): string {
  if (typeof value === 'boolean') return value ? chalk.green('active') : chalk.red('inactive')
  return chalk.yellow(JSON.stringify(value))
}

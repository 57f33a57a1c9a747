import chalk from 'chalk'
import type {Command} from 'commander'
import {openStore} from '../utils.js'

export function registerCleanCommand(program: Command): void {
  program
    .command('clean')
    .description('Remove all build records')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {store} = await openStore(cmd)
      const buildIds = await store.listBuilds()

      if (buildIds.length === 0) {
        console.log(chalk.gray('No builds to clean.'))
        return
      }

      for (const buildId of buildIds) {
        await store.removeBuild(buildId)
      }

      await store.cleanupStaging()
      console.log(chalk.green(`Removed ${buildIds.length} build${buildIds.length > 1 ? 's' : ''}.`))
    })
}

import chalk from 'chalk'
import type {Command} from 'commander'
import {openStore} from '../utils.js'

export function registerRmCommand(program: Command): void {
  program
    .command('rm')
    .description('Remove one or more build records')
    .argument('<build...>', 'Build IDs to remove')
    .action(async (buildIds: string[], _options: Record<string, unknown>, cmd: Command) => {
      const {store} = await openStore(cmd)

      for (const buildId of buildIds) {
        await store.removeBuild(buildId)
        console.log(chalk.green(`Removed ${buildId}`))
      }
    })
}

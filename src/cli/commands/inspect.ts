import chalk from 'chalk'
import type {Command} from 'commander'
import {formatDuration} from '../../core/utils.js'
import {openStore} from '../utils.js'

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .description('Show the record of a build')
    .argument('<build>', 'Build ID')
    .action(async (buildId: string, _options: Record<string, unknown>, cmd: Command) => {
      const {store, json} = await openStore(cmd)
      const record = await store.readRecord(buildId)

      if (json) {
        console.log(JSON.stringify(record, null, 2))
        return
      }

      console.log(chalk.bold(`\nBuild: ${chalk.cyan(record.buildId)}`))
      console.log(`  Plan:       ${record.planId}${record.planName ? ` (${record.planName})` : ''}`)
      console.log(`  Status:     ${record.status === 'succeeded' ? chalk.green(record.status) : chalk.red(record.status)}`)
      console.log(`  Base:       ${record.base}${record.baseId ? ` ${chalk.gray(record.baseId)}` : ''}`)
      if (record.imageId) {
        console.log(`  Image:      ${record.imageId}`)
      }

      if (record.tag) {
        console.log(`  Tag:        ${record.tag}`)
      }

      console.log(`  Started:    ${record.startedAt}`)
      console.log(`  Finished:   ${record.finishedAt ?? '-'}`)
      if (record.durationMs !== undefined) {
        console.log(`  Duration:   ${formatDuration(record.durationMs)}`)
      }

      if (record.error) {
        console.log(`  Error:      ${chalk.red(record.error)}`)
      }

      console.log(chalk.bold('\n  Steps:'))
      for (const step of record.steps) {
        const mark = step.status === 'success' ? chalk.green('✓') : (step.status === 'failure' ? chalk.red('✗') : chalk.yellow('⊘'))
        const command = step.kind === 'copy' ? `COPY ${step.cmd.join(' → ')}` : `RUN ${step.cmd.join(' ')}`
        console.log(`  ${mark} ${step.index}. ${step.stepId} ${chalk.gray(`(${step.workdir}, exit ${step.exitCode}, ${formatDuration(step.durationMs)})`)}`)
        console.log(`       ${command}`)
      }

      console.log()
    })
}

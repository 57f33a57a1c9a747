import process from 'node:process'
import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {ValidationError} from '../../errors.js'
import {openStore} from '../utils.js'

export function registerLogsCommand(program: Command): void {
  program
    .command('logs')
    .description('Show logs of a step in a build')
    .argument('<build>', 'Build ID')
    .argument('<step>', 'Step ID or 1-based position')
    .option('-s, --stream <stream>', 'Show only stdout or stderr', 'both')
    .action(async (buildId: string, stepArg: string, options: {stream: string}, cmd: Command) => {
      if (!['both', 'stdout', 'stderr'].includes(options.stream)) {
        throw new ValidationError(`Invalid stream '${options.stream}': expected stdout, stderr or both`)
      }

      const {store} = await openStore(cmd)
      const record = await store.readRecord(buildId)
      const step = record.steps.find(s => s.stepId === stepArg || String(s.index) === stepArg)

      if (!step) {
        console.error(chalk.red(`Step did not run in build ${buildId}: ${stepArg}`))
        process.exitCode = 1
        return
      }

      const logDir = store.stepPath(buildId, step.index, step.stepId)

      if (options.stream === 'both' || options.stream === 'stdout') {
        const stdout = await readFile(join(logDir, 'stdout.log'), 'utf8')
        if (stdout) {
          process.stdout.write(stdout)
        }
      }

      if (options.stream === 'both' || options.stream === 'stderr') {
        const stderr = await readFile(join(logDir, 'stderr.log'), 'utf8')
        if (stderr) {
          if (options.stream === 'both') {
            console.error(chalk.red('── stderr ──'))
          }

          process.stderr.write(stderr)
        }
      }
    })
}

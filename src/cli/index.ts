#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {StepFailureError, StratumError} from '../errors.js'
import {registerBuildCommand} from './commands/build.js'
import {registerCleanCommand} from './commands/clean.js'
import {registerHistoryCommand} from './commands/history.js'
import {registerInspectCommand} from './commands/inspect.js'
import {registerLogsCommand} from './commands/logs.js'
import {registerPlanCommand} from './commands/plan.js'
import {registerRmCommand} from './commands/rm.js'

async function main() {
  const program = new Command()

  program
    .name('stratum')
    .description('Build container images one committed layer per step')
    .version('0.1.0')
    .option('--workdir <path>', 'Directory holding build records (default: .stratum)')
    .option('--json', 'Output structured JSON instead of interactive UI')

  registerBuildCommand(program)
  registerPlanCommand(program)
  registerHistoryCommand(program)
  registerInspectCommand(program)
  registerLogsCommand(program)
  registerRmCommand(program)
  registerCleanCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  if (!(error instanceof StratumError)) {
    console.error('Fatal error:', error)
    throw error
  }

  // Step failures are already shown by the reporter
  if (!(error instanceof StepFailureError)) {
    console.error(chalk.red(`${error.name}: ${error.message}`))
  }

  process.exitCode = 1
}

import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {BuildLoader} from '../../core/build-loader.js'
import {loadEnvFile} from '../../core/env-file.js'
import {formatImageRef} from '../../engine/docker-executor.js'
import {displayName, type Step} from '../../types.js'
import {getGlobalOptions, resolveBuildFile} from '../utils.js'
import {loadConfig} from '../config.js'

export function describeStep(step: Step): string {
  if (step.kind === 'copy') {
    return `COPY ${step.source} → ${step.destination}`
  }

  return `RUN ${step.cmd.join(' ')}`
}

export function registerPlanCommand(program: Command): void {
  program
    .command('plan')
    .description('Show the resolved steps of a build file without running them')
    .argument('[file]', 'Build file or directory (default: current directory)')
    .option('--env-file <path>', 'Load environment variables from a dotenv file for all run steps')
    .action(async (fileArg: string | undefined, options: {envFile?: string}, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const config = await loadConfig(process.cwd())
      const buildFile = await resolveBuildFile(fileArg ?? config.file)
      const env = options.envFile ? await loadEnvFile(options.envFile) : undefined
      const plan = await new BuildLoader().load(buildFile, {env})

      if (json) {
        console.log(JSON.stringify(plan, null, 2))
        return
      }

      console.log(chalk.bold(`\n${plan.name ?? plan.id} ${chalk.gray(`from ${formatImageRef(plan.base)}`)}\n`))
      if (plan.steps.length === 0) {
        console.log(chalk.gray('  No steps: the image is the base image.'))
      }

      for (const [i, step] of plan.steps.entries()) {
        console.log(`  ${chalk.cyan(`${i + 1}.`)} ${chalk.bold(displayName(step))} ${chalk.gray(`(${step.workdir})`)}`)
        console.log(`     ${describeStep(step)}`)
      }

      console.log()
    })
}

import process from 'node:process'
import type {Command} from 'commander'
import {BuildLoader} from '../../core/build-loader.js'
import {BuildRunner} from '../../core/build-runner.js'
import {loadEnvFile} from '../../core/env-file.js'
import {ConsoleReporter} from '../../core/reporter.js'
import {DockerCliExecutor} from '../../engine/docker-executor.js'
import {InteractiveReporter} from '../interactive-reporter.js'
import {openStore, resolveBuildFile} from '../utils.js'

type BuildCommandOptions = {
  tag?: string;
  pull: boolean;
  envFile?: string;
  verbose?: boolean;
}

export function registerBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Build an image from a build file')
    .argument('[file]', 'Build file or directory (default: current directory)')
    .option('-t, --tag <reference>', 'Tag the final image (e.g. app:dev)')
    .option('--no-pull', 'Use the local base image instead of pulling it')
    .option('--env-file <path>', 'Load environment variables from a dotenv file for all run steps')
    .option('--verbose', 'Stream step logs in real-time (interactive mode)')
    .action(async (fileArg: string | undefined, options: BuildCommandOptions, cmd: Command) => {
      const {store, config, json} = await openStore(cmd)
      const buildFile = await resolveBuildFile(fileArg ?? config.file)
      const env = options.envFile ? await loadEnvFile(options.envFile) : undefined

      const reporter = json ? new ConsoleReporter() : new InteractiveReporter({verbose: options.verbose})
      const runner = new BuildRunner(new BuildLoader(), new DockerCliExecutor(), reporter, store)

      const controller = new AbortController()
      const onSignal = (signal: NodeJS.Signals) => {
        controller.abort(new Error(`Received ${signal}`))
      }

      process.once('SIGINT', onSignal)
      process.once('SIGTERM', onSignal)

      try {
        const result = await runner.run(buildFile, {
          tag: options.tag,
          pull: options.pull && (config.pull ?? true),
          env,
          signal: controller.signal
        })
        if (json) {
          console.log(JSON.stringify({buildId: result.buildId, imageId: result.imageId, tag: result.tag, layers: result.snapshot.depth}))
        }
      } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
      }
    })
}

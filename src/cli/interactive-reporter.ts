import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import type {BuildEvent, BuildFinishedEvent, Reporter, StepFailedEvent, StepFinishedEvent, StepRef} from '../core/reporter.js'
import {formatDuration, shortId} from '../core/utils.js'
import type {StepExecutionResult} from '../engine/types.js'

/**
 * Reporter with interactive terminal UI using spinners and colors.
 * Suitable for local development and manual execution.
 */
export class InteractiveReporter implements Reporter {
  private static get maxStderrLines() {
    return 20
  }

  private readonly verbose: boolean
  private totalSteps = 0
  private spinner?: Ora
  private readonly stderrBuffers = new Map<string, string[]>()

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: BuildEvent): void {
    switch (event.event) {
      case 'BUILD_START': {
        this.totalSteps = event.totalSteps
        console.log(chalk.bold(`\n▶ Build: ${chalk.cyan(event.planName)} ${chalk.gray(`from ${event.base}`)}\n`))
        this.spinner = ora({text: `Resolving ${event.base}`, prefixText: ' '}).start()
        break
      }

      case 'BASE_RESOLVED': {
        this.spinner?.stopAndPersist({symbol: chalk.green('✓'), text: chalk.green(`${event.base} ${chalk.gray(shortId(event.baseId))}`)})
        this.spinner = undefined
        break
      }

      case 'STEP_STARTING': {
        this.spinner = ora({text: this.label(event.step), prefixText: ' '}).start()
        break
      }

      case 'STEP_FINISHED': {
        this.handleStepFinished(event)
        break
      }

      case 'STEP_FAILED': {
        this.handleStepFailed(event)
        break
      }

      case 'BUILD_FINISHED': {
        this.handleBuildFinished(event)
        break
      }

      case 'BUILD_FAILED': {
        this.spinner?.fail()
        this.spinner = undefined
        console.log(chalk.bold.red(`\n✗ Build failed: ${event.message}\n`))
        break
      }

      case 'BUILD_CANCELLED': {
        this.spinner?.warn()
        this.spinner = undefined
        console.log(chalk.bold.yellow(`\n⊘ Build cancelled after ${event.completedSteps} step(s)\n`))
        break
      }
    }
  }

  log(_buildId: string, step: StepRef, stream: 'stdout' | 'stderr', line: string): void {
    if (this.verbose) {
      const prefix = chalk.gray(`  [${step.id}]`)
      if (this.spinner) {
        this.spinner.clear()
        console.log(`${prefix} ${line}`)
        this.spinner.render()
      } else {
        console.log(`${prefix} ${line}`)
      }
    }

    if (stream === 'stderr') {
      let buffer = this.stderrBuffers.get(step.id)
      if (!buffer) {
        buffer = []
        this.stderrBuffers.set(step.id, buffer)
      }

      buffer.push(line)
      if (buffer.length > InteractiveReporter.maxStderrLines) {
        buffer.shift()
      }
    }
  }

  result(_buildId: string, _step: StepRef, _result: StepExecutionResult): void {
    // Results shown via state updates
  }

  private label(step: StepRef): string {
    return `[${step.index}/${this.totalSteps}] ${step.displayName}`
  }

  private handleStepFinished(event: StepFinishedEvent): void {
    const text = `${this.label(event.step)} (${formatDuration(event.durationMs)}) ${chalk.gray(shortId(event.layerId))}`
    this.spinner?.stopAndPersist({symbol: chalk.green('✓'), text: chalk.green(text)})
    this.spinner = undefined
    this.stderrBuffers.delete(event.step.id)
  }

  private handleStepFailed(event: StepFailedEvent): void {
    const exitInfo = event.timedOut ? ' (timed out)' : ` (exit ${event.exitCode})`
    this.spinner?.stopAndPersist({
      symbol: chalk.red('✗'),
      text: chalk.red(`${this.label(event.step)}${exitInfo}`)
    })
    this.spinner = undefined

    const stderr = this.stderrBuffers.get(event.step.id)
    if (stderr && stderr.length > 0) {
      console.log(chalk.red('  ── stderr ──'))
      for (const line of stderr) {
        console.log(chalk.red(`  ${line}`))
      }
    }

    this.stderrBuffers.delete(event.step.id)
  }

  private handleBuildFinished(event: BuildFinishedEvent): void {
    const parts = [`Built ${shortId(event.imageId)}`, `(${event.layers} layer${event.layers === 1 ? '' : 's'}, ${formatDuration(event.durationMs)})`]
    if (event.tag) {
      parts.push(`tagged ${chalk.cyan(event.tag)}`)
    }

    console.log(chalk.bold.green(`\n✓ ${parts.join(' ')}\n`))
  }
}

import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import type {BuildEvent, Reporter, StepRef} from '../core/reporter.js'
import type {ProcessOptions, ProcessResult, ProcessRunner} from '../engine/process-runner.js'
import type {LogLine, OnLogLine} from '../engine/types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'stratum-test-'))
}

/**
 * Silent reporter: all methods are no-ops.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */},
  log() {/* noop */},
  result() {/* noop */}
}

export type RecordedLog = {
  step: StepRef;
  stream: 'stdout' | 'stderr';
  line: string;
}

/**
 * Returns a reporter that records emit() and log() calls for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: BuildEvent[]; logs: RecordedLog[]} {
  const events: BuildEvent[] = []
  const logs: RecordedLog[] = []
  const reporter: Reporter = {
    emit(event: BuildEvent) {
      events.push(event)
    },
    log(_buildId: string, step: StepRef, stream: 'stdout' | 'stderr', line: string) {
      logs.push({step, stream, line})
    },
    result() {/* noop */}
  }

  return {reporter, events, logs}
}

// -- scripted docker CLI -----------------------------------------------------

export type ScriptedResponse = Partial<ProcessResult> & {
  /** Lines replayed through the log callback before the call returns */
  lines?: LogLine[];
}

export type ScriptedCall = {
  file: string;
  args: string[];
  options?: ProcessOptions;
}

export type Script = (args: string[], options?: ProcessOptions) => ScriptedResponse | undefined

export const baseImageId = 'sha256:base'
export const defaultImageConfig = '{"entrypoint":null,"cmd":["/bin/bash"]}'

/**
 * Process runner answering Docker CLI calls without spawning anything.
 *
 * Every call is recorded. `script` may answer a call; otherwise the runner
 * behaves like a healthy daemon: inspecting by id returns `sha256:base`,
 * inspecting the image config returns `defaultImageConfig` and each commit
 * returns a fresh `sha256:layerN`.
 */
export class ScriptedProcessRunner implements ProcessRunner {
  readonly calls: ScriptedCall[] = []
  private commits = 0

  constructor(private readonly script: Script = () => undefined) {}

  async run(file: string, args: string[], options?: ProcessOptions, onLogLine?: OnLogLine): Promise<ProcessResult> {
    this.calls.push({file, args, options})
    const {lines = [], ...response} = this.script(args, options) ?? this.defaultResponse(args)
    for (const line of lines) {
      onLogLine?.(line)
    }

    return {exitCode: 0, stdout: '', stderr: '', timedOut: false, cancelled: false, ...response}
  }

  /** Docker subcommands issued, in order. */
  get subcommands(): string[] {
    return this.calls.map(c => c.args[0])
  }

  /** Argument vectors of every call to the given subcommand. */
  argsOf(subcommand: string): string[][] {
    return this.calls.filter(c => c.args[0] === subcommand).map(c => c.args)
  }

  private defaultResponse(args: string[]): ScriptedResponse {
    if (args[0] === '--version') {
      return {stdout: 'Docker version 27.0.0'}
    }

    if (args[0] === 'image' && args[3] === '{{.Id}}') {
      return {stdout: baseImageId + '\n'}
    }

    if (args[0] === 'image') {
      return {stdout: defaultImageConfig}
    }

    if (args[0] === 'commit') {
      this.commits++
      return {stdout: `sha256:layer${this.commits}\n`}
    }

    return {}
  }
}

/** Parent image ids of the steps run so far, read from their config inspections. */
export function parentsOf(runner: ScriptedProcessRunner): string[] {
  return runner.argsOf('image')
    .filter(args => args[3] !== '{{.Id}}')
    .map(args => args.at(-1) ?? '')
}

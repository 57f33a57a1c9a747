import {execa} from 'execa'
import type {OnLogLine} from './types.js'

export type ProcessOptions = {
  /** Complete environment of the process; the host environment is not inherited */
  env?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type ProcessResult = {
  /** Exit code; -1 when the process was killed or never started */
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  cancelled: boolean;
}

/**
 * Runs a command and reports its exit status and output.
 *
 * This is the only place subprocesses are spawned, so tests can replace it
 * with a scripted runner and observe every command issued.
 */
export type ProcessRunner = {
  run(file: string, args: string[], options?: ProcessOptions, onLogLine?: OnLogLine): Promise<ProcessResult>;
}

export class ExecaProcessRunner implements ProcessRunner {
  async run(file: string, args: string[], options: ProcessOptions = {}, onLogLine?: OnLogLine): Promise<ProcessResult> {
    const proc = execa(file, args, {
      env: options.env,
      extendEnv: options.env === undefined,
      reject: false,
      timeout: options.timeoutMs,
      cancelSignal: options.signal
    })

    const stdout: string[] = []
    const stderr: string[] = []

    const stdoutDone = (async () => {
      for await (const line of proc.iterable({from: 'stdout'})) {
        stdout.push(String(line))
        onLogLine?.({stream: 'stdout', line: String(line)})
      }
    })()

    const stderrDone = (async () => {
      for await (const line of proc.iterable({from: 'stderr'})) {
        stderr.push(String(line))
        onLogLine?.({stream: 'stderr', line: String(line)})
      }
    })()

    const [result] = await Promise.all([proc, stdoutDone, stderrDone])

    return {
      exitCode: result.exitCode ?? -1,
      stdout: stdout.join('\n'),
      stderr: stderr.join('\n'),
      timedOut: result.timedOut,
      cancelled: result.isCanceled
    }
  }
}

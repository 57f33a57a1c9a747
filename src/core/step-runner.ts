import {createWriteStream, type WriteStream} from 'node:fs'
import {join} from 'node:path'
import type {BuildStore, StepRecord} from '../engine/build-store.js'
import type {LayerExecutor} from '../engine/executor.js'
import type {Layer} from '../engine/snapshot.js'
import type {StepExecutionResult, StepRequest} from '../engine/types.js'
import {StagingError, StepFailureError} from '../errors.js'
import {displayName, type Step} from '../types.js'
import type {Reporter, StepRef} from './reporter.js'

export type StepRunOptions = {
  store: BuildStore;
  buildId: string;
  step: Step;
  /** 1-based position of the step */
  index: number;
  /** Id of the layer the step runs on */
  parentId: string;
  labels?: Record<string, string>;
  signal?: AbortSignal;
}

export type StepRunOutcome =
  | {status: 'success'; layer: Layer; record: StepRecord}
  | {status: 'failure'; error: StepFailureError; record: StepRecord}
  | {status: 'cancelled'; record: StepRecord}

/**
 * Executes a single step on top of its parent layer.
 *
 * Logs go to `stdout.log` / `stderr.log` in the step's record directory and
 * to the reporter. A failing step comes back as a `StepFailureError` carrying
 * the tail of its output, and so does one the executor or the log files throw
 * on; the caller decides to stop.
 */
export class StepRunner {
  static readonly outputTailLines = 20

  constructor(
    private readonly executor: LayerExecutor,
    private readonly reporter: Reporter
  ) {}

  async run(options: StepRunOptions): Promise<StepRunOutcome> {
    const {store, buildId, step, index, parentId, labels, signal} = options
    const stepRef: StepRef = {index, id: step.id, displayName: displayName(step)}

    this.reporter.emit({event: 'STEP_STARTING', buildId, step: stepRef})

    const logDir = await store.prepareStep(buildId, index, step.id)
    const logErrors: unknown[] = []
    const stdoutLog = openLog(join(logDir, 'stdout.log'), logErrors)
    const stderrLog = openLog(join(logDir, 'stderr.log'), logErrors)
    const tail: string[] = []

    const startedAt = new Date()
    let result: StepExecutionResult
    let failure: unknown
    try {
      result = await this.executor.runStep(
        parentId,
        toRequest(step, buildId, index, labels),
        ({stream, line}) => {
          if (stream === 'stdout') {
            stdoutLog.write(line + '\n')
          } else {
            stderrLog.write(line + '\n')
          }

          tail.push(line)
          if (tail.length > StepRunner.outputTailLines) {
            tail.shift()
          }

          this.reporter.log(buildId, stepRef, stream, line)
        },
        signal
      )
    } catch (error) {
      // A commit or inspect error still belongs to this step
      failure = error
      result = {
        exitCode: -1,
        startedAt,
        finishedAt: new Date(),
        error: error instanceof Error ? error.message : String(error)
      }
    } finally {
      await closeStream(stdoutLog)
      await closeStream(stderrLog)
    }

    if (failure === undefined && logErrors.length > 0) {
      failure = new StagingError(`Failed to write logs of step ${step.id}`, {cause: logErrors[0]})
    }

    this.reporter.result(buildId, stepRef, result)
    const durationMs = result.finishedAt.getTime() - result.startedAt.getTime()
    const record: StepRecord = {
      index,
      stepId: step.id,
      stepName: step.name,
      kind: step.kind,
      workdir: step.workdir,
      cmd: step.kind === 'run' ? step.cmd : [step.source, step.destination],
      status: 'success',
      exitCode: result.exitCode,
      layerId: result.layerId,
      startedAt: result.startedAt.toISOString(),
      finishedAt: result.finishedAt.toISOString(),
      durationMs,
      timedOut: result.timedOut
    }

    if (result.cancelled || (failure !== undefined && signal?.aborted)) {
      return {status: 'cancelled', record: {...record, status: 'cancelled'}}
    }

    if (failure === undefined && result.exitCode === 0 && result.layerId && !result.timedOut) {
      this.reporter.emit({event: 'STEP_FINISHED', buildId, step: stepRef, layerId: result.layerId, durationMs})
      return {status: 'success', layer: {id: result.layerId, index, stepId: step.id}, record}
    }

    const timedOut = result.timedOut ?? false
    this.reporter.emit({event: 'STEP_FAILED', buildId, step: stepRef, exitCode: result.exitCode, timedOut})
    return {
      status: 'failure',
      error: new StepFailureError(index, step.id, result.exitCode, tail, timedOut, {cause: failure ?? result.error}),
      record: {...record, status: 'failure'}
    }
  }
}

function toRequest(step: Step, buildId: string, index: number, labels?: Record<string, string>): StepRequest {
  const name = `stratum-${buildId}-${index}-${step.id}`
  if (step.kind === 'copy') {
    return {
      kind: 'copy',
      name,
      stepId: step.id,
      workdir: step.workdir,
      source: step.source,
      destination: step.destination,
      intoDirectory: step.intoDirectory,
      labels
    }
  }

  return {
    kind: 'run',
    name,
    stepId: step.id,
    workdir: step.workdir,
    cmd: step.cmd,
    env: step.env,
    network: step.network,
    timeoutSec: step.timeoutSec,
    labels
  }
}

/** Opens a log file; write errors are collected instead of thrown. */
function openLog(path: string, errors: unknown[]): WriteStream {
  return createWriteStream(path).on('error', error => {
    errors.push(error)
  })
}

async function closeStream(stream: WriteStream): Promise<void> {
  if (stream.destroyed) {
    return
  }

  return new Promise(resolve => {
    stream.once('close', () => {
      resolve()
    })
    stream.end()
  })
}

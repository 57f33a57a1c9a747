import {formatImageRef} from '../engine/docker-executor.js'
import {BuildStore, type BuildRecord} from '../engine/build-store.js'
import type {LayerExecutor} from '../engine/executor.js'
import {Snapshot, type BaseImage} from '../engine/snapshot.js'
import {BuildCancelledError, StepFailureError} from '../errors.js'
import {displayName, type BuildPlan} from '../types.js'
import type {BuildLoader, LoadOptions} from './build-loader.js'
import type {Reporter} from './reporter.js'
import {StepRunner} from './step-runner.js'

export type BuildOptions = {
  /** Reference to point at the final image (e.g. "myapp:dev") */
  tag?: string;
  /** Pull the base image before resolving it (default: true) */
  pull?: boolean;
  /** Aborting terminates the running step and ends the build as cancelled */
  signal?: AbortSignal;
}

/** Result of a successful build. */
export type BuildResult = {
  buildId: string;
  /** Base image plus one layer per step, in step order */
  snapshot: Snapshot;
  /** Id of the final image (the snapshot's top) */
  imageId: string;
  tag?: string;
  durationMs: number;
  /** Step ids in the order they ran */
  trace: string[];
}

/**
 * Runs a build plan: resolves the base image, then executes each step on top
 * of the previous one, strictly in declaration order.
 *
 * ## Workflow
 *
 * 1. **Record**: Opens a staging record for the build in the store
 * 2. **Base**: Resolves (and by default pulls) the base image
 * 3. **Steps**: For each step, in order:
 *    a. Runs it on the current top layer
 *    b. On success: appends the committed layer to the snapshot
 *    c. On failure: stops; no later step starts, no snapshot is returned
 * 4. **Completion**: Tags the final image if asked, commits the record
 *
 * Every build is a full run: the base is resolved again and every step
 * executes, whatever ran before. Failed builds are never rolled back; their
 * committed layers are simply unreferenced.
 */
export class BuildRunner {
  private readonly stepRunner: StepRunner

  constructor(
    private readonly loader: BuildLoader,
    private readonly executor: LayerExecutor,
    private readonly reporter: Reporter,
    private readonly store: BuildStore
  ) {
    this.stepRunner = new StepRunner(executor, reporter)
  }

  /**
   * Loads a build file and runs it.
   */
  async run(buildFilePath: string, options?: BuildOptions & LoadOptions): Promise<BuildResult> {
    const plan = await this.loader.load(buildFilePath, {env: options?.env})
    return this.execute(plan, options)
  }

  /**
   * Runs an already resolved plan.
   * @throws StepFailureError when a step fails
   * @throws BuildCancelledError when the signal aborts the build
   */
  async execute(plan: BuildPlan, options?: BuildOptions): Promise<BuildResult> {
    const {tag, pull, signal} = options ?? {}
    const buildId = BuildStore.generateBuildId()
    const startedAt = new Date()
    const base = formatImageRef(plan.base)

    await this.store.cleanupStaging()
    await this.store.prepareBuild(buildId)

    const record: BuildRecord = {
      buildId,
      planId: plan.id,
      planName: plan.name,
      base,
      status: 'running',
      startedAt: startedAt.toISOString(),
      layers: [],
      steps: []
    }
    await this.store.writeRecord(record)

    this.reporter.emit({event: 'BUILD_START', buildId, planName: plan.name ?? plan.id, base, totalSteps: plan.steps.length})

    try {
      const result = await this.executeSteps(plan, buildId, record, {pull, signal})
      if (tag) {
        await this.executor.tag(result.snapshot.top, tag)
      }

      const durationMs = Date.now() - startedAt.getTime()
      record.status = 'succeeded'
      record.imageId = result.snapshot.top
      record.tag = tag
      this.reporter.emit({event: 'BUILD_FINISHED', buildId, imageId: result.snapshot.top, layers: result.snapshot.depth, durationMs, tag})
      return {buildId, ...result, imageId: result.snapshot.top, tag, durationMs}
    } catch (error) {
      this.recordFailure(record, error)
      throw error
    } finally {
      record.finishedAt = new Date().toISOString()
      record.durationMs = Date.now() - startedAt.getTime()
      await this.store.writeRecord(record)
      await this.store.commitBuild(buildId)
    }
  }

  private async executeSteps(
    plan: BuildPlan,
    buildId: string,
    record: BuildRecord,
    {pull, signal}: {pull?: boolean; signal?: AbortSignal}
  ): Promise<{snapshot: Snapshot; trace: string[]}> {
    await this.executor.check()

    let baseImage: BaseImage
    try {
      baseImage = await this.executor.resolveBase(plan.base, {pull, signal})
    } catch (error) {
      if (signal?.aborted) {
        throw new BuildCancelledError(undefined, {cause: error})
      }

      throw error
    }

    let snapshot = Snapshot.fromBase(baseImage)
    record.baseId = baseImage.id
    this.reporter.emit({event: 'BASE_RESOLVED', buildId, base: record.base, baseId: baseImage.id})

    const trace: string[] = []
    for (const [i, step] of plan.steps.entries()) {
      if (signal?.aborted) {
        throw new BuildCancelledError(snapshot, {cause: signal.reason})
      }

      const index = i + 1
      trace.push(step.id)
      const outcome = await this.stepRunner.run({
        store: this.store,
        buildId,
        step,
        index,
        parentId: snapshot.top,
        labels: plan.labels,
        signal
      })
      record.steps.push(outcome.record)

      if (outcome.status === 'cancelled') {
        throw new BuildCancelledError(snapshot, {cause: signal?.reason})
      }

      if (outcome.status === 'failure') {
        record.failure = {index, stepId: step.id, exitCode: outcome.error.exitCode, timedOut: outcome.error.timedOut}
        throw outcome.error
      }

      snapshot = snapshot.append(outcome.layer)
      record.layers.push(outcome.layer.id)
      await this.store.writeRecord(record)
    }

    return {snapshot, trace}
  }

  private recordFailure(record: BuildRecord, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error)
    record.error = message

    if (error instanceof BuildCancelledError) {
      record.status = 'cancelled'
      this.reporter.emit({event: 'BUILD_CANCELLED', buildId: record.buildId, completedSteps: error.snapshot?.depth ?? 0})
      return
    }

    record.status = 'failed'
    const failedIndex = error instanceof StepFailureError ? error.index : undefined
    const failedStep = record.steps.find(s => s.index === failedIndex)
    this.reporter.emit({
      event: 'BUILD_FAILED',
      buildId: record.buildId,
      step: failedStep
        ? {index: failedStep.index, id: failedStep.stepId, displayName: displayName({id: failedStep.stepId, name: failedStep.stepName})}
        : undefined,
      message
    })
  }
}

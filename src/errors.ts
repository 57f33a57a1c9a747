import type {Snapshot} from './engine/snapshot.js'

export class StratumError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'StratumError'
  }
}

// -- Docker errors -----------------------------------------------------------

export class DockerError extends StratumError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'DockerError'
  }
}

export class DockerNotAvailableError extends DockerError {
  constructor(options?: {cause?: unknown}) {
    super('DOCKER_NOT_AVAILABLE', 'Docker CLI not found. Please install Docker.', options)
    this.name = 'DockerNotAvailableError'
  }
}

export class ImagePullError extends DockerError {
  constructor(image: string, options?: {cause?: unknown}) {
    super('IMAGE_PULL_FAILED', `Failed to resolve base image "${image}"`, options)
    this.name = 'ImagePullError'
  }
}

export class LayerCommitError extends DockerError {
  constructor(stepId: string, options?: {cause?: unknown}) {
    super('LAYER_COMMIT_FAILED', `Failed to commit layer for step ${stepId}`, options)
    this.name = 'LayerCommitError'
  }
}

// -- Build errors ------------------------------------------------------------

export class BuildError extends StratumError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'BuildError'
  }
}

export class ValidationError extends BuildError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VALIDATION_ERROR', message, options)
    this.name = 'ValidationError'
  }
}

function stepFailureMessage(index: number, stepId: string, exitCode: number, timedOut: boolean, cause: unknown): string {
  if (timedOut) {
    return `Step ${index} (${stepId}) timed out`
  }

  if (cause instanceof Error) {
    return `Step ${index} (${stepId}) failed: ${cause.message}`
  }

  return `Step ${index} (${stepId}) failed with exit code ${exitCode}`
}

/**
 * The only way a build fails once its steps have started: step `index`
 * (1-based) exited non-zero, ran out of time, or could not be executed or
 * committed (`cause` then holds the underlying error). Later steps never ran.
 */
export class StepFailureError extends BuildError {
  constructor(
    readonly index: number,
    readonly stepId: string,
    readonly exitCode: number,
    readonly output: string[],
    readonly timedOut = false,
    options?: {cause?: unknown}
  ) {
    super('STEP_FAILED', stepFailureMessage(index, stepId, exitCode, timedOut, options?.cause), options)
    this.name = 'StepFailureError'
  }
}

export class BuildCancelledError extends BuildError {
  /**
   * @param snapshot - Layers completed before the abort; absent when the
   * build was cancelled while resolving its base image
   */
  constructor(
    readonly snapshot?: Snapshot,
    options?: {cause?: unknown}
  ) {
    super('BUILD_CANCELLED', `Build cancelled after ${snapshot?.depth ?? 0} completed step(s)`, options)
    this.name = 'BuildCancelledError'
  }
}

// -- Store errors ------------------------------------------------------------

export class StoreError extends StratumError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'StoreError'
  }
}

export class BuildNotFoundError extends StoreError {
  constructor(buildId: string, options?: {cause?: unknown}) {
    super('BUILD_NOT_FOUND', `Build not found: ${buildId}`, options)
    this.name = 'BuildNotFoundError'
  }
}

export class StagingError extends StoreError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('STAGING_FAILED', message, options)
    this.name = 'StagingError'
  }
}

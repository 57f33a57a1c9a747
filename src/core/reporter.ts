import pino from 'pino'
import type {StepExecutionResult} from '../engine/types.js'

/** Reference to a step for display and keying purposes. */
export type StepRef = {
  /** 1-based position in the plan */
  index: number;
  id: string;
  displayName: string;
}

/**
 * Discriminated union of build execution events.
 *
 * Lifecycle:
 * 1. BUILD_START - Build begins, base image being resolved
 * 2. BASE_RESOLVED - Base image resolved to an id
 * 3. For each step, in order:
 *    a. STEP_STARTING - Step begins execution
 *    b. STEP_FINISHED - Step succeeded, layer committed
 *       OR STEP_FAILED - Step failed, no later step starts
 * 4. BUILD_FINISHED - Every step completed
 *    OR BUILD_FAILED - A step failed (or the build errored before its steps)
 *    OR BUILD_CANCELLED - The build was aborted
 */
export type BuildStartEvent = {
  event: 'BUILD_START';
  buildId: string;
  planName: string;
  base: string;
  totalSteps: number;
}

export type BaseResolvedEvent = {
  event: 'BASE_RESOLVED';
  buildId: string;
  base: string;
  baseId: string;
}

export type StepStartingEvent = {
  event: 'STEP_STARTING';
  buildId: string;
  step: StepRef;
}

export type StepFinishedEvent = {
  event: 'STEP_FINISHED';
  buildId: string;
  step: StepRef;
  layerId: string;
  durationMs: number;
}

export type StepFailedEvent = {
  event: 'STEP_FAILED';
  buildId: string;
  step: StepRef;
  exitCode: number;
  timedOut: boolean;
}

export type BuildFinishedEvent = {
  event: 'BUILD_FINISHED';
  buildId: string;
  imageId: string;
  layers: number;
  durationMs: number;
  tag?: string;
}

export type BuildFailedEvent = {
  event: 'BUILD_FAILED';
  buildId: string;
  /** The failing step; absent when the build failed before its steps ran */
  step?: StepRef;
  message: string;
}

export type BuildCancelledEvent = {
  event: 'BUILD_CANCELLED';
  buildId: string;
  completedSteps: number;
}

export type BuildEvent =
  | BuildStartEvent
  | BaseResolvedEvent
  | StepStartingEvent
  | StepFinishedEvent
  | StepFailedEvent
  | BuildFinishedEvent
  | BuildFailedEvent
  | BuildCancelledEvent

/**
 * Interface for reporting build execution events.
 */
export type Reporter = {
  /** Reports build and step state transitions */
  emit(event: BuildEvent): void;
  /** Reports step logs (stdout/stderr) */
  log(buildId: string, step: StepRef, stream: 'stdout' | 'stderr', line: string): void;
  /** Reports step execution result */
  result(buildId: string, step: StepRef, result: StepExecutionResult): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger: pino.Logger

  constructor(logger?: pino.Logger) {
    this.logger = logger ?? pino({level: 'info'})
  }

  emit(event: BuildEvent): void {
    if (event.event === 'STEP_FAILED' || event.event === 'BUILD_FAILED') {
      this.logger.error(event)
    } else {
      this.logger.info(event)
    }
  }

  log(buildId: string, step: StepRef, stream: 'stdout' | 'stderr', line: string): void {
    this.logger.info({buildId, stepId: step.id, stream, line})
  }

  result(buildId: string, step: StepRef, result: StepExecutionResult): void {
    this.logger.debug({buildId, stepId: step.id, result})
  }
}

import type {NetworkMode} from '../types.js'

/**
 * Log line from a step's process.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving real-time logs during step execution.
 */
export type OnLogLine = (log: LogLine) => void

type StepRequestBase = {
  /** Container name, unique per step execution */
  name: string;
  /** Step identifier, used in error messages */
  stepId: string;
  /** Absolute working directory inside the image */
  workdir: string;
  /** Labels applied to the committed layer */
  labels?: Record<string, string>;
}

/**
 * Request to execute a command on top of a parent layer.
 */
export type RunStepRequest = StepRequestBase & {
  kind: 'run';
  /** Command and arguments to execute */
  cmd: string[];
  /** Environment variables passed to the command (the complete set) */
  env: Record<string, string>;
  /** Network isolation mode */
  network: NetworkMode;
  /** Execution timeout in seconds (undefined = no timeout) */
  timeoutSec?: number;
}

/**
 * Request to copy a host directory onto a parent layer.
 */
export type CopyStepRequest = StepRequestBase & {
  kind: 'copy';
  /** Absolute path on the host */
  source: string;
  /** Absolute path in the image */
  destination: string;
  /** A file source is copied inside `destination` rather than onto it */
  intoDirectory: boolean;
}

export type StepRequest = RunStepRequest | CopyStepRequest

/**
 * Result of a step execution.
 */
export type StepExecutionResult = {
  /** Exit code (0 = success); -1 when the process never exited on its own */
  exitCode: number;
  /** Execution start timestamp */
  startedAt: Date;
  /** Execution end timestamp */
  finishedAt: Date;
  /** Id of the committed layer, present only when exitCode is 0 */
  layerId?: string;
  /** True when the step exceeded its timeout */
  timedOut?: boolean;
  /** True when the step was aborted through its signal */
  cancelled?: boolean;
  /** Error message if execution failed */
  error?: string;
}

export {BuildRunner, type BuildOptions, type BuildResult} from './build-runner.js'
export {StepRunner, type StepRunOptions, type StepRunOutcome} from './step-runner.js'
export {BuildLoader, parseImageRef, slugify, type LoadOptions} from './build-loader.js'
export {ConsoleReporter} from './reporter.js'
export type {
  Reporter,
  StepRef,
  BuildEvent,
  BuildStartEvent,
  BaseResolvedEvent,
  StepStartingEvent,
  StepFinishedEvent,
  StepFailedEvent,
  BuildFinishedEvent,
  BuildFailedEvent,
  BuildCancelledEvent
} from './reporter.js'
export {loadEnvFile} from './env-file.js'
export {formatDuration, shortId} from './utils.js'

export {BuildStore, type BuildRecord, type StepRecord} from './build-store.js'
export {LayerExecutor} from './executor.js'
export {DockerCliExecutor, formatImageRef} from './docker-executor.js'
export {ExecaProcessRunner, type ProcessRunner, type ProcessOptions, type ProcessResult} from './process-runner.js'
export {Snapshot, type Layer, type BaseImage} from './snapshot.js'
export type {LogLine, OnLogLine, StepRequest, RunStepRequest, CopyStepRequest, StepExecutionResult} from './types.js'

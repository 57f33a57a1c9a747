/**
 * Programmatic image builds.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {BuildLoader, BuildRunner, BuildStore, ConsoleReporter, DockerCliExecutor} from 'stratum'
 *
 * const store = await BuildStore.open('.stratum')
 * const runner = new BuildRunner(new BuildLoader(), new DockerCliExecutor(), new ConsoleReporter(), store)
 *
 * const {snapshot, imageId} = await runner.execute({
 *   id: 'app',
 *   base: {name: 'archlinux', tag: 'latest'},
 *   steps: [
 *     {kind: 'copy', id: 'sources', workdir: '/app', source: process.cwd(), destination: '/app', intoDirectory: true},
 *     {kind: 'run', id: 'toolchain', workdir: '/app', cmd: ['pacman', '-Sy', '--noconfirm', 'rust'], env: {}, network: 'bridge'},
 *     {kind: 'run', id: 'build', workdir: '/app', cmd: ['cargo', 'build'], env: {}, network: 'bridge'}
 *   ]
 * }, {tag: 'app:dev'})
 * ```
 */

// Engine layer: layer production and build records
export {
  BuildStore,
  LayerExecutor,
  DockerCliExecutor,
  ExecaProcessRunner,
  Snapshot,
  formatImageRef,
  type BuildRecord,
  type StepRecord,
  type ProcessRunner,
  type ProcessOptions,
  type ProcessResult,
  type Layer,
  type BaseImage,
  type LogLine,
  type OnLogLine,
  type StepRequest,
  type RunStepRequest,
  type CopyStepRequest,
  type StepExecutionResult
} from './engine/index.js'

// Core layer: build orchestration
export {
  BuildRunner,
  StepRunner,
  BuildLoader,
  ConsoleReporter,
  parseImageRef,
  slugify,
  loadEnvFile,
  formatDuration,
  shortId,
  type BuildOptions,
  type BuildResult,
  type LoadOptions,
  type Reporter,
  type StepRef,
  type BuildEvent
} from './core/index.js'

export type {
  ImageRef,
  NetworkMode,
  Step,
  RunStep,
  CopyStep,
  BuildPlan,
  BuildDefinition,
  StepDefinition,
  RunStepDefinition,
  CopyStepDefinition
} from './types.js'

export {
  StratumError,
  DockerError,
  DockerNotAvailableError,
  ImagePullError,
  LayerCommitError,
  BuildError,
  ValidationError,
  StepFailureError,
  BuildCancelledError,
  StoreError,
  BuildNotFoundError,
  StagingError
} from './errors.js'

import type {ImageRef} from '../types.js'
import type {BaseImage} from './snapshot.js'
import type {OnLogLine, StepExecutionResult, StepRequest} from './types.js'

/**
 * Abstract interface for producing image layers.
 *
 * Implementations:
 * - `DockerCliExecutor`: Uses Docker CLI (create, start, commit)
 * - Future: BuildKit, Podman, etc.
 *
 * The executor is responsible for:
 * - Resolving the base image to a content identifier
 * - Running one step on top of a parent layer and committing its diff
 * - Streaming logs in real-time
 * - Removing whatever it created to run the step, whatever the outcome
 */
export abstract class LayerExecutor {
  /**
   * Verifies that the executor is available and functional.
   * @throws If the executor is not installed or not accessible
   */
  abstract check(): Promise<void>

  /**
   * Resolves a base image reference, pulling it first when asked to.
   * @throws ImagePullError if the image cannot be resolved
   */
  abstract resolveBase(ref: ImageRef, options?: {pull?: boolean; signal?: AbortSignal}): Promise<BaseImage>

  /**
   * Executes a step on top of `parentId` and commits the result as a new layer.
   * A non-zero exit is reported in the result, never thrown.
   * @param onLogLine - Callback for real-time stdout/stderr logs
   * @param signal - Aborting terminates the running process and skips the commit
   */
  abstract runStep(
    parentId: string,
    request: StepRequest,
    onLogLine: OnLogLine,
    signal?: AbortSignal
  ): Promise<StepExecutionResult>

  /**
   * Points a human-readable reference at a layer.
   */
  abstract tag(layerId: string, reference: string): Promise<void>
}

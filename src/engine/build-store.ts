import {access, mkdir, readFile, readdir, rename, rm, writeFile} from 'node:fs/promises'
import {randomUUID} from 'node:crypto'
import {join} from 'node:path'
import {BuildNotFoundError, StagingError, StoreError} from '../errors.js'

/**
 * Outcome of one step, as recorded in a build's meta.json.
 */
export type StepRecord = {
  index: number;
  stepId: string;
  stepName?: string;
  kind: 'run' | 'copy';
  workdir: string;
  /** Command (run steps) or `[source, destination]` (copy steps) */
  cmd: string[];
  status: 'success' | 'failure' | 'cancelled';
  exitCode: number;
  layerId?: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  timedOut?: boolean;
}

/**
 * Persisted summary of a build, written as meta.json.
 */
export type BuildRecord = {
  buildId: string;
  planId: string;
  planName?: string;
  /** Base image reference (e.g. "archlinux:latest") */
  base: string;
  baseId?: string;
  status: 'running' | 'succeeded' | 'failed' | 'cancelled';
  startedAt: string;
  finishedAt?: string;
  durationMs?: number;
  /** Final image id, present only on success */
  imageId?: string;
  tag?: string;
  /** Layer ids in order, one per completed step */
  layers: string[];
  steps: StepRecord[];
  failure?: {index: number; stepId: string; exitCode: number; timedOut: boolean};
  error?: string;
}

/**
 * Record store for builds, rooted in the work directory.
 *
 * - **staging/**: Records of builds in progress
 * - **builds/**: Records of finished builds (read-only once committed)
 *
 * ## Record Lifecycle
 *
 * 1. `prepareBuild()` creates `staging/{buildId}/` with a `steps/` subdirectory
 * 2. The runner writes step logs and meta.json into it while the build runs
 * 3. Once the build reaches a terminal state, `commitBuild()` moves it to
 *    `builds/{buildId}/` (a failed or cancelled build is recorded too)
 * 4. A record still in staging/ belongs to a crashed process;
 *    `cleanupStaging()` removes it
 *
 * The store records builds; the image layers themselves live in the executor.
 *
 * @example
 * ```typescript
 * const store = await BuildStore.open('.stratum')
 * const buildId = BuildStore.generateBuildId()
 * await store.prepareBuild(buildId)
 * // ... build runs, logs go to store.stepStagingPath(buildId, 1, 'install') ...
 * await store.commitBuild(buildId)
 * ```
 */
export class BuildStore {
  /**
   * Generates a unique build identifier.
   * @returns Build ID in format: `{timestamp}-{uuid-prefix}`
   */
  static generateBuildId(): string {
    return `${Date.now()}-${randomUUID().slice(0, 8)}`
  }

  /**
   * Opens the store, creating its directories when missing.
   * @param root - Work directory
   */
  static async open(root: string): Promise<BuildStore> {
    await mkdir(join(root, 'staging'), {recursive: true})
    await mkdir(join(root, 'builds'), {recursive: true})
    return new BuildStore(root)
  }

  private constructor(readonly root: string) {}

  /**
   * Returns the staging directory path for a build.
   */
  stagingPath(buildId: string): string {
    this.validateId(buildId, 'build ID')
    return join(this.root, 'staging', buildId)
  }

  /**
   * Returns the committed record directory for a build.
   */
  buildPath(buildId: string): string {
    this.validateId(buildId, 'build ID')
    return join(this.root, 'builds', buildId)
  }

  /**
   * Returns the log directory of a step within a staging build.
   * @param index - 1-based step position
   */
  stepStagingPath(buildId: string, index: number, stepId: string): string {
    return join(this.stagingPath(buildId), 'steps', stepDirName(index, stepId))
  }

  /**
   * Returns the log directory of a step within a committed build.
   * @param index - 1-based step position
   */
  stepPath(buildId: string, index: number, stepId: string): string {
    return join(this.buildPath(buildId), 'steps', stepDirName(index, stepId))
  }

  /**
   * Prepares a staging directory for a new build.
   * @returns Absolute path to the created staging directory
   */
  async prepareBuild(buildId: string): Promise<string> {
    try {
      const path = this.stagingPath(buildId)
      await mkdir(join(path, 'steps'), {recursive: true})
      return path
    } catch (error) {
      throw new StagingError(`Failed to prepare build ${buildId}`, {cause: error})
    }
  }

  /**
   * Creates the log directory of a step in a staging build.
   */
  async prepareStep(buildId: string, index: number, stepId: string): Promise<string> {
    this.validateId(stepId, 'step ID')
    const path = this.stepStagingPath(buildId, index, stepId)
    await mkdir(path, {recursive: true})
    return path
  }

  /**
   * Writes meta.json of a staging build.
   */
  async writeRecord(record: BuildRecord): Promise<void> {
    await writeFile(join(this.stagingPath(record.buildId), 'meta.json'), JSON.stringify(record, null, 2), 'utf8')
  }

  /**
   * Moves a staging build to builds/.
   * Uses atomic rename operation for consistency.
   */
  async commitBuild(buildId: string): Promise<void> {
    try {
      await rename(this.stagingPath(buildId), this.buildPath(buildId))
    } catch (error) {
      throw new StagingError(`Failed to commit build ${buildId}`, {cause: error})
    }
  }

  /**
   * Removes all staging directories.
   * Called before a build starts, to clean up after crashed processes.
   */
  async cleanupStaging(): Promise<void> {
    const stagingDir = join(this.root, 'staging')
    const entries = await readdir(stagingDir, {withFileTypes: true})
    for (const entry of entries) {
      if (entry.isDirectory()) {
        await rm(join(stagingDir, entry.name), {recursive: true, force: true})
      }
    }
  }

  /**
   * Lists committed build IDs, oldest first.
   */
  async listBuilds(): Promise<string[]> {
    const entries = await readdir(join(this.root, 'builds'), {withFileTypes: true})
    return entries.filter(e => e.isDirectory()).map(e => e.name).sort()
  }

  /**
   * Reads meta.json of a committed build.
   * @throws BuildNotFoundError if the build has no committed record
   */
  async readRecord(buildId: string): Promise<BuildRecord> {
    const path = join(this.buildPath(buildId), 'meta.json')
    let content: string
    try {
      content = await readFile(path, 'utf8')
    } catch (error) {
      throw new BuildNotFoundError(buildId, {cause: error})
    }

    return JSON.parse(content) as BuildRecord
  }

  /**
   * Removes a committed build record.
   * @throws BuildNotFoundError if the build does not exist
   */
  async removeBuild(buildId: string): Promise<void> {
    const path = this.buildPath(buildId)
    try {
      await access(path)
    } catch (error) {
      throw new BuildNotFoundError(buildId, {cause: error})
    }

    await rm(path, {recursive: true, force: true})
  }

  /**
   * Validates an identifier used as a path segment, to prevent path traversal.
   * @internal
   */
  private validateId(id: string, context: string): void {
    if (!/^[\w-]+$/.test(id)) {
      throw new StoreError('INVALID_BUILD_ID', `Invalid ${context}: ${id}. Must contain only alphanumeric characters, dashes, and underscores.`)
    }
  }
}

function stepDirName(index: number, stepId: string): string {
  return `${String(index).padStart(2, '0')}-${stepId}`
}

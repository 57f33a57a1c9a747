import process from 'node:process'
import {stat} from 'node:fs/promises'
import {basename, posix} from 'node:path'
import {DockerNotAvailableError, ImagePullError, LayerCommitError} from '../errors.js'
import type {ImageRef} from '../types.js'
import {LayerExecutor} from './executor.js'
import {ExecaProcessRunner, type ProcessResult, type ProcessRunner} from './process-runner.js'
import type {BaseImage} from './snapshot.js'
import type {CopyStepRequest, OnLogLine, StepExecutionResult, StepRequest} from './types.js'

/**
 * Build a minimal environment for the Docker CLI process.
 * Only PATH, HOME, and DOCKER_* are kept, so host variables never reach a
 * step: its environment is exactly what the step declares via `-e`.
 */
function dockerCliEnv(): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key.startsWith('DOCKER_'))) {
      env[key] = value
    }
  }

  return env
}

/** Entrypoint and default command of an image, restored on every commit. */
type ImageEntrypoint = {
  entrypoint: string[] | null;
  cmd: string[] | null;
}

/** Reads a `string[] | null` field from parsed JSON; undefined when absent or malformed. */
function readStringArrayField(value: unknown, key: string): string[] | null | undefined {
  if (typeof value !== 'object' || value === null) {
    return undefined
  }

  const field: unknown = Reflect.get(value, key)
  if (field === null) {
    return null
  }

  if (Array.isArray(field) && field.every((v): v is string => typeof v === 'string')) {
    return field
  }

  return undefined
}

/** Where `docker cp` reads and writes, and the directory it needs to exist. */
type CopyTarget = {
  source: string;
  destination: string;
  directory: string;
}

/**
 * Directories are copied by content so `destination` receives the files, not
 * a nested directory. A file lands inside `destination` when it names a
 * directory, and onto it otherwise.
 */
async function resolveCopyTarget(request: CopyStepRequest): Promise<CopyTarget> {
  if ((await stat(request.source)).isDirectory()) {
    return {source: `${request.source}/.`, destination: request.destination, directory: request.destination}
  }

  if (request.intoDirectory) {
    return {
      source: request.source,
      destination: posix.join(request.destination, basename(request.source)),
      directory: request.destination
    }
  }

  return {source: request.source, destination: request.destination, directory: posix.dirname(request.destination)}
}

export function formatImageRef(ref: ImageRef): string {
  return `${ref.name}:${ref.tag}`
}

/**
 * Produces layers with the Docker CLI, the way a Dockerfile build does:
 * each step is a container created from the parent image, run (or filled with
 * `docker cp`), then committed.
 */
export class DockerCliExecutor extends LayerExecutor {
  private readonly env = dockerCliEnv()

  constructor(private readonly runner: ProcessRunner = new ExecaProcessRunner()) {
    super()
  }

  async check(): Promise<void> {
    let result: ProcessResult
    try {
      result = await this.docker(['--version'])
    } catch (error) {
      throw new DockerNotAvailableError({cause: error})
    }

    if (result.exitCode !== 0) {
      throw new DockerNotAvailableError()
    }
  }

  async resolveBase(ref: ImageRef, options?: {pull?: boolean; signal?: AbortSignal}): Promise<BaseImage> {
    const image = formatImageRef(ref)

    if (options?.pull ?? true) {
      const pulled = await this.docker(['pull', image], {signal: options?.signal})
      if (pulled.exitCode !== 0) {
        throw new ImagePullError(image, {cause: pulled.stderr || undefined})
      }
    }

    const inspected = await this.docker(['image', 'inspect', '--format', '{{.Id}}', image], {signal: options?.signal})
    const id = inspected.stdout.trim()
    if (inspected.exitCode !== 0 || !id) {
      throw new ImagePullError(image, {cause: inspected.stderr || undefined})
    }

    return {ref, id}
  }

  async runStep(
    parentId: string,
    request: StepRequest,
    onLogLine: OnLogLine,
    signal?: AbortSignal
  ): Promise<StepExecutionResult> {
    const startedAt = new Date()
    const restore = await this.inspectEntrypoint(parentId)

    let target: CopyTarget | undefined
    if (request.kind === 'copy') {
      try {
        target = await resolveCopyTarget(request)
      } catch (error) {
        const line = `Cannot read copy source ${request.source}: ${error instanceof Error ? error.message : String(error)}`
        onLogLine({stream: 'stderr', line})
        return {exitCode: 1, startedAt, finishedAt: new Date(), error: line}
      }
    }

    try {
      const created = await this.docker(this.buildCreateArgs(parentId, request, target), {signal})
      if (created.exitCode !== 0) {
        return this.failed(startedAt, created, onLogLine)
      }

      let executed = await this.start(request, onLogLine, signal)
      if (target && executed.exitCode === 0 && !executed.cancelled) {
        executed = await this.docker(['cp', target.source, `${request.name}:${target.destination}`], {signal}, onLogLine)
      }

      if (executed.exitCode !== 0 || executed.timedOut || executed.cancelled) {
        return {
          exitCode: executed.exitCode,
          startedAt,
          finishedAt: new Date(),
          timedOut: executed.timedOut,
          cancelled: executed.cancelled
        }
      }

      const committed = await this.docker(['commit', ...this.commitChanges(restore, request.labels), request.name])
      const layerId = committed.stdout.trim()
      if (committed.exitCode !== 0 || !layerId) {
        throw new LayerCommitError(request.stepId, {cause: committed.stderr || undefined})
      }

      return {exitCode: 0, startedAt, finishedAt: new Date(), layerId}
    } finally {
      await this.cleanup(request.name)
    }
  }

  async tag(layerId: string, reference: string): Promise<void> {
    const result = await this.docker(['tag', layerId, reference])
    if (result.exitCode !== 0) {
      throw new Error(`Failed to tag ${layerId} as ${reference}: ${result.stderr}`)
    }
  }

  /**
   * Build `docker create` arguments. The entrypoint is cleared so the step
   * command runs as given, like a Dockerfile RUN. A copy container only
   * creates the directory the files are copied into.
   */
  private buildCreateArgs(parentId: string, request: StepRequest, target?: CopyTarget): string[] {
    const args = [
      'create',
      '--name',
      request.name,
      '--label',
      'stratum=true',
      '--workdir',
      request.workdir,
      '--entrypoint',
      ''
    ]

    if (request.kind === 'copy') {
      args.push('--network', 'none', parentId, 'mkdir', '-p', target?.directory ?? request.destination)
      return args
    }

    args.push('--network', request.network)
    for (const [key, value] of Object.entries(request.env)) {
      args.push('-e', `${key}=${value}`)
    }

    args.push(parentId, ...request.cmd)
    return args
  }

  private async start(request: StepRequest, onLogLine: OnLogLine, signal?: AbortSignal): Promise<ProcessResult> {
    const timeoutSec = request.kind === 'run' ? request.timeoutSec : undefined
    return this.docker(['start', '--attach', request.name], {
      timeoutMs: timeoutSec ? Math.ceil(timeoutSec * 1000) : undefined,
      signal
    }, onLogLine)
  }

  private commitChanges(restore: ImageEntrypoint, labels?: Record<string, string>): string[] {
    const changes = [
      '--change',
      `ENTRYPOINT ${JSON.stringify(restore.entrypoint ?? [])}`,
      '--change',
      `CMD ${JSON.stringify(restore.cmd ?? [])}`
    ]

    for (const [key, value] of Object.entries(labels ?? {})) {
      changes.push('--change', `LABEL ${key}=${JSON.stringify(value)}`)
    }

    return changes
  }

  private async inspectEntrypoint(imageId: string): Promise<ImageEntrypoint> {
    const result = await this.docker([
      'image',
      'inspect',
      '--format',
      '{"entrypoint":{{json .Config.Entrypoint}},"cmd":{{json .Config.Cmd}}}',
      imageId
    ])
    if (result.exitCode !== 0) {
      throw new ImagePullError(imageId, {cause: result.stderr || undefined})
    }

    let config: unknown
    try {
      config = JSON.parse(result.stdout)
    } catch (error) {
      throw new ImagePullError(imageId, {cause: error})
    }

    const entrypoint = readStringArrayField(config, 'entrypoint')
    const cmd = readStringArrayField(config, 'cmd')
    if (entrypoint === undefined || cmd === undefined) {
      throw new ImagePullError(imageId, {cause: `Unexpected image configuration: ${result.stdout}`})
    }

    return {entrypoint, cmd}
  }

  private failed(startedAt: Date, result: ProcessResult, onLogLine: OnLogLine): StepExecutionResult {
    for (const line of result.stderr.split('\n').filter(Boolean)) {
      onLogLine({stream: 'stderr', line})
    }

    return {
      exitCode: result.exitCode,
      startedAt,
      finishedAt: new Date(),
      cancelled: result.cancelled,
      error: result.stderr || undefined
    }
  }

  /**
   * Force-remove a step container. Also terminates it when the attached
   * client was killed by a timeout or an abort.
   */
  private async cleanup(name: string): Promise<void> {
    await this.docker(['rm', '--force', '--volumes', name])
  }

  private async docker(args: string[], options?: {timeoutMs?: number; signal?: AbortSignal}, onLogLine?: OnLogLine): Promise<ProcessResult> {
    return this.runner.run('docker', args, {env: this.env, ...options}, onLogLine)
  }
}

import {readFile} from 'node:fs/promises'
import {basename, dirname, extname, isAbsolute, posix, resolve} from 'node:path'
import {deburr} from 'lodash-es'
import {parse as parseYaml} from 'yaml'
import {ValidationError} from '../errors.js'
import {
  isCopyStep,
  type BuildDefinition,
  type BuildPlan,
  type CopyStepDefinition,
  type ImageRef,
  type RunStepDefinition,
  type Step,
  type StepDefinition
} from '../types.js'

export type LoadOptions = {
  /** Extra environment merged into every run step (lowest priority) */
  env?: Record<string, string>;
}

/**
 * Turns a build file into a `BuildPlan`.
 *
 * Resolution makes everything explicit: each step gets its own working
 * directory, environment and absolute host paths, so the runner never
 * consults defaults or the current directory.
 */
export class BuildLoader {
  async load(filePath: string, options?: LoadOptions): Promise<BuildPlan> {
    const content = await readFile(filePath, 'utf8')
    return this.parse(content, filePath, options)
  }

  parse(content: string, filePath: string, options?: LoadOptions): BuildPlan {
    const input = parseBuildFile(content, filePath)
    if (typeof input !== 'object' || input === null || Array.isArray(input)) {
      throw new ValidationError('Invalid build file: expected an object at the top level')
    }

    const definition = input as BuildDefinition

    if (typeof definition.from !== 'string' || !definition.from) {
      throw new ValidationError('Invalid build file: "from" must name a base image')
    }

    const id = definition.id ?? slugify(definition.name ?? basename(filePath, extname(filePath)))
    this.validateIdentifier(id, 'build id')

    const steps = definition.steps ?? []
    if (!Array.isArray(steps)) {
      throw new ValidationError('Invalid build file: steps must be an array')
    }

    const workdir = definition.workdir ?? '/'
    this.validateWorkdir(workdir, 'build')
    this.validateStringRecord(definition.env, 'env')
    this.validateStringRecord(definition.labels, 'labels')
    this.validateStringRecord(options?.env, 'env file')

    const context = {
      root: dirname(resolve(filePath)),
      workdir,
      env: {...options?.env, ...definition.env}
    }
    const resolved = steps.map((step, i) => this.resolveStep(step, i + 1, context))
    this.validateUniqueStepIds(resolved)

    return {
      id,
      name: definition.name,
      base: parseImageRef(definition.from),
      labels: definition.labels,
      steps: resolved
    }
  }

  private resolveStep(
    step: StepDefinition,
    index: number,
    context: {root: string; workdir: string; env: Record<string, string>}
  ): Step {
    if (typeof step !== 'object' || step === null) {
      throw new ValidationError(`Invalid step ${index}: expected an object`)
    }

    const kind = isCopyStep(step) ? 'copy' : 'run'
    const id = step.id ?? (step.name ? slugify(step.name) : `${kind}-${index}`)
    this.validateIdentifier(id, 'step id')

    const workdir = step.workdir ?? context.workdir
    this.validateWorkdir(workdir, `step ${id}`)

    if (isCopyStep(step)) {
      return this.resolveCopyStep(step, id, workdir, context.root)
    }

    return this.resolveRunStep(step, id, workdir, context.env)
  }

  private resolveRunStep(step: RunStepDefinition, id: string, workdir: string, env: Record<string, string>): Step {
    if (!('run' in step)) {
      throw new ValidationError(`Invalid step ${id}: either "run" or "copy" is required`)
    }

    let cmd: string[]
    if (typeof step.run === 'string') {
      if (!step.run.trim()) {
        throw new ValidationError(`Invalid step ${id}: run must not be empty`)
      }

      cmd = ['/bin/sh', '-c', step.run]
    } else if (Array.isArray(step.run) && step.run.length > 0 && step.run.every(arg => typeof arg === 'string')) {
      cmd = step.run
    } else {
      throw new ValidationError(`Invalid step ${id}: run must be a non-empty string or array of strings`)
    }

    this.validateStringRecord(step.env, `env of step ${id}`)

    const network = step.network ?? 'bridge'
    if (network !== 'bridge' && network !== 'none') {
      throw new ValidationError(`Invalid step ${id}: network must be "bridge" or "none"`)
    }

    if (step.timeoutSec !== undefined && (typeof step.timeoutSec !== 'number' || !Number.isFinite(step.timeoutSec) || step.timeoutSec <= 0)) {
      throw new ValidationError(`Invalid step ${id}: timeoutSec must be a positive finite number`)
    }

    return {
      kind: 'run',
      id,
      name: step.name,
      workdir,
      cmd,
      env: {...env, ...step.env},
      network,
      timeoutSec: step.timeoutSec
    }
  }

  private resolveCopyStep(step: CopyStepDefinition, id: string, workdir: string, root: string): Step {
    const {from, to = '.'} = step.copy

    if (!from || typeof from !== 'string') {
      throw new ValidationError(`Step ${id}: copy.from is required and must be a string`)
    }

    if (isAbsolute(from)) {
      throw new ValidationError(`Step ${id}: copy.from '${from}' must be a relative path`)
    }

    if (from.split(/[/\\]/).includes('..')) {
      throw new ValidationError(`Step ${id}: copy.from '${from}' must not contain '..'`)
    }

    if (typeof to !== 'string' || !to) {
      throw new ValidationError(`Step ${id}: copy.to must be a non-empty string`)
    }

    if (to.split('/').includes('..')) {
      throw new ValidationError(`Step ${id}: copy.to '${to}' must not contain '..'`)
    }

    return {
      kind: 'copy',
      id,
      name: step.name,
      workdir,
      source: resolve(root, from),
      destination: posix.resolve(workdir, to),
      intoDirectory: to === '.' || to.endsWith('/') || to.endsWith('/.')
    }
  }

  private validateWorkdir(workdir: unknown, context: string): void {
    if (typeof workdir !== 'string' || !workdir.startsWith('/')) {
      throw new ValidationError(`Invalid ${context}: workdir must be an absolute path`)
    }

    if (workdir.split('/').includes('..')) {
      throw new ValidationError(`Invalid ${context}: workdir '${workdir}' must not contain '..'`)
    }
  }

  private validateStringRecord(value: unknown, context: string): void {
    if (value === undefined) {
      return
    }

    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new ValidationError(`Invalid ${context}: expected a map of strings`)
    }

    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry !== 'string') {
        throw new ValidationError(`Invalid ${context}: value of '${key}' must be a string`)
      }
    }
  }

  private validateIdentifier(id: string, context: string): void {
    if (typeof id !== 'string' || !/^[\w-]+$/.test(id)) {
      throw new ValidationError(`Invalid ${context}: '${id}' must contain only alphanumeric characters, underscore, and hyphen`)
    }
  }

  private validateUniqueStepIds(steps: Step[]): void {
    const seen = new Set<string>()
    for (const step of steps) {
      if (seen.has(step.id)) {
        throw new ValidationError(`Duplicate step id: '${step.id}'`)
      }

      seen.add(step.id)
    }
  }
}

/** Convert a free-form name into a valid identifier. */
export function slugify(name: string): string {
  return deburr(name)
    .toLowerCase()
    .replaceAll(/[^\w-]/g, '-')
    .replaceAll(/-{2,}/g, '-')
    .replace(/^-/, '')
    .replace(/-$/, '')
}

/**
 * Parses `name[:tag]`. A colon followed by a slash belongs to a registry
 * host (`localhost:5000/app`), not a tag.
 */
export function parseImageRef(reference: string): ImageRef {
  if (reference.includes('@')) {
    throw new ValidationError(`Invalid base image '${reference}': digest references are not supported`)
  }

  const colon = reference.lastIndexOf(':')
  const hasTag = colon > reference.lastIndexOf('/')
  const name = hasTag ? reference.slice(0, colon) : reference
  const tag = hasTag ? reference.slice(colon + 1) : 'latest'

  if (!name || !tag || /\s/.test(reference)) {
    throw new ValidationError(`Invalid base image '${reference}'`)
  }

  return {name, tag}
}

export function parseBuildFile(content: string, filePath: string): unknown {
  const ext = extname(filePath).toLowerCase()
  try {
    if (ext === '.yaml' || ext === '.yml') {
      return parseYaml(content) as unknown
    }

    return JSON.parse(content) as unknown
  } catch (error) {
    throw new ValidationError(`Cannot parse build file ${filePath}`, {cause: error})
  }
}

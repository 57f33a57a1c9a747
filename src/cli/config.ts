import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ValidationError} from '../errors.js'

/**
 * Project-level settings read from `.stratum.yml`.
 */
export type StratumConfig = {
  /** Work directory for build records, relative to the config file */
  workdir?: string;
  /** Pull the base image on every build (default: true) */
  pull?: boolean;
  /** Default build file, relative to the config file */
  file?: string;
}

export const configFilename = '.stratum.yml'

/**
 * Loads the project-level `.stratum.yml` configuration from a directory.
 * Returns an empty config when the file does not exist.
 */
export async function loadConfig(dir: string): Promise<StratumConfig> {
  let content: string
  try {
    content = await readFile(join(dir, configFilename), 'utf8')
  } catch (error: unknown) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return {}
    }

    throw error
  }

  const parsed = parseYaml(content) as unknown
  if (parsed === null || parsed === undefined) {
    return {}
  }

  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ValidationError(`${configFilename}: expected a mapping`)
  }

  const config: StratumConfig = {}
  const workdir: unknown = Reflect.get(parsed, 'workdir')
  const pull: unknown = Reflect.get(parsed, 'pull')
  const file: unknown = Reflect.get(parsed, 'file')

  if (workdir !== undefined) {
    if (typeof workdir !== 'string') {
      throw new ValidationError(`${configFilename}: workdir must be a string`)
    }

    config.workdir = workdir
  }

  if (pull !== undefined) {
    if (typeof pull !== 'boolean') {
      throw new ValidationError(`${configFilename}: pull must be a boolean`)
    }

    config.pull = pull
  }

  if (file !== undefined) {
    if (typeof file !== 'string') {
      throw new ValidationError(`${configFilename}: file must be a string`)
    }

    config.file = file
  }

  return config
}

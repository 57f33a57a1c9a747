import process from 'node:process'
import {access, stat} from 'node:fs/promises'
import {join, resolve} from 'node:path'
import type {Command} from 'commander'
import {BuildStore} from '../engine/build-store.js'
import {loadConfig, type StratumConfig} from './config.js'

export type GlobalOptions = {
  workdir?: string;
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/**
 * Work directory priority: `--workdir` > `$STRATUM_WORKDIR` > `.stratum.yml` > `.stratum`.
 */
export function resolveWorkdir(options: GlobalOptions, config: StratumConfig, cwd = process.cwd()): string {
  if (options.workdir) {
    return resolve(cwd, options.workdir)
  }

  if (process.env.STRATUM_WORKDIR) {
    return resolve(cwd, process.env.STRATUM_WORKDIR)
  }

  return resolve(cwd, config.workdir ?? '.stratum')
}

/**
 * Opens the build store of the current project.
 */
export async function openStore(cmd: Command): Promise<{store: BuildStore; config: StratumConfig; json: boolean}> {
  const options = getGlobalOptions(cmd)
  const config = await loadConfig(process.cwd())
  const store = await BuildStore.open(resolveWorkdir(options, config))
  return {store, config, json: options.json ?? false}
}

export const buildFilenames = ['stratum.yml', 'stratum.yaml', 'stratum.json']

/**
 * Resolves a build file argument: a file is used as is, a directory is
 * searched for one of `buildFilenames`.
 */
export async function resolveBuildFile(pathOrDir?: string): Promise<string> {
  const target = resolve(pathOrDir ?? process.cwd())

  let isFile: boolean
  try {
    isFile = (await stat(target)).isFile()
  } catch {
    throw new Error(`Path does not exist: ${target}`)
  }

  if (isFile) {
    return target
  }

  for (const filename of buildFilenames) {
    const candidate = join(target, filename)
    if (await exists(candidate)) {
      return candidate
    }
  }

  throw new Error(
    `No build file found in ${target}. Expected one of: ${buildFilenames.join(', ')}`
  )
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

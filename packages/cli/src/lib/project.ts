import type { Descriptor, Lockfile, Result } from 'shared'
import { loadDescriptor, formatValidationErrors, DESCRIPTOR_FILE } from './loader.js'
import { loadConfig, type ShellpinConfig } from './config.js'
import { loadLockfile } from './lockfile.js'
import { HttpSnapshotEvaluator, type PackageSnapshotEvaluator } from './evaluator.js'
import { SnapshotCache } from './snapshot-cache.js'
import { defaultPlatformEnumerator, type PlatformEnumerator } from './platforms.js'
import type { ResolverDeps } from './resolver.js'

export interface ProjectOptions {
  cwd?: string
  offline?: boolean
  env?: NodeJS.ProcessEnv
  evaluator?: PackageSnapshotEvaluator
  platforms?: PlatformEnumerator
}

export interface Project {
  root: string
  descriptor: Descriptor
  config: ShellpinConfig
  lock: Lockfile | null
  deps: ResolverDeps
}

/**
 * Load the descriptor, configuration and lockfile of the project in `cwd`
 * and wire up the collaborators the resolver needs.
 */
export async function openProject(options: ProjectOptions = {}): Promise<Result<Project, string>> {
  const root = options.cwd ?? process.cwd()

  const descriptorResult = await loadDescriptor(root)
  if (!descriptorResult.ok) {
    return { ok: false, error: `Invalid ${DESCRIPTOR_FILE}:\n${formatValidationErrors(descriptorResult.error)}` }
  }

  const configResult = await loadConfig(root, options.env)
  if (!configResult.ok) return configResult
  const config = configResult.value
  if (options.offline) config.offline = true

  const lockResult = await loadLockfile(root)
  if (!lockResult.ok) return lockResult

  const evaluator = options.evaluator ?? new HttpSnapshotEvaluator({
    hosts: config.hosts,
    cache: new SnapshotCache(config.cacheDir),
    retry: config.retry,
    offline: config.offline,
  })

  return {
    ok: true,
    value: {
      root,
      descriptor: descriptorResult.value,
      config,
      lock: lockResult.value,
      deps: { evaluator, platforms: options.platforms ?? defaultPlatformEnumerator },
    },
  }
}

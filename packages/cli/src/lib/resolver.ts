import pLimit from 'p-limit'
import type { Descriptor, Lockfile, Platform, ResolveError, Result, ShellSpecification, SourceReference, ToolReference } from 'shared'
import type { PackageSnapshotEvaluator } from './evaluator.js'
import { supportedPlatforms, type PlatformEnumerator } from './platforms.js'
import { findUnresolvedInputs } from './loader.js'
import { lockedSource } from './lockfile.js'

export interface ResolverDeps {
  evaluator: PackageSnapshotEvaluator
  platforms: PlatformEnumerator
}

export interface ResolveOptions {
  signal?: AbortSignal
  /** Pinned sources by input name, used in place of the descriptor's refs */
  pins?: Record<string, SourceReference>
}

export interface ResolveAllOptions {
  concurrency?: number
  signal?: AbortSignal
  lock?: Lockfile | null
}

export interface ResolutionReport {
  results: Partial<Record<Platform, Result<ShellSpecification, ResolveError>>>
  pins: Record<string, SourceReference>
}

export const DEFAULT_CONCURRENCY = 4

function unresolvedInputError(names: string[]): ResolveError {
  return {
    type: 'UnresolvedInput',
    message: `Unresolved input${names.length > 1 ? 's' : ''}: ${names.join(', ')}`,
    input: names[0],
  }
}

/**
 * Resolve the dev shell of `descriptor` for a single platform.
 * Either every declared build input is found or the whole resolution fails.
 */
export async function resolve(
  descriptor: Descriptor,
  platform: Platform,
  deps: ResolverDeps,
  options: ResolveOptions = {}
): Promise<Result<ShellSpecification, ResolveError>> {
  if (!supportedPlatforms(descriptor, deps.platforms).includes(platform)) {
    return {
      ok: false,
      error: { type: 'UnsupportedPlatform', message: `Platform ${platform} is not supported by this descriptor`, platform },
    }
  }

  const unresolved = findUnresolvedInputs(descriptor)
  if (unresolved.length > 0) {
    return { ok: false, error: { ...unresolvedInputError(unresolved), platform } }
  }

  const { devShell } = descriptor.outputs
  const inputName = devShell.packages
  const source = options.pins?.[inputName]
    ?? (Object.hasOwn(descriptor.inputs, inputName) ? descriptor.inputs[inputName] : undefined)
  if (!source) {
    return { ok: false, error: { ...unresolvedInputError([inputName]), platform } }
  }

  if (options.signal?.aborted) {
    return { ok: false, error: { type: 'UnreachableSource', message: `Resolution of ${platform} aborted`, platform, input: inputName } }
  }

  const imported = await deps.evaluator.importSnapshot(source, platform, options.signal)
  if (!imported.ok) {
    return { ok: false, error: { ...imported.error, platform, input: inputName } }
  }

  const packageSet = imported.value
  const tools: ToolReference[] = []
  const missing: string[] = []
  for (const toolId of devShell.buildInputs) {
    const found = packageSet.lookup(toolId)
    if (found.ok) {
      tools.push(found.value)
    } else {
      missing.push(toolId)
    }
  }

  if (missing.length > 0) {
    return {
      ok: false,
      error: {
        type: 'ToolNotFound',
        message: `Tool${missing.length > 1 ? 's' : ''} not found for ${platform}: ${missing.join(', ')}`,
        platform,
        input: inputName,
        tools: missing,
      },
    }
  }

  return {
    ok: true,
    value: {
      platform,
      description: descriptor.description,
      tools,
      env: { ...(devShell.env ?? {}) },
      ...(devShell.shellHook !== undefined ? { shellHook: devShell.shellHook } : {}),
      source: packageSet.source,
    },
  }
}

export interface PinOptions {
  lock?: Lockfile | null
  names?: string[]
  signal?: AbortSignal
}

export interface PinResult {
  pins: Record<string, SourceReference>
  errors: Record<string, ResolveError>
}

/**
 * Pin inputs to concrete revisions, reusing the lockfile's revision for every
 * input whose source string has not changed since it was locked.
 */
export async function pinInputs(
  descriptor: Descriptor,
  evaluator: PackageSnapshotEvaluator,
  options: PinOptions = {}
): Promise<PinResult> {
  const names = options.names ?? Object.keys(descriptor.inputs)
  const pins: Record<string, SourceReference> = {}
  const errors: Record<string, ResolveError> = {}

  await Promise.all(names.map(async (name) => {
    if (!Object.hasOwn(descriptor.inputs, name)) {
      errors[name] = unresolvedInputError([name])
      return
    }
    const source = descriptor.inputs[name]

    const locked = options.lock ? lockedSource(options.lock, name, source) : undefined
    if (locked) {
      pins[name] = locked
      return
    }

    const pinned = await evaluator.pin(source, options.signal)
    if (pinned.ok) {
      pins[name] = pinned.value
    } else {
      errors[name] = { ...pinned.error, input: name }
    }
  }))

  return { pins, errors }
}

/**
 * Resolve every platform the descriptor supports. The package input is
 * pinned once up front so all platforms see the same snapshot; after that
 * platforms resolve independently and a failure on one never stops another.
 */
export async function resolveAll(
  descriptor: Descriptor,
  deps: ResolverDeps,
  options: ResolveAllOptions = {}
): Promise<ResolutionReport> {
  const results: ResolutionReport['results'] = {}
  const platforms = supportedPlatforms(descriptor, deps.platforms)

  for (const platform of descriptor.outputs.platforms ?? []) {
    if (!platforms.includes(platform)) {
      results[platform] = {
        ok: false,
        error: { type: 'UnsupportedPlatform', message: `Platform ${platform} is not offered by the platform enumerator`, platform },
      }
    }
  }

  const unresolved = findUnresolvedInputs(descriptor)
  if (unresolved.length > 0) {
    for (const platform of platforms) {
      results[platform] = { ok: false, error: { ...unresolvedInputError(unresolved), platform } }
    }
    return { results, pins: {} }
  }

  const inputName = descriptor.outputs.devShell.packages
  const { pins, errors } = await pinInputs(descriptor, deps.evaluator, {
    lock: options.lock,
    names: [inputName],
    signal: options.signal,
  })

  const pinError = errors[inputName]
  if (pinError) {
    for (const platform of platforms) {
      results[platform] = { ok: false, error: { ...pinError, platform } }
    }
    return { results, pins }
  }

  const limit = pLimit(Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY))
  const settled = await Promise.all(platforms.map(platform =>
    limit(async () => [platform, await resolve(descriptor, platform, deps, { signal: options.signal, pins })] as const)
  ))

  for (const [platform, result] of settled) {
    results[platform] = result
  }

  return { results, pins }
}

export function summarizeReport(results: ResolutionReport['results']): { ok: number; failed: number } {
  let ok = 0
  let failed = 0
  for (const result of Object.values(results)) {
    if (!result) continue
    if (result.ok) ok++
    else failed++
  }
  return { ok, failed }
}

/**
 * Single-platform counterpart of resolveAll: pin the package input (through
 * the lockfile when it matches) and resolve one platform against it.
 */
export async function resolveLocked(
  descriptor: Descriptor,
  platform: Platform,
  deps: ResolverDeps,
  options: { lock?: Lockfile | null; signal?: AbortSignal } = {}
): Promise<Result<ShellSpecification, ResolveError>> {
  const inputName = descriptor.outputs.devShell.packages
  if (!supportedPlatforms(descriptor, deps.platforms).includes(platform) || !Object.hasOwn(descriptor.inputs, inputName)) {
    return resolve(descriptor, platform, deps, { signal: options.signal })
  }

  const { pins, errors } = await pinInputs(descriptor, deps.evaluator, {
    lock: options.lock,
    names: [inputName],
    signal: options.signal,
  })
  const pinError = errors[inputName]
  if (pinError) return { ok: false, error: { ...pinError, platform } }

  return resolve(descriptor, platform, deps, { signal: options.signal, pins })
}

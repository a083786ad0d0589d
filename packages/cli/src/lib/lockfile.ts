import { readFile, writeFile, access } from 'node:fs/promises'
import { join } from 'node:path'
import { parse as parseYaml, stringify } from 'yaml'
import { isSafeSegment } from 'shared'
import type { LockedInput, Lockfile, Result, SourceReference } from 'shared'
import { formatSourceRef, withRevision } from './source-ref.js'

export const LOCKFILE = 'devshell-lock.yaml'

function isLockedInput(value: unknown): value is LockedInput {
  if (value === null || typeof value !== 'object') return false
  const entry: Record<string, unknown> = { ...value }
  return typeof entry.source === 'string'
    && typeof entry.revision === 'string'
    && isSafeSegment(entry.revision)
    && typeof entry.lockedAt === 'string'
}

export async function loadLockfile(directory: string): Promise<Result<Lockfile | null, string>> {
  const lockPath = join(directory, LOCKFILE)
  try {
    await access(lockPath)
  } catch {
    return { ok: true, value: null }
  }

  let parsed: unknown
  try {
    parsed = parseYaml(await readFile(lockPath, 'utf-8'))
  } catch (error) {
    return { ok: false, error: `Failed to parse ${LOCKFILE}: ${error}` }
  }

  if (parsed === null || typeof parsed !== 'object') {
    return { ok: false, error: `${LOCKFILE} is empty or not a valid YAML object` }
  }

  const document: Record<string, unknown> = { ...parsed }
  if (document.lockfileVersion !== 1) {
    return { ok: false, error: `Unsupported lockfileVersion: ${JSON.stringify(document.lockfileVersion)}` }
  }

  const rawInputs = document.inputs ?? {}
  if (typeof rawInputs !== 'object' || rawInputs === null || Array.isArray(rawInputs)) {
    return { ok: false, error: '"inputs" must be a mapping of input name to locked source' }
  }

  const inputs: Record<string, LockedInput> = {}
  for (const [name, entry] of Object.entries(rawInputs)) {
    if (!isLockedInput(entry)) {
      return { ok: false, error: `Invalid lock entry for input "${name}"` }
    }
    inputs[name] = { source: entry.source, revision: entry.revision, lockedAt: entry.lockedAt }
  }

  return { ok: true, value: { lockfileVersion: 1, inputs } }
}

/**
 * The pinned form of `current` if the lock holds an entry for `name` that was
 * recorded from the same source string.
 */
export function lockedSource(lock: Lockfile, name: string, current: SourceReference): SourceReference | undefined {
  if (!Object.hasOwn(lock.inputs, name)) return undefined
  const entry = lock.inputs[name]
  if (entry.source !== formatSourceRef(current)) return undefined
  return withRevision(current, entry.revision)
}

export function buildLockfile(
  pins: Record<string, SourceReference>,
  previous: Lockfile | null = null,
  now: Date = new Date()
): Lockfile {
  const inputs: Record<string, LockedInput> = {}
  for (const name of Object.keys(pins).sort()) {
    const pinned = pins[name]
    if (!pinned.revision) continue
    const source = formatSourceRef(pinned)
    const prior = previous && Object.hasOwn(previous.inputs, name) ? previous.inputs[name] : undefined
    const unchanged = prior && prior.source === source && prior.revision === pinned.revision
    inputs[name] = {
      source,
      revision: pinned.revision,
      lockedAt: prior && unchanged ? prior.lockedAt : now.toISOString(),
    }
  }
  return { lockfileVersion: 1, inputs }
}

export async function writeLockfile(directory: string, lockfile: Lockfile): Promise<void> {
  await writeFile(join(directory, LOCKFILE), stringify(lockfile))
}

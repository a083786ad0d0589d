import type { Lockfile, Result } from 'shared'
import { openProject, type ProjectOptions } from '../lib/project.js'
import { pinInputs } from '../lib/resolver.js'
import { buildLockfile, writeLockfile, LOCKFILE } from '../lib/lockfile.js'
import { formatResolveError } from '../lib/reporters/text.js'

export interface LockOptions extends ProjectOptions {
  update?: boolean
}

export async function lockCommand(options: LockOptions = {}): Promise<Result<Lockfile, string>> {
  const projectResult = await openProject(options)
  if (!projectResult.ok) return projectResult
  const { root, descriptor, deps, lock } = projectResult.value

  const { pins, errors } = await pinInputs(descriptor, deps.evaluator, {
    lock: options.update ? null : lock,
  })

  const failures = Object.entries(errors)
  if (failures.length > 0) {
    const details = failures.map(([name, error]) => `  ${name}: ${formatResolveError(error)}`).join('\n')
    return { ok: false, error: `Failed to pin inputs:\n${details}` }
  }

  const lockfile = buildLockfile(pins, lock)
  await writeLockfile(root, lockfile)

  for (const [name, entry] of Object.entries(lockfile.inputs)) {
    const previous = lock?.inputs[name]
    const marker = previous && previous.revision !== entry.revision ? ` (was ${previous.revision})` : ''
    console.error(`  ${name} → ${entry.source}@${entry.revision}${marker}`)
  }
  console.error(`✅ Wrote ${LOCKFILE}`)

  return { ok: true, value: lockfile }
}

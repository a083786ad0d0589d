import type { Result } from 'shared'
import { openProject, type ProjectOptions } from '../lib/project.js'
import { resolveLocked } from '../lib/resolver.js'
import { selectPlatform } from '../lib/platforms.js'
import { formatShellExports } from '../lib/reporters/shell-env.js'
import { formatResolveError } from '../lib/reporters/text.js'

export interface EnvOptions extends ProjectOptions {
  platform?: string
  baseEnv?: NodeJS.ProcessEnv
}

/** Prints a sourceable script with the dev shell's environment. */
export async function envCommand(options: EnvOptions = {}): Promise<Result<string, string>> {
  const platformResult = selectPlatform(options.platform)
  if (!platformResult.ok) return platformResult

  const projectResult = await openProject(options)
  if (!projectResult.ok) return projectResult
  const { descriptor, deps, lock } = projectResult.value

  const resolved = await resolveLocked(descriptor, platformResult.value, deps, { lock })
  if (!resolved.ok) {
    return { ok: false, error: formatResolveError(resolved.error) }
  }

  const script = formatShellExports(resolved.value, options.baseEnv ?? process.env)
  process.stdout.write(script)
  return { ok: true, value: script }
}

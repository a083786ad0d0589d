import type { Result } from 'shared'
import { openProject, type ProjectOptions } from '../lib/project.js'
import { resolveLocked } from '../lib/resolver.js'
import { selectPlatform } from '../lib/platforms.js'
import { ProcessShellLauncher, type ShellLauncher } from '../lib/shell.js'
import { formatResolveError } from '../lib/reporters/text.js'

export interface ShellOptions extends ProjectOptions {
  platform?: string
  launcher?: ShellLauncher
}

/** Resolves the dev shell and runs it; the value is the shell's exit code. */
export async function shellCommand(options: ShellOptions = {}): Promise<Result<number, string>> {
  const platformResult = selectPlatform(options.platform)
  if (!platformResult.ok) return platformResult
  const platform = platformResult.value

  const projectResult = await openProject(options)
  if (!projectResult.ok) return projectResult
  const { descriptor, deps, lock } = projectResult.value

  const resolved = await resolveLocked(descriptor, platform, deps, { lock })
  if (!resolved.ok) {
    return { ok: false, error: formatResolveError(resolved.error) }
  }

  const spec = resolved.value
  const launcher = options.launcher ?? new ProcessShellLauncher()
  console.error(`Entering dev shell for ${platform} with ${spec.tools.length} tool${spec.tools.length === 1 ? '' : 's'}`)

  const session = await launcher.mkShell(spec)
  if (!session.ok) return session

  return { ok: true, value: await session.value.wait() }
}

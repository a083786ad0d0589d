import type { ShellSpecification } from 'shared'
import { buildShellEnvironment } from '../shell.js'

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`
}

/**
 * A POSIX shell script that, when sourced, reproduces the environment of the
 * dev shell: only the variables the specification adds or changes are
 * exported, followed by the shellHook.
 */
export function formatShellExports(spec: ShellSpecification, baseEnv: NodeJS.ProcessEnv): string {
  const env = buildShellEnvironment(spec, baseEnv)
  const lines: string[] = []
  for (const key of Object.keys(env).sort()) {
    if (baseEnv[key] === env[key]) continue
    lines.push(`export ${key}=${shellQuote(env[key])}`)
  }
  if (spec.shellHook) {
    lines.push(spec.shellHook)
  }
  return lines.join('\n') + '\n'
}

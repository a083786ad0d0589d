import { spawn, type StdioOptions } from 'node:child_process'
import { delimiter } from 'node:path'
import { constants } from 'node:os'
import type { Result, ShellSpecification } from 'shared'

export interface InteractiveSessionHandle {
  pid: number
  /** Resolves with the session's exit code */
  wait(): Promise<number>
  kill(signal?: NodeJS.Signals): boolean
}

export interface ShellLauncher {
  mkShell(spec: ShellSpecification): Promise<Result<InteractiveSessionHandle, string>>
}

export function buildShellEnvironment(spec: ShellSpecification, baseEnv: NodeJS.ProcessEnv): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(baseEnv)) {
    if (value !== undefined) env[key] = value
  }
  Object.assign(env, spec.env)

  const bins = [...new Set(spec.tools.map(tool => `${tool.path.replace(/\/+$/, '')}/bin`))]
  env.PATH = [...bins, ...(env.PATH ? [env.PATH] : [])].join(delimiter)
  env.SHELLPIN_PLATFORM = spec.platform
  env.IN_SHELLPIN_SHELL = '1'
  return env
}

export interface ProcessShellLauncherOptions {
  shell?: string
  env?: NodeJS.ProcessEnv
  stdio?: StdioOptions
}

function exitCode(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code
  if (signal) return 128 + constants.signals[signal]
  return 1
}

/**
 * Starts the user's shell with the tools of a shell specification on PATH.
 * A shellHook runs first under /bin/sh, which then execs the real shell.
 */
export class ProcessShellLauncher implements ShellLauncher {
  private readonly shell: string
  private readonly env: NodeJS.ProcessEnv
  private readonly stdio: StdioOptions

  constructor(options: ProcessShellLauncherOptions = {}) {
    this.env = options.env ?? process.env
    this.shell = options.shell ?? this.env.SHELL ?? '/bin/sh'
    this.stdio = options.stdio ?? 'inherit'
  }

  async mkShell(spec: ShellSpecification): Promise<Result<InteractiveSessionHandle, string>> {
    const env = { ...buildShellEnvironment(spec, this.env), SHELLPIN_SHELL: this.shell }
    const command = spec.shellHook ? '/bin/sh' : this.shell
    const args = spec.shellHook ? ['-c', `${spec.shellHook}\nexec "$SHELLPIN_SHELL"`] : []

    const child = spawn(command, args, { stdio: this.stdio, env })

    const exited = new Promise<number>((resolve) => {
      child.once('exit', (code, signal) => resolve(exitCode(code, signal)))
    })

    const started = await new Promise<Result<void, string>>((resolve) => {
      child.once('spawn', () => resolve({ ok: true, value: undefined }))
      child.once('error', (error) => resolve({ ok: false, error: `Failed to start ${command}: ${error.message}` }))
    })
    if (!started.ok) return started

    return {
      ok: true,
      value: {
        pid: child.pid ?? -1,
        wait: () => exited,
        kill: (signal: NodeJS.Signals = 'SIGTERM') => child.kill(signal),
      },
    }
  }
}

import { readFile, access } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { homedir } from 'node:os'
import AjvModule from 'ajv'
import { parse as parseYaml } from 'yaml'
import type { Result } from 'shared'
import { DEFAULT_RETRY, type RetryPolicy } from './fetch-retry.js'
import { DEFAULT_CONCURRENCY } from './resolver.js'

export const CONFIG_FILE = 'shellpin.yaml'

export interface ShellpinConfig {
  hosts: Record<string, string>  // source host -> snapshot host URL
  concurrency: number
  retry: RetryPolicy
  cacheDir: string
  offline: boolean
}

interface ConfigFile {
  hosts?: Record<string, string>
  concurrency?: number
  retry?: Partial<RetryPolicy>
  cacheDir?: string
  offline?: boolean
}

const configSchema = {
  type: 'object',
  properties: {
    hosts: {
      type: 'object',
      additionalProperties: { type: 'string', pattern: '^https?://' },
    },
    concurrency: { type: 'integer', minimum: 1, maximum: 64 },
    retry: {
      type: 'object',
      properties: {
        attempts: { type: 'integer', minimum: 1, maximum: 10 },
        baseDelayMs: { type: 'integer', minimum: 0 },
        maxDelayMs: { type: 'integer', minimum: 0 },
      },
      additionalProperties: false,
    },
    cacheDir: { type: 'string', minLength: 1 },
    offline: { type: 'boolean' },
  },
  additionalProperties: false,
} as const

const Ajv = AjvModule.default
const ajv = new Ajv({ allErrors: true })
const validateConfig = ajv.compile<ConfigFile>(configSchema)

export function defaultConfig(): ShellpinConfig {
  return {
    hosts: {},
    concurrency: DEFAULT_CONCURRENCY,
    retry: { ...DEFAULT_RETRY },
    cacheDir: join(homedir(), '.shellpin', 'cache'),
    offline: false,
  }
}

function isTruthy(value: string): boolean {
  return ['1', 'true', 'yes'].includes(value.toLowerCase())
}

/**
 * Apply SHELLPIN_* environment variables on top of a config.
 * SHELLPIN_HOST_<NAME> maps host <name> (lower-cased, `_` read as `-`).
 */
export function applyEnvironment(config: ShellpinConfig, env: NodeJS.ProcessEnv): Result<ShellpinConfig, string> {
  const next: ShellpinConfig = { ...config, hosts: { ...config.hosts }, retry: { ...config.retry } }

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith('SHELLPIN_HOST_') || !value) continue
    const host = key.slice('SHELLPIN_HOST_'.length).toLowerCase().replace(/_/g, '-')
    next.hosts[host] = value
  }

  if (env.SHELLPIN_CONCURRENCY) {
    const concurrency = Number(env.SHELLPIN_CONCURRENCY)
    if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > 64) {
      return { ok: false, error: `SHELLPIN_CONCURRENCY must be an integer between 1 and 64, got "${env.SHELLPIN_CONCURRENCY}"` }
    }
    next.concurrency = concurrency
  }

  if (env.SHELLPIN_CACHE_DIR) next.cacheDir = env.SHELLPIN_CACHE_DIR
  if (env.SHELLPIN_OFFLINE !== undefined) next.offline = isTruthy(env.SHELLPIN_OFFLINE)

  return { ok: true, value: next }
}

export async function loadConfig(projectRoot: string, env: NodeJS.ProcessEnv = process.env): Promise<Result<ShellpinConfig, string>> {
  const config = defaultConfig()
  const configPath = join(projectRoot, CONFIG_FILE)

  let exists = true
  try {
    await access(configPath)
  } catch {
    exists = false
  }

  if (exists) {
    let parsed: unknown
    try {
      parsed = parseYaml(await readFile(configPath, 'utf-8')) ?? {}
    } catch (error) {
      return { ok: false, error: `Failed to parse ${CONFIG_FILE}: ${error}` }
    }

    if (!validateConfig(parsed)) {
      const details = (validateConfig.errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`).join('; ')
      return { ok: false, error: `Invalid ${CONFIG_FILE}: ${details}` }
    }

    if (parsed.hosts) config.hosts = { ...parsed.hosts }
    if (parsed.concurrency !== undefined) config.concurrency = parsed.concurrency
    if (parsed.retry) config.retry = { ...config.retry, ...parsed.retry }
    if (parsed.cacheDir) config.cacheDir = resolve(projectRoot, parsed.cacheDir)
    if (parsed.offline !== undefined) config.offline = parsed.offline
  }

  return applyEnvironment(config, env)
}

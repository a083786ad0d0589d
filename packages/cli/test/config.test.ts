import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir, homedir } from 'node:os'
import { stringify } from 'yaml'
import { applyEnvironment, defaultConfig, loadConfig } from '../src/lib/config.js'

describe('loadConfig', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'shellpin-config-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('uses defaults without a config file', async () => {
    expect(await loadConfig(dir, {})).toEqual({
      ok: true,
      value: {
        hosts: {},
        concurrency: 4,
        retry: { attempts: 3, baseDelayMs: 200, maxDelayMs: 5000 },
        cacheDir: join(homedir(), '.shellpin', 'cache'),
        offline: false,
      },
    })
  })

  it('reads shellpin.yaml and resolves cacheDir against the project', async () => {
    await writeFile(join(dir, 'shellpin.yaml'), stringify({
      hosts: { github: 'https://snapshots.example.test' },
      concurrency: 2,
      retry: { attempts: 5 },
      cacheDir: '.shellpin/cache',
    }))

    const result = await loadConfig(dir, {})
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.hosts).toEqual({ github: 'https://snapshots.example.test' })
    expect(result.value.concurrency).toBe(2)
    expect(result.value.retry).toEqual({ attempts: 5, baseDelayMs: 200, maxDelayMs: 5000 })
    expect(result.value.cacheDir).toBe(join(dir, '.shellpin', 'cache'))
  })

  it('lets the environment override the file', async () => {
    await writeFile(join(dir, 'shellpin.yaml'), stringify({ hosts: { github: 'https://snapshots.example.test' } }))

    const result = await loadConfig(dir, {
      SHELLPIN_HOST_GITHUB: 'http://127.0.0.1:4874',
      SHELLPIN_CONCURRENCY: '8',
      SHELLPIN_OFFLINE: 'true',
    })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.hosts.github).toBe('http://127.0.0.1:4874')
    expect(result.value.concurrency).toBe(8)
    expect(result.value.offline).toBe(true)
  })

  it('rejects invalid values', async () => {
    await writeFile(join(dir, 'shellpin.yaml'), stringify({ hosts: { github: 'ftp://snapshots' }, concurrency: 0 }))
    const result = await loadConfig(dir, {})
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toMatch(/^Invalid shellpin\.yaml: /)
  })

  it('rejects unknown keys', async () => {
    await writeFile(join(dir, 'shellpin.yaml'), 'registry: https://example.test\n')
    const result = await loadConfig(dir, {})
    expect(result.ok).toBe(false)
  })

  it('treats an empty file as defaults', async () => {
    await writeFile(join(dir, 'shellpin.yaml'), '')
    const result = await loadConfig(dir, {})
    expect(result.ok && result.value.concurrency).toBe(4)
  })
})

describe('applyEnvironment', () => {
  it('maps SHELLPIN_HOST_ names to lower-case hosts', () => {
    const result = applyEnvironment(defaultConfig(), { SHELLPIN_HOST_MY_FORGE: 'https://forge.test' })
    expect(result.ok && result.value.hosts).toEqual({ 'my-forge': 'https://forge.test' })
  })

  it('rejects an out-of-range concurrency', () => {
    const result = applyEnvironment(defaultConfig(), { SHELLPIN_CONCURRENCY: '0' })
    expect(result).toEqual({ ok: false, error: 'SHELLPIN_CONCURRENCY must be an integer between 1 and 64, got "0"' })
  })

  it('reads offline flags', () => {
    for (const [value, expected] of [['1', true], ['yes', true], ['0', false], ['no', false]] as const) {
      const result = applyEnvironment(defaultConfig(), { SHELLPIN_OFFLINE: value })
      expect(result.ok && result.value.offline).toBe(expected)
    }
  })

  it('overrides the cache directory', () => {
    const result = applyEnvironment(defaultConfig(), { SHELLPIN_CACHE_DIR: '/tmp/shellpin-cache' })
    expect(result.ok && result.value.cacheDir).toBe('/tmp/shellpin-cache')
  })

  it('leaves the input config untouched', () => {
    const config = defaultConfig()
    applyEnvironment(config, { SHELLPIN_HOST_GITHUB: 'https://snapshots.test', SHELLPIN_OFFLINE: '1' })
    expect(config.hosts).toEqual({})
    expect(config.offline).toBe(false)
  })
})

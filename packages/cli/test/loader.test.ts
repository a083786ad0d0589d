import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { stringify } from 'yaml'
import type { Descriptor } from 'shared'
import { loadDescriptor, findUnresolvedInputs, formatValidationErrors } from '../src/lib/loader.js'

describe('loadDescriptor', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'shellpin-loader-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  async function write(document: unknown) {
    await writeFile(join(dir, 'devshell.yaml'), typeof document === 'string' ? document : stringify(document))
  }

  it('loads a complete descriptor', async () => {
    await write({
      description: 'A very basic dev shell',
      inputs: {
        nixpkgs: 'github:NixOS/nixpkgs/release-23.11',
        'flake-utils': 'github:numtide/flake-utils',
      },
      outputs: {
        args: ['self', 'nixpkgs', 'flake-utils'],
        devShell: {
          packages: 'nixpkgs',
          buildInputs: ['stdenv.cc'],
          shellHook: 'echo ready',
          env: { CC: 'gcc' },
        },
      },
    })

    const result = await loadDescriptor(dir)
    expect(result.ok).toBe(true)
    if (!result.ok) return

    const descriptor = result.value
    expect(descriptor.description).toBe('A very basic dev shell')
    expect(descriptor.inputs.nixpkgs).toEqual({ host: 'github', owner: 'NixOS', repo: 'nixpkgs', ref: 'release-23.11' })
    expect(descriptor.inputs['flake-utils'].ref).toBe('HEAD')
    expect(descriptor.outputs.args).toEqual(['self', 'nixpkgs', 'flake-utils'])
    expect(descriptor.outputs.devShell).toEqual({
      packages: 'nixpkgs',
      buildInputs: ['stdenv.cc'],
      shellHook: 'echo ready',
      env: { CC: 'gcc' },
    })
    expect(descriptor.outputs.platforms).toBeUndefined()
  })

  it('freezes the descriptor', async () => {
    await write({ inputs: { nixpkgs: 'github:NixOS/nixpkgs' }, outputs: { devShell: { buildInputs: ['stdenv.cc'] } } })

    const result = await loadDescriptor(dir)
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(Object.isFrozen(result.value)).toBe(true)
    expect(Object.isFrozen(result.value.inputs.nixpkgs)).toBe(true)
    expect(Object.isFrozen(result.value.outputs.devShell.buildInputs)).toBe(true)
  })

  it('fills in defaults', async () => {
    await write({ inputs: { nixpkgs: 'github:NixOS/nixpkgs' }, outputs: { devShell: { buildInputs: [] } } })

    const result = await loadDescriptor(dir)
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.description).toBe('')
    expect(result.value.outputs.args).toEqual(['self', 'nixpkgs'])
    expect(result.value.outputs.devShell.packages).toBe('nixpkgs')
  })

  it('accepts a platform restriction', async () => {
    await write({
      inputs: { nixpkgs: 'github:NixOS/nixpkgs' },
      outputs: { platforms: ['x86_64-linux', 'aarch64-darwin'], devShell: { buildInputs: [] } },
    })

    const result = await loadDescriptor(dir)
    expect(result.ok && result.value.outputs.platforms).toEqual(['x86_64-linux', 'aarch64-darwin'])
  })

  it('reports a missing file', async () => {
    const result = await loadDescriptor(dir)
    expect(result).toEqual({
      ok: false,
      error: [{ kind: 'schema', path: 'devshell.yaml', message: 'devshell.yaml not found' }],
    })
  })

  it('reports unparseable YAML', async () => {
    await write('inputs: [\n')
    const result = await loadDescriptor(dir)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error[0].message).toMatch(/^Failed to parse devshell\.yaml/)
  })

  it('rejects unknown top-level keys', async () => {
    await write({ inputs: {}, outputs: { devShell: { buildInputs: [] } }, extra: true })
    const result = await loadDescriptor(dir)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toEqual([
        { kind: 'schema', path: 'devshell.yaml', message: 'must NOT have additional properties' },
      ])
    }
  })

  it('rejects duplicate build inputs', async () => {
    await write({ inputs: { nixpkgs: 'github:NixOS/nixpkgs' }, outputs: { devShell: { buildInputs: ['stdenv.cc', 'stdenv.cc'] } } })
    const result = await loadDescriptor(dir)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error[0].path).toBe('devshell.yaml/outputs/devShell/buildInputs')
      expect(result.error[0].message).toContain('duplicate items')
    }
  })

  it('rejects malformed source references', async () => {
    await write({ inputs: { nixpkgs: 'not-a-ref' }, outputs: { devShell: { buildInputs: [] } } })
    const result = await loadDescriptor(dir)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error[0].kind).toBe('schema')
      expect(result.error[0].path).toBe('devshell.yaml/inputs/nixpkgs')
    }
  })

  it('rejects unknown platforms', async () => {
    await write({
      inputs: { nixpkgs: 'github:NixOS/nixpkgs' },
      outputs: { platforms: ['x86_64-windows'], devShell: { buildInputs: [] } },
    })
    const result = await loadDescriptor(dir)
    expect(result).toEqual({
      ok: false,
      error: [{ kind: 'schema', path: 'devshell.yaml/outputs/platforms', message: 'Unknown platform: x86_64-windows' }],
    })
  })

  it('reports inputs referenced but not declared', async () => {
    await write({
      inputs: { nixpkgs: 'github:NixOS/nixpkgs' },
      outputs: { args: ['self', 'nixpkgs', 'flake-utils'], devShell: { buildInputs: [] } },
    })
    const result = await loadDescriptor(dir)
    expect(result).toEqual({
      ok: false,
      error: [{
        kind: 'UnresolvedInput',
        path: 'devshell.yaml/outputs',
        message: 'Input "flake-utils" is referenced but not declared in inputs',
      }],
    })
  })

  it('reports a package input that args does not bind', async () => {
    await write({
      inputs: { nixpkgs: 'github:NixOS/nixpkgs' },
      outputs: { args: ['self'], devShell: { packages: 'nixpkgs', buildInputs: [] } },
    })
    const result = await loadDescriptor(dir)
    expect(result).toEqual({
      ok: false,
      error: [{
        kind: 'UnresolvedInput',
        path: 'devshell.yaml/outputs/devShell/packages',
        message: 'Input "nixpkgs" is not bound in outputs.args',
      }],
    })
  })

  it('rejects self as the package input', async () => {
    await write({
      inputs: { nixpkgs: 'github:NixOS/nixpkgs' },
      outputs: { devShell: { packages: 'self', buildInputs: ['stdenv.cc'] } },
    })
    const result = await loadDescriptor(dir)
    expect(result).toEqual({
      ok: false,
      error: [{
        kind: 'UnresolvedInput',
        path: 'devshell.yaml/outputs',
        message: 'Input "self" is referenced but not declared in inputs',
      }],
    })
  })
})

describe('findUnresolvedInputs', () => {
  it('ignores self and reports each missing name once', () => {
    const descriptor: Descriptor = {
      description: '',
      inputs: {},
      outputs: { args: ['self', 'nixpkgs'], devShell: { packages: 'nixpkgs', buildInputs: [] } },
    }
    expect(findUnresolvedInputs(descriptor)).toEqual(['nixpkgs'])
  })

  it('reports self when it is the package input', () => {
    const descriptor: Descriptor = {
      description: '',
      inputs: { nixpkgs: { host: 'github', owner: 'NixOS', repo: 'nixpkgs', ref: 'HEAD' } },
      outputs: { args: ['self', 'nixpkgs'], devShell: { packages: 'self', buildInputs: [] } },
    }
    expect(findUnresolvedInputs(descriptor)).toEqual(['self'])
  })
})

describe('formatValidationErrors', () => {
  it('prints one indented line per error', () => {
    expect(formatValidationErrors([
      { kind: 'schema', path: 'devshell.yaml/inputs/x', message: 'bad' },
      { kind: 'UnresolvedInput', path: 'devshell.yaml/outputs', message: 'missing' },
    ])).toBe('  devshell.yaml/inputs/x: bad\n  devshell.yaml/outputs: missing')
  })
})

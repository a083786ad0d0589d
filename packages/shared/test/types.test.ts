import { describe, it, expect } from 'vitest'
import type { Descriptor, Result, ResolveError } from '../src/types.js'
import { DEFAULT_PLATFORMS, KNOWN_PLATFORMS, isPlatform } from '../src/platforms.js'

describe('types', () => {
  it('Descriptor type accepts a minimal descriptor', () => {
    const descriptor: Descriptor = {
      description: 'Test shell',
      inputs: { nixpkgs: { host: 'github', owner: 'NixOS', repo: 'nixpkgs', ref: 'release-23.11' } },
      outputs: { args: ['self', 'nixpkgs'], devShell: { packages: 'nixpkgs', buildInputs: ['stdenv.cc'] } },
    }
    expect(descriptor.outputs.devShell.buildInputs).toEqual(['stdenv.cc'])
  })

  it('Result type carries a resolve error', () => {
    const result: Result<string, ResolveError> = { ok: false, error: { type: 'ToolNotFound', message: 'missing' } }
    expect(result.ok).toBe(false)
  })
})

describe('platforms', () => {
  it('has four default platforms', () => {
    expect(DEFAULT_PLATFORMS).toEqual(['x86_64-linux', 'aarch64-linux', 'x86_64-darwin', 'aarch64-darwin'])
  })

  it('knows every arch/os pair', () => {
    expect(KNOWN_PLATFORMS).toHaveLength(8)
    expect(KNOWN_PLATFORMS).toContain('i686-linux')
    expect(KNOWN_PLATFORMS).toContain('armv7l-darwin')
  })

  it('recognizes platform identifiers', () => {
    expect(isPlatform('aarch64-darwin')).toBe(true)
    expect(isPlatform('x86_64-windows')).toBe(false)
    expect(isPlatform('linux')).toBe(false)
  })
})

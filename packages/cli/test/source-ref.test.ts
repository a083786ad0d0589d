import { describe, it, expect } from 'vitest'
import { parseSourceRef, formatSourceRef, sourceKey, withRevision } from '../src/lib/source-ref.js'

describe('parseSourceRef', () => {
  it('parses host, owner, repo and ref', () => {
    expect(parseSourceRef('github:NixOS/nixpkgs/release-23.11')).toEqual({
      ok: true,
      value: { host: 'github', owner: 'NixOS', repo: 'nixpkgs', ref: 'release-23.11' },
    })
  })

  it('defaults the ref to HEAD', () => {
    const result = parseSourceRef('github:numtide/flake-utils')
    expect(result.ok && result.value.ref).toBe('HEAD')
  })

  it('keeps slashes inside the ref', () => {
    const result = parseSourceRef('github:acme/tools/release/23.11')
    expect(result.ok && result.value.ref).toBe('release/23.11')
  })

  it.each([
    'nixpkgs',
    ':NixOS/nixpkgs',
    'github:NixOS',
    'github:/nixpkgs',
    'github:NixOS/nixpkgs/',
    'github:NixOS/nix pkgs',
  ])('rejects %s', (text) => {
    const result = parseSourceRef(text)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toContain(`Invalid source reference "${text}"`)
  })

  it('names the bad segment', () => {
    expect(parseSourceRef('github:/nixpkgs')).toEqual({
      ok: false,
      error: 'Invalid source reference "github:/nixpkgs": bad owner ""',
    })
  })
})

describe('formatSourceRef', () => {
  it('reproduces the parsed text', () => {
    for (const text of ['github:NixOS/nixpkgs/release-23.11', 'github:numtide/flake-utils']) {
      const parsed = parseSourceRef(text)
      expect(parsed.ok && formatSourceRef(parsed.value)).toBe(text)
    }
  })

  it('ignores the revision', () => {
    const source = withRevision({ host: 'github', owner: 'NixOS', repo: 'nixpkgs', ref: 'release-23.11' }, 'abc123')
    expect(formatSourceRef(source)).toBe('github:NixOS/nixpkgs/release-23.11')
  })
})

describe('sourceKey', () => {
  it('appends the pinned revision', () => {
    const source = { host: 'github', owner: 'NixOS', repo: 'nixpkgs', ref: 'release-23.11' }
    expect(sourceKey(source)).toBe('github:NixOS/nixpkgs/release-23.11')
    expect(sourceKey(withRevision(source, 'abc123'))).toBe('github:NixOS/nixpkgs/release-23.11@abc123')
  })

  it('does not modify the source it pins', () => {
    const source = { host: 'github', owner: 'NixOS', repo: 'nixpkgs', ref: 'HEAD' }
    withRevision(source, 'abc123')
    expect(source).toEqual({ host: 'github', owner: 'NixOS', repo: 'nixpkgs', ref: 'HEAD' })
  })
})

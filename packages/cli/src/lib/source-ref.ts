import type { SourceReference, Result } from 'shared'

export const DEFAULT_REF = 'HEAD'

const SEGMENT = /^[A-Za-z0-9._-]+$/

/**
 * Parse a source reference string: `<host>:<owner>/<repo>[/<ref>]`.
 * The ref is everything after the repo segment, so `github:o/r/release/23.11`
 * has ref `release/23.11`.
 */
export function parseSourceRef(text: string): Result<SourceReference, string> {
  const colon = text.indexOf(':')
  if (colon <= 0) {
    return { ok: false, error: `Invalid source reference "${text}": expected <host>:<owner>/<repo>[/<ref>]` }
  }

  const host = text.slice(0, colon)
  const [owner, repo, ...rest] = text.slice(colon + 1).split('/')
  const ref = rest.join('/')

  for (const [label, value] of [['host', host], ['owner', owner], ['repo', repo]] as const) {
    if (!value || !SEGMENT.test(value)) {
      return { ok: false, error: `Invalid source reference "${text}": bad ${label} "${value || ''}"` }
    }
  }

  if (rest.length > 0 && rest.some(part => part.length === 0)) {
    return { ok: false, error: `Invalid source reference "${text}": empty ref segment` }
  }

  return { ok: true, value: { host, owner, repo, ref: ref || DEFAULT_REF } }
}

export function formatSourceRef(source: SourceReference): string {
  const base = `${source.host}:${source.owner}/${source.repo}`
  return source.ref === DEFAULT_REF ? base : `${base}/${source.ref}`
}

export function sourceKey(source: SourceReference): string {
  const base = formatSourceRef(source)
  return source.revision ? `${base}@${source.revision}` : base
}

export function withRevision(source: SourceReference, revision: string): SourceReference {
  return { ...source, revision }
}

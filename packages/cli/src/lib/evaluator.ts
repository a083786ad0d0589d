import { isSafeSegment } from 'shared'
import type { Platform, ResolveError, Result, Snapshot, SourceReference, ToolReference } from 'shared'
import { formatSourceRef, sourceKey, withRevision } from './source-ref.js'
import { fetchWithRetry, DEFAULT_RETRY, type FetchLike, type RetryPolicy } from './fetch-retry.js'
import { SnapshotCache, validateSnapshot } from './snapshot-cache.js'

/** The evaluated contents of one snapshot for one platform. */
export interface PackageSet {
  readonly source: SourceReference
  readonly platform: Platform
  lookup(toolId: string): Result<ToolReference, ResolveError>
}

export interface PackageSnapshotEvaluator {
  /** Fix a moving ref to the revision it currently points at. */
  pin(source: SourceReference, signal?: AbortSignal): Promise<Result<SourceReference, ResolveError>>
  importSnapshot(source: SourceReference, platform: Platform, signal?: AbortSignal): Promise<Result<PackageSet, ResolveError>>
}

export function createPackageSet(snapshot: Snapshot, source: SourceReference, platform: Platform): PackageSet {
  const pinned = withRevision(source, snapshot.revision)
  const packages = new Map(Object.entries(snapshot.packages))

  return {
    source: pinned,
    platform,
    lookup(toolId) {
      const entry = packages.get(toolId)
      if (!entry) {
        return {
          ok: false,
          error: {
            type: 'ToolNotFound',
            message: `Tool "${toolId}" not found in ${sourceKey(pinned)} for ${platform}`,
            platform,
            tools: [toolId],
          },
        }
      }
      return { ok: true, value: { id: toolId, name: entry.name, version: entry.version, path: entry.path } }
    },
  }
}

export interface HttpSnapshotEvaluatorOptions {
  hosts: Record<string, string>
  cache?: SnapshotCache
  retry?: RetryPolicy
  offline?: boolean
  fetch?: FetchLike
}

type ImportResult = Result<PackageSet, ResolveError>

/** A download that several importers wait on; it is cancelled once all of them have gone. */
interface SharedLoad {
  result: Promise<ImportResult>
  controller: AbortController
  waiters: number
}

/** Settle with `onAbort()` as soon as `signal` fires, without cancelling `work`. */
async function raceAbort<T>(work: Promise<T>, signal: AbortSignal | undefined, onAbort: () => T): Promise<T> {
  if (!signal) return work
  if (signal.aborted) return onAbort()

  let abort = () => {}
  const aborted = new Promise<T>((resolve) => {
    abort = () => resolve(onAbort())
    signal.addEventListener('abort', abort, { once: true })
  })
  try {
    return await Promise.race([work, aborted])
  } finally {
    signal.removeEventListener('abort', abort)
  }
}

function unreachable(source: SourceReference, message: string, platform?: Platform): ResolveError {
  return {
    type: 'UnreachableSource',
    message: `${formatSourceRef(source)}: ${message}`,
    ...(platform ? { platform } : {}),
  }
}

/**
 * Evaluator backed by a snapshot host. Each source host (`github`, ...) maps
 * to the base URL of a server speaking the /api/v1/snapshots protocol.
 */
export class HttpSnapshotEvaluator implements PackageSnapshotEvaluator {
  private readonly hosts: Record<string, string>
  private readonly cache?: SnapshotCache
  private readonly retry: RetryPolicy
  private readonly offline: boolean
  private readonly fetchImpl: FetchLike
  private readonly inFlight = new Map<string, SharedLoad>()

  constructor(options: HttpSnapshotEvaluatorOptions) {
    this.hosts = options.hosts
    this.cache = options.cache
    this.retry = options.retry ?? DEFAULT_RETRY
    this.offline = options.offline ?? false
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init))
  }

  async pin(source: SourceReference, signal?: AbortSignal): Promise<Result<SourceReference, ResolveError>> {
    if (source.revision) return { ok: true, value: source }
    if (this.offline) {
      return { ok: false, error: unreachable(source, 'cannot pin a moving ref while offline; lock it first') }
    }

    const base = this.baseUrl(source)
    if (!base.ok) return base

    const url = `${base.value}/api/v1/snapshots/${encodeURIComponent(source.owner)}/${encodeURIComponent(source.repo)}/refs/${encodeURIComponent(source.ref)}`
    const body = await this.getJson(url, source, signal)
    if (!body.ok) return body

    const revision = readRevision(body.value)
    if (!revision) {
      return { ok: false, error: unreachable(source, `malformed ref response from ${url}`) }
    }
    return { ok: true, value: withRevision(source, revision) }
  }

  async importSnapshot(source: SourceReference, platform: Platform, signal?: AbortSignal): Promise<ImportResult> {
    const pinned = await this.pin(source, signal)
    if (!pinned.ok) return { ok: false, error: { ...pinned.error, platform } }

    const aborted = (): ImportResult => ({ ok: false, error: unreachable(pinned.value, 'fetch aborted', platform) })
    if (signal?.aborted) return aborted()

    // Concurrent imports of the same revision and platform share one download
    const key = `${sourceKey(pinned.value)}#${platform}`
    const shared = this.inFlight.get(key) ?? this.startLoad(key, pinned.value, platform)
    shared.waiters++
    let abandoned = false
    try {
      return await raceAbort(shared.result, signal, () => {
        abandoned = true
        return aborted()
      })
    } finally {
      shared.waiters--
      if (shared.waiters === 0) {
        if (this.inFlight.get(key) === shared) this.inFlight.delete(key)
        if (abandoned) shared.controller.abort()
      }
    }
  }

  private startLoad(key: string, source: SourceReference, platform: Platform): SharedLoad {
    const controller = new AbortController()
    const shared: SharedLoad = { result: this.load(source, platform, controller.signal), controller, waiters: 0 }
    this.inFlight.set(key, shared)
    return shared
  }

  private async load(source: SourceReference, platform: Platform, signal: AbortSignal): Promise<ImportResult> {
    const revision = source.revision ?? ''
    if (!isSafeSegment(revision)) {
      return { ok: false, error: unreachable(source, `invalid revision "${revision}"`, platform) }
    }

    const cached = await this.cache?.get(source, revision, platform)
    if (cached) return { ok: true, value: createPackageSet(cached, source, platform) }

    if (this.offline) {
      return { ok: false, error: unreachable(source, `revision ${revision} for ${platform} is not cached`, platform) }
    }

    const base = this.baseUrl(source)
    if (!base.ok) return { ok: false, error: { ...base.error, platform } }

    const url = `${base.value}/api/v1/snapshots/${encodeURIComponent(source.owner)}/${encodeURIComponent(source.repo)}/${encodeURIComponent(revision)}/${platform}`
    const body = await this.getJson(url, source, signal)
    if (!body.ok) return { ok: false, error: { ...body.error, platform } }

    const snapshot = body.value
    if (!validateSnapshot(snapshot)) {
      return { ok: false, error: unreachable(source, `malformed snapshot from ${url}`, platform) }
    }
    if (snapshot.revision !== revision || snapshot.platform !== platform) {
      return {
        ok: false,
        error: unreachable(source, `snapshot host returned ${snapshot.revision}/${snapshot.platform} for ${revision}/${platform}`, platform),
      }
    }

    if (this.cache) {
      await this.cache.put(source, platform, snapshot).catch((error: unknown) => {
        console.error(`Warning: could not cache snapshot ${revision} for ${platform}: ${error}`)
      })
    }

    return { ok: true, value: createPackageSet(snapshot, source, platform) }
  }

  private baseUrl(source: SourceReference): Result<string, ResolveError> {
    const base = this.hosts[source.host]
    if (!base) {
      return { ok: false, error: unreachable(source, `no snapshot host configured for "${source.host}"`) }
    }
    return { ok: true, value: base.replace(/\/+$/, '') }
  }

  private async getJson(url: string, source: SourceReference, signal?: AbortSignal): Promise<Result<unknown, ResolveError>> {
    const outcome = await fetchWithRetry(this.fetchImpl, url, this.retry, signal)

    if (outcome.kind === 'aborted') {
      return { ok: false, error: unreachable(source, 'fetch aborted') }
    }
    if (outcome.kind === 'failed') {
      return { ok: false, error: unreachable(source, `unreachable after ${outcome.attempts} attempt(s): ${outcome.reason}`) }
    }

    const { response } = outcome
    if (!response.ok) {
      const detail = response.status === 404 ? 'not found' : `HTTP ${response.status}`
      return { ok: false, error: unreachable(source, `${detail} (${url})`) }
    }

    try {
      return { ok: true, value: await response.json() }
    } catch (error) {
      return { ok: false, error: unreachable(source, `invalid JSON from ${url}: ${error}`) }
    }
  }
}

function readRevision(body: unknown): string | null {
  if (body === null || typeof body !== 'object' || !('revision' in body)) return null
  const { revision } = body
  return typeof revision === 'string' && isSafeSegment(revision) ? revision : null
}

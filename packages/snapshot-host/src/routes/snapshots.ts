import type { FastifyInstance } from 'fastify'
import { isPlatform, isSafeSegment } from 'shared'
import { SnapshotStore, validateSnapshot } from '../store.js'

interface RepoParams { owner: string; repo: string }
interface RefParams extends RepoParams { ref: string }
interface SnapshotParams extends RepoParams { revision: string; platform: string }

function authFailure(authorization: string | undefined, token: string | undefined): { status: number; error: string } | null {
  if (!token) return { status: 403, error: 'Uploads are disabled on this host' }
  if (authorization !== `Bearer ${token}`) return { status: 401, error: 'Authentication required' }
  return null
}

function validRepo(params: RepoParams): boolean {
  return isSafeSegment(params.owner) && isSafeSegment(params.repo)
}

export function registerSnapshotRoutes(app: FastifyInstance, store: SnapshotStore, token?: string): void {

  // GET /api/v1/snapshots/:owner/:repo/refs/:ref - Current revision of a ref
  app.get<{ Params: RefParams }>('/api/v1/snapshots/:owner/:repo/refs/:ref', async (request, reply) => {
    const { owner, repo, ref } = request.params
    if (!validRepo(request.params)) {
      return reply.status(400).send({ error: 'Invalid owner or repo' })
    }

    const revision = await store.getRevision(owner, repo, ref)
    if (!revision) {
      return reply.status(404).send({ error: `Unknown ref ${ref} for ${owner}/${repo}` })
    }
    return { owner, repo, ref, revision }
  })

  // PUT /api/v1/snapshots/:owner/:repo/refs/:ref - Move a ref
  app.put<{ Params: RefParams; Body: unknown }>('/api/v1/snapshots/:owner/:repo/refs/:ref', async (request, reply) => {
    const denied = authFailure(request.headers.authorization, token)
    if (denied) {
      return reply.status(denied.status).send({ error: denied.error })
    }

    const { owner, repo, ref } = request.params
    if (!validRepo(request.params) || ref.length === 0) {
      return reply.status(400).send({ error: 'Invalid owner, repo or ref' })
    }

    const body = request.body
    const revision = body !== null && typeof body === 'object' && 'revision' in body ? body.revision : undefined
    if (typeof revision !== 'string' || !isSafeSegment(revision)) {
      return reply.status(400).send({ error: 'Body must be { "revision": "<revision>" }' })
    }
    if (!(await store.hasRevision(owner, repo, revision))) {
      return reply.status(404).send({ error: `No snapshots stored for revision ${revision}` })
    }

    await store.setRef(owner, repo, ref, revision)
    return { owner, repo, ref, revision }
  })

  // GET /api/v1/snapshots/:owner/:repo/:revision/:platform - Package set
  app.get<{ Params: SnapshotParams }>('/api/v1/snapshots/:owner/:repo/:revision/:platform', async (request, reply) => {
    const { owner, repo, revision, platform } = request.params
    if (!validRepo(request.params) || !isSafeSegment(revision)) {
      return reply.status(400).send({ error: 'Invalid owner, repo or revision' })
    }
    if (!isPlatform(platform)) {
      return reply.status(400).send({ error: `Unknown platform: ${platform}` })
    }

    const snapshot = await store.getSnapshot(owner, repo, revision, platform)
    if (!snapshot) {
      return reply.status(404).send({ error: `No snapshot of ${owner}/${repo}@${revision} for ${platform}` })
    }
    return snapshot
  })

  // PUT /api/v1/snapshots/:owner/:repo/:revision/:platform - Upload a package set
  app.put<{ Params: SnapshotParams; Body: unknown }>('/api/v1/snapshots/:owner/:repo/:revision/:platform', async (request, reply) => {
    const denied = authFailure(request.headers.authorization, token)
    if (denied) {
      return reply.status(denied.status).send({ error: denied.error })
    }

    const { owner, repo, revision, platform } = request.params
    if (!validRepo(request.params) || !isSafeSegment(revision) || revision === 'refs') {
      return reply.status(400).send({ error: 'Invalid owner, repo or revision' })
    }
    if (!isPlatform(platform)) {
      return reply.status(400).send({ error: `Unknown platform: ${platform}` })
    }

    const snapshot = request.body
    if (!validateSnapshot(snapshot)) {
      const details = (validateSnapshot.errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
      return reply.status(400).send({ error: 'Invalid snapshot', details })
    }
    if (snapshot.revision !== revision || snapshot.platform !== platform) {
      return reply.status(400).send({ error: 'Snapshot revision and platform must match the URL' })
    }

    const outcome = await store.putSnapshot(owner, repo, snapshot, platform)
    if (outcome === 'exists') {
      return reply.status(409).send({ error: `Snapshot ${revision} for ${platform} already exists. Revisions are immutable.` })
    }

    return reply.status(201).send({ owner, repo, revision, platform, packages: Object.keys(snapshot.packages).length })
  })
}

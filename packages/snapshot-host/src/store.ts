import { mkdir, readFile, writeFile, readdir, rename, access, link, unlink } from 'node:fs/promises'
import { randomUUID } from 'node:crypto'
import { join } from 'node:path'
import AjvModule from 'ajv'
import { snapshotSchema } from 'shared'
import type { Platform, Snapshot } from 'shared'

const Ajv = AjvModule.default
const ajv = new Ajv({ allErrors: true })
export const validateSnapshot = ajv.compile<Snapshot>(snapshotSchema)

async function fileExists(p: string): Promise<boolean> {
  try { await access(p); return true } catch { return false }
}

function tempPath(target: string): string {
  return `${target}.${randomUUID()}.tmp`
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST'
}

async function writeAtomic(target: string, content: string): Promise<void> {
  const temp = tempPath(target)
  await writeFile(temp, content)
  await rename(temp, target)
}

/** Like writeAtomic, but fails with EEXIST instead of replacing `target`. */
async function writeExclusive(target: string, content: string): Promise<void> {
  const temp = tempPath(target)
  await writeFile(temp, content)
  try {
    await link(temp, target)
  } finally {
    await unlink(temp)
  }
}

/**
 * Snapshots on disk:
 *   <dataDir>/<owner>/<repo>/refs.json                  ref -> revision
 *   <dataDir>/<owner>/<repo>/<revision>/<platform>.json  package set
 */
export class SnapshotStore {
  // refs.json is read, changed and rewritten; updates to one repo run in turn
  private readonly refUpdates = new Map<string, Promise<void>>()

  constructor(readonly dataDir: string) {}

  private repoDir(owner: string, repo: string): string {
    return join(this.dataDir, owner, repo)
  }

  private async readRefs(owner: string, repo: string): Promise<Record<string, string>> {
    const refsPath = join(this.repoDir(owner, repo), 'refs.json')
    if (!(await fileExists(refsPath))) return {}
    const parsed: unknown = JSON.parse(await readFile(refsPath, 'utf-8'))
    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) return {}
    const refs: Record<string, string> = {}
    for (const [ref, revision] of Object.entries(parsed)) {
      if (typeof revision === 'string') refs[ref] = revision
    }
    return refs
  }

  async getRevision(owner: string, repo: string, ref: string): Promise<string | null> {
    const refs = await this.readRefs(owner, repo)
    return Object.hasOwn(refs, ref) ? refs[ref] : null
  }

  async setRef(owner: string, repo: string, ref: string, revision: string): Promise<void> {
    const key = `${owner}/${repo}`
    const update = (this.refUpdates.get(key) ?? Promise.resolve()).then(() => this.writeRef(owner, repo, ref, revision))
    // A failed update must not block the ones queued behind it; its caller still sees the error
    const queued = update.catch(() => undefined)
    this.refUpdates.set(key, queued)
    try {
      await update
    } finally {
      if (this.refUpdates.get(key) === queued) this.refUpdates.delete(key)
    }
  }

  private async writeRef(owner: string, repo: string, ref: string, revision: string): Promise<void> {
    const refs = await this.readRefs(owner, repo)
    refs[ref] = revision
    await mkdir(this.repoDir(owner, repo), { recursive: true })
    await writeAtomic(join(this.repoDir(owner, repo), 'refs.json'), JSON.stringify(refs, null, 2))
  }

  async hasRevision(owner: string, repo: string, revision: string): Promise<boolean> {
    const revisionDir = join(this.repoDir(owner, repo), revision)
    if (!(await fileExists(revisionDir))) return false
    const entries = await readdir(revisionDir)
    return entries.some(entry => entry.endsWith('.json'))
  }

  async getSnapshot(owner: string, repo: string, revision: string, platform: Platform): Promise<Snapshot | null> {
    const snapshotPath = join(this.repoDir(owner, repo), revision, `${platform}.json`)
    if (!(await fileExists(snapshotPath))) return null
    const parsed: unknown = JSON.parse(await readFile(snapshotPath, 'utf-8'))
    return validateSnapshot(parsed) ? parsed : null
  }

  /** Revisions are immutable: an existing snapshot is never overwritten. */
  async putSnapshot(owner: string, repo: string, snapshot: Snapshot, platform: Platform): Promise<'created' | 'exists'> {
    const revisionDir = join(this.repoDir(owner, repo), snapshot.revision)
    const snapshotPath = join(revisionDir, `${platform}.json`)
    if (await fileExists(snapshotPath)) return 'exists'
    await mkdir(revisionDir, { recursive: true })
    try {
      await writeExclusive(snapshotPath, JSON.stringify(snapshot, null, 2))
    } catch (error) {
      if (isAlreadyExists(error)) return 'exists'
      throw error
    }
    return 'created'
  }
}

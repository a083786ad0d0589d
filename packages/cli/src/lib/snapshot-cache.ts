import { mkdir, readFile, writeFile, rename } from 'node:fs/promises'
import { join, dirname } from 'node:path'
import AjvModule from 'ajv'
import { snapshotSchema, isSafeSegment } from 'shared'
import type { Platform, Snapshot, SourceReference } from 'shared'

const Ajv = AjvModule.default
const ajv = new Ajv({ allErrors: true })
export const validateSnapshot = ajv.compile<Snapshot>(snapshotSchema)

/**
 * On-disk store of fetched snapshots. Entries are keyed by revision, which
 * never changes content, so there is no expiry.
 */
export class SnapshotCache {
  constructor(readonly directory: string) {}

  entryPath(source: SourceReference, revision: string, platform: Platform): string {
    return join(this.directory, source.host, source.owner, source.repo, revision, `${platform}.json`)
  }

  async get(source: SourceReference, revision: string, platform: Platform): Promise<Snapshot | null> {
    let document: unknown
    try {
      document = JSON.parse(await readFile(this.entryPath(source, revision, platform), 'utf-8'))
    } catch {
      return null
    }
    if (!validateSnapshot(document)) return null
    if (document.revision !== revision || document.platform !== platform) return null
    return document
  }

  async put(source: SourceReference, platform: Platform, snapshot: Snapshot): Promise<void> {
    if (!isSafeSegment(snapshot.revision)) return
    const target = this.entryPath(source, snapshot.revision, platform)
    await mkdir(dirname(target), { recursive: true })
    const temp = `${target}.${process.pid}.tmp`
    await writeFile(temp, JSON.stringify(snapshot, null, 2))
    await rename(temp, target)
  }
}

import Fastify from 'fastify'
import { SnapshotStore } from './store.js'
import { registerSnapshotRoutes } from './routes/snapshots.js'
import { registerRateLimit } from './rate-limit.js'

export interface SnapshotHostOptions {
  dataDir?: string
  /** Bearer token required for uploads; uploads are refused when unset */
  token?: string
  /** Requests per client per minute */
  rateLimitMax?: number
}

export async function createServer(options: SnapshotHostOptions = {}) {
  const app = Fastify({ logger: false })
  const store = new SnapshotStore(options.dataDir ?? 'data')

  registerRateLimit(app, { max: options.rateLimitMax ?? 600, windowMs: 60_000 })

  app.get('/api/v1/health', async () => ({ status: 'ok', timestamp: new Date().toISOString() }))

  registerSnapshotRoutes(app, store, options.token)

  return app
}

// Started directly: node dist/server.js
if (process.argv[1]?.endsWith('server.js')) {
  const port = Number(process.env.PORT) || 4874
  const app = await createServer({
    dataDir: process.env.DATA_DIR || 'data',
    token: process.env.SNAPSHOT_HOST_TOKEN,
  })
  await app.listen({ port, host: '0.0.0.0' })
  console.log(`Snapshot host listening on port ${port}`)
}

import type { FastifyInstance } from 'fastify'

export interface RateLimitOptions {
  max: number
  windowMs: number
}

interface Window {
  count: number
  resetAt: number
}

/** Fixed-window request budget per client IP, reported in x-ratelimit-* headers. */
export function registerRateLimit(app: FastifyInstance, options: RateLimitOptions): void {
  const windows = new Map<string, Window>()

  app.addHook('onRequest', async (request, reply) => {
    const now = Date.now()
    let window = windows.get(request.ip)
    if (!window || now > window.resetAt) {
      window = { count: 0, resetAt: now + options.windowMs }
      windows.set(request.ip, window)
    }
    window.count++

    reply.header('x-ratelimit-limit', options.max)
    reply.header('x-ratelimit-remaining', Math.max(0, options.max - window.count))
    reply.header('x-ratelimit-reset', Math.ceil(window.resetAt / 1000))

    if (window.count > options.max) {
      return reply.status(429).send({ error: 'Too many requests. Try again later.' })
    }
  })

  // Expired windows would otherwise pile up for every client ever seen
  const sweep = setInterval(() => {
    const now = Date.now()
    for (const [ip, window] of windows) {
      if (now > window.resetAt) windows.delete(ip)
    }
  }, options.windowMs)
  sweep.unref()
  app.addHook('onClose', async () => clearInterval(sweep))
}

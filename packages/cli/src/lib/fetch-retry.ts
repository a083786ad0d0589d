import { setTimeout as delay } from 'node:timers/promises'

export interface RetryPolicy {
  attempts: number
  baseDelayMs: number
  maxDelayMs: number
}

export const DEFAULT_RETRY: RetryPolicy = { attempts: 3, baseDelayMs: 200, maxDelayMs: 5000 }

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>

export type FetchOutcome =
  | { kind: 'response'; response: Response; attempts: number }
  | { kind: 'aborted' }
  | { kind: 'failed'; reason: string; attempts: number }

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs)
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError'
}

/**
 * GET with retries on network errors, 429 and 5xx. Any other response,
 * including 4xx, is handed back to the caller untouched.
 */
export async function fetchWithRetry(
  fetchImpl: FetchLike,
  url: string,
  policy: RetryPolicy,
  signal?: AbortSignal
): Promise<FetchOutcome> {
  let lastReason = 'no attempts made'
  for (let attempt = 1; attempt <= policy.attempts; attempt++) {
    if (signal?.aborted) return { kind: 'aborted' }
    try {
      const response = await fetchImpl(url, { signal, headers: { accept: 'application/json' } })
      if (!isRetryableStatus(response.status) || attempt === policy.attempts) {
        return { kind: 'response', response, attempts: attempt }
      }
      lastReason = `HTTP ${response.status}`
      await response.body?.cancel()
    } catch (error) {
      if (isAbortError(error) || signal?.aborted) return { kind: 'aborted' }
      lastReason = error instanceof Error ? error.message : String(error)
      if (attempt === policy.attempts) break
    }

    try {
      await delay(backoffDelay(policy, attempt), undefined, { signal })
    } catch {
      return { kind: 'aborted' }
    }
  }
  return { kind: 'failed', reason: lastReason, attempts: policy.attempts }
}

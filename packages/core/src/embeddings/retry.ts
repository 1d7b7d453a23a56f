/**
 * Bounded retry with exponential backoff, for provider rate limits only.
 * Every other failure propagates on the first attempt.
 */

import { abortableDelay, isRagError } from '../common/index.js'
import type { RagError } from '../common/index.js'

export interface RetryPolicy {
  /** Total attempts, including the first. */
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
}

export interface RetryHooks {
  signal?: AbortSignal
  onRetry?: (attempt: number, delayMs: number, err: RagError) => void
}

export function isRateLimited(err: unknown): err is RagError {
  return isRagError(err, 'EMBEDDING_PROVIDER_ERROR') && err.reason === 'rate_limit'
}

/** Delay before the retry that follows failed `attempt` (1-based). */
export function backoffDelay(attempt: number, policy: RetryPolicy, retryAfterMs?: number): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1)
  return Math.min(Math.max(exponential, retryAfterMs ?? 0), policy.maxDelayMs)
}

export async function retryOnRateLimit<T>(
  op: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts))
  for (let attempt = 1; ; attempt++) {
    try {
      return await op(attempt)
    } catch (err) {
      if (!isRateLimited(err) || attempt >= maxAttempts) throw err
      const delayMs = backoffDelay(attempt, policy, err.retryAfterMs)
      hooks.onRetry?.(attempt, delayMs, err)
      await abortableDelay(delayMs, hooks.signal, 'embedding retry backoff')
    }
  }
}

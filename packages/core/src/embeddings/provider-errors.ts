/**
 * Mapping of provider HTTP failures onto RagError reasons.
 */

import type { ProviderFailureReason } from '../common/index.js'

export function reasonForStatus(status: number | undefined): ProviderFailureReason {
  if (status === undefined) return 'unknown'
  if (status === 401 || status === 403) return 'auth'
  if (status === 429) return 'rate_limit'
  if (status === 400 || status === 404 || status === 413 || status === 422) return 'invalid_input'
  if (status >= 500) return 'server'
  return 'unknown'
}

/** Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds. */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (!value) return undefined
  const seconds = Number(value)
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000)
  const date = Date.parse(value)
  if (Number.isNaN(date)) return undefined
  return Math.max(0, date - now)
}

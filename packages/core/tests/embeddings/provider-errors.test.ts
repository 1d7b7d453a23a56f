import { describe, it, expect } from 'vitest'
import { reasonForStatus, parseRetryAfter } from '../../src/embeddings/provider-errors.js'

describe('reasonForStatus', () => {
  it.each([
    [401, 'auth'],
    [403, 'auth'],
    [429, 'rate_limit'],
    [400, 'invalid_input'],
    [404, 'invalid_input'],
    [413, 'invalid_input'],
    [422, 'invalid_input'],
    [500, 'server'],
    [503, 'server'],
    [418, 'unknown'],
  ])('maps %i to %s', (status, reason) => {
    expect(reasonForStatus(status)).toBe(reason)
  })

  it('maps a missing status to unknown', () => {
    expect(reasonForStatus(undefined)).toBe('unknown')
  })
})

describe('parseRetryAfter', () => {
  const now = Date.UTC(2026, 9, 21, 7, 28, 0)

  it('reads delta-seconds', () => {
    expect(parseRetryAfter('2', now)).toBe(2000)
    expect(parseRetryAfter('0.5', now)).toBe(500)
  })

  it('reads an HTTP date relative to now', () => {
    expect(parseRetryAfter(new Date(now + 5000).toUTCString(), now)).toBe(5000)
  })

  it('clamps dates in the past to zero', () => {
    expect(parseRetryAfter(new Date(now - 60_000).toUTCString(), now)).toBe(0)
  })

  it('ignores missing or unparseable values', () => {
    expect(parseRetryAfter(undefined, now)).toBeUndefined()
    expect(parseRetryAfter(null, now)).toBeUndefined()
    expect(parseRetryAfter('soon', now)).toBeUndefined()
  })
})

import { describe, it, expect } from 'vitest'
import { RagError, errorMessage, isRagError, rootCause } from '../../src/common/index.js'

describe('RagError', () => {
  it('carries code, message and name', () => {
    const err = RagError.validation('bad input')
    expect(err).toBeInstanceOf(Error)
    expect(err.name).toBe('RagError')
    expect(err.code).toBe('VALIDATION_ERROR')
    expect(err.message).toBe('bad input')
    expect(err.cause).toBeUndefined()
  })

  it('provider errors keep reason, status and retry hint', () => {
    const err = RagError.provider('slow down', 'rate_limit', { status: 429, retryAfterMs: 2000 })
    expect(err.code).toBe('EMBEDDING_PROVIDER_ERROR')
    expect(err.reason).toBe('rate_limit')
    expect(err.status).toBe(429)
    expect(err.retryAfterMs).toBe(2000)
  })

  it('formats dimension mismatches', () => {
    expect(RagError.dimensionMismatch(1536, 768).message).toBe('Vector has 768 dimensions, expected 1536')
  })

  it('formats timeouts and cancellations', () => {
    expect(RagError.timeout('search', 250).message).toBe('search timed out after 250ms')
    expect(RagError.cancelled('ingestion').message).toBe('ingestion was cancelled')
  })

  it('names the empty document', () => {
    const err = RagError.emptyDocument('notes.txt')
    expect(err.code).toBe('EMPTY_DOCUMENT')
    expect(err.message).toBe('No extractable text in notes.txt')
  })

  describe('stageFailure', () => {
    it('maps extract and chunk to EXTRACTION_FAILED', () => {
      expect(RagError.stageFailure('extract', new Error('x')).code).toBe('EXTRACTION_FAILED')
      expect(RagError.stageFailure('chunk', new Error('x')).code).toBe('EXTRACTION_FAILED')
    })

    it('maps embed, store and retrieve to their stage codes', () => {
      expect(RagError.stageFailure('embed', new Error('x')).code).toBe('EMBEDDING_FAILED')
      expect(RagError.stageFailure('store', new Error('x')).code).toBe('STORE_FAILED')
      expect(RagError.stageFailure('retrieve', new Error('x')).code).toBe('RETRIEVAL_FAILED')
    })

    it('keeps the cause and labels the stage', () => {
      const cause = RagError.provider('invalid key', 'auth', { status: 401 })
      const err = RagError.stageFailure('embed', cause)
      expect(err.message).toBe('Embedding failed: invalid key')
      expect(err.stage).toBe('embed')
      expect(err.cause).toBe(cause)
    })
  })
})

describe('isRagError', () => {
  it('matches any RagError without a code', () => {
    expect(isRagError(RagError.db('locked'))).toBe(true)
    expect(isRagError(new Error('plain'))).toBe(false)
    expect(isRagError('string')).toBe(false)
  })

  it('matches on code when given', () => {
    expect(isRagError(RagError.db('locked'), 'DB_ERROR')).toBe(true)
    expect(isRagError(RagError.db('locked'), 'TIMEOUT')).toBe(false)
  })
})

describe('rootCause', () => {
  it('walks nested RagError causes', () => {
    const leaf = RagError.timeout('embedding request', 100)
    const wrapped = RagError.stageFailure('retrieve', leaf)
    expect(rootCause(wrapped)).toBe(leaf)
  })

  it('stops at a non-RagError cause', () => {
    const err = RagError.db('write failed', new Error('disk full'))
    expect(rootCause(err)).toBe(err)
  })
})

describe('errorMessage', () => {
  it('reads Error messages and stringifies the rest', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom')
    expect(errorMessage(42)).toBe('42')
  })
})

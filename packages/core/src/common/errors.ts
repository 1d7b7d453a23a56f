/**
 * Typed error class for knowledge base operations.
 *
 * Leaf components (extractor, chunker, embedding clients, vector store) throw
 * RagError with a leaf code. The pipelines wrap those into a stage code
 * (EXTRACTION_FAILED, EMBEDDING_FAILED, STORE_FAILED, RETRIEVAL_FAILED) and
 * keep the original as `cause`.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'DB_ERROR'
  | 'DECODE_ERROR'
  | 'PARSE_ERROR'
  | 'UNSUPPORTED_FORMAT'
  | 'EMPTY_DOCUMENT'
  | 'EMBEDDING_PROVIDER_ERROR'
  | 'DIMENSION_MISMATCH'
  | 'INVALID_VECTOR'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'EXTRACTION_FAILED'
  | 'EMBEDDING_FAILED'
  | 'STORE_FAILED'
  | 'RETRIEVAL_FAILED'
  | 'INGESTION_IN_PROGRESS'

export type ProviderFailureReason =
  | 'auth'
  | 'rate_limit'
  | 'invalid_input'
  | 'server'
  | 'network'
  | 'unknown'

export type PipelineStage = 'extract' | 'chunk' | 'embed' | 'store' | 'retrieve'

export interface RagErrorDetails {
  cause?: unknown
  status?: number
  reason?: ProviderFailureReason
  stage?: PipelineStage
  /** Provider-suggested wait before retrying (Retry-After), in ms. */
  retryAfterMs?: number
}

export class RagError extends Error {
  readonly code: ErrorCode
  readonly status?: number
  readonly reason?: ProviderFailureReason
  readonly stage?: PipelineStage
  readonly retryAfterMs?: number

  constructor(code: ErrorCode, message: string, details: RagErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause })
    this.name = 'RagError'
    this.code = code
    this.status = details.status
    this.reason = details.reason
    this.stage = details.stage
    this.retryAfterMs = details.retryAfterMs
  }

  static validation(message: string): RagError {
    return new RagError('VALIDATION_ERROR', message)
  }

  static db(message: string, cause?: unknown): RagError {
    return new RagError('DB_ERROR', message, { cause })
  }

  static decode(message: string, cause?: unknown): RagError {
    return new RagError('DECODE_ERROR', message, { cause })
  }

  static parse(message: string, cause?: unknown): RagError {
    return new RagError('PARSE_ERROR', message, { cause })
  }

  static unsupportedFormat(message: string, cause?: unknown): RagError {
    return new RagError('UNSUPPORTED_FORMAT', message, { cause })
  }

  static emptyDocument(filename: string): RagError {
    return new RagError('EMPTY_DOCUMENT', `No extractable text in ${filename}`)
  }

  static provider(
    message: string,
    reason: ProviderFailureReason,
    details: { status?: number; retryAfterMs?: number; cause?: unknown } = {},
  ): RagError {
    return new RagError('EMBEDDING_PROVIDER_ERROR', message, { ...details, reason })
  }

  static dimensionMismatch(expected: number, actual: number): RagError {
    return new RagError(
      'DIMENSION_MISMATCH',
      `Vector has ${actual} dimensions, expected ${expected}`,
    )
  }

  static invalidVector(message: string): RagError {
    return new RagError('INVALID_VECTOR', message)
  }

  static timeout(operation: string, timeoutMs: number): RagError {
    return new RagError('TIMEOUT', `${operation} timed out after ${timeoutMs}ms`)
  }

  static cancelled(operation: string): RagError {
    return new RagError('CANCELLED', `${operation} was cancelled`)
  }

  static ingestionInProgress(owner: string): RagError {
    return new RagError('INGESTION_IN_PROGRESS', `An ingestion is already running for ${owner}`)
  }

  /** Wrap any failure into the stage code of the pipeline step that produced it. */
  static stageFailure(stage: PipelineStage, cause: unknown): RagError {
    const code = STAGE_CODES[stage]
    return new RagError(code, `${STAGE_LABELS[stage]} failed: ${errorMessage(cause)}`, { cause, stage })
  }
}

const STAGE_CODES: Record<PipelineStage, ErrorCode> = {
  extract: 'EXTRACTION_FAILED',
  chunk: 'EXTRACTION_FAILED',
  embed: 'EMBEDDING_FAILED',
  store: 'STORE_FAILED',
  retrieve: 'RETRIEVAL_FAILED',
}

const STAGE_LABELS: Record<PipelineStage, string> = {
  extract: 'Text extraction',
  chunk: 'Chunking',
  embed: 'Embedding',
  store: 'Vector store write',
  retrieve: 'Retrieval',
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function isRagError(err: unknown, code?: ErrorCode): err is RagError {
  return err instanceof RagError && (code === undefined || err.code === code)
}

/** Innermost RagError in a cause chain (the error itself when it has no RagError cause). */
export function rootCause(err: RagError): RagError {
  let current = err
  while (current.cause instanceof RagError) {
    current = current.cause
  }
  return current
}

/**
 * Embedding client contract and the shared provider base class.
 *
 * The base class owns input validation, the per-call deadline, rate-limit
 * retries, response shape checks and L2 normalization; concrete providers
 * only implement `requestEmbeddings`.
 */

import { RagError, withDeadline } from '../common/index.js'
import type { CallOptions, Logger } from '../common/index.js'
import { l2Normalize } from '../kb/vector-math.js'
import { DEFAULT_RETRY_POLICY, retryOnRateLimit } from './retry.js'
import type { RetryPolicy } from './retry.js'

export type EmbedCallOptions = CallOptions

export interface EmbeddingClient {
  /** Query-time path: one text, one round trip. */
  embed(text: string, options?: EmbedCallOptions): Promise<number[]>
  /** Ingestion path: at most `maxBatchSize` texts, vectors aligned by index. */
  embedBatch(texts: string[], options?: EmbedCallOptions): Promise<number[][]>
  readonly modelName: string
  readonly dimensions: number
  readonly maxBatchSize: number
  /** Detects silent model changes. Format: "${provider}:${model}:${version}" */
  readonly providerFingerprint: string
}

export interface ProviderClientOptions {
  modelName: string
  dimensions: number
  maxBatchSize: number
  providerFingerprint: string
  retry?: Partial<RetryPolicy>
  /** Deadline applied when a call passes no timeoutMs. */
  timeoutMs?: number
  logger?: Logger
}

const DEFAULT_TIMEOUT_MS = 30_000

export abstract class ProviderEmbeddingClient implements EmbeddingClient {
  readonly modelName: string
  readonly dimensions: number
  readonly maxBatchSize: number
  readonly providerFingerprint: string
  protected readonly retryPolicy: RetryPolicy
  protected readonly timeoutMs: number
  protected readonly logger: Logger

  constructor(options: ProviderClientOptions) {
    this.modelName = options.modelName
    this.dimensions = options.dimensions
    this.maxBatchSize = options.maxBatchSize
    this.providerFingerprint = options.providerFingerprint
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retry }
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.logger = options.logger ?? console
  }

  /** One provider round trip. Failures must be thrown as RagError. */
  protected abstract requestEmbeddings(texts: string[], signal: AbortSignal): Promise<number[][]>

  async embed(text: string, options: EmbedCallOptions = {}): Promise<number[]> {
    const [vector] = await this.embedBatch([text], options)
    return vector
  }

  async embedBatch(texts: string[], options: EmbedCallOptions = {}): Promise<number[][]> {
    if (texts.length === 0) return []
    if (texts.length > this.maxBatchSize) {
      throw RagError.provider(
        `Batch of ${texts.length} exceeds the ${this.maxBatchSize}-input limit for ${this.modelName}`,
        'invalid_input',
      )
    }
    texts.forEach((text, i) => {
      if (text.trim().length === 0) {
        throw RagError.provider(`Input ${i} is empty`, 'invalid_input')
      }
    })

    const vectors = await withDeadline(
      `embedding request (${this.modelName})`,
      { signal: options.signal, timeoutMs: options.timeoutMs ?? this.timeoutMs },
      signal => retryOnRateLimit(() => this.requestEmbeddings(texts, signal), this.retryPolicy, {
        signal,
        onRetry: (attempt, delayMs) => {
          this.logger.warn(
            `[embedding] ${this.modelName} rate limited (attempt ${attempt}/${this.retryPolicy.maxAttempts}); retrying in ${delayMs}ms`,
          )
        },
      }),
    )

    if (vectors.length !== texts.length) {
      throw RagError.provider(
        `${this.modelName} returned ${vectors.length} vectors for ${texts.length} inputs`,
        'unknown',
      )
    }
    return vectors.map(vector => {
      if (vector.length !== this.dimensions) {
        throw RagError.dimensionMismatch(this.dimensions, vector.length)
      }
      return l2Normalize(vector)
    })
  }
}

/**
 * Retrieval pipeline: embed the query, then rank the owner's records by
 * cosine distance. Fewer than topK matches (including none) is a success.
 */

import { Ok, Err, RagError, OwnerIdSchema } from '../common/index.js'
import type { Result, Logger, CallOptions } from '../common/index.js'
import { DEFAULT_TOP_K } from '../kb/index.js'
import type { VectorStore, RetrievalResult } from '../kb/index.js'
import type { EmbeddingClient } from '../embeddings/index.js'

export interface RetrievalPipelineOptions {
  store: VectorStore
  embeddingClient: EmbeddingClient
  topK?: number
  embedTimeoutMs?: number
  storeTimeoutMs?: number
  logger?: Logger
}

export interface RetrieveOptions {
  topK?: number
  signal?: AbortSignal
  embedTimeoutMs?: number
  storeTimeoutMs?: number
}

export class RetrievalPipeline {
  private readonly store: VectorStore
  private readonly embeddingClient: EmbeddingClient
  private readonly topK: number
  private readonly embedTimeoutMs: number | undefined
  private readonly storeTimeoutMs: number | undefined
  private readonly logger: Logger

  constructor(options: RetrievalPipelineOptions) {
    this.store = options.store
    this.embeddingClient = options.embeddingClient
    this.topK = options.topK ?? DEFAULT_TOP_K
    this.embedTimeoutMs = options.embedTimeoutMs
    this.storeTimeoutMs = options.storeTimeoutMs
    this.logger = options.logger ?? console
  }

  /** Ranked results with distances and metadata. */
  async retrieve(query: string, owner: string, options: RetrieveOptions = {}): Promise<Result<RetrievalResult[], RagError>> {
    if (!OwnerIdSchema.safeParse(owner).success) {
      return Err(RagError.validation(`Invalid owner id: "${owner}"`))
    }
    const topK = options.topK ?? this.topK
    if (!Number.isInteger(topK) || topK < 0) {
      return Err(RagError.validation(`topK must be a non-negative integer, got ${topK}`))
    }
    const started = Date.now()

    let queryVector: number[]
    try {
      queryVector = await this.embeddingClient.embed(query, this.callOptions(options, options.embedTimeoutMs ?? this.embedTimeoutMs))
    } catch (err) {
      const error = RagError.stageFailure('retrieve', err)
      this.logger.error(`[retrieval] ${owner}: query embedding failed: ${error.message}`)
      return Err(error)
    }

    let results: RetrievalResult[]
    try {
      results = await this.store.search(owner, queryVector, topK, this.callOptions(options, options.storeTimeoutMs ?? this.storeTimeoutMs))
    } catch (err) {
      const error = RagError.stageFailure('store', err)
      this.logger.error(`[retrieval] ${owner}: search failed: ${error.message}`)
      return Err(error)
    }

    const distances = results.map(r => r.distance.toFixed(3)).join(', ')
    this.logger.log(
      `[retrieval] ${owner}: ${results.length}/${topK} results in ${Date.now() - started}ms` +
      (results.length > 0 ? ` (distances ${distances})` : ''),
    )
    return Ok(results)
  }

  /** Chunk texts only, in rank order. */
  async retrieveContext(query: string, owner: string, options: RetrieveOptions = {}): Promise<Result<string[], RagError>> {
    const result = await this.retrieve(query, owner, options)
    if (!result.ok) return result
    return Ok(result.value.map(r => r.chunkText))
  }

  private callOptions(options: RetrieveOptions, timeoutMs: number | undefined): CallOptions {
    return { signal: options.signal, timeoutMs }
  }
}

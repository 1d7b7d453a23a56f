/**
 * Ingestion pipeline: extract → chunk → batch-embed → replace-in-store.
 *
 * One call is one unit. Every stage before `replaceAll` only builds values in
 * memory, so a failure or cancellation anywhere leaves the owner's previous
 * generation untouched.
 */

import { v4 as uuidv4 } from 'uuid'
import { Ok, Err, RagError, OwnerIdSchema, throwIfAborted } from '../common/index.js'
import type { Result, Logger, PipelineStage, CallOptions } from '../common/index.js'
import type { KBDocument } from '../extraction/index.js'
import { extractText } from '../extraction/index.js'
import { chunkText, DEFAULT_CHUNK_SIZE, DEFAULT_CHUNK_OVERLAP } from '../kb/index.js'
import type { Chunk, VectorStore, VectorRecordInput } from '../kb/index.js'
import type { EmbeddingClient } from '../embeddings/index.js'
import { splitIntoBatches } from '../embeddings/index.js'

export interface IngestionPipelineOptions {
  store: VectorStore
  embeddingClient: EmbeddingClient
  chunkSize?: number
  chunkOverlap?: number
  /** Soft cap on characters per embedding request. */
  maxBatchChars?: number
  embedTimeoutMs?: number
  storeTimeoutMs?: number
  logger?: Logger
}

export interface IngestOptions {
  chunkSize?: number
  overlap?: number
  signal?: AbortSignal
  embedTimeoutMs?: number
  storeTimeoutMs?: number
}

export interface IngestSummary {
  owner: string
  generationId: string
  chunkCount: number
  elapsedMs: number
}

const DEFAULT_MAX_BATCH_CHARS = 100_000

/** Run one stage, re-throwing any failure as that stage's wrapped error. */
async function stage<T>(name: PipelineStage, fn: () => T | Promise<T>): Promise<T> {
  try {
    return await fn()
  } catch (err) {
    throw RagError.stageFailure(name, err)
  }
}

export class IngestionPipeline {
  private readonly store: VectorStore
  private readonly embeddingClient: EmbeddingClient
  private readonly chunkSize: number
  private readonly chunkOverlap: number
  private readonly maxBatchChars: number
  private readonly embedTimeoutMs: number | undefined
  private readonly storeTimeoutMs: number | undefined
  private readonly logger: Logger
  private readonly inFlight = new Set<string>()

  constructor(options: IngestionPipelineOptions) {
    this.store = options.store
    this.embeddingClient = options.embeddingClient
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE
    this.chunkOverlap = options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP
    this.maxBatchChars = options.maxBatchChars ?? DEFAULT_MAX_BATCH_CHARS
    this.embedTimeoutMs = options.embedTimeoutMs
    this.storeTimeoutMs = options.storeTimeoutMs
    this.logger = options.logger ?? console
  }

  /** Owners with an ingestion currently running in this pipeline. */
  isIngesting(owner: string): boolean {
    return this.inFlight.has(owner.trim())
  }

  async ingest(document: KBDocument, owner: string, options: IngestOptions = {}): Promise<Result<IngestSummary, RagError>> {
    const parsedOwner = OwnerIdSchema.safeParse(owner)
    if (!parsedOwner.success) {
      return Err(RagError.validation(`Invalid owner id: ${parsedOwner.error.issues[0]?.message ?? 'unknown'}`))
    }
    const ownerId = parsedOwner.data

    if (this.inFlight.has(ownerId)) {
      this.logger.warn(`[ingest] rejected ${document.filename} for ${ownerId}: ingestion already running`)
      return Err(RagError.ingestionInProgress(ownerId))
    }

    this.inFlight.add(ownerId)
    const started = Date.now()
    this.logger.log(`[ingest] ${ownerId}: ${document.filename} (${document.format}, ${document.bytes.byteLength} bytes)`)

    try {
      const installed = await this.run(document, ownerId, options)
      const summary: IngestSummary = {
        owner: ownerId,
        generationId: installed.generationId,
        chunkCount: installed.chunkCount,
        elapsedMs: Date.now() - started,
      }
      this.logger.log(`[ingest] ${ownerId}: stored ${summary.chunkCount} chunks in ${summary.elapsedMs}ms`)
      return Ok(summary)
    } catch (err) {
      const error = err instanceof RagError ? err : RagError.stageFailure('store', err)
      this.logger.error(`[ingest] ${ownerId}: ${document.filename} failed at ${error.stage ?? 'unknown'} stage: ${error.message}`)
      return Err(error)
    } finally {
      this.inFlight.delete(ownerId)
    }
  }

  private async run(
    document: KBDocument,
    ownerId: string,
    options: IngestOptions,
  ): Promise<{ generationId: string; chunkCount: number }> {
    const { signal } = options

    const text = await stage('extract', () => {
      throwIfAborted(signal, 'ingestion')
      return extractText(document)
    })

    const chunks = await stage('chunk', () => {
      const result = chunkText(text, {
        chunkSize: options.chunkSize ?? this.chunkSize,
        overlap: options.overlap ?? this.chunkOverlap,
      })
      if (result.length === 0) throw RagError.emptyDocument(document.filename)
      return result
    })

    const embeddings = await stage('embed', () =>
      this.embedChunks(chunks, { signal, timeoutMs: options.embedTimeoutMs ?? this.embedTimeoutMs }),
    )

    const records: VectorRecordInput[] = chunks.map((chunk, i) => ({
      chunkText: chunk.text,
      embedding: embeddings[i],
      metadata: {
        filename: document.filename,
        format: document.format,
        ordinal: chunk.ordinal,
        chunkCount: chunks.length,
        startOffset: chunk.sourceMetadata.startOffset,
        endOffset: chunk.sourceMetadata.endOffset,
      },
    }))

    const generationId = uuidv4()
    await stage('store', () => {
      throwIfAborted(signal, 'ingestion')
      return this.store.replaceAll(ownerId, records, {
        generationId,
        sourceName: document.filename,
        embeddingModel: this.embeddingClient.providerFingerprint,
        signal,
        timeoutMs: options.storeTimeoutMs ?? this.storeTimeoutMs,
      })
    })

    return { generationId, chunkCount: records.length }
  }

  private async embedChunks(chunks: Chunk[], callOptions: CallOptions): Promise<number[][]> {
    const batches = splitIntoBatches(
      chunks.map(chunk => chunk.text),
      { maxItems: this.embeddingClient.maxBatchSize, maxChars: this.maxBatchChars },
    )

    const vectors: number[][] = []
    for (const batch of batches) {
      throwIfAborted(callOptions.signal, 'ingestion')
      vectors.push(...await this.embeddingClient.embedBatch(batch, callOptions))
    }

    if (vectors.length !== chunks.length) {
      throw RagError.provider(`Received ${vectors.length} embeddings for ${chunks.length} chunks`, 'unknown')
    }
    for (const vector of vectors) {
      if (vector.length !== this.store.dimensions) {
        throw RagError.dimensionMismatch(this.store.dimensions, vector.length)
      }
    }
    return vectors
  }
}

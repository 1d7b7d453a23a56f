/**
 * Wires settings into a ready-to-use knowledge base: database, vector store,
 * embedding client and both pipelines.
 */

import type Database from 'better-sqlite3'
import { Ok, Err, RagError, errorMessage, settle } from '../common/index.js'
import type { Logger, Result } from '../common/index.js'
import type { RagSettings } from '../config/index.js'
import { openDatabase, runMigrations } from '../storage/index.js'
import { createDocument } from '../extraction/index.js'
import type { KBDocument } from '../extraction/index.js'
import { SqliteVectorStore } from '../kb/index.js'
import type { VectorStore, KnowledgeGeneration } from '../kb/index.js'
import { createEmbeddingClient } from '../embeddings/index.js'
import type { EmbeddingClient } from '../embeddings/index.js'
import { IngestionPipeline } from './ingestion-pipeline.js'
import { RetrievalPipeline } from './retrieval-pipeline.js'

export interface RagCoreOverrides {
  /** Use this connection instead of opening `settings.databasePath`. Left open by close(). */
  db?: Database.Database
  embeddingClient?: EmbeddingClient
  logger?: Logger
}

export interface RagCore {
  readonly settings: RagSettings
  readonly store: VectorStore
  readonly embeddingClient: EmbeddingClient
  readonly ingestion: IngestionPipeline
  readonly retrieval: RetrievalPipeline
  /** Build an ingestible document from an upload, enforcing `settings.maxUploadBytes`. */
  createDocument(filename: string, bytes: Uint8Array, mimeType?: string): Result<KBDocument, RagError>
  hasKnowledgeBase(owner: string): Promise<Result<boolean, RagError>>
  getKnowledgeBase(owner: string): Promise<Result<KnowledgeGeneration | null, RagError>>
  deleteKnowledgeBase(owner: string): Promise<Result<number, RagError>>
  close(): void
}

function asRagError(err: unknown): RagError {
  return err instanceof RagError ? err : RagError.db(errorMessage(err), err)
}

export function createRagCore(settings: RagSettings, overrides: RagCoreOverrides = {}): RagCore {
  const logger = overrides.logger ?? console
  const embeddingClient = overrides.embeddingClient ?? createEmbeddingClient(settings, logger)

  const ownsDb = overrides.db === undefined
  const db = overrides.db ?? openDatabase(settings.databasePath, { busyTimeoutMs: settings.storeTimeoutMs })
  if (!ownsDb) runMigrations(db)

  const store = new SqliteVectorStore(db, {
    dimensions: embeddingClient.dimensions,
    ivfMinVectors: settings.ivfMinVectors,
    ivfProbes: settings.ivfProbes,
    ivfCacheSize: settings.ivfCacheSize,
    defaultTimeoutMs: settings.storeTimeoutMs,
    logger,
  })

  const ingestion = new IngestionPipeline({
    store,
    embeddingClient,
    chunkSize: settings.chunkSize,
    chunkOverlap: settings.chunkOverlap,
    maxBatchChars: settings.embedMaxBatchChars,
    embedTimeoutMs: settings.embedTimeoutMs,
    storeTimeoutMs: settings.storeTimeoutMs,
    logger,
  })

  const retrieval = new RetrievalPipeline({
    store,
    embeddingClient,
    topK: settings.topK,
    embedTimeoutMs: settings.embedTimeoutMs,
    storeTimeoutMs: settings.storeTimeoutMs,
    logger,
  })

  return {
    settings,
    store,
    embeddingClient,
    ingestion,
    retrieval,

    createDocument: (filename, bytes, mimeType) => {
      try {
        return Ok(createDocument(filename, bytes, mimeType, settings.maxUploadBytes))
      } catch (err) {
        return Err(err instanceof RagError ? err : RagError.validation(errorMessage(err)))
      }
    },

    hasKnowledgeBase: owner => settle(store.count(owner).then(n => n > 0), asRagError),

    getKnowledgeBase: owner => settle(store.getGeneration(owner), asRagError),

    deleteKnowledgeBase: async owner => {
      if (ingestion.isIngesting(owner)) return Err(RagError.ingestionInProgress(owner.trim()))
      const result = await settle(store.deleteAll(owner), asRagError)
      if (result.ok) logger.log(`[vector-store] deleted ${result.value} records for ${owner}`)
      return result
    },

    close: () => {
      if (ownsDb && db.open) db.close()
    },
  }
}

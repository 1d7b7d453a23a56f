/**
 * SQLite-backed vector store.
 *
 * Vectors live in `knowledge_vectors` as little-endian Float32 blobs; the
 * installed generation per owner lives in `knowledge_generations`. Writes for
 * one owner happen in a single transaction, so a reader sees either the old
 * generation or the new one. Owners below `ivfMinVectors` records are searched
 * by exact linear scan; larger owners go through a cached IVF-flat index that
 * is rebuilt whenever the owner's generation changes.
 */

import type Database from 'better-sqlite3'
import { v4 as uuidv4 } from 'uuid'
import { RagError, OwnerIdSchema, MetadataSchema, throwIfAborted, errorMessage } from '../common/index.js'
import type { Logger } from '../common/index.js'
import type {
  RetrievalResult,
  VectorRecordInput,
  KnowledgeGeneration,
  ReplaceAllOptions,
  StoreCallOptions,
} from './schemas.js'
import type { VectorStore } from './vector-store.js'
import { DEFAULT_TOP_K } from './vector-store.js'
import { assertUsableVector, cosineDistance, norm, packFloat32, unpackFloat32 } from './vector-math.js'
import { IvfFlatIndex, compareScored } from './ivf-index.js'
import type { IndexedVector, ScoredEntry } from './ivf-index.js'

export interface SqliteVectorStoreOptions {
  dimensions: number
  /** Owners with at least this many records are searched through the IVF index. */
  ivfMinVectors?: number
  /** Clusters scanned per IVF query. */
  ivfProbes?: number
  /** Cluster count override; defaults to sqrt(n). */
  ivfLists?: number
  /** Owners whose IVF index is kept in memory; least recently searched is evicted first. */
  ivfCacheSize?: number
  /** Lock-wait bound used when a call passes no timeoutMs. */
  defaultTimeoutMs?: number
  logger?: Logger
}

interface VectorRow {
  seq: number
  id: string
  chunk_text: string
  dimensions: number
  embedding: Buffer
  metadata: string
}

interface GenerationRow {
  owner: string
  generation_id: string
  source_name: string | null
  embedding_model: string | null
  dimensions: number
  record_count: number
  completed_at: string
}

interface StoredVector extends IndexedVector {
  id: string
  chunkText: string
  metadata: Record<string, unknown>
}

const DEFAULT_IVF_MIN_VECTORS = 512
const DEFAULT_IVF_PROBES = 8
const DEFAULT_IVF_CACHE_SIZE = 16
const DEFAULT_TIMEOUT_MS = 5000

function parseOwner(owner: string): string {
  const parsed = OwnerIdSchema.safeParse(owner)
  if (!parsed.success) {
    throw RagError.validation(`Invalid owner id: ${parsed.error.issues[0]?.message ?? 'unknown'}`)
  }
  return parsed.data
}

function isBusyError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'SQLITE_BUSY' || err.code === 'SQLITE_LOCKED')
}

export class SqliteVectorStore implements VectorStore {
  readonly dimensions: number
  private readonly db: Database.Database
  private readonly ivfMinVectors: number
  private readonly ivfProbes: number
  private readonly ivfLists: number | undefined
  private readonly ivfCacheSize: number
  private readonly defaultTimeoutMs: number
  private readonly logger: Logger
  private readonly indexCache = new Map<string, { generationId: string; index: IvfFlatIndex<StoredVector> }>()

  constructor(db: Database.Database, options: SqliteVectorStoreOptions) {
    if (!Number.isInteger(options.dimensions) || options.dimensions <= 0) {
      throw RagError.validation(`dimensions must be a positive integer, got ${options.dimensions}`)
    }
    this.db = db
    this.dimensions = options.dimensions
    this.ivfMinVectors = options.ivfMinVectors ?? DEFAULT_IVF_MIN_VECTORS
    this.ivfProbes = options.ivfProbes ?? DEFAULT_IVF_PROBES
    this.ivfLists = options.ivfLists
    this.ivfCacheSize = Math.max(1, options.ivfCacheSize ?? DEFAULT_IVF_CACHE_SIZE)
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS
    this.logger = options.logger ?? console
  }

  async replaceAll(owner: string, records: VectorRecordInput[], options: ReplaceAllOptions = {}): Promise<number> {
    return this.run('replaceAll', options, () => {
      const ownerId = parseOwner(owner)

      // Validate the whole batch before the transaction touches anything
      records.forEach((record, i) => {
        if (record.chunkText.trim().length === 0) {
          throw RagError.validation(`Record ${i} has empty chunk text`)
        }
        assertUsableVector(record.embedding, this.dimensions, `Record ${i} embedding`)
      })

      const generationId = options.generationId ?? uuidv4()
      const now = new Date().toISOString()

      this.db.transaction(() => {
        this.db.prepare('DELETE FROM knowledge_vectors WHERE owner = ?').run(ownerId)

        const insert = this.db.prepare(`
          INSERT INTO knowledge_vectors (id, owner, chunk_text, dimensions, embedding, metadata, created_at)
          VALUES (?, ?, ?, ?, ?, ?, ?)
        `)
        for (const record of records) {
          insert.run(
            uuidv4(),
            ownerId,
            record.chunkText,
            this.dimensions,
            packFloat32(record.embedding),
            JSON.stringify(record.metadata),
            now,
          )
        }

        this.db.prepare(`
          INSERT INTO knowledge_generations (owner, generation_id, source_name, embedding_model, dimensions, record_count, completed_at)
          VALUES (?, ?, ?, ?, ?, ?, ?)
          ON CONFLICT(owner) DO UPDATE SET
            generation_id = excluded.generation_id,
            source_name = excluded.source_name,
            embedding_model = excluded.embedding_model,
            dimensions = excluded.dimensions,
            record_count = excluded.record_count,
            completed_at = excluded.completed_at
        `).run(
          ownerId,
          generationId,
          options.sourceName ?? null,
          options.embeddingModel ?? null,
          this.dimensions,
          records.length,
          now,
        )
      })()

      this.indexCache.delete(ownerId)
      this.logger.log(`[vector-store] installed generation ${generationId.slice(0, 8)} for ${ownerId}: ${records.length} records`)
      return records.length
    })
  }

  async search(
    owner: string,
    queryVector: ArrayLike<number>,
    topK: number = DEFAULT_TOP_K,
    options: StoreCallOptions = {},
  ): Promise<RetrievalResult[]> {
    return this.run('search', options, () => {
      const ownerId = parseOwner(owner)
      if (!Number.isInteger(topK) || topK < 0) {
        throw RagError.validation(`topK must be a non-negative integer, got ${topK}`)
      }
      assertUsableVector(queryVector, this.dimensions, 'Query vector')
      if (topK === 0) return []

      const count = this.countRows(ownerId)
      if (count === 0) return []

      const generation = this.readGeneration(ownerId)
      const scored = count >= this.ivfMinVectors && generation
        ? this.indexFor(ownerId, generation.generation_id).search(queryVector, topK, this.ivfProbes)
        : this.scan(this.loadVectors(ownerId), queryVector, topK)

      return scored.map(({ entry, distance }) => ({
        id: entry.id,
        chunkText: entry.chunkText,
        distance,
        metadata: entry.metadata,
      }))
    })
  }

  async deleteAll(owner: string, options: StoreCallOptions = {}): Promise<number> {
    return this.run('deleteAll', options, () => {
      const ownerId = parseOwner(owner)
      let removed = 0
      this.db.transaction(() => {
        removed = this.db.prepare('DELETE FROM knowledge_vectors WHERE owner = ?').run(ownerId).changes
        this.db.prepare('DELETE FROM knowledge_generations WHERE owner = ?').run(ownerId)
      })()
      this.indexCache.delete(ownerId)
      return removed
    })
  }

  async count(owner: string, options: StoreCallOptions = {}): Promise<number> {
    return this.run('count', options, () => this.countRows(parseOwner(owner)))
  }

  async getGeneration(owner: string, options: StoreCallOptions = {}): Promise<KnowledgeGeneration | null> {
    return this.run('getGeneration', options, () => {
      const row = this.readGeneration(parseOwner(owner))
      if (!row) return null
      return {
        owner: row.owner,
        generationId: row.generation_id,
        sourceName: row.source_name,
        embeddingModel: row.embedding_model,
        dimensions: row.dimensions,
        recordCount: row.record_count,
        completedAt: row.completed_at,
      }
    })
  }

  /**
   * Run a synchronous statement block under the caller's signal and lock-wait
   * bound. SQLite calls cannot be interrupted once started, so cancellation is
   * checked up front and `timeoutMs` is applied as the busy timeout.
   */
  private async run<T>(operation: string, options: StoreCallOptions, fn: () => T): Promise<T> {
    throwIfAborted(options.signal, `vector-store ${operation}`)
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs
    let previous: number | undefined
    try {
      previous = Number(this.db.pragma('busy_timeout', { simple: true }))
      this.db.pragma(`busy_timeout = ${Math.max(0, Math.floor(timeoutMs))}`)
      return fn()
    } catch (err) {
      if (err instanceof RagError) throw err
      if (isBusyError(err)) throw RagError.timeout(`vector-store ${operation}`, timeoutMs)
      throw RagError.db(`vector-store ${operation} failed: ${errorMessage(err)}`, err)
    } finally {
      if (previous !== undefined && this.db.open) this.db.pragma(`busy_timeout = ${previous}`)
    }
  }

  private countRows(ownerId: string): number {
    const row = this.db.prepare('SELECT COUNT(*) as count FROM knowledge_vectors WHERE owner = ?').get(ownerId) as { count: number }
    return row.count
  }

  private readGeneration(ownerId: string): GenerationRow | undefined {
    return this.db.prepare('SELECT * FROM knowledge_generations WHERE owner = ?').get(ownerId) as GenerationRow | undefined
  }

  private loadVectors(ownerId: string): StoredVector[] {
    const rows = this.db.prepare(`
      SELECT seq, id, chunk_text, dimensions, embedding, metadata
      FROM knowledge_vectors
      WHERE owner = ?
      ORDER BY seq
    `).all(ownerId) as VectorRow[]

    const vectors: StoredVector[] = []
    for (const row of rows) {
      const vector = unpackFloat32(row.embedding, row.dimensions)
      if (!vector || row.dimensions !== this.dimensions) {
        this.logger.warn(`[vector-store] skipping corrupt embedding ${row.id} for ${ownerId}`)
        continue
      }
      vectors.push({
        seq: row.seq,
        id: row.id,
        chunkText: row.chunk_text,
        vector,
        norm: norm(vector),
        metadata: this.parseMetadata(row),
      })
    }
    return vectors
  }

  private parseMetadata(row: VectorRow): Record<string, unknown> {
    try {
      const parsed = MetadataSchema.safeParse(JSON.parse(row.metadata))
      if (parsed.success) return parsed.data
    } catch (err) {
      this.logger.warn(`[vector-store] unreadable metadata on ${row.id}: ${errorMessage(err)}`)
      return {}
    }
    this.logger.warn(`[vector-store] metadata on ${row.id} is not an object`)
    return {}
  }

  private scan(vectors: StoredVector[], query: ArrayLike<number>, topK: number): ScoredEntry<StoredVector>[] {
    const queryNorm = norm(query)
    return vectors
      .filter(entry => entry.norm > 0)
      .map(entry => ({ entry, distance: cosineDistance(query, entry.vector, queryNorm, entry.norm) }))
      .sort(compareScored)
      .slice(0, topK)
  }

  private indexFor(ownerId: string, generationId: string): IvfFlatIndex<StoredVector> {
    const cached = this.indexCache.get(ownerId)
    if (cached && cached.generationId === generationId) {
      // Map order doubles as recency order
      this.indexCache.delete(ownerId)
      this.indexCache.set(ownerId, cached)
      return cached.index
    }

    const started = Date.now()
    const index = IvfFlatIndex.build(
      this.loadVectors(ownerId).filter(entry => entry.norm > 0),
      { lists: this.ivfLists },
    )
    this.indexCache.delete(ownerId)
    this.indexCache.set(ownerId, { generationId, index })
    for (const evicted of this.indexCache.keys()) {
      if (this.indexCache.size <= this.ivfCacheSize) break
      this.indexCache.delete(evicted)
      this.logger.log(`[vector-store] evicted IVF index for ${evicted}`)
    }
    this.logger.log(
      `[vector-store] built IVF index for ${ownerId}: ${index.size} vectors in ${index.listCount} lists (${Date.now() - started}ms)`,
    )
    return index
  }
}

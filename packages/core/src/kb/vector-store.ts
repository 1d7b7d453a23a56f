/**
 * Vector store contract: every operation is scoped to one owner (agent).
 * Implementations must make replaceAll atomic for concurrent readers and give
 * read-after-write consistency to their own writer.
 */

import type {
  RetrievalResult,
  VectorRecordInput,
  KnowledgeGeneration,
  ReplaceAllOptions,
  StoreCallOptions,
} from './schemas.js'

export const DEFAULT_TOP_K = 3

export interface VectorStore {
  /** Fixed dimensionality every stored vector must have. */
  readonly dimensions: number

  /** Delete every record for `owner`, then insert `records`, as one unit. Returns the number stored. */
  replaceAll(owner: string, records: VectorRecordInput[], options?: ReplaceAllOptions): Promise<number>

  /** The `topK` nearest records by cosine distance, ascending; ties by insertion order. */
  search(owner: string, queryVector: ArrayLike<number>, topK?: number, options?: StoreCallOptions): Promise<RetrievalResult[]>

  /** Remove every record for `owner`. Returns the number removed. */
  deleteAll(owner: string, options?: StoreCallOptions): Promise<number>

  count(owner: string, options?: StoreCallOptions): Promise<number>

  /** The generation currently installed for `owner`, or null when it has none. */
  getGeneration(owner: string, options?: StoreCallOptions): Promise<KnowledgeGeneration | null>
}

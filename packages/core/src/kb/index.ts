/**
 * Knowledge base: chunking, vector math, ANN index and the owner-scoped vector store.
 */

export { chunkText, findBoundary, DEFAULT_CHUNK_SIZE, DEFAULT_CHUNK_OVERLAP } from './chunker.js'
export type { Chunk, ChunkerOptions, ChunkSourceMetadata } from './chunker.js'

export {
  packFloat32,
  unpackFloat32,
  dot,
  norm,
  l2Normalize,
  cosineDistance,
  assertUsableVector,
} from './vector-math.js'
export type { Vector } from './vector-math.js'

export { IvfFlatIndex, compareScored } from './ivf-index.js'
export type { IndexedVector, ScoredEntry, IvfBuildOptions } from './ivf-index.js'

export { DEFAULT_TOP_K } from './vector-store.js'
export type { VectorStore } from './vector-store.js'
export { SqliteVectorStore } from './sqlite-vector-store.js'
export type { SqliteVectorStoreOptions } from './sqlite-vector-store.js'

export {
  VectorRecordSchema,
  VectorRecordInputSchema,
  RetrievalResultSchema,
  KnowledgeGenerationSchema,
} from './schemas.js'
export type {
  VectorRecord,
  VectorRecordInput,
  RetrievalResult,
  KnowledgeGeneration,
  StoreCallOptions,
  ReplaceAllOptions,
} from './schemas.js'

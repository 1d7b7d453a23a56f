/**
 * @agent-kb/core
 *
 * Retrieval-augmented knowledge base for conversational agents.
 * Provides text extraction, chunking, embeddings, an owner-scoped vector
 * store, and the ingestion and retrieval pipelines built on them.
 */

export * from './common/index.js'
export * from './config/index.js'
export * from './storage/index.js'
export * from './extraction/index.js'
export * from './kb/index.js'
export * from './embeddings/index.js'
export * from './rag/index.js'

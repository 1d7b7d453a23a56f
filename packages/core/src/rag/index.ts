/**
 * RAG pipelines: ingestion, retrieval, prompt assembly and core wiring.
 */

export { IngestionPipeline } from './ingestion-pipeline.js'
export type { IngestionPipelineOptions, IngestOptions, IngestSummary } from './ingestion-pipeline.js'

export { RetrievalPipeline } from './retrieval-pipeline.js'
export type { RetrievalPipelineOptions, RetrieveOptions } from './retrieval-pipeline.js'

export {
  formatContextBlock,
  buildAugmentedSystemPrompt,
  DEFAULT_SYSTEM_PROMPT,
  CONTEXT_PREAMBLE,
} from './context-formatter.js'
export type { ContextBlockOptions } from './context-formatter.js'

export { createRagCore } from './rag-core.js'
export type { RagCore, RagCoreOverrides } from './rag-core.js'

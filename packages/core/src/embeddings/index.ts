/**
 * Embeddings: provider clients, retry policy and batching.
 */

export { ProviderEmbeddingClient } from './embedding-client.js'
export type { EmbeddingClient, EmbedCallOptions, ProviderClientOptions } from './embedding-client.js'

export { OpenAIEmbeddingClient, mapOpenAIError, OPENAI_MAX_BATCH_SIZE, DEFAULT_OPENAI_MODEL, DEFAULT_OPENAI_DIMENSIONS } from './openai-embeddings.js'
export type { OpenAIEmbeddingOptions } from './openai-embeddings.js'
export {
  OllamaEmbeddingClient,
  normalizeOllamaUrl,
  OLLAMA_MAX_BATCH_SIZE,
  DEFAULT_OLLAMA_URL,
  DEFAULT_OLLAMA_MODEL,
} from './ollama-embeddings.js'
export type { OllamaEmbeddingOptions } from './ollama-embeddings.js'

export { createEmbeddingClient, retryPolicyFromSettings } from './factory.js'
export { retryOnRateLimit, backoffDelay, isRateLimited, DEFAULT_RETRY_POLICY } from './retry.js'
export type { RetryPolicy, RetryHooks } from './retry.js'
export { splitIntoBatches } from './batching.js'
export type { BatchLimits } from './batching.js'
export { reasonForStatus, parseRetryAfter } from './provider-errors.js'

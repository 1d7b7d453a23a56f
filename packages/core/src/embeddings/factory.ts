/**
 * Build the configured embedding client.
 * OpenAI requires explicit selection and a key; it is never auto-detected.
 */

import { RagError } from '../common/index.js'
import type { Logger } from '../common/index.js'
import type { RagSettings } from '../config/index.js'
import type { EmbeddingClient } from './embedding-client.js'
import type { RetryPolicy } from './retry.js'
import { OpenAIEmbeddingClient } from './openai-embeddings.js'
import { OllamaEmbeddingClient } from './ollama-embeddings.js'

export function retryPolicyFromSettings(settings: RagSettings): RetryPolicy {
  return {
    maxAttempts: settings.embedMaxAttempts,
    baseDelayMs: settings.embedBaseDelayMs,
    maxDelayMs: settings.embedMaxDelayMs,
  }
}

export function createEmbeddingClient(settings: RagSettings, logger: Logger = console): EmbeddingClient {
  const shared = {
    retry: retryPolicyFromSettings(settings),
    timeoutMs: settings.embedTimeoutMs,
    logger,
  }

  switch (settings.embeddingProvider) {
    case 'openai': {
      if (!settings.openaiApiKey) {
        throw RagError.validation('OpenAI embedding requires an API key. Set OPENAI_API_KEY.')
      }
      logger.log(`[embedding] using OpenAI ${settings.embeddingModel} (${settings.embeddingDimensions}d)`)
      return new OpenAIEmbeddingClient({
        ...shared,
        apiKey: settings.openaiApiKey,
        model: settings.embeddingModel,
        dimensions: settings.embeddingDimensions,
      })
    }
    case 'ollama': {
      logger.log(`[embedding] using Ollama ${settings.embeddingModel} at ${settings.ollamaBaseUrl}`)
      return new OllamaEmbeddingClient({
        ...shared,
        model: settings.embeddingModel,
        dimensions: settings.embeddingDimensions,
        baseUrl: settings.ollamaBaseUrl,
      })
    }
    default: {
      const unknown: never = settings.embeddingProvider
      throw RagError.validation(`Unknown embedding provider: ${String(unknown)}`)
    }
  }
}

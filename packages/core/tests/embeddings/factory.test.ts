import { describe, it, expect } from 'vitest'
import { createEmbeddingClient, retryPolicyFromSettings } from '../../src/embeddings/factory.js'
import { OpenAIEmbeddingClient } from '../../src/embeddings/openai-embeddings.js'
import { OllamaEmbeddingClient } from '../../src/embeddings/ollama-embeddings.js'
import { parseSettings } from '../../src/config/index.js'
import type { RagSettings } from '../../src/config/index.js'
import { unwrap, isRagError, silentLogger } from '../../src/common/index.js'

function settings(input: Record<string, unknown>): RagSettings {
  return unwrap(parseSettings(input, silentLogger))
}

describe('createEmbeddingClient', () => {
  it('builds an OpenAI client when a key is configured', () => {
    const client = createEmbeddingClient(settings({ openaiApiKey: 'test-secret', embeddingDimensions: 512 }), silentLogger)
    expect(client).toBeInstanceOf(OpenAIEmbeddingClient)
    expect(client.dimensions).toBe(512)
  })

  it('refuses OpenAI without a key', () => {
    let caught: unknown
    try {
      createEmbeddingClient(settings({}), silentLogger)
    } catch (err) {
      caught = err
    }
    expect(isRagError(caught, 'VALIDATION_ERROR')).toBe(true)
  })

  it('builds an Ollama client from the configured model and URL', () => {
    const client = createEmbeddingClient(settings({
      embeddingProvider: 'ollama',
      embeddingModel: 'nomic-embed-text',
      embeddingDimensions: 768,
      ollamaBaseUrl: 'http://gpu-box:11434',
    }), silentLogger)
    expect(client).toBeInstanceOf(OllamaEmbeddingClient)
    expect(client.modelName).toBe('nomic-embed-text')
    expect(client.dimensions).toBe(768)
  })
})

describe('retryPolicyFromSettings', () => {
  it('copies the retry settings', () => {
    expect(retryPolicyFromSettings(settings({ embedMaxAttempts: 5, embedBaseDelayMs: 100, embedMaxDelayMs: 1000 })))
      .toEqual({ maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 1000 })
  })
})

/**
 * OpenAI embedding client: calls the embeddings API through the official SDK.
 * The SDK's own retries are disabled; rate limits go through the shared policy.
 */

import OpenAI, { APIConnectionError, APIError, APIUserAbortError } from 'openai'
import { RagError } from '../common/index.js'
import { ProviderEmbeddingClient } from './embedding-client.js'
import type { ProviderClientOptions } from './embedding-client.js'
import { parseRetryAfter, reasonForStatus } from './provider-errors.js'

export const OPENAI_MAX_BATCH_SIZE = 2048
export const DEFAULT_OPENAI_MODEL = 'text-embedding-3-small'
export const DEFAULT_OPENAI_DIMENSIONS = 1536

export interface OpenAIEmbeddingOptions extends Partial<Pick<ProviderClientOptions, 'retry' | 'timeoutMs' | 'logger'>> {
  apiKey: string
  model?: string
  dimensions?: number
  baseUrl?: string
}

/** Map an SDK failure onto EMBEDDING_PROVIDER_ERROR with a reason. */
export function mapOpenAIError(err: unknown): RagError {
  if (err instanceof RagError) return err
  if (err instanceof APIUserAbortError) {
    return RagError.cancelled('OpenAI embedding request')
  }
  if (err instanceof APIConnectionError) {
    return RagError.provider(`OpenAI unreachable: ${err.message}`, 'network', { cause: err })
  }
  if (err instanceof APIError) {
    const retryAfter = err.headers?.['retry-after']
    return RagError.provider(`OpenAI embeddings failed (${err.status ?? 'no status'}): ${err.message}`, reasonForStatus(err.status), {
      status: err.status,
      retryAfterMs: parseRetryAfter(retryAfter),
      cause: err,
    })
  }
  const message = err instanceof Error ? err.message : String(err)
  return RagError.provider(`OpenAI embeddings failed: ${message}`, 'unknown', { cause: err })
}

/** Only the text-embedding-3 family accepts a `dimensions` request parameter. */
function supportsDimensionsParam(model: string): boolean {
  return model.startsWith('text-embedding-3')
}

export class OpenAIEmbeddingClient extends ProviderEmbeddingClient {
  private readonly client: OpenAI

  constructor(options: OpenAIEmbeddingOptions) {
    const model = options.model ?? DEFAULT_OPENAI_MODEL
    super({
      modelName: model,
      dimensions: options.dimensions ?? DEFAULT_OPENAI_DIMENSIONS,
      maxBatchSize: OPENAI_MAX_BATCH_SIZE,
      providerFingerprint: `openai:${model}:openai`,
      retry: options.retry,
      timeoutMs: options.timeoutMs,
      logger: options.logger,
    })
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl, maxRetries: 0 })
  }

  protected async requestEmbeddings(texts: string[], signal: AbortSignal): Promise<number[][]> {
    try {
      const response = await this.client.embeddings.create(
        {
          model: this.modelName,
          input: texts,
          encoding_format: 'float',
          ...(supportsDimensionsParam(this.modelName) ? { dimensions: this.dimensions } : {}),
        },
        { signal },
      )
      // Sort by index to preserve order (API may return unordered)
      return [...response.data].sort((a, b) => a.index - b.index).map(item => item.embedding)
    } catch (err) {
      throw mapOpenAIError(err)
    }
  }
}

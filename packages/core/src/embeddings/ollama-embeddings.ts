/**
 * Ollama embedding client: calls /api/embed on a local Ollama server.
 */

import { z } from 'zod'
import { RagError, errorMessage, withDeadline } from '../common/index.js'
import type { Logger } from '../common/index.js'
import { ProviderEmbeddingClient } from './embedding-client.js'
import type { ProviderClientOptions } from './embedding-client.js'
import { parseRetryAfter, reasonForStatus } from './provider-errors.js'

export const OLLAMA_MAX_BATCH_SIZE = 50
export const DEFAULT_OLLAMA_URL = 'http://localhost:11434'
export const DEFAULT_OLLAMA_MODEL = 'nomic-embed-text'

const PROBE_TIMEOUT_MS = 30_000

const EmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
})

const ShowResponseSchema = z.object({
  digest: z.string().optional(),
})

export interface OllamaEmbeddingOptions extends Partial<Pick<ProviderClientOptions, 'retry' | 'timeoutMs' | 'logger'>> {
  model: string
  dimensions: number
  baseUrl?: string
  providerFingerprint?: string
}

export function normalizeOllamaUrl(url: string): string {
  let normalized = url.trim().replace(/\/+$/, '')
  // Strip /v1 suffix if accidentally included
  if (normalized.endsWith('/v1')) {
    normalized = normalized.slice(0, -3)
  }
  if (!normalized.startsWith('http://') && !normalized.startsWith('https://')) {
    throw RagError.validation(`Ollama URL must start with http:// or https://, got: ${normalized}`)
  }
  return normalized
}

async function postEmbed(baseUrl: string, model: string, input: string[], signal: AbortSignal): Promise<number[][]> {
  let response: Response
  try {
    response = await fetch(`${baseUrl}/api/embed`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ model, input }),
      signal,
    })
  } catch (err) {
    if (signal.aborted) {
      throw signal.reason instanceof RagError ? signal.reason : RagError.cancelled('Ollama embedding request')
    }
    throw RagError.provider(`Ollama unreachable at ${baseUrl}: ${errorMessage(err)}`, 'network', { cause: err })
  }

  if (!response.ok) {
    const body = await response.text().catch(() => '')
    throw RagError.provider(
      `Ollama embed failed (${response.status}): ${body.slice(0, 200)}`,
      reasonForStatus(response.status),
      { status: response.status, retryAfterMs: parseRetryAfter(response.headers.get('retry-after')) },
    )
  }

  const parsed = EmbedResponseSchema.safeParse(await response.json().catch(() => null))
  if (!parsed.success) {
    throw RagError.provider('Ollama embed response missing embeddings array', 'unknown')
  }
  return parsed.data.embeddings
}

export class OllamaEmbeddingClient extends ProviderEmbeddingClient {
  private readonly baseUrl: string

  constructor(options: OllamaEmbeddingOptions) {
    super({
      modelName: options.model,
      dimensions: options.dimensions,
      maxBatchSize: OLLAMA_MAX_BATCH_SIZE,
      providerFingerprint: options.providerFingerprint ?? `ollama:${options.model}:unknown`,
      retry: options.retry,
      timeoutMs: options.timeoutMs,
      logger: options.logger,
    })
    this.baseUrl = normalizeOllamaUrl(options.baseUrl ?? DEFAULT_OLLAMA_URL)
  }

  protected requestEmbeddings(texts: string[], signal: AbortSignal): Promise<number[][]> {
    return postEmbed(this.baseUrl, this.modelName, texts, signal)
  }

  /**
   * Create an OllamaEmbeddingClient after a smoke test that verifies the model
   * is available and detects its dimensions.
   */
  static async create(options: Omit<OllamaEmbeddingOptions, 'dimensions' | 'providerFingerprint'>): Promise<OllamaEmbeddingClient> {
    const baseUrl = normalizeOllamaUrl(options.baseUrl ?? DEFAULT_OLLAMA_URL)
    const logger: Logger = options.logger ?? console

    const probe = await withDeadline(
      `Ollama model probe (${options.model})`,
      { timeoutMs: options.timeoutMs ?? PROBE_TIMEOUT_MS },
      signal => postEmbed(baseUrl, options.model, ['test'], signal),
    ).catch((err: unknown) => {
      throw RagError.provider(
        `Ollama embedding model "${options.model}" not available. Try: ollama pull ${options.model}\n${errorMessage(err)}`,
        err instanceof RagError && err.reason ? err.reason : 'unknown',
        { cause: err },
      )
    })

    const dimensions = probe[0]?.length ?? 0
    if (dimensions === 0) {
      throw RagError.provider(`Ollama returned empty embeddings for model "${options.model}"`, 'unknown')
    }

    const fingerprint = await fetchFingerprint(baseUrl, options.model, logger)
    return new OllamaEmbeddingClient({ ...options, baseUrl, dimensions, providerFingerprint: fingerprint })
  }
}

async function fetchFingerprint(baseUrl: string, model: string, logger: Logger): Promise<string> {
  const fallback = `ollama:${model}:unknown`
  try {
    const response = await fetch(`${baseUrl}/api/show`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ name: model }),
    })
    if (!response.ok) return fallback
    const parsed = ShowResponseSchema.safeParse(await response.json())
    if (parsed.success && parsed.data.digest) {
      return `ollama:${model}:${parsed.data.digest.slice(0, 12)}`
    }
    return fallback
  } catch (err) {
    // Fingerprint is best-effort
    logger.warn(`[embedding] could not read Ollama model digest for ${model}: ${errorMessage(err)}`)
    return fallback
  }
}

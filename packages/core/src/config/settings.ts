/**
 * Runtime settings: read from environment variables, validated with zod.
 * Every field has a default so a bare environment yields a usable config
 * (OpenAI still needs OPENAI_API_KEY before an embedding client can be built).
 */

import { z } from 'zod'
import { Ok, Err } from '../common/index.js'
import type { Result } from '../common/index.js'
import { RagError } from '../common/index.js'
import type { Logger } from '../common/index.js'

export const EmbeddingProviderSchema = z.enum(['openai', 'ollama'])
export type EmbeddingProviderName = z.infer<typeof EmbeddingProviderSchema>

const MIB = 1024 * 1024

export const RagSettingsSchema = z
  .object({
    embeddingProvider: EmbeddingProviderSchema.default('openai'),
    embeddingModel: z.string().min(1).default('text-embedding-3-small'),
    embeddingDimensions: z.coerce.number().int().positive().default(1536),
    openaiApiKey: z.string().min(1).optional(),
    ollamaBaseUrl: z.string().url().default('http://localhost:11434'),

    chunkSize: z.coerce.number().int().positive().default(500),
    chunkOverlap: z.coerce.number().int().nonnegative().default(50),
    topK: z.coerce.number().int().positive().default(3),

    embedMaxAttempts: z.coerce.number().int().min(1).max(10).default(3),
    embedBaseDelayMs: z.coerce.number().int().nonnegative().default(500),
    embedMaxDelayMs: z.coerce.number().int().nonnegative().default(8000),
    embedTimeoutMs: z.coerce.number().int().positive().default(30_000),
    embedMaxBatchChars: z.coerce.number().int().positive().default(100_000),

    storeTimeoutMs: z.coerce.number().int().positive().default(5000),
    databasePath: z.string().min(1).default('./data/knowledge.db'),
    ivfMinVectors: z.coerce.number().int().positive().default(512),
    ivfProbes: z.coerce.number().int().positive().default(8),
    ivfCacheSize: z.coerce.number().int().positive().default(16),

    maxUploadBytes: z.coerce.number().int().positive().default(MIB),
  })
  // Stricter than chunkText, which clamps overlap to chunkSize - 1 for direct callers
  .refine(s => s.chunkOverlap < s.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  })

export type RagSettings = z.infer<typeof RagSettingsSchema>

/** Environment variable → settings key. */
const ENV_KEYS: Record<string, keyof RagSettings> = {
  EMBEDDING_PROVIDER: 'embeddingProvider',
  EMBEDDING_MODEL: 'embeddingModel',
  EMBEDDING_DIMENSIONS: 'embeddingDimensions',
  OPENAI_API_KEY: 'openaiApiKey',
  OLLAMA_BASE_URL: 'ollamaBaseUrl',
  CHUNK_SIZE: 'chunkSize',
  CHUNK_OVERLAP: 'chunkOverlap',
  TOP_K_RETRIEVAL: 'topK',
  EMBED_MAX_ATTEMPTS: 'embedMaxAttempts',
  EMBED_BASE_DELAY_MS: 'embedBaseDelayMs',
  EMBED_MAX_DELAY_MS: 'embedMaxDelayMs',
  EMBED_TIMEOUT_MS: 'embedTimeoutMs',
  EMBED_MAX_BATCH_CHARS: 'embedMaxBatchChars',
  STORE_TIMEOUT_MS: 'storeTimeoutMs',
  DATABASE_PATH: 'databasePath',
  IVF_MIN_VECTORS: 'ivfMinVectors',
  IVF_PROBES: 'ivfProbes',
  IVF_CACHE_SIZE: 'ivfCacheSize',
}

export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = console,
): Result<RagSettings, RagError> {
  const raw: Record<string, unknown> = {}
  for (const [envKey, settingsKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey]?.trim()
    if (value) raw[settingsKey] = value
  }

  // MAX_UPLOAD_SIZE_MB is expressed in MiB, stored in bytes
  const uploadMb = env.MAX_UPLOAD_SIZE_MB?.trim()
  if (uploadMb) {
    const mb = Number(uploadMb)
    raw.maxUploadBytes = Number.isFinite(mb) ? Math.round(mb * MIB) : uploadMb
  }

  return parseSettings(raw, logger)
}

/** Validate a settings object (e.g. from a config file or test). */
export function parseSettings(input: unknown, logger: Logger = console): Result<RagSettings, RagError> {
  const parsed = RagSettingsSchema.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    return Err(RagError.validation(`Invalid settings: ${issues}`))
  }

  const settings = parsed.data
  if (settings.embeddingProvider === 'openai' && !settings.openaiApiKey) {
    logger.warn('[config] OPENAI_API_KEY not set; the OpenAI embedding client cannot be created.')
  }
  logger.log(
    `[config] embeddings=${settings.embeddingProvider}:${settings.embeddingModel} (${settings.embeddingDimensions}d), ` +
    `chunk=${settings.chunkSize}/${settings.chunkOverlap}, topK=${settings.topK}`,
  )
  return Ok(settings)
}

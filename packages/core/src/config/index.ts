/**
 * Configuration: environment-driven, zod-validated settings.
 */

export { loadSettings, parseSettings, RagSettingsSchema, EmbeddingProviderSchema } from './settings.js'
export type { RagSettings, EmbeddingProviderName } from './settings.js'

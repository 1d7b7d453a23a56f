/**
 * Zod schemas and types for the vector store.
 */

import { z } from 'zod'
import { OwnerIdSchema, MetadataSchema, TimestampSchema, UUIDSchema } from '../common/index.js'
import type { CallOptions } from '../common/index.js'

export const VectorRecordSchema = z.object({
  id: z.string().min(1),
  owner: OwnerIdSchema,
  chunkText: z.string().min(1),
  embedding: z.array(z.number()),
  metadata: MetadataSchema,
  createdAt: TimestampSchema,
})

export type VectorRecord = z.infer<typeof VectorRecordSchema>

/** What ingestion hands the store; id, owner and createdAt are assigned on insert. */
export const VectorRecordInputSchema = VectorRecordSchema.pick({
  chunkText: true,
  embedding: true,
  metadata: true,
})

export type VectorRecordInput = z.infer<typeof VectorRecordInputSchema>

export const RetrievalResultSchema = z.object({
  id: z.string(),
  chunkText: z.string(),
  /** Cosine distance in [0, 2]; smaller is more similar. */
  distance: z.number().min(0).max(2),
  metadata: MetadataSchema,
})

export type RetrievalResult = z.infer<typeof RetrievalResultSchema>

export const KnowledgeGenerationSchema = z.object({
  owner: OwnerIdSchema,
  generationId: UUIDSchema,
  sourceName: z.string().nullable(),
  embeddingModel: z.string().nullable(),
  dimensions: z.number().int().positive(),
  recordCount: z.number().int().nonnegative(),
  completedAt: TimestampSchema,
})

export type KnowledgeGeneration = z.infer<typeof KnowledgeGenerationSchema>

export type StoreCallOptions = CallOptions

export interface ReplaceAllOptions extends StoreCallOptions {
  /** Describes the upload that produced this generation. */
  sourceName?: string
  embeddingModel?: string
  /** Caller-chosen generation id; generated when omitted. */
  generationId?: string
}

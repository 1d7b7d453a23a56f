/**
 * Shared Zod schemas used across modules.
 */

import { z } from 'zod'

export const UUIDSchema = z.string().uuid()

export const TimestampSchema = z.string().datetime()

/** Agent identity that owns a knowledge base. */
export const OwnerIdSchema = z.string().trim().min(1, 'Owner id cannot be empty').max(128)

export const MetadataSchema = z.record(z.unknown())

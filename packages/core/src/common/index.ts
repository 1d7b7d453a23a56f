/**
 * Common utilities: shared types, Result pattern, error handling, deadlines.
 */

export { Ok, Err, unwrap, isOk, isErr, settle } from './result.js'
export type { Result } from './result.js'

export { RagError, errorMessage, isRagError, rootCause } from './errors.js'
export type { ErrorCode, ProviderFailureReason, PipelineStage, RagErrorDetails } from './errors.js'

export { UUIDSchema, TimestampSchema, OwnerIdSchema, MetadataSchema } from './schemas.js'

export { withDeadline, abortableDelay, throwIfAborted } from './deadline.js'
export type { CallOptions } from './deadline.js'

export { silentLogger } from './logger.js'
export type { Logger } from './logger.js'

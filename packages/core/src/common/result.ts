/**
 * Result type for fallible operations.
 * Pipelines return Result instead of throwing; leaf components throw RagError.
 */

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value
  throw result.error instanceof Error
    ? result.error
    : new Error(String(result.error))
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok
}

export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok
}

/** Settle a promise into a Result, mapping any rejection through `mapError`. */
export async function settle<T, E>(promise: Promise<T>, mapError: (err: unknown) => E): Promise<Result<T, E>> {
  try {
    return Ok(await promise)
  } catch (err) {
    return Err(mapError(err))
  }
}

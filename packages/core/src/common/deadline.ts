/**
 * Timeout and cancellation helpers for I/O-bound calls.
 */

import { setTimeout as sleep } from 'node:timers/promises'
import { RagError } from './errors.js'

export interface CallOptions {
  /** Caller cancellation. */
  signal?: AbortSignal
  /** Deadline for the whole call, in milliseconds. */
  timeoutMs?: number
}

export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) throw RagError.cancelled(operation)
}

/**
 * Run `op` under the caller's signal and an optional deadline.
 * The returned promise settles as soon as the deadline passes or the caller
 * aborts, even if `op` ignores the signal it was given.
 */
export async function withDeadline<T>(
  operation: string,
  options: CallOptions,
  op: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const { signal, timeoutMs } = options
  throwIfAborted(signal, operation)

  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined
  let onAbort: (() => void) | undefined

  const interrupted = new Promise<never>((_, reject) => {
    if (timeoutMs !== undefined && timeoutMs > 0) {
      timer = setTimeout(() => {
        const err = RagError.timeout(operation, timeoutMs)
        controller.abort(err)
        reject(err)
      }, timeoutMs)
    }
    if (signal) {
      onAbort = () => {
        const err = RagError.cancelled(operation)
        controller.abort(err)
        reject(err)
      }
      signal.addEventListener('abort', onAbort, { once: true })
    }
  })

  try {
    return await Promise.race([op(controller.signal), interrupted])
  } finally {
    if (timer) clearTimeout(timer)
    if (signal && onAbort) signal.removeEventListener('abort', onAbort)
  }
}

/** Sleep that rejects with CANCELLED (or the signal's RagError reason) when aborted. */
export async function abortableDelay(ms: number, signal: AbortSignal | undefined, operation: string): Promise<void> {
  throwIfAborted(signal, operation)
  try {
    await sleep(ms, undefined, { signal })
  } catch (err) {
    if (signal?.aborted) {
      throw signal.reason instanceof RagError ? signal.reason : RagError.cancelled(operation)
    }
    throw err
  }
}

/**
 * Sliding-window chunker with sentence/line boundary pull-back.
 * Sizes are in characters, not tokens.
 */

import { RagError } from '../common/index.js'

export interface ChunkerOptions {
  chunkSize?: number
  overlap?: number
}

export interface ChunkSourceMetadata {
  /** Offset of the untrimmed window in the source text. */
  startOffset: number
  /** Exclusive end offset of the untrimmed window. */
  endOffset: number
}

export interface Chunk {
  readonly text: string
  readonly ordinal: number
  readonly sourceMetadata: ChunkSourceMetadata
}

export const DEFAULT_CHUNK_SIZE = 500
export const DEFAULT_CHUNK_OVERLAP = 50

const BOUNDARY_SEPARATORS = ['. ', '! ', '? ', '\n'] as const

/**
 * Rightmost boundary whose separator lies wholly inside [start, limit).
 * Returns the cut position just after the separator's first character,
 * or -1 when the window has no boundary.
 */
export function findBoundary(text: string, start: number, limit: number): number {
  let best = -1
  for (const sep of BOUNDARY_SEPARATORS) {
    const idx = text.lastIndexOf(sep, limit - sep.length)
    if (idx >= start && idx + sep.length <= limit && idx > best) best = idx
  }
  return best === -1 ? -1 : best + 1
}

/** True when offset `i` falls between the two halves of a surrogate pair. */
function splitsSurrogatePair(text: string, i: number): boolean {
  if (i <= 0 || i >= text.length) return false
  const high = text.charCodeAt(i - 1)
  const low = text.charCodeAt(i)
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff
}

/** Move a cut off a surrogate pair, backwards unless that would reach `floor`. */
function alignCut(text: string, i: number, floor: number): number {
  if (!splitsSurrogatePair(text, i)) return i
  return i - 1 > floor ? i - 1 : i + 1
}

export function chunkText(text: string, options?: ChunkerOptions): Chunk[] {
  const chunkSize = options?.chunkSize ?? DEFAULT_CHUNK_SIZE
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw RagError.validation(`chunkSize must be a positive integer, got ${chunkSize}`)
  }
  // overlap >= chunkSize would stall the window; clamped here, rejected by loadSettings
  const overlap = Math.min(Math.max(0, Math.floor(options?.overlap ?? DEFAULT_CHUNK_OVERLAP)), chunkSize - 1)

  const chunks: Chunk[] = []
  let start = 0

  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length)

    if (end < text.length) {
      const boundary = findBoundary(text, start, end)
      if (boundary > start) end = boundary
      end = alignCut(text, end, start)
    }

    const trimmed = text.slice(start, end).trim()
    if (trimmed.length > 0) {
      chunks.push({
        text: trimmed,
        ordinal: chunks.length,
        sourceMetadata: { startOffset: start, endOffset: end },
      })
    }

    if (end >= text.length) break
    start = alignCut(text, Math.max(end - overlap, start + 1), start)
  }

  return chunks
}

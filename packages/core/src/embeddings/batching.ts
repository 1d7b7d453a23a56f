/**
 * Split texts into provider-sized sub-batches, preserving order.
 */

export interface BatchLimits {
  maxItems: number
  /** Soft cap on summed characters; a single oversized text still gets its own batch. */
  maxChars?: number
}

export function splitIntoBatches(texts: string[], limits: BatchLimits): string[][] {
  const maxItems = Math.max(1, Math.floor(limits.maxItems))
  const maxChars = limits.maxChars ?? Infinity
  const batches: string[][] = []

  let batchStart = 0
  while (batchStart < texts.length) {
    let batchEnd = batchStart
    let batchChars = 0
    while (batchEnd < texts.length && batchEnd - batchStart < maxItems) {
      const textChars = texts[batchEnd].length
      if (batchChars + textChars > maxChars && batchEnd > batchStart) break
      batchChars += textChars
      batchEnd++
    }
    batches.push(texts.slice(batchStart, batchEnd))
    batchStart = batchEnd
  }

  return batches
}

import type { KBDocument } from '../../src/extraction/index.js'
import type { VectorStore } from '../../src/kb/index.js'

export function textDocument(filename: string, text: string): KBDocument {
  return { filename, format: 'plain_text', bytes: new TextEncoder().encode(text) }
}

/** One 19-character line per entry, so a 30-character window holds exactly one line. */
export function linedText(prefix: string, count: number): string {
  return Array.from({ length: count }, (_, i) => `${prefix} document ${i}`.padEnd(19, '.')).join('\n')
}

/** A store whose reads and writes all fail with `err`. */
export function failingStore(dimensions: number, err: Error): VectorStore {
  return {
    dimensions,
    replaceAll: async () => { throw err },
    search: async () => { throw err },
    deleteAll: async () => { throw err },
    count: async () => { throw err },
    getGeneration: async () => { throw err },
  }
}

export async function failure(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (err) {
    return err
  }
  throw new Error('expected rejection')
}

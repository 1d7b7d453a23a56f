import { describe, it, expect } from 'vitest'
import { splitIntoBatches } from '../../src/embeddings/batching.js'

describe('splitIntoBatches', () => {
  it('returns no batches for no texts', () => {
    expect(splitIntoBatches([], { maxItems: 10 })).toEqual([])
  })

  it('caps each batch at maxItems and preserves order', () => {
    expect(splitIntoBatches(['a', 'b', 'c', 'd', 'e'], { maxItems: 2 })).toEqual([['a', 'b'], ['c', 'd'], ['e']])
  })

  it('starts a new batch when the character budget would be exceeded', () => {
    expect(splitIntoBatches(['aaaa', 'bbbb', 'cc'], { maxItems: 10, maxChars: 6 })).toEqual([['aaaa'], ['bbbb', 'cc']])
  })

  it('gives an oversized text a batch of its own', () => {
    expect(splitIntoBatches(['x'.repeat(10), 'y'], { maxItems: 10, maxChars: 5 })).toEqual([['x'.repeat(10)], ['y']])
  })

  it('treats a maxItems below 1 as 1', () => {
    expect(splitIntoBatches(['a', 'b'], { maxItems: 0 })).toEqual([['a'], ['b']])
  })
})

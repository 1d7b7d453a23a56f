/**
 * IVF-flat approximate nearest-neighbour index.
 *
 * Vectors are partitioned into `lists` clusters by spherical k-means; a query
 * only scans the `probes` clusters whose centroids are closest. Initialisation
 * is deterministic (evenly spaced seeds) so the same generation always yields
 * the same index.
 */

import { cosineDistance, norm } from './vector-math.js'
import type { Vector } from './vector-math.js'

export interface IndexedVector {
  /** Insertion order; the tie-breaker for equal distances. */
  seq: number
  vector: Float32Array
  norm: number
}

export interface ScoredEntry<T extends IndexedVector> {
  entry: T
  distance: number
}

export interface IvfBuildOptions {
  /** Number of clusters. Defaults to round(sqrt(n)). */
  lists?: number
  /** Maximum k-means iterations. */
  iterations?: number
}

const DEFAULT_ITERATIONS = 10

/** Ascending distance, then insertion order. */
export function compareScored<T extends IndexedVector>(a: ScoredEntry<T>, b: ScoredEntry<T>): number {
  return a.distance - b.distance || a.entry.seq - b.entry.seq
}

function normalizedCopy(vec: Vector, n: number): Float32Array {
  const out = new Float32Array(vec.length)
  for (let i = 0; i < vec.length; i++) out[i] = vec[i] / n
  return out
}

function nearestCentroid(vec: Vector, vecNorm: number, centroids: Float32Array[]): number {
  let best = 0
  let bestDistance = Infinity
  for (let c = 0; c < centroids.length; c++) {
    const d = cosineDistance(vec, centroids[c], vecNorm, 1)
    if (d < bestDistance) {
      bestDistance = d
      best = c
    }
  }
  return best
}

export class IvfFlatIndex<T extends IndexedVector> {
  private constructor(
    private readonly centroids: Float32Array[],
    private readonly lists: T[][],
    readonly size: number,
  ) {}

  get listCount(): number {
    return this.lists.length
  }

  static build<T extends IndexedVector>(entries: T[], options: IvfBuildOptions = {}): IvfFlatIndex<T> {
    const n = entries.length
    if (n === 0) return new IvfFlatIndex<T>([], [], 0)

    const listCount = Math.max(1, Math.min(n, options.lists ?? Math.round(Math.sqrt(n))))
    const iterations = options.iterations ?? DEFAULT_ITERATIONS
    const dims = entries[0].vector.length

    let centroids: Float32Array[] = []
    for (let c = 0; c < listCount; c++) {
      const seed = entries[Math.floor((c * n) / listCount)]
      centroids.push(normalizedCopy(seed.vector, seed.norm))
    }

    const assignment = new Int32Array(n).fill(-1)
    for (let iter = 0; iter < iterations; iter++) {
      let changed = false
      for (let i = 0; i < n; i++) {
        const c = nearestCentroid(entries[i].vector, entries[i].norm, centroids)
        if (c !== assignment[i]) {
          assignment[i] = c
          changed = true
        }
      }
      if (!changed) break

      const sums = centroids.map(() => new Float32Array(dims))
      const counts = new Array<number>(listCount).fill(0)
      for (let i = 0; i < n; i++) {
        const { vector, norm: entryNorm } = entries[i]
        const sum = sums[assignment[i]]
        for (let d = 0; d < dims; d++) sum[d] += vector[d] / entryNorm
        counts[assignment[i]]++
      }
      // Empty clusters keep their previous centroid
      centroids = centroids.map((prev, c) => {
        const sumNorm = norm(sums[c])
        return counts[c] === 0 || sumNorm === 0 ? prev : normalizedCopy(sums[c], sumNorm)
      })
    }

    const lists: T[][] = centroids.map(() => [])
    for (let i = 0; i < n; i++) {
      lists[nearestCentroid(entries[i].vector, entries[i].norm, centroids)].push(entries[i])
    }

    return new IvfFlatIndex<T>(centroids, lists, n)
  }

  /**
   * Top-k entries, ascending by distance. Scans at least the `probes` closest
   * clusters, then keeps scanning in centroid order until `topK` candidates are
   * collected or every cluster has been scanned. A `topK` above half the
   * index scans every cluster.
   */
  search(query: Vector, topK: number, probes: number): ScoredEntry<T>[] {
    if (this.size === 0 || topK <= 0) return []
    const queryNorm = norm(query)

    const probeOrder = this.centroids
      .map((centroid, c) => ({ c, distance: cosineDistance(query, centroid, queryNorm, 1) }))
      .sort((a, b) => a.distance - b.distance || a.c - b.c)
    const minProbes = topK * 2 > this.size ? probeOrder.length : Math.max(1, probes)

    const scored: ScoredEntry<T>[] = []
    for (const [probed, { c }] of probeOrder.entries()) {
      if (probed >= minProbes && scored.length >= topK) break
      for (const entry of this.lists[c]) {
        scored.push({ entry, distance: cosineDistance(query, entry.vector, queryNorm, entry.norm) })
      }
    }

    return scored.sort(compareScored).slice(0, topK)
  }
}

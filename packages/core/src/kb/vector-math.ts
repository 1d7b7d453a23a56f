/**
 * Vector helpers: Float32 packing, norms, cosine distance.
 */

import { RagError } from '../common/index.js'

export type Vector = ArrayLike<number>

/** Pack a number array into a little-endian Float32 Buffer. */
export function packFloat32(vec: Vector): Buffer {
  const buf = Buffer.alloc(vec.length * 4)
  for (let i = 0; i < vec.length; i++) {
    buf.writeFloatLE(vec[i], i * 4)
  }
  return buf
}

/** Unpack a little-endian Float32 Buffer. Returns null on corrupt data. */
export function unpackFloat32(blob: Buffer, dims: number): Float32Array | null {
  if (blob.byteLength !== dims * 4) {
    return null
  }
  const arr = new Float32Array(dims)
  for (let i = 0; i < dims; i++) {
    arr[i] = blob.readFloatLE(i * 4)
  }
  return arr
}

export function dot(a: Vector, b: Vector): number {
  let sum = 0
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i]
  }
  return sum
}

export function norm(vec: Vector): number {
  return Math.sqrt(dot(vec, vec))
}

export function l2Normalize(vec: number[]): number[] {
  const n = norm(vec)
  if (n === 0) return vec
  return vec.map(v => v / n)
}

/**
 * Reject vectors cosine distance is undefined for, or that do not match the
 * configured dimensionality.
 */
export function assertUsableVector(vec: Vector, dimensions: number, label = 'vector'): void {
  if (vec.length !== dimensions) {
    throw RagError.dimensionMismatch(dimensions, vec.length)
  }
  let nonZero = false
  for (let i = 0; i < vec.length; i++) {
    const v = vec[i]
    if (!Number.isFinite(v)) {
      throw RagError.invalidVector(`${label} contains a non-finite component at index ${i}`)
    }
    if (v !== 0) nonZero = true
  }
  if (!nonZero) {
    throw RagError.invalidVector(`${label} is a zero vector; cosine distance is undefined`)
  }
}

/**
 * Cosine distance `1 - (A·B)/(|A||B|)`, clamped to [0, 2].
 * Pass precomputed norms to skip recomputing them per comparison.
 */
export function cosineDistance(a: Vector, b: Vector, normA = norm(a), normB = norm(b)): number {
  if (a.length !== b.length) {
    throw RagError.dimensionMismatch(a.length, b.length)
  }
  if (normA === 0 || normB === 0) {
    throw RagError.invalidVector('Cosine distance is undefined for a zero vector')
  }
  const distance = 1 - dot(a, b) / (normA * normB)
  return Math.min(2, Math.max(0, distance))
}

/**
 * Documents handed to ingestion: raw bytes plus an explicit format tag.
 * Formats are a closed set; adding one means adding a tag here and a
 * handler in the text extractor.
 */

import { RagError } from '../common/index.js'

export type DocumentFormat = 'plain_text' | 'structured_text' | 'pdf' | 'docx'

export const DOCUMENT_FORMATS: readonly DocumentFormat[] = ['plain_text', 'structured_text', 'pdf', 'docx']

export interface KBDocument {
  filename: string
  format: DocumentFormat
  bytes: Uint8Array
}

/** Upload size limit enforced by the transport before ingestion (1 MiB). */
export const MAX_UPLOAD_BYTES = 1024 * 1024

const EXT_TO_FORMAT: Record<string, DocumentFormat> = {
  txt: 'plain_text',
  json: 'structured_text',
  pdf: 'pdf',
  docx: 'docx',
}

const MIME_TO_FORMAT: Record<string, DocumentFormat> = {
  'text/plain': 'plain_text',
  'application/json': 'structured_text',
  'application/pdf': 'pdf',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'docx',
}

export function resolveFormat(filename: string, mimeType?: string): DocumentFormat | null {
  const clean = filename.trim().replace(/^"|"$/g, '').split(/[?#]/)[0]
  // Strip trailing " (1)" suffix first, then extract extension
  const normalized = clean.replace(/\s*\(\d+\)\s*$/, '')
  const extMatch = normalized.match(/\.([a-z0-9]{2,5})$/i)
  const ext = extMatch ? extMatch[1].toLowerCase() : ''
  const byExt = EXT_TO_FORMAT[ext]
  if (byExt) return byExt
  // Fallback: mimeType mapping when extension is missing/incorrect
  if (mimeType) {
    const essence = mimeType.split(';')[0].trim().toLowerCase()
    const byMime = MIME_TO_FORMAT[essence]
    if (byMime) return byMime
  }
  return null
}

export function isFormatSupported(filename: string, mimeType?: string): boolean {
  return resolveFormat(filename, mimeType) !== null
}

/**
 * Build a document from an upload. Throws UNSUPPORTED_FORMAT for unknown
 * formats and VALIDATION_ERROR for payloads over `maxBytes`.
 */
export function createDocument(
  filename: string,
  bytes: Uint8Array,
  mimeType?: string,
  maxBytes: number = MAX_UPLOAD_BYTES,
): KBDocument {
  const format = resolveFormat(filename, mimeType)
  if (!format) {
    throw RagError.unsupportedFormat(`Unsupported format: ${filename}`)
  }
  if (bytes.byteLength > maxBytes) {
    throw RagError.validation(`${filename} is ${bytes.byteLength} bytes; the limit is ${maxBytes}`)
  }
  return { filename, format, bytes }
}

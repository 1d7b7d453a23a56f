/**
 * Extraction: document model, format resolution, text extraction.
 */

export {
  resolveFormat,
  isFormatSupported,
  createDocument,
  DOCUMENT_FORMATS,
  MAX_UPLOAD_BYTES,
} from './document.js'
export type { DocumentFormat, KBDocument } from './document.js'
export { extractText, extractStructuredText, decodeUtf8 } from './text-extractor.js'

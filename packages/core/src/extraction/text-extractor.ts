/**
 * Text extraction: turns a KBDocument into one flat string.
 * Plain and structured text are handled here; PDF and DOCX are delegated to
 * unpdf and mammoth, loaded on first use.
 */

import { RagError, errorMessage, isRagError } from '../common/index.js'
import type { KBDocument } from './document.js'

export async function extractText(doc: KBDocument): Promise<string> {
  let text: string
  switch (doc.format) {
    case 'plain_text':
      text = decodeUtf8(doc.bytes, doc.filename)
      break
    case 'structured_text':
      text = extractStructuredText(decodeUtf8(doc.bytes, doc.filename), doc.filename)
      break
    case 'pdf':
      text = await extractPdf(doc.bytes, doc.filename)
      break
    case 'docx':
      text = await extractDocx(doc.bytes, doc.filename)
      break
    default: {
      const unknownFormat: never = doc.format
      throw RagError.unsupportedFormat(`Unsupported format: ${String(unknownFormat)}`)
    }
  }

  if (text.trim().length === 0) {
    throw RagError.emptyDocument(doc.filename)
  }
  return text
}

export function decodeUtf8(bytes: Uint8Array, filename: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes)
  } catch (err) {
    throw RagError.decode(`${filename} is not valid UTF-8`, err)
  }
}

/**
 * Parse JSON and join every string leaf, depth-first, one per line.
 * Numbers, booleans and null are skipped; object keys are not emitted.
 */
export function extractStructuredText(source: string, filename = 'document'): string {
  let data: unknown
  try {
    data = JSON.parse(source)
  } catch (err) {
    throw RagError.parse(`${filename} is not valid JSON: ${errorMessage(err)}`, err)
  }

  const leaves: string[] = []
  collectStrings(data, leaves)
  return leaves.join('\n')
}

function collectStrings(value: unknown, out: string[]): void {
  if (typeof value === 'string') {
    out.push(value)
  } else if (Array.isArray(value)) {
    for (const item of value) collectStrings(item, out)
  } else if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) collectStrings(child, out)
  }
}

async function extractPdf(bytes: Uint8Array, filename: string): Promise<string> {
  try {
    const { getDocumentProxy, extractText: extractPdfText } = await import('unpdf')
    // pdf.js may transfer the buffer it is given, so hand it a copy
    const pdf = await getDocumentProxy(new Uint8Array(bytes))
    const { text } = await extractPdfText(pdf, { mergePages: false })
    const pages = Array.isArray(text) ? text : [text]
    return pages.map(page => page.trim()).filter(page => page.length > 0).join('\n\n')
  } catch (err) {
    if (isRagError(err)) throw err
    throw RagError.unsupportedFormat(`Could not open PDF ${filename}: ${errorMessage(err)}`, err)
  }
}

async function extractDocx(bytes: Uint8Array, filename: string): Promise<string> {
  try {
    const { default: mammoth } = await import('mammoth')
    const result = await mammoth.extractRawText({ buffer: Buffer.from(bytes) })
    return result.value
      .split(/\n+/)
      .map(paragraph => paragraph.trim())
      .filter(paragraph => paragraph.length > 0)
      .join('\n')
  } catch (err) {
    if (isRagError(err)) throw err
    throw RagError.unsupportedFormat(`Could not open DOCX ${filename}: ${errorMessage(err)}`, err)
  }
}

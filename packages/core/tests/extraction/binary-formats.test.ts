import { describe, it, expect, vi, beforeEach } from 'vitest'
import { extractText } from '../../src/extraction/index.js'
import type { KBDocument } from '../../src/extraction/index.js'
import { isRagError } from '../../src/common/index.js'

const mocks = vi.hoisted(() => ({
  getDocumentProxy: vi.fn(),
  extractPdfText: vi.fn(),
  extractRawText: vi.fn(),
}))

vi.mock('unpdf', () => ({
  getDocumentProxy: mocks.getDocumentProxy,
  extractText: mocks.extractPdfText,
}))

vi.mock('mammoth', () => ({
  default: { extractRawText: mocks.extractRawText },
}))

const bytes = new Uint8Array([1, 2, 3, 4])
const pdf: KBDocument = { filename: 'manual.pdf', format: 'pdf', bytes }
const docx: KBDocument = { filename: 'handbook.docx', format: 'docx', bytes }

async function failure(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (err) {
    return err
  }
  throw new Error('expected rejection')
}

beforeEach(() => {
  mocks.getDocumentProxy.mockReset().mockResolvedValue({ numPages: 3 })
  mocks.extractPdfText.mockReset()
  mocks.extractRawText.mockReset()
})

describe('extractText: PDF', () => {
  it('joins non-empty pages with blank lines', async () => {
    mocks.extractPdfText.mockResolvedValue({ totalPages: 3, text: ['  Page one  ', '   ', 'Page three'] })

    await expect(extractText(pdf)).resolves.toBe('Page one\n\nPage three')
    expect(mocks.extractPdfText).toHaveBeenCalledWith({ numPages: 3 }, { mergePages: false })
  })

  it('hands the decoder a copy of the bytes', async () => {
    mocks.extractPdfText.mockResolvedValue({ totalPages: 1, text: ['text'] })

    await extractText(pdf)
    const passed: unknown = mocks.getDocumentProxy.mock.calls[0]?.[0]
    expect(passed).toEqual(bytes)
    expect(passed).not.toBe(bytes)
  })

  it('reports an unreadable PDF as UNSUPPORTED_FORMAT', async () => {
    mocks.getDocumentProxy.mockRejectedValue(new Error('Invalid PDF structure'))

    const err = await failure(extractText(pdf))
    expect(isRagError(err, 'UNSUPPORTED_FORMAT')).toBe(true)
    expect(err).toHaveProperty('message', 'Could not open PDF manual.pdf: Invalid PDF structure')
  })

  it('reports a PDF without a text layer as EMPTY_DOCUMENT', async () => {
    mocks.extractPdfText.mockResolvedValue({ totalPages: 2, text: ['', '  '] })

    const err = await failure(extractText(pdf))
    expect(isRagError(err, 'EMPTY_DOCUMENT')).toBe(true)
  })
})

describe('extractText: DOCX', () => {
  it('keeps one trimmed paragraph per line', async () => {
    mocks.extractRawText.mockResolvedValue({ value: 'Title\n\n  Body line  \n\n\nEnd', messages: [] })

    await expect(extractText(docx)).resolves.toBe('Title\nBody line\nEnd')
    const input: unknown = mocks.extractRawText.mock.calls[0]?.[0]
    expect(input).toEqual({ buffer: Buffer.from(bytes) })
  })

  it('reports an unreadable DOCX as UNSUPPORTED_FORMAT', async () => {
    mocks.extractRawText.mockRejectedValue(new Error('End of central directory not found'))

    const err = await failure(extractText(docx))
    expect(isRagError(err, 'UNSUPPORTED_FORMAT')).toBe(true)
    expect(err).toHaveProperty('message', 'Could not open DOCX handbook.docx: End of central directory not found')
  })

  it('reports an empty DOCX as EMPTY_DOCUMENT', async () => {
    mocks.extractRawText.mockResolvedValue({ value: '\n\n', messages: [] })

    const err = await failure(extractText(docx))
    expect(isRagError(err, 'EMPTY_DOCUMENT')).toBe(true)
  })
})

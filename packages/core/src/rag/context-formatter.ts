/**
 * Prompt assembly for retrieved snippets.
 */

export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful AI assistant.'
export const CONTEXT_PREAMBLE = 'Use the following context to answer questions accurately:'

const TRUNCATION_MARKER = '...[TRUNCATED]'
const BLOCK_SEPARATOR = '\n\n'
/** A partial block is only worth including above this many characters. */
const MIN_PARTIAL_CHARS = 50

export interface ContextBlockOptions {
  /** Character budget for the whole block. Unlimited when omitted. */
  maxChars?: number
}

/**
 * Render snippets as `[Document n]` blocks separated by blank lines, in the
 * order given, stopping at the character budget.
 */
export function formatContextBlock(snippets: readonly string[], options: ContextBlockOptions = {}): string {
  const maxChars = Math.max(0, options.maxChars ?? Infinity)
  const parts: string[] = []
  let used = 0

  for (const [i, snippet] of snippets.entries()) {
    const separator = parts.length > 0 ? BLOCK_SEPARATOR : ''
    const block = `[Document ${i + 1}]\n${snippet}`
    const remaining = maxChars - used - separator.length

    if (block.length <= remaining) {
      parts.push(block)
      used += separator.length + block.length
      continue
    }
    if (remaining > MIN_PARTIAL_CHARS) {
      parts.push(block.slice(0, remaining - TRUNCATION_MARKER.length) + TRUNCATION_MARKER)
    }
    break
  }

  return parts.join(BLOCK_SEPARATOR)
}

/**
 * Append retrieved context to an agent's system prompt. Returns the prompt
 * unchanged when there is nothing to add.
 */
export function buildAugmentedSystemPrompt(
  systemPrompt: string | null | undefined,
  snippets: readonly string[],
  options: ContextBlockOptions = {},
): string {
  const base = systemPrompt && systemPrompt.trim().length > 0 ? systemPrompt : DEFAULT_SYSTEM_PROMPT
  const block = formatContextBlock(snippets, options)
  if (block.length === 0) return base
  return `${base}${BLOCK_SEPARATOR}${CONTEXT_PREAMBLE}${BLOCK_SEPARATOR}${block}`
}

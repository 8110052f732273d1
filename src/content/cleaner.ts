import { findBoundary } from '../shared/text-boundaries.js'

const CARRIAGE_RETURN_PATTERN = /\r\n?/g
const NBSP_PATTERN = /\u00a0/g
const TRAILING_SPACE_PATTERN = /[ \t\f\v]+\n/g
const EXCESS_NEWLINES_PATTERN = /\n{3,}/g
const WORD_SPLIT_PATTERN = /\s+/

/**
 * Line-preserving cleanup: indentation survives so code blocks stay intact.
 */
export function normalizeForPrompt(input: string): string {
  return input
    .replace(CARRIAGE_RETURN_PATTERN, '\n')
    .replace(NBSP_PATTERN, ' ')
    .replace(TRAILING_SPACE_PATTERN, '\n')
    .replace(EXCESS_NEWLINES_PATTERN, '\n\n')
    .trim()
}

export function normalizeCandidate(value: string | null | undefined): string | null {
  if (typeof value !== 'string') return null
  const trimmed = value.replace(/\s+/g, ' ').trim()
  return trimmed.length > 0 ? trimmed : null
}

export function countWords(text: string): number {
  const trimmed = text.trim()
  return trimmed.length === 0 ? 0 : trimmed.split(WORD_SPLIT_PATTERN).length
}

/**
 * Cuts `text` to at most `maxCharacters`, preferring a heading, then a paragraph, then a
 * sentence boundary in the second half of the window, then whitespace, then a hard cut.
 */
export function truncateAtBoundary(text: string, maxCharacters: number): string {
  const limit = Math.max(0, Math.floor(maxCharacters))
  if (text.length <= limit) return text
  if (limit === 0) return ''

  const half = Math.floor(limit / 2)
  const boundary = findBoundary(text, { start: 0, limit, minCut: half })
  if (boundary && boundary.position >= half) {
    return text.slice(0, boundary.position).trimEnd()
  }
  const lastSpace = text.lastIndexOf(' ', limit)
  if (lastSpace >= half) return text.slice(0, lastSpace).trimEnd()
  return text.slice(0, limit)
}

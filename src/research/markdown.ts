import type { TocEntry } from './types.js'

const WRAPPING_FENCE_PATTERN = /^```(?:markdown|md)?[ \t]*\n([\s\S]*?)\n?```\s*$/i
const FENCE_LINE_PATTERN = /^\s*(```|~~~)/
const H1_PATTERN = /^# (?=\S)/
const H2_PATTERN = /^## +(.+?)\s*#*\s*$/
const SENTENCE_END_PATTERN = /[.!?]["')\]]?(?=\s|$)/g
const WORD_PATTERN = /\S+/g

/** Calls `visit` for every line outside fenced code blocks. */
function mapProseLines(text: string, visit: (line: string) => string): string {
  let inFence = false
  return text
    .split('\n')
    .map((line) => {
      if (FENCE_LINE_PATTERN.test(line)) {
        inFence = !inFence
        return line
      }
      return inFence ? line : visit(line)
    })
    .join('\n')
}

export function closeOpenFences(text: string): string {
  const fences = text.split('\n').filter((line) => FENCE_LINE_PATTERN.test(line)).length
  return fences % 2 === 1 ? `${text.trimEnd()}\n\`\`\`` : text
}

/**
 * Normalizes one model-written section: unwraps a ```markdown fence around the whole
 * answer, demotes stray `#` titles to `##`, and closes an unterminated code fence.
 */
export function cleanSectionMarkdown(raw: string): string {
  const trimmed = raw.trim()
  const unwrapped = WRAPPING_FENCE_PATTERN.exec(trimmed)?.[1] ?? trimmed
  const demoted = mapProseLines(unwrapped, (line) => line.replace(H1_PATTERN, '## '))
  return closeOpenFences(demoted.trim())
}

export function toAnchor(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9 -]/g, '')
    .trim()
    .replace(/ /g, '-')
}

export function extractSectionHeadings(text: string): string[] {
  const headings: string[] = []
  mapProseLines(text, (line) => {
    const match = H2_PATTERN.exec(line)
    if (match?.[1]) headings.push(match[1].trim())
    return line
  })
  return headings
}

/**
 * Table of contents over the `##` headings; empty unless there are at least two. Repeated
 * anchors get `-1`, `-2` suffixes the way markdown renderers number them.
 */
export function buildTableOfContents(texts: readonly string[]): TocEntry[] {
  const headings = texts.flatMap(extractSectionHeadings)
  if (headings.length < 2) return []
  const used = new Map<string, number>()
  return headings.map((title) => {
    const base = toAnchor(title)
    const count = used.get(base) ?? 0
    used.set(base, count + 1)
    return { title, anchor: count === 0 ? base : `${base}-${count}`, level: 2 }
  })
}

export function titleCase(topic: string): string {
  return topic
    .trim()
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ')
}

/**
 * Cuts `text` to at most `maxWords` words, ending on a sentence when one closes in the
 * second half of the kept text.
 */
export function trimToWordLimit(text: string, maxWords: number): string {
  let count = 0
  let end = -1
  for (const match of text.matchAll(WORD_PATTERN)) {
    count += 1
    if (count === maxWords) {
      end = (match.index ?? 0) + match[0].length
    } else if (count > maxWords) {
      break
    }
  }
  if (count <= maxWords || end < 0) return text

  const kept = text.slice(0, end)
  let sentenceEnd = -1
  for (const match of kept.matchAll(SENTENCE_END_PATTERN)) {
    sentenceEnd = (match.index ?? 0) + match[0].length
  }
  const cut = sentenceEnd >= kept.length / 2 ? kept.slice(0, sentenceEnd) : kept
  return cut.trimEnd()
}

export function splitParagraphs(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0)
}

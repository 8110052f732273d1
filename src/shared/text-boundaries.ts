export type BoundaryKind = 'heading' | 'paragraph' | 'sentence'

export type Boundary = {
  /** Cut offset: the text before it ends one piece, the text from it starts the next. */
  position: number
  kind: BoundaryKind
}

const BOUNDARY_PRIORITY: readonly BoundaryKind[] = ['heading', 'paragraph', 'sentence']
const MARKDOWN_HEADING_PATTERN = /^#{1,6}\s+\S/
const BARE_HEADING_PATTERN = /^[A-Z][A-Za-z0-9 ]+$/
const BARE_HEADING_MAX_LENGTH = 50
const SENTENCE_END = new Set(['.', '!', '?'])
const FENCE_PATTERN = /^ {0,3}(```|~~~)/

/**
 * Markdown headings count anywhere; a short capitalized line of letters, digits and spaces
 * counts only when a blank line precedes it.
 */
export function isHeadingLine(line: string, blankBefore: boolean): boolean {
  if (MARKDOWN_HEADING_PATTERN.test(line)) return true
  if (!blankBefore) return false
  const trimmed = line.trimEnd()
  return trimmed.length < BARE_HEADING_MAX_LENGTH && BARE_HEADING_PATTERN.test(trimmed)
}

function lineAt(text: string, position: number): string {
  const end = text.indexOf('\n', position)
  return text.slice(position, end === -1 ? text.length : end)
}

function isFenceLine(text: string, position: number): boolean {
  return FENCE_PATTERN.test(lineAt(text, position))
}

/** Whether `position` falls inside a fenced code block opened on an earlier line. */
function isInsideFence(text: string, position: number): boolean {
  let open = false
  let lineStart = 0
  while (lineStart < position) {
    if (isFenceLine(text, lineStart)) open = !open
    const next = text.indexOf('\n', lineStart)
    if (next === -1) break
    lineStart = next + 1
  }
  return open
}

/**
 * Finds where to cut `text` inside `(start, limit]`. Kinds are tried in priority order and
 * only count at or past `minCut`; when none reaches that far, the last boundary of any kind
 * after `start` is used. Nothing inside a fenced code block counts. Returns null when the
 * window has no boundary at all.
 */
export function findBoundary(
  text: string,
  { start, limit, minCut }: { start: number; limit: number; minCut: number }
): Boundary | null {
  const latest: Record<BoundaryKind, number> = { heading: -1, paragraph: -1, sentence: -1 }
  const end = Math.min(limit, text.length)
  let inFence = isInsideFence(text, start + 1)

  for (let position = start + 1; position <= end; position += 1) {
    const prev = text[position - 1] ?? ''
    const beforePrev = position >= 2 ? (text[position - 2] ?? '') : ''
    const lineStart = prev === '\n' && position < text.length

    if (!inFence) {
      if (prev === '\n') {
        const blankBefore = beforePrev === '\n'
        if (blankBefore) latest.paragraph = position
        if (lineStart && isHeadingLine(lineAt(text, position), blankBefore)) {
          latest.heading = position
        }
      }
      if ((prev === ' ' || prev === '\n') && SENTENCE_END.has(beforePrev)) {
        latest.sentence = position
      }
    }
    // the line start of an opening fence is still outside the block
    if (lineStart && isFenceLine(text, position)) inFence = !inFence
  }

  for (const kind of BOUNDARY_PRIORITY) {
    if (latest[kind] >= minCut && latest[kind] > start) return { position: latest[kind], kind }
  }

  let fallback: Boundary | null = null
  for (const kind of BOUNDARY_PRIORITY) {
    const position = latest[kind]
    if (position > start && (!fallback || position > fallback.position)) {
      fallback = { position, kind }
    }
  }
  return fallback
}

import { findBoundary } from '../shared/text-boundaries.js'
import { renderCorpusText } from './corpus.js'
import type { Chunk, Corpus } from './types.js'

/** Preferred boundaries only count past this share of the window. */
const MIN_FILL_RATIO = 0.3

export type TextRange = { start: number; end: number }

/**
 * Splits `text` into contiguous ranges of at most `maxChunkSize` characters. Within each
 * window the cut goes at the last heading, else the last paragraph break, else the last
 * sentence end past 30% of the window; failing that at any boundary, and as a last resort
 * exactly at the limit.
 */
export function splitText(text: string, maxChunkSize: number): TextRange[] {
  if (!Number.isInteger(maxChunkSize) || maxChunkSize < 1) {
    throw new RangeError(`maxChunkSize must be a positive integer, got ${maxChunkSize}`)
  }
  const ranges: TextRange[] = []
  let start = 0
  while (text.length - start > maxChunkSize) {
    const limit = start + maxChunkSize
    const minCut = start + Math.floor(maxChunkSize * MIN_FILL_RATIO)
    const boundary = findBoundary(text, { start, limit, minCut })
    const end = boundary ? boundary.position : limit
    ranges.push({ start, end })
    start = end
  }
  if (start < text.length) ranges.push({ start, end: text.length })
  return ranges
}

export function chunkCorpus(corpus: Pick<Corpus, 'pages'>, maxChunkSize: number): Chunk[] {
  const { text, spans } = renderCorpusText(corpus)
  return splitText(text, maxChunkSize).map(({ start, end }, index) =>
    Object.freeze({
      index,
      text: text.slice(start, end),
      sources: spans
        .filter((span) => span.start < end && span.end > start)
        .map((span) => span.source),
    })
  )
}

import type { NumberedSource } from './prompts.js'
import type { Chunk, Reference, SourceRef } from './types.js'
import { normalizeUrl } from './url.js'

/**
 * `[1]` or `[1, 3]`, but not a markdown link label (`[1](...)`) or an index (`items[1]`).
 */
const CITATION_PATTERN = /(?<!\w)\[(\d+(?:\s*,\s*\d+)*)\](?!\()/g
const CODE_SPAN_PATTERN = /(```[\s\S]*?(?:```|$)|`[^`\n]*`)/

export type CitationRegistry = {
  byNumber: Map<number, SourceRef>
  numberOf: (source: SourceRef) => number | null
  numbered: (sources: readonly SourceRef[]) => NumberedSource[]
}

export function createCitationRegistry(sources: Iterable<SourceRef>): CitationRegistry {
  const byNumber = new Map<number, SourceRef>()
  const byUrl = new Map<string, number>()
  for (const source of sources) {
    const key = normalizeUrl(source.url)
    if (byUrl.has(key)) continue
    const number = byUrl.size + 1
    byUrl.set(key, number)
    byNumber.set(number, source)
  }
  const numberOf = (source: SourceRef) => byUrl.get(normalizeUrl(source.url)) ?? null
  return {
    byNumber,
    numberOf,
    numbered: (list) =>
      list.flatMap((source) => {
        const number = numberOf(source)
        return number === null ? [] : [{ number, title: source.title, url: source.url }]
      }),
  }
}

/** Provisional numbers: sources in order of first appearance across chunks. */
export function registryFromChunks(chunks: readonly Chunk[]): CitationRegistry {
  return createCitationRegistry(chunks.flatMap((chunk) => chunk.sources))
}

// split() with one capture group alternates prose (even) and code (odd)
function mapOutsideCode(text: string, transform: (prose: string) => string): string {
  return text
    .split(CODE_SPAN_PATTERN)
    .map((part, index) => (index % 2 === 1 ? part : transform(part)))
    .join('')
}

function proseSegments(text: string): string[] {
  return text.split(CODE_SPAN_PATTERN).filter((_, index) => index % 2 === 0)
}

export function findCitedNumbers(text: string): number[] {
  const cited: number[] = []
  for (const prose of proseSegments(text)) {
    for (const match of prose.matchAll(CITATION_PATTERN)) {
      for (const value of (match[1] ?? '').split(',')) cited.push(Number(value.trim()))
    }
  }
  return cited
}

/**
 * Appends a `Sources:` line naming the chunk's sources the section never cites.
 */
export function appendUncitedSources(text: string, chunkNumbers: readonly number[]): string {
  const cited = new Set(findCitedNumbers(text))
  const missing = chunkNumbers.filter((number) => !cited.has(number))
  if (missing.length === 0) return text
  return `${text.trimEnd()}\n\nSources: ${missing.map((number) => `[${number}]`).join(' ')}`
}

/**
 * Renumbers citations 1..N in order of first appearance across `texts`. A bracket that names
 * no known source (`[2023]`) is not a citation and stays as written; unknown numbers inside a
 * citation are dropped. The reference list holds exactly the cited sources.
 */
export function renumberCitations(
  texts: readonly string[],
  byNumber: ReadonlyMap<number, SourceRef>
): { texts: string[]; references: Reference[] } {
  const finalNumbers = new Map<number, number>()
  const references: Reference[] = []

  const rewrite = (prose: string) =>
    prose.replace(CITATION_PATTERN, (match, group: string) => {
      const sources = group.split(',').flatMap((value) => {
        const provisional = Number(value.trim())
        const source = byNumber.get(provisional)
        return source ? [{ provisional, source }] : []
      })
      if (sources.length === 0) return match
      const mapped: number[] = []
      for (const { provisional, source } of sources) {
        let final = finalNumbers.get(provisional)
        if (final === undefined) {
          final = references.length + 1
          finalNumbers.set(provisional, final)
          references.push({ number: final, source })
        }
        if (!mapped.includes(final)) mapped.push(final)
      }
      return `[${mapped.join(', ')}]`
    })

  return { texts: texts.map((text) => mapOutsideCode(text, rewrite)), references }
}

/** Removes every citation that names a source in `byNumber`, with the space before it. */
export function stripCitations(text: string, byNumber: ReadonlyMap<number, SourceRef>): string {
  return mapOutsideCode(text, (prose) =>
    prose.replace(/ ?(?<!\w)\[(\d+(?:\s*,\s*\d+)*)\](?!\()/g, (match, group: string) =>
      group.split(',').some((value) => byNumber.has(Number(value.trim()))) ? '' : match
    )
  )
}

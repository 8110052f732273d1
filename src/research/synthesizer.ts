import pLimit from 'p-limit'

import { countWords, truncateAtBoundary } from '../content/cleaner.js'
import type { SynthesisMode, Tone } from '../flags.js'
import type { TextGenerator } from '../llm/text-generator.js'
import type { DocsmithLogger } from '../logging/logger.js'
import { DEFAULT_CONCURRENCY } from './budgets.js'
import {
  appendUncitedSources,
  createCitationRegistry,
  registryFromChunks,
  renumberCitations,
  stripCitations,
} from './citations.js'
import { SynthesisError, getErrorMessage } from './errors.js'
import {
  buildTableOfContents,
  cleanSectionMarkdown,
  splitParagraphs,
  titleCase,
  trimToWordLimit,
} from './markdown.js'
import { buildSectionPrompt, buildSnippetPrompt, buildSummaryPrompt } from './prompts.js'
import type { Chunk, Corpus, Document, Reference, SynthesizedSection } from './types.js'

export const SUMMARY_CONTEXT_CHARACTERS = 15_000
export const SNIPPET_CONTEXT_CHARACTERS = 6_000
export const SUMMARY_MIN_WORDS = 800
export const SUMMARY_MAX_WORDS = 1000
export const SNIPPET_MAX_PARAGRAPHS = 3
export const SNIPPET_MAX_WORDS = 300
/** Below this much material a short summary is expected, not worth a warning. */
const SUMMARY_WARNING_MIN_CORPUS = 6_000

const SECTION_MAX_TOKENS = 3_000
const SUMMARY_MAX_TOKENS = 2_000
const SNIPPET_MAX_TOKENS = 700

export type SynthesisOptions = {
  topic: string
  corpus: Corpus
  /** Required for comprehensive mode; ignored otherwise. */
  chunks?: readonly Chunk[]
  mode: SynthesisMode
  tone: Tone
  /** Unused in `raw` mode, required by every other mode. */
  generator: TextGenerator | null
  concurrency?: number
  logger?: DocsmithLogger
}

type ModelSynthesisOptions = SynthesisOptions & { generator: TextGenerator }

export type SynthesisResult = {
  document: Document
  warnings: string[]
}

function freezeDocument(document: Document): Document {
  return Object.freeze({
    ...document,
    sections: Object.freeze(document.sections.map((section) => Object.freeze({ ...section }))),
    tableOfContents: Object.freeze([...document.tableOfContents]),
    references: Object.freeze([...document.references]),
    images: Object.freeze([...document.images]),
    imageCredits: Object.freeze([...document.imageCredits]),
  })
}

export function createDocument({
  topic,
  mode,
  tone,
  sections,
  references,
  withTableOfContents,
}: {
  topic: string
  mode: SynthesisMode
  tone: Tone
  sections: SynthesizedSection[]
  references: Reference[]
  withTableOfContents: boolean
}): Document {
  return freezeDocument({
    title: titleCase(topic),
    topic,
    mode,
    tone,
    sections,
    tableOfContents: withTableOfContents
      ? buildTableOfContents(sections.map((section) => section.text))
      : [],
    references,
    images: [],
    imageCredits: [],
  })
}

/**
 * Gives every page an equal share of `maxCharacters`, cut at boundaries, each block
 * labeled with the page's citation number.
 */
export function condenseCorpus(corpus: Corpus, maxCharacters: number): string {
  const pages = corpus.pages
  if (pages.length === 0) return ''
  const headers = pages.map(
    (page, index) => `[${index + 1}] ${page.title}\n${page.source.url}\n\n`
  )
  const overhead = headers.reduce((sum, header) => sum + header.length + 2, 0)
  const share = Math.max(0, Math.floor((maxCharacters - overhead) / pages.length))
  return pages
    .map((page, index) => `${headers[index] ?? ''}${truncateAtBoundary(page.text, share)}`)
    .join('\n\n')
}

async function synthesizeComprehensive({
  topic,
  chunks = [],
  tone,
  generator,
  concurrency = DEFAULT_CONCURRENCY,
  logger,
}: ModelSynthesisOptions): Promise<SynthesisResult> {
  if (chunks.length === 0) {
    throw new SynthesisError('Nothing to synthesize: the corpus produced no chunks')
  }
  const log = logger?.getSubLogger({ name: 'synthesize' })
  const registry = registryFromChunks(chunks)
  const limit = pLimit(Math.max(1, concurrency))

  const outcomes = await Promise.all(
    chunks.map((chunk) =>
      limit(async () => {
        const sources = registry.numbered(chunk.sources)
        const prompt = buildSectionPrompt({
          topic,
          chunk,
          chunkCount: chunks.length,
          sources,
          tone,
        })
        try {
          const raw = await generator.generate(prompt, SECTION_MAX_TOKENS)
          const text = appendUncitedSources(
            cleanSectionMarkdown(raw),
            sources.map((source) => source.number)
          )
          return { ok: true as const, section: { chunkIndex: chunk.index, text } }
        } catch (error) {
          return { ok: false as const, chunkIndex: chunk.index, message: getErrorMessage(error) }
        }
      })
    )
  )

  const warnings: string[] = []
  const failures: string[] = []
  const sections: SynthesizedSection[] = []
  for (const outcome of outcomes) {
    if (outcome.ok) {
      sections.push(outcome.section)
      continue
    }
    const message = `Chunk ${outcome.chunkIndex + 1}/${chunks.length} skipped: ${outcome.message}`
    log?.debug(message)
    warnings.push(message)
    failures.push(outcome.message)
  }
  if (sections.length === 0) {
    throw new SynthesisError(`All ${chunks.length} chunks failed to synthesize`, { failures })
  }

  sections.sort((a, b) => a.chunkIndex - b.chunkIndex)
  const renumbered = renumberCitations(
    sections.map((section) => section.text),
    registry.byNumber
  )
  const finalSections = sections.map((section, index) => ({
    chunkIndex: section.chunkIndex,
    text: renumbered.texts[index] ?? section.text,
  }))

  return {
    document: createDocument({
      topic,
      mode: 'comprehensive',
      tone,
      sections: finalSections,
      references: renumbered.references,
      withTableOfContents: true,
    }),
    warnings,
  }
}

async function synthesizeSummary({
  topic,
  corpus,
  tone,
  generator,
}: ModelSynthesisOptions): Promise<SynthesisResult> {
  const registry = createCitationRegistry(corpus.pages.map((page) => page.source))
  const prompt = buildSummaryPrompt({
    topic,
    content: condenseCorpus(corpus, SUMMARY_CONTEXT_CHARACTERS),
    sources: registry.numbered(corpus.pages.map((page) => page.source)),
    tone,
  })
  let raw: string
  try {
    raw = await generator.generate(prompt, SUMMARY_MAX_TOKENS)
  } catch (error) {
    throw new SynthesisError(`Summary generation failed: ${getErrorMessage(error)}`, {
      cause: error,
    })
  }

  const warnings: string[] = []
  const trimmed = trimToWordLimit(cleanSectionMarkdown(raw), SUMMARY_MAX_WORDS)
  const words = countWords(trimmed)
  if (words < SUMMARY_MIN_WORDS && corpus.totalCharacters >= SUMMARY_WARNING_MIN_CORPUS) {
    warnings.push(`Summary is ${words} words, below the ${SUMMARY_MIN_WORDS}-word target`)
  }

  const renumbered = renumberCitations([trimmed], registry.byNumber)
  const references =
    renumbered.references.length > 0
      ? renumbered.references
      : [...registry.byNumber].map(([number, source]) => ({ number, source }))

  return {
    document: createDocument({
      topic,
      mode: 'summary',
      tone,
      sections: [{ chunkIndex: 0, text: renumbered.texts[0] ?? trimmed }],
      references,
      withTableOfContents: false,
    }),
    warnings,
  }
}

async function synthesizeSnippet({
  topic,
  corpus,
  tone,
  generator,
}: ModelSynthesisOptions): Promise<SynthesisResult> {
  const prompt = buildSnippetPrompt({
    topic,
    content: condenseCorpus(corpus, SNIPPET_CONTEXT_CHARACTERS),
    tone,
  })
  let raw: string
  try {
    raw = await generator.generate(prompt, SNIPPET_MAX_TOKENS)
  } catch (error) {
    throw new SynthesisError(`Snippet generation failed: ${getErrorMessage(error)}`, {
      cause: error,
    })
  }

  // the condensed corpus labels pages [1]..[n]; snippets carry no reference list
  const labels = new Map(corpus.pages.map((page, index) => [index + 1, page.source] as const))
  const paragraphs = splitParagraphs(stripCitations(cleanSectionMarkdown(raw), labels))
    .filter((paragraph) => !paragraph.startsWith('#'))
    .slice(0, SNIPPET_MAX_PARAGRAPHS)
  const text = trimToWordLimit(paragraphs.join('\n\n'), SNIPPET_MAX_WORDS)
  if (!text) throw new SynthesisError('Snippet generation returned no prose')

  return {
    document: createDocument({
      topic,
      mode: 'snippet',
      tone,
      sections: [{ chunkIndex: 0, text }],
      references: [],
      withTableOfContents: false,
    }),
    warnings: [],
  }
}

/**
 * Stored pages merged as they are, one section per page with its reference, for when no
 * model should be involved.
 */
export function mergeCorpusDocument({
  topic,
  corpus,
  tone,
}: Pick<SynthesisOptions, 'topic' | 'corpus' | 'tone'>): Document {
  const registry = createCitationRegistry(corpus.pages.map((page) => page.source))
  const sections: SynthesizedSection[] = []
  const cited = new Set<number>()
  corpus.pages.forEach((page, index) => {
    const number = registry.numberOf(page.source)
    const body = page.text.trim()
    if (number === null || !body) return
    cited.add(number)
    sections.push({
      chunkIndex: index,
      text: `## ${page.title.trim() || page.source.url}\n\n${body}\n\nSource: [${number}]`,
    })
  })
  return createDocument({
    topic,
    mode: 'raw',
    tone,
    sections,
    references: [...registry.byNumber]
      .filter(([number]) => cited.has(number))
      .map(([number, source]) => ({ number, source })),
    withTableOfContents: true,
  })
}

export async function synthesizeDocument(options: SynthesisOptions): Promise<SynthesisResult> {
  if (options.corpus.pages.length === 0) {
    throw new SynthesisError('Nothing to synthesize: the corpus is empty')
  }
  if (options.mode === 'raw') return { document: mergeCorpusDocument(options), warnings: [] }
  const { generator } = options
  if (!generator) throw new SynthesisError(`No model available for ${options.mode} synthesis`)
  if (options.mode === 'summary') return await synthesizeSummary({ ...options, generator })
  if (options.mode === 'snippet') return await synthesizeSnippet({ ...options, generator })
  return await synthesizeComprehensive({ ...options, generator })
}

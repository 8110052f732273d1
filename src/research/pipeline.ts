import type { SourceFetcher } from '../content/source-fetcher.js'
import type { SearchPreference, SynthesisMode, Tone } from '../flags.js'
import type { ImageSearch } from '../images/types.js'
import type { TextGenerator } from '../llm/text-generator.js'
import type { DocsmithLogger } from '../logging/logger.js'
import { planSources } from '../search/planner.js'
import type { SearchBackend } from '../search/types.js'
import { aggregateSources } from './aggregator.js'
import { DEFAULT_CONCURRENCY, type ResearchBudgets, resolveResearchBudgets } from './budgets.js'
import { chunkCorpus } from './chunker.js'
import { PipelineError, SearchError, SynthesisError, getErrorMessage } from './errors.js'
import { placeImages } from './image-placer.js'
import { type StageTiming, StageTracker } from './stages.js'
import { synthesizeDocument } from './synthesizer.js'
import type {
  Corpus,
  Document,
  ImageDescriptor,
  PipelineStage,
  PipelineWarning,
  SkippedSource,
  SourceRef,
} from './types.js'

export type ImageRequest = {
  query: string
  count: number
  /** Pixel width asked of the image host; its default size when absent. */
  width?: number | null
}

export type SynthesisRequest = {
  topic: string
  mode: SynthesisMode
  tone: Tone
  maxChunkSize: number
  image?: ImageRequest | null
  concurrency?: number
}

export type ResearchRequest = Omit<SynthesisRequest, 'maxChunkSize'> & {
  depth: number
  maxPages?: number | null
  maxChunkSize?: number
  searchPreference: SearchPreference
}

/** What synthesis over an existing corpus needs. */
export type SynthesisDeps = {
  /** May be null only for `raw` synthesis. */
  generator: TextGenerator | null
  imageSearch: ImageSearch | null
  logger: DocsmithLogger
  now?: () => number
}

export type PipelineDeps = SynthesisDeps & {
  backends: readonly SearchBackend[]
  fetcher: SourceFetcher
}

export type PipelineReport = {
  document: Document
  corpus: Corpus
  chunkCount: number
  warnings: PipelineWarning[]
  timings: StageTiming[]
  budgets: ResearchBudgets | null
}

const REMEDIES = {
  planning: 'Try a different --search-engine, or rephrase the query.',
  aggregating: 'Increase --depth or --max-pages, try --fallback-only, or check the network.',
  synthesizing: 'Check the model API key and --model, or retry with a smaller --depth.',
} as const

function skippedToWarning(skipped: SkippedSource): PipelineWarning | null {
  if (skipped.reason === 'budget' || skipped.reason === 'max-pages') return null
  return {
    stage: 'aggregating',
    message: `Skipped ${skipped.source.url} (${skipped.reason}): ${skipped.detail}`,
  }
}

function fail(
  tracker: StageTracker,
  { message, remedy, cause }: { message: string; remedy: string | null; cause?: unknown }
): PipelineError {
  const stage = tracker.current
  if (stage !== 'failed') tracker.transition('failed')
  return new PipelineError({ stage, message, remedy, cause })
}

function createTracker(initial: PipelineStage, deps: SynthesisDeps): StageTracker {
  const log = deps.logger.getSubLogger({ name: 'pipeline' })
  return new StageTracker({
    initial,
    ...(deps.now ? { now: deps.now } : {}),
    onEnter: (stage) => log.debug(`stage ${stage}`),
  })
}

/**
 * Chunking (comprehensive only), synthesis, and optional image placement over a corpus
 * that is already built. The tracker must be in `aggregating`.
 */
async function finishFromCorpus(
  request: SynthesisRequest,
  corpus: Corpus,
  deps: SynthesisDeps,
  tracker: StageTracker,
  warnings: PipelineWarning[]
): Promise<{ document: Document; chunkCount: number }> {
  const concurrency = request.concurrency ?? DEFAULT_CONCURRENCY

  let chunks: ReturnType<typeof chunkCorpus> = []
  if (request.mode === 'comprehensive') {
    tracker.transition('chunking')
    chunks = chunkCorpus(corpus, request.maxChunkSize)
    deps.logger
      .getSubLogger({ name: 'pipeline' })
      .debug(`chunks=${chunks.length} maxChunkSize=${request.maxChunkSize}`)
  }

  tracker.transition('synthesizing')
  let document: Document
  try {
    const result = await synthesizeDocument({
      topic: request.topic,
      corpus,
      chunks,
      mode: request.mode,
      tone: request.tone,
      generator: deps.generator,
      concurrency,
      logger: deps.logger,
    })
    document = result.document
    warnings.push(
      ...result.warnings.map((message) => ({ stage: 'synthesizing' as const, message }))
    )
  } catch (error) {
    if (error instanceof SynthesisError) {
      throw fail(tracker, { message: error.message, remedy: REMEDIES.synthesizing, cause: error })
    }
    throw error
  }

  const image = request.image
  if (image && image.count > 0) {
    tracker.transition('image-placement')
    let candidates: ImageDescriptor[] = []
    if (!deps.imageSearch) {
      warnings.push({
        stage: 'image-placement',
        message: 'UNSPLASH_ACCESS_KEY is not set; skipping images',
      })
    } else {
      try {
        candidates = await deps.imageSearch.search(image.query, image.count, {
          width: image.width ?? null,
        })
        if (candidates.length === 0) {
          warnings.push({
            stage: 'image-placement',
            message: `No images found for "${image.query}"`,
          })
        }
      } catch (error) {
        warnings.push({
          stage: 'image-placement',
          message: `Image search failed: ${getErrorMessage(error)}`,
        })
      }
    }
    const placed = await placeImages({
      document,
      candidates,
      count: image.count,
      generator: request.mode === 'raw' ? null : deps.generator,
      logger: deps.logger,
    })
    document = placed.document
    warnings.push(
      ...placed.warnings.map((message) => ({ stage: 'image-placement' as const, message }))
    )
  }

  tracker.transition('done')
  return { document, chunkCount: chunks.length }
}

export async function runResearchPipeline(
  request: ResearchRequest,
  deps: PipelineDeps
): Promise<PipelineReport> {
  const budgets = resolveResearchBudgets({
    depth: request.depth,
    maxPages: request.maxPages ?? null,
    ...(request.maxChunkSize ? { maxChunkSize: request.maxChunkSize } : {}),
  })
  const tracker = createTracker('planning', deps)
  const warnings: PipelineWarning[] = []

  let sources: SourceRef[]
  try {
    sources = await planSources({
      query: request.topic,
      desiredCount: budgets.desiredCount,
      preference: request.searchPreference,
      backends: deps.backends,
      logger: deps.logger,
    })
  } catch (error) {
    if (error instanceof SearchError) {
      throw fail(tracker, { message: error.message, remedy: REMEDIES.planning, cause: error })
    }
    throw error
  }

  tracker.transition('aggregating')
  const corpus = await aggregateSources({
    sources,
    fetcher: deps.fetcher,
    perSourceBudget: budgets.perSourceBudget,
    totalBudget: budgets.totalBudget,
    maxPages: budgets.maxPages,
    concurrency: request.concurrency ?? DEFAULT_CONCURRENCY,
    logger: deps.logger,
  })
  for (const skipped of corpus.skipped) {
    const warning = skippedToWarning(skipped)
    if (warning) warnings.push(warning)
  }
  if (corpus.pages.length === 0) {
    throw fail(tracker, {
      message: `None of the ${sources.length} sources found for "${request.topic}" could be read`,
      remedy: REMEDIES.aggregating,
    })
  }

  const { document, chunkCount } = await finishFromCorpus(
    { ...request, maxChunkSize: budgets.maxChunkSize },
    corpus,
    deps,
    tracker,
    warnings
  )
  return { document, corpus, chunkCount, warnings, timings: tracker.timings(), budgets }
}

/**
 * Same tail as research, starting from pages gathered earlier (for example by `scrape`).
 */
export async function runCorpusPipeline(
  request: SynthesisRequest,
  corpus: Corpus,
  deps: SynthesisDeps
): Promise<PipelineReport> {
  const tracker = createTracker('aggregating', deps)
  const warnings: PipelineWarning[] = []
  for (const skipped of corpus.skipped) {
    const warning = skippedToWarning(skipped)
    if (warning) warnings.push(warning)
  }
  if (corpus.pages.length === 0) {
    throw fail(tracker, {
      message: `No stored content for "${request.topic}"`,
      remedy: 'Run `docsmith scrape <url> --topic <topic>` first.',
    })
  }
  const { document, chunkCount } = await finishFromCorpus(
    request,
    corpus,
    deps,
    tracker,
    warnings
  )
  return { document, corpus, chunkCount, warnings, timings: tracker.timings(), budgets: null }
}

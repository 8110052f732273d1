import { DEFAULT_FETCH_TIMEOUT_MS } from '../../content/fetch-html.js'
import { buildExtractionStrategies, createSourceFetcher } from '../../content/source-fetcher.js'
import type { ImageSearch } from '../../images/types.js'
import { createUnsplashSearch } from '../../images/unsplash.js'
import { DEFAULT_DEPTH } from '../../research/budgets.js'
import {
  type PipelineDeps,
  type SynthesisDeps,
  runResearchPipeline,
} from '../../research/pipeline.js'
import { RESEARCH_SYSTEM_PROMPT } from '../../research/prompts.js'
import { createBraveBackend } from '../../search/brave.js'
import { createDuckDuckGoBackend } from '../../search/duckduckgo.js'
import { type RunContext, createGenerator } from '../context.js'
import { emitDocumentReport } from '../emit.js'
import type { ModelFlags, ResearchFlags } from '../options.js'

export function resolveFetchTimeoutMs(llmTimeoutMs: number): number {
  return Math.min(llmTimeoutMs, DEFAULT_FETCH_TIMEOUT_MS)
}

export function createImageSearch(context: RunContext, timeoutMs: number): ImageSearch | null {
  const accessKey = context.resolved.serviceKeys.unsplashAccessKey
  if (!accessKey) return null
  return createUnsplashSearch({ accessKey, fetchImpl: context.fetchImpl, timeoutMs })
}

/**
 * What synthesis over a finished corpus needs: the model (unless `withModel` is false) and
 * image search.
 */
export function createSynthesisDeps(
  context: RunContext,
  flags: ModelFlags,
  { withModel = true }: { withModel?: boolean } = {}
): SynthesisDeps {
  return {
    generator: withModel
      ? createGenerator(context, {
          model: flags.model,
          timeoutMs: flags.timeoutMs,
          system: RESEARCH_SYSTEM_PROMPT,
        })
      : null,
    imageSearch: createImageSearch(context, resolveFetchTimeoutMs(flags.timeoutMs)),
    logger: context.logger,
  }
}

/** Synthesis deps plus the search backends and live page fetcher that research needs. */
export function createPipelineDeps(
  context: RunContext,
  flags: ModelFlags & { fallbackOnly: boolean }
): PipelineDeps {
  const fetchTimeoutMs = resolveFetchTimeoutMs(flags.timeoutMs)
  const { serviceKeys } = context.resolved
  return {
    ...createSynthesisDeps(context, flags),
    backends: [
      createDuckDuckGoBackend({ fetchImpl: context.fetchImpl, timeoutMs: fetchTimeoutMs }),
      createBraveBackend({
        apiKey: serviceKeys.braveApiKey,
        fetchImpl: context.fetchImpl,
        timeoutMs: fetchTimeoutMs,
      }),
    ],
    fetcher: createSourceFetcher({
      fetchImpl: context.fetchImpl,
      strategies: buildExtractionStrategies({
        firecrawlApiKey: serviceKeys.firecrawlApiKey,
        fallbackOnly: flags.fallbackOnly,
      }),
      timeoutMs: fetchTimeoutMs,
      logger: context.logger,
    }),
  }
}

export async function runResearchFlow({
  query,
  flags,
  context,
}: {
  query: readonly string[]
  flags: ResearchFlags
  context: RunContext
}): Promise<void> {
  const topic = query.join(' ').trim()
  if (!topic) throw new Error('Missing research query')
  const research = context.config?.research

  const report = await runResearchPipeline(
    {
      topic,
      depth: flags.depth ?? research?.depth ?? DEFAULT_DEPTH,
      maxPages: flags.maxPages,
      mode: flags.mode,
      tone: flags.tone,
      image: flags.image,
      searchPreference: flags.searchEngine ?? context.config?.search?.engine ?? 'auto',
      ...(research?.maxChunkCharacters ? { maxChunkSize: research.maxChunkCharacters } : {}),
      ...(research?.concurrency ? { concurrency: research.concurrency } : {}),
    },
    createPipelineDeps(context, flags)
  )
  await emitDocumentReport({ context, report, flags, topic, kind: 'research' })
}

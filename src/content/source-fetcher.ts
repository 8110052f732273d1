import type { DocsmithLogger } from '../logging/logger.js'
import { FetchError, type FetchAttempt, getErrorMessage } from '../research/errors.js'
import type { RawPage, SourceRef } from '../research/types.js'
import { normalizeForPrompt, truncateAtBoundary } from './cleaner.js'
import { DEFAULT_FETCH_TIMEOUT_MS, type LoadedHtml, fetchHtmlDocument } from './fetch-html.js'
import { createFirecrawlStrategy } from './strategies/firecrawl.js'
import { readabilityStrategy } from './strategies/readability.js'
import { staticStrategy } from './strategies/static.js'
import type { ExtractionStrategy } from './strategies/types.js'

export const MIN_CONTENT_CHARACTERS = 100

export type SourceFetcher = {
  fetch: (source: SourceRef, contentBudget: number) => Promise<RawPage>
}

export function buildExtractionStrategies({
  firecrawlApiKey,
  fallbackOnly,
}: {
  firecrawlApiKey: string | null
  fallbackOnly: boolean
}): ExtractionStrategy[] {
  if (fallbackOnly) return [staticStrategy]
  return [
    ...(firecrawlApiKey ? [createFirecrawlStrategy({ apiKey: firecrawlApiKey })] : []),
    readabilityStrategy,
    staticStrategy,
  ]
}

function toFetchError(error: unknown, url: string): FetchError {
  if (error instanceof FetchError) return error
  return new FetchError({
    reason: 'PARSE_FAILURE',
    url,
    message: `Extraction failed for ${url}: ${getErrorMessage(error)}`,
    cause: error,
  })
}

/**
 * Tries each strategy once, in order. The first one that yields at least
 * `MIN_CONTENT_CHARACTERS` of text wins; otherwise the last failure is raised with every
 * attempt attached.
 */
export function createSourceFetcher({
  fetchImpl,
  strategies,
  timeoutMs = DEFAULT_FETCH_TIMEOUT_MS,
  logger,
  now = () => new Date(),
}: {
  fetchImpl: typeof fetch
  strategies: readonly ExtractionStrategy[]
  timeoutMs?: number
  logger: DocsmithLogger
  now?: () => Date
}): SourceFetcher {
  const log = logger.getSubLogger({ name: 'fetch' })

  return {
    fetch: async (source, contentBudget) => {
      let pending: Promise<LoadedHtml> | null = null
      const loadHtml = () => {
        pending ??= fetchHtmlDocument(fetchImpl, source.url, { timeoutMs })
        return pending
      }

      const attempts: FetchAttempt[] = []
      let lastError: FetchError | null = null

      for (const strategy of strategies) {
        try {
          const extracted = await strategy.extract({
            url: source.url,
            loadHtml,
            fetchImpl,
            timeoutMs,
          })
          const text = normalizeForPrompt(extracted.text)
          if (text.length < MIN_CONTENT_CHARACTERS) {
            throw new FetchError({
              reason: 'PARSE_FAILURE',
              url: source.url,
              message: `Only ${text.length} characters extracted from ${source.url}`,
            })
          }
          log.debug(`${strategy.method} ok url=${source.url} chars=${text.length}`)
          return {
            source,
            text: truncateAtBoundary(text, contentBudget),
            title: extracted.title ?? source.title,
            fetchedAt: now(),
            extractionMethod: strategy.method,
            links: extracted.links,
          }
        } catch (error) {
          const failure = toFetchError(error, source.url)
          attempts.push({
            strategy: strategy.method,
            reason: failure.reason,
            message: failure.message,
          })
          lastError = failure
          log.debug(`${strategy.method} failed url=${source.url} reason=${failure.reason}`)
        }
      }

      const summary = attempts
        .map((attempt) => `${attempt.strategy}: ${attempt.reason}`)
        .join(', ')
      throw new FetchError({
        reason: lastError?.reason ?? 'PARSE_FAILURE',
        url: source.url,
        message: `Could not extract ${source.url} (${summary || 'no strategies'})`,
        httpStatus: lastError?.httpStatus ?? null,
        attempts,
        cause: lastError,
      })
    },
  }
}

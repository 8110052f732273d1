import pLimit from 'p-limit'

import { truncateAtBoundary } from '../content/cleaner.js'
import type { SourceFetcher } from '../content/source-fetcher.js'
import type { DocsmithLogger } from '../logging/logger.js'
import { DEFAULT_CONCURRENCY, MIN_PAGE_REMAINDER } from './budgets.js'
import { FetchError, getErrorMessage } from './errors.js'
import type { Corpus, RawPage, SkippedSource, SourceRef } from './types.js'
import { normalizeTitle, normalizeUrl } from './url.js'

const NEAR_DUPLICATE_PREFIX = 200

type FetchOutcome =
  | { kind: 'page'; page: RawPage }
  | { kind: 'failed'; error: unknown }
  | { kind: 'duplicate'; of: SourceRef }
  | { kind: 'not-fetched' }

export type AggregateOptions = {
  sources: readonly SourceRef[]
  fetcher: SourceFetcher
  perSourceBudget: number
  totalBudget: number
  maxPages: number
  concurrency?: number
  logger?: DocsmithLogger
}

function textFingerprint(text: string): string {
  return text.replace(/\s+/g, ' ').trim().toLowerCase().slice(0, NEAR_DUPLICATE_PREFIX)
}

function describeFailure(error: unknown): string {
  if (error instanceof FetchError) return `${error.reason}: ${error.message}`
  return getErrorMessage(error)
}

/**
 * Fetches sources concurrently but folds results strictly in rank order, so the corpus
 * depends only on the inputs, never on completion order. Per-source failures land in
 * `skipped`; nothing here throws for a single bad source.
 */
export async function aggregateSources({
  sources,
  fetcher,
  perSourceBudget,
  totalBudget,
  maxPages,
  concurrency = DEFAULT_CONCURRENCY,
  logger,
}: AggregateOptions): Promise<Corpus> {
  const log = logger?.getSubLogger({ name: 'aggregate' })
  const ordered = [...sources].sort((a, b) => a.rank - b.rank)
  const firstByUrl = new Map<string, SourceRef>()
  const limit = pLimit(Math.max(1, concurrency))
  let exhausted = false

  const tasks = ordered.map((source) => {
    const key = normalizeUrl(source.url)
    const first = firstByUrl.get(key)
    if (first) {
      return Promise.resolve<FetchOutcome>({ kind: 'duplicate', of: first })
    }
    firstByUrl.set(key, source)
    return limit(async (): Promise<FetchOutcome> => {
      if (exhausted) return { kind: 'not-fetched' }
      try {
        return { kind: 'page', page: await fetcher.fetch(source, perSourceBudget) }
      } catch (error) {
        return { kind: 'failed', error }
      }
    })
  })

  const pages: RawPage[] = []
  const skipped: SkippedSource[] = []
  const seenUrls = new Set<string>()
  const fingerprints = new Map<string, SourceRef>()
  let total = 0
  let stopReason: 'budget' | 'max-pages' | null = null

  for (const [index, task] of tasks.entries()) {
    const source = ordered[index]
    if (!source) continue
    const outcome = await task

    if (stopReason) {
      skipped.push({
        source,
        reason: stopReason,
        detail:
          stopReason === 'budget'
            ? `corpus budget of ${totalBudget} characters reached`
            : `page limit of ${maxPages} reached`,
      })
      continue
    }

    if (outcome.kind === 'duplicate') {
      skipped.push({ source, reason: 'duplicate', detail: `same URL as ${outcome.of.url}` })
      continue
    }
    if (outcome.kind === 'not-fetched') {
      // Unreachable: tasks only skip once the fold has stopped.
      skipped.push({ source, reason: 'budget', detail: 'not fetched' })
      continue
    }
    if (outcome.kind === 'failed') {
      const detail = describeFailure(outcome.error)
      log?.debug(`skip ${source.url}: ${detail}`)
      skipped.push({ source, reason: 'fetch-failed', detail })
      continue
    }

    const { page } = outcome
    if (page.text.trim().length === 0) {
      skipped.push({ source, reason: 'empty', detail: 'no text extracted' })
      continue
    }
    const urlKey = normalizeUrl(page.source.url)
    if (seenUrls.has(urlKey)) {
      skipped.push({ source, reason: 'duplicate', detail: 'URL already in corpus' })
      continue
    }
    const fingerprint = `${normalizeTitle(page.title)}\u0000${textFingerprint(page.text)}`
    const twin = fingerprints.get(fingerprint)
    if (twin) {
      skipped.push({ source, reason: 'duplicate', detail: `same content as ${twin.url}` })
      continue
    }

    const remaining = totalBudget - total
    let accepted = page
    if (page.text.length > remaining) {
      if (remaining < MIN_PAGE_REMAINDER) {
        skipped.push({
          source,
          reason: 'budget',
          detail: `only ${remaining} characters of budget left`,
        })
        stopReason = 'budget'
        exhausted = true
        continue
      }
      accepted = { ...page, text: truncateAtBoundary(page.text, remaining) }
    }

    pages.push(accepted)
    seenUrls.add(urlKey)
    fingerprints.set(fingerprint, source)
    total += accepted.text.length
    log?.debug(`accept ${source.url} chars=${accepted.text.length} total=${total}`)

    if (total >= totalBudget || accepted !== page) {
      stopReason = 'budget'
      exhausted = true
    } else if (pages.length >= maxPages) {
      stopReason = 'max-pages'
      exhausted = true
    }
  }

  return Object.freeze({
    pages: Object.freeze(pages),
    skipped: Object.freeze(skipped),
    totalCharacters: total,
    budget: totalBudget,
  })
}

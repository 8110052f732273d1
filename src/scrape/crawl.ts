import pLimit from 'p-limit'

import type { SourceFetcher } from '../content/source-fetcher.js'
import type { DocsmithLogger } from '../logging/logger.js'
import { DEFAULT_CONCURRENCY } from '../research/budgets.js'
import { FetchError, getErrorMessage } from '../research/errors.js'
import type { RawPage, SourceRef } from '../research/types.js'
import { isHttpUrl, normalizeUrl } from '../research/url.js'

export const DEFAULT_SCRAPE_DEPTH = 0
export const DEFAULT_SCRAPE_MAX_PAGES = 3
export const STORED_PAGE_CHARACTERS = 50_000

const ASSET_PATH = /\.(?:png|jpe?g|gif|webp|svg|ico|pdf|zip|gz|mp3|mp4|webm|css|js|xml)$/i

export type CrawlFailure = {
  url: string
  message: string
}

export type CrawlResult = {
  pages: RawPage[]
  failures: CrawlFailure[]
}

type CrawlOutcome =
  | { ok: true; page: RawPage }
  | { ok: false; source: SourceRef; error: unknown }

function originOf(url: string): string | null {
  try {
    return new URL(url).origin
  } catch {
    return null
  }
}

function isCrawlable(url: string, origins: ReadonlySet<string>): boolean {
  const origin = originOf(url)
  if (!origin || !origins.has(origin)) return false
  return !ASSET_PATH.test(new URL(url).pathname)
}

/**
 * Breadth-first over same-origin links. Depth 0 fetches only the start URLs. Each level is
 * fetched concurrently and folded in discovery order, so the result does not depend on
 * completion order.
 */
export async function crawlSite({
  startUrls,
  fetcher,
  depth = DEFAULT_SCRAPE_DEPTH,
  maxPages = DEFAULT_SCRAPE_MAX_PAGES,
  concurrency = DEFAULT_CONCURRENCY,
  pageCharacters = STORED_PAGE_CHARACTERS,
  logger,
}: {
  startUrls: readonly string[]
  fetcher: SourceFetcher
  depth?: number
  maxPages?: number
  concurrency?: number
  pageCharacters?: number
  logger?: DocsmithLogger
}): Promise<CrawlResult> {
  const log = logger?.getSubLogger({ name: 'crawl' })
  const limit = pLimit(Math.max(1, concurrency))
  const seen = new Set<string>()
  const pages: RawPage[] = []
  const failures: CrawlFailure[] = []
  let rank = 0

  const enqueue = (url: string, into: SourceRef[]) => {
    const key = normalizeUrl(url)
    if (seen.has(key)) return
    seen.add(key)
    rank += 1
    into.push({ url, title: url, rank })
  }

  let frontier: SourceRef[] = []
  for (const url of startUrls) {
    if (!isHttpUrl(url)) {
      failures.push({ url, message: 'Not an http(s) URL' })
      continue
    }
    enqueue(url, frontier)
  }
  const origins = new Set(
    frontier
      .map((source) => originOf(source.url))
      .filter((origin): origin is string => origin !== null)
  )

  for (let level = 0; level <= depth && frontier.length > 0; level += 1) {
    const batch = frontier.slice(0, Math.max(0, maxPages - pages.length))
    log?.debug(`level ${level}: fetching ${batch.length} of ${frontier.length} urls`)
    const outcomes = await Promise.all(
      batch.map((source) =>
        limit(async (): Promise<CrawlOutcome> => {
          try {
            return { ok: true, page: await fetcher.fetch(source, pageCharacters) }
          } catch (error) {
            return { ok: false, source, error }
          }
        })
      )
    )

    const next: SourceRef[] = []
    for (const outcome of outcomes) {
      if (!outcome.ok) {
        const message =
          outcome.error instanceof FetchError
            ? `${outcome.error.reason}: ${outcome.error.message}`
            : getErrorMessage(outcome.error)
        log?.debug(`failed ${outcome.source.url}: ${message}`)
        failures.push({ url: outcome.source.url, message })
        continue
      }
      pages.push(outcome.page)
      if (level < depth) {
        for (const link of outcome.page.links) {
          if (isCrawlable(link, origins)) enqueue(link, next)
        }
      }
    }
    if (pages.length >= maxPages) break
    frontier = next
  }

  return { pages, failures }
}

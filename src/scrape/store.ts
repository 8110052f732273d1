import { mkdir, readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'

import { truncateAtBoundary } from '../content/cleaner.js'
import type { SourceFetcher } from '../content/source-fetcher.js'
import type { DocsmithLogger } from '../logging/logger.js'
import { aggregateSources } from '../research/aggregator.js'
import type { ResearchBudgets } from '../research/budgets.js'
import { FetchError } from '../research/errors.js'
import type { Corpus, RawPage, SourceRef } from '../research/types.js'
import { normalizeUrl } from '../research/url.js'
import { isMissingFileError, isRecord } from '../shared/guards.js'
import { slugify } from '../shared/slug.js'

const STORE_VERSION = 1
const DESCRIPTION_CHARACTERS = 200

export type StoredPage = {
  url: string
  title: string
  description: string
  content: string
  /** ISO timestamp of the fetch. */
  fetchedAt: string
}

export type ScrapeStore = {
  version: typeof STORE_VERSION
  topic: string
  updatedAt: string
  pages: StoredPage[]
}

export function resolveStorePath(dataDir: string, topic: string): string {
  return path.join(dataDir, 'scrape', `${slugify(topic)}.json`)
}

function describePage(text: string): string {
  const firstParagraph =
    text
      .split(/\n{2,}/)
      .map((block) => block.trim())
      .find((block) => block.length > 0 && !block.startsWith('#')) ?? ''
  const flat = firstParagraph.replace(/\s+/g, ' ')
  return flat.length > DESCRIPTION_CHARACTERS
    ? `${flat.slice(0, DESCRIPTION_CHARACTERS - 1).trimEnd()}…`
    : flat
}

export function toStoredPage(page: RawPage): StoredPage {
  return {
    url: page.source.url,
    title: page.title,
    description: describePage(page.text),
    content: page.text,
    fetchedAt: page.fetchedAt.toISOString(),
  }
}

function parseStoredPage(raw: unknown, filePath: string, index: number): StoredPage {
  if (!isRecord(raw)) {
    throw new Error(`Invalid scrape store ${filePath}: pages[${index}] must be an object.`)
  }
  const { url, title, description, content, fetchedAt } = raw
  if (
    typeof url !== 'string' ||
    typeof title !== 'string' ||
    typeof content !== 'string' ||
    typeof fetchedAt !== 'string'
  ) {
    throw new Error(
      `Invalid scrape store ${filePath}: pages[${index}] is missing a string field.`
    )
  }
  return {
    url,
    title,
    description: typeof description === 'string' ? description : describePage(content),
    content,
    fetchedAt,
  }
}

export function parseScrapeStore(raw: string, filePath: string): ScrapeStore {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Invalid JSON in scrape store ${filePath}: ${message}`)
  }
  if (!isRecord(parsed) || !Array.isArray(parsed.pages)) {
    throw new Error(`Invalid scrape store ${filePath}: expected an object with a pages array.`)
  }
  if (parsed.version !== STORE_VERSION) {
    throw new Error(`Unsupported scrape store version in ${filePath}: ${String(parsed.version)}`)
  }
  const rawPages: unknown[] = parsed.pages
  const pages = rawPages.map((page, index) => parseStoredPage(page, filePath, index))
  return {
    version: STORE_VERSION,
    topic: typeof parsed.topic === 'string' ? parsed.topic : '',
    updatedAt: typeof parsed.updatedAt === 'string' ? parsed.updatedAt : '',
    pages,
  }
}

export async function loadScrapeStore({
  dataDir,
  topic,
}: {
  dataDir: string
  topic: string
}): Promise<{ store: ScrapeStore | null; path: string }> {
  const filePath = resolveStorePath(dataDir, topic)
  let raw: string
  try {
    raw = await readFile(filePath, 'utf8')
  } catch (error) {
    if (isMissingFileError(error)) return { store: null, path: filePath }
    throw error
  }
  return { store: parseScrapeStore(raw, filePath), path: filePath }
}

/**
 * Pages with a URL already in the store replace the stored copy in place; new pages are
 * appended in the order given.
 */
export function mergeStoredPages(
  existing: readonly StoredPage[],
  incoming: readonly StoredPage[]
): { pages: StoredPage[]; added: number; updated: number } {
  const pages = [...existing]
  const indexByUrl = new Map(pages.map((page, index) => [normalizeUrl(page.url), index]))
  let added = 0
  let updated = 0
  for (const page of incoming) {
    const key = normalizeUrl(page.url)
    const index = indexByUrl.get(key)
    if (typeof index === 'number') {
      pages[index] = page
      updated += 1
      continue
    }
    indexByUrl.set(key, pages.length)
    pages.push(page)
    added += 1
  }
  return { pages, added, updated }
}

export async function saveScrapedPages({
  dataDir,
  topic,
  pages,
  now = () => new Date(),
}: {
  dataDir: string
  topic: string
  pages: readonly RawPage[]
  now?: () => Date
}): Promise<{ path: string; store: ScrapeStore; added: number; updated: number }> {
  const { store: previous, path: filePath } = await loadScrapeStore({ dataDir, topic })
  const merged = mergeStoredPages(previous?.pages ?? [], pages.map(toStoredPage))
  const store: ScrapeStore = {
    version: STORE_VERSION,
    topic,
    updatedAt: now().toISOString(),
    pages: merged.pages,
  }
  await mkdir(path.dirname(filePath), { recursive: true })
  await writeFile(filePath, `${JSON.stringify(store, null, 2)}\n`, 'utf8')
  return { path: filePath, store, added: merged.added, updated: merged.updated }
}

/**
 * Serves stored pages through the fetcher interface so stored content goes through the same
 * dedupe and budget fold as live sources.
 */
export function createStoredPageFetcher(store: ScrapeStore): SourceFetcher {
  const byUrl = new Map(store.pages.map((page) => [normalizeUrl(page.url), page]))
  return {
    fetch: async (source, contentBudget) => {
      const page = byUrl.get(normalizeUrl(source.url))
      if (!page) {
        throw new FetchError({
          reason: 'PARSE_FAILURE',
          url: source.url,
          message: `${source.url} is not in the scrape store`,
        })
      }
      return {
        source,
        text: truncateAtBoundary(page.content, contentBudget),
        title: page.title || source.title,
        fetchedAt: new Date(page.fetchedAt),
        extractionMethod: 'stored',
        links: [],
      }
    },
  }
}

export async function buildStoredCorpus({
  store,
  budgets,
  logger,
}: {
  store: ScrapeStore
  budgets: Pick<ResearchBudgets, 'perSourceBudget' | 'totalBudget' | 'maxPages'>
  logger?: DocsmithLogger
}): Promise<Corpus> {
  const sources: SourceRef[] = store.pages.map((page, index) => ({
    url: page.url,
    title: page.title,
    rank: index + 1,
  }))
  return aggregateSources({
    sources,
    fetcher: createStoredPageFetcher(store),
    perSourceBudget: budgets.perSourceBudget,
    totalBudget: budgets.totalBudget,
    maxPages: budgets.maxPages,
    ...(logger ? { logger } : {}),
  })
}

import { buildExtractionStrategies, createSourceFetcher } from '../../content/source-fetcher.js'
import { DEFAULT_CONCURRENCY } from '../../research/budgets.js'
import {
  DEFAULT_SCRAPE_DEPTH,
  DEFAULT_SCRAPE_MAX_PAGES,
  crawlSite,
} from '../../scrape/crawl.js'
import { saveScrapedPages } from '../../scrape/store.js'
import type { RunContext } from '../context.js'
import type { ScrapeFlags } from '../options.js'

export async function runScrapeFlow({
  urls,
  flags,
  context,
}: {
  urls: readonly string[]
  flags: ScrapeFlags
  context: RunContext
}): Promise<void> {
  const log = context.logger.getSubLogger({ name: 'scrape' })
  const fetcher = createSourceFetcher({
    fetchImpl: context.fetchImpl,
    strategies: buildExtractionStrategies({
      firecrawlApiKey: context.resolved.serviceKeys.firecrawlApiKey,
      fallbackOnly: flags.fallbackOnly,
    }),
    timeoutMs: flags.timeoutMs,
    logger: context.logger,
  })

  const result = await crawlSite({
    startUrls: urls,
    fetcher,
    depth: flags.depth ?? DEFAULT_SCRAPE_DEPTH,
    maxPages: flags.maxPages ?? DEFAULT_SCRAPE_MAX_PAGES,
    concurrency: context.config?.research?.concurrency ?? DEFAULT_CONCURRENCY,
    logger: context.logger,
  })
  for (const failure of result.failures) {
    log.warn(`Skipped ${failure.url}: ${failure.message}`)
  }
  if (result.pages.length === 0) {
    const detail = result.failures.map((failure) => failure.message).join('; ')
    throw new Error(`No pages could be scraped${detail ? ` (${detail})` : ''}`)
  }

  const saved = await saveScrapedPages({
    dataDir: context.dataDir,
    topic: flags.topic,
    pages: result.pages,
  })

  if (flags.json) {
    const payload = {
      topic: flags.topic,
      path: saved.path,
      added: saved.added,
      updated: saved.updated,
      stored: saved.store.pages.length,
      pages: result.pages.map((page) => ({
        url: page.source.url,
        title: page.title,
        characters: page.text.length,
        extractionMethod: page.extractionMethod,
      })),
      failures: result.failures,
    }
    context.stdout.write(`${JSON.stringify(payload, null, 2)}\n`)
    return
  }
  context.stdout.write(
    `Scraped ${result.pages.length} page${result.pages.length === 1 ? '' : 's'} ` +
      `(${saved.added} new, ${saved.updated} updated) into ${saved.path}\n`
  )
}

import { isAbortError } from '../../llm/errors.js'
import { FetchError, getErrorMessage } from '../../research/errors.js'
import { isRecord } from '../../shared/guards.js'
import type { ExtractedContent, ExtractionStrategy } from './types.js'

const FIRECRAWL_SCRAPE_URL = 'https://api.firecrawl.dev/v1/scrape'
const MARKDOWN_IMAGE_PATTERN = /!\[[^\]]*\]\([^)]*\)/g

function parseScrapePayload(payload: unknown): ExtractedContent | null {
  if (!isRecord(payload) || !isRecord(payload.data)) return null
  const data = payload.data
  if (typeof data.markdown !== 'string' || data.markdown.trim().length === 0) return null
  const metadata = isRecord(data.metadata) ? data.metadata : {}
  const title = typeof metadata.title === 'string' ? metadata.title.trim() || null : null
  const rawLinks: unknown[] = Array.isArray(data.links) ? data.links : []
  const links = rawLinks.filter((link): link is string => typeof link === 'string')
  return { text: data.markdown.replace(MARKDOWN_IMAGE_PATTERN, ''), title, links }
}

/**
 * Remote render-and-extract: the page's scripts run on Firecrawl's side and the main content
 * comes back as markdown.
 */
export function createFirecrawlStrategy({ apiKey }: { apiKey: string }): ExtractionStrategy {
  return {
    method: 'render',
    extract: async ({ url, fetchImpl, timeoutMs }) => {
      const controller = new AbortController()
      const timeout = setTimeout(() => controller.abort(), timeoutMs)
      try {
        const response = await fetchImpl(FIRECRAWL_SCRAPE_URL, {
          method: 'POST',
          headers: {
            authorization: `Bearer ${apiKey}`,
            'content-type': 'application/json',
          },
          body: JSON.stringify({
            url,
            formats: ['markdown', 'links'],
            onlyMainContent: true,
            timeout: timeoutMs,
          }),
          signal: controller.signal,
        })
        if (!response.ok) {
          throw new FetchError({
            reason: 'NETWORK',
            url,
            message: `Firecrawl failed for ${url} (${response.status})`,
            httpStatus: response.status,
          })
        }
        const parsed = parseScrapePayload(await response.json())
        if (!parsed) {
          throw new FetchError({
            reason: 'PARSE_FAILURE',
            url,
            message: `Firecrawl returned no markdown for ${url}`,
          })
        }
        return parsed
      } catch (error) {
        if (error instanceof FetchError) throw error
        if (isAbortError(error)) {
          throw new FetchError({
            reason: 'TIMEOUT',
            url,
            message: `Firecrawl timed out for ${url}`,
            cause: error,
          })
        }
        throw new FetchError({
          reason: 'NETWORK',
          url,
          message: `Firecrawl request failed for ${url}: ${getErrorMessage(error)}`,
          cause: error,
        })
      } finally {
        clearTimeout(timeout)
      }
    },
  }
}

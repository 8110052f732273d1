import { isAbortError } from '../llm/errors.js'
import { FetchError, getErrorMessage } from '../research/errors.js'
import { isChallengeHtml } from './html-text.js'

export const DEFAULT_FETCH_TIMEOUT_MS = 20_000

const BLOCKED_STATUSES = new Set([401, 403, 429, 451])
const TEXTUAL_CONTENT_TYPE_PATTERN = /html|xml|text\/plain/i

export const REQUEST_HEADERS = {
  accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'accept-language': 'en-US,en;q=0.9',
  'user-agent':
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 14_0) AppleWebKit/537.36 (KHTML, like Gecko) ' +
    'Chrome/124.0 Safari/537.36',
} as const

export type LoadedHtml = {
  html: string
  finalUrl: string
}

/**
 * Downloads one HTML document, mapping every failure onto a `FetchError` reason.
 */
export async function fetchHtmlDocument(
  fetchImpl: typeof fetch,
  url: string,
  { timeoutMs = DEFAULT_FETCH_TIMEOUT_MS }: { timeoutMs?: number } = {}
): Promise<LoadedHtml> {
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)

  try {
    const response = await fetchImpl(url, {
      headers: REQUEST_HEADERS,
      redirect: 'follow',
      signal: controller.signal,
    })

    if (!response.ok) {
      const reason = BLOCKED_STATUSES.has(response.status) ? 'BLOCKED' : 'NETWORK'
      const status = `${response.status} ${response.statusText}`.trim()
      throw new FetchError({
        reason,
        url,
        message: `Failed to fetch ${url} (${status})`,
        httpStatus: response.status,
      })
    }

    const contentType = response.headers.get('content-type')
    if (contentType && !TEXTUAL_CONTENT_TYPE_PATTERN.test(contentType)) {
      throw new FetchError({
        reason: 'PARSE_FAILURE',
        url,
        message: `Unsupported content type for ${url}: ${contentType}`,
      })
    }

    const html = await response.text()
    if (isChallengeHtml(html)) {
      throw new FetchError({
        reason: 'BLOCKED',
        url,
        message: `Blocked by a bot challenge at ${url}`,
        httpStatus: response.status,
      })
    }
    return { html, finalUrl: response.url || url }
  } catch (error) {
    if (error instanceof FetchError) throw error
    if (isAbortError(error)) {
      throw new FetchError({
        reason: 'TIMEOUT',
        url,
        message: `Fetching ${url} timed out after ${timeoutMs}ms`,
        cause: error,
      })
    }
    throw new FetchError({
      reason: 'NETWORK',
      url,
      message: `Failed to fetch ${url}: ${getErrorMessage(error)}`,
      cause: error,
    })
  } finally {
    clearTimeout(timeout)
  }
}

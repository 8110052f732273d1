import { load } from 'cheerio'

import { REQUEST_HEADERS } from '../content/fetch-html.js'
import { fetchWithTimeout } from '../shared/fetch-with-timeout.js'
import type { SearchBackend, SearchHit } from './types.js'

const DUCKDUCKGO_HTML_URL = 'https://html.duckduckgo.com/html/'
const REDIRECT_PARAM_PATTERN = /[?&]uddg=([^&]+)/
const ANOMALY_PATTERN = /anomaly-modal|challenge-form/i

/**
 * Unwraps `//duckduckgo.com/l/?uddg=<encoded>` redirect links.
 */
export function resolveDuckDuckGoHref(href: string): string | null {
  const redirect = REDIRECT_PARAM_PATTERN.exec(href)
  let candidate = href
  if (redirect?.[1]) {
    try {
      candidate = decodeURIComponent(redirect[1])
    } catch {
      return null
    }
  } else if (href.startsWith('//')) {
    candidate = `https:${href}`
  }
  try {
    const url = new URL(candidate)
    return url.protocol === 'http:' || url.protocol === 'https:' ? url.toString() : null
  } catch {
    return null
  }
}

export function parseDuckDuckGoHtml(html: string): SearchHit[] {
  const $ = load(html)
  const hits: SearchHit[] = []
  $('a.result__a').each((_, element) => {
    const anchor = $(element)
    const result = anchor.closest('.result')
    if (result.hasClass('result--ad')) return
    const href = anchor.attr('href')
    const url = href ? resolveDuckDuckGoHref(href) : null
    if (!url) return
    const title = anchor.text().replace(/\s+/g, ' ').trim()
    const snippet = result.find('.result__snippet').text().replace(/\s+/g, ' ').trim()
    hits.push({ url, title: title || url, snippet: snippet || null })
  })
  return hits
}

export function createDuckDuckGoBackend({
  fetchImpl,
  timeoutMs,
}: {
  fetchImpl: typeof fetch
  timeoutMs: number
}): SearchBackend {
  return {
    name: 'duckduckgo',
    search: async (query, limit) => {
      const url = `${DUCKDUCKGO_HTML_URL}?q=${encodeURIComponent(query)}`
      const response = await fetchWithTimeout(
        fetchImpl,
        url,
        { headers: REQUEST_HEADERS },
        { timeoutMs, label: 'DuckDuckGo search' }
      )
      if (!response.ok) {
        throw new Error(`DuckDuckGo search failed (${response.status})`)
      }
      const html = await response.text()
      const hits = parseDuckDuckGoHtml(html)
      if (hits.length === 0 && ANOMALY_PATTERN.test(html)) {
        throw new Error('DuckDuckGo rejected the request with a bot challenge')
      }
      return hits.slice(0, limit)
    },
  }
}

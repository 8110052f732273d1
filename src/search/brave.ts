import { fetchWithTimeout } from '../shared/fetch-with-timeout.js'
import { isRecord } from '../shared/guards.js'
import type { SearchBackend, SearchHit } from './types.js'

const BRAVE_SEARCH_URL = 'https://api.search.brave.com/res/v1/web/search'
const MAX_BRAVE_COUNT = 20

export function parseBraveResponse(payload: unknown): SearchHit[] {
  if (!isRecord(payload) || !isRecord(payload.web) || !Array.isArray(payload.web.results)) {
    return []
  }
  const results: unknown[] = payload.web.results
  const hits: SearchHit[] = []
  for (const item of results) {
    if (!isRecord(item) || typeof item.url !== 'string') continue
    const title = typeof item.title === 'string' ? item.title.trim() : ''
    const snippet = typeof item.description === 'string' ? item.description.trim() : ''
    hits.push({ url: item.url, title: title || item.url, snippet: snippet || null })
  }
  return hits
}

export function createBraveBackend({
  apiKey,
  fetchImpl,
  timeoutMs,
}: {
  apiKey: string | null
  fetchImpl: typeof fetch
  timeoutMs: number
}): SearchBackend {
  return {
    name: 'brave',
    search: async (query, limit) => {
      if (!apiKey) throw new Error('BRAVE_SEARCH_API_KEY is not set')
      const params = new URLSearchParams({
        q: query,
        count: String(Math.min(Math.max(limit, 1), MAX_BRAVE_COUNT)),
        search_lang: 'en',
      })
      const response = await fetchWithTimeout(
        fetchImpl,
        `${BRAVE_SEARCH_URL}?${params.toString()}`,
        { headers: { accept: 'application/json', 'x-subscription-token': apiKey } },
        { timeoutMs, label: 'Brave search' }
      )
      if (!response.ok) {
        throw new Error(`Brave search failed (${response.status})`)
      }
      return parseBraveResponse(await response.json()).slice(0, limit)
    },
  }
}

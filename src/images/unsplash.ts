import type { ImageDescriptor } from '../research/types.js'
import { fetchWithTimeout } from '../shared/fetch-with-timeout.js'
import { isRecord } from '../shared/guards.js'
import type { ImageSearch } from './types.js'

const UNSPLASH_SEARCH_URL = 'https://api.unsplash.com/search/photos'
const UTM = 'utm_source=docsmith&utm_medium=referral'
const MAX_PER_PAGE = 30

function withUtm(url: string): string {
  return `${url}${url.includes('?') ? '&' : '?'}${UTM}`
}

function readString(record: Record<string, unknown>, key: string): string | null {
  const value = record[key]
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null
}

/** Unsplash resizes `urls.raw` on the fly through its `w` parameter. */
function sizedUrl(raw: string, width: number): string | null {
  try {
    const url = new URL(raw)
    url.searchParams.set('w', String(width))
    return url.toString()
  } catch {
    return null
  }
}

export function parseUnsplashResponse(
  payload: unknown,
  query: string,
  width: number | null = null
): ImageDescriptor[] {
  if (!isRecord(payload) || !Array.isArray(payload.results)) return []
  const results: unknown[] = payload.results
  const images: ImageDescriptor[] = []
  for (const item of results) {
    if (!isRecord(item) || !isRecord(item.urls) || !isRecord(item.user)) continue
    const id = readString(item, 'id')
    const rawUrl = readString(item.urls, 'raw')
    const sized = width && rawUrl ? sizedUrl(rawUrl, width) : null
    const url = sized ?? readString(item.urls, 'regular') ?? readString(item.urls, 'full')
    if (!id || !url) continue
    const user = item.user
    const username = readString(user, 'username')
    const links = isRecord(user.links) ? user.links : {}
    const profileUrl =
      readString(links, 'html') ?? (username ? `https://unsplash.com/@${username}` : null)
    images.push({
      id,
      url,
      altText: readString(item, 'alt_description') ?? readString(item, 'description') ?? query,
      ...(sized && width ? { width } : {}),
      attribution: {
        name: readString(user, 'name') ?? username ?? 'Unknown photographer',
        profileUrl: withUtm(profileUrl ?? 'https://unsplash.com'),
        site: { name: 'Unsplash', url: withUtm('https://unsplash.com/') },
      },
    })
  }
  return images
}

export function createUnsplashSearch({
  accessKey,
  fetchImpl,
  timeoutMs,
}: {
  accessKey: string
  fetchImpl: typeof fetch
  timeoutMs: number
}): ImageSearch {
  return {
    search: async (query, count, options) => {
      const params = new URLSearchParams({
        query,
        per_page: String(Math.min(Math.max(count, 1), MAX_PER_PAGE)),
        orientation: 'landscape',
      })
      const response = await fetchWithTimeout(
        fetchImpl,
        `${UNSPLASH_SEARCH_URL}?${params.toString()}`,
        {
          headers: { authorization: `Client-ID ${accessKey}`, 'accept-version': 'v1' },
        },
        { timeoutMs, label: 'Unsplash search' }
      )
      if (!response.ok) {
        throw new Error(`Unsplash search failed (${response.status})`)
      }
      const width = options?.width ?? null
      return parseUnsplashResponse(await response.json(), query, width).slice(0, count)
    },
  }
}

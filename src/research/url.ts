const WWW_PREFIX_PATTERN = /^www\./i
const TRACKING_PARAM_PATTERN = /^(utm_[a-z]+|fbclid|gclid|ref|ref_src)$/i

export function isHttpUrl(raw: string): boolean {
  try {
    const url = new URL(raw)
    return url.protocol === 'http:' || url.protocol === 'https:'
  } catch {
    return false
  }
}

/**
 * Canonical form used for deduplication: scheme dropped, `www.` dropped, fragment and
 * tracking params removed, remaining params sorted, trailing slash trimmed.
 * Unparseable input falls back to a trimmed, lower-cased copy.
 */
export function normalizeUrl(raw: string): string {
  let url: URL
  try {
    url = new URL(raw.trim())
  } catch {
    return raw.trim().toLowerCase()
  }
  const host = url.hostname.toLowerCase().replace(WWW_PREFIX_PATTERN, '')
  const port = url.port && url.port !== '80' && url.port !== '443' ? `:${url.port}` : ''
  const params = [...url.searchParams.entries()]
    .filter(([key]) => !TRACKING_PARAM_PATTERN.test(key))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  const query = params.length > 0 ? `?${new URLSearchParams(params).toString()}` : ''
  const pathname = url.pathname.replace(/\/+$/, '')
  return `${host}${port}${pathname}${query}`
}

export function normalizeTitle(raw: string): string {
  return raw
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim()
}

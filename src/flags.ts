export type SearchPreference = 'auto' | 'duckduckgo' | 'brave'
export type OutputFormat = 'markdown' | 'html' | 'text'
/** `raw` merges stored pages without a model. */
export type SynthesisMode = 'comprehensive' | 'summary' | 'snippet' | 'raw'
export type Tone = 'default' | 'professional'

const DURATION_PATTERN = /^(?<value>\d+(?:\.\d+)?)(?<unit>ms|s|m|h)?$/i
const INTEGER_PATTERN = /^\d+$/

export const MIN_DEPTH = 1
export const MAX_DEPTH = 10
const MAX_PAGES_LIMIT = 50
const MAX_IMAGE_COUNT = 10
const MAX_CRAWL_DEPTH = 5
const MIN_IMAGE_WIDTH = 100
const MAX_IMAGE_WIDTH = 4000

function parseBoundedInteger(
  raw: string,
  { flag, min, max }: { flag: string; min: number; max: number }
): number {
  const normalized = raw.trim()
  if (!INTEGER_PATTERN.test(normalized)) {
    throw new Error(`Unsupported ${flag}: ${raw}`)
  }
  const value = Number(normalized)
  if (!Number.isSafeInteger(value) || value < min || value > max) {
    throw new Error(`Unsupported ${flag}: ${raw} (expected ${min}-${max})`)
  }
  return value
}

export function parseDepth(raw: string): number {
  return parseBoundedInteger(raw, { flag: '--depth', min: MIN_DEPTH, max: MAX_DEPTH })
}

/** Link-following depth for `scrape`; 0 fetches only the given URLs. */
export function parseCrawlDepth(raw: string): number {
  return parseBoundedInteger(raw, { flag: '--depth', min: 0, max: MAX_CRAWL_DEPTH })
}

export function parseMaxPages(raw: string): number {
  return parseBoundedInteger(raw, { flag: '--max-pages', min: 1, max: MAX_PAGES_LIMIT })
}

export function parseImageCount(raw: string): number {
  return parseBoundedInteger(raw, { flag: '--image-count', min: 1, max: MAX_IMAGE_COUNT })
}

/** Pixel width requested from the image host. */
export function parseImageWidth(raw: string): number {
  return parseBoundedInteger(raw, {
    flag: '--image-width',
    min: MIN_IMAGE_WIDTH,
    max: MAX_IMAGE_WIDTH,
  })
}

export function parseSearchPreference(raw: string): SearchPreference {
  const normalized = raw.trim().toLowerCase()
  if (normalized === 'auto') return 'auto'
  if (normalized === 'duckduckgo' || normalized === 'ddg' || normalized === 'a') return 'duckduckgo'
  if (normalized === 'brave' || normalized === 'b') return 'brave'
  throw new Error(`Unsupported --search-engine: ${raw}`)
}

export function parseOutputFormat(raw: string): OutputFormat {
  const normalized = raw.trim().toLowerCase()
  if (normalized === 'md' || normalized === 'markdown') return 'markdown'
  if (normalized === 'html' || normalized === 'htm') return 'html'
  if (normalized === 'text' || normalized === 'txt' || normalized === 'plain') return 'text'
  throw new Error(`Unsupported --format: ${raw}`)
}

export function parseDurationMs(raw: string): number {
  const normalized = raw.trim()
  const match = DURATION_PATTERN.exec(normalized)
  if (!match?.groups) {
    throw new Error(`Unsupported --timeout: ${raw}`)
  }

  const numeric = Number(match.groups.value)
  if (!Number.isFinite(numeric) || numeric <= 0) {
    throw new Error(`Unsupported --timeout: ${raw}`)
  }

  const unit = match.groups.unit?.toLowerCase() ?? 's'
  const multiplier = unit === 'ms' ? 1 : unit === 's' ? 1000 : unit === 'm' ? 60_000 : 3_600_000
  return Math.floor(numeric * multiplier)
}

export function resolveSynthesisMode({
  summarize,
  snippet,
  raw = false,
}: {
  summarize: boolean
  snippet: boolean
  raw?: boolean
}): SynthesisMode {
  if (summarize && snippet) {
    throw new Error('--summarize and --snippet cannot be combined')
  }
  if (raw && (summarize || snippet)) {
    throw new Error('--raw cannot be combined with --summarize or --snippet')
  }
  if (raw) return 'raw'
  if (summarize) return 'summary'
  if (snippet) return 'snippet'
  return 'comprehensive'
}

export function formatExtension(format: OutputFormat): string {
  if (format === 'html') return 'html'
  if (format === 'text') return 'txt'
  return 'md'
}

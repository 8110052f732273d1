import type { SearchPreference } from '../flags.js'
import type { DocsmithLogger } from '../logging/logger.js'
import { SearchError, getErrorMessage } from '../research/errors.js'
import type { SourceRef } from '../research/types.js'
import { isHttpUrl, normalizeUrl } from '../research/url.js'
import type { SearchBackend, SearchBackendName, SearchHit } from './types.js'

export const SEARCH_PRIORITY: readonly SearchBackendName[] = ['duckduckgo', 'brave']

export type PlanSourcesOptions = {
  query: string
  desiredCount: number
  preference: SearchPreference
  backends: readonly SearchBackend[]
  logger?: DocsmithLogger
}

export function orderBackends(
  backends: readonly SearchBackend[],
  preference: SearchPreference
): SearchBackend[] {
  if (preference !== 'auto') return backends.filter((backend) => backend.name === preference)
  return SEARCH_PRIORITY.flatMap((name) => backends.filter((backend) => backend.name === name))
}

/**
 * Yields ranked, URL-unique sources lazily, moving to the next backend when one fails,
 * comes back empty, or runs out before `desiredCount`. Every iteration queries afresh.
 */
export async function* iterateSources({
  query,
  desiredCount,
  preference,
  backends,
  logger,
}: PlanSourcesOptions): AsyncGenerator<SourceRef, void, undefined> {
  const log = logger?.getSubLogger({ name: 'search' })
  const attempts: { backend: string; message: string }[] = []
  const seen = new Set<string>()
  let rank = 0

  const ordered = orderBackends(backends, preference)
  if (ordered.length === 0) {
    attempts.push({ backend: preference, message: 'no search backend configured' })
  }

  for (const backend of ordered) {
    if (rank >= desiredCount) return
    let hits: SearchHit[]
    try {
      hits = await backend.search(query, desiredCount)
    } catch (error) {
      const message = getErrorMessage(error)
      attempts.push({ backend: backend.name, message })
      log?.debug(`${backend.name} failed: ${message}`)
      continue
    }
    if (hits.length === 0) {
      attempts.push({ backend: backend.name, message: 'no results' })
      log?.debug(`${backend.name} returned no results`)
      continue
    }
    log?.debug(`${backend.name} returned ${hits.length} results`)

    for (const hit of hits) {
      if (!isHttpUrl(hit.url)) continue
      const key = normalizeUrl(hit.url)
      if (seen.has(key)) continue
      seen.add(key)
      rank += 1
      yield { url: hit.url, title: hit.title, rank }
      if (rank >= desiredCount) return
    }
  }

  if (rank === 0) throw new SearchError({ query, attempts })
}

export async function planSources(options: PlanSourcesOptions): Promise<SourceRef[]> {
  const sources: SourceRef[] = []
  for await (const source of iterateSources(options)) {
    sources.push(source)
  }
  return sources
}

import { MAX_DEPTH, MIN_DEPTH } from '../flags.js'

export const DEFAULT_DEPTH = 3
export const DEFAULT_MAX_CHUNK_CHARACTERS = 6000
export const DEFAULT_CONCURRENCY = 3
export const MIN_PAGE_REMAINDER = 200

export type ResearchBudgets = {
  depth: number
  perSourceBudget: number
  totalBudget: number
  maxPages: number
  desiredCount: number
  maxChunkSize: number
}

export function clampDepth(depth: number): number {
  if (!Number.isFinite(depth)) return DEFAULT_DEPTH
  return Math.min(MAX_DEPTH, Math.max(MIN_DEPTH, Math.trunc(depth)))
}

/**
 * Each depth level adds 3000 characters per source and 15000 to the corpus. Search asks for
 * about twice as many candidates as the corpus keeps.
 */
export function resolveResearchBudgets({
  depth,
  maxPages,
  maxChunkSize = DEFAULT_MAX_CHUNK_CHARACTERS,
}: {
  depth: number
  maxPages?: number | null
  maxChunkSize?: number
}): ResearchBudgets {
  const level = clampDepth(depth)
  const pages = typeof maxPages === 'number' && maxPages > 0 ? Math.trunc(maxPages) : level + 2
  return {
    depth: level,
    perSourceBudget: 3000 + 3000 * level,
    totalBudget: 15_000 * level,
    maxPages: pages,
    desiredCount: Math.max(2 * level + 1, pages),
    maxChunkSize,
  }
}

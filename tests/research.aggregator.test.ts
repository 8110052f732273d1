import { describe, expect, it } from 'vitest'

import { aggregateSources } from '../src/research/aggregator.js'
import { FetchError } from '../src/research/errors.js'
import { fakeFetcher, prose, silentLogger, source } from './helpers/research.js'

const budgets = { perSourceBudget: 6_000, totalBudget: 15_000, maxPages: 5 }

describe('aggregateSources', () => {
  it('orders the corpus by rank whatever order fetches complete in', async () => {
    const sources = [1, 2, 3, 4].map((rank) => source(rank))
    const fetcher = fakeFetcher(
      Object.fromEntries(
        sources.map((ref) => [
          ref.url,
          { text: prose(400, `page${ref.rank}`), delayMs: (5 - ref.rank) * 10 },
        ])
      )
    )

    const corpus = await aggregateSources({
      sources: [...sources].reverse(),
      fetcher,
      ...budgets,
      concurrency: 4,
      logger: silentLogger(),
    })

    expect(corpus.pages.map((page) => page.source.rank)).toEqual([1, 2, 3, 4])
    expect(corpus.totalCharacters).toBe(1_600)
    expect(corpus.skipped).toEqual([])
  })

  it('builds a corpus from the one source that survives four failures', async () => {
    const sources = [1, 2, 3, 4, 5].map((rank) => source(rank))
    const fetcher = fakeFetcher({
      [sources[0]?.url ?? '']: new FetchError({
        reason: 'BLOCKED',
        url: 'https://site1.example/page',
        message: 'HTTP 403',
      }),
      [sources[1]?.url ?? '']: new FetchError({
        reason: 'TIMEOUT',
        url: 'https://site2.example/page',
        message: 'timed out',
      }),
      [sources[2]?.url ?? '']: new Error('socket hang up'),
      [sources[3]?.url ?? '']: new FetchError({
        reason: 'PARSE_FAILURE',
        url: 'https://site4.example/page',
        message: 'no content',
      }),
      [sources[4]?.url ?? '']: { text: prose(500, 'survivor') },
    })

    const corpus = await aggregateSources({ sources, fetcher, ...budgets })

    expect(corpus.pages.map((page) => page.source.rank)).toEqual([5])
    expect(corpus.skipped.map((skipped) => [skipped.source.rank, skipped.reason])).toEqual([
      [1, 'fetch-failed'],
      [2, 'fetch-failed'],
      [3, 'fetch-failed'],
      [4, 'fetch-failed'],
    ])
    expect(corpus.skipped[0]?.detail).toBe('BLOCKED: HTTP 403')
    expect(corpus.skipped[2]?.detail).toBe('socket hang up')
  })

  it('skips repeated URLs without fetching them twice', async () => {
    const first = source(1, 'https://www.example.com/guide/')
    const again = source(2, 'http://example.com/guide?utm_source=feed')
    const fetcher = fakeFetcher({ [first.url]: { text: prose(400) } })

    const corpus = await aggregateSources({ sources: [first, again], fetcher, ...budgets })

    expect(fetcher.calls).toEqual(['https://www.example.com/guide/'])
    expect(corpus.pages).toHaveLength(1)
    expect(corpus.skipped).toEqual([
      { source: again, reason: 'duplicate', detail: 'same URL as https://www.example.com/guide/' },
    ])
  })

  it('drops a mirror with the same title and opening text', async () => {
    const original = source(1, 'https://one.example/a')
    const mirror = source(2, 'https://two.example/b')
    const text = prose(600, 'mirror')
    const fetcher = fakeFetcher({
      [original.url]: { text, title: 'Shared Title' },
      [mirror.url]: { text: `${text.toUpperCase()} extra`, title: 'shared  title!' },
    })

    const corpus = await aggregateSources({ sources: [original, mirror], fetcher, ...budgets })

    expect(corpus.pages.map((page) => page.source.url)).toEqual(['https://one.example/a'])
    expect(corpus.skipped[0]?.reason).toBe('duplicate')
    expect(corpus.skipped[0]?.detail).toBe('same content as https://one.example/a')
  })

  it('stops at the total budget and truncates the page that crosses it', async () => {
    const sources = [1, 2, 3].map((rank) => source(rank))
    const fetcher = fakeFetcher(
      Object.fromEntries(
        sources.map((ref) => [ref.url, { text: prose(600, `budget${ref.rank}`) }])
      )
    )

    const corpus = await aggregateSources({
      sources,
      fetcher,
      perSourceBudget: 1_000,
      totalBudget: 1_000,
      maxPages: 5,
      concurrency: 1,
    })

    expect(corpus.pages).toHaveLength(2)
    expect(corpus.pages[0]?.text.length).toBe(600)
    expect(corpus.pages[1]?.text.length).toBeLessThanOrEqual(400)
    expect(corpus.totalCharacters).toBeLessThanOrEqual(1_000)
    expect(corpus.skipped.map((skipped) => [skipped.source.rank, skipped.reason])).toEqual([
      [3, 'budget'],
    ])
  })

  it('stops at the page limit', async () => {
    const sources = [1, 2, 3].map((rank) => source(rank))
    const fetcher = fakeFetcher(
      Object.fromEntries(sources.map((ref) => [ref.url, { text: prose(300, `limit${ref.rank}`) }]))
    )

    const corpus = await aggregateSources({ sources, fetcher, ...budgets, maxPages: 2 })

    expect(corpus.pages.map((page) => page.source.rank)).toEqual([1, 2])
    expect(corpus.skipped).toEqual([
      { source: sources[2], reason: 'max-pages', detail: 'page limit of 2 reached' },
    ])
  })

  it('records pages with no text as empty', async () => {
    const blank = source(1)
    const fetcher = fakeFetcher({ [blank.url]: { text: '   ' } })
    const corpus = await aggregateSources({ sources: [blank], fetcher, ...budgets })
    expect(corpus.pages).toEqual([])
    expect(corpus.skipped[0]?.reason).toBe('empty')
  })
})

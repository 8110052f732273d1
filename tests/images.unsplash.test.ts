import { describe, expect, it } from 'vitest'

import { createUnsplashSearch, parseUnsplashResponse } from '../src/images/unsplash.js'
import { jsonResponse, routeFetch } from './helpers/fetch.js'

const PAYLOAD = {
  results: [
    {
      id: 'p1',
      alt_description: 'a mountain lake at dawn',
      urls: { regular: 'https://images.example/p1.jpg' },
      user: {
        name: 'Jo Doe',
        username: 'jodoe',
        links: { html: 'https://unsplash.com/@jodoe' },
      },
    },
    {
      id: 'p2',
      urls: { full: 'https://images.example/p2.jpg' },
      user: { username: 'sam' },
    },
    { id: 'p3', urls: {}, user: {} },
  ],
}

describe('parseUnsplashResponse', () => {
  it('maps photos with attribution links', () => {
    expect(parseUnsplashResponse(PAYLOAD, 'lake')).toEqual([
      {
        id: 'p1',
        url: 'https://images.example/p1.jpg',
        altText: 'a mountain lake at dawn',
        attribution: {
          name: 'Jo Doe',
          profileUrl: 'https://unsplash.com/@jodoe?utm_source=docsmith&utm_medium=referral',
          site: {
            name: 'Unsplash',
            url: 'https://unsplash.com/?utm_source=docsmith&utm_medium=referral',
          },
        },
      },
      {
        id: 'p2',
        url: 'https://images.example/p2.jpg',
        altText: 'lake',
        attribution: {
          name: 'sam',
          profileUrl: 'https://unsplash.com/@sam?utm_source=docsmith&utm_medium=referral',
          site: {
            name: 'Unsplash',
            url: 'https://unsplash.com/?utm_source=docsmith&utm_medium=referral',
          },
        },
      },
    ])
  })
})

describe('sized photos', () => {
  it('asks for the width on the raw URL and keeps the default size without one', () => {
    const payload = {
      results: [
        {
          id: 'r1',
          urls: {
            raw: 'https://images.example/r1?ixid=abc',
            regular: 'https://images.example/r1-regular.jpg',
          },
          user: { username: 'kim' },
        },
        { id: 'r2', urls: { regular: 'https://images.example/r2.jpg' }, user: {} },
      ],
    }

    const images = parseUnsplashResponse(payload, 'lake', 800)

    expect(images.map(({ url, width }) => ({ url, width }))).toEqual([
      { url: 'https://images.example/r1?ixid=abc&w=800', width: 800 },
      { url: 'https://images.example/r2.jpg', width: undefined },
    ])
    expect(parseUnsplashResponse(payload, 'lake')[0]?.url).toBe(
      'https://images.example/r1-regular.jpg'
    )
  })
})

describe('Unsplash search', () => {
  it('authenticates with the access key and trims to the count', async () => {
    const seen: (string | null)[] = []
    const { fetch, calls } = routeFetch((_url, init) => {
      seen.push(new Headers(init?.headers).get('authorization'))
      return jsonResponse(PAYLOAD)
    })
    const search = createUnsplashSearch({
      accessKey: 'test-key',
      fetchImpl: fetch,
      timeoutMs: 1000,
    })

    const images = await search.search('lake', 1)

    expect(images.map((image) => image.id)).toEqual(['p1'])
    expect(seen).toEqual(['Client-ID test-key'])
    expect(calls).toEqual([
      'https://api.unsplash.com/search/photos?query=lake&per_page=1&orientation=landscape',
    ])
  })

  it('fails on an HTTP error', async () => {
    const { fetch } = routeFetch(() => jsonResponse({ errors: ['nope'] }, 401))
    const search = createUnsplashSearch({
      accessKey: 'test-key',
      fetchImpl: fetch,
      timeoutMs: 1000,
    })
    await expect(search.search('lake', 2)).rejects.toThrow('Unsplash search failed (401)')
  })
})

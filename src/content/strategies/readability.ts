import { Readability } from '@mozilla/readability'
import { load } from 'cheerio'
import { JSDOM, VirtualConsole } from 'jsdom'

import { FetchError } from '../../research/errors.js'
import { extractLinks, extractTitle, htmlToStructuredText } from '../html-text.js'
import type { ExtractedContent, ExtractionStrategy } from './types.js'

export function extractReadabilityFromHtml(html: string, url: string): ExtractedContent | null {
  // jsdom reports stylesheet parse noise through the console; keep it quiet.
  const dom = new JSDOM(html, { url, virtualConsole: new VirtualConsole() })
  try {
    const article = new Readability(dom.window.document).parse()
    const content = article?.content ?? ''
    if (!content) return null
    const $ = load(content)
    const original = load(html)
    return {
      text: htmlToStructuredText($, 'body'),
      title: article?.title?.trim() || extractTitle(original),
      links: extractLinks(original, url),
    }
  } finally {
    dom.window.close()
  }
}

export const readabilityStrategy: ExtractionStrategy = {
  method: 'readability',
  extract: async ({ loadHtml }) => {
    const { html, finalUrl } = await loadHtml()
    const extracted = extractReadabilityFromHtml(html, finalUrl)
    if (!extracted) {
      throw new FetchError({
        reason: 'PARSE_FAILURE',
        url: finalUrl,
        message: `Readability found no article in ${finalUrl}`,
      })
    }
    return extracted
  },
}

import { extractStaticContent } from '../html-text.js'
import type { ExtractionStrategy } from './types.js'

export const staticStrategy: ExtractionStrategy = {
  method: 'static',
  extract: async ({ loadHtml }) => {
    const { html, finalUrl } = await loadHtml()
    return extractStaticContent(html, finalUrl)
  },
}

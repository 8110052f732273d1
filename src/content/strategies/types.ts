import type { ExtractionMethod } from '../../research/types.js'
import type { LoadedHtml } from '../fetch-html.js'

export type ExtractedContent = {
  text: string
  title: string | null
  links: string[]
}

export type ExtractionContext = {
  url: string
  /** Memoized per fetch: strategies sharing the HTML download it once. */
  loadHtml: () => Promise<LoadedHtml>
  fetchImpl: typeof fetch
  timeoutMs: number
}

export type ExtractionStrategy = {
  method: ExtractionMethod
  extract: (context: ExtractionContext) => Promise<ExtractedContent>
}

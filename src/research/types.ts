import type { SynthesisMode, Tone } from '../flags.js'

export type SourceRef = {
  readonly url: string
  readonly title: string
  /** 1-based relevance order from search. */
  readonly rank: number
}

export type ExtractionMethod = 'render' | 'readability' | 'static' | 'stored'

export type RawPage = {
  readonly source: SourceRef
  readonly text: string
  readonly title: string
  readonly fetchedAt: Date
  readonly extractionMethod: ExtractionMethod
  readonly links: readonly string[]
}

export type SkipReason = 'duplicate' | 'budget' | 'max-pages' | 'fetch-failed' | 'empty'

export type SkippedSource = {
  readonly source: SourceRef
  readonly reason: SkipReason
  readonly detail: string
}

/** Character range of one page's block inside the corpus text. */
export type PageSpan = {
  readonly source: SourceRef
  readonly start: number
  readonly end: number
}

export type Corpus = {
  readonly pages: readonly RawPage[]
  readonly skipped: readonly SkippedSource[]
  readonly totalCharacters: number
  readonly budget: number
}

export type Chunk = {
  readonly index: number
  readonly text: string
  readonly sources: readonly SourceRef[]
}

export type SynthesizedSection = {
  readonly chunkIndex: number
  readonly text: string
}

export type ImageDescriptor = {
  readonly id: string
  readonly url: string
  readonly altText: string
  /** Pixel width the URL was sized to, when one was requested. */
  readonly width?: number
  readonly attribution: {
    readonly name: string
    readonly profileUrl: string
    /** Where the image is hosted, for the credit line. */
    readonly site: { readonly name: string; readonly url: string }
  }
}

export type PlacedImage = {
  /** Index of the section the image follows. */
  readonly position: number
  readonly image: ImageDescriptor
}

export type TocEntry = {
  readonly title: string
  readonly anchor: string
  readonly level: number
}

export type Reference = {
  readonly number: number
  readonly source: SourceRef
}

export type Document = {
  readonly title: string
  readonly topic: string
  readonly mode: SynthesisMode
  readonly tone: Tone
  readonly sections: readonly SynthesizedSection[]
  readonly tableOfContents: readonly TocEntry[]
  readonly references: readonly Reference[]
  readonly images: readonly PlacedImage[]
  readonly imageCredits: readonly string[]
}

export type PipelineStage =
  | 'planning'
  | 'aggregating'
  | 'chunking'
  | 'synthesizing'
  | 'image-placement'
  | 'done'
  | 'failed'

export type PipelineWarning = {
  readonly stage: PipelineStage
  readonly message: string
}

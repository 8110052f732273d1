export type { DocsmithConfig } from './config.js'
export { loadDocsmithConfig, parseDocsmithConfig } from './config.js'
export type { OutputFormat, SearchPreference, SynthesisMode, Tone } from './flags.js'
export { createUnsplashSearch } from './images/unsplash.js'
export type { ImageSearch } from './images/types.js'
export { ProviderError } from './llm/errors.js'
export { generateTextWithModelId } from './llm/generate-text.js'
export type { TextGenerator } from './llm/text-generator.js'
export { createTextGenerator } from './llm/text-generator.js'
export { buildExtractionStrategies, createSourceFetcher } from './content/source-fetcher.js'
export { aggregateSources } from './research/aggregator.js'
export { resolveResearchBudgets } from './research/budgets.js'
export { chunkCorpus, splitText } from './research/chunker.js'
export {
  FetchError,
  PipelineError,
  SearchError,
  SynthesisError,
} from './research/errors.js'
export { placeImages } from './research/image-placer.js'
export type {
  PipelineDeps,
  PipelineReport,
  ResearchRequest,
  SynthesisDeps,
} from './research/pipeline.js'
export { runCorpusPipeline, runResearchPipeline } from './research/pipeline.js'
export { renderDocument, serializeDocument } from './research/render.js'
export { synthesizeDocument } from './research/synthesizer.js'
export type * from './research/types.js'
export { createBraveBackend } from './search/brave.js'
export { createDuckDuckGoBackend } from './search/duckduckgo.js'
export { planSources } from './search/planner.js'
export { runCli } from './run/runner.js'

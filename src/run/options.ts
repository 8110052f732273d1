import type { OptionValues } from 'commander'

import {
  type OutputFormat,
  type SearchPreference,
  type SynthesisMode,
  type Tone,
  parseCrawlDepth,
  parseDepth,
  parseDurationMs,
  parseImageCount,
  parseImageWidth,
  parseMaxPages,
  parseOutputFormat,
  parseSearchPreference,
  resolveSynthesisMode,
} from '../flags.js'
import type { ImageRequest } from '../research/pipeline.js'

export type ModelFlags = {
  model: string | null
  timeoutMs: number
  json: boolean
  debug: boolean
}

export type DocumentFlags = {
  mode: SynthesisMode
  tone: Tone
  image: ImageRequest | null
  format: OutputFormat
  write: boolean
  output: string | null
}

export type ResearchFlags = ModelFlags &
  DocumentFlags & {
    depth: number | null
    maxPages: number | null
    searchEngine: SearchPreference | null
    fallbackOnly: boolean
  }

export type GenerateFlags = ModelFlags &
  DocumentFlags & {
    depth: number | null
    maxPages: number | null
  }

export type ScrapeFlags = {
  topic: string
  depth: number | null
  maxPages: number | null
  fallbackOnly: boolean
  timeoutMs: number
  json: boolean
  debug: boolean
}

function readString(opts: OptionValues, key: string): string | null {
  const value: unknown = opts[key]
  if (typeof value !== 'string') return null
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : null
}

function readBoolean(opts: OptionValues, key: string): boolean {
  return opts[key] === true
}

function readParsed<T>(opts: OptionValues, key: string, parse: (raw: string) => T): T | null {
  const raw = readString(opts, key)
  return raw === null ? null : parse(raw)
}

export function readModelFlags(opts: OptionValues): ModelFlags {
  return {
    model: readString(opts, 'model'),
    timeoutMs: parseDurationMs(readString(opts, 'timeout') ?? '60s'),
    json: readBoolean(opts, 'json'),
    debug: readBoolean(opts, 'debug'),
  }
}

export function readDocumentFlags(opts: OptionValues): DocumentFlags {
  const mode = resolveSynthesisMode({
    summarize: readBoolean(opts, 'summarize'),
    snippet: readBoolean(opts, 'snippet'),
    raw: readBoolean(opts, 'raw'),
  })
  const imageQuery = readString(opts, 'image')
  const imageCount = readParsed(opts, 'imageCount', parseImageCount) ?? 3
  const imageWidth = readParsed(opts, 'imageWidth', parseImageWidth)
  const output = readString(opts, 'output')
  return {
    mode,
    tone: readBoolean(opts, 'professional') ? 'professional' : 'default',
    image: imageQuery ? { query: imageQuery, count: imageCount, width: imageWidth } : null,
    format: parseOutputFormat(readString(opts, 'format') ?? 'md'),
    write: readBoolean(opts, 'write') || output !== null,
    output,
  }
}

export function readResearchFlags(opts: OptionValues): ResearchFlags {
  return {
    ...readModelFlags(opts),
    ...readDocumentFlags(opts),
    depth: readParsed(opts, 'depth', parseDepth),
    maxPages: readParsed(opts, 'maxPages', parseMaxPages),
    searchEngine: readParsed(opts, 'searchEngine', parseSearchPreference),
    fallbackOnly: readBoolean(opts, 'fallbackOnly'),
  }
}

export function readGenerateFlags(opts: OptionValues): GenerateFlags {
  return {
    ...readModelFlags(opts),
    ...readDocumentFlags(opts),
    depth: readParsed(opts, 'depth', parseDepth),
    maxPages: readParsed(opts, 'maxPages', parseMaxPages),
  }
}

export function readScrapeFlags(opts: OptionValues): ScrapeFlags {
  const topic = readString(opts, 'topic')
  if (!topic) throw new Error('Missing --topic')
  return {
    topic,
    depth: readParsed(opts, 'depth', parseCrawlDepth),
    maxPages: readParsed(opts, 'maxPages', parseMaxPages),
    fallbackOnly: readBoolean(opts, 'fallbackOnly'),
    timeoutMs: parseDurationMs(readString(opts, 'timeout') ?? '20s'),
    json: readBoolean(opts, 'json'),
    debug: readBoolean(opts, 'debug'),
  }
}

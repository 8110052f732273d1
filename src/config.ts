import { readFileSync } from 'node:fs'
import { join } from 'node:path'

import JSON5 from 'json5'

import { MAX_DEPTH, MIN_DEPTH, type SearchPreference } from './flags.js'
import { LLM_PROVIDERS, type LlmProvider } from './llm/model-id.js'
import { isRecord } from './shared/guards.js'

export type ProviderConfig = {
  /**
   * Override the provider's API base URL (a proxy or a self-hosted gateway).
   */
  baseUrl?: string
}

export type SearchConfig = {
  engine?: SearchPreference
  braveApiKey?: string
}

export type ResearchConfig = {
  depth?: number
  /**
   * Upper bound for one synthesis chunk, in characters. Default: 6000.
   */
  maxChunkCharacters?: number
  concurrency?: number
}

export type OutputConfig = {
  /**
   * Base directory for written documents and scraped stores. Default: ~/.docsmith/files.
   */
  dir?: string
}

export type LoggingLevel = 'debug' | 'info' | 'warn' | 'error'
export type LoggingFormat = 'json' | 'pretty'
export type LoggingConfig = {
  enabled?: boolean
  level?: LoggingLevel
  format?: LoggingFormat
  file?: string
  maxMb?: number
}

export type DocsmithConfig = {
  model?: string
  providers?: Partial<Record<LlmProvider, ProviderConfig>>
  search?: SearchConfig
  research?: ResearchConfig
  output?: OutputConfig
  logging?: LoggingConfig
}

function parseOptionalString(raw: unknown, path: string, label: string): string | undefined {
  if (typeof raw === 'undefined') return undefined
  if (typeof raw !== 'string') {
    throw new Error(`Invalid config file ${path}: "${label}" must be a string.`)
  }
  const value = raw.trim()
  return value.length > 0 ? value : undefined
}

function parseOptionalInteger(
  raw: unknown,
  path: string,
  label: string,
  { min, max }: { min: number; max: number }
): number | undefined {
  if (typeof raw === 'undefined') return undefined
  if (typeof raw !== 'number' || !Number.isInteger(raw) || raw < min || raw > max) {
    throw new Error(`Invalid config file ${path}: "${label}" must be an integer in ${min}-${max}.`)
  }
  return raw
}

function parseSection(raw: unknown, path: string, label: string): Record<string, unknown> | null {
  if (typeof raw === 'undefined') return null
  if (!isRecord(raw)) {
    throw new Error(`Invalid config file ${path}: "${label}" must be an object.`)
  }
  return raw
}

function parseProviders(raw: unknown, path: string): DocsmithConfig['providers'] {
  const section = parseSection(raw, path, 'providers')
  if (!section) return undefined
  const providers: Partial<Record<LlmProvider, ProviderConfig>> = {}
  for (const [key, value] of Object.entries(section)) {
    const provider = LLM_PROVIDERS.find((name) => name === key)
    if (!provider) {
      throw new Error(`Invalid config file ${path}: unknown provider "${key}".`)
    }
    const entry = parseSection(value, path, `providers.${key}`)
    if (!entry) continue
    const baseUrl = parseOptionalString(entry.baseUrl, path, `providers.${key}.baseUrl`)
    providers[provider] = typeof baseUrl === 'string' ? { baseUrl } : {}
  }
  return providers
}

function parseSearch(raw: unknown, path: string): SearchConfig | undefined {
  const section = parseSection(raw, path, 'search')
  if (!section) return undefined
  const engine = section.engine
  if (
    typeof engine !== 'undefined' &&
    engine !== 'auto' &&
    engine !== 'duckduckgo' &&
    engine !== 'brave'
  ) {
    throw new Error(
      `Invalid config file ${path}: "search.engine" must be one of auto, duckduckgo, brave.`
    )
  }
  const braveApiKey = parseOptionalString(section.braveApiKey, path, 'search.braveApiKey')
  return {
    ...(engine ? { engine } : {}),
    ...(braveApiKey ? { braveApiKey } : {}),
  }
}

function parseResearch(raw: unknown, path: string): ResearchConfig | undefined {
  const section = parseSection(raw, path, 'research')
  if (!section) return undefined
  const depth = parseOptionalInteger(section.depth, path, 'research.depth', {
    min: MIN_DEPTH,
    max: MAX_DEPTH,
  })
  const maxChunkCharacters = parseOptionalInteger(
    section.maxChunkCharacters,
    path,
    'research.maxChunkCharacters',
    { min: 500, max: 200_000 }
  )
  const concurrency = parseOptionalInteger(section.concurrency, path, 'research.concurrency', {
    min: 1,
    max: 16,
  })
  return {
    ...(typeof depth === 'number' ? { depth } : {}),
    ...(typeof maxChunkCharacters === 'number' ? { maxChunkCharacters } : {}),
    ...(typeof concurrency === 'number' ? { concurrency } : {}),
  }
}

function parseLogging(raw: unknown, path: string): LoggingConfig | undefined {
  const section = parseSection(raw, path, 'logging')
  if (!section) return undefined
  const logging: LoggingConfig = {}
  if (typeof section.enabled !== 'undefined') {
    if (typeof section.enabled !== 'boolean') {
      throw new Error(`Invalid config file ${path}: "logging.enabled" must be a boolean.`)
    }
    logging.enabled = section.enabled
  }
  const level = section.level
  if (typeof level !== 'undefined') {
    if (level !== 'debug' && level !== 'info' && level !== 'warn' && level !== 'error') {
      throw new Error(
        `Invalid config file ${path}: "logging.level" must be one of debug, info, warn, error.`
      )
    }
    logging.level = level
  }
  const format = section.format
  if (typeof format !== 'undefined') {
    if (format !== 'json' && format !== 'pretty') {
      throw new Error(`Invalid config file ${path}: "logging.format" must be json or pretty.`)
    }
    logging.format = format
  }
  const file = parseOptionalString(section.file, path, 'logging.file')
  if (file) logging.file = file
  if (typeof section.maxMb !== 'undefined') {
    if (typeof section.maxMb !== 'number' || !(section.maxMb > 0)) {
      throw new Error(`Invalid config file ${path}: "logging.maxMb" must be a positive number.`)
    }
    logging.maxMb = section.maxMb
  }
  return logging
}

export function resolveConfigPath(env: Record<string, string | undefined>): string | null {
  const home = env.HOME?.trim() || env.USERPROFILE?.trim() || null
  if (!home) return null
  return join(home, '.docsmith', 'config.json')
}

export function parseDocsmithConfig(raw: string, path: string): DocsmithConfig {
  let parsed: unknown
  try {
    parsed = JSON5.parse(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Invalid JSON in config file ${path}: ${message}`)
  }

  if (!isRecord(parsed)) {
    throw new Error(`Invalid config file ${path}: expected an object at the top level`)
  }

  const model = parseOptionalString(parsed.model, path, 'model')
  const providers = parseProviders(parsed.providers, path)
  const search = parseSearch(parsed.search, path)
  const research = parseResearch(parsed.research, path)
  const outputSection = parseSection(parsed.output, path, 'output')
  const outputDir = outputSection
    ? parseOptionalString(outputSection.dir, path, 'output.dir')
    : undefined
  const logging = parseLogging(parsed.logging, path)

  return {
    ...(model ? { model } : {}),
    ...(providers ? { providers } : {}),
    ...(search ? { search } : {}),
    ...(research ? { research } : {}),
    ...(outputDir ? { output: { dir: outputDir } } : {}),
    ...(logging ? { logging } : {}),
  }
}

export function loadDocsmithConfig({ env }: { env: Record<string, string | undefined> }): {
  config: DocsmithConfig | null
  path: string | null
} {
  const path = resolveConfigPath(env)
  if (!path) return { config: null, path: null }

  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch {
    return { config: null, path }
  }

  return { config: parseDocsmithConfig(raw, path), path }
}

import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { describe, expect, it } from 'vitest'

import { loadDocsmithConfig, parseDocsmithConfig } from '../src/config.js'

const PATH = '/home/test/.docsmith/config.json'

describe('parseDocsmithConfig', () => {
  it('accepts comments and trailing commas', () => {
    const config = parseDocsmithConfig(
      `{
        // default model
        model: 'anthropic/claude-sonnet-4-5',
        providers: { ollama: { baseUrl: 'http://gpu-box:11434/v1' }, },
        search: { engine: 'brave', braveApiKey: 'test-key' },
        research: { depth: 4, maxChunkCharacters: 8000, concurrency: 2 },
        output: { dir: '~/docs' },
        logging: { enabled: true, level: 'debug', format: 'json', maxMb: 5 },
      }`,
      PATH
    )
    expect(config).toEqual({
      model: 'anthropic/claude-sonnet-4-5',
      providers: { ollama: { baseUrl: 'http://gpu-box:11434/v1' } },
      search: { engine: 'brave', braveApiKey: 'test-key' },
      research: { depth: 4, maxChunkCharacters: 8000, concurrency: 2 },
      output: { dir: '~/docs' },
      logging: { enabled: true, level: 'debug', format: 'json', maxMb: 5 },
    })
  })

  it('drops blank strings', () => {
    expect(parseDocsmithConfig('{ model: "  ", output: { dir: "" } }', PATH)).toEqual({})
  })

  it('names the file and the field on bad input', () => {
    expect(() => parseDocsmithConfig('{ model: ', PATH)).toThrow(
      `Invalid JSON in config file ${PATH}`
    )
    expect(() => parseDocsmithConfig('[]', PATH)).toThrow(
      `Invalid config file ${PATH}: expected an object at the top level`
    )
    expect(() => parseDocsmithConfig('{ research: { depth: 11 } }', PATH)).toThrow(
      `Invalid config file ${PATH}: "research.depth" must be an integer in 1-10.`
    )
    expect(() => parseDocsmithConfig('{ search: { engine: "bing" } }', PATH)).toThrow(
      `Invalid config file ${PATH}: "search.engine" must be one of auto, duckduckgo, brave.`
    )
    expect(() => parseDocsmithConfig('{ providers: { acme: {} } }', PATH)).toThrow(
      `Invalid config file ${PATH}: unknown provider "acme".`
    )
    expect(() => parseDocsmithConfig('{ logging: { level: "loud" } }', PATH)).toThrow(
      `Invalid config file ${PATH}: "logging.level" must be one of debug, info, warn, error.`
    )
  })
})

describe('loadDocsmithConfig', () => {
  it('reads ~/.docsmith/config.json', () => {
    const home = mkdtempSync(join(tmpdir(), 'docsmith-config-'))
    mkdirSync(join(home, '.docsmith'))
    writeFileSync(join(home, '.docsmith', 'config.json'), '{ model: "openai/gpt-4o" }')

    expect(loadDocsmithConfig({ env: { HOME: home } })).toEqual({
      config: { model: 'openai/gpt-4o' },
      path: join(home, '.docsmith', 'config.json'),
    })
  })

  it('treats a missing file as no config', () => {
    const home = mkdtempSync(join(tmpdir(), 'docsmith-config-'))
    expect(loadDocsmithConfig({ env: { HOME: home } }).config).toBeNull()
    expect(loadDocsmithConfig({ env: {} })).toEqual({ config: null, path: null })
  })
})

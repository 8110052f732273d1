import { mkdtempSync, readFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { CommanderError } from 'commander'
import { beforeEach, describe, expect, it, vi } from 'vitest'

import { formatCliFailure, runCli } from '../src/run/runner.js'
import { htmlResponse, routeFetch } from './helpers/fetch.js'
import { collectStream } from './helpers/research.js'

const mocks = vi.hoisted(() => ({ generateText: vi.fn() }))

vi.mock('ai', async (importOriginal) => {
  const actual = await importOriginal<typeof import('ai')>()
  return { ...actual, generateText: mocks.generateText }
})

const ARTICLE_URL = 'https://example.com/article'

const REDIRECT = `//duckduckgo.com/l/?uddg=${encodeURIComponent(ARTICLE_URL)}`

const SEARCH_HTML = `<div class="result">
  <a class="result__a" href="${REDIRECT}">Example Article</a>
</div>`

const ARTICLE_HTML = `<!doctype html>
<html><head><title>Example Article</title></head>
<body><article>
<h2>Overview</h2>
<p>${'The test topic has a long history of careful study by many people. '.repeat(6)}</p>
<p>${'Later work refined the early results and added new measurements. '.repeat(6)}</p>
</article></body></html>`

const SECTION = '## Overview\nThe test topic is covered here [1].'

function setup({
  searchHtml = SEARCH_HTML,
  home = mkdtempSync(join(tmpdir(), 'docsmith-cli-')),
}: { searchHtml?: string; home?: string } = {}) {
  const stdout = collectStream()
  const stderr = collectStream()
  const web = routeFetch((url) => {
    if (url.startsWith('https://html.duckduckgo.com/html/')) return htmlResponse(searchHtml)
    if (url === ARTICLE_URL) return htmlResponse(ARTICLE_HTML)
    return htmlResponse('not found', 404)
  })
  const run = (argv: string[]) =>
    runCli(argv, {
      env: { HOME: home, OPENAI_API_KEY: 'test-key' },
      fetch: web.fetch,
      stdout: stdout.stream,
      stderr: stderr.stream,
      cwd: home,
    })
  return { home, stdout, stderr, web, run }
}

describe('docsmith research', () => {
  beforeEach(() => {
    mocks.generateText.mockReset()
    mocks.generateText.mockResolvedValue({
      text: SECTION,
      usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
    })
  })

  it('prints a cited markdown document', async () => {
    const { stdout, stderr, web, run } = setup()

    await run(['research', 'test', 'topic', '--depth', '1'])

    expect(stdout.getText()).toBe(
      [
        '# Test Topic',
        '',
        '## Overview',
        'The test topic is covered here [1].',
        '',
        '## References',
        '',
        `1. [Example Article](${ARTICLE_URL})`,
        '',
      ].join('\n')
    )
    expect(stderr.getText()).toBe('')
    expect(web.calls).toEqual(['https://html.duckduckgo.com/html/?q=test%20topic', ARTICLE_URL])
    expect(mocks.generateText).toHaveBeenCalledTimes(1)
    expect(mocks.generateText).toHaveBeenCalledWith(
      expect.objectContaining({
        system: expect.stringContaining('meticulous research writer'),
        prompt: expect.stringContaining('This is part 1 of 1'),
      })
    )
  })

  it('writes the document under the data directory with --write', async () => {
    const { home, stdout, run } = setup()
    const expected = join(home, '.docsmith', 'files', 'docs', 'research', 'test_topic.md')

    await run(['research', 'test', 'topic', '--depth', '1', '--write'])

    expect(stdout.getText()).toBe(`Wrote ${expected}\n`)
    expect(readFileSync(expected, 'utf8').startsWith('# Test Topic\n')).toBe(true)
  })

  it('reports sources and usage with --json', async () => {
    const { stdout, run } = setup()

    await run(['research', 'test', 'topic', '--depth', '1', '--json'])

    const payload: unknown = JSON.parse(stdout.getText())
    expect(payload).toMatchObject({
      document: {
        title: 'Test Topic',
        references: [{ number: 1, title: 'Example Article', url: ARTICLE_URL }],
      },
      warnings: [],
      sources: { used: 1, skipped: [] },
      chunks: 1,
      usage: { calls: 1, promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    })
  })

  it('stops in planning with a hint when search finds nothing', async () => {
    const { run } = setup({ searchHtml: '<p>No results.</p>' })

    const error = await run(['research', 'test', 'topic']).catch((caught: unknown) => caught)

    expect(formatCliFailure(error)).toBe(
      [
        'Error (planning): No search results for "test topic" ' +
          '(duckduckgo: no results; brave: BRAVE_SEARCH_API_KEY is not set)',
        'Hint: Try a different --search-engine, or rephrase the query.',
      ].join('\n')
    )
    expect(mocks.generateText).not.toHaveBeenCalled()
  })

  it('rejects conflicting mode flags before any work', async () => {
    const { web, run } = setup()
    await expect(run(['research', 'test', '--summarize', '--snippet'])).rejects.toThrow(
      '--summarize and --snippet cannot be combined'
    )
    expect(web.calls).toEqual([])
  })

  it('rejects an unknown model provider before searching', async () => {
    const { web, run } = setup()
    await expect(run(['research', 'test', '--model', 'foo/bar'])).rejects.toThrow(
      'Unsupported provider "foo"'
    )
    expect(web.calls).toEqual([])
    expect(mocks.generateText).not.toHaveBeenCalled()
  })
})

describe('docsmith scrape and generate', () => {
  beforeEach(() => {
    mocks.generateText.mockReset()
    mocks.generateText.mockResolvedValue({
      text: SECTION,
      usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
    })
  })

  it('stores pages under a topic and writes a document from them', async () => {
    const { home, stdout, run } = setup()
    const storePath = join(home, '.docsmith', 'files', 'scrape', 'demo.json')

    await run(['scrape', ARTICLE_URL, '--topic', 'demo', '--fallback-only'])
    expect(stdout.getText()).toBe(`Scraped 1 page (1 new, 0 updated) into ${storePath}\n`)

    const stored: unknown = JSON.parse(readFileSync(storePath, 'utf8'))
    expect(stored).toMatchObject({
      version: 1,
      topic: 'demo',
      pages: [{ url: ARTICLE_URL, title: 'Example Article' }],
    })

    const output = setup({ home })
    await output.run(['generate', 'demo'])
    expect(output.stdout.getText()).toContain(`1. [Example Article](${ARTICLE_URL})`)
    expect(output.web.calls).toEqual([])
  })

  it('merges stored pages without a model under --raw', async () => {
    const { home, run } = setup()
    await run(['scrape', ARTICLE_URL, '--topic', 'demo', '--fallback-only'])

    const output = setup({ home })
    await output.run(['generate', 'demo', '--raw', '--model', 'foo/bar'])
    const text = output.stdout.getText()
    expect(text).toContain('## Example Article')
    expect(text).toContain('Source: [1]')
    expect(text).toContain(`1. [Example Article](${ARTICLE_URL})`)
    expect(mocks.generateText).not.toHaveBeenCalled()
    expect(output.web.calls).toEqual([])
  })

  it('rejects --raw together with --summarize', async () => {
    const { run } = setup()
    await expect(run(['generate', 'demo', '--raw', '--summarize'])).rejects.toThrow(
      '--raw cannot be combined with --summarize or --snippet'
    )
  })

  it('asks for a scrape when nothing is stored', async () => {
    const { home, run } = setup()
    const error = await run(['generate', 'missing']).catch((caught: unknown) => caught)
    expect(formatCliFailure(error)).toBe(
      [
        `Error (aggregating): No scraped pages for "missing" (looked in ${join(
          home,
          '.docsmith',
          'files',
          'scrape',
          'missing.json'
        )})`,
        'Hint: Run `docsmith scrape <url> --topic "missing"` first.',
      ].join('\n')
    )
  })

  it('requires --topic for scrape', async () => {
    const { stderr, run } = setup()
    await expect(run(['scrape', ARTICLE_URL])).rejects.toBeInstanceOf(CommanderError)
    expect(stderr.getText()).toContain("required option '--topic <topic>' not specified")
  })
})

describe('docsmith ask and help', () => {
  it('prints the answer', async () => {
    mocks.generateText.mockReset()
    mocks.generateText.mockResolvedValue({ text: 'Forty-two.', usage: undefined })
    const { stdout, run } = setup()

    await run(['ask', 'what', 'is', 'the', 'answer?'])

    expect(stdout.getText()).toBe('Forty-two.\n')
    expect(mocks.generateText).toHaveBeenCalledWith(
      expect.objectContaining({ prompt: 'what is the answer?', maxOutputTokens: 1000 })
    )
  })

  it('prints help with examples and exits cleanly', async () => {
    const { stdout, run } = setup()
    await run(['--help'])
    expect(stdout.getText()).toContain('Usage: docsmith [options] [command]')
    expect(stdout.getText()).toContain('docsmith scrape https://example.com/docs --topic example')
  })

  it('prints the package version', async () => {
    const { stdout, run } = setup()
    await run(['--version'])
    expect(stdout.getText()).toBe('0.1.0\n')
  })

  it('lets commander report unknown options', async () => {
    const { stderr, run } = setup()
    await expect(run(['research', 'x', '--bogus'])).rejects.toMatchObject({
      code: 'commander.unknownOption',
    })
    expect(stderr.getText()).toContain("error: unknown option '--bogus'")
  })
})

import { mkdtempSync, readFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { describe, expect, it } from 'vitest'

import { resolveDataDir, resolveUniquePath, writeDocumentFile } from '../src/run/output.js'
import { isMissingFileError, isRecord } from '../src/shared/guards.js'
import { slugify } from '../src/shared/slug.js'

describe('slugify', () => {
  it('reduces a topic to ASCII words joined by underscores', () => {
    expect(slugify('  Crème Brûlée: A History! ')).toBe('creme_brulee_a_history')
    expect(slugify('???')).toBe('untitled')
    expect(slugify('word '.repeat(30))).toHaveLength(59)
  })
})

describe('shared guards', () => {
  it('tells plain objects from arrays and null', () => {
    expect(isRecord({ a: 1 })).toBe(true)
    expect(isRecord([])).toBe(false)
    expect(isRecord(null)).toBe(false)
  })

  it('recognizes a missing file only by its code', () => {
    const missing = Object.assign(new Error('gone'), { code: 'ENOENT' })
    const denied = Object.assign(new Error('no'), { code: 'EACCES' })
    expect(isMissingFileError(missing)).toBe(true)
    expect(isMissingFileError(denied)).toBe(false)
    expect(isMissingFileError('ENOENT')).toBe(false)
  })
})

describe('resolveDataDir', () => {
  it('prefers config, then the home directory, then the working directory', () => {
    const home = { HOME: '/home/test' }
    expect(resolveDataDir({ env: home, config: { output: { dir: '~/notes' } }, cwd: '/w' })).toBe(
      '/home/test/notes'
    )
    expect(resolveDataDir({ env: home, config: null, cwd: '/w' })).toBe(
      '/home/test/.docsmith/files'
    )
    expect(resolveDataDir({ env: {}, config: { output: { dir: 'out' } }, cwd: '/w' })).toBe(
      '/w/out'
    )
    expect(resolveDataDir({ env: {}, config: null, cwd: '/w' })).toBe('/w/.docsmith')
  })
})

describe('resolveUniquePath', () => {
  it('adds a numeric suffix until the name is free', async () => {
    const taken = new Set(['/d/topic.md', '/d/topic_1.md'])
    expect(
      await resolveUniquePath({
        dir: '/d',
        base: 'topic',
        extension: 'md',
        fileExists: async (filePath) => taken.has(filePath),
      })
    ).toBe('/d/topic_2.md')
  })
})

describe('writeDocumentFile', () => {
  it('never overwrites an earlier document', async () => {
    const dataDir = mkdtempSync(join(tmpdir(), 'docsmith-output-'))
    const write = (content: string) =>
      writeDocumentFile({
        content,
        format: 'markdown',
        topic: 'Test Topic',
        kind: 'research',
        dataDir,
        output: null,
        cwd: dataDir,
      })

    const first = await write('one')
    const second = await write('two')

    expect(first).toBe(join(dataDir, 'docs', 'research', 'test_topic.md'))
    expect(second).toBe(join(dataDir, 'docs', 'research', 'test_topic_1.md'))
    expect(readFileSync(first, 'utf8')).toBe('one')
  })

  it('writes to an explicit output path relative to the working directory', async () => {
    const cwd = mkdtempSync(join(tmpdir(), 'docsmith-output-'))
    const written = await writeDocumentFile({
      content: '<p>hi</p>',
      format: 'html',
      topic: 'ignored',
      kind: 'scrape',
      dataDir: '/unused',
      output: 'nested/page.html',
      cwd,
    })
    expect(written).toBe(join(cwd, 'nested', 'page.html'))
    expect(readFileSync(written, 'utf8')).toBe('<p>hi</p>')
  })
})

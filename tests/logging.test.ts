import { mkdtempSync, readFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { describe, expect, it } from 'vitest'

import { createFileSink } from '../src/logging/file-sink.js'
import { createCliLogger, formatPrettyLine, safeJsonStringify } from '../src/logging/logger.js'
import { collectStream } from './helpers/research.js'

describe('createCliLogger', () => {
  it('stays quiet on stderr without --debug', () => {
    const stderr = collectStream()
    const { logger, file } = createCliLogger({
      env: {},
      config: null,
      stderr: stderr.stream,
      debug: false,
    })
    logger.warn('not shown')
    expect(file).toBeNull()
    expect(stderr.getText()).toBe('')
  })

  it('prints pretty lines to stderr with --debug', () => {
    const stderr = collectStream()
    const { logger } = createCliLogger({
      env: {},
      config: null,
      stderr: stderr.stream,
      debug: true,
    })
    logger.getSubLogger({ name: 'fetch' }).debug('static ok url=https://a.example')
    expect(stderr.getText()).toContain('static ok url=https://a.example')
  })

  it('writes JSON lines at or above the configured level to the log file', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'docsmith-log-'))
    const file = join(dir, 'run.jsonl')
    const stderr = collectStream()
    const logging = createCliLogger({
      env: {},
      config: { logging: { enabled: true, level: 'warn', file } },
      stderr: stderr.stream,
      debug: false,
    })

    logging.logger.info('skipped')
    logging.logger.warn('careful')
    await logging.flush()

    const lines = readFileSync(file, 'utf8').trim().split('\n')
    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      0: 'careful',
      _meta: { logLevelName: 'WARN' },
    })
    expect(stderr.getText()).toBe('')
  })

  it('defaults the log file to ~/.docsmith/logs', () => {
    const { file } = createCliLogger({
      env: { HOME: '/home/test' },
      config: { logging: { enabled: true } },
      stderr: collectStream().stream,
      debug: false,
    })
    expect(file).toBe('/home/test/.docsmith/logs/docsmith.jsonl')
  })
})

describe('createFileSink', () => {
  it('rotates to .old when the file would pass its size limit', async () => {
    const filePath = join(mkdtempSync(join(tmpdir(), 'docsmith-sink-')), 'app.log')
    const sink = createFileSink({ filePath, maxBytes: 10, onError: () => undefined })
    sink.write('aaaaaa')
    sink.write('bbbbbb')
    await sink.flush()
    expect(readFileSync(`${filePath}.old`, 'utf8')).toBe('aaaaaa\n')
    expect(readFileSync(filePath, 'utf8')).toBe('bbbbbb\n')
  })
})

describe('formatting helpers', () => {
  it('joins meta, arguments, and errors', () => {
    expect(formatPrettyLine({ metaMarkup: ' META ', args: ['a', { b: 1 }], errors: ['E'] })).toBe(
      'META a {"b":1}\nE'
    )
  })

  it('serializes cycles and bigints', () => {
    const value: Record<string, unknown> = { n: 10n }
    value.self = value
    expect(safeJsonStringify(value)).toBe('{"n":"10","self":"[Circular]"}')
  })
})

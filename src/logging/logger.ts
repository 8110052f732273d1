import path from 'node:path'

import { Logger } from 'tslog'

import type { DocsmithConfig, LoggingFormat, LoggingLevel } from '../config.js'
import { createFileSink, type FileSink } from './file-sink.js'

export type DocsmithLogger = Logger<Record<string, unknown>>

export type CliLogging = {
  logger: DocsmithLogger
  file: string | null
  flush: () => Promise<void>
}

const DEFAULT_FILE_LEVEL: LoggingLevel = 'info'
const DEFAULT_FILE_FORMAT: LoggingFormat = 'json'
const DEFAULT_LOG_MAX_MB = 5

const LOG_LEVEL_MAP: Record<LoggingLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
}
const SILENT_LEVEL = 7

export function safeJsonStringify(value: unknown): string {
  const seen = new WeakSet<object>()
  return JSON.stringify(value, (_key, val) => {
    if (typeof val === 'bigint') return val.toString()
    if (val instanceof Error) {
      return { name: val.name, message: val.message, stack: val.stack, cause: val.cause }
    }
    if (typeof val === 'object' && val !== null) {
      if (seen.has(val)) return '[Circular]'
      seen.add(val)
    }
    return val
  })
}

export function formatPrettyLine({
  metaMarkup,
  args,
  errors,
}: {
  metaMarkup: string
  args: unknown[]
  errors: string[]
}): string {
  const parts: string[] = []
  const meta = metaMarkup.trim()
  if (meta) parts.push(meta)
  if (args.length > 0) {
    parts.push(
      args.map((arg) => (typeof arg === 'string' ? arg : safeJsonStringify(arg))).join(' ')
    )
  }
  const base = parts.join(' ')
  if (errors.length === 0) return base
  const errorBlock = errors.join('\n')
  return base ? `${base}\n${errorBlock}` : errorBlock
}

function logLevelOf(logObj: Record<string, unknown>): number {
  const meta = logObj._meta
  if (typeof meta === 'object' && meta !== null && 'logLevelId' in meta) {
    return typeof meta.logLevelId === 'number' ? meta.logLevelId : 0
  }
  return 0
}

function resolveLogFile({
  env,
  file,
}: {
  env: Record<string, string | undefined>
  file: string | undefined
}): string | null {
  if (file) return file
  const home = env.HOME?.trim() || env.USERPROFILE?.trim()
  return home ? path.join(home, '.docsmith', 'logs', 'docsmith.jsonl') : null
}

/**
 * Pretty lines go to stderr only with `--debug`; the optional file sink follows `config.logging`.
 */
export function createCliLogger({
  env,
  config,
  stderr,
  debug,
}: {
  env: Record<string, string | undefined>
  config: DocsmithConfig | null
  stderr: NodeJS.WritableStream
  debug: boolean
}): CliLogging {
  const logging = config?.logging
  const file = logging?.enabled === true ? resolveLogFile({ env, file: logging.file }) : null
  const fileLevel = LOG_LEVEL_MAP[logging?.level ?? DEFAULT_FILE_LEVEL]
  const fileFormat = logging?.format ?? DEFAULT_FILE_FORMAT
  const sink: FileSink | null = file
    ? createFileSink({
        filePath: file,
        maxBytes: Math.trunc((logging?.maxMb ?? DEFAULT_LOG_MAX_MB) * 1024 * 1024),
        onError: (error) => {
          const message = error instanceof Error ? error.message : String(error)
          stderr.write(`docsmith: cannot write log file ${file}: ${message}\n`)
        },
      })
    : null

  const minLevel = Math.min(
    debug ? LOG_LEVEL_MAP.debug : SILENT_LEVEL,
    sink ? fileLevel : SILENT_LEVEL
  )

  const logger = new Logger<Record<string, unknown>>({
    name: 'docsmith',
    type: debug ? 'pretty' : 'hidden',
    minLevel,
    hideLogPositionForProduction: true,
    metaProperty: '_meta',
    overwrite: {
      transportFormatted: (metaMarkup, args, errors) => {
        stderr.write(`${formatPrettyLine({ metaMarkup, args, errors })}\n`)
      },
    },
  })

  if (sink) {
    logger.attachTransport((logObj) => {
      if (logLevelOf(logObj) < fileLevel) return
      if (fileFormat === 'json') {
        sink.write(safeJsonStringify(logObj))
        return
      }
      const { _meta: _ignored, ...rest } = logObj
      void _ignored
      sink.write(`${new Date().toISOString()} ${safeJsonStringify(rest)}`)
    })
  }

  return {
    logger,
    file,
    flush: async () => {
      if (sink) await sink.flush()
    },
  }
}

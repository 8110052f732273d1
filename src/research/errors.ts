import type { PipelineStage } from './types.js'

export type FetchFailureReason = 'BLOCKED' | 'TIMEOUT' | 'PARSE_FAILURE' | 'NETWORK'

export type FetchAttempt = {
  strategy: string
  reason: FetchFailureReason
  message: string
}

export class SearchError extends Error {
  readonly query: string
  readonly attempts: readonly { backend: string; message: string }[]

  constructor({
    query,
    attempts,
  }: {
    query: string
    attempts: readonly { backend: string; message: string }[]
  }) {
    const detail = attempts.map((attempt) => `${attempt.backend}: ${attempt.message}`).join('; ')
    super(`No search results for "${query}"${detail ? ` (${detail})` : ''}`)
    this.name = 'SearchError'
    this.query = query
    this.attempts = attempts
  }
}

export class FetchError extends Error {
  readonly reason: FetchFailureReason
  readonly url: string
  readonly httpStatus: number | null
  readonly attempts: readonly FetchAttempt[]

  constructor({
    reason,
    url,
    message,
    httpStatus = null,
    attempts = [],
    cause,
  }: {
    reason: FetchFailureReason
    url: string
    message: string
    httpStatus?: number | null
    attempts?: readonly FetchAttempt[]
    cause?: unknown
  }) {
    super(message, { cause })
    this.name = 'FetchError'
    this.reason = reason
    this.url = url
    this.httpStatus = httpStatus
    this.attempts = attempts
  }
}

export class SynthesisError extends Error {
  readonly failures: readonly string[]

  constructor(
    message: string,
    { failures = [], cause }: { failures?: string[]; cause?: unknown } = {}
  ) {
    super(message, { cause })
    this.name = 'SynthesisError'
    this.failures = failures
  }
}

/**
 * A fatal condition surfaced to the user, tagged with the stage it stopped in.
 */
export class PipelineError extends Error {
  readonly stage: PipelineStage
  readonly remedy: string | null

  constructor({
    stage,
    message,
    remedy = null,
    cause,
  }: {
    stage: PipelineStage
    message: string
    remedy?: string | null
    cause?: unknown
  }) {
    super(message, { cause })
    this.name = 'PipelineError'
    this.stage = stage
    this.remedy = remedy
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return 'An unknown error occurred'
}

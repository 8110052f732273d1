import { APICallError } from 'ai'

export type ProviderErrorKind = 'transient' | 'auth' | 'quota'

export class ProviderError extends Error {
  readonly kind: ProviderErrorKind
  readonly provider: string
  readonly statusCode: number | null

  constructor({
    kind,
    provider,
    message,
    statusCode = null,
    cause,
  }: {
    kind: ProviderErrorKind
    provider: string
    message: string
    statusCode?: number | null
    cause?: unknown
  }) {
    super(message, { cause })
    this.name = 'ProviderError'
    this.kind = kind
    this.provider = provider
    this.statusCode = statusCode
  }
}

export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error) && !(error instanceof DOMException)) return false
  return error.name === 'AbortError' || error.name === 'TimeoutError'
}

function kindForStatus(statusCode: number | undefined): ProviderErrorKind {
  if (statusCode === 401 || statusCode === 403) return 'auth'
  if (statusCode === 402 || statusCode === 429) return 'quota'
  return 'transient'
}

/**
 * Maps whatever the SDK threw onto the provider error taxonomy.
 */
export function toProviderError(error: unknown, provider: string): ProviderError {
  if (error instanceof ProviderError) return error
  if (isAbortError(error)) {
    return new ProviderError({
      kind: 'transient',
      provider,
      message: 'LLM request timed out',
      cause: error,
    })
  }
  if (APICallError.isInstance(error)) {
    const kind = kindForStatus(error.statusCode)
    return new ProviderError({
      kind,
      provider,
      message: `${provider} request failed${
        typeof error.statusCode === 'number' ? ` (${error.statusCode})` : ''
      }: ${error.message}`,
      statusCode: error.statusCode ?? null,
      cause: error,
    })
  }
  const message = error instanceof Error ? error.message : String(error)
  return new ProviderError({ kind: 'transient', provider, message, cause: error })
}

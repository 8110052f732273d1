import { countTokens } from 'gpt-tokenizer'

import type { DocsmithLogger } from '../logging/logger.js'
import { type LlmApiKeys, type ProviderBaseUrls, generateTextWithModelId } from './generate-text.js'
import type { UsageTracker } from './usage.js'

/**
 * The one capability the research pipeline needs from a model.
 * Implementations throw `ProviderError` on failure.
 */
export type TextGenerator = {
  readonly modelId: string
  generate: (prompt: string, maxTokens: number) => Promise<string>
}

export function createTextGenerator({
  modelId,
  apiKeys,
  baseUrls,
  timeoutMs,
  fetchImpl,
  logger,
  usage,
  system,
}: {
  modelId: string
  apiKeys: LlmApiKeys
  baseUrls: ProviderBaseUrls
  timeoutMs: number
  fetchImpl: typeof fetch
  logger: DocsmithLogger
  usage?: UsageTracker
  system?: string
}): TextGenerator {
  const log = logger.getSubLogger({ name: 'llm' })
  return {
    modelId,
    generate: async (prompt, maxTokens) => {
      const startedAt = Date.now()
      log.debug(`request model=${modelId} promptTokens~${countTokens(prompt)} max=${maxTokens}`)
      const result = await generateTextWithModelId({
        modelId,
        apiKeys,
        baseUrls,
        prompt,
        maxOutputTokens: maxTokens,
        timeoutMs,
        fetchImpl,
        ...(system ? { system } : {}),
      })
      usage?.record(result.usage)
      log.debug(
        `response model=${result.canonicalModelId} chars=${result.text.length} ms=${Date.now() - startedAt}`
      )
      return result.text
    },
  }
}

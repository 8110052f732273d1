import type { LanguageModel } from 'ai'

import { ProviderError, toProviderError } from './errors.js'
import { type LlmProvider, type ParsedModelId, parseModelId } from './model-id.js'

export type LlmApiKeys = {
  openaiApiKey: string | null
  anthropicApiKey: string | null
  googleApiKey: string | null
  deepseekApiKey: string | null
  openrouterApiKey: string | null
}

export type ProviderBaseUrls = Partial<Record<LlmProvider, string>>

export type LlmTokenUsage = {
  promptTokens: number | null
  completionTokens: number | null
  totalTokens: number | null
}

type ModelFactoryContext = {
  model: string
  apiKeys: LlmApiKeys
  baseUrl: string | undefined
  fetchImpl: typeof fetch
}

const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1'
const OLLAMA_BASE_URL = 'http://localhost:11434/v1'

function requireKey(value: string | null, provider: LlmProvider, envName: string): string {
  if (value) return value
  throw new ProviderError({
    kind: 'auth',
    provider,
    message: `Missing ${envName} for ${provider}/... model`,
  })
}

const MODEL_FACTORIES: Record<LlmProvider, (ctx: ModelFactoryContext) => Promise<LanguageModel>> =
  {
    openai: async ({ model, apiKeys, baseUrl, fetchImpl }) => {
      const apiKey = requireKey(apiKeys.openaiApiKey, 'openai', 'OPENAI_API_KEY')
      const { createOpenAI } = await import('@ai-sdk/openai')
      const openai = createOpenAI({
        apiKey,
        fetch: fetchImpl,
        ...(baseUrl ? { baseURL: baseUrl } : {}),
      })
      return openai(model)
    },
    anthropic: async ({ model, apiKeys, baseUrl, fetchImpl }) => {
      const apiKey = requireKey(apiKeys.anthropicApiKey, 'anthropic', 'ANTHROPIC_API_KEY')
      const { createAnthropic } = await import('@ai-sdk/anthropic')
      const anthropic = createAnthropic({
        apiKey,
        fetch: fetchImpl,
        ...(baseUrl ? { baseURL: baseUrl } : {}),
      })
      return anthropic(model)
    },
    google: async ({ model, apiKeys, baseUrl, fetchImpl }) => {
      const apiKey = requireKey(
        apiKeys.googleApiKey,
        'google',
        'GEMINI_API_KEY (or GOOGLE_GENERATIVE_AI_API_KEY / GOOGLE_API_KEY)'
      )
      const { createGoogleGenerativeAI } = await import('@ai-sdk/google')
      const google = createGoogleGenerativeAI({
        apiKey,
        fetch: fetchImpl,
        ...(baseUrl ? { baseURL: baseUrl } : {}),
      })
      return google(model)
    },
    deepseek: async ({ model, apiKeys, baseUrl, fetchImpl }) => {
      const apiKey = requireKey(apiKeys.deepseekApiKey, 'deepseek', 'DEEPSEEK_API_KEY')
      const { createDeepSeek } = await import('@ai-sdk/deepseek')
      const deepseek = createDeepSeek({
        apiKey,
        fetch: fetchImpl,
        ...(baseUrl ? { baseURL: baseUrl } : {}),
      })
      return deepseek(model)
    },
    // OpenRouter and Ollama speak the OpenAI chat-completions dialect.
    openrouter: async ({ model, apiKeys, baseUrl, fetchImpl }) => {
      const apiKey = requireKey(apiKeys.openrouterApiKey, 'openrouter', 'OPENROUTER_API_KEY')
      const { createOpenAI } = await import('@ai-sdk/openai')
      const openrouter = createOpenAI({
        apiKey,
        fetch: fetchImpl,
        baseURL: baseUrl ?? OPENROUTER_BASE_URL,
        headers: { 'X-Title': 'docsmith' },
      })
      return openrouter.chat(model)
    },
    ollama: async ({ model, baseUrl, fetchImpl }) => {
      const { createOpenAI } = await import('@ai-sdk/openai')
      const ollama = createOpenAI({
        apiKey: 'ollama',
        fetch: fetchImpl,
        baseURL: baseUrl ?? OLLAMA_BASE_URL,
      })
      return ollama.chat(model)
    },
  }

// an unusable model id is reported like a missing key
function parseModelIdForCall(modelId: string): ParsedModelId {
  try {
    return parseModelId(modelId)
  } catch (error) {
    throw new ProviderError({
      kind: 'auth',
      provider: modelId.trim().split('/')[0] ?? modelId,
      message: error instanceof Error ? error.message : String(error),
      cause: error,
    })
  }
}

export async function generateTextWithModelId({
  modelId,
  apiKeys,
  baseUrls = {},
  system,
  prompt,
  maxOutputTokens,
  timeoutMs,
  temperature,
  fetchImpl,
}: {
  modelId: string
  apiKeys: LlmApiKeys
  baseUrls?: ProviderBaseUrls
  system?: string
  prompt: string
  maxOutputTokens?: number
  timeoutMs: number
  temperature?: number
  fetchImpl: typeof fetch
}): Promise<{
  text: string
  canonicalModelId: string
  provider: LlmProvider
  usage: LlmTokenUsage | null
}> {
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)
  let provider = modelId.trim().split('/')[0] ?? modelId

  try {
    const parsed = parseModelIdForCall(modelId)
    provider = parsed.provider
    const { generateText } = await import('ai')
    const model = await MODEL_FACTORIES[parsed.provider]({
      model: parsed.model,
      apiKeys,
      baseUrl: baseUrls[parsed.provider],
      fetchImpl,
    })
    const result = await generateText({
      model,
      ...(system ? { system } : {}),
      prompt,
      ...(typeof temperature === 'number' ? { temperature } : {}),
      ...(typeof maxOutputTokens === 'number' ? { maxOutputTokens } : {}),
      abortSignal: controller.signal,
    })
    const text = result.text.trim()
    if (!text) {
      throw new ProviderError({
        kind: 'transient',
        provider: parsed.provider,
        message: `${parsed.canonical} returned an empty response`,
      })
    }
    return {
      text,
      canonicalModelId: parsed.canonical,
      provider: parsed.provider,
      usage: result.usage
        ? {
            promptTokens: result.usage.inputTokens ?? null,
            completionTokens: result.usage.outputTokens ?? null,
            totalTokens: result.usage.totalTokens ?? null,
          }
        : null,
    }
  } catch (error) {
    throw toProviderError(error, provider)
  } finally {
    clearTimeout(timeout)
  }
}

import type { DocsmithConfig } from './config.js'
import type { LlmApiKeys, ProviderBaseUrls } from './llm/generate-text.js'
import { LLM_PROVIDERS } from './llm/model-id.js'

export type ServiceKeys = {
  braveApiKey: string | null
  firecrawlApiKey: string | null
  unsplashAccessKey: string | null
}

export type ResolvedEnv = {
  apiKeys: LlmApiKeys
  serviceKeys: ServiceKeys
  baseUrls: ProviderBaseUrls
  modelOverride: string | null
}

const DEFAULT_LOCAL_MODEL = 'ollama/llama3.1'

function readEnv(env: Record<string, string | undefined>, ...names: string[]): string | null {
  for (const name of names) {
    const value = env[name]?.trim()
    if (value) return value
  }
  return null
}

export function resolveEnv({
  env,
  config,
}: {
  env: Record<string, string | undefined>
  config: DocsmithConfig | null
}): ResolvedEnv {
  const baseUrls: ProviderBaseUrls = {}
  for (const provider of LLM_PROVIDERS) {
    const configured = config?.providers?.[provider]?.baseUrl
    if (configured) baseUrls[provider] = configured
  }
  const ollamaBaseUrl = readEnv(env, 'OLLAMA_BASE_URL')
  if (ollamaBaseUrl) {
    baseUrls.ollama = ollamaBaseUrl.replace(/\/+$/, '').endsWith('/v1')
      ? ollamaBaseUrl
      : `${ollamaBaseUrl.replace(/\/+$/, '')}/v1`
  }

  return {
    apiKeys: {
      openaiApiKey: readEnv(env, 'OPENAI_API_KEY'),
      anthropicApiKey: readEnv(env, 'ANTHROPIC_API_KEY'),
      googleApiKey: readEnv(
        env,
        'GEMINI_API_KEY',
        'GOOGLE_GENERATIVE_AI_API_KEY',
        'GOOGLE_API_KEY'
      ),
      deepseekApiKey: readEnv(env, 'DEEPSEEK_API_KEY'),
      openrouterApiKey: readEnv(env, 'OPENROUTER_API_KEY'),
    },
    serviceKeys: {
      braveApiKey: readEnv(env, 'BRAVE_SEARCH_API_KEY') ?? config?.search?.braveApiKey ?? null,
      firecrawlApiKey: readEnv(env, 'FIRECRAWL_API_KEY'),
      unsplashAccessKey: readEnv(env, 'UNSPLASH_ACCESS_KEY'),
    },
    baseUrls,
    modelOverride: readEnv(env, 'DOCSMITH_MODEL'),
  }
}

/**
 * `--model` wins, then `DOCSMITH_MODEL`, then config, then the first provider with a key.
 */
export function resolveModelId({
  flag,
  resolved,
  config,
}: {
  flag: string | null
  resolved: ResolvedEnv
  config: DocsmithConfig | null
}): string {
  const explicit = flag?.trim() || resolved.modelOverride || config?.model
  if (explicit) return explicit
  const { apiKeys } = resolved
  if (apiKeys.openaiApiKey) return 'openai/gpt-4o-mini'
  if (apiKeys.anthropicApiKey) return 'anthropic/claude-3-5-haiku-latest'
  if (apiKeys.googleApiKey) return 'google/gemini-2.0-flash'
  if (apiKeys.deepseekApiKey) return 'deepseek/deepseek-chat'
  if (apiKeys.openrouterApiKey) return 'openrouter/openai/gpt-4o-mini'
  return DEFAULT_LOCAL_MODEL
}

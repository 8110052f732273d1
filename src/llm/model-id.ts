export const LLM_PROVIDERS = [
  'openai',
  'anthropic',
  'google',
  'deepseek',
  'openrouter',
  'ollama',
] as const

export type LlmProvider = (typeof LLM_PROVIDERS)[number]

export type ParsedModelId = {
  provider: LlmProvider
  model: string
  canonical: string
}

const PROVIDER_ALIASES = new Map<string, LlmProvider>([
  ['gemini', 'google'],
  ['claude', 'anthropic'],
])

/**
 * Parses `<provider>/<model>`. OpenRouter ids keep their inner slash
 * (`openrouter/meta-llama/llama-3.1-8b`).
 */
export function parseModelId(raw: string): ParsedModelId {
  const trimmed = raw.trim()
  const slash = trimmed.indexOf('/')
  if (slash <= 0 || slash === trimmed.length - 1) {
    throw new Error(
      `Invalid model id "${raw}". Expected <provider>/<model>, e.g. openai/gpt-4o-mini`
    )
  }
  const prefix = trimmed.slice(0, slash).toLowerCase()
  const model = trimmed.slice(slash + 1).trim()
  const provider = LLM_PROVIDERS.find((name) => name === prefix) ?? PROVIDER_ALIASES.get(prefix)
  if (!provider) {
    throw new Error(
      `Unsupported provider "${prefix}" in model id "${raw}". Use one of: ${LLM_PROVIDERS.join(', ')}`
    )
  }
  return { provider, model, canonical: `${provider}/${model}` }
}

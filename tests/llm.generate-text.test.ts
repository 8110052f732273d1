import { APICallError } from 'ai'
import { afterEach, describe, expect, it, vi } from 'vitest'

import { ProviderError } from '../src/llm/errors.js'
import { type LlmApiKeys, generateTextWithModelId } from '../src/llm/generate-text.js'
import { createTextGenerator } from '../src/llm/text-generator.js'
import { createUsageTracker } from '../src/llm/usage.js'
import { silentLogger } from './helpers/research.js'

const mocks = vi.hoisted(() => {
  const model =
    (kind: string, options: Record<string, unknown>) =>
    (modelId: string) => ({ kind, modelId, options })
  return {
    generateText: vi.fn(),
    createOpenAI: vi.fn((options: Record<string, unknown>) =>
      Object.assign(model('responses', options), { chat: model('chat', options) })
    ),
    createAnthropic: vi.fn((options: Record<string, unknown>) => model('anthropic', options)),
  }
})

vi.mock('ai', async (importOriginal) => {
  const actual = await importOriginal<typeof import('ai')>()
  return { ...actual, generateText: mocks.generateText }
})
vi.mock('@ai-sdk/openai', () => ({ createOpenAI: mocks.createOpenAI }))
vi.mock('@ai-sdk/anthropic', () => ({ createAnthropic: mocks.createAnthropic }))
vi.mock('@ai-sdk/google', () => ({
  createGoogleGenerativeAI: () => (modelId: string) => ({ kind: 'google', modelId }),
}))
vi.mock('@ai-sdk/deepseek', () => ({
  createDeepSeek: () => (modelId: string) => ({ kind: 'deepseek', modelId }),
}))

const noKeys: LlmApiKeys = {
  openaiApiKey: null,
  anthropicApiKey: null,
  googleApiKey: null,
  deepseekApiKey: null,
  openrouterApiKey: null,
}

const fetchImpl = globalThis.fetch.bind(globalThis)

function answer(text: string) {
  return { text, usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 } }
}

describe('generateTextWithModelId', () => {
  afterEach(() => {
    mocks.generateText.mockReset()
    mocks.createOpenAI.mockClear()
    mocks.createAnthropic.mockClear()
  })

  it('routes openai ids to the responses model and maps usage', async () => {
    mocks.generateText.mockResolvedValue(answer('  Hello.  '))

    const result = await generateTextWithModelId({
      modelId: 'openai/gpt-4o-mini',
      apiKeys: { ...noKeys, openaiApiKey: 'test-key' },
      system: 'Be brief.',
      prompt: 'hi',
      maxOutputTokens: 7,
      timeoutMs: 2000,
      fetchImpl,
    })

    expect(result).toEqual({
      text: 'Hello.',
      canonicalModelId: 'openai/gpt-4o-mini',
      provider: 'openai',
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    })
    expect(mocks.createOpenAI).toHaveBeenCalledWith({ apiKey: 'test-key', fetch: fetchImpl })
    expect(mocks.generateText).toHaveBeenCalledWith(
      expect.objectContaining({
        model: expect.objectContaining({ kind: 'responses', modelId: 'gpt-4o-mini' }),
        system: 'Be brief.',
        prompt: 'hi',
        maxOutputTokens: 7,
      })
    )
  })

  it('sends OpenRouter ids through the chat API with their inner slash', async () => {
    mocks.generateText.mockResolvedValue(answer('ok'))

    await generateTextWithModelId({
      modelId: 'openrouter/meta-llama/llama-3.1-8b',
      apiKeys: { ...noKeys, openrouterApiKey: 'test-key' },
      prompt: 'hi',
      timeoutMs: 2000,
      fetchImpl,
    })

    expect(mocks.createOpenAI).toHaveBeenCalledWith({
      apiKey: 'test-key',
      fetch: fetchImpl,
      baseURL: 'https://openrouter.ai/api/v1',
      headers: { 'X-Title': 'docsmith' },
    })
    expect(mocks.generateText).toHaveBeenCalledWith(
      expect.objectContaining({
        model: expect.objectContaining({ kind: 'chat', modelId: 'meta-llama/llama-3.1-8b' }),
      })
    )
  })

  it('reaches a local Ollama without a key and honors a base URL override', async () => {
    mocks.generateText.mockResolvedValue(answer('ok'))

    await generateTextWithModelId({
      modelId: 'ollama/llama3',
      apiKeys: noKeys,
      baseUrls: { ollama: 'http://gpu-box:11434/v1' },
      prompt: 'hi',
      timeoutMs: 2000,
      fetchImpl,
    })

    expect(mocks.createOpenAI).toHaveBeenCalledWith({
      apiKey: 'ollama',
      fetch: fetchImpl,
      baseURL: 'http://gpu-box:11434/v1',
    })
  })

  it('resolves provider aliases', async () => {
    mocks.generateText.mockResolvedValue(answer('ok'))

    const result = await generateTextWithModelId({
      modelId: 'claude/claude-sonnet-4-5',
      apiKeys: { ...noKeys, anthropicApiKey: 'test-key' },
      prompt: 'hi',
      timeoutMs: 2000,
      fetchImpl,
    })

    expect(result.canonicalModelId).toBe('anthropic/claude-sonnet-4-5')
    expect(mocks.createAnthropic).toHaveBeenCalledTimes(1)
  })

  it('fails with an auth error when the key is missing', async () => {
    const attempt = generateTextWithModelId({
      modelId: 'openai/gpt-4o-mini',
      apiKeys: noKeys,
      prompt: 'hi',
      timeoutMs: 2000,
      fetchImpl,
    })

    await expect(attempt).rejects.toBeInstanceOf(ProviderError)
    await expect(attempt).rejects.toMatchObject({
      kind: 'auth',
      provider: 'openai',
      message: 'Missing OPENAI_API_KEY for openai/... model',
    })
    expect(mocks.generateText).not.toHaveBeenCalled()
  })

  it('reports an unknown provider as a provider error', async () => {
    const call = (modelId: string) =>
      generateTextWithModelId({
        modelId,
        apiKeys: noKeys,
        prompt: 'hi',
        timeoutMs: 2000,
        fetchImpl,
      })

    await expect(call('foo/bar')).rejects.toBeInstanceOf(ProviderError)
    await expect(call('foo/bar')).rejects.toMatchObject({
      kind: 'auth',
      provider: 'foo',
      message: expect.stringContaining('Unsupported provider "foo"'),
    })
    await expect(call('constructor/x')).rejects.toMatchObject({
      kind: 'auth',
      provider: 'constructor',
      message: expect.stringContaining('Unsupported provider "constructor"'),
    })
    expect(mocks.generateText).not.toHaveBeenCalled()
  })

  it('treats an empty answer as a transient failure', async () => {
    mocks.generateText.mockResolvedValue(answer('   '))

    await expect(
      generateTextWithModelId({
        modelId: 'openai/gpt-4o-mini',
        apiKeys: { ...noKeys, openaiApiKey: 'test-key' },
        prompt: 'hi',
        timeoutMs: 2000,
        fetchImpl,
      })
    ).rejects.toMatchObject({
      kind: 'transient',
      message: 'openai/gpt-4o-mini returned an empty response',
    })
  })

  it('classifies HTTP failures from the SDK', async () => {
    mocks.generateText.mockRejectedValue(
      new APICallError({
        message: 'Too many requests',
        url: 'https://api.openai.com/v1/responses',
        requestBodyValues: {},
        statusCode: 429,
      })
    )

    await expect(
      generateTextWithModelId({
        modelId: 'openai/gpt-4o-mini',
        apiKeys: { ...noKeys, openaiApiKey: 'test-key' },
        prompt: 'hi',
        timeoutMs: 2000,
        fetchImpl,
      })
    ).rejects.toMatchObject({
      kind: 'quota',
      statusCode: 429,
      message: 'openai request failed (429): Too many requests',
    })
  })
})

describe('createTextGenerator', () => {
  afterEach(() => {
    mocks.generateText.mockReset()
  })

  it('passes the token limit and system prompt, and records usage', async () => {
    mocks.generateText.mockResolvedValue(answer('Section text.'))
    const usage = createUsageTracker()
    const generator = createTextGenerator({
      modelId: 'openai/gpt-4o-mini',
      apiKeys: { ...noKeys, openaiApiKey: 'test-key' },
      baseUrls: {},
      timeoutMs: 2000,
      fetchImpl,
      logger: silentLogger(),
      usage,
      system: 'You write documents.',
    })

    expect(await generator.generate('prompt', 300)).toBe('Section text.')
    expect(mocks.generateText).toHaveBeenCalledWith(
      expect.objectContaining({ system: 'You write documents.', maxOutputTokens: 300 })
    )
    expect(usage.totals()).toEqual({
      calls: 1,
      promptTokens: 10,
      completionTokens: 5,
      totalTokens: 15,
    })
  })
})

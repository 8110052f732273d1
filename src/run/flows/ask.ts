import { type RunContext, createGenerator } from '../context.js'
import type { ModelFlags } from '../options.js'

const ASK_SYSTEM_PROMPT =
  'You are a concise, helpful assistant. Answer in plain text without Markdown formatting.'
const ASK_MAX_TOKENS = 1_000

export async function runAskFlow({
  words,
  flags,
  context,
}: {
  words: readonly string[]
  flags: ModelFlags
  context: RunContext
}): Promise<void> {
  const prompt = words.join(' ').trim()
  if (!prompt) throw new Error('Missing prompt')
  const generator = createGenerator(context, {
    model: flags.model,
    timeoutMs: flags.timeoutMs,
    system: ASK_SYSTEM_PROMPT,
  })
  const answer = await generator.generate(prompt, ASK_MAX_TOKENS)
  if (flags.json) {
    const payload = { model: generator.modelId, answer, usage: context.usage.totals() }
    context.stdout.write(`${JSON.stringify(payload, null, 2)}\n`)
    return
  }
  context.stdout.write(`${answer}\n`)
}

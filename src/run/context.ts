import { type DocsmithConfig, loadDocsmithConfig } from '../config.js'
import { type ResolvedEnv, resolveEnv, resolveModelId } from '../env.js'
import { parseModelId } from '../llm/model-id.js'
import { type TextGenerator, createTextGenerator } from '../llm/text-generator.js'
import { type UsageTracker, createUsageTracker } from '../llm/usage.js'
import { type DocsmithLogger, createCliLogger } from '../logging/logger.js'
import { resolveDataDir } from './output.js'

export type RunEnv = {
  env: Record<string, string | undefined>
  fetch: typeof fetch
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  cwd?: string
}

export type RunContext = {
  env: Record<string, string | undefined>
  fetchImpl: typeof fetch
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  cwd: string
  config: DocsmithConfig | null
  resolved: ResolvedEnv
  logger: DocsmithLogger
  dataDir: string
  usage: UsageTracker
  flushLogs: () => Promise<void>
}

export function createRunContext(runEnv: RunEnv, { debug }: { debug: boolean }): RunContext {
  const { config } = loadDocsmithConfig({ env: runEnv.env })
  const cwd = runEnv.cwd ?? process.cwd()
  const logging = createCliLogger({ env: runEnv.env, config, stderr: runEnv.stderr, debug })
  return {
    env: runEnv.env,
    fetchImpl: runEnv.fetch,
    stdout: runEnv.stdout,
    stderr: runEnv.stderr,
    cwd,
    config,
    resolved: resolveEnv({ env: runEnv.env, config }),
    logger: logging.logger,
    dataDir: resolveDataDir({ env: runEnv.env, config, cwd }),
    usage: createUsageTracker(),
    flushLogs: logging.flush,
  }
}

export function createGenerator(
  context: RunContext,
  { model, timeoutMs, system }: { model: string | null; timeoutMs: number; system?: string }
): TextGenerator {
  const modelId = resolveModelId({
    flag: model,
    resolved: context.resolved,
    config: context.config,
  })
  // fail before any search or fetch work when the id is unusable
  parseModelId(modelId)
  context.logger.getSubLogger({ name: 'run' }).debug(`model=${modelId} timeoutMs=${timeoutMs}`)
  return createTextGenerator({
    modelId,
    apiKeys: context.resolved.apiKeys,
    baseUrls: context.resolved.baseUrls,
    timeoutMs,
    fetchImpl: context.fetchImpl,
    logger: context.logger,
    usage: context.usage,
    ...(system ? { system } : {}),
  })
}

/**
 * Runs `task` with a context and always flushes the log file afterwards.
 */
export async function withRunContext(
  runEnv: RunEnv,
  { debug }: { debug: boolean },
  task: (context: RunContext) => Promise<void>
): Promise<void> {
  const context = createRunContext(runEnv, { debug })
  try {
    await task(context)
  } catch (error) {
    context.logger.error(error instanceof Error ? error.message : String(error))
    throw error
  } finally {
    await context.flushLogs()
  }
}

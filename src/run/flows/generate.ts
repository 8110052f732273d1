import {
  DEFAULT_CONCURRENCY,
  DEFAULT_DEPTH,
  resolveResearchBudgets,
} from '../../research/budgets.js'
import { PipelineError } from '../../research/errors.js'
import { runCorpusPipeline } from '../../research/pipeline.js'
import { buildStoredCorpus, loadScrapeStore } from '../../scrape/store.js'
import type { RunContext } from '../context.js'
import { emitDocumentReport } from '../emit.js'
import type { GenerateFlags } from '../options.js'
import { createSynthesisDeps } from './research.js'

export async function runGenerateFlow({
  topic: rawTopic,
  flags,
  context,
}: {
  topic: string
  flags: GenerateFlags
  context: RunContext
}): Promise<void> {
  const topic = rawTopic.trim()
  if (!topic) throw new Error('Missing topic')
  const research = context.config?.research

  const { store, path } = await loadScrapeStore({ dataDir: context.dataDir, topic })
  if (!store || store.pages.length === 0) {
    throw new PipelineError({
      stage: 'aggregating',
      message: `No scraped pages for "${topic}" (looked in ${path})`,
      remedy: `Run \`docsmith scrape <url> --topic "${topic}"\` first.`,
    })
  }

  const budgets = resolveResearchBudgets({
    depth: flags.depth ?? research?.depth ?? DEFAULT_DEPTH,
    maxPages: flags.maxPages,
    ...(research?.maxChunkCharacters ? { maxChunkSize: research.maxChunkCharacters } : {}),
  })
  const corpus = await buildStoredCorpus({ store, budgets, logger: context.logger })
  const report = await runCorpusPipeline(
    {
      topic,
      mode: flags.mode,
      tone: flags.tone,
      image: flags.image,
      maxChunkSize: budgets.maxChunkSize,
      concurrency: research?.concurrency ?? DEFAULT_CONCURRENCY,
    },
    corpus,
    createSynthesisDeps(context, flags, { withModel: flags.mode !== 'raw' })
  )
  await emitDocumentReport({ context, report, flags, topic, kind: 'scrape' })
}

import type { PipelineReport } from '../research/pipeline.js'
import { renderDocument, serializeDocument } from '../research/render.js'
import type { RunContext } from './context.js'
import type { DocumentFlags } from './options.js'
import { type DocumentKind, writeDocumentFile } from './output.js'

/**
 * Prints or writes the document. Recovered failures go to the logger, so they only reach
 * stderr with `--debug` (or the log file).
 */
export async function emitDocumentReport({
  context,
  report,
  flags,
  topic,
  kind,
}: {
  context: RunContext
  report: PipelineReport
  flags: DocumentFlags & { json: boolean }
  topic: string
  kind: DocumentKind
}): Promise<void> {
  const log = context.logger.getSubLogger({ name: 'run' })
  for (const warning of report.warnings) {
    log.warn(`[${warning.stage}] ${warning.message}`)
  }
  const { sections, references } = report.document
  const timings = report.timings.map((timing) => `${timing.stage}=${timing.durationMs}ms`)
  log.debug(
    `done sections=${sections.length} references=${references.length} ${timings.join(' ')}`
  )

  const rendered = renderDocument(report.document, flags.format)
  const writtenPath = flags.write
    ? await writeDocumentFile({
        content: rendered,
        format: flags.format,
        topic,
        kind,
        dataDir: context.dataDir,
        output: flags.output,
        cwd: context.cwd,
      })
    : null

  if (flags.json) {
    const payload = {
      document: serializeDocument(report.document),
      warnings: report.warnings,
      sources: {
        used: report.corpus.pages.length,
        skipped: report.corpus.skipped.map((skipped) => ({
          url: skipped.source.url,
          reason: skipped.reason,
        })),
        characters: report.corpus.totalCharacters,
      },
      chunks: report.chunkCount,
      usage: context.usage.totals(),
      ...(writtenPath ? { path: writtenPath } : {}),
    }
    context.stdout.write(`${JSON.stringify(payload, null, 2)}\n`)
    return
  }

  if (writtenPath) {
    context.stdout.write(`Wrote ${writtenPath}\n`)
    return
  }
  context.stdout.write(rendered)
}

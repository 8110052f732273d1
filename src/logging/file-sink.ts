import fs from 'node:fs/promises'
import path from 'node:path'

export type FileSink = {
  write: (line: string) => void
  flush: () => Promise<void>
}

/**
 * Append-only JSONL/pretty log sink. When the file would grow past `maxBytes`
 * the current file moves to `<file>.old` and a fresh one starts.
 */
export function createFileSink({
  filePath,
  maxBytes,
  onError,
}: {
  filePath: string
  maxBytes: number
  onError: (error: unknown) => void
}): FileSink {
  const limit = Number.isFinite(maxBytes) && maxBytes > 0 ? Math.trunc(maxBytes) : 1024
  const ready = fs.mkdir(path.dirname(filePath), { recursive: true })
  let size: number | null = null
  let chain = Promise.resolve()
  let reported = false

  const currentSize = async () => {
    if (size !== null) return size
    const stat = await fs.stat(filePath).catch(() => null)
    size = stat ? stat.size : 0
    return size
  }

  const write = (line: string) => {
    const normalized = line.endsWith('\n') ? line : `${line}\n`
    const bytes = Buffer.byteLength(normalized, 'utf8')
    chain = chain
      .then(async () => {
        await ready
        if ((await currentSize()) + bytes > limit) {
          await fs.rename(filePath, `${filePath}.old`).catch(() => undefined)
          size = 0
        }
        await fs.appendFile(filePath, normalized, 'utf8')
        size = (size ?? 0) + bytes
      })
      .catch((error: unknown) => {
        // first failure only
        if (reported) return
        reported = true
        onError(error)
      })
  }

  return { write, flush: async () => await chain }
}

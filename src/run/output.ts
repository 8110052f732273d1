import { mkdir, stat, writeFile } from 'node:fs/promises'
import path from 'node:path'

import type { DocsmithConfig } from '../config.js'
import { type OutputFormat, formatExtension } from '../flags.js'
import { isMissingFileError } from '../shared/guards.js'
import { slugify } from '../shared/slug.js'

export type DocumentKind = 'research' | 'scrape'

function expandHome(value: string, home: string | null): string {
  if (home && (value === '~' || value.startsWith('~/'))) return path.join(home, value.slice(1))
  return value
}

/**
 * Root for scraped stores and written documents: `output.dir` from config, else
 * `~/.docsmith/files`, else `.docsmith` under the working directory.
 */
export function resolveDataDir({
  env,
  config,
  cwd,
}: {
  env: Record<string, string | undefined>
  config: DocsmithConfig | null
  cwd: string
}): string {
  const home = env.HOME?.trim() || env.USERPROFILE?.trim() || null
  const configured = config?.output?.dir
  if (configured) return path.resolve(cwd, expandHome(configured, home))
  if (home) return path.join(home, '.docsmith', 'files')
  return path.join(cwd, '.docsmith')
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath)
    return true
  } catch (error) {
    if (isMissingFileError(error)) return false
    throw error
  }
}

/**
 * First free name among `base.ext`, `base_1.ext`, `base_2.ext`, ...
 */
export async function resolveUniquePath({
  dir,
  base,
  extension,
  fileExists = exists,
}: {
  dir: string
  base: string
  extension: string
  fileExists?: (filePath: string) => Promise<boolean>
}): Promise<string> {
  let candidate = path.join(dir, `${base}.${extension}`)
  for (let suffix = 1; await fileExists(candidate); suffix += 1) {
    candidate = path.join(dir, `${base}_${suffix}.${extension}`)
  }
  return candidate
}

/**
 * Writes to `output` when given, otherwise to a fresh file under
 * `<dataDir>/docs/<kind>/`. Returns the path written.
 */
export async function writeDocumentFile({
  content,
  format,
  topic,
  kind,
  dataDir,
  output,
  cwd,
}: {
  content: string
  format: OutputFormat
  topic: string
  kind: DocumentKind
  dataDir: string
  output: string | null
  cwd: string
}): Promise<string> {
  const target = output
    ? path.resolve(cwd, output)
    : await resolveUniquePath({
        dir: path.join(dataDir, 'docs', kind),
        base: slugify(topic),
        extension: formatExtension(format),
      })
  await mkdir(path.dirname(target), { recursive: true })
  await writeFile(target, content, 'utf8')
  return target
}

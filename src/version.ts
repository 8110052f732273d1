import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

import { isRecord } from './shared/guards.js'

const FALLBACK_VERSION = '0.0.0'

/**
 * Reads `version` from the package.json one level above this module (true for both `src/`
 * and `dist/`).
 */
export function resolvePackageVersion(): string {
  try {
    const file = fileURLToPath(new URL('../package.json', import.meta.url))
    const parsed: unknown = JSON.parse(readFileSync(file, 'utf8'))
    if (isRecord(parsed) && typeof parsed.version === 'string') return parsed.version
    return FALLBACK_VERSION
  } catch {
    return FALLBACK_VERSION
  }
}

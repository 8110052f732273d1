import type { SearchPreference } from '../flags.js'

export type SearchBackendName = Exclude<SearchPreference, 'auto'>

export type SearchHit = {
  url: string
  title: string
  snippet: string | null
}

export type SearchBackend = {
  name: SearchBackendName
  /** Throws when the backend is unavailable or the request fails. */
  search: (query: string, limit: number) => Promise<SearchHit[]>
}

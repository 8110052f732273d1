import type { ImageDescriptor } from '../research/types.js'

export type ImageSearch = {
  search: (
    query: string,
    count: number,
    options?: { width?: number | null }
  ) => Promise<ImageDescriptor[]>
}

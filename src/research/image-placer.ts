import type { TextGenerator } from '../llm/text-generator.js'
import type { DocsmithLogger } from '../logging/logger.js'
import { getErrorMessage } from './errors.js'
import { extractSectionHeadings } from './markdown.js'
import { buildImagePlacementPrompt } from './prompts.js'
import type { Document, ImageDescriptor, PlacedImage } from './types.js'

const PLACEMENT_PATTERN = /PLACEMENT\s*(\d+)\s*:\s*(?:section|paragraph)\s*(\d+)/gi
const EXCERPT_CHARACTERS = 200
const PLACEMENT_MAX_TOKENS = 200

export type ImagePlacementResult = {
  document: Document
  warnings: string[]
  strategy: 'none' | 'model' | 'fallback'
}

/**
 * Spreads `count` images evenly: image `i` follows section
 * `floor((i + 1) * sections / count) - 1`.
 */
export function fallbackPositions(count: number, sectionCount: number): number[] {
  return Array.from({ length: count }, (_, index) =>
    Math.floor(((index + 1) * sectionCount) / count) - 1
  )
}

/**
 * Reads `PLACEMENT k: Section s` lines into 0-based section positions, one per image.
 * Returns null unless every image got exactly one in-range, unshared section.
 */
export function parsePlacements(
  text: string,
  imageCount: number,
  sectionCount: number
): number[] | null {
  const positions = new Map<number, number>()
  for (const match of text.matchAll(PLACEMENT_PATTERN)) {
    const image = Number(match[1])
    const section = Number(match[2])
    if (image < 1 || image > imageCount || positions.has(image)) return null
    if (section < 1 || section > sectionCount) return null
    positions.set(image, section - 1)
  }
  if (positions.size !== imageCount) return null
  const ordered = Array.from(
    { length: imageCount },
    (_, index) => positions.get(index + 1) ?? -1
  )
  if (new Set(ordered).size !== ordered.length) return null
  return ordered
}

function describeSections(document: Document): { heading: string; excerpt: string }[] {
  return document.sections.map((section, index) => {
    const heading = extractSectionHeadings(section.text)[0] ?? `Section ${index + 1}`
    const excerpt = section.text
      .split('\n')
      .filter((line) => line.trim().length > 0 && !line.startsWith('#'))
      .join(' ')
      .slice(0, EXCERPT_CHARACTERS)
    return { heading, excerpt }
  })
}

export function formatImageCredit(image: ImageDescriptor): string {
  const { name, profileUrl, site } = image.attribution
  return `Photo by [${name}](${profileUrl}) on [${site.name}](${site.url})`
}

/**
 * Never throws: when the model's suggestions are missing or invalid, images are spread
 * evenly instead.
 */
export async function placeImages({
  document,
  candidates,
  count,
  generator,
  logger,
}: {
  document: Document
  candidates: readonly ImageDescriptor[]
  count: number
  generator: TextGenerator | null
  logger?: DocsmithLogger
}): Promise<ImagePlacementResult> {
  const sectionCount = document.sections.length
  const placed = Math.min(Math.max(0, Math.trunc(count)), candidates.length, sectionCount)
  if (placed === 0) return { document, warnings: [], strategy: 'none' }

  const images = candidates.slice(0, placed)
  const warnings: string[] = []
  let positions: number[] | null = null

  if (generator) {
    try {
      const answer = await generator.generate(
        buildImagePlacementPrompt({ sections: describeSections(document), images }),
        PLACEMENT_MAX_TOKENS
      )
      positions = parsePlacements(answer, placed, sectionCount)
      if (!positions) warnings.push('Image placement suggestions were invalid; spreading evenly')
    } catch (error) {
      warnings.push(`Image placement failed (${getErrorMessage(error)}); spreading evenly`)
    }
  }
  logger?.getSubLogger({ name: 'images' }).debug(
    `placement strategy=${positions ? 'model' : 'fallback'} images=${placed}`
  )

  const strategy = positions ? 'model' : 'fallback'
  const finalPositions = positions ?? fallbackPositions(placed, sectionCount)
  const placements: PlacedImage[] = images
    .map((image, index) => ({ position: finalPositions[index] ?? sectionCount - 1, image }))
    .sort((a, b) => a.position - b.position)

  return {
    document: Object.freeze({
      ...document,
      images: Object.freeze(placements),
      imageCredits: Object.freeze(
        placements.map((placement) => formatImageCredit(placement.image))
      ),
    }),
    warnings,
    strategy,
  }
}

import type { Tone } from '../flags.js'
import type { Chunk } from './types.js'

export const RESEARCH_SYSTEM_PROMPT = [
  'You are a meticulous research writer.',
  'Follow the user instructions in <instructions> exactly.',
  'Use only facts found in <content>; never invent sources, numbers, or quotes.',
  'Write GitHub-flavored Markdown. Do not wrap the answer in a code fence.',
].join('\n')

const TONE_GUIDANCE: Record<Tone, string> = {
  default: 'Write in a clear, engaging, accessible voice for a curious reader.',
  professional:
    'Write in a formal, precise, professional register suitable for a technical report.',
}

export type NumberedSource = { number: number; title: string; url: string }

function formatSourceList(sources: readonly NumberedSource[]): string {
  return sources.map((source) => `[${source.number}] ${source.title} (${source.url})`).join('\n')
}

function buildTaggedPrompt({
  instructions,
  sources,
  content,
}: {
  instructions: string[]
  sources: readonly NumberedSource[]
  content: string
}): string {
  const parts = [`<instructions>\n${instructions.join('\n')}\n</instructions>`]
  if (sources.length > 0) parts.push(`<sources>\n${formatSourceList(sources)}\n</sources>`)
  parts.push(`<content>\n${content}\n</content>`)
  return parts.join('\n\n')
}

export function buildSectionPrompt({
  topic,
  chunk,
  chunkCount,
  sources,
  tone,
}: {
  topic: string
  chunk: Chunk
  chunkCount: number
  sources: readonly NumberedSource[]
  tone: Tone
}): string {
  return buildTaggedPrompt({
    instructions: [
      `Topic: ${topic}`,
      `This is part ${chunk.index + 1} of ${chunkCount} of the collected research material.`,
      'Turn the material into one or more document sections, each starting with a "## " heading.',
      'Preserve technical detail: keep code, commands, configuration, and figures verbatim in fenced code blocks where they appear.',
      'Cite every factual claim with the bracketed source number from <sources>, for example [1] or [1, 2].',
      'Do not add a document title, an introduction to the whole document, or a reference list.',
      TONE_GUIDANCE[tone],
    ],
    sources,
    content: chunk.text,
  })
}

export function buildSummaryPrompt({
  topic,
  content,
  sources,
  tone,
}: {
  topic: string
  content: string
  sources: readonly NumberedSource[]
  tone: Tone
}): string {
  return buildTaggedPrompt({
    instructions: [
      `Topic: ${topic}`,
      'Write a single cohesive summary of the research material, between 800 and 1000 words.',
      'Use a few "## " headings to organize it. Cover the key findings, points of disagreement, and practical takeaways.',
      'Cite claims with the bracketed source number from <sources>, for example [2].',
      'Do not add a document title or a reference list.',
      TONE_GUIDANCE[tone],
    ],
    sources,
    content,
  })
}

export function buildSnippetPrompt({
  topic,
  content,
  tone,
}: {
  topic: string
  content: string
  tone: Tone
}): string {
  return buildTaggedPrompt({
    instructions: [
      `Topic: ${topic}`,
      'Write 2 to 3 short paragraphs (at most 300 words in total) that capture the essence of the material.',
      'Plain prose only: no headings, lists, citations, or reference list.',
      TONE_GUIDANCE[tone],
    ],
    sources: [],
    content,
  })
}

export function buildImagePlacementPrompt({
  sections,
  images,
}: {
  sections: readonly { heading: string; excerpt: string }[]
  images: readonly { altText: string }[]
}): string {
  const sectionList = sections
    .map((section, index) => `Section ${index + 1}: ${section.heading}\n${section.excerpt}`)
    .join('\n\n')
  const imageList = images.map((image, index) => `Image ${index + 1}: ${image.altText}`).join('\n')
  return [
    '<instructions>',
    `Choose where to place ${images.length} image(s) in the document below.`,
    'Each image goes after exactly one section; use each section at most once.',
    'Answer with one line per image and nothing else, in this exact form:',
    'PLACEMENT 1: Section 2',
    '</instructions>',
    '',
    `<images>\n${imageList}\n</images>`,
    '',
    `<sections>\n${sectionList}\n</sections>`,
  ].join('\n')
}

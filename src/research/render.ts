import MarkdownIt from 'markdown-it'

import type { OutputFormat } from '../flags.js'
import { toAnchor } from './markdown.js'
import type { Document, PlacedImage } from './types.js'

function imagesAfter(images: readonly PlacedImage[], position: number): PlacedImage[] {
  return images.filter((placed) => placed.position === position)
}

function formatImage({ image }: PlacedImage): string {
  const alt = image.altText.replace(/[[\]]/g, '')
  return `![${alt}](${image.url})\n*Photo: ${image.attribution.name}*`
}

export function renderMarkdown(document: Document): string {
  const blocks: string[] = [`# ${document.title}`]

  if (document.tableOfContents.length > 0) {
    blocks.push(
      [
        '## Table of Contents',
        '',
        ...document.tableOfContents.map((entry) => `- [${entry.title}](#${entry.anchor})`),
      ].join('\n')
    )
  }

  document.sections.forEach((section, index) => {
    blocks.push(section.text)
    for (const placed of imagesAfter(document.images, index)) blocks.push(formatImage(placed))
  })

  if (document.references.length > 0) {
    blocks.push(
      [
        '## References',
        '',
        ...document.references.map(
          ({ number, source }) => `${number}. [${source.title}](${source.url})`
        ),
      ].join('\n')
    )
  }

  if (document.imageCredits.length > 0) {
    blocks.push(
      ['## Image Credits', '', ...document.imageCredits.map((credit) => `- ${credit}`)].join('\n')
    )
  }

  return `${blocks.join('\n\n')}\n`
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
}

function createMarkdownRenderer(widths: ReadonlyMap<string, number>): MarkdownIt {
  const md = new MarkdownIt({ html: false, linkify: true })
  const renderImage = md.renderer.rules.image
  md.renderer.rules.image = (tokens, index, options, env, self) => {
    const token = tokens[index]
    const width = token ? widths.get(token.attrGet('src') ?? '') : undefined
    if (token && width) token.attrSet('width', String(width))
    return renderImage
      ? renderImage(tokens, index, options, env, self)
      : self.renderToken(tokens, index, options)
  }
  // ids on h2 so the table of contents links resolve
  md.core.ruler.push('section_anchors', (state) => {
    const used = new Map<string, number>()
    state.tokens.forEach((token, index) => {
      if (token.type !== 'heading_open' || token.tag !== 'h2') return
      const base = toAnchor(state.tokens[index + 1]?.content ?? '')
      if (!base) return
      const count = used.get(base) ?? 0
      used.set(base, count + 1)
      token.attrSet('id', count === 0 ? base : `${base}-${count}`)
    })
  })
  return md
}

export function renderHtml(document: Document): string {
  const widths = new Map<string, number>()
  for (const { image } of document.images) {
    if (image.width) widths.set(image.url, image.width)
  }
  const body = createMarkdownRenderer(widths).render(renderMarkdown(document))
  return [
    '<!doctype html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${escapeHtml(document.title)}</title>`,
    '</head>',
    '<body>',
    '<article>',
    body.trimEnd(),
    '</article>',
    '</body>',
    '</html>',
    '',
  ].join('\n')
}

/**
 * Markdown syntax stripped for plain-text output; links keep their target in parentheses.
 */
export function stripMarkdown(text: string): string {
  return text
    .split('\n')
    .filter((line) => !/^\s*(```|~~~)/.test(line))
    .map((line) =>
      line
        .replace(/^#{1,6}\s+/, '')
        .replace(/!\[([^\]]*)\]\(([^)]*)\)/g, '[Image: $1]')
        .replace(/\[([^\]]+)\]\(([^)]+)\)/g, '$1 ($2)')
        .replace(/(\*\*|__)(.+?)\1/g, '$2')
        .replace(/(^|[^*\w])[*_]([^*_\n]+)[*_](?=[^*\w]|$)/g, '$1$2')
        .replace(/`([^`]+)`/g, '$1')
    )
    .join('\n')
}

export function renderText(document: Document): string {
  const blocks: string[] = [document.title, '='.repeat(document.title.length)]
  document.sections.forEach((section, index) => {
    blocks.push(stripMarkdown(section.text))
    for (const { image } of imagesAfter(document.images, index)) {
      blocks.push(`[Image: ${image.altText}] ${image.url}`)
    }
  })
  if (document.references.length > 0) {
    blocks.push(
      [
        'References',
        ...document.references.map(
          ({ number, source }) => `[${number}] ${source.title} - ${source.url}`
        ),
      ].join('\n')
    )
  }
  if (document.imageCredits.length > 0) {
    blocks.push(['Image Credits', ...document.imageCredits.map(stripMarkdown)].join('\n'))
  }
  return `${blocks.join('\n\n')}\n`
}

export function renderDocument(document: Document, format: OutputFormat): string {
  if (format === 'html') return renderHtml(document)
  if (format === 'text') return renderText(document)
  return renderMarkdown(document)
}

export type SerializedDocument = {
  title: string
  topic: string
  mode: Document['mode']
  tone: Document['tone']
  tableOfContents: { title: string; anchor: string; level: number }[]
  sections: { chunkIndex: number; text: string }[]
  references: { number: number; title: string; url: string }[]
  images: {
    position: number
    url: string
    altText: string
    width: number | null
    credit: string
  }[]
}

export function serializeDocument(document: Document): SerializedDocument {
  return {
    title: document.title,
    topic: document.topic,
    mode: document.mode,
    tone: document.tone,
    tableOfContents: document.tableOfContents.map((entry) => ({ ...entry })),
    sections: document.sections.map((section) => ({ ...section })),
    references: document.references.map((reference) => ({
      number: reference.number,
      title: reference.source.title,
      url: reference.source.url,
    })),
    images: document.images.map((placed, index) => ({
      position: placed.position,
      url: placed.image.url,
      altText: placed.image.altText,
      width: placed.image.width ?? null,
      credit: document.imageCredits[index] ?? '',
    })),
  }
}

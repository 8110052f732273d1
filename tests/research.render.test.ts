import { describe, expect, it } from 'vitest'

import {
  renderDocument,
  renderHtml,
  renderMarkdown,
  renderText,
  serializeDocument,
  stripMarkdown,
} from '../src/research/render.js'
import type { Document } from '../src/research/types.js'
import { source } from './helpers/research.js'

const lake = {
  id: 'lake',
  url: 'https://images.example/lake.jpg',
  altText: 'A lake',
  attribution: {
    name: 'Jo Doe',
    profileUrl: 'https://unsplash.com/@jodoe',
    site: { name: 'Unsplash', url: 'https://unsplash.com/' },
  },
}

const credit =
  'Photo by [Jo Doe](https://unsplash.com/@jodoe) on [Unsplash](https://unsplash.com/)'

const document: Document = {
  title: 'Test Topic',
  topic: 'test topic',
  mode: 'comprehensive',
  tone: 'default',
  sections: [
    { chunkIndex: 0, text: '## Alpha\nAlpha fact [1].' },
    { chunkIndex: 1, text: '## Beta\nBeta fact [2].' },
  ],
  tableOfContents: [
    { title: 'Alpha', anchor: 'alpha', level: 2 },
    { title: 'Beta', anchor: 'beta', level: 2 },
  ],
  references: [
    { number: 1, source: source(1) },
    { number: 2, source: source(2) },
  ],
  images: [{ position: 0, image: lake }],
  imageCredits: [credit],
}

describe('renderMarkdown', () => {
  it('lays out title, contents, sections, references, and credits', () => {
    expect(renderMarkdown(document)).toBe(
      [
        '# Test Topic',
        '',
        '## Table of Contents',
        '',
        '- [Alpha](#alpha)',
        '- [Beta](#beta)',
        '',
        '## Alpha',
        'Alpha fact [1].',
        '',
        '![A lake](https://images.example/lake.jpg)',
        '*Photo: Jo Doe*',
        '',
        '## Beta',
        'Beta fact [2].',
        '',
        '## References',
        '',
        '1. [Source 1](https://site1.example/page)',
        '2. [Source 2](https://site2.example/page)',
        '',
        '## Image Credits',
        '',
        `- ${credit}`,
        '',
      ].join('\n')
    )
  })

  it('omits empty parts', () => {
    const bare: Document = {
      ...document,
      tableOfContents: [],
      sections: [{ chunkIndex: 0, text: 'Just prose.' }],
      references: [],
      images: [],
      imageCredits: [],
    }
    expect(renderMarkdown(bare)).toBe('# Test Topic\n\nJust prose.\n')
  })
})

describe('renderHtml', () => {
  it('gives headings the anchors the table of contents links to', () => {
    const html = renderHtml(document)
    expect(html.startsWith('<!doctype html>\n<html lang="en">\n')).toBe(true)
    expect(html).toContain('<title>Test Topic</title>')
    expect(html).toContain('<a href="#alpha">Alpha</a>')
    expect(html).toContain('<h2 id="alpha">Alpha</h2>')
    expect(html).toContain('<h2 id="beta">Beta</h2>')
    expect(html).toContain('<img src="https://images.example/lake.jpg" alt="A lake">')
  })

  it('gives sized images their width', () => {
    const sized = { ...lake, url: 'https://images.example/lake.jpg?w=800', width: 800 }
    const html = renderHtml({ ...document, images: [{ position: 0, image: sized }] })
    expect(html).toContain(
      '<img src="https://images.example/lake.jpg?w=800" alt="A lake" width="800">'
    )
  })

  it('escapes the title', () => {
    const html = renderHtml({ ...document, title: 'A <b> & C' })
    expect(html).toContain('<title>A &lt;b&gt; &amp; C</title>')
  })
})

describe('renderText', () => {
  it('strips markdown and spells out links', () => {
    expect(renderText(document)).toBe(
      [
        'Test Topic',
        '==========',
        '',
        'Alpha',
        'Alpha fact [1].',
        '',
        '[Image: A lake] https://images.example/lake.jpg',
        '',
        'Beta',
        'Beta fact [2].',
        '',
        'References',
        '[1] Source 1 - https://site1.example/page',
        '[2] Source 2 - https://site2.example/page',
        '',
        'Image Credits',
        'Photo by Jo Doe (https://unsplash.com/@jodoe) on Unsplash (https://unsplash.com/)',
        '',
      ].join('\n')
    )
  })

  it('drops emphasis, code ticks, and fences', () => {
    expect(stripMarkdown('**Bold** and *soft* with `code`\n```\nraw\n```')).toBe(
      'Bold and soft with code\nraw'
    )
  })
})

describe('renderDocument', () => {
  it('picks the renderer by format', () => {
    expect(renderDocument(document, 'markdown')).toBe(renderMarkdown(document))
    expect(renderDocument(document, 'text')).toBe(renderText(document))
  })
})

describe('serializeDocument', () => {
  it('flattens references and images', () => {
    const serialized = serializeDocument(document)
    expect(serialized.references).toEqual([
      { number: 1, title: 'Source 1', url: 'https://site1.example/page' },
      { number: 2, title: 'Source 2', url: 'https://site2.example/page' },
    ])
    expect(serialized.images).toEqual([
      {
        position: 0,
        url: 'https://images.example/lake.jpg',
        altText: 'A lake',
        width: null,
        credit,
      },
    ])
  })
})

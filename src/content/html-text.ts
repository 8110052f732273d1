import { type CheerioAPI, load } from 'cheerio'

import { normalizeCandidate, normalizeForPrompt } from './cleaner.js'

const BLOCK_SELECTOR = 'h1, h2, h3, h4, h5, h6, p, li, pre, blockquote, td'
const NOISE_SELECTOR =
  'script, style, noscript, template, iframe, svg, canvas, nav, footer, header, aside, form, ' +
  '[role="navigation"], [aria-hidden="true"], .sidebar, .advertisement, .ads, .cookie-banner'
const MAIN_CONTAINER_SELECTORS = [
  'article',
  'main',
  '[role="main"]',
  '#content',
  '.content',
  '.post',
  '.article',
  '.entry-content',
]
const MIN_CONTAINER_CHARACTERS = 200
const HEADING_TAG_PATTERN = /^h([1-6])$/
const CHALLENGE_PATTERNS = [
  /<title>\s*just a moment\.\.\.\s*<\/title>/i,
  /<title>\s*attention required!/i,
  /id=["']challenge-form["']/i,
  /cf-browser-verification/i,
  /g-recaptcha/i,
]

export function isChallengeHtml(html: string): boolean {
  // interstitials only
  if (html.length > 50_000) return false
  return CHALLENGE_PATTERNS.some((pattern) => pattern.test(html))
}

/**
 * Renders block-level elements under `root` as markdown-ish text: headings keep their level,
 * list items become `- ` lines, `pre` blocks are fenced. Blocks nested in another block are
 * emitted once, by their outermost ancestor.
 */
export function htmlToStructuredText($: CheerioAPI, rootSelector: string): string {
  const root = $(rootSelector).first()
  const blocks: string[] = []

  root.find(BLOCK_SELECTOR).each((_, element) => {
    const node = $(element)
    if (node.parents(BLOCK_SELECTOR).length > 0) return
    const tag = element.tagName.toLowerCase()

    if (tag === 'pre') {
      const code = node.text().replace(/\s+$/, '')
      if (code.trim()) blocks.push(`\`\`\`\n${code}\n\`\`\``)
      return
    }

    const text = normalizeCandidate(node.text())
    if (!text) return
    const heading = HEADING_TAG_PATTERN.exec(tag)
    if (heading) {
      blocks.push(`${'#'.repeat(Number(heading[1]))} ${text}`)
    } else if (tag === 'li') {
      blocks.push(`- ${text}`)
    } else if (tag === 'blockquote') {
      blocks.push(`> ${text}`)
    } else {
      blocks.push(text)
    }
  })

  if (blocks.length === 0) {
    return root
      .text()
      .split('\n')
      .map((line) => line.replace(/\s+/g, ' ').trim())
      .filter((line) => line.length > 0)
      .join('\n')
  }
  return normalizeForPrompt(blocks.join('\n\n'))
}

export function extractTitle($: CheerioAPI): string | null {
  return (
    normalizeCandidate($('meta[property="og:title"]').attr('content')) ??
    normalizeCandidate($('title').first().text()) ??
    normalizeCandidate($('h1').first().text())
  )
}

export function extractLinks($: CheerioAPI, baseUrl: string): string[] {
  const seen = new Set<string>()
  $('a[href]').each((_, element) => {
    const href = $(element).attr('href')
    if (!href || href.startsWith('#') || href.startsWith('javascript:')) return
    let resolved: URL
    try {
      resolved = new URL(href, baseUrl)
    } catch {
      return
    }
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return
    resolved.hash = ''
    seen.add(resolved.toString())
  })
  return [...seen]
}

/**
 * Static parse: strips page chrome, then reads the first content container with enough
 * text (falling back to `body`).
 */
export function extractStaticContent(
  html: string,
  url: string
): { text: string; title: string | null; links: string[] } {
  const $ = load(html)
  const title = extractTitle($)
  const links = extractLinks($, url)
  $(NOISE_SELECTOR).remove()

  const container =
    MAIN_CONTAINER_SELECTORS.find((selector) => {
      const text = $(selector).first().text().replace(/\s+/g, ' ').trim()
      return text.length >= MIN_CONTAINER_CHARACTERS
    }) ?? 'body'
  return { text: htmlToStructuredText($, container), title, links }
}

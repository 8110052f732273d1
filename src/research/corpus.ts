import type { Corpus, PageSpan, RawPage } from './types.js'

export function formatPageBlock(page: RawPage): string {
  return `# ${page.title}\nSource: ${page.source.url}\n\n${page.text}\n\n`
}

/**
 * The corpus as one string, one labeled block per page in corpus order, plus where each
 * block sits in it.
 */
export function renderCorpusText(corpus: Pick<Corpus, 'pages'>): {
  text: string
  spans: PageSpan[]
} {
  const spans: PageSpan[] = []
  let text = ''
  for (const page of corpus.pages) {
    const block = formatPageBlock(page)
    spans.push({ source: page.source, start: text.length, end: text.length + block.length })
    text += block
  }
  return { text, spans }
}

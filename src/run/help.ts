import { Command, Option } from 'commander'

import { resolvePackageVersion } from '../version.js'
import { ansi, supportsColor } from './terminal.js'

function addModelOptions(command: Command): Command {
  return command
    .option(
      '--model <model>',
      'LLM model id: openai/..., anthropic/..., google/..., deepseek/..., openrouter/<author>/<slug>, ollama/<name>'
    )
    .option('--timeout <duration>', 'Timeout per LLM call: 60 (seconds), 60s, 2m, 5000ms', '60s')
    .option('--json', 'Print structured JSON instead of the rendered output', false)
    .option('--debug', 'Print progress and recovered failures to stderr', false)
}

function addDocumentOptions(command: Command): Command {
  return command
    .option('--summarize', 'Write an 800-1000 word summary instead of a full document', false)
    .option('--snippet', 'Write at most three short paragraphs', false)
    .option('--professional', 'Use a formal, professional tone', false)
    .option('--image <query>', 'Add stock photos matching this query (needs UNSPLASH_ACCESS_KEY)')
    .option('--image-count <n>', 'Number of photos to place (1-10)', '3')
    .option('--image-width <px>', 'Photo width requested from Unsplash (100-4000)', '800')
    .option('--format <format>', 'Output format: md, html, text', 'md')
    .option('--write', 'Write the document under <dataDir>/docs/ instead of stdout', false)
    .option('--output <path>', 'Write the document to this path (implies --write)')
}

function buildResearchCommand(): Command {
  const command = new Command('research')
    .description('Search the web, read the top sources, and write a cited document.')
    .argument('<query...>', 'What to research')
    .option('--depth <n>', 'Research depth 1-10: more sources and longer excerpts (default: 3)')
    .option('--max-pages <n>', 'Maximum pages kept in the corpus (default: depth + 2)')
    .addOption(
      new Option(
        '--search-engine <engine>',
        'Search backend: auto, duckduckgo (a), brave (b) (default: auto)'
      )
    )
    .option('--fallback-only', 'Skip rendering and article extraction; use plain HTML only', false)
  return addModelOptions(addDocumentOptions(command))
}

function buildScrapeCommand(): Command {
  const command = new Command('scrape')
    .description('Fetch pages (and same-site links) and store them under a topic.')
    .argument('<url...>', 'Pages to start from')
    .requiredOption('--topic <topic>', 'Topic the pages are stored under')
    .option('--depth <n>', 'Link-following depth 0-5 (default: 0, only the given URLs)')
    .option('--max-pages <n>', 'Maximum pages to store (default: 3)')
    .option('--fallback-only', 'Skip rendering and article extraction; use plain HTML only', false)
    .option('--timeout <duration>', 'Timeout per page fetch: 20 (seconds), 20s, 5000ms', '20s')
    .option('--json', 'Print structured JSON instead of a summary line', false)
    .option('--debug', 'Print progress and recovered failures to stderr', false)
  return command
}

function buildGenerateCommand(): Command {
  const command = new Command('generate')
    .description('Write a document from pages stored earlier with `scrape`.')
    .argument('<topic>', 'Topic used with `scrape --topic`')
    .option('--depth <n>', 'Corpus budget level 1-10 (default: 3)')
    .option('--max-pages <n>', 'Maximum stored pages to use (default: depth + 2)')
    .option('--raw', 'Merge the stored pages as they are, without the model', false)
  return addModelOptions(addDocumentOptions(command))
}

function buildAskCommand(): Command {
  return addModelOptions(
    new Command('ask').description('Ask the model a single question.').argument('<prompt...>')
  )
}

export function buildProgram(): Command {
  return new Command()
    .name('docsmith')
    .description('Research topics on the web and turn them into cited documents.')
    .version(resolvePackageVersion(), '-V, --version', 'Print version and exit')
    .addCommand(buildResearchCommand())
    .addCommand(buildScrapeCommand())
    .addCommand(buildGenerateCommand())
    .addCommand(buildAskCommand())
}

export function attachRichHelp(
  program: Command,
  env: Record<string, string | undefined>,
  stdout: NodeJS.WritableStream
) {
  const color = supportsColor(stdout, env)
  const heading = (text: string) => ansi('1;36', text, color)
  const cmd = (text: string) => ansi('1', text, color)
  const dim = (text: string) => ansi('2', text, color)

  program.addHelpText(
    'after',
    () => `
${heading('Examples')}
  ${cmd('docsmith research "rust async runtimes"')}
  ${cmd('docsmith research "rust async runtimes" --depth 5 --write')} ${dim('# saved under docs/research')}
  ${cmd('docsmith research "home espresso" --summarize --professional --format html')}
  ${cmd('docsmith research "alpine lakes" --image "alpine lake" --image-count 2')}
  ${cmd('docsmith scrape https://example.com/docs --topic example --depth 1 --max-pages 10')}
  ${cmd('docsmith generate example --snippet')}
  ${cmd('docsmith generate example --raw --format html')}
  ${cmd('docsmith ask "what is a monad?" --model anthropic/claude-3-5-haiku-latest')}

${heading('Env Vars')}
  OPENAI_API_KEY        optional (required for openai/... models)
  ANTHROPIC_API_KEY     optional (required for anthropic/... models)
  GEMINI_API_KEY        optional (required for google/... models)
  DEEPSEEK_API_KEY      optional (required for deepseek/... models)
  OPENROUTER_API_KEY    optional (required for openrouter/... models)
  OLLAMA_BASE_URL       optional (default: http://localhost:11434/v1)
  DOCSMITH_MODEL        optional (overrides the configured model)
  BRAVE_SEARCH_API_KEY  optional Brave search backend
  FIRECRAWL_API_KEY     optional rendered-page extraction
  UNSPLASH_ACCESS_KEY   optional (required for --image)

${heading('Config')}
  ~/.docsmith/config.json ${dim('(JSON5: model, providers, search, research, output, logging)')}
`
  )
}

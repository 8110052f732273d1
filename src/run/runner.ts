import { Command, CommanderError } from 'commander'

import { PipelineError } from '../research/errors.js'
import { type RunEnv, withRunContext } from './context.js'
import { runAskFlow } from './flows/ask.js'
import { runGenerateFlow } from './flows/generate.js'
import { runResearchFlow } from './flows/research.js'
import { runScrapeFlow } from './flows/scrape.js'
import { attachRichHelp, buildProgram } from './help.js'
import {
  readGenerateFlags,
  readModelFlags,
  readResearchFlags,
  readScrapeFlags,
} from './options.js'

const QUIET_EXIT_CODES = new Set(['commander.helpDisplayed', 'commander.version'])

function configureCommand(
  command: Command,
  { stdout, stderr }: Pick<RunEnv, 'stdout' | 'stderr'>
) {
  command.configureOutput({
    writeOut(str) {
      stdout.write(str)
    },
    writeErr(str) {
      stderr.write(str)
    },
  })
  command.exitOverride()
  for (const sub of command.commands) configureCommand(sub, { stdout, stderr })
}

export function formatCliFailure(error: unknown): string {
  if (error instanceof PipelineError) {
    const lines = [`Error (${error.stage}): ${error.message}`]
    if (error.remedy) lines.push(`Hint: ${error.remedy}`)
    return lines.join('\n')
  }
  if (error instanceof Error) return `Error: ${error.message}`
  return `Error: ${String(error)}`
}

function findCommand(program: Command, name: string): Command {
  const command = program.commands.find((candidate) => candidate.name() === name)
  if (!command) throw new Error(`Unknown command ${name}`)
  return command
}

function readArgs(command: Command): string[] {
  return command.args.filter((arg) => arg.length > 0)
}

/**
 * Parses `argv` (user arguments only) and runs one command. Rejects on failure; the caller
 * decides the exit code.
 */
export async function runCli(argv: string[], runEnv: RunEnv): Promise<void> {
  const program = buildProgram()
  configureCommand(program, runEnv)
  attachRichHelp(program, runEnv.env, runEnv.stdout)

  // commander passes the command itself as the last action argument
  const onRun = (name: string, run: (command: Command) => Promise<void>) => {
    findCommand(program, name).action(async (...args: unknown[]) => {
      const command = args.at(-1)
      if (!(command instanceof Command)) throw new Error(`Missing command context for ${name}`)
      await run(command)
    })
  }

  onRun('research', async (command) => {
    const flags = readResearchFlags(command.opts())
    await withRunContext(runEnv, flags, (context) =>
      runResearchFlow({ query: readArgs(command), flags, context })
    )
  })
  onRun('scrape', async (command) => {
    const flags = readScrapeFlags(command.opts())
    await withRunContext(runEnv, flags, (context) =>
      runScrapeFlow({ urls: readArgs(command), flags, context })
    )
  })
  onRun('generate', async (command) => {
    const flags = readGenerateFlags(command.opts())
    const topic = readArgs(command).join(' ')
    await withRunContext(runEnv, flags, (context) => runGenerateFlow({ topic, flags, context }))
  })
  onRun('ask', async (command) => {
    const flags = readModelFlags(command.opts())
    await withRunContext(runEnv, flags, (context) =>
      runAskFlow({ words: readArgs(command), flags, context })
    )
  })

  try {
    await program.parseAsync(argv, { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError && QUIET_EXIT_CODES.has(error.code)) return
    throw error
  }
}

#!/usr/bin/env node
import { CommanderError } from 'commander'

import { formatCliFailure, runCli } from './run/runner.js'

runCli(process.argv.slice(2), {
  env: process.env,
  fetch: globalThis.fetch.bind(globalThis),
  stdout: process.stdout,
  stderr: process.stderr,
}).catch((error: unknown) => {
  // commander already printed its own usage errors
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode || 1
    return
  }
  process.stderr.write(`${formatCliFailure(error)}\n`)
  process.exitCode = 1
})

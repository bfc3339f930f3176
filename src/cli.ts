#!/usr/bin/env node
import { CommanderError } from 'commander'

import { formatErrorMessage } from './errors.js'
import { runCli } from './run/runner.js'

runCli(process.argv.slice(2), {
  env: process.env,
  fetch: globalThis.fetch.bind(globalThis),
  stdout: process.stdout,
  stderr: process.stderr,
}).catch((error: unknown) => {
  if (error instanceof CommanderError) {
    // commander already printed its own message.
    process.exitCode = error.exitCode
    return
  }
  process.stderr.write(`✗ Error: ${formatErrorMessage(error)}\n`)
  process.exitCode = 1
})

#!/usr/bin/env node
import { formatCliError, runCli } from './run.js'

runCli(process.argv.slice(2), {
  env: process.env,
  stdout: process.stdout,
  stderr: process.stderr,
}).then(
  () => {
    process.exitCode = 0
  },
  (error: unknown) => {
    process.stderr.write(formatCliError(error))
    process.exitCode = 1
  }
)

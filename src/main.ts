#!/usr/bin/env node
import { runCli } from './cli'
import { logger } from './utils/logger'

runCli(process.argv.slice(2), {
  stdin: process.stdin,
  write: (text) => process.stdout.write(text),
  writeError: (text) => process.stderr.write(text),
}).then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    logger.error('Unexpected failure', err)
    process.exitCode = 1
  },
)

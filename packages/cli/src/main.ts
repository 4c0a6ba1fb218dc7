#!/usr/bin/env tsx
/* eslint no-console: "off" */

import { docopt } from 'docopt'
import { version } from '@automata-workbench/core'
import { ConfigError, USAGE, parseConfig, type CliConfig } from './config'
import { createLogger } from './logger'
import { run } from './run'

async function main(): Promise<number> {
  let config: CliConfig
  try {
    config = parseConfig(docopt(USAGE, { version }))
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message)
      return 1
    }
    throw err
  }

  const log = createLogger({ debugLog: config.debugLog })
  log.debug({ config }, 'starting')

  return run(
    config,
    {
      write: (text) => console.log(text),
      error: (text) => console.error(text),
    },
    log,
  )
}

main().then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    console.error(err)
    process.exitCode = 1
  },
)

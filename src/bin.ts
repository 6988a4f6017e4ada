#!/usr/bin/env node
// Must run before the default toolbelt reads its configuration.
import 'dotenv/config'

import { runCli } from './cli.js'
import { loadConfig } from './config/load.js'
import { errorMessage } from './core/errors.js'
import { createLogger } from './core/logger.js'
import { defaultToolbelt } from './core/toolbelt.js'

/** Loads configuration and tool modules, then runs the requested command. */
async function main(): Promise<void> {
  const config = loadConfig()
  const logger = createLogger(config.logLevel)

  logger.debug?.('startup.config', { modules: config.modules, onDuplicate: config.onDuplicate })

  process.exitCode = await runCli(process.argv.slice(2), {
    toolbelt: defaultToolbelt,
    config,
    logger,
    output: process.stdout
  })
}

main().catch((error: unknown) => {
  createLogger('error').error('fatal', { error: errorMessage(error) })
  process.exitCode = 1
})

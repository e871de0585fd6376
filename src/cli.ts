#!/usr/bin/env node
/**
 * Droplet Inventory CLI
 *
 * Dynamic inventory entry point: prints JSON on stdout, diagnostics on stderr.
 *
 * @license AGPL-3.0
 */

import { parseCliArgs } from './cli/args'
import { cmdHost } from './cli/commands/host'
import { cmdList } from './cli/commands/list'
import { createLogger } from './cli/logger'
import { prepareRun } from './cli/prepare'
import { DigitalOceanApiError } from './digitalocean/errors'

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    const run = await prepareRun(args, logger)
    const output =
      args.mode === 'host' && args.host !== undefined
        ? await cmdHost(args.host, run)
        : cmdList(run)
    process.stdout.write(`${output}\n`)
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (error instanceof DigitalOceanApiError && error.payload !== undefined) {
      logger.error(`Response: ${JSON.stringify(error.payload)}`)
    }
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})

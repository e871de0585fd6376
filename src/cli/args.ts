/**
 * CLI Argument Parsing
 *
 * Uses commander for the inventory script protocol: --list (default) or --host <address>.
 */

import { Command } from 'commander'
import { VERSION } from '../index'

export type InventoryMode = 'list' | 'host'

export interface CLIArgs {
  mode: InventoryMode
  host: string | undefined
  refreshCache: boolean
  cachePath: string | undefined
  cacheMaxAge: string | undefined
  clientId: string | undefined
  apiKey: string | undefined
  configFile: string | undefined
  quiet: boolean
  verbose: boolean
}

const DESCRIPTION = `Produce a host inventory from DigitalOcean droplets.

Hosts are grouped by droplet id, region and droplet name. Results are cached
in two files under --cache-path and reused until --cache-max-age expires.

Credentials are read from the config file, then DIGITALOCEAN_CLIENT_ID and
DIGITALOCEAN_API_KEY, then --client-id and --api-key (later sources win).

Examples:
  $ droplet-inventory --list
  $ droplet-inventory --host 203.0.113.10
  $ droplet-inventory --refresh-cache --cache-path /tmp/inventory --cache-max-age 300`

function createProgram(): Command {
  return new Command()
    .name('droplet-inventory')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    .option('--list', 'List droplets (default)')
    .option('--host <address>', 'Get all the variables about a specific droplet')
    .option('--cache-path <dir>', 'Path to the cache files (default: .)')
    .option('--cache-max-age <seconds>', 'Maximum age of the cached items (default: 0)')
    .option('--refresh-cache', 'Force refresh of cache by making API requests')
    .option('--client-id <id>', 'DigitalOcean client id')
    .option('--api-key <key>', 'DigitalOcean API key')
    .option('--config-file <path>', 'Config file path (or set DIGITALOCEAN_INVENTORY_CONFIG)')
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function buildCLIArgs(opts: Record<string, unknown>): CLIArgs {
  const host = optionalString(opts.host)
  return {
    mode: host !== undefined ? 'host' : 'list',
    host,
    refreshCache: opts.refreshCache === true,
    cachePath: optionalString(opts.cachePath),
    cacheMaxAge: optionalString(opts.cacheMaxAge),
    clientId: optionalString(opts.clientId),
    apiKey: optionalString(opts.apiKey),
    configFile: optionalString(opts.configFile),
    quiet: opts.quiet === true,
    verbose: opts.verbose === true
  }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program = createProgram()
  program.parse()
  return buildCLIArgs(program.opts())
}

/**
 * Parse CLI arguments from a user argv array (for testing).
 * With exitOnHelp false, commander errors throw instead of exiting.
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    program.exitOverride()
    program.configureOutput({ writeOut: () => {}, writeErr: () => {} })
  }

  program.parse(argv, { from: 'user' })
  return buildCLIArgs(program.opts())
}

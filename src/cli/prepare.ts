/**
 * Run Preparation
 *
 * Resolves settings, wires the client and cache, and decides whether this
 * run must refresh from the API before producing output.
 */

import { InventoryFileCache } from '../cache/filesystem'
import { createDigitalOceanClient } from '../digitalocean/client'
import type { FetchFn } from '../http'
import { type InventoryContext, refreshInventory } from '../inventory/refresh'
import type { InventorySnapshot } from '../types'
import type { CLIArgs } from './args'
import type { Logger } from './logger'
import { resolveSettings } from './settings'

export interface PreparedRun {
  readonly context: InventoryContext
  /** Set when this run refreshed; null when the cache was served as-is */
  readonly snapshot: InventorySnapshot | null
}

export interface PrepareOptions {
  /** Environment to read settings from (default: process.env) */
  readonly env?: NodeJS.ProcessEnv | undefined
  /** Fetch implementation for the API client */
  readonly fetch?: FetchFn | undefined
  /** API host override */
  readonly baseUrl?: string | undefined
}

export async function prepareRun(
  args: CLIArgs,
  logger: Logger,
  options: PrepareOptions = {}
): Promise<PreparedRun> {
  const settings = await resolveSettings({
    args: {
      clientId: args.clientId,
      apiKey: args.apiKey,
      cachePath: args.cachePath,
      cacheMaxAge: args.cacheMaxAge
    },
    configFile: args.configFile,
    env: options.env,
    logger
  })

  const context: InventoryContext = {
    client: createDigitalOceanClient({
      clientId: settings.clientId,
      apiKey: settings.apiKey,
      baseUrl: options.baseUrl,
      fetch: options.fetch
    }),
    cache: new InventoryFileCache({
      cachePath: settings.cachePath,
      maxAgeSeconds: settings.cacheMaxAge
    }),
    logger
  }

  if (args.refreshCache) {
    logger.verbose('Refresh requested, calling the API')
    return { context, snapshot: await refreshInventory(context) }
  }
  if (!context.cache.isValid()) {
    logger.verbose('Cache missing or expired, calling the API')
    return { context, snapshot: await refreshInventory(context) }
  }

  logger.verbose(`Using cached inventory from ${context.cache.inventoryPath}`)
  return { context, snapshot: null }
}

/**
 * Inventory Refresh
 *
 * One full cycle: list regions and droplets, rebuild, persist both artifacts.
 */

import type { InventoryFileCache } from '../cache/filesystem'
import type { Logger } from '../cli/logger'
import type { DigitalOceanClient } from '../digitalocean/client'
import { unwrap } from '../digitalocean/errors'
import type { InventorySnapshot } from '../types'
import { buildInventory, buildRegionMap } from './build'

export interface InventoryContext {
  readonly client: DigitalOceanClient
  readonly cache: InventoryFileCache
  readonly logger?: Logger | undefined
}

/**
 * Fetch everything from the API, rebuild the snapshot and write it to the cache.
 *
 * @throws DigitalOceanApiError when either listing call fails
 */
export async function refreshInventory(context: InventoryContext): Promise<InventorySnapshot> {
  const { client, cache, logger } = context

  const regions = unwrap(await client.listRegions())
  const droplets = unwrap(await client.listDroplets())
  logger?.verbose(`Fetched ${regions.length} regions and ${droplets.length} droplets`)

  const snapshot = buildInventory(droplets, buildRegionMap(regions))
  cache.write(snapshot)
  logger?.verbose(
    `Cached ${Object.keys(snapshot.index).length} hosts in ${Object.keys(snapshot.inventory).length} groups at ${cache.cachePath}`
  )

  return snapshot
}

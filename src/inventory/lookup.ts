/**
 * Single-Host Lookup
 */

import { unwrap } from '../digitalocean/errors'
import type { HostLookup, InventoryIndex } from '../types'
import { type InventoryContext, refreshInventory } from './refresh'

/**
 * Resolve an address to its full droplet record.
 *
 * Uses the given index, or the cached one when none (or an empty one) is
 * given. An address missing from the index forces one full refresh; if it is
 * still missing the host is reported as not found. The droplet itself is
 * always fetched live.
 */
export async function getHostInfo(
  host: string,
  context: InventoryContext,
  index?: InventoryIndex
): Promise<HostLookup> {
  let current = index && Object.keys(index).length > 0 ? index : context.cache.readIndex()

  if (!Object.hasOwn(current, host)) {
    context.logger?.verbose(`${host} not in index, refreshing`)
    current = (await refreshInventory(context)).index
  }

  const entry = Object.hasOwn(current, host) ? current[host] : undefined
  if (!entry) {
    context.logger?.verbose(`${host} not found after refresh`)
    return { found: false }
  }

  const [, dropletId] = entry
  const droplet = unwrap(await context.client.getDroplet(dropletId))
  return { found: true, droplet }
}

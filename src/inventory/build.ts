/**
 * Inventory Builder
 *
 * Projects a droplet listing into host groups plus an address index.
 * Pure: takes the listing, returns fresh structures.
 */

import {
  type DropletRecord,
  type Inventory,
  type InventoryIndex,
  type InventorySnapshot,
  type Region,
  type RegionMap,
  UNKNOWN_REGION
} from '../types'

/**
 * Map region ids to slugs. A region without a slug is labelled by its id.
 */
export function buildRegionMap(regions: readonly Region[]): RegionMap {
  const map = new Map<number, string>()
  for (const region of regions) {
    map.set(region.id, region.slug || String(region.id))
  }
  return map
}

/**
 * Append an address to a group, creating the group on first use.
 */
export function pushAddress(inventory: Inventory, key: string, address: string): void {
  const group = Object.hasOwn(inventory, key) ? inventory[key] : undefined
  if (group) {
    group.push(address)
  } else {
    inventory[key] = [address]
  }
}

/**
 * Build the inventory and index from a droplet listing.
 *
 * Each addressable droplet produces:
 * - index[address] = [region_id, id]
 * - inventory[id] = [address] (always a group of 1)
 * - address appended to inventory[region name] and inventory[droplet name]
 *
 * Droplets without an address are skipped entirely. Group order follows
 * the listing order.
 */
export function buildInventory(
  droplets: readonly DropletRecord[],
  regions: RegionMap
): InventorySnapshot {
  const inventory: Inventory = {}
  const index: InventoryIndex = {}

  for (const droplet of droplets) {
    const address = droplet.ip_address
    if (!address) continue

    const regionName = regions.get(droplet.region_id) ?? UNKNOWN_REGION

    index[address] = [droplet.region_id, droplet.id]
    inventory[String(droplet.id)] = [address]
    pushAddress(inventory, regionName, address)
    pushAddress(inventory, droplet.name, address)
  }

  return { inventory, index }
}

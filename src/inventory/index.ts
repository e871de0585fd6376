/**
 * Inventory Module
 */

export { buildInventory, buildRegionMap, pushAddress } from './build'
export { getHostInfo } from './lookup'
export { type InventoryContext, refreshInventory } from './refresh'

/**
 * Cache Module
 *
 * File-backed snapshots of the inventory and address index.
 */

export {
  INDEX_CACHE_FILE,
  INVENTORY_CACHE_FILE,
  type InventoryCacheOptions,
  InventoryFileCache
} from './filesystem'
export {
  CacheFormatError,
  deserialize,
  parseIndex,
  parseInventory,
  serialize
} from './serialize'

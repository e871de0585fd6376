/**
 * Droplet Inventory Library
 *
 * Build, cache and query a host inventory of DigitalOcean droplets.
 *
 * @license AGPL-3.0
 */

// Cache module
export {
  CacheFormatError,
  deserialize,
  INDEX_CACHE_FILE,
  INVENTORY_CACHE_FILE,
  type InventoryCacheOptions,
  InventoryFileCache,
  parseIndex,
  parseInventory,
  serialize
} from './cache/index'
// DigitalOcean API client
export {
  createDigitalOceanClient,
  DEFAULT_API_BASE_URL,
  type DigitalOceanClient,
  type DigitalOceanClientConfig,
  DigitalOceanApiError,
  isDropletRecord,
  isRegion,
  unwrap
} from './digitalocean/index'
// HTTP helpers
export { type FetchFn, type HttpResponse, httpFetch, UncachedHttpRequestError } from './http'
// Inventory module
export {
  buildInventory,
  buildRegionMap,
  getHostInfo,
  type InventoryContext,
  pushAddress,
  refreshInventory
} from './inventory/index'
// Types (type-only exports)
export type {
  ApiError,
  ApiErrorType,
  DropletRecord,
  HostLookup,
  Inventory,
  InventoryIndex,
  InventorySnapshot,
  Region,
  RegionMap,
  Result
} from './types'
export { UNKNOWN_REGION } from './types'

/**
 * Library version.
 */
export const VERSION = '0.1.0'

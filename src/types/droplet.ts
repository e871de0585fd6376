/**
 * Droplet & Inventory Types
 */

/**
 * A droplet as returned by the listing and get-by-id endpoints.
 * Fields beyond the four the inventory needs are kept as-is.
 */
export interface DropletRecord {
  readonly id: number
  readonly name: string
  readonly region_id: number
  /** Public address. Empty or null when the droplet is not addressable. */
  readonly ip_address?: string | null | undefined
  readonly [field: string]: unknown
}

export interface Region {
  readonly id: number
  readonly name?: string | undefined
  readonly slug?: string | null | undefined
}

/** Region id to slug */
export type RegionMap = ReadonlyMap<number, string>

/** Address to [regionId, dropletId] */
export type InventoryIndex = Record<string, [number, number]>

/** Group key (droplet id, region name or droplet name) to addresses */
export type Inventory = Record<string, string[]>

export interface InventorySnapshot {
  readonly inventory: Inventory
  readonly index: InventoryIndex
}

export type HostLookup =
  | { readonly found: true; readonly droplet: DropletRecord }
  | { readonly found: false }

export const UNKNOWN_REGION = 'Unknown Region'

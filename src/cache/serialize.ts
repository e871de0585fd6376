/**
 * Cache Serialization
 *
 * Deterministic JSON for the cache artifacts: two-space indent and
 * recursively sorted object keys, so unchanged data rewrites byte-identically.
 */

import type { Inventory, InventoryIndex } from '../types'

/**
 * Raised when a cache artifact is not valid JSON or has the wrong shape.
 */
export class CacheFormatError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CacheFormatError'
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Sort object keys recursively for deterministic JSON stringification.
 * Integer-like keys still come first: JS objects always enumerate them in
 * ascending numeric order.
 */
function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys)
  }
  if (!isRecord(value)) {
    return value
  }

  const sorted: Record<string, unknown> = {}
  for (const key of Object.keys(value).sort()) {
    sorted[key] = sortKeys(value[key])
  }
  return sorted
}

export function serialize(data: unknown): string {
  return JSON.stringify(sortKeys(data), null, 2)
}

/**
 * Parse cache text. Malformed content is a hard failure.
 */
export function deserialize(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new CacheFormatError(`Malformed cache content: ${message}`)
  }
}

export function parseInventory(value: unknown): Inventory {
  if (!isRecord(value)) {
    throw new CacheFormatError('Inventory cache must be a JSON object')
  }
  const inventory: Inventory = {}
  for (const [group, addresses] of Object.entries(value)) {
    if (!Array.isArray(addresses) || !addresses.every((a): a is string => typeof a === 'string')) {
      throw new CacheFormatError(`Inventory group "${group}" must be a list of addresses`)
    }
    inventory[group] = addresses
  }
  return inventory
}

export function parseIndex(value: unknown): InventoryIndex {
  if (!isRecord(value)) {
    throw new CacheFormatError('Index cache must be a JSON object')
  }
  const index: InventoryIndex = {}
  for (const [address, entry] of Object.entries(value)) {
    if (!Array.isArray(entry) || entry.length !== 2) {
      throw new CacheFormatError(`Index entry "${address}" must be [regionId, dropletId]`)
    }
    const [regionId, dropletId] = entry
    if (typeof regionId !== 'number' || typeof dropletId !== 'number') {
      throw new CacheFormatError(`Index entry "${address}" must hold numeric ids`)
    }
    index[address] = [regionId, dropletId]
  }
  return index
}

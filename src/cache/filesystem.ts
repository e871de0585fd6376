/**
 * Filesystem Inventory Cache
 *
 * Two artifacts in one directory: the serialized inventory and the
 * serialized address index. Freshness is decided from the inventory
 * file's modification time.
 */

import { existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import type { Inventory, InventoryIndex, InventorySnapshot } from '../types'
import { deserialize, parseIndex, parseInventory, serialize } from './serialize'

export const INVENTORY_CACHE_FILE = 'ansible-digitalocean.cache'
export const INDEX_CACHE_FILE = 'ansible-digitalocean.index'

export interface InventoryCacheOptions {
  /** Directory holding both artifacts (default: current directory) */
  readonly cachePath?: string | undefined
  /** Seconds a written cache stays valid (default: 0, always stale) */
  readonly maxAgeSeconds?: number | undefined
}

export class InventoryFileCache {
  readonly cachePath: string
  readonly maxAgeSeconds: number
  readonly inventoryPath: string
  readonly indexPath: string

  constructor(options: InventoryCacheOptions = {}) {
    this.cachePath = options.cachePath || '.'
    this.maxAgeSeconds = options.maxAgeSeconds ?? 0
    this.inventoryPath = join(this.cachePath, INVENTORY_CACHE_FILE)
    this.indexPath = join(this.cachePath, INDEX_CACHE_FILE)
  }

  /**
   * True only if the inventory artifact exists, its mtime plus max age is
   * still ahead of `now`, and the index artifact exists too.
   */
  isValid(now: number = Date.now()): boolean {
    if (!existsSync(this.inventoryPath)) {
      return false
    }
    const modifiedAt = statSync(this.inventoryPath).mtimeMs / 1000
    if (modifiedAt + this.maxAgeSeconds <= now / 1000) {
      return false
    }
    return existsSync(this.indexPath)
  }

  /**
   * Inventory artifact text, exactly as written.
   */
  readInventoryText(): string {
    return readFileSync(this.inventoryPath, 'utf-8')
  }

  readInventory(): Inventory {
    return parseInventory(deserialize(this.readInventoryText()))
  }

  readIndex(): InventoryIndex {
    return parseIndex(deserialize(readFileSync(this.indexPath, 'utf-8')))
  }

  /**
   * Write both artifacts, inventory first.
   */
  write(snapshot: InventorySnapshot): void {
    if (!existsSync(this.cachePath)) {
      mkdirSync(this.cachePath, { recursive: true })
    }
    writeFileSync(this.inventoryPath, serialize(snapshot.inventory))
    writeFileSync(this.indexPath, serialize(snapshot.index))
  }
}

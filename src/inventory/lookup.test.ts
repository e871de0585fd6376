import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { InventoryFileCache } from '../cache/filesystem'
import { createDigitalOceanClient } from '../digitalocean/client'
import { DigitalOceanApiError } from '../digitalocean/errors'
import { createDroplet, createFakeApi, type FakeApi, type FakeApiState, jsonResponse } from '../test-support'
import { getHostInfo } from './lookup'
import { type InventoryContext, refreshInventory } from './refresh'

describe('inventory refresh and lookup', () => {
  let testDir: string
  let state: FakeApiState
  let api: FakeApi
  let context: InventoryContext

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'droplet-inventory-lookup-'))
    state = {
      regions: [{ id: 5, slug: 'nyc1' }],
      droplets: [
        createDroplet({ id: 1, name: 'web1', region_id: 5, ip_address: '1.2.3.4' }),
        createDroplet({ id: 2, name: 'web2', region_id: 5, ip_address: '' })
      ]
    }
    api = createFakeApi(state)
    context = {
      client: createDigitalOceanClient({ clientId: 'c', apiKey: 'k', fetch: api.fetch }),
      cache: new InventoryFileCache({ cachePath: testDir, maxAgeSeconds: 60 })
    }
  })

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true })
    }
  })

  describe('refreshInventory', () => {
    it('builds the snapshot and writes both artifacts', async () => {
      const snapshot = await refreshInventory(context)

      expect(snapshot.inventory).toEqual({
        '1': ['1.2.3.4'],
        nyc1: ['1.2.3.4'],
        web1: ['1.2.3.4']
      })
      expect(snapshot.index).toEqual({ '1.2.3.4': [5, 1] })
      expect(api.paths()).toEqual(['regions', 'droplets'])
      expect(readFileSync(context.cache.indexPath, 'utf-8')).toBe(
        '{\n  "1.2.3.4": [\n    5,\n    1\n  ]\n}'
      )
      expect(context.cache.isValid()).toBe(true)
    })

    it('throws and writes nothing when a listing call fails', async () => {
      state.overrides = {
        droplets: jsonResponse(200, { status: 'ERROR', error_message: 'Invalid API key' })
      }

      await expect(refreshInventory(context)).rejects.toBeInstanceOf(DigitalOceanApiError)
      expect(existsSync(context.cache.inventoryPath)).toBe(false)
    })
  })

  describe('getHostInfo', () => {
    it('fetches the droplet for an indexed address', async () => {
      const { index } = await refreshInventory(context)

      const lookup = await getHostInfo('1.2.3.4', context, index)

      expect(lookup).toEqual({ found: true, droplet: state.droplets[0] })
      expect(api.paths()).toEqual(['regions', 'droplets', 'droplets/1'])
    })

    it('loads the index from the cache when none is given', async () => {
      await refreshInventory(context)

      const lookup = await getHostInfo('1.2.3.4', context)

      expect(lookup.found).toBe(true)
      expect(api.paths()).toEqual(['regions', 'droplets', 'droplets/1'])
    })

    it('loads the index from the cache when the given one is empty', async () => {
      await refreshInventory(context)

      const lookup = await getHostInfo('1.2.3.4', context, {})

      expect(lookup.found).toBe(true)
      expect(api.paths()).toEqual(['regions', 'droplets', 'droplets/1'])
    })

    it('refreshes once when the address is missing and finds new droplets', async () => {
      await refreshInventory(context)
      state.droplets.push(createDroplet({ id: 3, name: 'web3', region_id: 5, ip_address: '9.9.9.9' }))

      const lookup = await getHostInfo('9.9.9.9', context)

      expect(lookup).toEqual({ found: true, droplet: state.droplets[2] })
      expect(api.paths()).toEqual(['regions', 'droplets', 'regions', 'droplets', 'droplets/3'])
      expect(context.cache.readIndex()).toEqual({ '1.2.3.4': [5, 1], '9.9.9.9': [5, 3] })
    })

    it('reports not found when a refresh does not surface the address', async () => {
      await refreshInventory(context)

      const lookup = await getHostInfo('203.0.113.7', context)

      expect(lookup).toEqual({ found: false })
      expect(api.paths()).toEqual(['regions', 'droplets', 'regions', 'droplets'])
    })

    it('does not match inherited property names', async () => {
      const { index } = await refreshInventory(context)

      const lookup = await getHostInfo('toString', context, index)

      expect(lookup).toEqual({ found: false })
    })

    it('propagates a failing get-by-id call', async () => {
      const { index } = await refreshInventory(context)
      state.overrides = { 'droplets/1': jsonResponse(200, { status: 'ERROR' }) }

      await expect(getHostInfo('1.2.3.4', context, index)).rejects.toThrow(
        'DigitalOcean API returned status ERROR'
      )
    })
  })
})

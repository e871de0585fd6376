import { describe, expect, it } from 'vitest'
import { createDroplet } from '../test-support'
import { UNKNOWN_REGION } from '../types'
import { buildInventory, buildRegionMap, pushAddress } from './build'

describe('buildRegionMap', () => {
  it('maps region ids to slugs', () => {
    const map = buildRegionMap([
      { id: 5, name: 'New York 1', slug: 'nyc1' },
      { id: 7, name: 'Amsterdam 2', slug: 'ams2' }
    ])
    expect(map.get(5)).toBe('nyc1')
    expect(map.get(7)).toBe('ams2')
  })

  it('falls back to the id when a region has no slug', () => {
    const map = buildRegionMap([
      { id: 3, name: 'San Francisco 1', slug: null },
      { id: 4, slug: '' }
    ])
    expect(map.get(3)).toBe('3')
    expect(map.get(4)).toBe('4')
  })
})

describe('pushAddress', () => {
  it('creates a group on first use and appends afterwards', () => {
    const inventory: Record<string, string[]> = {}
    pushAddress(inventory, 'web', '10.0.0.1')
    pushAddress(inventory, 'web', '10.0.0.2')
    expect(inventory).toEqual({ web: ['10.0.0.1', '10.0.0.2'] })
  })

  it('treats inherited property names as new groups', () => {
    const inventory: Record<string, string[]> = {}
    pushAddress(inventory, 'constructor', '10.0.0.1')
    expect(inventory.constructor).toEqual(['10.0.0.1'])
  })
})

describe('buildInventory', () => {
  it('groups an addressable droplet by id, region and name', () => {
    const droplets = [
      createDroplet({ id: 1, name: 'web1', region_id: 5, ip_address: '1.2.3.4' }),
      createDroplet({ id: 2, name: 'web2', region_id: 5, ip_address: '' })
    ]
    const { inventory, index } = buildInventory(droplets, new Map([[5, 'nyc1']]))

    expect(inventory).toEqual({
      '1': ['1.2.3.4'],
      nyc1: ['1.2.3.4'],
      web1: ['1.2.3.4']
    })
    expect(index).toEqual({ '1.2.3.4': [5, 1] })
  })

  it('skips droplets with a null or missing address', () => {
    const droplets = [
      createDroplet({ id: 3, name: 'db', ip_address: null }),
      createDroplet({ id: 4, name: 'cache', ip_address: undefined })
    ]
    const { inventory, index } = buildInventory(droplets, new Map([[1, 'nyc1']]))

    expect(inventory).toEqual({})
    expect(index).toEqual({})
  })

  it('uses the Unknown Region group for unmapped region ids', () => {
    const droplets = [createDroplet({ id: 8, name: 'lb', region_id: 9, ip_address: '5.6.7.8' })]
    const { inventory } = buildInventory(droplets, new Map([[5, 'nyc1']]))

    expect(inventory[UNKNOWN_REGION]).toEqual(['5.6.7.8'])
    expect(UNKNOWN_REGION).toBe('Unknown Region')
  })

  it('keeps listing order within shared groups', () => {
    const droplets = [
      createDroplet({ id: 10, name: 'web', region_id: 5, ip_address: '10.0.0.3' }),
      createDroplet({ id: 11, name: 'web', region_id: 5, ip_address: '10.0.0.1' }),
      createDroplet({ id: 12, name: 'web', region_id: 5, ip_address: '10.0.0.2' })
    ]
    const { inventory } = buildInventory(droplets, new Map([[5, 'nyc1']]))

    expect(inventory.web).toEqual(['10.0.0.3', '10.0.0.1', '10.0.0.2'])
    expect(inventory.nyc1).toEqual(['10.0.0.3', '10.0.0.1', '10.0.0.2'])
  })

  it('lets the last droplet win when two share an address', () => {
    const droplets = [
      createDroplet({ id: 1, name: 'old', region_id: 5, ip_address: '10.0.0.9' }),
      createDroplet({ id: 2, name: 'new', region_id: 6, ip_address: '10.0.0.9' })
    ]
    const { inventory, index } = buildInventory(
      droplets,
      new Map([
        [5, 'nyc1'],
        [6, 'sfo1']
      ])
    )

    expect(index).toEqual({ '10.0.0.9': [6, 2] })
    expect(inventory['1']).toEqual(['10.0.0.9'])
    expect(inventory['2']).toEqual(['10.0.0.9'])
  })

  it('resets the id group when an id repeats', () => {
    const droplets = [
      createDroplet({ id: 1, name: 'a', region_id: 5, ip_address: '10.0.0.1' }),
      createDroplet({ id: 1, name: 'a', region_id: 5, ip_address: '10.0.0.2' })
    ]
    const { inventory } = buildInventory(droplets, new Map([[5, 'nyc1']]))

    expect(inventory['1']).toEqual(['10.0.0.2'])
    expect(inventory.a).toEqual(['10.0.0.1', '10.0.0.2'])
  })

  it('puts every addressable droplet under its id, region and name', () => {
    const regions = new Map([
      [1, 'nyc1'],
      [2, 'ams2']
    ])
    const droplets = [
      createDroplet({ id: 21, name: 'api', region_id: 1 }),
      createDroplet({ id: 22, name: 'api', region_id: 2 }),
      createDroplet({ id: 23, name: 'worker', region_id: 3 }),
      createDroplet({ id: 24, name: 'offline', region_id: 1, ip_address: '' })
    ]
    const { inventory, index } = buildInventory(droplets, regions)

    for (const droplet of droplets) {
      const address = droplet.ip_address
      if (!address) {
        expect(inventory[String(droplet.id)]).toBeUndefined()
        continue
      }
      const region = regions.get(droplet.region_id) ?? UNKNOWN_REGION
      expect(inventory[String(droplet.id)]).toEqual([address])
      expect(inventory[region]).toContain(address)
      expect(inventory[droplet.name]).toContain(address)
      expect(index[address]).toEqual([droplet.region_id, droplet.id])
    }
    expect(Object.keys(index)).toHaveLength(3)
  })
})

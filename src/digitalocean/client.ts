/**
 * DigitalOcean API Client
 *
 * Thin client over the three endpoints the inventory needs. Credentials travel
 * as query parameters; every response carries a `status` field that must be "OK".
 */

import {
  emptyResponseError,
  type FetchFn,
  type HttpResponse,
  handleHttpError,
  handleNetworkError,
  httpFetch
} from '../http'
import type { DropletRecord, Region, Result } from '../types'

export const DEFAULT_API_BASE_URL = 'https://api.digitalocean.com'

export interface DigitalOceanClientConfig {
  readonly clientId: string
  readonly apiKey: string
  /** Override the API host (default: https://api.digitalocean.com) */
  readonly baseUrl?: string | undefined
  /** Fetch implementation, injected by tests */
  readonly fetch?: FetchFn | undefined
}

export interface DigitalOceanClient {
  listRegions(): Promise<Result<Region[]>>
  listDroplets(): Promise<Result<DropletRecord[]>>
  getDroplet(id: number): Promise<Result<DropletRecord>>
}

type ApiBody = Record<string, unknown>

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isRegion(value: unknown): value is Region {
  if (!isRecord(value) || typeof value.id !== 'number') return false
  if (value.name !== undefined && typeof value.name !== 'string') return false
  const slug = value.slug
  return slug === undefined || slug === null || typeof slug === 'string'
}

export function isDropletRecord(value: unknown): value is DropletRecord {
  if (!isRecord(value)) return false
  if (typeof value.id !== 'number' || typeof value.name !== 'string') return false
  if (typeof value.region_id !== 'number') return false
  const ip = value.ip_address
  return ip === undefined || ip === null || typeof ip === 'string'
}

function statusError(body: ApiBody): Result<never> {
  const detail = typeof body.error_message === 'string' ? `: ${body.error_message}` : ''
  return {
    ok: false,
    error: {
      type: 'api_status',
      message: `DigitalOcean API returned status ${String(body.status)}${detail}`,
      payload: body
    }
  }
}

function pickList<T>(
  body: ApiBody,
  field: string,
  guard: (value: unknown) => value is T
): Result<T[]> {
  const list = body[field]
  if (!Array.isArray(list)) {
    return emptyResponseError(`missing "${field}" list`)
  }
  const items: T[] = []
  for (const item of list) {
    if (!guard(item)) {
      return emptyResponseError(`unexpected entry in "${field}": ${JSON.stringify(item)}`)
    }
    items.push(item)
  }
  return { ok: true, value: items }
}

/**
 * Create a client bound to one set of credentials.
 */
export function createDigitalOceanClient(config: DigitalOceanClientConfig): DigitalOceanClient {
  const baseUrl = (config.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '')
  const fetchFn = config.fetch ?? httpFetch

  async function request(path: string): Promise<Result<ApiBody>> {
    const params = new URLSearchParams({ client_id: config.clientId, api_key: config.apiKey })
    const url = `${baseUrl}/${path}?${params.toString()}`

    let response: HttpResponse
    try {
      response = await fetchFn(url)
    } catch (error) {
      return handleNetworkError(error)
    }

    if (!response.ok) {
      return handleHttpError(response)
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      return emptyResponseError(`body is not JSON (${message})`)
    }

    if (!isRecord(body)) {
      return emptyResponseError('body is not an object')
    }
    if (body.status !== 'OK') {
      return statusError(body)
    }
    return { ok: true, value: body }
  }

  return {
    async listRegions() {
      const result = await request('regions')
      if (!result.ok) return result
      return pickList(result.value, 'regions', isRegion)
    },

    async listDroplets() {
      const result = await request('droplets')
      if (!result.ok) return result
      return pickList(result.value, 'droplets', isDropletRecord)
    },

    async getDroplet(id: number) {
      const result = await request(`droplets/${id}`)
      if (!result.ok) return result
      const droplet = result.value.droplet
      if (!isDropletRecord(droplet)) {
        return emptyResponseError(`missing "droplet" for id ${id}`)
      }
      return { ok: true, value: droplet }
    }
  }
}

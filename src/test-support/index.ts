/**
 * Test Support Module
 *
 * An in-process stand-in for the DigitalOcean API plus record builders.
 */

import type { FetchFn, HttpResponse } from '../http'
import type { DropletRecord, Region } from '../types'

/**
 * Create a DropletRecord with default values for testing.
 */
export function createDroplet(
  overrides: Partial<DropletRecord> & { id: number; name: string }
): DropletRecord {
  return {
    region_id: 1,
    ip_address: `10.0.0.${overrides.id}`,
    image_id: 100,
    size_id: 66,
    status: 'active',
    ...overrides
  }
}

/**
 * Build an HttpResponse around a JSON body.
 */
export function jsonResponse(
  status: number,
  body: unknown,
  headers: Record<string, string> = {}
): HttpResponse {
  const text = typeof body === 'string' ? body : JSON.stringify(body)
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: {
      get: (name: string) => headers[name.toLowerCase()] ?? null
    },
    text: async () => text,
    json: async () => JSON.parse(text)
  }
}

export interface FakeApiState {
  regions: Region[]
  droplets: DropletRecord[]
  /** Canned responses keyed by path (e.g. "regions"), checked first */
  overrides?: Record<string, HttpResponse>
}

export interface FakeApi {
  readonly fetch: FetchFn
  /** Every requested URL, in order */
  readonly requests: URL[]
  /** Requested paths without the leading slash, in order */
  paths(): string[]
}

/**
 * Serve /regions, /droplets and /droplets/{id} from mutable state.
 */
export function createFakeApi(state: FakeApiState): FakeApi {
  const requests: URL[] = []

  const fetch: FetchFn = async (url: string) => {
    const parsed = new URL(url)
    requests.push(parsed)
    const path = parsed.pathname.replace(/^\/+/, '')

    const override = state.overrides?.[path]
    if (override) {
      return override
    }
    if (path === 'regions') {
      return jsonResponse(200, { status: 'OK', regions: state.regions })
    }
    if (path === 'droplets') {
      return jsonResponse(200, { status: 'OK', droplets: state.droplets })
    }
    const match = path.match(/^droplets\/(\d+)$/)
    if (match) {
      const droplet = state.droplets.find((d) => String(d.id) === match[1])
      if (droplet) {
        return jsonResponse(200, { status: 'OK', droplet })
      }
      return jsonResponse(200, { status: 'ERROR', error_message: 'Droplet not found' })
    }
    return jsonResponse(404, 'Not found')
  }

  return {
    fetch,
    requests,
    paths: () => requests.map((u) => u.pathname.replace(/^\/+/, ''))
  }
}

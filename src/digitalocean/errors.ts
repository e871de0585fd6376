import type { ApiError, Result } from '../types'

/**
 * Raised when an API call fails. Carries the raw response body when the
 * API itself reported the failure.
 */
export class DigitalOceanApiError extends Error {
  readonly type: ApiError['type']
  readonly payload: unknown

  constructor(error: ApiError) {
    super(error.message)
    this.name = 'DigitalOceanApiError'
    this.type = error.type
    this.payload = error.payload
  }
}

/**
 * Return the value of a successful result, throw for a failed one.
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new DigitalOceanApiError(result.error)
  }
  return result.value
}

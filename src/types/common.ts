/**
 * Common Types
 *
 * Shared types used across multiple modules: Result and API errors.
 */

// Result Types
export type ApiErrorType = 'auth' | 'rate_limit' | 'network' | 'invalid_response' | 'api_status'

export interface ApiError {
  readonly type: ApiErrorType
  readonly message: string
  readonly retryAfter?: number | undefined
  /** Raw response body, kept for errors reported by the API itself */
  readonly payload?: unknown
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ApiError }

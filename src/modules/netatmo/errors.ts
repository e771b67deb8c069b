import axios from 'axios'
import { NetatmoErrorBodySchema } from './schema'

/**
 * Vendor error codes that mean the access token itself was refused.
 * 2 = invalid access token, 3 = access token expired.
 */
const TOKEN_ERROR_CODES = new Set([2, 3])

/**
 * Error surfaced by the vendor API (or by the transport in front of it).
 * `statusCode` is the vendor's HTTP status, forwarded as-is by the REST layer.
 */
export class NetatmoApiError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    readonly code?: number | string
  ) {
    super(message)
    this.name = 'NetatmoApiError'
  }

  get isAuthFailure(): boolean {
    if (this.statusCode === 401) return true
    return this.statusCode === 403 && typeof this.code === 'number' && TOKEN_ERROR_CODES.has(this.code)
  }
}

/**
 * Rejected input, raised before any request goes out.
 */
export class InvalidParameterError extends Error {
  readonly statusCode = 400

  constructor(message: string) {
    super(message)
    this.name = 'InvalidParameterError'
  }
}

/**
 * Convert whatever axios threw into a NetatmoApiError.
 */
export function toNetatmoApiError(error: unknown, method: string, endpoint: string): NetatmoApiError {
  if (error instanceof NetatmoApiError) return error

  if (axios.isAxiosError(error)) {
    const response = error.response
    if (!response) {
      const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT'
      return new NetatmoApiError(
        `${method} ${endpoint} failed: ${error.message}`,
        timedOut ? 504 : 502,
        error.code
      )
    }

    const body = NetatmoErrorBodySchema.safeParse(response.data)
    if (body.success) {
      const vendorError = body.data.error
      if (typeof vendorError === 'string') {
        return new NetatmoApiError(body.data.error_description ?? vendorError, response.status, vendorError)
      }
      return new NetatmoApiError(vendorError.message, response.status, vendorError.code)
    }

    return new NetatmoApiError(
      response.statusText || `${method} ${endpoint} failed with status ${response.status}`,
      response.status
    )
  }

  const errorMessage = error instanceof Error ? error.message : String(error)
  return new NetatmoApiError(`${method} ${endpoint} failed: ${errorMessage}`, 502)
}

import type { ErrorCode, ErrorInfo } from '../types/scan.ts'

/**
 * Base class for every failure the scan engine raises on purpose.
 * `code` is what lands in a per-company error slot.
 */
export class ScanError extends Error {
  code: ErrorCode
  details?: unknown

  constructor(message: string, code: ErrorCode, details?: unknown) {
    super(message)
    this.name = 'ScanError'
    this.code = code
    this.details = details
  }
}

/** Malformed company number or missing credential */
export class InvalidInputError extends ScanError {
  constructor(message: string, details?: unknown) {
    super(message, 'invalid_input', details)
    this.name = 'InvalidInputError'
  }
}

export class NotFoundError extends ScanError {
  resource: string

  constructor(resource: string, details?: unknown) {
    super(`Not found: ${resource}`, 'not_found', details)
    this.name = 'NotFoundError'
    this.resource = resource
  }
}

export class RateLimitExceededError extends ScanError {
  resetAt: Date

  constructor(resetAt: Date) {
    super(`Rate limit budget exhausted until ${resetAt.toISOString()}`, 'rate_limited')
    this.name = 'RateLimitExceededError'
    this.resetAt = resetAt
  }
}

export class UpstreamUnavailableError extends ScanError {
  statusCode?: number
  attempts: number

  constructor(message: string, attempts: number, statusCode?: number) {
    super(message, 'upstream_unavailable')
    this.name = 'UpstreamUnavailableError'
    this.statusCode = statusCode
    this.attempts = attempts
  }
}

export class ParseError extends ScanError {
  constructor(message: string, details?: unknown) {
    super(message, 'parse_error', details)
    this.name = 'ParseError'
  }
}

export class CacheUnavailableError extends ScanError {
  constructor(message: string, details?: unknown) {
    super(message, 'cache_unavailable', details)
    this.name = 'CacheUnavailableError'
  }
}

export class ScanCancelledError extends ScanError {
  constructor(message = 'Scan cancelled') {
    super(message, 'cancelled')
    this.name = 'ScanCancelledError'
  }
}

/** Throws ScanCancelledError when the caller's signal has fired */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new ScanCancelledError()
  }
}

export function isCancellation(error: unknown): boolean {
  if (error instanceof ScanCancelledError) return true
  return error instanceof Error && error.name === 'AbortError'
}

export function toErrorInfo(error: unknown): ErrorInfo {
  if (error instanceof ScanError) {
    return { code: error.code, message: error.message }
  }
  if (isCancellation(error)) {
    return { code: 'cancelled', message: 'Scan cancelled' }
  }
  return {
    code: 'internal',
    message: error instanceof Error ? error.message : 'Unknown error',
  }
}

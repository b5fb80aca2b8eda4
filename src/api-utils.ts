// Shared error types and boundary helpers for mailmirror.
// Retry logic for rate limit errors and a bounded concurrency helper used by
// the Gmail gateway, plus the storage boundary used by the cache store.
//
// Errors follow the errore pattern (errors as values):
// - Gateway and cache methods return error instances instead of throwing
// - Callers narrow with instanceof, no try/catch or string matching needed
// - See https://errore.org/ for the philosophy

import * as errore from 'errore'

const MAX_CONCURRENCY = 10

/** Exclude Error subtypes from a union. Used by mapConcurrent to strip
 *  error return types from the success array. */
type ExcludeError<T> = T extends Error ? never : T

/** Extract Error subtypes from a union. Used by mapConcurrent for the error branch. */
type ExtractError<T> = T extends Error ? T : never

function isErrorValue<R>(value: R): value is Extract<R, Error> {
  return value instanceof Error
}

/** Run promises with bounded concurrency.
 *  Error-aware: if any callback returns an Error instance, remaining work is
 *  aborted and that error is returned as a value.
 *  Callbacks should return Error for fatal failures (auth) and null for skip. */
export async function mapConcurrent<T, R>(
  items: T[],
  fn: (item: T) => Promise<R>,
  concurrency = MAX_CONCURRENCY,
): Promise<ExcludeError<R>[] | ExtractError<R>> {
  const results: ExcludeError<R>[] = []
  let index = 0
  let fatalError: ExtractError<R> | null = null

  async function worker() {
    while (index < items.length && !fatalError) {
      const i = index++
      const item = items[i]
      if (item === undefined) continue
      const result = await fn(item)
      if (isErrorValue(result)) {
        fatalError = result as ExtractError<R>
        return
      }
      results[i] = result as ExcludeError<R>
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => worker())
  await Promise.all(workers)
  if (fatalError) return fatalError
  return results
}

/** Retry for rate limit errors (429 and 403 quota errors) with exponential backoff. */
export async function withRetry<T>(fn: () => Promise<T>, maxAttempts = 5, delayMs = 2000): Promise<T> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn()
    } catch (err) {
      if (!isRateLimitError(err) || attempt === maxAttempts) throw err
      const wait = delayMs * Math.pow(2, attempt - 1)
      await new Promise((r) => setTimeout(r, wait))
    }
  }
  throw new Error('unreachable')
}

// ---------------------------------------------------------------------------
// Tagged errors (errore pattern: errors as values, not exceptions)
// ---------------------------------------------------------------------------

/** Returned when authentication fails (expired token, revoked access, missing credentials).
 *  Never retried by the core; surfaced to the caller as-is. */
export class AuthError extends errore.createTaggedError({
  name: 'AuthError',
  message: 'Authentication failed for $account: $reason',
}) {}

/** Returned when a requested remote resource doesn't exist. */
export class NotFoundError extends errore.createTaggedError({
  name: 'NotFoundError',
  message: '$resource not found',
}) {}

/** Returned when a non-auth remote call fails. */
export class ApiError extends errore.createTaggedError({
  name: 'ApiError',
  message: 'API call failed: $reason',
}) {}

/** Returned when a SQLite read or write fails. Recoverable by retrying the operation. */
export class StorageError extends errore.createTaggedError({
  name: 'StorageError',
  message: 'Cache $operation failed: $reason',
}) {}

/** Returned when config.json or a credentials file fails validation. */
export class ConfigError extends errore.createTaggedError({
  name: 'ConfigError',
  message: 'Invalid $file: $reason',
}) {}

/** The error kinds a remote call can produce. */
export type RemoteError = AuthError | ApiError | NotFoundError

/** Boundary helper for synchronous SQLite calls.
 *  better-sqlite3 throws on I/O, constraint and corruption failures; those become
 *  StorageError values with the original error kept as `cause`. */
export function storageBoundary<T>(operation: string, fn: () => T): T | StorageError {
  try {
    return fn()
  } catch (err) {
    return new StorageError({ operation, reason: errorMessage(err), cause: err })
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

// ---------------------------------------------------------------------------
// Auth and rate limit detection
// ---------------------------------------------------------------------------

/** Read a property off an unknown thrown value (gaxios errors nest status and reasons). */
function field(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined
  return Reflect.get(value, key)
}

/** HTTP status carried by a googleapis / gaxios error, if any. */
export function errorStatus(err: unknown): number | undefined {
  const status = field(err, 'code') ?? field(err, 'status') ?? field(field(err, 'response'), 'status')
  if (typeof status === 'number') return status
  if (typeof status === 'string' && /^\d+$/.test(status)) return Number(status)
  return undefined
}

function errorReasons(err: unknown): string[] {
  const list = field(err, 'errors') ?? field(field(field(field(err, 'response'), 'data'), 'error'), 'errors')
  if (!Array.isArray(list)) return []
  return list.map((item: unknown) => field(item, 'reason')).filter((r): r is string => typeof r === 'string')
}

/** Detect auth-like errors from googleapis.
 *  String matching here is the boundary layer that converts untyped library
 *  exceptions into typed AuthError values. */
export function isAuthLikeError(err: unknown): boolean {
  const status = errorStatus(err)
  if (status === 401) return true
  if (status === 403 && !isRateLimitError(err)) return true
  const msg = String(err)
  return msg.includes('Invalid credentials') || msg.includes('Unauthorized') || msg.includes('invalid_grant')
}

const RATE_LIMIT_REASONS = [
  'userRateLimitExceeded',
  'rateLimitExceeded',
  'quotaExceeded',
  'dailyLimitExceeded',
  'limitExceeded',
  'backendError',
]

export function isRateLimitError(err: unknown): boolean {
  const status = errorStatus(err)
  if (status === 429) return true
  if (status === 403) {
    return errorReasons(err).some((reason) => RATE_LIMIT_REASONS.includes(reason))
  }
  return false
}

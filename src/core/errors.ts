/**
 * errors.ts
 *
 * Error classes raised by the engine. Fetcher errors are never wrapped: they
 * reach callers exactly as the fetcher threw them.
 */

export class QueryEngineError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** The network is required but unavailable and there is no usable data. */
export class OfflineError extends QueryEngineError {}

/** A manually paused query was asked for data it does not have. */
export class QueryPausedError extends OfflineError {}

/** A disabled query was fetched without `force` and has no data. */
export class QueryDisabledError extends QueryEngineError {}

/**
 * Raised when a CancelToken is cancelled. The engine treats it as an
 * abandoned operation, never as a failure.
 */
export class CancelledError extends QueryEngineError {
  readonly reason: string | undefined

  constructor(reason?: string) {
    super(reason ? `Cancelled: ${reason}` : 'Cancelled')
    this.reason = reason
  }
}

/** Operation attempted on a disposed Query or Mutation. */
export class InvalidStateError extends QueryEngineError {}

/** A persisted envelope could not be read back. Always caught. */
export class HydrationError extends QueryEngineError {
  readonly key: string

  constructor(key: string, message: string) {
    super(`Failed to hydrate '${key}': ${message}`)
    this.key = key
  }
}

export function isCancelledError(value: unknown): value is CancelledError {
  return value instanceof CancelledError
}

export function isOfflineError(value: unknown): value is OfflineError {
  return value instanceof OfflineError
}

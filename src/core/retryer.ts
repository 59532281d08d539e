/**
 * retryer.ts
 *
 * Retry policy and the retry engine.
 *
 * The policy half is pure: shouldRetry() and computeRetryDelay() decide
 * whether another attempt happens and how long to wait before it.
 *
 * The Retryer wraps one logical fetch and owns its lifecycle: first attempt,
 * backoff sleeps between retries, pausing while the network is gone, and
 * cancellation through a CancelToken. Callers `await retryer.promise`.
 *
 * - `promise` is created in the constructor so handlers can be attached
 *   before start().
 * - Cancellation is checked after every await (post-fetch, post-delay,
 *   post-pause). A result that arrives after cancellation is dropped.
 */

import type { RetryDelayFn } from './types'
import type { CancelToken } from './cancelToken'
import { CancelledError, isCancelledError } from './errors'
import { logger } from './logger'

// ---------------------------------------------------------------------------
// Retry policy
// ---------------------------------------------------------------------------

/** The subset of QueryConfig that drives retries. */
export interface RetryPolicy {
  retryCount: number
  retryDelay: number
  maxRetryDelay: number
  retryBackoffMultiplier: number
  exponentialBackoff: boolean
  retryWithJitter: boolean
  retryDelayFn?: RetryDelayFn
}

/** Fraction of the delay that jitter may add or remove. */
export const JITTER_RATIO = 0.2

/**
 * Whether a failed attempt should be retried. `attempt` is the 0-indexed
 * number of the attempt that just failed.
 */
export function shouldRetry(attempt: number, policy: Pick<RetryPolicy, 'retryCount'>): boolean {
  return attempt < policy.retryCount
}

/**
 * Delay in ms before retrying after attempt `attempt` (0-indexed) failed.
 *
 * - retryDelayFn, when given, decides alone
 * - otherwise base = retryDelay, and with exponentialBackoff
 *   `min(retryDelay * multiplier ^ attempt, maxRetryDelay)`
 * - retryWithJitter then moves the delay by up to ±20%
 */
export function computeRetryDelay(
  attempt: number,
  error: unknown,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  if (policy.retryDelayFn) {
    return Math.max(0, policy.retryDelayFn(attempt, error))
  }

  let delay = policy.retryDelay
  if (policy.exponentialBackoff) {
    delay = Math.min(
      policy.retryDelay * policy.retryBackoffMultiplier ** attempt,
      policy.maxRetryDelay,
    )
  }

  if (policy.retryWithJitter) {
    const jitterRange = delay * JITTER_RATIO
    delay += jitterRange * (random() - 0.5) * 2
  }

  return Math.max(0, Math.floor(delay))
}

// ---------------------------------------------------------------------------
// Retryer config
// ---------------------------------------------------------------------------

export type RetryerStatus = 'idle' | 'running' | 'paused' | 'cancelled' | 'rejected' | 'resolved'

export interface RetryerConfig<TData> {
  /** The async operation to attempt (and retry). Receives the 0-indexed attempt. */
  fn: (token: CancelToken, attempt: number) => Promise<TData>
  /** Cancelling this token stops the loop and rejects with CancelledError. */
  token: CancelToken
  policy: RetryPolicy
  /**
   * Consulted after each backoff sleep. Returning false parks the loop
   * (onPause) until continue() is called.
   */
  canContinue?: () => boolean
  /** Called after each failed attempt that will be retried. Count starts at 1. */
  onFail?: (failureCount: number, error: unknown) => void
  onPause?: () => void
  onContinue?: () => void
  /** Shown in debug logs. */
  label?: string
}

// ---------------------------------------------------------------------------
// Retryer
// ---------------------------------------------------------------------------

export class Retryer<TData> {
  /** The single awaitable result of this fetch/retry sequence. */
  readonly promise: Promise<TData>

  #resolve: (data: TData) => void = () => {}
  #reject: (error: unknown) => void = () => {}

  /**
   * Widened to `string` so control-flow narrowing inside #run() does not
   * drop 'cancelled': the token listener can write it at any await.
   */
  #status: string = 'idle'

  #failureCount = 0
  #isRetryScheduled = false
  #config: RetryerConfig<TData>

  /** Wakes whatever the loop is currently awaiting (sleep or pause). */
  #wake?: () => void

  constructor(config: RetryerConfig<TData>) {
    this.#config = config

    this.promise = new Promise<TData>((resolve, reject) => {
      this.#resolve = resolve
      this.#reject = reject
    })

    config.token.onCancel(() => {
      this.#handleCancel()
    })
  }

  // -------------------------------------------------------------------------
  // Public API
  // -------------------------------------------------------------------------

  /** Resume a loop parked by canContinue(). */
  continue(): void {
    if (this.#status === 'paused') {
      this.#wake?.()
    }
  }

  /** Cancel through the token so every holder of it observes the same state. */
  cancel(reason?: string): void {
    this.#config.token.cancel(reason)
  }

  status(): RetryerStatus {
    const status = this.#status
    switch (status) {
      case 'running':
      case 'paused':
      case 'cancelled':
      case 'rejected':
      case 'resolved':
        return status
      default:
        return 'idle'
    }
  }

  failureCount(): number {
    return this.#failureCount
  }

  /** True while sleeping between attempts. */
  isRetryScheduled(): boolean {
    return this.#isRetryScheduled
  }

  /**
   * Kick off the loop. Returns `this.promise`.
   */
  start(): Promise<TData> {
    if (this.#status === 'idle') {
      this.#status = 'running'
      this.#run().catch((error: unknown) => {
        // A throwing hook ends the sequence as a failure.
        this.#status = 'rejected'
        this.#reject(error)
      })
    }
    return this.promise
  }

  // -------------------------------------------------------------------------
  // Core loop
  // -------------------------------------------------------------------------

  async #run(): Promise<void> {
    if (this.#status === 'cancelled') return

    const { token, policy } = this.#config
    const attempt = this.#failureCount

    let data: TData
    try {
      data = await this.#config.fn(token, attempt)
    } catch (error) {
      if (this.#status === 'cancelled' || token.isCancelled) return

      if (isCancelledError(error)) {
        // The fetcher abandoned work on its own; same outcome as a cancel.
        this.#status = 'cancelled'
        this.#reject(error)
        return
      }

      if (!shouldRetry(attempt, policy)) {
        this.#status = 'rejected'
        this.#reject(error)
        return
      }

      const delay = computeRetryDelay(attempt, error, policy)
      this.#failureCount++
      this.#config.onFail?.(this.#failureCount, error)
      logger.debug(
        '[Retryer]',
        `${this.#config.label ?? 'fetch'} failed, retry ${this.#failureCount}/${policy.retryCount} in ${delay}ms`,
      )

      this.#isRetryScheduled = true
      await this.#sleep(delay)
      this.#isRetryScheduled = false
      if (this.#status === 'cancelled') return

      if (this.#config.canContinue && !this.#config.canContinue()) {
        this.#status = 'paused'
        this.#config.onPause?.()
        await this.#waitForContinue()
        if (this.#status === 'cancelled') return
        this.#status = 'running'
        this.#config.onContinue?.()
      }

      await this.#run()
      return
    }

    // Results that land after cancellation are discarded.
    if (this.#status === 'cancelled' || token.isCancelled) return

    this.#status = 'resolved'
    this.#resolve(data)
  }

  #handleCancel(): void {
    if (this.#status === 'resolved' || this.#status === 'rejected' || this.#status === 'cancelled') {
      return
    }
    this.#status = 'cancelled'
    this.#wake?.()
    this.#reject(new CancelledError(this.#config.token.reason))
  }

  #waitForContinue(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.#wake = () => {
        this.#wake = undefined
        resolve()
      }
    })
  }

  /**
   * Sleep for `ms`. Cancellation wakes it early and clears the timer so
   * nothing is left scheduled.
   */
  #sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const timeoutId = setTimeout(() => {
        this.#wake = undefined
        resolve()
      }, ms)

      this.#wake = () => {
        clearTimeout(timeoutId)
        this.#wake = undefined
        resolve()
      }
    })
  }
}

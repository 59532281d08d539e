/**
 * cancelToken.ts
 *
 * Cooperative cancellation. A token is created per logical fetch (or stream
 * subscription) and handed to the fetcher. The engine never interrupts
 * running I/O; it checks the token after every suspension point and drops
 * results that arrive after cancellation.
 *
 * Listener rules:
 * - each listener runs at most once, at the moment of cancellation
 * - a listener registered after cancellation runs immediately
 * - a throwing listener is logged and does not stop the others
 */

import { CancelledError } from './errors'
import { logger } from './logger'

export type CancelListener = () => void

export class CancelToken {
  #cancelled = false
  #cancelling = false
  #reason: string | undefined
  #listeners: CancelListener[] = []

  /** Optional label, shown in logs. */
  readonly label: string | undefined

  constructor(label?: string) {
    this.label = label
  }

  get isCancelled(): boolean {
    return this.#cancelled
  }

  get reason(): string | undefined {
    return this.#reason
  }

  /**
   * Cancel the token. Repeated and re-entrant calls (a listener cancelling
   * its own token) are no-ops.
   */
  cancel(reason?: string): void {
    if (this.#cancelled || this.#cancelling) return
    this.#cancelling = true
    this.#cancelled = true
    this.#reason = reason

    const listeners = this.#listeners
    this.#listeners = []
    for (const listener of listeners) {
      this.#invoke(listener)
    }
    this.#cancelling = false
  }

  /**
   * Register a cleanup callback.
   *
   * @returns A function that removes the callback if it has not run yet.
   */
  onCancel(listener: CancelListener): () => void {
    if (this.#cancelled) {
      this.#invoke(listener)
      return () => {}
    }
    this.#listeners.push(listener)
    return () => {
      this.#listeners = this.#listeners.filter((l) => l !== listener)
    }
  }

  /** Throws CancelledError once the token is cancelled. */
  throwIfCancelled(): void {
    if (this.#cancelled) {
      throw new CancelledError(this.#reason)
    }
  }

  #invoke(listener: CancelListener): void {
    try {
      listener()
    } catch (error) {
      logger.warn('[CancelToken]', `Cancel listener threw${this.label ? ` (${this.label})` : ''}`, error)
    }
  }
}

/**
 * onlineManager.ts
 *
 * Tracks network connectivity for one QueryCache.
 *
 * Used in three places:
 * 1. Query.fetch() applies its networkMode policy against isOnline().
 * 2. QueryCache refetches eligible queries on an offline -> online
 *    transition and wakes paused retry loops.
 * 3. MutationQueue replays queued jobs when the network returns.
 *
 * Connectivity comes from an injected rxjs Observable<boolean> (`true` =
 * online). Without one the manager reports online forever. setOnline() lets
 * hosts and tests drive the state directly.
 */

import type { Observable, Subscription } from 'rxjs'
import { Subscribable } from './subscribable'
import { logger } from './logger'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Called with the new state and the one it replaced. */
export type OnlineListener = (online: boolean, wasOnline: boolean) => void

// ---------------------------------------------------------------------------
// OnlineManager
// ---------------------------------------------------------------------------

export class OnlineManager extends Subscribable<OnlineListener> {
  /** Assume online until a stream says otherwise. */
  #online = true

  #subscription?: Subscription

  // -------------------------------------------------------------------------
  // Stream wiring
  // -------------------------------------------------------------------------

  /**
   * Subscribe to a connectivity stream. A previously wired stream is
   * released first, so the manager listens to exactly one source.
   */
  setNetworkStream(stream: Observable<boolean>): void {
    this.#subscription?.unsubscribe()
    this.#subscription = stream.subscribe({
      next: (online) => this.setOnline(online),
      error: (error: unknown) => {
        logger.error('[OnlineManager]', 'Network stream failed; keeping last known state', error)
      },
    })
  }

  /** Release the stream subscription. The last known state is kept. */
  teardown(): void {
    this.#subscription?.unsubscribe()
    this.#subscription = undefined
  }

  // -------------------------------------------------------------------------
  // Read / write
  // -------------------------------------------------------------------------

  isOnline(): boolean {
    return this.#online
  }

  /**
   * Update the state and notify subscribers. Repeating the current state
   * notifies nobody.
   */
  setOnline(online: boolean): void {
    const wasOnline = this.#online
    if (wasOnline === online) return
    this.#online = online
    logger.debug('[OnlineManager]', online ? 'Network online' : 'Network offline')
    this.listeners.forEach((listener) => {
      listener(online, wasOnline)
    })
  }
}

/**
 * lifecycleManager.ts
 *
 * Tracks whether the host application is in the foreground.
 *
 * - QueryCache listens to refetch eligible queries when the app returns to
 *   'resumed' (the refetchOnFocus policy).
 * - Queries and StreamQueries with autoPauseOnBackground pause on
 *   'paused' / 'inactive' / 'hidden' and resume on 'resumed'.
 *
 * States come from an injected rxjs Observable<AppLifecycleState>.
 * setState() drives the manager directly (tests, custom hosts).
 */

import type { Observable, Subscription } from 'rxjs'
import type { AppLifecycleState } from './types'
import { Subscribable } from './subscribable'
import { logger } from './logger'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LifecycleListener = (state: AppLifecycleState, previous: AppLifecycleState) => void

/** States in which background work should stop. */
const BACKGROUND_STATES: ReadonlySet<AppLifecycleState> = new Set(['paused', 'inactive', 'hidden'])

export function isBackgroundState(state: AppLifecycleState): boolean {
  return BACKGROUND_STATES.has(state)
}

// ---------------------------------------------------------------------------
// LifecycleManager
// ---------------------------------------------------------------------------

export class LifecycleManager extends Subscribable<LifecycleListener> {
  #state: AppLifecycleState = 'resumed'
  #subscription?: Subscription

  /**
   * Subscribe to a lifecycle stream, releasing any previous one.
   */
  setLifecycleStream(stream: Observable<AppLifecycleState>): void {
    this.#subscription?.unsubscribe()
    this.#subscription = stream.subscribe({
      next: (state) => this.setState(state),
      error: (error: unknown) => {
        logger.error('[LifecycleManager]', 'Lifecycle stream failed', error)
      },
    })
  }

  teardown(): void {
    this.#subscription?.unsubscribe()
    this.#subscription = undefined
  }

  getState(): AppLifecycleState {
    return this.#state
  }

  isForeground(): boolean {
    return this.#state === 'resumed'
  }

  /**
   * Record a transition and notify subscribers. Every emission is delivered,
   * including repeats, so a host re-announcing 'resumed' still counts as a
   * focus event.
   */
  setState(state: AppLifecycleState): void {
    const previous = this.#state
    this.#state = state
    logger.debug('[LifecycleManager]', `App lifecycle: ${previous} -> ${state}`)
    this.listeners.forEach((listener) => {
      listener(state, previous)
    })
  }
}

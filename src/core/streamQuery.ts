/**
 * streamQuery.ts
 *
 * A query fed by a push source instead of a fetcher. `streamFn` returns an
 * rxjs Observable; each value becomes the data (status 'success') and a
 * stream error becomes the error (status 'error').
 *
 * pause() drops the subscription and resume() makes a fresh one, so values
 * emitted in between are lost. The last data survives both.
 */

import type { Observable, Subscription } from 'rxjs'
import type { FetchStatus, NormalizedKey, QueryKey, QueryStatus } from './types'
import type { QueryCache } from './queryCache'
import { getDefaultQueryCache } from './queryCache'
import type { QueryScope } from './scope'
import type { ReadonlySignal } from './signal'
import { QueryCore } from './queryCore'
import { isBackgroundState } from './lifecycleManager'
import { logger } from './logger'
import { normalizeQueryKey } from './utils'

export interface StreamQueryOptions<TData> {
  queryKey: QueryKey
  streamFn: () => Observable<TData>
  initialData?: TData
  /** Subscribe on construction. Default true. */
  autoSubscribe?: boolean
  /** Pause in the background and resume on 'resumed'. Default false. */
  autoPauseOnBackground?: boolean
  /** Drop the last data when the stream errors. Default false. */
  clearDataOnError?: boolean
  /** Supplies the lifecycle signal. Defaults to the process default cache. */
  cache?: QueryCache
  scope?: QueryScope
  autoDispose?: boolean
}

export class StreamQuery<TData> {
  readonly queryKey: NormalizedKey

  readonly #core = new QueryCore<TData>()
  readonly #streamFn: () => Observable<TData>
  readonly #clearDataOnError: boolean
  #subscription?: Subscription
  #paused = false
  #unsubscribers: Array<() => void> = []

  constructor(options: StreamQueryOptions<TData>) {
    this.queryKey = normalizeQueryKey(options.queryKey)
    this.#streamFn = options.streamFn
    this.#clearDataOnError = options.clearDataOnError ?? false

    if (options.initialData !== undefined) {
      this.#core.dispatch({ type: 'success', data: options.initialData, dataUpdatedAt: Date.now() })
    }

    if (options.scope && (options.autoDispose ?? true)) {
      this.#unsubscribers.push(options.scope.onDispose(() => this.dispose()))
    }

    if (options.autoPauseOnBackground) {
      const cache = options.cache ?? getDefaultQueryCache()
      this.#unsubscribers.push(
        cache.lifecycleManager.subscribe((state) => {
          if (isBackgroundState(state)) {
            this.pause()
          } else if (state === 'resumed') {
            this.resume()
          }
        }),
      )
    }

    if (options.autoSubscribe ?? true) {
      this.subscribe()
    }
  }

  // -------------------------------------------------------------------------
  // State
  // -------------------------------------------------------------------------

  get data(): ReadonlySignal<TData | undefined> {
    return this.#core.data
  }

  get error(): ReadonlySignal<unknown> {
    return this.#core.error
  }

  get status(): ReadonlySignal<QueryStatus> {
    return this.#core.status
  }

  get fetchStatus(): ReadonlySignal<FetchStatus> {
    return this.#core.fetchStatus
  }

  /** True until the first value (or error) after subscribing. */
  get isLoading(): boolean {
    return this.#core.state.status === 'loading'
  }

  get hasData(): boolean {
    return this.#core.hasData
  }

  get hasError(): boolean {
    return this.#core.state.error !== null
  }

  get isSubscribed(): boolean {
    return this.#subscription !== undefined
  }

  get isPaused(): boolean {
    return this.#paused
  }

  get isDisposed(): boolean {
    return this.#core.isDisposed
  }

  // -------------------------------------------------------------------------
  // Subscription
  // -------------------------------------------------------------------------

  /** Subscribe to a fresh stream. No-op while subscribed or paused. */
  subscribe(): void {
    if (this.isDisposed || this.#subscription || this.#paused) return

    const status: QueryStatus = this.#core.hasData ? 'success' : 'loading'
    this.#core.dispatch({ type: 'setState', state: { status, error: null } })

    try {
      const subscription = this.#streamFn().subscribe({
        next: (value) => {
          this.#core.dispatch({ type: 'success', data: value, dataUpdatedAt: Date.now() })
        },
        error: (error: unknown) => {
          logger.error('[StreamQuery]', `Stream error [${this.queryKey}]`, error)
          this.#subscription = undefined
          this.#core.dispatch({
            type: 'setState',
            state: this.#clearDataOnError
              ? { status: 'error', error, data: undefined, errorUpdatedAt: Date.now() }
              : { status: 'error', error, errorUpdatedAt: Date.now() },
          })
        },
        complete: () => {
          this.#subscription = undefined
          logger.debug('[StreamQuery]', `Stream completed [${this.queryKey}]`)
        },
      })
      // A source that errors or completes synchronously is already closed.
      this.#subscription = subscription.closed ? undefined : subscription
    } catch (error) {
      logger.error('[StreamQuery]', `Failed to subscribe to stream [${this.queryKey}]`, error)
      this.#core.dispatch({ type: 'setState', state: { status: 'error', error, errorUpdatedAt: Date.now() } })
    }
  }

  unsubscribe(): void {
    this.#subscription?.unsubscribe()
    this.#subscription = undefined
  }

  /** Drop the subscription, keeping the last data. Idempotent. */
  pause(): void {
    if (this.isDisposed || this.#paused) return
    this.#paused = true
    this.unsubscribe()
    this.#core.dispatch({ type: 'pause' })
    logger.debug('[StreamQuery]', `Stream paused [${this.queryKey}]`)
  }

  /** Subscribe again; only values emitted from now on arrive. Idempotent. */
  resume(): void {
    if (this.isDisposed || !this.#paused) return
    this.#paused = false
    this.#core.dispatch({ type: 'setState', state: { fetchStatus: 'idle' } })
    this.subscribe()
    logger.debug('[StreamQuery]', `Stream resumed [${this.queryKey}]`)
  }

  /** Restart the stream from scratch. */
  refetch(): void {
    if (this.isDisposed) return
    this.unsubscribe()
    this.#paused = false
    this.#core.dispatch({ type: 'setState', state: { fetchStatus: 'idle' } })
    this.subscribe()
  }

  setData(data: TData): void {
    this.#core.dispatch({ type: 'success', data, dataUpdatedAt: Date.now(), manual: true })
  }

  dispose(): void {
    if (this.isDisposed) return
    this.unsubscribe()
    this.#unsubscribers.forEach((unsubscribe) => unsubscribe())
    this.#unsubscribers = []
    this.#core.dispose()
  }
}

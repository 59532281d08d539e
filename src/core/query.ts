/**
 * query.ts
 *
 * Query<TData> is the fetch/staleness state machine bound to one key.
 *
 * Every fetch() walks the same gates, in order:
 *   1. disposed        -> cached data, else InvalidStateError
 *   2. disabled        -> cached data, else QueryDisabledError (unless forced)
 *   3. network mode    -> offline handling per networkMode
 *   4. manual pause    -> cached data, else QueryPausedError (unless forced)
 *   5. fresh data      -> returned as-is (unless forced)
 *   6. in-flight fetch -> joined, never duplicated
 *   7. Retryer run     -> fetcher with retries, backoff and cancellation
 *
 * State lives in a QueryCore; the data itself also lives in the cache
 * entry for `cacheKey`, and the query follows that entry so writes made by
 * other queries, prefetches or optimistic updates show up here.
 */

import type { CachedQuery, QueryCache, CacheEntrySnapshot } from './queryCache'
import { getDefaultQueryCache } from './queryCache'
import type { QueryConfig, QueryConfigOptions } from './queryConfig'
import { resolveQueryConfig, shouldRefetch } from './queryConfig'
import type { FetchStatus, NormalizedKey, QueryFetcher, QueryKey, QueryState, QueryStatus } from './types'
import type { QueryScope } from './scope'
import type { ReadonlySignal } from './signal'
import { Signal } from './signal'
import { QueryCore, createInitialState } from './queryCore'
import { CancelToken } from './cancelToken'
import { Retryer } from './retryer'
import { SelectedQuery } from './selectedQuery'
import { isBackgroundState } from './lifecycleManager'
import {
  InvalidStateError,
  OfflineError,
  QueryDisabledError,
  QueryPausedError,
  isCancelledError,
  isOfflineError,
} from './errors'
import { logger } from './logger'
import { errorMessage, isStaleAt, isValidTimeout, normalizeQueryKey, scopedCacheKey, shareStructure } from './utils'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface QueryOptions<TData> {
  queryKey: QueryKey
  queryFn: QueryFetcher<TData>
  config?: QueryConfigOptions<TData>
  /** Defaults to the process default cache. */
  cache?: QueryCache
  /** Owning scope. Scoped queries get their own cache partition. */
  scope?: QueryScope
  /** Dispose together with `scope`. Default true. */
  autoDispose?: boolean
  enabled?: boolean
  /**
   * Register in the cache's query registry. Wrappers that register
   * themselves (InfiniteQuery) turn this off for their inner query.
   */
  registerInCache?: boolean
}

export interface FetchOptions {
  /** Skip the disabled, paused and freshness gates. */
  force?: boolean
}

// ---------------------------------------------------------------------------
// Query
// ---------------------------------------------------------------------------

export class Query<TData> implements CachedQuery {
  readonly queryKey: NormalizedKey
  readonly cacheKey: string
  readonly scopeId: string | undefined
  readonly cache: QueryCache
  readonly config: QueryConfig<TData>

  readonly #core: QueryCore<TData>
  readonly #enabled: Signal<boolean>
  readonly #queryFn: QueryFetcher<TData>
  readonly #registered: boolean

  #retryer?: Retryer<TData>
  #token?: CancelToken
  #inFlight?: Promise<TData>
  #manuallyPaused = false
  #intervalId?: ReturnType<typeof setInterval>
  #unsubscribers: Array<() => void> = []

  constructor(options: QueryOptions<TData>) {
    this.cache = options.cache ?? getDefaultQueryCache()
    this.queryKey = normalizeQueryKey(options.queryKey)
    this.scopeId = options.scope?.id
    this.cacheKey = this.scopeId !== undefined ? scopedCacheKey(this.scopeId, this.queryKey) : this.queryKey
    this.config = resolveQueryConfig(this.cache.getDefaults(), options.config)
    this.#queryFn = options.queryFn
    this.#core = new QueryCore<TData>()
    this.#enabled = new Signal(options.enabled ?? true)
    this.#registered = options.registerInCache ?? true

    if (this.#registered) {
      this.cache.register(this)
    }

    this.#unsubscribers.push(
      this.cache.watchEntry<TData>(this.cacheKey, (entry) => this.#onEntryChanged(entry)),
    )

    if (options.scope && (options.autoDispose ?? true)) {
      this.#unsubscribers.push(options.scope.onDispose(() => this.dispose()))
    }

    if (this.config.autoPauseOnBackground) {
      this.#unsubscribers.push(
        this.cache.lifecycleManager.subscribe((state) => {
          if (isBackgroundState(state)) {
            this.pause()
          } else if (state === 'resumed') {
            this.resume()
          }
        }),
      )
    }

    this.#initialize()
    this.#startInterval()
  }

  // -------------------------------------------------------------------------
  // Observable state
  // -------------------------------------------------------------------------

  get state(): QueryState<TData> {
    return this.#core.state
  }

  get stateSignal(): ReadonlySignal<QueryState<TData>> {
    return this.#core.stateSignal
  }

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

  get isLoading(): ReadonlySignal<boolean> {
    return this.#core.isLoading
  }

  get isPlaceholderData(): ReadonlySignal<boolean> {
    return this.#core.isPlaceholderData
  }

  get enabled(): ReadonlySignal<boolean> {
    return this.#enabled
  }

  // -------------------------------------------------------------------------
  // Derived getters
  // -------------------------------------------------------------------------

  /**
   * True when the data is older than staleTime, was invalidated, is only a
   * placeholder, or was never written.
   */
  get isStale(): boolean {
    const state = this.#core.state
    if (state.isInvalidated || state.isPlaceholderData) return true
    return isStaleAt(state.dataUpdatedAt, this.config.staleTime)
  }

  get hasData(): boolean {
    return this.#core.hasData
  }

  get hasError(): boolean {
    return this.#core.state.error !== null
  }

  get isIdle(): boolean {
    return this.#core.state.status === 'idle'
  }

  get isSuccess(): boolean {
    return this.#core.state.status === 'success'
  }

  get isError(): boolean {
    return this.#core.state.status === 'error'
  }

  /** Fetching while data is already shown. */
  get isRefetching(): boolean {
    return this.#core.state.fetchStatus === 'fetching' && this.#core.state.status !== 'loading'
  }

  get isPaused(): boolean {
    return this.#core.state.fetchStatus === 'paused'
  }

  get isDisposed(): boolean {
    return this.#core.isDisposed
  }

  get dataUpdatedAt(): number {
    return this.#core.state.dataUpdatedAt
  }

  get failureCount(): number {
    return this.#core.state.failureCount
  }

  // -------------------------------------------------------------------------
  // Fetching
  // -------------------------------------------------------------------------

  async fetch(options: FetchOptions = {}): Promise<TData> {
    const force = options.force ?? false
    const cached = this.#core.state.data

    if (this.isDisposed) {
      if (cached !== undefined) return cached
      throw new InvalidStateError(`Query ${this.cacheKey} has been disposed`)
    }

    if (!force && !this.#enabled.value) {
      if (cached !== undefined) return cached
      throw new QueryDisabledError(`Query ${this.cacheKey} is disabled`)
    }

    if (this.config.networkMode !== 'always' && !this.cache.isOnline) {
      if (this.config.networkMode === 'offlineFirst' && cached !== undefined) {
        return cached
      }
      this.#core.dispatch({ type: 'pause' })
      logger.debug('[Query]', `Offline, pausing fetch: ${this.cacheKey}`)
      if (cached !== undefined) return cached
      throw new OfflineError(`Query ${this.cacheKey} requires the network and the device is offline`)
    }

    if (!force && this.#manuallyPaused) {
      if (cached !== undefined) return cached
      throw new QueryPausedError(`Query ${this.cacheKey} is paused`)
    }

    if (!force && cached !== undefined && !this.isStale) {
      return cached
    }

    if (this.#inFlight) {
      return this.#inFlight
    }

    return this.#startFetch()
  }

  refetch(): Promise<TData> {
    return this.fetch({ force: true })
  }

  #startFetch(): Promise<TData> {
    const token = new CancelToken(this.cacheKey)
    this.#token = token
    this.#core.dispatch({ type: 'fetch' })

    const retryer = new Retryer<TData>({
      fn: (fetchToken) => this.#queryFn(fetchToken),
      token,
      policy: this.config,
      canContinue: () => this.config.networkMode === 'always' || this.cache.isOnline,
      onFail: (failureCount, error) => {
        this.#core.dispatch({ type: 'failed', failureCount, error })
      },
      onPause: () => {
        logger.debug('[Query]', `Retry paused until reconnect: ${this.cacheKey}`)
        this.#core.dispatch({ type: 'pause' })
      },
      onContinue: () => {
        this.#core.dispatch({ type: 'continue' })
      },
      label: this.cacheKey,
    })
    this.#retryer = retryer

    const promise: Promise<TData> = retryer
      .start()
      .then(
        (data) => this.#onFetchSuccess(data),
        (error: unknown) => this.#onFetchError(error, token),
      )
      .finally(() => {
        if (this.#inFlight === promise) {
          this.#inFlight = undefined
          this.#retryer = undefined
          this.#token = undefined
        }
      })

    this.#inFlight = promise
    return promise
  }

  #onFetchSuccess(fetched: TData): TData {
    const data = shareStructure(this.#core.state.data, fetched)
    const dataUpdatedAt = Date.now()
    this.#core.dispatch({ type: 'success', data, dataUpdatedAt })
    if (this.isDisposed) return data

    this.cache.updateCache(this.cacheKey, data, dataUpdatedAt)

    if (this.config.persist) {
      this.cache
        .persist(this.queryKey, data, dataUpdatedAt, { storage: this.config.storage, toJson: this.config.toJson })
        .catch((error: unknown) => {
          logger.error('[Query]', `Failed to persist ${this.queryKey}`, error)
        })
    }
    return data
  }

  #onFetchError(error: unknown, token: CancelToken): TData {
    if (token.isCancelled || isCancelledError(error)) {
      this.#core.dispatch({ type: 'cancel', paused: this.#manuallyPaused })
      const data = this.#core.state.data
      if (data !== undefined) return data
      throw error
    }

    this.#core.dispatch({ type: 'error', error })
    logger.debug('[Query]', `Fetch failed for ${this.cacheKey}: ${errorMessage(error)}`)
    throw error
  }

  /** Abandon the in-flight fetch, if any. Its result is discarded. */
  cancel(reason = 'cancelled'): void {
    const token = this.#token
    this.#inFlight = undefined
    this.#retryer = undefined
    this.#token = undefined
    token?.cancel(reason)
  }

  // -------------------------------------------------------------------------
  // Pause / resume
  // -------------------------------------------------------------------------

  /**
   * Stop fetching: cancels the in-flight fetch (and its pending retries)
   * and the background interval. Data is kept.
   */
  pause(): void {
    if (this.isDisposed || this.#manuallyPaused) return
    this.#manuallyPaused = true
    this.#stopInterval()
    this.#core.dispatch({ type: 'pause' })
    this.cancel('paused')
    logger.debug('[Query]', `Query paused: ${this.cacheKey}`)
  }

  resume(): void {
    if (this.isDisposed || !this.#manuallyPaused) return
    this.#manuallyPaused = false
    if (this.#core.state.fetchStatus === 'paused') {
      this.#core.dispatch({ type: 'setState', state: { fetchStatus: 'idle' } })
    }
    this.#startInterval()
    logger.debug('[Query]', `Query resumed: ${this.cacheKey}`)

    if (this.config.refetchOnResume && this.isStale && this.#enabled.value) {
      this.fetch().catch((error: unknown) => this.#logBackgroundFailure('resume', error))
    }
  }

  /** Whether pause() is in effect. Network pauses do not count. */
  get isManuallyPaused(): boolean {
    return this.#manuallyPaused
  }

  onOnline(): void {
    if (this.isDisposed) return
    const retryer = this.#retryer
    if (retryer && retryer.status() === 'paused') {
      retryer.continue()
      return
    }
    if (!this.#inFlight && !this.#manuallyPaused && this.#core.state.fetchStatus === 'paused') {
      this.#core.dispatch({ type: 'setState', state: { fetchStatus: 'idle' } })
    }
  }

  // -------------------------------------------------------------------------
  // Writes
  // -------------------------------------------------------------------------

  /**
   * Mark the data stale. An enabled, idle query refetches in the
   * background; the current data stays visible until that resolves.
   */
  invalidate(): void {
    if (this.isDisposed) return
    this.#core.dispatch({ type: 'invalidate' })
    logger.debug('[Query]', `Invalidated: ${this.cacheKey}`)

    if (this.#enabled.value && !this.#manuallyPaused && this.#core.state.fetchStatus !== 'fetching') {
      this.fetch().catch((error: unknown) => this.#logBackgroundFailure('invalidate', error))
    }
  }

  /**
   * Overwrite the data. Marks it fresh and reaches listeners (here and on
   * every query sharing the entry) before returning. fetchStatus is left
   * alone.
   */
  setData(value: TData): void {
    if (this.isDisposed) return
    const data = shareStructure(this.#core.state.data, value)
    const dataUpdatedAt = Date.now()
    this.#core.dispatch({ type: 'success', data, dataUpdatedAt, manual: true })
    this.cache.updateCache(this.cacheKey, data, dataUpdatedAt)
  }

  setEnabled(enabled: boolean): void {
    if (this.isDisposed || !this.#enabled.set(enabled)) return
    if (enabled && !this.#manuallyPaused && (this.isStale || this.isIdle)) {
      this.fetch().catch((error: unknown) => this.#logBackgroundFailure('enable', error))
    }
  }

  /** Back to the never-fetched state. The cache entry is kept. */
  reset(): void {
    if (this.isDisposed) return
    this.cancel('reset')
    this.#core.dispatch({ type: 'reset', state: createInitialState<TData>() })
  }

  /**
   * A read-only query over `selector(data)`. Its listeners fire only when
   * the selected value changes.
   */
  select<TSelected>(selector: (data: TData) => TSelected): SelectedQuery<TData, TSelected> {
    return new SelectedQuery(this, selector)
  }

  /**
   * Unregister, cancel in-flight work and timers, and stop every listener.
   * Safe to call more than once.
   */
  dispose(): void {
    if (this.isDisposed) return
    this.cancel('disposed')
    this.#stopInterval()
    const unsubscribers = this.#unsubscribers
    this.#unsubscribers = []
    unsubscribers.forEach((unsubscribe) => unsubscribe())
    if (this.#registered) {
      this.cache.unregister(this)
    }
    this.#core.dispose()
    this.#enabled.clearListeners()
    logger.debug('[Query]', `Disposed: ${this.cacheKey}`)
  }

  // -------------------------------------------------------------------------
  // Initialisation
  // -------------------------------------------------------------------------

  #initialize(): void {
    const entry = this.cache.getEntry<TData>(this.cacheKey)
    const cached = this.cache.getCachedData<TData>(this.cacheKey)

    if (entry && cached !== undefined) {
      this.#core.dispatch({ type: 'success', data: cached, dataUpdatedAt: entry.timestamp, manual: true })
    } else if (this.config.initialData !== undefined) {
      // Seeded data counts as never fetched, so it is stale from the start.
      this.#core.dispatch({ type: 'success', data: this.config.initialData, dataUpdatedAt: 0, manual: true })
    } else if (this.config.placeholderData !== undefined) {
      this.#core.dispatch({ type: 'placeholder', data: this.config.placeholderData })
    }

    if (this.config.persist) {
      this.#hydrateThenMount().catch((error: unknown) => {
        logger.error('[Query]', `Initialisation failed for ${this.cacheKey}`, error)
      })
    } else {
      this.#applyMountPolicy()
    }
  }

  async #hydrateThenMount(): Promise<void> {
    const hydrated = await this.cache.hydrate<TData>(this.queryKey, {
      storage: this.config.storage,
      fromJson: this.config.fromJson,
      cacheTime: this.config.cacheTime,
    })
    if (this.isDisposed) return

    if (hydrated && hydrated.timestamp > this.#core.state.dataUpdatedAt) {
      const data = shareStructure(this.#core.state.data, hydrated.data)
      this.#core.dispatch({ type: 'success', data, dataUpdatedAt: hydrated.timestamp, manual: true })
      this.cache.updateCache(this.cacheKey, data, hydrated.timestamp)
    }

    this.#applyMountPolicy()
  }

  #applyMountPolicy(): void {
    if (this.isDisposed || !this.#enabled.value) return
    const behavior = this.config.refetchOnMount
    const state = this.#core.state
    const hasRealData = state.data !== undefined && !state.isPlaceholderData
    const shouldFetch = hasRealData ? shouldRefetch(behavior, this.isStale) : behavior !== 'never'
    if (!shouldFetch) return

    this.fetch({ force: behavior === 'always' }).catch((error: unknown) =>
      this.#logBackgroundFailure('mount', error),
    )
  }

  /** Another writer changed the shared entry. */
  #onEntryChanged(entry: CacheEntrySnapshot<TData> | undefined): void {
    if (this.isDisposed) return
    const state = this.#core.state
    // Only an explicit delete reports a missing entry; GC skips watched keys.
    if (!entry) {
      if (state.data !== undefined || state.dataUpdatedAt !== 0) this.#core.dispatch({ type: 'remove' })
      return
    }
    if (Object.is(state.data, entry.data) && state.dataUpdatedAt === entry.timestamp) return
    this.#core.dispatch({ type: 'success', data: entry.data, dataUpdatedAt: entry.timestamp, manual: true })
  }

  // -------------------------------------------------------------------------
  // Background refetch
  // -------------------------------------------------------------------------

  #startInterval(): void {
    this.#stopInterval()
    const interval = this.config.refetchInterval
    if (!this.config.enableBackgroundRefetch || !isValidTimeout(interval) || interval === 0) return

    this.#intervalId = setInterval(() => {
      if (
        this.isDisposed ||
        this.#manuallyPaused ||
        !this.#enabled.value ||
        !this.hasData ||
        this.#core.state.fetchStatus === 'fetching'
      ) {
        return
      }
      this.refetch().catch((error: unknown) => this.#logBackgroundFailure('interval', error))
    }, interval)
  }

  #stopInterval(): void {
    if (this.#intervalId !== undefined) {
      clearInterval(this.#intervalId)
      this.#intervalId = undefined
    }
  }

  #logBackgroundFailure(trigger: string, error: unknown): void {
    if (isCancelledError(error) || isOfflineError(error)) {
      logger.debug('[Query]', `Background ${trigger} fetch skipped for ${this.cacheKey}: ${errorMessage(error)}`)
      return
    }
    logger.warn('[Query]', `Background ${trigger} fetch failed for ${this.cacheKey}: ${errorMessage(error)}`)
  }
}

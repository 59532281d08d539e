/**
 * infiniteQuery.ts
 *
 * Paginated queries. Data is the ordered list of pages fetched so far.
 *
 * An InfiniteQuery wraps a regular Query<TPage[]> whose fetcher loads only
 * the first page (with `initialPageParam`). fetch(), refetch() and
 * invalidation therefore always land on exactly one page; fetchNextPage()
 * and fetchPreviousPage() grow the list one page at a time from the cursors
 * `getNextPageParam` and `getPreviousPageParam` return.
 *
 * A failed page fetch keeps every existing page and records its error in
 * `pageError`; the aggregate status is not touched.
 */

import type { CachedQuery, QueryCache } from './queryCache'
import type { QueryBehaviorConfig, QueryConfigOptions } from './queryConfig'
import type { FetchStatus, NormalizedKey, PageFetcher, QueryKey, QueryStatus } from './types'
import type { QueryScope } from './scope'
import type { ReadonlySignal } from './signal'
import type { FetchOptions } from './query'
import { Query } from './query'
import { Signal } from './signal'
import { CancelToken } from './cancelToken'
import { isCancelledError } from './errors'
import { notifyManager } from './notifyManager'
import { logger } from './logger'
import { errorMessage } from './utils'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Returns the cursor after (or before) the given page; null or undefined when there is none. */
export type PageParamFn<TPage, TPageParam> = (
  page: TPage,
  allPages: TPage[],
) => TPageParam | null | undefined

export interface InfiniteQueryOptions<TPage, TPageParam> {
  queryKey: QueryKey
  queryFn: PageFetcher<TPage, TPageParam>
  initialPageParam: TPageParam
  getNextPageParam: PageParamFn<TPage, TPageParam>
  getPreviousPageParam?: PageParamFn<TPage, TPageParam>
  config?: QueryConfigOptions<TPage[]>
  cache?: QueryCache
  scope?: QueryScope
  autoDispose?: boolean
  enabled?: boolean
}

type PageDirection = 'next' | 'previous'

// ---------------------------------------------------------------------------
// InfiniteQuery
// ---------------------------------------------------------------------------

export class InfiniteQuery<TPage, TPageParam> implements CachedQuery {
  readonly #query: Query<TPage[]>
  readonly #pageFn: PageFetcher<TPage, TPageParam>
  readonly #initialPageParam: TPageParam
  readonly #getNextPageParam: PageParamFn<TPage, TPageParam>
  readonly #getPreviousPageParam: PageParamFn<TPage, TPageParam> | undefined

  readonly #hasNextPage = new Signal(true)
  readonly #hasPreviousPage = new Signal(false)
  readonly #isFetchingNextPage = new Signal(false)
  readonly #isFetchingPreviousPage = new Signal(false)
  readonly #pageError = new Signal<unknown>(null)

  #nextPageParam: TPageParam | null | undefined
  #previousPageParam: TPageParam | null | undefined = null
  #pageParams: TPageParam[] = []
  #nextToken?: CancelToken
  #previousToken?: CancelToken
  #unsubscribers: Array<() => void> = []

  constructor(options: InfiniteQueryOptions<TPage, TPageParam>) {
    this.#pageFn = options.queryFn
    this.#initialPageParam = options.initialPageParam
    this.#getNextPageParam = options.getNextPageParam
    this.#getPreviousPageParam = options.getPreviousPageParam
    this.#nextPageParam = options.initialPageParam

    this.#query = new Query<TPage[]>({
      queryKey: options.queryKey,
      queryFn: (token) => this.#fetchFirstPage(token),
      config: options.config,
      cache: options.cache,
      scope: options.scope,
      autoDispose: false,
      enabled: options.enabled,
      registerInCache: false,
    })

    this.cache.register(this)
    this.#updateParams(this.#query.data.value)

    this.#unsubscribers.push(this.#query.data.subscribe((pages) => this.#updateParams(pages)))
    if (options.scope && (options.autoDispose ?? true)) {
      this.#unsubscribers.push(options.scope.onDispose(() => this.dispose()))
    }
  }

  // -------------------------------------------------------------------------
  // Identity and shared state
  // -------------------------------------------------------------------------

  get queryKey(): NormalizedKey {
    return this.#query.queryKey
  }

  get cacheKey(): string {
    return this.#query.cacheKey
  }

  get scopeId(): string | undefined {
    return this.#query.scopeId
  }

  get cache(): QueryCache {
    return this.#query.cache
  }

  get config(): QueryBehaviorConfig {
    return this.#query.config
  }

  get data(): ReadonlySignal<TPage[] | undefined> {
    return this.#query.data
  }

  get error(): ReadonlySignal<unknown> {
    return this.#query.error
  }

  get status(): ReadonlySignal<QueryStatus> {
    return this.#query.status
  }

  get fetchStatus(): ReadonlySignal<FetchStatus> {
    return this.#query.fetchStatus
  }

  get isLoading(): ReadonlySignal<boolean> {
    return this.#query.isLoading
  }

  get enabled(): ReadonlySignal<boolean> {
    return this.#query.enabled
  }

  get isStale(): boolean {
    return this.#query.isStale
  }

  get hasData(): boolean {
    return this.#query.hasData
  }

  get hasError(): boolean {
    return this.#query.hasError
  }

  get isDisposed(): boolean {
    return this.#query.isDisposed
  }

  // -------------------------------------------------------------------------
  // Pagination state
  // -------------------------------------------------------------------------

  get hasNextPage(): ReadonlySignal<boolean> {
    return this.#hasNextPage
  }

  get hasPreviousPage(): ReadonlySignal<boolean> {
    return this.#hasPreviousPage
  }

  get isFetchingNextPage(): ReadonlySignal<boolean> {
    return this.#isFetchingNextPage
  }

  get isFetchingPreviousPage(): ReadonlySignal<boolean> {
    return this.#isFetchingPreviousPage
  }

  /** Error of the last failed fetchNextPage()/fetchPreviousPage(). */
  get pageError(): ReadonlySignal<unknown> {
    return this.#pageError
  }

  /** The cursor each loaded page was fetched with, in page order. */
  get pageParams(): readonly TPageParam[] {
    return this.#pageParams
  }

  // -------------------------------------------------------------------------
  // Fetching
  // -------------------------------------------------------------------------

  /**
   * Load the first page. With `force`, pagination restarts: cursors reset
   * and page fetches in flight are abandoned.
   */
  fetch(options: FetchOptions = {}): Promise<TPage[]> {
    if (options.force && !this.isDisposed) {
      this.#resetPagination()
    }
    return this.#query.fetch(options)
  }

  /** Discard every page and reload the first one. */
  refetch(): Promise<TPage[]> {
    return this.fetch({ force: true })
  }

  /** No-op without a next page or while one is already loading. */
  async fetchNextPage(): Promise<void> {
    const param = this.#nextPageParam
    if (this.isDisposed || this.#isFetchingNextPage.value || param === null || param === undefined) return
    await this.#fetchPage('next', param)
  }

  /** No-op without a previous page or while one is already loading. */
  async fetchPreviousPage(): Promise<void> {
    const param = this.#previousPageParam
    if (this.isDisposed || this.#isFetchingPreviousPage.value || param === null || param === undefined) return
    await this.#fetchPage('previous', param)
  }

  async #fetchPage(direction: PageDirection, param: TPageParam): Promise<void> {
    const fetching = direction === 'next' ? this.#isFetchingNextPage : this.#isFetchingPreviousPage
    const token = new CancelToken(`${this.cacheKey}:${direction}`)
    if (direction === 'next') {
      this.#nextToken = token
    } else {
      this.#previousToken = token
    }
    fetching.set(true)

    try {
      const page = await this.#pageFn(param, token)
      if (this.isDisposed || token.isCancelled) return

      const current = this.#query.data.value ?? []
      const pages = direction === 'next' ? [...current, page] : [page, ...current]
      this.#pageParams = direction === 'next' ? [...this.#pageParams, param] : [param, ...this.#pageParams]

      notifyManager.batch(() => {
        this.#pageError.set(null)
        this.#query.setData(pages)
      })
    } catch (error) {
      if (this.isDisposed || token.isCancelled || isCancelledError(error)) return
      logger.warn('[InfiniteQuery]', `Failed to fetch ${direction} page of ${this.cacheKey}: ${errorMessage(error)}`)
      this.#pageError.set(error)
    } finally {
      // A cancelled fetch was already cleared by whoever cancelled it.
      if (!this.isDisposed && !token.isCancelled) {
        fetching.set(false)
      }
      if (this.#nextToken === token) this.#nextToken = undefined
      if (this.#previousToken === token) this.#previousToken = undefined
    }
  }

  async #fetchFirstPage(token: CancelToken): Promise<TPage[]> {
    // Pages still loading belong to the list this fetch replaces.
    this.#abandonPageFetches('reload')
    const page = await this.#pageFn(this.#initialPageParam, token)
    token.throwIfCancelled()
    this.#pageParams = [this.#initialPageParam]
    return [page]
  }

  #abandonPageFetches(reason: string): void {
    this.#nextToken?.cancel(reason)
    this.#previousToken?.cancel(reason)
    this.#nextToken = undefined
    this.#previousToken = undefined
    notifyManager.batch(() => {
      this.#isFetchingNextPage.set(false)
      this.#isFetchingPreviousPage.set(false)
    })
  }

  #resetPagination(): void {
    this.#abandonPageFetches('refetch')
    this.#nextPageParam = this.#initialPageParam
    this.#previousPageParam = null
    notifyManager.batch(() => {
      this.#hasNextPage.set(true)
      this.#hasPreviousPage.set(false)
      this.#pageError.set(null)
    })
  }

  #updateParams(pages: TPage[] | undefined): void {
    if (this.isDisposed) return
    const first = pages ? pages[0] : undefined
    const last = pages ? pages[pages.length - 1] : undefined

    if (!pages || first === undefined || last === undefined) {
      this.#nextPageParam = this.#initialPageParam
      this.#previousPageParam = null
    } else {
      this.#nextPageParam = this.#getNextPageParam(last, pages)
      this.#previousPageParam = this.#getPreviousPageParam?.(first, pages) ?? null
    }

    notifyManager.batch(() => {
      this.#hasNextPage.set(this.#nextPageParam !== null && this.#nextPageParam !== undefined)
      this.#hasPreviousPage.set(this.#previousPageParam !== null && this.#previousPageParam !== undefined)
    })
  }

  // -------------------------------------------------------------------------
  // Delegated controls
  // -------------------------------------------------------------------------

  invalidate(): void {
    this.#query.invalidate()
  }

  onOnline(): void {
    this.#query.onOnline()
  }

  pause(): void {
    this.#query.pause()
  }

  resume(): void {
    this.#query.resume()
  }

  setEnabled(enabled: boolean): void {
    this.#query.setEnabled(enabled)
  }

  dispose(): void {
    if (this.isDisposed) return
    this.#nextToken?.cancel('disposed')
    this.#previousToken?.cancel('disposed')
    this.#unsubscribers.forEach((unsubscribe) => unsubscribe())
    this.#unsubscribers = []
    this.cache.unregister(this)
    this.#query.dispose()
    this.#hasNextPage.clearListeners()
    this.#hasPreviousPage.clearListeners()
    this.#isFetchingNextPage.clearListeners()
    this.#isFetchingPreviousPage.clearListeners()
    this.#pageError.clearListeners()
  }
}

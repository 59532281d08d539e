/**
 * queryClient.ts
 *
 * The public API facade.
 *
 * A QueryClient owns one QueryCache (with its network, lifecycle and
 * offline-queue plumbing), the defaults queries fall back to, and the log
 * level. Its factories build queries and mutations already bound to that
 * cache; its cache methods take filters so callers never touch keys in
 * normalized form.
 *
 * Pattern: Facade. Delegates every piece of real work to the cache and the
 * objects it creates.
 */

import type { Observable } from 'rxjs'
import type { AppLifecycleState, NormalizedKey, QueryFetcher, QueryKey } from './types'
import type { QueryConfig, QueryConfigOptions, QueryDefaults } from './queryConfig'
import { resolveQueryConfig } from './queryConfig'
import type { QueryStorage } from './storage'
import type { LogLevel } from './logger'
import { logger } from './logger'
import { QueryCache, setDefaultQueryCache } from './queryCache'
import type { QueryOptions } from './query'
import { Query } from './query'
import type { InfiniteQueryOptions } from './infiniteQuery'
import { InfiniteQuery } from './infiniteQuery'
import type { StreamQueryOptions } from './streamQuery'
import { StreamQuery } from './streamQuery'
import type { MutationOptions } from './mutation'
import { Mutation } from './mutation'
import type { MutationJobHandler } from './mutationQueue'
import { CancelToken } from './cancelToken'
import { normalizeQueryKey } from './utils'

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface QueryClientOptions {
  /** Use an existing cache instead of creating one. */
  cache?: QueryCache
  /** Defaults for every query created through this client. */
  defaults?: QueryDefaults
  /** Storage fallback for persisted queries and the offline queue. */
  storage?: QueryStorage
  logLevel?: LogLevel
  networkStream?: Observable<boolean>
  lifecycleStream?: Observable<AppLifecycleState>
  /** Make this client's cache the process default. */
  setAsDefault?: boolean
}

/**
 * Selects registered queries. An empty filter matches everything.
 * `queryKey` matches exactly; `prefix` matches the start of the normalized key.
 */
export interface QueryFilters {
  queryKey?: QueryKey
  prefix?: string
  scopeId?: string
}

export interface PrefetchQueryOptions<TData> {
  queryKey: QueryKey
  queryFn: QueryFetcher<TData>
  staleTime?: number
  cacheTime?: number
}

type BoundOptions<TOptions> = Omit<TOptions, 'cache'>

// ---------------------------------------------------------------------------
// QueryClient
// ---------------------------------------------------------------------------

export class QueryClient {
  readonly #cache: QueryCache
  #storage: QueryStorage | undefined

  constructor(options: QueryClientOptions = {}) {
    if (options.logLevel) {
      logger.setLevel(options.logLevel)
    }

    this.#storage = options.storage
    this.#cache =
      options.cache ??
      new QueryCache({
        defaults: options.defaults,
        storage: options.storage,
        networkStream: options.networkStream,
        lifecycleStream: options.lifecycleStream,
      })

    if (options.cache) {
      if (options.defaults) this.#cache.setDefaults(options.defaults)
      if (options.storage) this.#cache.setStorage(options.storage)
      if (options.networkStream) this.#cache.setNetworkStream(options.networkStream)
      if (options.lifecycleStream) this.#cache.setLifecycleStream(options.lifecycleStream)
    }

    if (options.setAsDefault) {
      setDefaultQueryCache(this.#cache)
    }
  }

  // -------------------------------------------------------------------------
  // Setup
  // -------------------------------------------------------------------------

  getQueryCache(): QueryCache {
    return this.#cache
  }

  getDefaults(): QueryDefaults {
    return this.#cache.getDefaults()
  }

  setDefaults(defaults: QueryDefaults): void {
    this.#cache.setDefaults(defaults)
  }

  setLogLevel(level: LogLevel): void {
    logger.setLevel(level)
  }

  /**
   * Restore the offline mutation queue from storage and register its
   * replay handlers. Replays right away when online.
   */
  async initMutationQueue(handlers: Record<string, MutationJobHandler> = {}): Promise<void> {
    const queue = this.#cache.mutationQueue
    queue.registerHandlers(handlers)
    await queue.init(this.#storage)
    await queue.process()
  }

  /** Full config a query created with `config` would get. */
  resolveQueryConfig<TData>(config?: QueryConfigOptions<TData>): QueryConfig<TData> {
    return resolveQueryConfig(this.#cache.getDefaults(), config)
  }

  // -------------------------------------------------------------------------
  // Factories
  // -------------------------------------------------------------------------

  query<TData>(options: BoundOptions<QueryOptions<TData>>): Query<TData> {
    return new Query<TData>({ ...options, cache: this.#cache })
  }

  infiniteQuery<TPage, TPageParam>(
    options: BoundOptions<InfiniteQueryOptions<TPage, TPageParam>>,
  ): InfiniteQuery<TPage, TPageParam> {
    return new InfiniteQuery<TPage, TPageParam>({ ...options, cache: this.#cache })
  }

  streamQuery<TData>(options: BoundOptions<StreamQueryOptions<TData>>): StreamQuery<TData> {
    return new StreamQuery<TData>({ ...options, cache: this.#cache })
  }

  mutation<TData, TVariables = void, TContext = unknown>(
    options: BoundOptions<MutationOptions<TData, TVariables, TContext>>,
  ): Mutation<TData, TVariables, TContext> {
    return new Mutation<TData, TVariables, TContext>({ ...options, cache: this.#cache })
  }

  // -------------------------------------------------------------------------
  // Cache access
  // -------------------------------------------------------------------------

  /**
   * The registered Query for `queryKey`, typed for its data. Infinite and
   * stream queries are not returned; look those up on the cache.
   */
  getQuery<TData>(queryKey: QueryKey, options?: { scopeId?: string }): Query<TData> | undefined {
    const query = this.#cache.getQuery(queryKey, options)
    return query instanceof Query ? query : undefined
  }

  getQueryData<TData>(queryKey: QueryKey): TData | undefined {
    return this.#cache.getCachedData<TData>(queryKey)
  }

  /** Write through the cache; every query on the key sees it before this returns. */
  setQueryData<TData>(queryKey: QueryKey, updater: (previous: TData | undefined) => TData): TData {
    return this.#cache.setQueryData(queryKey, updater)
  }

  /** Best-effort: failures are logged, never thrown. */
  prefetchQuery<TData>(options: PrefetchQueryOptions<TData>): Promise<void> {
    return this.#cache.prefetch({
      queryKey: options.queryKey,
      fetcher: () => options.queryFn(new CancelToken(normalizeQueryKey(options.queryKey))),
      staleTime: options.staleTime,
      cacheTime: options.cacheTime,
    })
  }

  /** Mark matching queries stale; enabled ones refetch in the background. */
  invalidateQueries(filters: QueryFilters = {}): void {
    this.#cache.invalidateQueries(this.#matcher(filters))
  }

  /** Refetch matching queries and wait for all of them to settle. */
  refetchQueries(filters: QueryFilters = {}): Promise<void> {
    return this.#cache.refetchQueries(this.#matcher(filters))
  }

  /** Forget matching queries: registrations and cached data. */
  removeQueries(filters: QueryFilters = {}): void {
    const match = this.#matcher(filters)
    for (const query of this.#cache.getQueries()) {
      if (!match(query.queryKey, query.cacheKey)) continue
      this.#cache.removeQuery(query.cacheKey)
    }
    if (filters.queryKey !== undefined && filters.scopeId === undefined) {
      this.#cache.removeCachedData(filters.queryKey)
    }
  }

  clear(): void {
    this.#cache.clear()
  }

  /** Release the cache's streams and the offline queue. */
  dispose(): void {
    this.#cache.dispose()
  }

  #matcher(filters: QueryFilters): (queryKey: NormalizedKey, cacheKey: string) => boolean {
    const exact = filters.queryKey !== undefined ? normalizeQueryKey(filters.queryKey) : undefined
    const scopePrefix = filters.scopeId !== undefined ? `${filters.scopeId}:` : undefined

    return (queryKey, cacheKey) => {
      if (exact !== undefined && queryKey !== exact) return false
      if (filters.prefix !== undefined && !queryKey.startsWith(filters.prefix)) return false
      if (scopePrefix !== undefined && !cacheKey.startsWith(scopePrefix)) return false
      return true
    }
  }
}

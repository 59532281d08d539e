/**
 * queryCache.ts
 *
 * The registry every query shares: normalized keys map to a CacheEntry
 * (the data itself) and to the live query currently observing it.
 *
 * Responsibilities:
 * - registration of global and scope-bound queries
 * - cache entries: read, write, cross-query notification, timed eviction
 * - invalidation (never deletes data) and clearing (does)
 * - prefetch with shared in-flight promises
 * - persistence envelopes through the storage collaborator
 * - routing reconnect and app-resume events to eligible queries
 *
 * Scoped queries are indexed under `<scopeId>:<key>`, so two scopes using
 * the same key keep separate entries and clearing one scope never touches
 * the other.
 */

import type { Observable } from 'rxjs'
import type {
  AppLifecycleState,
  CacheStats,
  FromJson,
  NormalizedKey,
  QueryKey,
  QueryStatus,
  ScopeStats,
  ToJson,
} from './types'
import type { QueryBehaviorConfig, QueryDefaults } from './queryConfig'
import { DEFAULT_QUERY_BEHAVIOR, mergeQueryBehavior, shouldRefetch } from './queryConfig'
import type { QueryStorage } from './storage'
import { createEnvelope, isEnvelopeExpired, parseEnvelope } from './storage'
import type { ReadonlySignal } from './signal'
import type { QueryScope } from './scope'
import { Subscribable } from './subscribable'
import { Removable } from './removable'
import { OnlineManager } from './onlineManager'
import { LifecycleManager } from './lifecycleManager'
import { MutationQueue } from './mutationQueue'
import { notifyManager } from './notifyManager'
import { logger } from './logger'
import { errorMessage, isStaleAt, normalizeQueryKey } from './utils'

// ---------------------------------------------------------------------------
// Registry contract
// ---------------------------------------------------------------------------

/**
 * What the cache needs from a registered query. Query and InfiniteQuery
 * implement it; the cache never imports them, which keeps the module graph
 * acyclic.
 */
export interface CachedQuery {
  /** Normalized key, without scope prefix. */
  readonly queryKey: NormalizedKey
  /** Registry and entry key: the query key, prefixed when scoped. */
  readonly cacheKey: string
  readonly scopeId: string | undefined
  readonly config: QueryBehaviorConfig
  readonly status: ReadonlySignal<QueryStatus>
  readonly isLoading: ReadonlySignal<boolean>
  readonly enabled: ReadonlySignal<boolean>
  readonly isStale: boolean
  readonly hasError: boolean
  readonly isDisposed: boolean
  refetch(): Promise<unknown>
  invalidate(): void
  /** Wake a retry loop parked while offline. */
  onOnline(): void
  dispose(): void
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export type QueryCacheEvent =
  | { type: 'added'; query: CachedQuery }
  | { type: 'removed'; query: CachedQuery }
  | { type: 'invalidated'; query: CachedQuery }
  | { type: 'updated'; cacheKey: string }
  | { type: 'evicted'; cacheKey: string }
  | { type: 'cleared' }

export type QueryCacheListener = (event: QueryCacheEvent) => void

// ---------------------------------------------------------------------------
// Cache entries
// ---------------------------------------------------------------------------

/** A read-only view of one entry. */
export interface CacheEntrySnapshot<TData> {
  data: TData
  timestamp: number
  cacheTime: number
}

export type CacheEntryListener<TData> = (entry: CacheEntrySnapshot<TData> | undefined) => void

/**
 * Entries hold values of different types side by side; the caller names the
 * type it stored under a key.
 */
function readEntryValue<TData>(value: unknown): TData {
  return value as TData
}

class CacheEntry extends Removable {
  readonly cacheKey: string
  data: unknown
  timestamp: number
  #onEvict: (entry: CacheEntry) => void

  constructor(cacheKey: string, data: unknown, timestamp: number, cacheTime: number, onEvict: (entry: CacheEntry) => void) {
    super(cacheTime)
    this.cacheKey = cacheKey
    this.data = data
    this.timestamp = timestamp
    this.#onEvict = onEvict
  }

  get isExpired(): boolean {
    return Date.now() - this.timestamp > this.gcTime
  }

  write(data: unknown, timestamp: number, cacheTime: number): void {
    this.data = data
    this.timestamp = timestamp
    this.gcTime = cacheTime
  }

  snapshot<TData>(): CacheEntrySnapshot<TData> {
    return { data: readEntryValue<TData>(this.data), timestamp: this.timestamp, cacheTime: this.gcTime }
  }

  /** Restart the eviction countdown. */
  touch(): void {
    this.scheduleGc()
  }

  /** Keep the entry while someone watches it. */
  hold(): void {
    this.clearGcTimeout()
  }

  protected optionalRemove(): void {
    this.#onEvict(this)
  }
}

// ---------------------------------------------------------------------------
// Persistence options
// ---------------------------------------------------------------------------

export interface PersistOptions<TData> {
  storage?: QueryStorage
  toJson?: ToJson<TData>
}

export interface HydrateOptions<TData> {
  storage?: QueryStorage
  fromJson?: FromJson<TData>
  cacheTime: number
}

export interface HydratedValue<TData> {
  data: TData
  timestamp: number
}

export interface PrefetchOptions<TData> {
  queryKey: QueryKey
  fetcher: () => Promise<TData>
  /** Data younger than this is left alone. Defaults to the registered query's staleTime, else 0. */
  staleTime?: number
  cacheTime?: number
}

export interface QueryCacheConfig {
  defaults?: QueryDefaults
  storage?: QueryStorage
  networkStream?: Observable<boolean>
  lifecycleStream?: Observable<AppLifecycleState>
}

// ---------------------------------------------------------------------------
// QueryCache
// ---------------------------------------------------------------------------

export class QueryCache extends Subscribable<QueryCacheListener> {
  readonly onlineManager: OnlineManager
  readonly lifecycleManager: LifecycleManager
  readonly mutationQueue: MutationQueue

  #queries = new Map<string, CachedQuery>()
  #scopeQueries = new Map<string, Set<string>>()
  #entries = new Map<string, CacheEntry>()
  #watchers = new Map<string, Set<CacheEntryListener<unknown>>>()
  #pendingFetches = new Map<string, Promise<unknown>>()
  #defaults: QueryDefaults
  #storage: QueryStorage | undefined
  #unsubscribers: Array<() => void> = []

  constructor(config: QueryCacheConfig = {}) {
    super()
    this.#defaults = config.defaults ?? {}
    this.#storage = config.storage
    this.onlineManager = new OnlineManager()
    this.lifecycleManager = new LifecycleManager()
    this.mutationQueue = new MutationQueue({ onlineManager: this.onlineManager })

    this.#unsubscribers.push(
      this.onlineManager.subscribe((online, wasOnline) => {
        if (online && !wasOnline) {
          logger.debug('[QueryCache]', 'Network reconnected. Refetching eligible queries...')
          this.#onReconnect()
        }
      }),
      this.lifecycleManager.subscribe((state) => {
        if (state === 'resumed') {
          logger.debug('[QueryCache]', 'App resumed. Refetching eligible queries...')
          this.#onFocus()
        }
      }),
    )

    if (config.networkStream) this.setNetworkStream(config.networkStream)
    if (config.lifecycleStream) this.setLifecycleStream(config.lifecycleStream)
  }

  // -------------------------------------------------------------------------
  // Configuration
  // -------------------------------------------------------------------------

  getDefaults(): QueryDefaults {
    return this.#defaults
  }

  /** Replace the defaults queries created from now on fall back to. */
  setDefaults(defaults: QueryDefaults): void {
    this.#defaults = defaults
  }

  /** Defaults resolved against the library defaults. */
  resolvedDefaults(): QueryBehaviorConfig {
    return mergeQueryBehavior(DEFAULT_QUERY_BEHAVIOR, this.#defaults)
  }

  setStorage(storage: QueryStorage | undefined): void {
    this.#storage = storage
  }

  getStorage(): QueryStorage | undefined {
    return this.#storage
  }

  // -------------------------------------------------------------------------
  // External signals
  // -------------------------------------------------------------------------

  setNetworkStream(stream: Observable<boolean>): void {
    this.onlineManager.setNetworkStream(stream)
  }

  get isOnline(): boolean {
    return this.onlineManager.isOnline()
  }

  setLifecycleStream(stream: Observable<AppLifecycleState>): void {
    this.lifecycleManager.setLifecycleStream(stream)
  }

  /** Drive a lifecycle transition without a stream. */
  simulateLifecycleState(state: AppLifecycleState): void {
    this.lifecycleManager.setState(state)
  }

  #onReconnect(): void {
    for (const query of [...this.#queries.values()]) {
      if (query.isDisposed) continue
      query.onOnline()
      this.#maybeRefetch(query, query.config.refetchOnReconnect)
    }
  }

  #onFocus(): void {
    for (const query of [...this.#queries.values()]) {
      if (query.isDisposed) continue
      this.#maybeRefetch(query, query.config.refetchOnFocus)
    }
  }

  #maybeRefetch(query: CachedQuery, behavior: QueryBehaviorConfig['refetchOnFocus']): void {
    if (
      shouldRefetch(behavior, query.isStale || query.hasError) &&
      !query.isLoading.value &&
      query.enabled.value
    ) {
      query.refetch().catch((error: unknown) => {
        logger.warn('[QueryCache]', `Background refetch failed for ${query.cacheKey}: ${errorMessage(error)}`)
      })
    }
  }

  // -------------------------------------------------------------------------
  // Registration
  // -------------------------------------------------------------------------

  /**
   * Register a query under its cache key. A query already registered under
   * that key is replaced as the active observer; the entry is untouched.
   */
  register(query: CachedQuery): void {
    this.#index(query, query.scopeId)
  }

  /** Register `query` as belonging to `scopeId`, whatever scope it names itself. */
  registerScoped(query: CachedQuery, scopeId: string): void {
    this.#index(query, scopeId)
  }

  #index(query: CachedQuery, scopeId: string | undefined): void {
    this.#queries.set(query.cacheKey, query)
    if (scopeId !== undefined) {
      let keys = this.#scopeQueries.get(scopeId)
      if (!keys) {
        keys = new Set()
        this.#scopeQueries.set(scopeId, keys)
      }
      keys.add(query.cacheKey)
      logger.debug('[QueryCache]', `Registered scoped query: ${query.queryKey} (scope: ${scopeId})`)
    } else {
      logger.debug('[QueryCache]', `Registered global query: ${query.queryKey}`)
    }
    this.notify({ type: 'added', query })
  }

  /**
   * Remove a query's registration. Only the registered instance can remove
   * itself; a replaced query unregistering later is a no-op.
   */
  unregister(query: CachedQuery): void {
    if (this.#queries.get(query.cacheKey) !== query) return
    this.#queries.delete(query.cacheKey)
    for (const [scopeId, keys] of this.#scopeQueries) {
      if (keys.delete(query.cacheKey) && !keys.size) this.#scopeQueries.delete(scopeId)
    }
    logger.debug('[QueryCache]', `Unregistered query: ${query.cacheKey}`)
    this.notify({ type: 'removed', query })
  }

  /**
   * The registered query for `key`. With `scopeId`, looks in that scope's
   * partition instead of the global one.
   */
  getQuery(key: QueryKey, options?: { scopeId?: string }): CachedQuery | undefined {
    const normalized = normalizeQueryKey(key)
    const cacheKey = options?.scopeId !== undefined ? `${options.scopeId}:${normalized}` : normalized
    return this.#queries.get(cacheKey)
  }

  getQueries(): CachedQuery[] {
    return [...this.#queries.values()]
  }

  // -------------------------------------------------------------------------
  // Scopes
  // -------------------------------------------------------------------------

  getScopeQueries(scopeId: string): CachedQuery[] {
    const keys = this.#scopeQueries.get(scopeId)
    if (!keys) return []
    const queries: CachedQuery[] = []
    for (const key of keys) {
      const query = this.#queries.get(key)
      if (query) queries.push(query)
    }
    return queries
  }

  invalidateScope(scopeId: string): void {
    let count = 0
    for (const query of this.getScopeQueries(scopeId)) {
      if (query.isDisposed) continue
      query.invalidate()
      count++
    }
    logger.debug('[QueryCache]', `Invalidated ${count} queries in scope: ${scopeId}`)
  }

  /** Refetch every query of the scope; resolves once all have settled. */
  async refetchScope(scopeId: string): Promise<void> {
    const queries = this.getScopeQueries(scopeId).filter((query) => !query.isDisposed)
    await Promise.all(
      queries.map((query) =>
        query.refetch().catch((error: unknown) => {
          logger.warn('[QueryCache]', `Failed to refetch query ${query.cacheKey} in scope ${scopeId}: ${errorMessage(error)}`)
        }),
      ),
    )
    logger.debug('[QueryCache]', `Refetched ${queries.length} queries in scope: ${scopeId}`)
  }

  /** Drop the scope's registrations and their cache entries. */
  clearScope(scopeId: string): void {
    const keys = this.#scopeQueries.get(scopeId)
    if (!keys) return
    const cacheKeys = [...keys]
    for (const cacheKey of cacheKeys) {
      const query = this.#queries.get(cacheKey)
      this.#queries.delete(cacheKey)
      this.#deleteEntry(cacheKey)
      this.#pendingFetches.delete(cacheKey)
      if (query) this.notify({ type: 'removed', query })
    }
    this.#scopeQueries.delete(scopeId)
    logger.debug('[QueryCache]', `Cleared ${cacheKeys.length} queries from scope: ${scopeId}`)
  }

  getScopeStats(scopeId: string): ScopeStats {
    return countStatuses(this.getScopeQueries(scopeId))
  }

  /** Stats over a scope and all of its descendants. */
  getScopeTreeStats(scope: QueryScope): ScopeStats {
    const queries: CachedQuery[] = []
    const visit = (current: QueryScope): void => {
      queries.push(...this.getScopeQueries(current.id))
      current.children.forEach(visit)
    }
    visit(scope)
    return countStatuses(queries)
  }

  // -------------------------------------------------------------------------
  // Entries
  // -------------------------------------------------------------------------

  /** Entry for `key`, expired or not. */
  getEntry<TData>(key: QueryKey): CacheEntrySnapshot<TData> | undefined {
    return this.#entries.get(normalizeQueryKey(key))?.snapshot<TData>()
  }

  /** Data for `key`, or undefined when missing or older than its cacheTime. */
  getCachedData<TData>(key: QueryKey): TData | undefined {
    const entry = this.#entries.get(normalizeQueryKey(key))
    if (!entry || entry.isExpired) return undefined
    return readEntryValue<TData>(entry.data)
  }

  /**
   * Write an entry directly and notify every query watching it. The
   * entry's lifetime comes from the registered query's cacheTime, else the
   * cache defaults.
   */
  updateCache<TData>(key: QueryKey, data: TData, timestamp: number = Date.now()): void {
    const cacheKey = normalizeQueryKey(key)
    const cacheTime = this.#queries.get(cacheKey)?.config.cacheTime ?? this.resolvedDefaults().cacheTime
    this.#setEntry(cacheKey, data, timestamp, cacheTime)
  }

  /**
   * Read-modify-write of one entry. `updater` receives the current data
   * (undefined when absent or expired).
   *
   * @returns The written value.
   */
  setQueryData<TData>(key: QueryKey, updater: (previous: TData | undefined) => TData): TData {
    const next = updater(this.getCachedData<TData>(key))
    this.updateCache(key, next)
    return next
  }

  /** Delete an entry's data; watchers are told it is gone. Registrations stay. */
  removeCachedData(key: QueryKey): void {
    this.#deleteEntry(normalizeQueryKey(key))
  }

  /**
   * Follow writes to one entry. Attaching keeps the entry from being
   * evicted; when the last watcher leaves, the cacheTime countdown starts.
   */
  watchEntry<TData>(cacheKey: string, listener: CacheEntryListener<TData>): () => void {
    const wrapped: CacheEntryListener<unknown> = (entry) => {
      listener(entry && { ...entry, data: readEntryValue<TData>(entry.data) })
    }
    let watchers = this.#watchers.get(cacheKey)
    if (!watchers) {
      watchers = new Set()
      this.#watchers.set(cacheKey, watchers)
    }
    watchers.add(wrapped)
    this.#entries.get(cacheKey)?.hold()

    return () => {
      const current = this.#watchers.get(cacheKey)
      if (!current?.delete(wrapped)) return
      if (!current.size) {
        this.#watchers.delete(cacheKey)
        this.#entries.get(cacheKey)?.touch()
      }
    }
  }

  #setEntry(cacheKey: string, data: unknown, timestamp: number, cacheTime: number): void {
    let entry = this.#entries.get(cacheKey)
    if (entry) {
      entry.write(data, timestamp, cacheTime)
    } else {
      entry = new CacheEntry(cacheKey, data, timestamp, cacheTime, (evicted) => this.#evict(evicted))
      this.#entries.set(cacheKey, entry)
    }

    if (this.#watchers.has(cacheKey)) {
      entry.hold()
    } else {
      entry.touch()
    }

    const snapshot = entry.snapshot<unknown>()
    notifyManager.batch(() => {
      this.#watchers.get(cacheKey)?.forEach((watcher) => {
        watcher(snapshot)
      })
      this.notify({ type: 'updated', cacheKey })
    })
  }

  #deleteEntry(cacheKey: string): void {
    const entry = this.#entries.get(cacheKey)
    if (!entry) return
    entry.destroy()
    this.#entries.delete(cacheKey)
    notifyManager.batch(() => {
      this.#watchers.get(cacheKey)?.forEach((watcher) => {
        watcher(undefined)
      })
    })
  }

  #evict(entry: CacheEntry): void {
    if (this.#watchers.has(entry.cacheKey)) return
    if (this.#entries.get(entry.cacheKey) !== entry) return
    this.#entries.delete(entry.cacheKey)
    logger.debug('[QueryCache]', `Evicted cache entry: ${entry.cacheKey}`)
    this.notify({ type: 'evicted', cacheKey: entry.cacheKey })
  }

  // -------------------------------------------------------------------------
  // Persistence
  // -------------------------------------------------------------------------

  /**
   * Write `data` through the storage collaborator as a version-1 envelope.
   * Failures are logged, never thrown.
   */
  async persist<TData>(
    storageKey: string,
    data: TData,
    timestamp: number,
    options: PersistOptions<TData>,
  ): Promise<void> {
    const storage = options.storage ?? this.#storage
    if (!storage) {
      logger.warn('[QueryCache]', `Query ${storageKey} is marked for persistence but no storage is configured.`)
      return
    }
    if (!options.toJson) {
      logger.warn('[QueryCache]', `Query ${storageKey} is marked for persistence but toJson is not provided.`)
      return
    }

    try {
      await storage.write(storageKey, createEnvelope(options.toJson(data), timestamp))
      logger.debug('[QueryCache]', `Persisted query: ${storageKey}`)
    } catch (error) {
      logger.error('[QueryCache]', `Failed to persist query ${storageKey}`, error)
    }
  }

  /**
   * Read a persisted envelope back. Expired envelopes are deleted. Any
   * failure (storage, validation, fromJson) yields undefined.
   */
  async hydrate<TData>(storageKey: string, options: HydrateOptions<TData>): Promise<HydratedValue<TData> | undefined> {
    const storage = options.storage ?? this.#storage
    if (!storage || !options.fromJson) return undefined

    try {
      const raw = await storage.read(storageKey)
      if (raw === null) return undefined

      const envelope = parseEnvelope(storageKey, raw)
      if (isEnvelopeExpired(envelope, options.cacheTime)) {
        await storage.delete(storageKey)
        logger.debug('[QueryCache]', `Discarded expired persisted query: ${storageKey}`)
        return undefined
      }

      const data = options.fromJson(envelope.data)
      logger.debug('[QueryCache]', `Hydrated query: ${storageKey}`)
      return { data, timestamp: envelope.timestamp }
    } catch (error) {
      logger.error('[QueryCache]', `Failed to hydrate query ${storageKey}`, error)
      return undefined
    }
  }

  // -------------------------------------------------------------------------
  // Prefetch & dedup
  // -------------------------------------------------------------------------

  /**
   * Share one in-flight promise per key between concurrent callers.
   */
  deduplicateFetch<TData>(key: QueryKey, fetcher: () => Promise<TData>): Promise<TData> {
    const cacheKey = normalizeQueryKey(key)
    const pending = this.#pendingFetches.get(cacheKey)
    if (pending) {
      logger.debug('[QueryCache]', `Joining in-flight fetch: ${cacheKey}`)
      return pending.then((value) => readEntryValue<TData>(value))
    }

    const promise = fetcher().finally(() => {
      if (this.#pendingFetches.get(cacheKey) === promise) {
        this.#pendingFetches.delete(cacheKey)
      }
    })
    this.#pendingFetches.set(cacheKey, promise)
    return promise
  }

  /** Whether the entry for `cacheKey` exists, is unexpired, and younger than staleTime. */
  isDataFresh(key: QueryKey, staleTime?: number): boolean {
    const cacheKey = normalizeQueryKey(key)
    const entry = this.#entries.get(cacheKey)
    if (!entry || entry.isExpired) return false
    const window = staleTime ?? this.#queries.get(cacheKey)?.config.staleTime ?? 0
    return !isStaleAt(entry.timestamp, window)
  }

  /**
   * Fetch and cache `queryKey` unless fresh data is already there.
   * Best-effort: failures are logged and swallowed.
   */
  async prefetch<TData>(options: PrefetchOptions<TData>): Promise<void> {
    const cacheKey = normalizeQueryKey(options.queryKey)
    if (this.isDataFresh(cacheKey, options.staleTime)) return

    try {
      const data = await this.deduplicateFetch(cacheKey, options.fetcher)
      const cacheTime =
        options.cacheTime ?? this.#queries.get(cacheKey)?.config.cacheTime ?? this.resolvedDefaults().cacheTime
      this.#setEntry(cacheKey, data, Date.now(), cacheTime)
    } catch (error) {
      logger.warn('[QueryCache]', `Prefetch failed for ${cacheKey}: ${errorMessage(error)}`)
    }
  }

  // -------------------------------------------------------------------------
  // Invalidation & refetch
  // -------------------------------------------------------------------------

  /**
   * Mark every query registered for `key` stale (globally and in every
   * scope); eligible ones refetch in the background.
   */
  invalidateQuery(key: QueryKey): void {
    const normalized = normalizeQueryKey(key)
    this.invalidateQueries((queryKey, cacheKey) => queryKey === normalized || cacheKey === normalized)
  }

  /** Invalidate every query whose normalized key satisfies `predicate`. */
  invalidateQueries(predicate: (queryKey: NormalizedKey, cacheKey: string) => boolean): void {
    for (const query of [...this.#queries.values()]) {
      if (query.isDisposed || !predicate(query.queryKey, query.cacheKey)) continue
      query.invalidate()
      this.notify({ type: 'invalidated', query })
    }
  }

  /** Hierarchical invalidation: `'user:'` hits `user:1`, `user:2`, ... */
  invalidateQueriesWithPrefix(prefix: string): void {
    this.invalidateQueries((queryKey) => queryKey.startsWith(prefix))
  }

  async refetchQuery(key: QueryKey): Promise<void> {
    const query = this.getQuery(key)
    if (query && !query.isDisposed) {
      await query.refetch()
    }
  }

  /** Refetch every match; failures are logged and all refetches settle first. */
  async refetchQueries(predicate: (queryKey: NormalizedKey, cacheKey: string) => boolean): Promise<void> {
    const matches = [...this.#queries.values()].filter(
      (query) => !query.isDisposed && predicate(query.queryKey, query.cacheKey),
    )
    await Promise.all(
      matches.map((query) =>
        query.refetch().catch((error: unknown) => {
          logger.warn('[QueryCache]', `Failed to refetch query ${query.cacheKey}: ${errorMessage(error)}`)
        }),
      ),
    )
  }

  // -------------------------------------------------------------------------
  // Removal
  // -------------------------------------------------------------------------

  /** Forget `key` entirely: entry, registration and any pending prefetch. */
  removeQuery(key: QueryKey): void {
    const cacheKey = normalizeQueryKey(key)
    const query = this.#queries.get(cacheKey)
    if (query) this.unregister(query)
    this.#deleteEntry(cacheKey)
    this.#pendingFetches.delete(cacheKey)
  }

  clear(): void {
    for (const entry of this.#entries.values()) {
      entry.destroy()
    }
    this.#entries.clear()
    this.#queries.clear()
    this.#pendingFetches.clear()
    this.#scopeQueries.clear()
    this.notify({ type: 'cleared' })
  }

  /** Release the network and lifecycle streams. Registered queries are left alone. */
  dispose(): void {
    this.#unsubscribers.forEach((unsubscribe) => unsubscribe())
    this.#unsubscribers = []
    this.onlineManager.teardown()
    this.lifecycleManager.teardown()
    this.mutationQueue.dispose()
  }

  // -------------------------------------------------------------------------
  // Stats & events
  // -------------------------------------------------------------------------

  getStats(): CacheStats {
    const scopedKeys = new Set<string>()
    for (const keys of this.#scopeQueries.values()) {
      keys.forEach((key) => scopedKeys.add(key))
    }
    const queries = [...this.#queries.values()]
    const scopedQueries = queries.filter((query) => scopedKeys.has(query.cacheKey)).length
    const counts = countStatuses(queries)

    return {
      totalQueries: queries.length,
      globalQueries: queries.length - scopedQueries,
      scopedQueries,
      activeScopes: this.#scopeQueries.size,
      cacheEntries: this.#entries.size,
      loading: counts.loading,
      success: counts.success,
      error: counts.error,
      stale: counts.stale,
    }
  }

  notify(event: QueryCacheEvent): void {
    notifyManager.batch(() => {
      this.listeners.forEach((listener) => {
        notifyManager.schedule(() => {
          listener(event)
        })
      })
    })
  }
}

function countStatuses(queries: CachedQuery[]): ScopeStats {
  return {
    total: queries.length,
    loading: queries.filter((query) => query.isLoading.value).length,
    success: queries.filter((query) => query.status.value === 'success').length,
    error: queries.filter((query) => query.status.value === 'error').length,
    stale: queries.filter((query) => query.isStale).length,
  }
}

// ---------------------------------------------------------------------------
// Process default
// ---------------------------------------------------------------------------

let defaultQueryCache: QueryCache | undefined

/**
 * The cache used when a constructor is not given one. Created on first use.
 */
export function getDefaultQueryCache(): QueryCache {
  if (!defaultQueryCache) {
    defaultQueryCache = new QueryCache()
  }
  return defaultQueryCache
}

/** Swap the process default (e.g. for a QueryClient created at startup). */
export function setDefaultQueryCache(cache: QueryCache): void {
  defaultQueryCache = cache
}

/**
 * types.ts
 *
 * Shared type definitions for the query engine. No runtime code lives here;
 * runtime helpers that operate on these types sit in utils.ts and
 * queryConfig.ts.
 */

import type { CancelToken } from './cancelToken'

// ---------------------------------------------------------------------------
// Query Key
// ---------------------------------------------------------------------------

/** A single key segment. */
export type QueryKeyPrimitive = string | number | boolean

/**
 * Identifies a cached resource: either one primitive or an ordered sequence
 * of primitives. Keys are compared through their normalized string form,
 * never by identity.
 */
export type QueryKey = QueryKeyPrimitive | ReadonlyArray<QueryKeyPrimitive | null>

/** The canonical string a QueryKey normalizes to (see normalizeQueryKey). */
export type NormalizedKey = string

// ---------------------------------------------------------------------------
// Status Types
// ---------------------------------------------------------------------------

/**
 * The "data availability" axis of a query.
 *
 * - idle    : never fetched, no data
 * - loading : first fetch in flight, no data yet
 * - success : data is available
 * - error   : the last fetch failed after every retry
 */
export type QueryStatus = 'idle' | 'loading' | 'success' | 'error'

/**
 * The "network activity" axis, orthogonal to QueryStatus. A query can be
 * 'success' and 'fetching' at the same time (background refetch).
 */
export type FetchStatus = 'idle' | 'fetching' | 'paused'

/** Lifecycle of a single Mutation. */
export type MutationStatus = 'idle' | 'loading' | 'success' | 'error'

/**
 * Whether a fetch may be attempted under connectivity constraints.
 *
 * - online       : requires the network; offline fetches pause
 * - always       : ignores connectivity
 * - offlineFirst : serves cached data while offline, otherwise like online
 */
export type NetworkMode = 'online' | 'always' | 'offlineFirst'

/** Refetch policy for mount / focus / reconnect triggers. */
export type RefetchBehavior = 'never' | 'ifStale' | 'always'

/** App lifecycle states delivered by the lifecycle collaborator. */
export type AppLifecycleState = 'resumed' | 'inactive' | 'paused' | 'hidden' | 'detached'

// ---------------------------------------------------------------------------
// Query State
// ---------------------------------------------------------------------------

/**
 * The complete state of one query. Every field is mirrored into its own
 * Signal by QueryCore so listeners can subscribe at field granularity.
 */
export interface QueryState<TData = unknown> {
  /** The last successfully fetched (or manually set) data. */
  data: TData | undefined
  /** Epoch ms of the last data write, 0 when there never was one. */
  dataUpdatedAt: number
  /** The error from the last failed fetch, or null. */
  error: unknown
  /** Epoch ms of the last error. */
  errorUpdatedAt: number
  /** Failed attempts in the current retry sequence. */
  failureCount: number
  /** Error from the most recent failed attempt of the current sequence. */
  failureReason: unknown
  fetchStatus: FetchStatus
  /** Set by invalidate(); cleared by the next data write. */
  isInvalidated: boolean
  /** True while data comes from config.placeholderData. */
  isPlaceholderData: boolean
  status: QueryStatus
}

// ---------------------------------------------------------------------------
// Functions
// ---------------------------------------------------------------------------

/** A pull-based fetcher. The token is advisory; the engine discards results once it is cancelled. */
export type QueryFetcher<TData> = (token: CancelToken) => Promise<TData>

/** Fetches one page for an InfiniteQuery. */
export type PageFetcher<TPage, TPageParam> = (pageParam: TPageParam, token: CancelToken) => Promise<TPage>

/**
 * Custom retry delay. `attempt` is 0-indexed: the delay before the first
 * retry is computed with attempt 0.
 */
export type RetryDelayFn = (attempt: number, error: unknown) => number

/** Serialises data for persistence. The result must be JSON-compatible. */
export type ToJson<TData> = (data: TData) => unknown

/** Restores data read back from storage. May throw on malformed input. */
export type FromJson<TData> = (json: unknown) => TData

// ---------------------------------------------------------------------------
// Stats
// ---------------------------------------------------------------------------

/** Per-scope status counts. */
export interface ScopeStats {
  total: number
  loading: number
  success: number
  error: number
  stale: number
}

/** Diagnostic counts for a whole cache. */
export interface CacheStats {
  totalQueries: number
  globalQueries: number
  scopedQueries: number
  activeScopes: number
  cacheEntries: number
  loading: number
  success: number
  error: number
  stale: number
}

/**
 * queryConfig.ts
 *
 * Query configuration: the resolved record every Query carries, the partial
 * form users write, library defaults, and structural merge.
 *
 * Resolution order, later wins:
 *   DEFAULT_QUERY_CONFIG -> cache/client defaults -> instance config
 *
 * Only fields that are explicitly set (not undefined) override.
 */

import type { FromJson, NetworkMode, RefetchBehavior, RetryDelayFn, ToJson } from './types'
import type { QueryStorage } from './storage'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** `true` reads as 'ifStale', `false` as 'never'. */
export type RefetchPolicyInput = RefetchBehavior | boolean

/**
 * Settings that do not depend on the data type. This is the shape of
 * client-level defaults and what the cache reads from registered queries.
 */
export interface QueryBehaviorConfig {
  /** Ms after a write during which data is fresh. */
  staleTime: number
  /** Ms an unused or persisted entry survives before eviction. */
  cacheTime: number
  refetchOnMount: RefetchBehavior
  refetchOnFocus: RefetchBehavior
  refetchOnReconnect: RefetchBehavior
  /** Refetch stale data when resume() is called. */
  refetchOnResume: boolean
  /** Pause on app background, resume on foreground. */
  autoPauseOnBackground: boolean
  enableBackgroundRefetch: boolean
  /** Period of the background refetch, only used with enableBackgroundRefetch. */
  refetchInterval: number | undefined
  retryCount: number
  retryDelay: number
  maxRetryDelay: number
  retryBackoffMultiplier: number
  exponentialBackoff: boolean
  retryWithJitter: boolean
  retryDelayFn: RetryDelayFn | undefined
  networkMode: NetworkMode
  persist: boolean
  storage: QueryStorage | undefined
}

/** A fully resolved configuration. */
export interface QueryConfig<TData = unknown> extends QueryBehaviorConfig {
  toJson: ToJson<TData> | undefined
  fromJson: FromJson<TData> | undefined
  /** Shown while the first real fetch is pending; never cached. */
  placeholderData: TData | undefined
  /** Seeds the query as if fetched; treated as stale. */
  initialData: TData | undefined
}

type BehaviorOptionFields = Omit<
  QueryBehaviorConfig,
  'refetchOnMount' | 'refetchOnFocus' | 'refetchOnReconnect'
> & {
  refetchOnMount: RefetchPolicyInput
  refetchOnFocus: RefetchPolicyInput
  refetchOnReconnect: RefetchPolicyInput
}

/** Client-level defaults: every data-independent field, all optional. */
export type QueryDefaults = Partial<BehaviorOptionFields>

/** What callers pass when creating a query. */
export interface QueryConfigOptions<TData = unknown> extends QueryDefaults {
  toJson?: ToJson<TData>
  fromJson?: FromJson<TData>
  placeholderData?: TData
  initialData?: TData
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_QUERY_BEHAVIOR: Readonly<QueryBehaviorConfig> = Object.freeze({
  staleTime: 30_000,
  cacheTime: 5 * 60_000,
  refetchOnMount: 'ifStale',
  refetchOnFocus: 'never',
  refetchOnReconnect: 'ifStale',
  refetchOnResume: false,
  autoPauseOnBackground: false,
  enableBackgroundRefetch: false,
  refetchInterval: undefined,
  retryCount: 3,
  retryDelay: 200,
  maxRetryDelay: 30_000,
  retryBackoffMultiplier: 2,
  exponentialBackoff: true,
  retryWithJitter: true,
  retryDelayFn: undefined,
  networkMode: 'online',
  persist: false,
  storage: undefined,
})

// ---------------------------------------------------------------------------
// Refetch policy
// ---------------------------------------------------------------------------

export function toRefetchBehavior(input: RefetchPolicyInput): RefetchBehavior {
  if (input === true) return 'ifStale'
  if (input === false) return 'never'
  return input
}

/** Whether a trigger governed by `behavior` should refetch right now. */
export function shouldRefetch(behavior: RefetchBehavior, isStale: boolean): boolean {
  switch (behavior) {
    case 'never':
      return false
    case 'always':
      return true
    case 'ifStale':
      return isStale
  }
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/**
 * Overlay the explicitly set fields of `override` on `base`.
 */
export function mergeQueryBehavior(
  base: QueryBehaviorConfig,
  override: QueryDefaults | undefined,
): QueryBehaviorConfig {
  if (!override) return { ...base }
  return {
    staleTime: override.staleTime ?? base.staleTime,
    cacheTime: override.cacheTime ?? base.cacheTime,
    refetchOnMount:
      override.refetchOnMount !== undefined ? toRefetchBehavior(override.refetchOnMount) : base.refetchOnMount,
    refetchOnFocus:
      override.refetchOnFocus !== undefined ? toRefetchBehavior(override.refetchOnFocus) : base.refetchOnFocus,
    refetchOnReconnect:
      override.refetchOnReconnect !== undefined
        ? toRefetchBehavior(override.refetchOnReconnect)
        : base.refetchOnReconnect,
    refetchOnResume: override.refetchOnResume ?? base.refetchOnResume,
    autoPauseOnBackground: override.autoPauseOnBackground ?? base.autoPauseOnBackground,
    enableBackgroundRefetch: override.enableBackgroundRefetch ?? base.enableBackgroundRefetch,
    refetchInterval: override.refetchInterval ?? base.refetchInterval,
    retryCount: override.retryCount ?? base.retryCount,
    retryDelay: override.retryDelay ?? base.retryDelay,
    maxRetryDelay: override.maxRetryDelay ?? base.maxRetryDelay,
    retryBackoffMultiplier: override.retryBackoffMultiplier ?? base.retryBackoffMultiplier,
    exponentialBackoff: override.exponentialBackoff ?? base.exponentialBackoff,
    retryWithJitter: override.retryWithJitter ?? base.retryWithJitter,
    retryDelayFn: override.retryDelayFn ?? base.retryDelayFn,
    networkMode: override.networkMode ?? base.networkMode,
    persist: override.persist ?? base.persist,
    storage: override.storage ?? base.storage,
  }
}

/**
 * Overlay `override` on a resolved config, typed fields included.
 */
export function mergeQueryConfig<TData>(
  base: QueryConfig<TData>,
  override: QueryConfigOptions<TData> | undefined,
): QueryConfig<TData> {
  return {
    ...mergeQueryBehavior(base, override),
    toJson: override?.toJson ?? base.toJson,
    fromJson: override?.fromJson ?? base.fromJson,
    placeholderData: override?.placeholderData ?? base.placeholderData,
    initialData: override?.initialData ?? base.initialData,
  }
}

/**
 * Full resolution: library defaults, then `defaults`, then `config`.
 */
export function resolveQueryConfig<TData>(
  defaults: QueryDefaults | undefined,
  config: QueryConfigOptions<TData> | undefined,
): QueryConfig<TData> {
  const behavior = mergeQueryBehavior(mergeQueryBehavior(DEFAULT_QUERY_BEHAVIOR, defaults), config)
  return {
    ...behavior,
    toJson: config?.toJson,
    fromJson: config?.fromJson,
    placeholderData: config?.placeholderData,
    initialData: config?.initialData,
  }
}

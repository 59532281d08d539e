/**
 * optimisticMutations.ts
 *
 * Ready-made optimistic mutations against one cached query.
 *
 * Each helper builds a Mutation whose onMutate snapshots the cached value,
 * writes the expected result to the cache right away, and hands the snapshot
 * on as context. onError puts the snapshot back with its original timestamp,
 * so a failed mutation leaves the cache exactly as it found it. On success
 * the optimistic value stays.
 *
 *   listPut     insert an item (front by default)
 *   listSet     replace the items matching `where`
 *   listRemove  drop the items matching `where`
 *   put / set   replace the whole value
 *   remove      delete the cached value
 *
 * mutationKey defaults to `<normalized key>_<helper>`, e.g. `todos_listPut`.
 */

import type { NormalizedKey, QueryKey } from './types'
import type { QueryCache } from './queryCache'
import { getDefaultQueryCache } from './queryCache'
import type { MutationAction } from './mutationQueue'
import { Mutation } from './mutation'
import { normalizeQueryKey } from './utils'

// ---------------------------------------------------------------------------
// Shared plumbing
// ---------------------------------------------------------------------------

/** What the cache held before the optimistic write. */
export interface CacheSnapshot<TCached> {
  value: TCached | undefined
  /** When `value` was written; rollback keeps it so staleness is unchanged. */
  timestamp?: number
}

export interface OptimisticOptions<TData, TVariables, TCached> {
  queryKey: QueryKey
  mutationFn: (variables: TVariables) => Promise<TData>
  mutationKey?: string
  cache?: QueryCache
  action?: MutationAction
  toPayload?: (variables: TVariables) => Record<string, unknown>
  onSuccess?: (data: TData, variables: TVariables, context: CacheSnapshot<TCached> | undefined) => void
  onError?: (error: unknown, variables: TVariables, context: CacheSnapshot<TCached> | undefined) => void
  onSettled?: (
    data: TData | undefined,
    error: unknown,
    variables: TVariables,
    context: CacheSnapshot<TCached> | undefined,
  ) => void
}

type ApplyFn<TVariables> = (cache: QueryCache, key: NormalizedKey, variables: TVariables) => void

function restoreSnapshot<TCached>(cache: QueryCache, key: NormalizedKey, snapshot: CacheSnapshot<TCached>): void {
  const previous = snapshot.value
  if (previous === undefined) {
    cache.removeCachedData(key)
  } else {
    cache.updateCache<TCached>(key, previous, snapshot.timestamp)
  }
}

function createOptimisticMutation<TData, TVariables, TCached>(
  helper: string,
  options: OptimisticOptions<TData, TVariables, TCached>,
  apply: ApplyFn<TVariables>,
): Mutation<TData, TVariables, CacheSnapshot<TCached>> {
  const cache = options.cache ?? getDefaultQueryCache()
  const key = normalizeQueryKey(options.queryKey)

  return new Mutation<TData, TVariables, CacheSnapshot<TCached>>({
    mutationKey: options.mutationKey ?? `${key}_${helper}`,
    mutationFn: options.mutationFn,
    cache,
    action: options.action,
    toPayload: options.toPayload,
    onMutate: (variables) => {
      const snapshot: CacheSnapshot<TCached> = {
        value: cache.getCachedData<TCached>(key),
        timestamp: cache.getEntry<TCached>(key)?.timestamp,
      }
      apply(cache, key, variables)
      return snapshot
    },
    onSuccess: options.onSuccess,
    onError: (error, variables, context) => {
      if (context) restoreSnapshot(cache, key, context)
      options.onError?.(error, variables, context)
    },
    onSettled: options.onSettled,
  })
}

// ---------------------------------------------------------------------------
// List helpers
// ---------------------------------------------------------------------------

export interface ListPutOptions<TItem> extends OptimisticOptions<TItem, TItem, TItem[]> {
  /** Insert at the front (default) or the back. */
  addToStart?: boolean
}

export function listPut<TItem>(options: ListPutOptions<TItem>): Mutation<TItem, TItem, CacheSnapshot<TItem[]>> {
  const addToStart = options.addToStart ?? true
  return createOptimisticMutation('listPut', options, (cache, key, item: TItem) => {
    cache.setQueryData<TItem[]>(key, (old) => {
      const list = old ?? []
      return addToStart ? [item, ...list] : [...list, item]
    })
  })
}

export interface ListSetOptions<TItem> extends OptimisticOptions<TItem, TItem, TItem[]> {
  /** Matches the cached items `updated` replaces. */
  where: (item: TItem, updated: TItem) => boolean
}

export function listSet<TItem>(options: ListSetOptions<TItem>): Mutation<TItem, TItem, CacheSnapshot<TItem[]>> {
  return createOptimisticMutation('listSet', options, (cache, key, updated: TItem) => {
    cache.setQueryData<TItem[]>(key, (old) => (old ?? []).map((item) => (options.where(item, updated) ? updated : item)))
  })
}

export interface ListRemoveOptions<TItem, TData> extends OptimisticOptions<TData, TItem, TItem[]> {
  /** Matches the cached items to drop. */
  where: (item: TItem, toRemove: TItem) => boolean
}

export function listRemove<TItem, TData = void>(
  options: ListRemoveOptions<TItem, TData>,
): Mutation<TData, TItem, CacheSnapshot<TItem[]>> {
  return createOptimisticMutation('listRemove', options, (cache, key, toRemove: TItem) => {
    cache.setQueryData<TItem[]>(key, (old) => (old ?? []).filter((item) => !options.where(item, toRemove)))
  })
}

// ---------------------------------------------------------------------------
// Single-value helpers
// ---------------------------------------------------------------------------

export function put<TValue>(
  options: OptimisticOptions<TValue, TValue, TValue>,
): Mutation<TValue, TValue, CacheSnapshot<TValue>> {
  return createOptimisticMutation('put', options, (cache, key, value: TValue) => {
    cache.setQueryData<TValue>(key, () => value)
  })
}

export function set<TValue>(
  options: OptimisticOptions<TValue, TValue, TValue>,
): Mutation<TValue, TValue, CacheSnapshot<TValue>> {
  return createOptimisticMutation('set', options, (cache, key, value: TValue) => {
    cache.setQueryData<TValue>(key, () => value)
  })
}

export function remove<TCached = unknown, TData = void>(
  options: OptimisticOptions<TData, void, TCached>,
): Mutation<TData, void, CacheSnapshot<TCached>> {
  return createOptimisticMutation('remove', options, (cache, key) => {
    cache.removeCachedData(key)
  })
}

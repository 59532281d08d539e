/**
 * scope.ts
 *
 * The scope collaborator: a named container that owns objects and tells
 * them when it goes away. Queries bound to a scope get their own cache
 * partition (`<scopeId>:<key>`) and, with autoDispose, are disposed with it.
 *
 * The engine only relies on the QueryScope interface. Scope is a small
 * in-process implementation with parent/child links, used for wiring and
 * tests; hosts with their own container implement QueryScope instead.
 */

import type { QueryCache } from './queryCache'
import type { QueryConfigOptions } from './queryConfig'
import type { QueryFetcher, QueryKey } from './types'
import { Query } from './query'
import { logger } from './logger'
import { generateId } from './utils'

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

export interface QueryScope {
  readonly id: string
  readonly parent: QueryScope | undefined
  readonly children: readonly QueryScope[]
  readonly isDisposed: boolean
  /** Store `value` under `name`, replacing any previous value. */
  put<T>(name: string, value: T): T
  /** The value stored under `name` here or in an ancestor. */
  find(name: string): unknown
  /**
   * Run `callback` when the scope is disposed.
   *
   * @returns A function that removes the callback.
   */
  onDispose(callback: () => void): () => void
  dispose(): void
}

// ---------------------------------------------------------------------------
// Scope
// ---------------------------------------------------------------------------

export class Scope implements QueryScope {
  readonly id: string
  readonly parent: Scope | undefined

  #children: Scope[] = []
  #values = new Map<string, unknown>()
  #disposeCallbacks = new Set<() => void>()
  #disposed = false

  constructor(options: { id?: string; parent?: Scope } = {}) {
    this.id = options.id ?? generateId('scope')
    this.parent = options.parent
    if (this.parent) this.parent.#children.push(this)
  }

  get children(): readonly Scope[] {
    return this.#children
  }

  get isDisposed(): boolean {
    return this.#disposed
  }

  createChild(id?: string): Scope {
    return new Scope({ id, parent: this })
  }

  put<T>(name: string, value: T): T {
    this.#values.set(name, value)
    return value
  }

  find(name: string): unknown {
    if (this.#values.has(name)) return this.#values.get(name)
    return this.parent?.find(name)
  }

  onDispose(callback: () => void): () => void {
    if (this.#disposed) {
      callback()
      return () => {}
    }
    this.#disposeCallbacks.add(callback)
    return () => {
      this.#disposeCallbacks.delete(callback)
    }
  }

  /** Dispose children first, then run this scope's callbacks. */
  dispose(): void {
    if (this.#disposed) return
    this.#disposed = true

    for (const child of [...this.#children]) {
      child.dispose()
    }

    const callbacks = [...this.#disposeCallbacks]
    this.#disposeCallbacks.clear()
    for (const callback of callbacks) {
      try {
        callback()
      } catch (error) {
        logger.error('[Scope]', `Dispose callback failed in scope ${this.id}`, error)
      }
    }

    this.#values.clear()
    if (this.parent) {
      this.parent.#children = this.parent.#children.filter((child) => child !== this)
    }
    logger.debug('[Scope]', `Disposed scope: ${this.id}`)
  }
}

// ---------------------------------------------------------------------------
// Scoped query helpers
// ---------------------------------------------------------------------------

export interface ScopedQueryOptions<TData> {
  queryKey: QueryKey
  queryFn: QueryFetcher<TData>
  config?: QueryConfigOptions<TData>
  cache?: QueryCache
  autoDispose?: boolean
  enabled?: boolean
  /** Name the query is stored under in the scope. Defaults to the normalized key. */
  name?: string
}

/**
 * Create a query bound to `scope` and store it there. Disposed with the
 * scope unless `autoDispose` is false.
 */
export function putQuery<TData>(scope: QueryScope, options: ScopedQueryOptions<TData>): Query<TData> {
  const query = new Query<TData>({
    queryKey: options.queryKey,
    queryFn: options.queryFn,
    config: options.config,
    cache: options.cache,
    scope,
    autoDispose: options.autoDispose,
    enabled: options.enabled,
  })
  return scope.put(options.name ?? query.queryKey, query)
}

/** Default freshness window for putCachedQuery. */
export const CACHED_QUERY_STALE_TIME = 5 * 60_000

/** putQuery with a long staleTime, for data that rarely changes. */
export function putCachedQuery<TData>(scope: QueryScope, options: ScopedQueryOptions<TData>): Query<TData> {
  return putQuery(scope, {
    ...options,
    config: { staleTime: CACHED_QUERY_STALE_TIME, ...options.config },
  })
}

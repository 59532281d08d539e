/**
 * index.ts: barrel export for the core module.
 *
 * Files are listed in dependency order (lowest-level first) for readability.
 * The optimistic helpers share short names (put, set, remove), so they are
 * exported as the `optimistic` namespace.
 */

// Shared TypeScript types (no runtime code)
export * from './types'

// Pure utility functions (no side effects, no class state)
export * from './utils'

// Errors thrown by queries and mutations
export * from './errors'

// Levelled logger shared by every module
export * from './logger'

// Observer pattern base class and the reactive value built on it
export * from './subscribable'
export * from './signal'

// Batched notification singleton
export * from './notifyManager'

// GC-aware base class for cache entries
export * from './removable'

// Cooperative cancellation and the retry engine
export * from './cancelToken'
export * from './retryer'

// Connectivity and app lifecycle, fed by rxjs streams
export * from './onlineManager'
export * from './lifecycleManager'

// Per-query behaviour and its defaults
export * from './queryConfig'

// Key-value persistence and the stored envelope format
export * from './storage'

// Query state machine
export * from './queryCore'

// Shared registry, entry store, scopes and persistence
export * from './queryCache'

// Query kinds
export * from './query'
export * from './selectedQuery'
export * from './infiniteQuery'
export * from './streamQuery'

// Lifetimes
export * from './scope'

// Writes, the offline queue and optimistic helpers
export * from './mutationQueue'
export * from './mutation'
export * as optimistic from './optimisticMutations'
export type { CacheSnapshot, OptimisticOptions } from './optimisticMutations'

// Public API facade
export * from './queryClient'

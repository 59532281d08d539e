/**
 * mutation.ts
 *
 * Mutation<TData, TVariables, TContext> runs one write-style async action
 * per mutate() call:
 *
 *   onMutate -> mutationFn -> onSuccess | onError -> onSettled
 *
 * Each callback kind runs the definition-time callback first, then the one
 * passed to mutate(). Failures never reject: mutate() resolves null and the
 * error lands in `error` / `status`.
 *
 * With a `mutationKey`, a mutation attempted while offline is turned into a
 * MutationJob on the cache's MutationQueue and replayed on reconnect.
 */

import type { MutationStatus } from './types'
import type { QueryCache } from './queryCache'
import { getDefaultQueryCache } from './queryCache'
import type { QueryScope } from './scope'
import type { ReadonlySignal } from './signal'
import type { MutationAction, MutationJob } from './mutationQueue'
import type { RetryPolicy } from './retryer'
import { Retryer } from './retryer'
import { Signal } from './signal'
import { CancelToken } from './cancelToken'
import { InvalidStateError } from './errors'
import { notifyManager } from './notifyManager'
import { DEFAULT_QUERY_BEHAVIOR } from './queryConfig'
import { logger } from './logger'
import { errorMessage, generateId, isPlainObject } from './utils'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface MutationCallbacks<TData, TVariables, TContext> {
  onSuccess?: (data: TData, variables: TVariables, context: TContext | undefined) => void
  onError?: (error: unknown, variables: TVariables, context: TContext | undefined) => void
  onSettled?: (
    data: TData | undefined,
    error: unknown,
    variables: TVariables,
    context: TContext | undefined,
  ) => void
}

export interface MutationOptions<TData, TVariables, TContext = unknown>
  extends MutationCallbacks<TData, TVariables, TContext> {
  mutationFn: (variables: TVariables) => Promise<TData>
  /** Runs first; its result is handed untouched to the later callbacks. */
  onMutate?: (variables: TVariables) => TContext | Promise<TContext>
  /** Enables offline queueing under this key. */
  mutationKey?: string
  /** Recorded on queued jobs. Default 'custom'. */
  action?: MutationAction
  /**
   * Turns variables into a job payload. Plain-object variables are used
   * as-is; anything else needs this to be queued.
   */
  toPayload?: (variables: TVariables) => Record<string, unknown>
  /** Retries of mutationFn. Default 0. */
  retryCount?: number
  retryDelay?: number
  cache?: QueryCache
  scope?: QueryScope
  autoDispose?: boolean
}

// ---------------------------------------------------------------------------
// Mutation
// ---------------------------------------------------------------------------

export class Mutation<TData, TVariables = void, TContext = unknown> {
  readonly mutationKey: string | undefined
  readonly cache: QueryCache

  readonly #options: MutationOptions<TData, TVariables, TContext>
  readonly #policy: RetryPolicy
  readonly #status = new Signal<MutationStatus>('idle')
  readonly #data = new Signal<TData | undefined>(undefined)
  readonly #error = new Signal<unknown>(null)
  readonly #isLoading = new Signal(false)
  #token?: CancelToken
  #disposed = false
  #unsubscribeScope?: () => void

  constructor(options: MutationOptions<TData, TVariables, TContext>) {
    this.#options = options
    this.mutationKey = options.mutationKey
    this.cache = options.cache ?? getDefaultQueryCache()
    this.#policy = {
      ...DEFAULT_QUERY_BEHAVIOR,
      retryCount: options.retryCount ?? 0,
      retryDelay: options.retryDelay ?? DEFAULT_QUERY_BEHAVIOR.retryDelay,
    }

    if (options.scope && (options.autoDispose ?? true)) {
      this.#unsubscribeScope = options.scope.onDispose(() => this.dispose())
    }
  }

  // -------------------------------------------------------------------------
  // State
  // -------------------------------------------------------------------------

  get status(): ReadonlySignal<MutationStatus> {
    return this.#status
  }

  get data(): ReadonlySignal<TData | undefined> {
    return this.#data
  }

  get error(): ReadonlySignal<unknown> {
    return this.#error
  }

  get isLoading(): ReadonlySignal<boolean> {
    return this.#isLoading
  }

  get isIdle(): boolean {
    return this.#status.value === 'idle'
  }

  get isSuccess(): boolean {
    return this.#status.value === 'success'
  }

  get isError(): boolean {
    return this.#status.value === 'error'
  }

  get isDisposed(): boolean {
    return this.#disposed
  }

  // -------------------------------------------------------------------------
  // mutate
  // -------------------------------------------------------------------------

  /**
   * Run the mutation.
   *
   * @returns The mutationFn result, or null when it failed or was queued.
   * @throws InvalidStateError when the mutation has been disposed.
   */
  async mutate(
    variables: TVariables,
    callbacks: MutationCallbacks<TData, TVariables, TContext> = {},
  ): Promise<TData | null> {
    if (this.#disposed) {
      throw new InvalidStateError('Mutation has been disposed')
    }

    this.#setState('loading', { error: null })
    let context: TContext | undefined

    try {
      if (this.#options.onMutate) {
        context = await this.#options.onMutate(variables)
      }
      if (this.#disposed) return null

      if (this.mutationKey !== undefined && !this.cache.isOnline && this.#enqueue(variables)) {
        return null
      }

      const data = await this.#run(variables)
      if (this.#disposed) return null

      this.#setState('success', { data })
      this.#invoke('onSuccess', () => this.#options.onSuccess?.(data, variables, context))
      this.#invoke('onSuccess', () => callbacks.onSuccess?.(data, variables, context))
      this.#invoke('onSettled', () => this.#options.onSettled?.(data, null, variables, context))
      this.#invoke('onSettled', () => callbacks.onSettled?.(data, null, variables, context))
      return data
    } catch (error) {
      if (this.#disposed) return null

      if (this.mutationKey !== undefined && !this.cache.isOnline && this.#enqueue(variables)) {
        return null
      }

      logger.debug('[Mutation]', `Mutation ${this.mutationKey ?? ''} failed: ${errorMessage(error)}`)
      this.#setState('error', { error })
      this.#invoke('onError', () => this.#options.onError?.(error, variables, context))
      this.#invoke('onError', () => callbacks.onError?.(error, variables, context))
      this.#invoke('onSettled', () => this.#options.onSettled?.(undefined, error, variables, context))
      this.#invoke('onSettled', () => callbacks.onSettled?.(undefined, error, variables, context))
      return null
    }
  }

  /** Back to idle with no data and no error. */
  reset(): void {
    if (this.#disposed) return
    this.#setState('idle', { data: undefined, error: null })
  }

  /** Cancel any in-flight attempt and stop notifying. Idempotent. */
  dispose(): void {
    if (this.#disposed) return
    this.#disposed = true
    this.#token?.cancel('disposed')
    this.#unsubscribeScope?.()
    this.#status.clearListeners()
    this.#data.clearListeners()
    this.#error.clearListeners()
    this.#isLoading.clearListeners()
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  #run(variables: TVariables): Promise<TData> {
    const token = new CancelToken(this.mutationKey ?? 'mutation')
    this.#token = token
    const retryer = new Retryer<TData>({
      fn: () => this.#options.mutationFn(variables),
      token,
      policy: this.#policy,
      label: this.mutationKey ?? 'mutation',
    })
    return retryer.start().finally(() => {
      if (this.#token === token) this.#token = undefined
    })
  }

  /**
   * Queue `variables` for replay.
   *
   * @returns false when the variables cannot be turned into a payload.
   */
  #enqueue(variables: TVariables): boolean {
    const mutationKey = this.mutationKey
    if (mutationKey === undefined) return false

    const payload = isPlainObject(variables) ? variables : this.#options.toPayload?.(variables)
    if (!payload) {
      logger.warn(
        '[Mutation]',
        `Cannot queue offline mutation ${mutationKey}: variables are not a plain object and no toPayload was given`,
      )
      return false
    }

    const job: MutationJob = {
      id: generateId('mutation'),
      mutationKey,
      action: this.#options.action ?? 'custom',
      payload,
      createdAt: Date.now(),
      retryCount: 0,
    }
    this.cache.mutationQueue.add(job)
    this.#setState('idle', {})
    return true
  }

  #setState(status: MutationStatus, patch: { data?: TData | undefined; error?: unknown }): void {
    notifyManager.batch(() => {
      if ('data' in patch) this.#data.set(patch.data)
      if ('error' in patch) this.#error.set(patch.error)
      this.#status.set(status)
      this.#isLoading.set(status === 'loading')
    })
  }

  #invoke(kind: string, callback: () => void): void {
    try {
      callback()
    } catch (error) {
      logger.error('[Mutation]', `${kind} callback threw`, error)
    }
  }
}

/**
 * queryCore.ts
 *
 * The state container shared by Query, InfiniteQuery and StreamQuery.
 *
 * - State transitions are expressed as actions fed to a pure reducer.
 * - Every state field is mirrored into its own Signal, so listeners can
 *   follow just `data` or just `fetchStatus`. The whole state is a Signal
 *   as well.
 * - All signal writes of one dispatch happen inside notifyManager.batch(),
 *   so a listener on any field sees the complete new state.
 * - After dispose() every dispatch is ignored and no listener fires again.
 */

import type { FetchStatus, QueryState, QueryStatus } from './types'
import { Signal } from './signal'
import type { ReadonlySignal } from './signal'
import { notifyManager } from './notifyManager'

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export type QueryAction<TData> =
  | { type: 'fetch' }
  | { type: 'success'; data: TData; dataUpdatedAt: number; manual?: boolean }
  | { type: 'error'; error: unknown }
  | { type: 'failed'; failureCount: number; error: unknown }
  | { type: 'invalidate' }
  | { type: 'pause' }
  | { type: 'continue' }
  | { type: 'cancel'; paused?: boolean }
  | { type: 'placeholder'; data: TData }
  | { type: 'setState'; state: Partial<QueryState<TData>> }
  | { type: 'reset'; state: QueryState<TData> }
  | { type: 'remove' }

// ---------------------------------------------------------------------------
// Reducer (pure)
// ---------------------------------------------------------------------------

/**
 * Computes the next state for an action.
 */
export function queryReducer<TData>(
  state: QueryState<TData>,
  action: QueryAction<TData>,
): QueryState<TData> {
  switch (action.type) {
    case 'fetch': {
      // Existing data (including placeholder) stays visible during a refetch.
      const status: QueryStatus = state.data === undefined ? 'loading' : state.status
      return {
        ...state,
        failureCount: 0,
        failureReason: null,
        fetchStatus: 'fetching',
        error: null,
        status,
      }
    }

    case 'success':
      return {
        ...state,
        data: action.data,
        dataUpdatedAt: action.dataUpdatedAt,
        error: null,
        failureCount: 0,
        failureReason: null,
        // A manual write does not end a fetch that is still running.
        fetchStatus: action.manual ? state.fetchStatus : 'idle',
        isInvalidated: false,
        isPlaceholderData: false,
        status: 'success',
      }

    case 'error':
      return {
        ...state,
        error: action.error,
        errorUpdatedAt: Date.now(),
        fetchStatus: 'idle',
        status: 'error',
      }

    case 'failed':
      return {
        ...state,
        failureCount: action.failureCount,
        failureReason: action.error,
      }

    case 'invalidate':
      return { ...state, isInvalidated: true }

    case 'pause':
      return { ...state, fetchStatus: 'paused' }

    case 'continue':
      return { ...state, fetchStatus: 'fetching' }

    case 'cancel': {
      const fetchStatus: FetchStatus = action.paused ? 'paused' : 'idle'
      // An abandoned first fetch leaves nothing to show.
      const status: QueryStatus = state.status === 'loading' ? 'idle' : state.status
      return { ...state, fetchStatus, status }
    }

    case 'placeholder':
      return {
        ...state,
        data: action.data,
        isPlaceholderData: true,
        status: 'success',
      }

    case 'setState':
      return { ...state, ...action.state }

    case 'reset':
      return action.state

    case 'remove': {
      // Back to never-fetched; a fetch still running keeps its fetchStatus.
      const status: QueryStatus = state.fetchStatus === 'fetching' ? 'loading' : 'idle'
      return { ...createInitialState<TData>(), fetchStatus: state.fetchStatus, status }
    }
  }
}

/** The state of a query that has never fetched. */
export function createInitialState<TData>(): QueryState<TData> {
  return {
    data: undefined,
    dataUpdatedAt: 0,
    error: null,
    errorUpdatedAt: 0,
    failureCount: 0,
    failureReason: null,
    fetchStatus: 'idle',
    isInvalidated: false,
    isPlaceholderData: false,
    status: 'idle',
  }
}

// ---------------------------------------------------------------------------
// QueryCore
// ---------------------------------------------------------------------------

export class QueryCore<TData> {
  readonly #state: Signal<QueryState<TData>>
  readonly #data: Signal<TData | undefined>
  readonly #error: Signal<unknown>
  readonly #status: Signal<QueryStatus>
  readonly #fetchStatus: Signal<FetchStatus>
  readonly #isLoading: Signal<boolean>
  readonly #isPlaceholderData: Signal<boolean>
  #disposed = false

  constructor(initialState: QueryState<TData> = createInitialState<TData>()) {
    this.#state = new Signal(initialState)
    this.#data = new Signal(initialState.data)
    this.#error = new Signal(initialState.error)
    this.#status = new Signal(initialState.status)
    this.#fetchStatus = new Signal(initialState.fetchStatus)
    this.#isLoading = new Signal(initialState.fetchStatus === 'fetching')
    this.#isPlaceholderData = new Signal(initialState.isPlaceholderData)
  }

  // -------------------------------------------------------------------------
  // Read API
  // -------------------------------------------------------------------------

  get state(): QueryState<TData> {
    return this.#state.get()
  }

  get stateSignal(): ReadonlySignal<QueryState<TData>> {
    return this.#state
  }

  get data(): ReadonlySignal<TData | undefined> {
    return this.#data
  }

  get error(): ReadonlySignal<unknown> {
    return this.#error
  }

  get status(): ReadonlySignal<QueryStatus> {
    return this.#status
  }

  get fetchStatus(): ReadonlySignal<FetchStatus> {
    return this.#fetchStatus
  }

  /** True while a fetch is running (first load or refetch). */
  get isLoading(): ReadonlySignal<boolean> {
    return this.#isLoading
  }

  get isPlaceholderData(): ReadonlySignal<boolean> {
    return this.#isPlaceholderData
  }

  get hasData(): boolean {
    return this.#state.get().data !== undefined
  }

  get isDisposed(): boolean {
    return this.#disposed
  }

  // -------------------------------------------------------------------------
  // Write API
  // -------------------------------------------------------------------------

  /**
   * Apply an action. Ignored once disposed.
   *
   * @returns The state after the action.
   */
  dispatch(action: QueryAction<TData>): QueryState<TData> {
    if (this.#disposed) return this.#state.get()

    const next = queryReducer(this.#state.get(), action)
    notifyManager.batch(() => {
      this.#data.set(next.data)
      this.#error.set(next.error)
      this.#status.set(next.status)
      this.#fetchStatus.set(next.fetchStatus)
      this.#isLoading.set(next.fetchStatus === 'fetching')
      this.#isPlaceholderData.set(next.isPlaceholderData)
      this.#state.set(next)
    })
    return next
  }

  /** Stop accepting actions and drop every listener. */
  dispose(): void {
    if (this.#disposed) return
    this.#disposed = true
    this.#state.clearListeners()
    this.#data.clearListeners()
    this.#error.clearListeners()
    this.#status.clearListeners()
    this.#fetchStatus.clearListeners()
    this.#isLoading.clearListeners()
    this.#isPlaceholderData.clearListeners()
  }
}

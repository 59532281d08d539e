/**
 * selectedQuery.ts
 *
 * The result of query.select(selector): a read-only view whose data is
 * `selector(parent.data)`.
 *
 * - recomputed only when the parent's data reference changes
 * - its data listeners fire only when the selected value changes
 *   (structural equality), not on every parent update
 * - a throwing selector becomes this view's error; the parent is untouched
 * - dispose() detaches from the parent and never disposes it
 */

import type { Query, FetchOptions } from './query'
import type { FetchStatus, QueryStatus } from './types'
import type { ReadonlySignal } from './signal'
import { Signal } from './signal'
import { notifyManager } from './notifyManager'
import { logger } from './logger'
import { deepEqual, errorMessage } from './utils'

export class SelectedQuery<TSource, TSelected> {
  readonly parent: Query<TSource>

  readonly #selector: (data: TSource) => TSelected
  readonly #data: Signal<TSelected | undefined>
  readonly #error = new Signal<unknown>(null)
  readonly #status: Signal<QueryStatus>
  #source: TSource | undefined
  #unsubscribers: Array<() => void> = []
  #disposed = false

  constructor(parent: Query<TSource>, selector: (data: TSource) => TSelected) {
    this.parent = parent
    this.#selector = selector
    this.#data = new Signal<TSelected | undefined>(undefined, { equals: deepEqual })
    this.#status = new Signal<QueryStatus>(parent.status.value)

    this.#recompute(parent.data.value)

    this.#unsubscribers.push(
      parent.data.subscribe((data) => this.#recompute(data)),
      parent.status.subscribe(() => this.#syncStatus()),
    )
  }

  get data(): ReadonlySignal<TSelected | undefined> {
    return this.#data
  }

  /** The selector's own failure, if any. */
  get error(): ReadonlySignal<unknown> {
    return this.#error
  }

  get status(): ReadonlySignal<QueryStatus> {
    return this.#status
  }

  get fetchStatus(): ReadonlySignal<FetchStatus> {
    return this.parent.fetchStatus
  }

  get isLoading(): ReadonlySignal<boolean> {
    return this.parent.isLoading
  }

  get isDisposed(): boolean {
    return this.#disposed
  }

  /** Fetch through the parent and project the result. */
  async fetch(options?: FetchOptions): Promise<TSelected> {
    const data = await this.parent.fetch(options)
    return this.#selector(data)
  }

  async refetch(): Promise<TSelected> {
    return this.fetch({ force: true })
  }

  dispose(): void {
    if (this.#disposed) return
    this.#disposed = true
    this.#unsubscribers.forEach((unsubscribe) => unsubscribe())
    this.#unsubscribers = []
    this.#data.clearListeners()
    this.#error.clearListeners()
    this.#status.clearListeners()
  }

  #recompute(source: TSource | undefined): void {
    if (this.#disposed) return
    if (source !== undefined && Object.is(source, this.#source)) return
    this.#source = source

    notifyManager.batch(() => {
      if (source === undefined) {
        this.#data.set(undefined)
        this.#error.set(null)
      } else {
        try {
          this.#data.set(this.#selector(source))
          this.#error.set(null)
        } catch (error) {
          logger.debug('[SelectedQuery]', `Selector failed for ${this.parent.cacheKey}: ${errorMessage(error)}`)
          this.#error.set(error)
        }
      }
      this.#syncStatus()
    })
  }

  #syncStatus(): void {
    if (this.#disposed) return
    this.#status.set(this.#error.value !== null ? 'error' : this.parent.status.value)
  }
}

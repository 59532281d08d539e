/**
 * signal.ts
 *
 * Signal<T> is the observable value every piece of engine state is stored in:
 * query data, status, fetchStatus, error, mutation status, and so on.
 *
 * - get() / value read the current value
 * - set() writes it and notifies listeners with (value, previous)
 * - writing a value equal to the current one notifies nobody
 * - notifications go through notifyManager, so writes made inside a
 *   notifyManager.batch() are delivered together when the batch closes
 */

import { Subscribable } from './subscribable'
import { notifyManager } from './notifyManager'

export type SignalListener<T> = (value: T, previous: T) => void

export interface SignalOptions<T> {
  /** Equality used to short-circuit writes. Defaults to Object.is. */
  equals?: (a: T, b: T) => boolean
}

/** Read-only view of a Signal, handed out by objects that own their state. */
export interface ReadonlySignal<T> {
  readonly value: T
  get(): T
  subscribe(listener: SignalListener<T>): () => void
  unsubscribe(listener: SignalListener<T>): void
}

export class Signal<T> extends Subscribable<SignalListener<T>> implements ReadonlySignal<T> {
  #value: T
  #equals: (a: T, b: T) => boolean

  constructor(initialValue: T, options?: SignalOptions<T>) {
    super()
    this.#value = initialValue
    this.#equals = options?.equals ?? Object.is
  }

  get value(): T {
    return this.#value
  }

  set value(next: T) {
    this.set(next)
  }

  get(): T {
    return this.#value
  }

  /**
   * Write a new value.
   *
   * @returns true when the value changed and listeners were notified.
   */
  set(next: T): boolean {
    const previous = this.#value
    if (this.#equals(previous, next)) return false
    this.#value = next

    // Snapshot so listeners added during delivery wait for the next write.
    const listeners = [...this.listeners]
    listeners.forEach((listener) => {
      notifyManager.schedule(() => {
        listener(next, previous)
      })
    })
    return true
  }

  /** Write the result of `updater(current)`. */
  update(updater: (current: T) => T): boolean {
    return this.set(updater(this.#value))
  }

  /** Remove a listener registered through subscribe(). */
  unsubscribe(listener: SignalListener<T>): void {
    if (this.listeners.delete(listener)) {
      this.onUnsubscribe()
    }
  }

  /** Drop every listener. Used on dispose. */
  clearListeners(): void {
    this.listeners.clear()
  }
}

/**
 * removable.ts
 *
 * Abstract base for objects evicted from a cache after an idle period.
 *
 * Extended by CacheEntry: once no live query watches an entry, it survives
 * `gcTime` (the query's cacheTime) and is then removed, unless a watcher
 * re-attaches in the meantime.
 *
 * Lifecycle:
 *   1. Entry becomes unwatched -> scheduleGc()
 *   2. gcTime ms later -> optionalRemove()
 *   3. optionalRemove() re-checks that removal is still safe
 *   4. A watcher attaching first calls clearGcTimeout()
 */

import { isValidTimeout } from './utils'

export abstract class Removable {
  /** How long (ms) to keep this object once it becomes inactive. */
  gcTime: number

  #gcTimeout?: ReturnType<typeof setTimeout>

  constructor(gcTime: number) {
    this.gcTime = gcTime
  }

  /** Cancel any pending removal. Called on forced removal. */
  destroy(): void {
    this.clearGcTimeout()
  }

  /**
   * Start (or restart) the countdown. A gcTime that is not a finite,
   * non-negative number keeps the object forever.
   */
  protected scheduleGc(): void {
    this.clearGcTimeout()
    if (isValidTimeout(this.gcTime)) {
      this.#gcTimeout = setTimeout(() => {
        this.#gcTimeout = undefined
        this.optionalRemove()
      }, this.gcTime)
    }
  }

  /** Keep the longest gcTime any owner asked for. */
  protected updateGcTime(newGcTime: number): void {
    this.gcTime = Math.max(this.gcTime, newGcTime)
  }

  protected clearGcTimeout(): void {
    if (this.#gcTimeout !== undefined) {
      clearTimeout(this.#gcTimeout)
      this.#gcTimeout = undefined
    }
  }

  /** True while a removal is scheduled. */
  isGcScheduled(): boolean {
    return this.#gcTimeout !== undefined
  }

  /**
   * Remove this instance from its owner if that is still safe. Called by
   * the GC timer.
   */
  protected abstract optionalRemove(): void
}

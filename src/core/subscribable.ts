/**
 * subscribable.ts
 *
 * Base class for the observer pattern used throughout the engine.
 *
 * Signal, QueryCache, OnlineManager and LifecycleManager all extend
 * Subscribable.
 *
 * - Listeners live in a Set: O(1) add/remove, and subscribing the same
 *   function twice keeps a single registration.
 * - subscribe() returns an unsubscribe function.
 * - onSubscribe / onUnsubscribe are protected hooks that subclasses override
 *   to start or stop side-effects while there is at least one listener.
 */
export class Subscribable<TListener extends (...args: never[]) => void = () => void> {
  /** The set of currently registered listener functions. */
  protected listeners: Set<TListener>

  constructor() {
    this.listeners = new Set<TListener>()
    // Bound so it can be handed around as a plain callback.
    this.subscribe = this.subscribe.bind(this)
  }

  /**
   * Register a listener.
   *
   * @returns An unsubscribe function; calling it twice is harmless.
   */
  subscribe(listener: TListener): () => void {
    this.listeners.add(listener)
    this.onSubscribe()

    return () => {
      if (this.listeners.delete(listener)) {
        this.onUnsubscribe()
      }
    }
  }

  /** Returns true if there is at least one active listener. */
  hasListeners(): boolean {
    return this.listeners.size > 0
  }

  /** Number of registered listeners. */
  listenerCount(): number {
    return this.listeners.size
  }

  /**
   * Called every time a listener is added via subscribe().
   */
  protected onSubscribe(): void {
    // No-op by default; subclasses opt in by overriding
  }

  /**
   * Called every time a listener is removed. Fires on EVERY removal, so
   * subclasses check `!this.hasListeners()` to react to the last one.
   */
  protected onUnsubscribe(): void {
    // No-op by default; subclasses opt in by overriding
  }
}

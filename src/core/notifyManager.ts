/**
 * notifyManager.ts
 *
 * Batches listener notifications so that a multi-field state transition
 * (status, data and fetchStatus changing together) reaches listeners only
 * after every field has been written.
 *
 * How it works:
 *   1. Callers open a "transaction" via batch(callback).
 *   2. Inside the transaction, schedule(fn) queues notifications instead of
 *      running them.
 *   3. When the outermost batch() returns, flush() drains the queue through
 *      scheduleFn.
 *
 * The default scheduler runs the queue synchronously, so a write performed
 * inside batch() has been observed by every listener once batch() returns.
 * setScheduler() can defer flushing (e.g. to a microtask) for hosts that
 * want coalesced notifications instead.
 */

type NotifyCallback = () => void
type ScheduleFunction = (callback: NotifyCallback) => void

function createNotifyManager() {
  /** Pending callbacks accumulated while a transaction is open. */
  let queue: NotifyCallback[] = []

  /** Nesting depth of open batch() calls. */
  let transactions = 0

  /** Controls WHEN a flushed queue runs. Default: right away. */
  let scheduleFn: ScheduleFunction = (callback) => callback()

  /**
   * Drain the notification queue.
   *
   * Takes a snapshot first: notifications scheduled while flushing land in
   * a fresh queue and run on their own pass.
   */
  function flush(): void {
    const localQueue = queue
    queue = []
    if (!localQueue.length) return
    scheduleFn(() => {
      localQueue.forEach((callback) => {
        callback()
      })
    })
  }

  /**
   * Run `callback` inside a notification transaction. Nested calls only
   * flush when the outermost one completes.
   *
   * @returns The return value of `callback`.
   */
  function batch<T>(callback: () => T): T {
    transactions++
    try {
      return callback()
    } finally {
      transactions--
      if (!transactions) {
        flush()
      }
    }
  }

  /**
   * Queue a notification inside a transaction, or deliver it through the
   * scheduler when no transaction is open.
   */
  function schedule(callback: NotifyCallback): void {
    if (transactions) {
      queue.push(callback)
    } else {
      scheduleFn(callback)
    }
  }

  function setScheduler(fn: ScheduleFunction): void {
    scheduleFn = fn
  }

  /** True while at least one batch() is open. */
  function isBatching(): boolean {
    return transactions > 0
  }

  return {
    batch,
    flush,
    schedule,
    isBatching,
    setScheduler,
  }
}

/**
 * The process-wide NotifyManager. Every Signal delivers its notifications
 * through it so batching is applied consistently.
 */
export const notifyManager = createNotifyManager()

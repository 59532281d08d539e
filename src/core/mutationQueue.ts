/**
 * mutationQueue.ts
 *
 * Mutations made while offline are stored as jobs and replayed, in order,
 * once the network returns.
 *
 * Functions cannot be serialised, so a job only names its mutationKey and
 * carries a JSON payload. Replay looks the key up in the handlers given to
 * registerHandlers(). A job without a handler is dropped with a warning.
 *
 * The queue is persisted under `mutation_queue` whenever it changes (when a
 * storage was given to init()) and validated with zod when restored.
 */

import { z } from 'zod'
import type { QueryStorage } from './storage'
import type { OnlineManager } from './onlineManager'
import { Subscribable } from './subscribable'
import { logger } from './logger'
import { errorMessage } from './utils'

// ---------------------------------------------------------------------------
// Jobs
// ---------------------------------------------------------------------------

export const MUTATION_QUEUE_STORAGE_KEY = 'mutation_queue'

export const mutationActionSchema = z.enum(['create', 'update', 'delete', 'custom'])

export type MutationAction = z.infer<typeof mutationActionSchema>

export const mutationJobSchema = z.object({
  id: z.string().min(1),
  mutationKey: z.string().min(1),
  action: mutationActionSchema,
  payload: z.record(z.unknown()),
  createdAt: z.number().int().nonnegative(),
  retryCount: z.number().int().nonnegative().default(0),
})

export type MutationJob = z.infer<typeof mutationJobSchema>

const persistedQueueSchema = z.object({
  queue: z.array(mutationJobSchema),
})

/** Replays one job. Throwing counts as a failed replay. */
export type MutationJobHandler = (payload: Record<string, unknown>, job: MutationJob) => Promise<unknown>

export type MutationQueueListener = (jobs: readonly MutationJob[]) => void

// ---------------------------------------------------------------------------
// MutationQueue
// ---------------------------------------------------------------------------

export class MutationQueue extends Subscribable<MutationQueueListener> {
  #jobs: MutationJob[] = []
  #handlers = new Map<string, MutationJobHandler>()
  #storage: QueryStorage | undefined
  #processing = false
  #onlineManager: OnlineManager
  #unsubscribeOnline: () => void

  constructor(config: { onlineManager: OnlineManager }) {
    super()
    this.#onlineManager = config.onlineManager
    this.#unsubscribeOnline = this.#onlineManager.subscribe((online, wasOnline) => {
      if (online && !wasOnline) {
        this.process().catch((error: unknown) => {
          logger.error('[MutationQueue]', 'Replay after reconnect failed', error)
        })
      }
    })
  }

  get pendingCount(): number {
    return this.#jobs.length
  }

  /** A copy of the queued jobs, oldest first. */
  get pendingJobs(): MutationJob[] {
    return [...this.#jobs]
  }

  get isProcessing(): boolean {
    return this.#processing
  }

  /** Attach storage and restore whatever was queued in a previous run. */
  async init(storage: QueryStorage | undefined): Promise<void> {
    this.#storage = storage
    if (!storage) return

    try {
      const raw = await storage.read(MUTATION_QUEUE_STORAGE_KEY)
      if (raw === null) return
      const parsed = persistedQueueSchema.safeParse(raw)
      if (!parsed.success) {
        logger.warn('[MutationQueue]', `Discarding unreadable mutation queue: ${parsed.error.message}`)
        return
      }
      const known = new Set(parsed.data.queue.map((job) => job.id))
      this.#jobs = [...parsed.data.queue, ...this.#jobs.filter((job) => !known.has(job.id))]
      logger.debug('[MutationQueue]', `Restored ${parsed.data.queue.length} mutations from storage`)
      this.#changed()
    } catch (error) {
      logger.warn('[MutationQueue]', `Failed to restore mutation queue: ${errorMessage(error)}`)
    }
  }

  registerHandlers(handlers: Record<string, MutationJobHandler>): void {
    for (const [mutationKey, handler] of Object.entries(handlers)) {
      this.#handlers.set(mutationKey, handler)
    }
  }

  add(job: MutationJob): void {
    this.#jobs.push(job)
    logger.debug('[MutationQueue]', `Mutation queued offline: ${job.mutationKey} (ID: ${job.id})`)
    this.#changed()
  }

  remove(id: string): void {
    const before = this.#jobs.length
    this.#jobs = this.#jobs.filter((job) => job.id !== id)
    if (this.#jobs.length !== before) this.#changed()
  }

  clear(): void {
    if (!this.#jobs.length) return
    this.#jobs = []
    this.#changed()
  }

  /**
   * Replay queued jobs oldest first while online.
   *
   * - success: the job is removed
   * - failure while offline: the job stays (retryCount + 1) and replay stops
   * - failure while online: the job is dropped and the error logged
   */
  async process(): Promise<void> {
    if (this.#processing || !this.#jobs.length || !this.#onlineManager.isOnline()) return

    this.#processing = true
    logger.debug('[MutationQueue]', `Processing offline mutation queue (${this.#jobs.length} jobs)...`)

    try {
      let job = this.#jobs[0]
      while (job && this.#onlineManager.isOnline()) {
        const handler = this.#handlers.get(job.mutationKey)
        if (!handler) {
          logger.warn('[MutationQueue]', `No handler registered for mutation key: ${job.mutationKey}. Dropping job.`)
          this.remove(job.id)
        } else {
          try {
            logger.debug('[MutationQueue]', `Replaying mutation: ${job.mutationKey}`)
            await handler(job.payload, job)
            this.remove(job.id)
          } catch (error) {
            if (!this.#onlineManager.isOnline()) {
              this.#bumpRetryCount(job.id)
              logger.warn('[MutationQueue]', `Replay of ${job.id} interrupted by network loss; will retry`)
              break
            }
            logger.error('[MutationQueue]', `Failed to replay mutation ${job.id}; dropping it`, error)
            this.remove(job.id)
          }
        }
        job = this.#jobs[0]
      }
    } finally {
      this.#processing = false
    }
  }

  dispose(): void {
    this.#unsubscribeOnline()
    this.listeners.clear()
  }

  #bumpRetryCount(id: string): void {
    this.#jobs = this.#jobs.map((job) => (job.id === id ? { ...job, retryCount: job.retryCount + 1 } : job))
    this.#changed()
  }

  #changed(): void {
    const snapshot = this.pendingJobs
    this.listeners.forEach((listener) => {
      listener(snapshot)
    })
    this.#persist().catch((error: unknown) => {
      logger.warn('[MutationQueue]', `Failed to persist mutation queue: ${errorMessage(error)}`)
    })
  }

  async #persist(): Promise<void> {
    if (!this.#storage) return
    await this.#storage.write(MUTATION_QUEUE_STORAGE_KEY, { queue: this.#jobs })
  }
}

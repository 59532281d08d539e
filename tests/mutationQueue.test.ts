import { describe, it, expect, vi } from 'vitest'
import { MUTATION_QUEUE_STORAGE_KEY, MutationQueue } from '../src/core/mutationQueue'
import type { MutationJob } from '../src/core/mutationQueue'
import { OnlineManager } from '../src/core/onlineManager'
import { MemoryStorage } from '../src/core/storage'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createJob(overrides: Partial<MutationJob> = {}): MutationJob {
  return {
    id: 'job-1',
    mutationKey: 'addTodo',
    action: 'create',
    payload: { title: 'milk' },
    createdAt: 1_000,
    retryCount: 0,
    ...overrides,
  }
}

function createQueue(online = true): { queue: MutationQueue; onlineManager: OnlineManager } {
  const onlineManager = new OnlineManager()
  onlineManager.setOnline(online)
  return { queue: new MutationQueue({ onlineManager }), onlineManager }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('MutationQueue', () => {
  describe('persistence', () => {
    it('writes the queue to storage on every change', async () => {
      const storage = new MemoryStorage()
      const { queue } = createQueue()
      await queue.init(storage)

      queue.add(createJob())

      expect(await storage.read(MUTATION_QUEUE_STORAGE_KEY)).toEqual({ queue: [createJob()] })

      queue.remove('job-1')

      expect(await storage.read(MUTATION_QUEUE_STORAGE_KEY)).toEqual({ queue: [] })
    })

    it('restores jobs queued in a previous run', async () => {
      const storage = new MemoryStorage()
      const withoutRetryCount = {
        id: 'old',
        mutationKey: 'addTodo',
        action: 'create',
        payload: { title: 'milk' },
        createdAt: 1_000,
      }
      await storage.write(MUTATION_QUEUE_STORAGE_KEY, { queue: [withoutRetryCount] })
      const { queue } = createQueue()

      await queue.init(storage)

      expect(queue.pendingJobs).toEqual([createJob({ id: 'old', retryCount: 0 })])
    })

    it('keeps jobs added before init behind the restored ones', async () => {
      const storage = new MemoryStorage()
      await storage.write(MUTATION_QUEUE_STORAGE_KEY, { queue: [createJob({ id: 'old' })] })
      const { queue } = createQueue(false)
      queue.add(createJob({ id: 'new' }))

      await queue.init(storage)

      expect(queue.pendingJobs.map((job) => job.id)).toEqual(['old', 'new'])
    })

    it('discards a stored queue that fails validation', async () => {
      const storage = new MemoryStorage()
      await storage.write(MUTATION_QUEUE_STORAGE_KEY, { queue: [{ id: '', action: 'upsert' }] })
      const { queue } = createQueue()

      await queue.init(storage)

      expect(queue.pendingCount).toBe(0)
    })

    it('works without storage', async () => {
      const { queue } = createQueue()
      await queue.init(undefined)

      queue.add(createJob())

      expect(queue.pendingCount).toBe(1)
    })
  })

  // ---------------------------------------------------------------------------

  describe('process()', () => {
    it('replays jobs oldest first and removes them', async () => {
      const { queue } = createQueue()
      const replayed: unknown[] = []
      queue.registerHandlers({
        addTodo: async (payload) => {
          replayed.push(payload)
        },
      })
      queue.add(createJob({ id: 'a', payload: { title: 'first' } }))
      queue.add(createJob({ id: 'b', payload: { title: 'second' } }))

      await queue.process()

      expect(replayed).toEqual([{ title: 'first' }, { title: 'second' }])
      expect(queue.pendingCount).toBe(0)
      expect(queue.isProcessing).toBe(false)
    })

    it('drops a job without a handler', async () => {
      const { queue } = createQueue()
      queue.add(createJob({ mutationKey: 'unknown' }))

      await queue.process()

      expect(queue.pendingCount).toBe(0)
    })

    it('drops a job whose replay fails while online', async () => {
      const { queue } = createQueue()
      const handler = vi.fn(async () => {
        throw new Error('conflict')
      })
      queue.registerHandlers({ addTodo: handler })
      queue.add(createJob({ id: 'a' }))
      queue.add(createJob({ id: 'b' }))

      await queue.process()

      expect(handler).toHaveBeenCalledTimes(2)
      expect(queue.pendingCount).toBe(0)
    })

    it('keeps the job and stops when the network drops during replay', async () => {
      const { queue, onlineManager } = createQueue()
      const handler = vi.fn(async () => {
        onlineManager.setOnline(false)
        throw new Error('network lost')
      })
      queue.registerHandlers({ addTodo: handler })
      queue.add(createJob({ id: 'a' }))
      queue.add(createJob({ id: 'b' }))

      await queue.process()

      expect(handler).toHaveBeenCalledTimes(1)
      expect(queue.pendingJobs.map((job) => [job.id, job.retryCount])).toEqual([
        ['a', 1],
        ['b', 0],
      ])
    })

    it('does nothing while offline', async () => {
      const { queue } = createQueue(false)
      const handler = vi.fn(async () => {})
      queue.registerHandlers({ addTodo: handler })
      queue.add(createJob())

      await queue.process()

      expect(handler).not.toHaveBeenCalled()
      expect(queue.pendingCount).toBe(1)
    })

    it('replays on reconnect', async () => {
      const { queue, onlineManager } = createQueue(false)
      const handler = vi.fn(async () => {})
      queue.registerHandlers({ addTodo: handler })
      queue.add(createJob())

      onlineManager.setOnline(true)

      await vi.waitFor(() => expect(queue.pendingCount).toBe(0))
      expect(handler).toHaveBeenCalledWith({ title: 'milk' }, createJob())
    })
  })

  // ---------------------------------------------------------------------------

  it('notifies listeners with a snapshot of the jobs', () => {
    const { queue } = createQueue()
    const listener = vi.fn()
    queue.subscribe(listener)

    queue.add(createJob())
    queue.clear()

    expect(listener).toHaveBeenNthCalledWith(1, [createJob()])
    expect(listener).toHaveBeenNthCalledWith(2, [])
  })

  it('ignores remove() of an unknown id', () => {
    const { queue } = createQueue()
    const listener = vi.fn()
    queue.add(createJob())
    queue.subscribe(listener)

    queue.remove('missing')

    expect(listener).not.toHaveBeenCalled()
    expect(queue.pendingCount).toBe(1)
  })

  it('stops replaying on reconnect after dispose', () => {
    const { queue, onlineManager } = createQueue(false)
    const handler = vi.fn(async () => {})
    queue.registerHandlers({ addTodo: handler })
    queue.add(createJob())

    queue.dispose()
    onlineManager.setOnline(true)

    expect(handler).not.toHaveBeenCalled()
  })
})

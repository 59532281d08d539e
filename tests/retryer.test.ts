import { describe, it, expect, vi } from 'vitest'
import { Retryer, computeRetryDelay, shouldRetry } from '../src/core/retryer'
import type { RetryPolicy } from '../src/core/retryer'
import { CancelToken } from '../src/core/cancelToken'
import { CancelledError } from '../src/core/errors'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    retryCount: 3,
    retryDelay: 100,
    maxRetryDelay: 1_000,
    retryBackoffMultiplier: 2,
    exponentialBackoff: true,
    retryWithJitter: false,
    ...overrides,
  }
}

/** A fetcher that fails `failures` times, then resolves `value`. */
function createFlakyFn<T>(failures: number, value: T) {
  let calls = 0
  return vi.fn(async () => {
    calls++
    if (calls <= failures) throw new Error(`failure ${calls}`)
    return value
  })
}

// ---------------------------------------------------------------------------
// Policy
// ---------------------------------------------------------------------------

describe('shouldRetry', () => {
  it('retries while the failed attempt index is below retryCount', () => {
    expect(shouldRetry(0, { retryCount: 2 })).toBe(true)
    expect(shouldRetry(1, { retryCount: 2 })).toBe(true)
    expect(shouldRetry(2, { retryCount: 2 })).toBe(false)
  })

  it('never retries with retryCount 0', () => {
    expect(shouldRetry(0, { retryCount: 0 })).toBe(false)
  })
})

describe('computeRetryDelay', () => {
  it('doubles the delay per attempt up to maxRetryDelay', () => {
    const policy = createPolicy()
    const delays = [0, 1, 2, 3, 4].map((attempt) => computeRetryDelay(attempt, null, policy))
    expect(delays).toEqual([100, 200, 400, 800, 1_000])
  })

  it('keeps a flat delay without exponential backoff', () => {
    const policy = createPolicy({ exponentialBackoff: false })
    expect(computeRetryDelay(3, null, policy)).toBe(100)
  })

  it('moves the delay by at most 20% with jitter', () => {
    const policy = createPolicy({ retryWithJitter: true })
    expect(computeRetryDelay(0, null, policy, () => 1)).toBe(120)
    expect(computeRetryDelay(0, null, policy, () => 0)).toBe(80)
    expect(computeRetryDelay(0, null, policy, () => 0.5)).toBe(100)
  })

  it('lets retryDelayFn decide alone', () => {
    const retryDelayFn = vi.fn((attempt: number) => attempt * 7)
    const policy = createPolicy({ retryDelayFn, retryWithJitter: true })
    const error = new Error('x')

    expect(computeRetryDelay(3, error, policy)).toBe(21)
    expect(retryDelayFn).toHaveBeenCalledWith(3, error)
  })

  it('clamps a negative retryDelayFn result to 0', () => {
    const policy = createPolicy({ retryDelayFn: () => -50 })
    expect(computeRetryDelay(0, null, policy)).toBe(0)
  })
})

// ---------------------------------------------------------------------------
// Retryer
// ---------------------------------------------------------------------------

describe('Retryer', () => {
  it('resolves on the first success without waiting', async () => {
    const retryer = new Retryer({
      fn: async () => 'data',
      token: new CancelToken(),
      policy: createPolicy(),
    })

    await expect(retryer.start()).resolves.toBe('data')
    expect(retryer.status()).toBe('resolved')
    expect(retryer.failureCount()).toBe(0)
  })

  it('retries with backoff and reports each failure', async () => {
    vi.useFakeTimers()
    const fn = createFlakyFn(2, 'ok')
    const onFail = vi.fn()
    const retryer = new Retryer({ fn, token: new CancelToken(), policy: createPolicy(), onFail })

    const result = retryer.start()

    await vi.advanceTimersByTimeAsync(99)
    expect(fn).toHaveBeenCalledTimes(1)
    expect(retryer.isRetryScheduled()).toBe(true)

    await vi.advanceTimersByTimeAsync(1)
    expect(fn).toHaveBeenCalledTimes(2)

    await vi.advanceTimersByTimeAsync(200)
    await expect(result).resolves.toBe('ok')
    expect(fn).toHaveBeenCalledTimes(3)
    expect(onFail.mock.calls.map(([count]) => count)).toEqual([1, 2])
  })

  it('makes retryCount + 1 attempts, then rejects with the last error', async () => {
    vi.useFakeTimers()
    const fn = createFlakyFn(10, 'never')
    const retryer = new Retryer({ fn, token: new CancelToken(), policy: createPolicy({ retryCount: 2 }) })

    const result = retryer.start().catch((error: unknown) => error)
    await vi.advanceTimersByTimeAsync(1_000)

    const error = await result
    expect(error).toBeInstanceOf(Error)
    expect(error instanceof Error && error.message).toBe('failure 3')
    expect(fn).toHaveBeenCalledTimes(3)
    expect(retryer.status()).toBe('rejected')
  })

  it('stops sleeping and rejects with CancelledError when cancelled', async () => {
    vi.useFakeTimers()
    const fn = createFlakyFn(5, 'never')
    const token = new CancelToken()
    const retryer = new Retryer({ fn, token, policy: createPolicy() })

    const result = retryer.start().catch((error: unknown) => error)
    await vi.advanceTimersByTimeAsync(50)
    token.cancel('user')

    const error = await result
    expect(error).toBeInstanceOf(CancelledError)
    expect(retryer.status()).toBe('cancelled')

    await vi.advanceTimersByTimeAsync(1_000)
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('drops a result that lands after cancellation', async () => {
    vi.useFakeTimers()
    const token = new CancelToken()
    const retryer = new Retryer({
      fn: () => new Promise<string>((resolve) => setTimeout(() => resolve('late'), 50)),
      token,
      policy: createPolicy(),
    })

    const result = retryer.start().catch((error: unknown) => error)
    retryer.cancel('navigated away')
    await vi.advanceTimersByTimeAsync(50)

    expect(await result).toBeInstanceOf(CancelledError)
    expect(retryer.status()).toBe('cancelled')
  })

  it('does not retry a fetcher that throws CancelledError itself', async () => {
    const fn = vi.fn(async () => {
      throw new CancelledError('aborted by fetcher')
    })
    const retryer = new Retryer({ fn, token: new CancelToken(), policy: createPolicy() })

    await expect(retryer.start()).rejects.toBeInstanceOf(CancelledError)
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('parks while canContinue is false and resumes on continue()', async () => {
    vi.useFakeTimers()
    let online = false
    const fn = createFlakyFn(1, 'recovered')
    const onPause = vi.fn()
    const onContinue = vi.fn()
    const retryer = new Retryer({
      fn,
      token: new CancelToken(),
      policy: createPolicy(),
      canContinue: () => online,
      onPause,
      onContinue,
    })

    const result = retryer.start()
    await vi.advanceTimersByTimeAsync(100)

    expect(retryer.status()).toBe('paused')
    expect(onPause).toHaveBeenCalledTimes(1)
    expect(fn).toHaveBeenCalledTimes(1)

    online = true
    retryer.continue()

    await expect(result).resolves.toBe('recovered')
    expect(onContinue).toHaveBeenCalledTimes(1)
    expect(fn).toHaveBeenCalledTimes(2)
  })

  it('passes the 0-indexed attempt number to the fetcher', async () => {
    vi.useFakeTimers()
    const attempts: number[] = []
    const retryer = new Retryer({
      fn: async (_token, attempt) => {
        attempts.push(attempt)
        if (attempt < 2) throw new Error('again')
        return attempt
      },
      token: new CancelToken(),
      policy: createPolicy(),
    })

    const result = retryer.start()
    await vi.advanceTimersByTimeAsync(300)

    await expect(result).resolves.toBe(2)
    expect(attempts).toEqual([0, 1, 2])
  })
})

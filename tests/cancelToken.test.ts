import { describe, it, expect, vi } from 'vitest'
import { CancelToken } from '../src/core/cancelToken'
import { CancelledError, isCancelledError } from '../src/core/errors'

describe('CancelToken', () => {
  it('records the reason and runs listeners once', () => {
    const token = new CancelToken('todos')
    const listener = vi.fn()
    token.onCancel(listener)

    token.cancel('superseded')
    token.cancel('again')

    expect(token.isCancelled).toBe(true)
    expect(token.reason).toBe('superseded')
    expect(listener).toHaveBeenCalledTimes(1)
  })

  it('runs a listener registered after cancellation immediately', () => {
    const token = new CancelToken()
    token.cancel()
    const listener = vi.fn()

    token.onCancel(listener)

    expect(listener).toHaveBeenCalledTimes(1)
  })

  it('does not run a listener that was removed', () => {
    const token = new CancelToken()
    const listener = vi.fn()
    const remove = token.onCancel(listener)

    remove()
    token.cancel()

    expect(listener).not.toHaveBeenCalled()
  })

  it('keeps running listeners after one throws', () => {
    const token = new CancelToken()
    const after = vi.fn()
    token.onCancel(() => {
      throw new Error('listener failed')
    })
    token.onCancel(after)

    expect(() => token.cancel()).not.toThrow()
    expect(after).toHaveBeenCalledTimes(1)
  })

  it('ignores a listener cancelling its own token', () => {
    const token = new CancelToken()
    const listener = vi.fn(() => token.cancel('nested'))
    token.onCancel(listener)

    token.cancel('outer')

    expect(listener).toHaveBeenCalledTimes(1)
    expect(token.reason).toBe('outer')
  })

  it('throwIfCancelled throws CancelledError only after cancellation', () => {
    const token = new CancelToken()
    expect(() => token.throwIfCancelled()).not.toThrow()

    token.cancel('stop')

    let caught: unknown
    try {
      token.throwIfCancelled()
    } catch (error) {
      caught = error
    }
    expect(isCancelledError(caught)).toBe(true)
    expect(caught).toBeInstanceOf(CancelledError)
    expect(caught instanceof CancelledError && caught.reason).toBe('stop')
  })
})

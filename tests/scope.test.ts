import { describe, it, expect, vi } from 'vitest'
import { CACHED_QUERY_STALE_TIME, Scope, putCachedQuery, putQuery } from '../src/core/scope'
import { QueryCache } from '../src/core/queryCache'
import { Query } from '../src/core/query'

describe('Scope', () => {
  it('finds values here or in an ancestor', () => {
    const root = new Scope({ id: 'root' })
    const child = root.createChild('child')
    root.put('theme', 'dark')
    child.put('user', 'ada')

    expect(child.find('theme')).toBe('dark')
    expect(child.find('user')).toBe('ada')
    expect(root.find('user')).toBeUndefined()
    expect(child.parent).toBe(root)
    expect(root.children).toEqual([child])
  })

  it('generates an id when none is given', () => {
    expect(new Scope().id).toMatch(/^scope/)
  })

  it('disposes children before running its own callbacks', () => {
    const root = new Scope({ id: 'root' })
    const child = root.createChild('child')
    const order: string[] = []
    root.onDispose(() => order.push('root'))
    child.onDispose(() => order.push('child'))

    root.dispose()

    expect(order).toEqual(['child', 'root'])
    expect(child.isDisposed).toBe(true)
    expect(root.children).toEqual([])
  })

  it('detaches a disposed child from its parent', () => {
    const root = new Scope()
    const child = root.createChild()

    child.dispose()

    expect(root.children).toEqual([])
    expect(root.isDisposed).toBe(false)
  })

  it('runs the remaining callbacks when one throws', () => {
    const scope = new Scope()
    const after = vi.fn()
    scope.onDispose(() => {
      throw new Error('cleanup failed')
    })
    scope.onDispose(after)

    scope.dispose()

    expect(after).toHaveBeenCalledTimes(1)
  })

  it('lets a callback be removed', () => {
    const scope = new Scope()
    const callback = vi.fn()
    const remove = scope.onDispose(callback)

    remove()
    scope.dispose()

    expect(callback).not.toHaveBeenCalled()
  })

  it('runs a callback registered after dispose right away', () => {
    const scope = new Scope()
    scope.dispose()
    const callback = vi.fn()

    scope.onDispose(callback)

    expect(callback).toHaveBeenCalledTimes(1)
  })
})

// ---------------------------------------------------------------------------

describe('putQuery', () => {
  it('stores a scoped query under its normalized key', () => {
    const cache = new QueryCache()
    const scope = new Scope({ id: 'screen' })

    const query = putQuery(scope, {
      queryKey: ['todo', 1],
      queryFn: async () => 'milk',
      config: { refetchOnMount: 'never' },
      cache,
    })

    expect(query).toBeInstanceOf(Query)
    expect(scope.find("['todo', 1]")).toBe(query)
    expect(query.cacheKey).toBe("screen:['todo', 1]")
    expect(cache.getQuery(['todo', 1], { scopeId: 'screen' })).toBe(query)
  })

  it('uses the given name', () => {
    const scope = new Scope()
    const query = putQuery(scope, {
      queryKey: 'todos',
      queryFn: async () => [],
      config: { refetchOnMount: 'never' },
      cache: new QueryCache(),
      name: 'list',
    })

    expect(scope.find('list')).toBe(query)
  })

  it('disposes the query with the scope unless autoDispose is false', () => {
    const cache = new QueryCache()
    const scope = new Scope()
    const owned = putQuery(scope, { queryKey: 'a', queryFn: async () => 1, config: { refetchOnMount: 'never' }, cache })
    const kept = putQuery(scope, {
      queryKey: 'b',
      queryFn: async () => 2,
      config: { refetchOnMount: 'never' },
      cache,
      autoDispose: false,
    })

    scope.dispose()

    expect(owned.isDisposed).toBe(true)
    expect(kept.isDisposed).toBe(false)
  })
})

describe('putCachedQuery', () => {
  it('defaults staleTime to five minutes', () => {
    const scope = new Scope()
    const query = putCachedQuery(scope, {
      queryKey: 'countries',
      queryFn: async () => ['NZ'],
      config: { refetchOnMount: 'never' },
      cache: new QueryCache(),
    })

    expect(CACHED_QUERY_STALE_TIME).toBe(300_000)
    expect(query.config.staleTime).toBe(CACHED_QUERY_STALE_TIME)
  })

  it('keeps an explicit staleTime', () => {
    const query = putCachedQuery(new Scope(), {
      queryKey: 'countries',
      queryFn: async () => ['NZ'],
      config: { staleTime: 10, refetchOnMount: 'never' },
      cache: new QueryCache(),
    })

    expect(query.config.staleTime).toBe(10)
  })
})

import { describe, it, expect, vi } from 'vitest'
import { listPut, listRemove, listSet, put, remove, set } from '../src/core/optimisticMutations'
import { QueryCache } from '../src/core/queryCache'
import { Query } from '../src/core/query'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface Todo {
  id: number
  title: string
}

function createCache<T>(key: string, value?: T): QueryCache {
  const cache = new QueryCache()
  if (value !== undefined) cache.updateCache(key, value)
  return cache
}

function createWatchingQuery<T>(cache: QueryCache, key: string, staleTime?: number): Query<T> {
  return new Query<T>({
    queryKey: key,
    queryFn: async (): Promise<T> => {
      throw new Error('not fetched in these tests')
    },
    config: { refetchOnMount: 'never', staleTime },
    cache,
  })
}

function failingFn<TVariables, TData>(observe?: (variables: TVariables) => void) {
  return vi.fn(async (variables: TVariables): Promise<TData> => {
    observe?.(variables)
    throw new Error('server rejected')
  })
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('listPut', () => {
  it('shows the item before the server answers and rolls back on failure', async () => {
    const cache = createCache('todos', ['item1'])
    let seenByServer: string[] | undefined
    const mutation = listPut<string>({
      queryKey: 'todos',
      cache,
      mutationFn: failingFn<string, string>(() => {
        seenByServer = cache.getCachedData<string[]>('todos')
      }),
    })

    await expect(mutation.mutate('item2')).resolves.toBeNull()

    expect(seenByServer).toEqual(['item2', 'item1'])
    expect(cache.getCachedData('todos')).toEqual(['item1'])
    expect(mutation.isError).toBe(true)
  })

  it('keeps the optimistic value on success', async () => {
    const cache = createCache('todos', ['item1'])
    const mutation = listPut<string>({ queryKey: 'todos', cache, mutationFn: async (item) => item })

    await mutation.mutate('item2')

    expect(cache.getCachedData('todos')).toEqual(['item2', 'item1'])
  })

  it('appends with addToStart false and starts a list when nothing is cached', async () => {
    const cache = createCache<string[]>('todos', ['a'])
    const append = listPut<string>({ queryKey: 'todos', cache, addToStart: false, mutationFn: async (item) => item })
    await append.mutate('b')
    expect(cache.getCachedData('todos')).toEqual(['a', 'b'])

    const empty = createCache<string[]>('other')
    const first = listPut<string>({ queryKey: 'other', cache: empty, mutationFn: async (item) => item })
    await first.mutate('only')
    expect(empty.getCachedData('other')).toEqual(['only'])
  })

  it('removes an entry it created when the mutation fails', async () => {
    const cache = createCache<string[]>('todos')
    const mutation = listPut<string>({ queryKey: 'todos', cache, mutationFn: failingFn<string, string>() })

    await mutation.mutate('item')

    expect(cache.getEntry('todos')).toBeUndefined()
  })

  it('clears a live query back to idle when it removes the entry it created', async () => {
    const cache = createCache<string[]>('todos')
    const query = createWatchingQuery<string[]>(cache, 'todos')
    let duringMutation: string[] | undefined
    const mutation = listPut<string>({
      queryKey: 'todos',
      cache,
      mutationFn: failingFn<string, string>(() => {
        duringMutation = query.data.value
      }),
    })

    await mutation.mutate('item')

    expect(duringMutation).toEqual(['item'])
    expect(query.data.value).toBeUndefined()
    expect(query.status.value).toBe('idle')
    expect(query.dataUpdatedAt).toBe(0)
  })

  it('keeps the original timestamp when it rolls back', async () => {
    vi.useFakeTimers()
    vi.setSystemTime(10_000)
    const cache = createCache('todos', ['item1'])
    const query = createWatchingQuery<string[]>(cache, 'todos', 1_000)
    vi.setSystemTime(15_000)
    expect(query.isStale).toBe(true)

    await listPut<string>({ queryKey: 'todos', cache, mutationFn: failingFn<string, string>() }).mutate('item2')

    expect(cache.getEntry('todos')?.timestamp).toBe(10_000)
    expect(query.data.value).toEqual(['item1'])
    expect(query.dataUpdatedAt).toBe(10_000)
    expect(query.isStale).toBe(true)
  })

  it('reaches queries watching the key, both ways', async () => {
    const cache = createCache('todos', ['item1'])
    const query = new Query<string[]>({
      queryKey: 'todos',
      queryFn: async () => ['item1'],
      config: { refetchOnMount: 'never' },
      cache,
    })
    const seen: Array<string[] | undefined> = []
    query.data.subscribe((data) => seen.push(data))

    await listPut<string>({ queryKey: 'todos', cache, mutationFn: failingFn<string, string>() }).mutate('item2')

    expect(seen).toEqual([['item2', 'item1'], ['item1']])
  })

  it('defaults the mutationKey to <key>_listPut', () => {
    const mutation = listPut<string>({ queryKey: ['todos', 1], cache: new QueryCache(), mutationFn: async (item) => item })
    expect(mutation.mutationKey).toBe("['todos', 1]_listPut")
  })

  it('passes the snapshot to a user onError', async () => {
    const onError = vi.fn()
    const cache = createCache('todos', ['item1'])
    const mutation = listPut<string>({ queryKey: 'todos', cache, mutationFn: failingFn<string, string>(), onError })

    await mutation.mutate('item2')

    expect(onError).toHaveBeenCalledWith(expect.any(Error), 'item2', { value: ['item1'], timestamp: expect.any(Number) })
  })
})

// ---------------------------------------------------------------------------

describe('listSet', () => {
  it('replaces matching items and restores them on failure', async () => {
    const original: Todo[] = [
      { id: 1, title: 'milk' },
      { id: 2, title: 'eggs' },
    ]
    const cache = createCache('todos', original)
    let optimistic: Todo[] | undefined
    const mutation = listSet<Todo>({
      queryKey: 'todos',
      cache,
      where: (item, updated) => item.id === updated.id,
      mutationFn: failingFn<Todo, Todo>(() => {
        optimistic = cache.getCachedData<Todo[]>('todos')
      }),
    })

    await mutation.mutate({ id: 2, title: 'bread' })

    expect(optimistic).toEqual([
      { id: 1, title: 'milk' },
      { id: 2, title: 'bread' },
    ])
    expect(cache.getCachedData('todos')).toEqual(original)
  })
})

describe('listRemove', () => {
  it('drops matching items', async () => {
    const cache = createCache('todos', [
      { id: 1, title: 'milk' },
      { id: 2, title: 'eggs' },
    ])
    const mutation = listRemove<Todo>({
      queryKey: 'todos',
      cache,
      where: (item, toRemove) => item.id === toRemove.id,
      mutationFn: async () => {},
    })

    await mutation.mutate({ id: 1, title: 'milk' })

    expect(cache.getCachedData('todos')).toEqual([{ id: 2, title: 'eggs' }])
  })
})

// ---------------------------------------------------------------------------

describe('single-value helpers', () => {
  it('put() replaces the value and restores it on failure', async () => {
    const cache = createCache('profile', { name: 'Ada' })
    const mutation = put<{ name: string }>({
      queryKey: 'profile',
      cache,
      mutationFn: failingFn<{ name: string }, { name: string }>(),
    })

    await mutation.mutate({ name: 'Grace' })

    expect(cache.getCachedData('profile')).toEqual({ name: 'Ada' })
    expect(mutation.mutationKey).toBe('profile_put')
  })

  it('set() keeps the new value on success', async () => {
    const cache = createCache('count', 1)
    const mutation = set<number>({ queryKey: 'count', cache, mutationFn: async (n) => n })

    await mutation.mutate(2)

    expect(cache.getCachedData('count')).toBe(2)
    expect(mutation.mutationKey).toBe('count_set')
  })

  it('remove() deletes the value and brings it back on failure', async () => {
    const cache = createCache('draft', 'text')
    let duringMutation: string | undefined = 'unset'
    const mutation = remove<string>({
      queryKey: 'draft',
      cache,
      mutationFn: async () => {
        duringMutation = cache.getCachedData<string>('draft')
        throw new Error('server rejected')
      },
    })

    await mutation.mutate()

    expect(duringMutation).toBeUndefined()
    expect(cache.getCachedData('draft')).toBe('text')
  })

  it('remove() empties a live query while the call runs and restores it on failure', async () => {
    const cache = createCache('draft', 'text')
    const query = createWatchingQuery<string>(cache, 'draft')
    let duringMutation: string | undefined = 'unset'
    const mutation = remove<string>({
      queryKey: 'draft',
      cache,
      mutationFn: async () => {
        duringMutation = query.data.value
        throw new Error('server rejected')
      },
    })

    await mutation.mutate()

    expect(duringMutation).toBeUndefined()
    expect(query.data.value).toBe('text')
    expect(query.status.value).toBe('success')
  })
})

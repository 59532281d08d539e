import { describe, it, expect, vi } from 'vitest'
import { InfiniteQuery } from '../src/core/infiniteQuery'
import type { InfiniteQueryOptions } from '../src/core/infiniteQuery'
import { QueryCache } from '../src/core/queryCache'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Pages are `page-<n>`; there are three of them. */
function createFeed(
  overrides: Partial<InfiniteQueryOptions<string, number>> = {},
): { feed: InfiniteQuery<string, number>; cache: QueryCache; queryFn: ReturnType<typeof createPageFn> } {
  const cache = overrides.cache ?? new QueryCache()
  const queryFn = createPageFn()
  const feed = new InfiniteQuery<string, number>({
    queryKey: 'feed',
    queryFn,
    initialPageParam: 1,
    getNextPageParam: (_last, all) => (all.length < 3 ? all.length + 1 : null),
    config: { retryCount: 0, refetchOnMount: 'never' },
    cache,
    ...overrides,
  })
  return { feed, cache, queryFn }
}

function createPageFn(failOn?: number) {
  return vi.fn(async (param: number) => {
    if (param === failOn) throw new Error(`page ${param} failed`)
    return `page-${param}`
  })
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('InfiniteQuery', () => {
  it('appends pages until getNextPageParam returns null', async () => {
    const { feed, queryFn } = createFeed()
    expect(feed.hasNextPage.value).toBe(true)

    await feed.fetchNextPage()
    await feed.fetchNextPage()
    await feed.fetchNextPage()

    expect(feed.data.value).toEqual(['page-1', 'page-2', 'page-3'])
    expect(feed.hasNextPage.value).toBe(false)
    expect(feed.pageParams).toEqual([1, 2, 3])

    await feed.fetchNextPage()

    expect(feed.data.value).toEqual(['page-1', 'page-2', 'page-3'])
    expect(queryFn).toHaveBeenCalledTimes(3)
  })

  it('loads only the first page on mount', async () => {
    const { feed, queryFn } = createFeed({ config: { retryCount: 0, refetchOnMount: 'ifStale' } })

    await expect(feed.fetch()).resolves.toEqual(['page-1'])

    expect(queryFn).toHaveBeenCalledTimes(1)
    expect(queryFn).toHaveBeenCalledWith(1, expect.anything())
    expect(feed.pageParams).toEqual([1])
    expect(feed.hasNextPage.value).toBe(true)
    expect(feed.status.value).toBe('success')
  })

  it('prepends pages with getPreviousPageParam', async () => {
    const queryFn = vi.fn(async (param: number) => `page-${param}`)
    const feed = new InfiniteQuery<string, number>({
      queryKey: 'history',
      queryFn,
      initialPageParam: 5,
      getNextPageParam: () => null,
      getPreviousPageParam: (_first, all) => (all.length < 2 ? 5 - all.length : null),
      config: { retryCount: 0, refetchOnMount: 'never' },
      cache: new QueryCache(),
    })

    await feed.fetch()
    expect(feed.hasPreviousPage.value).toBe(true)

    await feed.fetchPreviousPage()

    expect(feed.data.value).toEqual(['page-4', 'page-5'])
    expect(feed.pageParams).toEqual([4, 5])
    expect(feed.hasPreviousPage.value).toBe(false)
  })

  it('keeps loaded pages when a page fetch fails', async () => {
    const queryFn = createPageFn(2)
    const { feed } = createFeed({ queryFn })

    await feed.fetchNextPage()
    await feed.fetchNextPage()

    expect(feed.data.value).toEqual(['page-1'])
    expect(feed.pageError.value).toBeInstanceOf(Error)
    expect(feed.status.value).toBe('success')
    expect(feed.isFetchingNextPage.value).toBe(false)
    expect(feed.hasNextPage.value).toBe(true)
  })

  it('tracks isFetchingNextPage while a page loads', async () => {
    const { feed } = createFeed()

    const pending = feed.fetchNextPage()
    expect(feed.isFetchingNextPage.value).toBe(true)

    await pending
    expect(feed.isFetchingNextPage.value).toBe(false)
  })

  it('refetch() restarts from the first page', async () => {
    const { feed, queryFn } = createFeed()
    await feed.fetchNextPage()
    await feed.fetchNextPage()
    await feed.fetchNextPage()

    await expect(feed.refetch()).resolves.toEqual(['page-1'])

    expect(feed.hasNextPage.value).toBe(true)
    expect(feed.pageParams).toEqual([1])
    expect(queryFn).toHaveBeenLastCalledWith(1, expect.anything())
  })

  it('is registered in the cache and reloads the first page when invalidated', async () => {
    const { feed, cache } = createFeed()
    await feed.fetchNextPage()
    await feed.fetchNextPage()

    expect(cache.getQuery('feed')).toBe(feed)
    cache.invalidateQuery('feed')

    expect(feed.isStale).toBe(true)
    await expect(feed.fetch()).resolves.toEqual(['page-1'])
  })

  it('drops a page still loading when invalidate() reloads the first page', async () => {
    let releasePage3: (page: string) => void = () => {}
    const queryFn = vi.fn((param: number) =>
      param === 3
        ? new Promise<string>((resolve) => {
            releasePage3 = resolve
          })
        : Promise.resolve(`page-${param}`),
    )
    const { feed } = createFeed({ queryFn })
    await feed.fetchNextPage()
    await feed.fetchNextPage()

    const pending = feed.fetchNextPage()
    expect(feed.isFetchingNextPage.value).toBe(true)
    feed.invalidate()
    await vi.waitFor(() => expect(feed.data.value).toEqual(['page-1']))

    releasePage3('page-3')
    await pending

    expect(feed.data.value).toEqual(['page-1'])
    expect(feed.pageParams).toEqual([1])
    expect(feed.isFetchingNextPage.value).toBe(false)
  })

  it('writes its pages to the shared cache entry', async () => {
    const { feed, cache } = createFeed()

    await feed.fetchNextPage()

    expect(cache.getCachedData('feed')).toEqual(['page-1'])
  })

  it('unregisters on dispose and ignores later page requests', async () => {
    const { feed, cache, queryFn } = createFeed()

    feed.dispose()
    await feed.fetchNextPage()

    expect(feed.isDisposed).toBe(true)
    expect(cache.getQuery('feed')).toBeUndefined()
    expect(queryFn).not.toHaveBeenCalled()
  })
})

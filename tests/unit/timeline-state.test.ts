import { describe, it, expect } from 'vitest'
import {
  accountsForNetworks,
  applyResult,
  beginLoadingReplies,
  filterName,
  filterPosts,
  findAccountForPost,
  initialTimelineState,
  nextFilter,
  searchPosts,
  type TimelineState,
} from '../../src/sync/timeline-state'
import { makeAccount, makePost } from './setup/factories'

function stateWith(overrides: Partial<TimelineState>): TimelineState {
  return { ...initialTimelineState, ...overrides }
}

describe('applyResult', () => {
  it('should replace the timeline and report the count', () => {
    const posts = [makePost(), makePost()]
    const next = applyResult(stateWith({ loading: true }), { type: 'timeline-refreshed', posts })

    expect(next.posts).toBe(posts)
    expect(next.status).toBe('Loaded 2 posts')
    expect(next.loading).toBe(false)
  })

  it('should flag progress messages as loading', () => {
    expect(applyResult(initialTimelineState, { type: 'status', message: 'Refreshing...' }).loading).toBe(true)
    expect(applyResult(initialTimelineState, { type: 'status', message: 'Posted successfully!' }).loading).toBe(false)
  })

  it('should prefix errors and clear both loading flags', () => {
    const next = applyResult(stateWith({ loading: true, loadingReplies: true }), {
      type: 'error',
      message: 'No accounts configured',
    })
    expect(next).toMatchObject({ status: 'Error: No accounts configured', loading: false, loadingReplies: false })
  })

  it('should count the accounts a post went out to', () => {
    const next = applyResult(initialTimelineState, { type: 'posted', posts: [makePost(), makePost()] })
    expect(next.status).toBe('Posted to 2 account(s)')
  })

  it('should store fetched replies', () => {
    const replies = [{ post: makePost(), depth: 0 }]
    const next = applyResult(beginLoadingReplies(stateWith({ replies })), {
      type: 'context-fetched',
      postId: 'x',
      replies,
    })
    expect(next.replies).toBe(replies)
    expect(next.loadingReplies).toBe(false)
  })

  describe('interactions', () => {
    it('should mark a post liked and bump its counter once', () => {
      const post = makePost({ networkId: '1', likeCount: 4 })
      let state = stateWith({ posts: [post], loading: true })

      state = applyResult(state, { type: 'liked', postId: '1' })
      state = applyResult(state, { type: 'liked', postId: '1' })

      expect(state.posts[0]).toMatchObject({ liked: true, likeCount: 5 })
      expect(state.status).toBe('✓ Liked')
      expect(state.loading).toBe(false)
    })

    it('should never drop a counter below zero', () => {
      const post = makePost({ networkId: '1', liked: true, likeCount: 0, reposted: true, repostCount: 0 })
      let state = stateWith({ posts: [post] })

      state = applyResult(state, { type: 'unliked', postId: '1' })
      state = applyResult(state, { type: 'unreposted', postId: '1' })

      expect(state.posts[0]).toMatchObject({ liked: false, likeCount: 0, reposted: false, repostCount: 0 })
      expect(state.status).toBe('✓ Repost undone')
    })

    it('should leave an unliked post alone on unlike', () => {
      const post = makePost({ networkId: '1', likeCount: 3 })
      const state = applyResult(stateWith({ posts: [post] }), { type: 'unliked', postId: '1' })
      expect(state.posts[0]).toBe(post)
    })

    it('should update the reply list as well as the timeline', () => {
      const reply = makePost({ networkId: '9', repostCount: 1 })
      const other = makePost({ networkId: '10' })
      const state = applyResult(
        stateWith({ posts: [other], replies: [{ post: reply, depth: 2 }] }),
        { type: 'reposted', postId: '9' }
      )

      expect(state.replies[0]).toEqual({ post: { ...reply, reposted: true, repostCount: 2 }, depth: 2 })
      expect(state.posts[0]).toBe(other)
    })
  })
})

describe('beginLoadingReplies', () => {
  it('should clear stale replies', () => {
    const next = beginLoadingReplies(stateWith({ replies: [{ post: makePost(), depth: 0 }] }))
    expect(next.replies).toEqual([])
    expect(next.loadingReplies).toBe(true)
  })
})

describe('timeline selection helpers', () => {
  const masto = makePost({ networkId: 'm', content: 'Morning coffee', authorHandle: 'alice', authorName: 'Alice' })
  const sky = makePost({
    networkId: 'b',
    network: 'bluesky',
    content: 'sunset',
    authorHandle: 'bob.bsky.social',
    authorName: 'Bob',
  })

  it('should cycle filters through every network and back', () => {
    expect(nextFilter('all')).toBe('mastodon')
    expect(nextFilter('mastodon')).toBe('bluesky')
    expect(nextFilter('bluesky')).toBe('all')
  })

  it('should name filters for display', () => {
    expect(filterName('all')).toBe('All')
    expect(filterName('bluesky')).toBe('Bluesky')
  })

  it('should keep only posts from the filtered network', () => {
    expect(filterPosts([masto, sky], 'bluesky')).toEqual([sky])
    expect(filterPosts([masto, sky], 'all')).toEqual([masto, sky])
  })

  it('should search content, handle and name without regard to case', () => {
    expect(searchPosts([masto, sky], 'COFFEE')).toEqual([masto])
    expect(searchPosts([masto, sky], 'bsky')).toEqual([sky])
    expect(searchPosts([masto, sky], 'bob')).toEqual([sky])
    expect(searchPosts([masto, sky], '   ')).toEqual([masto, sky])
  })

  it('should act on a post through the first account on its network', () => {
    const first = makeAccount({ network: 'bluesky', handle: 'one.bsky.social' })
    const second = makeAccount({ network: 'bluesky', handle: 'two.bsky.social' })
    const mastodon = makeAccount({ network: 'mastodon' })

    expect(findAccountForPost([mastodon, first, second], sky)).toBe(first)
    expect(findAccountForPost([mastodon], sky)).toBeUndefined()
    expect(accountsForNetworks([mastodon, first, second], ['bluesky'])).toEqual([first, second])
  })
})

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { dispatchDueScheduledPosts, startScheduler } from '../../src/sync/scheduler'
import type { SyncCommand } from '../../src/sync/commands'
import { Database } from '../../src/store/db'

const DUE = new Date('2030-01-15T10:00:00.000Z')
const EARLIER = new Date('2030-01-15T09:00:00.000Z')
const LATER = new Date('2030-01-15T11:00:00.000Z')

describe('dispatchDueScheduledPosts', () => {
  let db: Database
  let sent: SyncCommand[]
  const send = vi.fn(async (command: SyncCommand) => {
    sent.push(command)
  })

  beforeEach(async () => {
    db = await Database.open(':memory:')
    sent = []
    send.mockClear()
  })

  afterEach(() => {
    vi.useRealTimers()
    db.close()
  })

  it('should submit a due post through one account per network and mark it posting', async () => {
    const alice = await db.insertAccount({ network: 'mastodon', displayName: 'Alice', handle: 'alice', server: 'https://social.example' })
    const bob = await db.insertAccount({ network: 'bluesky', displayName: 'Bob', handle: 'bob.bsky.social', server: 'https://bsky.social' })
    const post = await db.saveScheduledPost({ content: 'scheduled hello', networks: ['bluesky', 'mastodon'], scheduledFor: EARLIER })
    await db.saveScheduledPost({ content: 'not yet', networks: ['mastodon'], scheduledFor: LATER })

    expect(await dispatchDueScheduledPosts({ db, send }, DUE)).toBe(1)

    expect(sent).toEqual([
      { type: 'submit-post', content: 'scheduled hello', accounts: [bob, alice], scheduledId: post.id },
    ])
    const [loaded] = await db.getScheduledPosts()
    expect(loaded).toMatchObject({ id: post.id, status: 'posting' })
  })

  it('should not send a post twice', async () => {
    await db.insertAccount({ network: 'mastodon', displayName: 'Alice', handle: 'alice', server: 'https://social.example' })
    await db.saveScheduledPost({ content: 'once', networks: ['mastodon'], scheduledFor: EARLIER })

    await dispatchDueScheduledPosts({ db, send }, DUE)
    expect(await dispatchDueScheduledPosts({ db, send }, DUE)).toBe(0)
    expect(send).toHaveBeenCalledTimes(1)
  })

  it('should post to the networks that have an account', async () => {
    const alice = await db.insertAccount({ network: 'mastodon', displayName: 'Alice', handle: 'alice', server: 'https://social.example' })
    await db.saveScheduledPost({ content: 'partial', networks: ['mastodon', 'bluesky'], scheduledFor: EARLIER })

    await dispatchDueScheduledPosts({ db, send }, DUE)

    expect(sent[0]).toMatchObject({ accounts: [alice] })
  })

  it('should fail a post none of whose networks has an account', async () => {
    const post = await db.saveScheduledPost({ content: 'orphan', networks: ['bluesky'], scheduledFor: EARLIER })

    expect(await dispatchDueScheduledPosts({ db, send }, DUE)).toBe(0)

    expect(send).not.toHaveBeenCalled()
    const [loaded] = await db.getScheduledPosts()
    expect(loaded).toMatchObject({ id: post.id, status: 'failed', error: 'No account for Bluesky' })
  })

  it('should leave the post pending when the worker no longer accepts commands', async () => {
    await db.insertAccount({ network: 'mastodon', displayName: 'Alice', handle: 'alice', server: 'https://social.example' })
    await db.saveScheduledPost({ content: 'retry', networks: ['mastodon'], scheduledFor: EARLIER })
    const closed = vi.fn(async () => {
      throw new Error('Queue is closed')
    })

    await expect(dispatchDueScheduledPosts({ db, send: closed }, DUE)).rejects.toThrow('Queue is closed')

    const [loaded] = await db.getScheduledPosts()
    expect(loaded?.status).toBe('pending')
  })
})

describe('startScheduler', () => {
  let db: Database

  beforeEach(async () => {
    db = await Database.open(':memory:')
  })

  afterEach(() => {
    vi.useRealTimers()
    db.close()
  })

  it('should check at once and again on every interval until stopped', async () => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] })
    const getDue = vi.spyOn(db, 'getDueScheduledPosts').mockResolvedValue([])
    const settle = () => new Promise(resolve => setImmediate(resolve))

    const stop = startScheduler({ db, send: vi.fn(async () => {}) }, 30)
    expect(getDue).toHaveBeenCalledTimes(1)
    await settle()

    vi.advanceTimersByTime(30_000)
    expect(getDue).toHaveBeenCalledTimes(2)
    await settle()

    stop()
    vi.advanceTimersByTime(60_000)
    expect(getDue).toHaveBeenCalledTimes(2)
  })

  it('should skip a check while the previous one is still running', async () => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] })
    let finish = () => {}
    const getDue = vi.spyOn(db, 'getDueScheduledPosts').mockImplementation(
      () =>
        new Promise(resolve => {
          finish = () => resolve([])
        })
    )

    const stop = startScheduler({ db, send: vi.fn(async () => {}) }, 30)
    vi.advanceTimersByTime(30_000)
    expect(getDue).toHaveBeenCalledTimes(1)

    finish()
    await new Promise(resolve => setImmediate(resolve))
    vi.advanceTimersByTime(30_000)
    expect(getDue).toHaveBeenCalledTimes(2)
    stop()
  })
})

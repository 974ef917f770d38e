/**
 * Local database for configured accounts, cached posts and scheduled posts (libSQL)
 *
 * Only one account is the default at a time, across every network.
 */

import { createClient, type Client, type InStatement, type Row } from '@libsql/client'
import * as fs from 'fs'
import * as path from 'path'
import { v4 as uuidv4 } from 'uuid'
import { z } from 'zod'
import {
  parsePlatformType,
  parseScheduledPostStatus,
  type IAccount,
  type IMediaAttachment,
  type IPost,
  type IScheduledPost,
  type PlatformType,
  type ScheduledPostStatus,
} from '@/platforms/types'

const SCHEMA: string[] = [
  `CREATE TABLE IF NOT EXISTS accounts (
    id TEXT PRIMARY KEY,
    network TEXT NOT NULL,
    display_name TEXT NOT NULL,
    handle TEXT NOT NULL,
    server TEXT NOT NULL,
    is_default INTEGER NOT NULL DEFAULT 0,
    avatar_url TEXT,
    created_at TEXT NOT NULL,
    last_used_at TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS post_cache (
    id TEXT PRIMARY KEY,
    network_id TEXT NOT NULL,
    network TEXT NOT NULL,
    author_handle TEXT NOT NULL,
    author_name TEXT NOT NULL,
    author_avatar TEXT,
    content TEXT NOT NULL,
    content_raw TEXT,
    created_at TEXT NOT NULL,
    url TEXT,
    is_repost INTEGER NOT NULL DEFAULT 0,
    repost_author TEXT,
    like_count INTEGER NOT NULL DEFAULT 0,
    repost_count INTEGER NOT NULL DEFAULT 0,
    reply_count INTEGER NOT NULL DEFAULT 0,
    liked INTEGER NOT NULL DEFAULT 0,
    reposted INTEGER NOT NULL DEFAULT 0,
    reply_to_id TEXT,
    cid TEXT,
    uri TEXT,
    media_json TEXT DEFAULT '[]',
    cached_at TEXT NOT NULL,
    UNIQUE(network, network_id)
  )`,
  `CREATE TABLE IF NOT EXISTS scheduled_posts (
    id TEXT PRIMARY KEY,
    content TEXT NOT NULL,
    networks TEXT NOT NULL,
    scheduled_for TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'pending',
    error TEXT,
    created_at TEXT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_accounts_network ON accounts(network)`,
  `CREATE INDEX IF NOT EXISTS idx_post_cache_network ON post_cache(network)`,
  `CREATE INDEX IF NOT EXISTS idx_post_cache_cached_at ON post_cache(cached_at)`,
  `CREATE INDEX IF NOT EXISTS idx_scheduled_posts_status ON scheduled_posts(status)`,
  `CREATE INDEX IF NOT EXISTS idx_scheduled_posts_scheduled_for ON scheduled_posts(scheduled_for)`,
]

const ACCOUNT_COLUMNS = 'id, network, display_name, handle, server, is_default, avatar_url, created_at, last_used_at'

const POST_COLUMNS = `id, network_id, network, author_handle, author_name, author_avatar,
  content, content_raw, created_at, url, is_repost, repost_author,
  like_count, repost_count, reply_count, liked, reposted, reply_to_id,
  cid, uri, media_json`

const SCHEDULED_COLUMNS = 'id, content, networks, scheduled_for, status, error, created_at'

// Statuses a scheduled post never leaves
const FINISHED_STATUSES = "('posted', 'failed', 'cancelled')"

const mediaListSchema = z.array(
  z.object({
    url: z.string(),
    previewUrl: z.string().optional(),
    mediaType: z.enum(['image', 'video', 'gifv', 'audio', 'unknown']),
    altText: z.string().optional(),
  })
)

/**
 * Account fields supplied when registering an account
 */
export interface NewAccount {
  network: PlatformType
  displayName: string
  handle: string
  server: string
  avatarUrl?: string
  isDefault?: boolean
}

/**
 * Fields supplied when scheduling a post
 */
export interface NewScheduledPost {
  content: string
  networks: PlatformType[]
  scheduledFor: Date
}

// ==================== Row helpers ====================

function text(row: Row, column: string): string {
  const value = row[column]
  if (value === null || value === undefined) {
    throw new Error(`Column ${column} is null`)
  }
  return String(value)
}

function optionalText(row: Row, column: string): string | undefined {
  const value = row[column]
  return value === null || value === undefined ? undefined : String(value)
}

function integer(row: Row, column: string): number {
  return Number(row[column] ?? 0)
}

function flag(row: Row, column: string): boolean {
  return integer(row, column) !== 0
}

function network(row: Row): PlatformType {
  const raw = text(row, 'network')
  const parsed = parsePlatformType(raw)
  if (!parsed) {
    throw new Error(`Unknown network in database: ${raw}`)
  }
  return parsed
}

function optionalDate(row: Row, column: string): Date | undefined {
  const raw = optionalText(row, column)
  if (raw === undefined) return undefined
  const date = new Date(raw)
  return Number.isNaN(date.getTime()) ? undefined : date
}

function media(row: Row): IMediaAttachment[] {
  const raw = optionalText(row, 'media_json')
  if (!raw) return []
  try {
    const parsed = mediaListSchema.safeParse(JSON.parse(raw))
    return parsed.success ? parsed.data : []
  } catch (error) {
    if (error instanceof SyntaxError) return []
    throw error
  }
}

function rowToAccount(row: Row): IAccount {
  return {
    id: text(row, 'id'),
    network: network(row),
    displayName: text(row, 'display_name'),
    handle: text(row, 'handle'),
    server: text(row, 'server'),
    isDefault: flag(row, 'is_default'),
    avatarUrl: optionalText(row, 'avatar_url'),
    createdAt: optionalDate(row, 'created_at') ?? new Date(0),
    lastUsedAt: optionalDate(row, 'last_used_at'),
  }
}

function rowToPost(row: Row): IPost {
  return {
    id: text(row, 'id'),
    networkId: text(row, 'network_id'),
    network: network(row),
    authorHandle: text(row, 'author_handle'),
    authorName: text(row, 'author_name'),
    authorAvatar: optionalText(row, 'author_avatar'),
    content: text(row, 'content'),
    contentRaw: optionalText(row, 'content_raw'),
    createdAt: optionalDate(row, 'created_at') ?? new Date(0),
    url: optionalText(row, 'url'),
    isRepost: flag(row, 'is_repost'),
    repostAuthor: optionalText(row, 'repost_author'),
    likeCount: integer(row, 'like_count'),
    repostCount: integer(row, 'repost_count'),
    replyCount: integer(row, 'reply_count'),
    liked: flag(row, 'liked'),
    reposted: flag(row, 'reposted'),
    replyToId: optionalText(row, 'reply_to_id'),
    media: media(row),
    cid: optionalText(row, 'cid'),
    uri: optionalText(row, 'uri'),
  }
}

function rowToScheduledPost(row: Row): IScheduledPost {
  const status = parseScheduledPostStatus(text(row, 'status'))
  if (!status) {
    throw new Error(`Unknown scheduled post status in database: ${text(row, 'status')}`)
  }
  const networks = text(row, 'networks')
    .split(',')
    .map(parsePlatformType)
    .filter((platform): platform is PlatformType => platform !== null)

  return {
    id: text(row, 'id'),
    content: text(row, 'content'),
    networks,
    scheduledFor: optionalDate(row, 'scheduled_for') ?? new Date(0),
    status,
    error: optionalText(row, 'error'),
    createdAt: optionalDate(row, 'created_at') ?? new Date(0),
  }
}

function cachePostStatement(post: IPost, cachedAt: string): InStatement {
  return {
    sql: `
      INSERT INTO post_cache (${POST_COLUMNS}, cached_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(network, network_id) DO UPDATE SET
        author_handle = excluded.author_handle,
        author_name = excluded.author_name,
        author_avatar = excluded.author_avatar,
        content = excluded.content,
        content_raw = excluded.content_raw,
        url = excluded.url,
        is_repost = excluded.is_repost,
        repost_author = excluded.repost_author,
        like_count = excluded.like_count,
        repost_count = excluded.repost_count,
        reply_count = excluded.reply_count,
        liked = excluded.liked,
        reposted = excluded.reposted,
        cid = COALESCE(excluded.cid, cid),
        uri = COALESCE(excluded.uri, uri),
        media_json = excluded.media_json,
        cached_at = excluded.cached_at
    `,
    args: [
      post.id,
      post.networkId,
      post.network,
      post.authorHandle,
      post.authorName,
      post.authorAvatar ?? null,
      post.content,
      post.contentRaw ?? null,
      post.createdAt.toISOString(),
      post.url ?? null,
      post.isRepost ? 1 : 0,
      post.repostAuthor ?? null,
      post.likeCount,
      post.repostCount,
      post.replyCount,
      post.liked ? 1 : 0,
      post.reposted ? 1 : 0,
      post.replyToId ?? null,
      post.cid ?? null,
      post.uri ?? null,
      JSON.stringify(post.media),
      cachedAt,
    ],
  }
}

export class Database {
  private constructor(private readonly client: Client) {}

  /**
   * Open (creating if needed) the database at a libSQL URL such as
   * `file:/path/to/twinfeed.db` or `:memory:`
   */
  static async open(url: string): Promise<Database> {
    if (url.startsWith('file:')) {
      fs.mkdirSync(path.dirname(url.slice('file:'.length)), { recursive: true })
    }
    const db = new Database(createClient({ url }))
    await db.init()
    return db
  }

  private async init(): Promise<void> {
    for (const statement of SCHEMA) {
      await this.client.execute(statement)
    }
  }

  close(): void {
    this.client.close()
  }

  // ==================== Accounts ====================

  async insertAccount(input: NewAccount): Promise<IAccount> {
    const account: IAccount = {
      id: uuidv4(),
      network: input.network,
      displayName: input.displayName,
      handle: input.handle,
      server: input.server,
      isDefault: input.isDefault ?? false,
      avatarUrl: input.avatarUrl,
      createdAt: new Date(),
    }

    await this.client.execute({
      sql: `INSERT INTO accounts (${ACCOUNT_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      args: [
        account.id,
        account.network,
        account.displayName,
        account.handle,
        account.server,
        account.isDefault ? 1 : 0,
        account.avatarUrl ?? null,
        account.createdAt.toISOString(),
        null,
      ],
    })

    return account
  }

  async getAccounts(): Promise<IAccount[]> {
    const result = await this.client.execute(`SELECT ${ACCOUNT_COLUMNS} FROM accounts ORDER BY network, display_name`)
    return result.rows.map(rowToAccount)
  }

  async getAccountsForNetwork(platform: PlatformType): Promise<IAccount[]> {
    const result = await this.client.execute({
      sql: `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE network = ? ORDER BY display_name`,
      args: [platform],
    })
    return result.rows.map(rowToAccount)
  }

  /**
   * The account to post through on a network: the default one, else the first by display name
   */
  async getPostingAccount(platform: PlatformType): Promise<IAccount | null> {
    const result = await this.client.execute({
      sql: `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE network = ? ORDER BY is_default DESC, display_name LIMIT 1`,
      args: [platform],
    })
    const row = result.rows[0]
    return row ? rowToAccount(row) : null
  }

  async getDefaultAccount(platform: PlatformType): Promise<IAccount | null> {
    const result = await this.client.execute({
      sql: `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE network = ? AND is_default = 1 LIMIT 1`,
      args: [platform],
    })
    const row = result.rows[0]
    return row ? rowToAccount(row) : null
  }

  async deleteAccount(id: string): Promise<void> {
    await this.client.execute({ sql: 'DELETE FROM accounts WHERE id = ?', args: [id] })
  }

  /**
   * Make an account the default. Clears the flag on every other account,
   * whatever its network.
   */
  async setDefaultAccount(id: string): Promise<void> {
    await this.client.batch(
      [
        'UPDATE accounts SET is_default = 0',
        { sql: 'UPDATE accounts SET is_default = 1 WHERE id = ?', args: [id] },
      ],
      'write'
    )
  }

  async updateAccountLastUsed(id: string, at: Date = new Date()): Promise<void> {
    await this.client.execute({
      sql: 'UPDATE accounts SET last_used_at = ? WHERE id = ?',
      args: [at.toISOString(), id],
    })
  }

  // ==================== Post Cache ====================

  async cachePosts(posts: IPost[]): Promise<void> {
    if (posts.length === 0) return
    const cachedAt = new Date().toISOString()
    await this.client.batch(
      posts.map(post => cachePostStatement(post, cachedAt)),
      'write'
    )
  }

  /**
   * Cached posts, newest first
   */
  async getCachedPosts(platform: PlatformType | null = null, limit: number = 50): Promise<IPost[]> {
    const result = platform
      ? await this.client.execute({
          sql: `SELECT ${POST_COLUMNS} FROM post_cache WHERE network = ? ORDER BY created_at DESC LIMIT ?`,
          args: [platform, limit],
        })
      : await this.client.execute({
          sql: `SELECT ${POST_COLUMNS} FROM post_cache ORDER BY created_at DESC LIMIT ?`,
          args: [limit],
        })
    return result.rows.map(rowToPost)
  }

  /**
   * Remove posts cached more than maxAgeHours ago; returns the number removed
   */
  async clearOldCache(maxAgeHours: number): Promise<number> {
    const cutoff = new Date(Date.now() - maxAgeHours * 60 * 60 * 1000).toISOString()
    const result = await this.client.execute({
      sql: 'DELETE FROM post_cache WHERE cached_at < ?',
      args: [cutoff],
    })
    return result.rowsAffected
  }

  // ==================== Scheduled Posts ====================

  async saveScheduledPost(input: NewScheduledPost): Promise<IScheduledPost> {
    const post: IScheduledPost = {
      id: uuidv4(),
      content: input.content,
      networks: input.networks,
      scheduledFor: input.scheduledFor,
      status: 'pending',
      createdAt: new Date(),
    }

    await this.client.execute({
      sql: `INSERT INTO scheduled_posts (${SCHEDULED_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?)`,
      args: [
        post.id,
        post.content,
        post.networks.join(','),
        post.scheduledFor.toISOString(),
        post.status,
        null,
        post.createdAt.toISOString(),
      ],
    })

    return post
  }

  /**
   * Every scheduled post, soonest first
   */
  async getScheduledPosts(): Promise<IScheduledPost[]> {
    const result = await this.client.execute(
      `SELECT ${SCHEDULED_COLUMNS} FROM scheduled_posts ORDER BY scheduled_for ASC`
    )
    return result.rows.map(rowToScheduledPost)
  }

  /**
   * Pending posts whose time has come, soonest first
   */
  async getDueScheduledPosts(now: Date = new Date()): Promise<IScheduledPost[]> {
    const result = await this.client.execute({
      sql: `SELECT ${SCHEDULED_COLUMNS} FROM scheduled_posts
        WHERE status = 'pending' AND scheduled_for <= ?
        ORDER BY scheduled_for ASC`,
      args: [now.toISOString()],
    })
    return result.rows.map(rowToScheduledPost)
  }

  async getPendingScheduledPosts(): Promise<IScheduledPost[]> {
    const result = await this.client.execute(
      `SELECT ${SCHEDULED_COLUMNS} FROM scheduled_posts WHERE status = 'pending' ORDER BY scheduled_for ASC`
    )
    return result.rows.map(rowToScheduledPost)
  }

  async updateScheduledPostStatus(id: string, status: ScheduledPostStatus, error?: string): Promise<void> {
    await this.client.execute({
      sql: 'UPDATE scheduled_posts SET status = ?, error = ? WHERE id = ?',
      args: [status, error ?? null, id],
    })
  }

  /**
   * Move a pending post to posting; false when it already left pending
   */
  async claimScheduledPost(id: string): Promise<boolean> {
    const result = await this.client.execute({
      sql: "UPDATE scheduled_posts SET status = 'posting' WHERE id = ? AND status = 'pending'",
      args: [id],
    })
    return result.rowsAffected > 0
  }

  /**
   * Cancel a post that has not been sent yet; false when none matched
   */
  async cancelScheduledPost(id: string): Promise<boolean> {
    const result = await this.client.execute({
      sql: "UPDATE scheduled_posts SET status = 'cancelled' WHERE id = ? AND status = 'pending'",
      args: [id],
    })
    return result.rowsAffected > 0
  }

  /**
   * Remove finished scheduled posts created more than maxAgeHours ago; returns the number removed
   */
  async clearOldScheduledPosts(maxAgeHours: number): Promise<number> {
    const cutoff = new Date(Date.now() - maxAgeHours * 60 * 60 * 1000).toISOString()
    const result = await this.client.execute({
      sql: `DELETE FROM scheduled_posts WHERE status IN ${FINISHED_STATUSES} AND created_at < ?`,
      args: [cutoff],
    })
    return result.rowsAffected
  }
}

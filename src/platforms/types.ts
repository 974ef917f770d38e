/**
 * Platform abstraction types for multi-network timeline support
 * Provides a unified model for Mastodon and Bluesky
 */

// ==================== Platform Types ====================

export type PlatformType = 'mastodon' | 'bluesky'

export const PLATFORM_TYPES: readonly PlatformType[] = ['mastodon', 'bluesky']

interface PlatformInfo {
  name: string
  icon: string
  color: string
}

const PLATFORM_INFO: Record<PlatformType, PlatformInfo> = {
  mastodon: { name: 'Mastodon', icon: '🐘', color: '#6364FF' },
  bluesky: { name: 'Bluesky', icon: '🦋', color: '#0085FF' },
}

export function platformName(platform: PlatformType): string {
  return PLATFORM_INFO[platform].name
}

export function platformIcon(platform: PlatformType): string {
  return PLATFORM_INFO[platform].icon
}

export function platformColor(platform: PlatformType): string {
  return PLATFORM_INFO[platform].color
}

/**
 * Parse a network name, accepting the usual short forms
 */
export function parsePlatformType(raw: string): PlatformType | null {
  switch (raw.trim().toLowerCase()) {
    case 'mastodon':
    case 'masto':
      return 'mastodon'
    case 'bluesky':
    case 'bsky':
      return 'bluesky'
    default:
      return null
  }
}

// ==================== Post Abstraction ====================

export type MediaType = 'image' | 'video' | 'gifv' | 'audio' | 'unknown'

export interface IMediaAttachment {
  url: string
  previewUrl?: string
  mediaType: MediaType
  altText?: string
}

/**
 * Platform-agnostic post representation
 */
export interface IPost {
  id: string // Local UUID, used as the cache key
  networkId: string // Status id on Mastodon, record key on Bluesky
  network: PlatformType
  authorHandle: string
  authorName: string
  authorAvatar?: string
  content: string // Plain text
  contentRaw?: string // Original HTML on Mastodon
  createdAt: Date
  url?: string
  isRepost: boolean
  repostAuthor?: string // Display name of whoever reposted it
  likeCount: number
  repostCount: number
  replyCount: number
  liked: boolean
  reposted: boolean
  replyToId?: string // Parent status id (Mastodon) or parent at:// URI (Bluesky)
  media: IMediaAttachment[]
  cid?: string // Bluesky content hash
  uri?: string // Bluesky at:// resource path
}

/**
 * A reply with its nesting depth for display (0 = direct reply)
 */
export interface ReplyItem {
  post: IPost
  depth: number
}

// ==================== Account Abstraction ====================

export interface IAccount {
  id: string
  network: PlatformType
  displayName: string
  handle: string
  server: string // Instance URL for Mastodon, PDS URL for Bluesky
  isDefault: boolean
  avatarUrl?: string
  createdAt: Date
  lastUsedAt?: Date
}

/**
 * Full handle for display, e.g. "@alice@mastodon.example" or "@alice.bsky.social"
 */
export function fullHandle(account: Pick<IAccount, 'network' | 'handle' | 'server'>): string {
  if (account.network === 'mastodon' && !account.handle.includes('@')) {
    const domain = account.server
      .replace(/^https?:\/\//, '')
      .replace(/\/+$/, '')
    return `@${account.handle}@${domain}`
  }
  return account.handle.startsWith('@') ? account.handle : `@${account.handle}`
}

/**
 * Key under which an account's secret is kept in the secret store
 */
export function credentialKey(account: Pick<IAccount, 'network' | 'id'>): string {
  return `twinfeed:${account.network}:${account.id}`
}

// ==================== Scheduled Posts ====================

export type ScheduledPostStatus = 'pending' | 'posting' | 'posted' | 'failed' | 'cancelled'

export const SCHEDULED_POST_STATUSES: readonly ScheduledPostStatus[] = [
  'pending',
  'posting',
  'posted',
  'failed',
  'cancelled',
]

const SCHEDULED_STATUS_ICONS: Record<ScheduledPostStatus, string> = {
  pending: '⏳',
  posting: '📤',
  posted: '✅',
  failed: '❌',
  cancelled: '🚫',
}

export function scheduledStatusIcon(status: ScheduledPostStatus): string {
  return SCHEDULED_STATUS_ICONS[status]
}

export function parseScheduledPostStatus(raw: string): ScheduledPostStatus | null {
  const lower = raw.trim().toLowerCase()
  return SCHEDULED_POST_STATUSES.find(status => status === lower) ?? null
}

/**
 * A post queued for later, sent through one account per listed network
 */
export interface IScheduledPost {
  id: string
  content: string
  networks: PlatformType[]
  scheduledFor: Date
  status: ScheduledPostStatus
  error?: string
  createdAt: Date
}

// ==================== Platform Client Interface ====================

/**
 * Core platform client interface
 * Both network implementations must implement this interface
 */
export interface IPlatformClient {
  readonly type: PlatformType

  /**
   * Get the home timeline (most recent first)
   */
  timeline(limit: number): Promise<IPost[]>

  /**
   * Get the replies below a post as a flat list
   */
  getContext(post: IPost): Promise<IPost[]>

  post(content: string): Promise<IPost>

  /**
   * Reply to a post on the same network
   */
  reply(content: string, target: IPost): Promise<IPost>

  like(post: IPost): Promise<void>

  unlike(post: IPost): Promise<void>

  repost(post: IPost): Promise<void>

  unrepost(post: IPost): Promise<void>

  /**
   * Check the credentials and describe the account they belong to
   */
  verifyCredentials(): Promise<IAccount>
}

/**
 * Display helpers for the terminal UI
 */

import { emojify as emojifyNode } from 'node-emoji'
import stringWidth from 'string-width'
import { platformIcon, type IPost } from '@/platforms/types'

// ==================== Emoji Utilities ====================

/**
 * Convert emoji shortcodes (:wave:) to Unicode emojis
 */
export const emojify = (text: string): string => {
  return emojifyNode(text)
}

// ==================== Width Utilities ====================

const ELLIPSIS = '…'
const ELLIPSIS_WIDTH = stringWidth(ELLIPSIS)

/**
 * Truncate text to fit within maxWidth (in terminal columns).
 * Emoji and other wide chars count as 2. Appends … when truncated.
 */
export function truncateToWidth(text: string, maxWidth: number): string {
  if (maxWidth < ELLIPSIS_WIDTH) return ''
  if (stringWidth(text) <= maxWidth) return text
  let prefix = ''
  for (const c of text) {
    if (stringWidth(prefix + c) + ELLIPSIS_WIDTH > maxWidth) break
    prefix += c
  }
  return prefix + ELLIPSIS
}

/**
 * First line of a post, collapsed and cut to width
 */
export function preview(content: string, maxWidth: number): string {
  const singleLine = content.replace(/\s+/g, ' ').trim()
  return truncateToWidth(singleLine, maxWidth)
}

// ==================== Date Formatting ====================

/**
 * Compact age of a timestamp: "now", "5m", "3h", "2d", then a short date
 */
export function relativeTime(date: Date, now: Date = new Date()): string {
  const seconds = Math.floor((now.getTime() - date.getTime()) / 1000)
  if (seconds < 60) return 'now'
  const minutes = Math.floor(seconds / 60)
  if (minutes < 60) return `${minutes}m`
  const hours = Math.floor(minutes / 60)
  if (hours < 24) return `${hours}h`
  const days = Math.floor(hours / 24)
  if (days < 7) return `${days}d`
  return date.toLocaleDateString('en-US', { month: 'short', day: 'numeric' })
}

// ==================== Post Formatting ====================

/**
 * "🐘 Alice @alice · 5m", with the reposter prefixed when there is one
 */
export function postHeader(post: IPost, now?: Date): string {
  const name = post.authorName || post.authorHandle
  const header = `${platformIcon(post.network)} ${name} @${post.authorHandle} · ${relativeTime(post.createdAt, now)}`
  return post.isRepost && post.repostAuthor ? `🔁 ${post.repostAuthor} reposted\n${header}` : header
}

/**
 * Counters with viewer state: "♥ 3  ⟳ 1  ↩ 0"
 */
export function postStats(post: IPost): string {
  const like = post.liked ? '♥' : '♡'
  const repost = post.reposted ? '⟲' : '⟳'
  return `${like} ${post.likeCount}  ${repost} ${post.repostCount}  ↩ ${post.replyCount}`
}

/**
 * Indentation for a reply at the given depth, capped so deep threads stay readable
 */
export function replyIndent(depth: number, maxLevels: number = 8): string {
  return '  '.repeat(Math.min(depth, maxLevels)) + '└ '
}

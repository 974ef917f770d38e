/**
 * Mastodon type adapters - convert REST payloads to the unified post model
 */

import { v4 as uuidv4 } from 'uuid'
import type { IAccount, IMediaAttachment, IPost, MediaType } from '../types'
import type { MastodonAccount, MastodonMedia, MastodonStatus, MastodonStatusBody } from './types'

// ==================== Content ====================

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  hellip: '…',
  mdash: '—',
  ndash: '–',
}

/**
 * Decode named and numeric HTML character references
 */
export function decodeHtmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#[0-9]+|[a-z]+);/gi, (match, ref: string) => {
    if (ref[0] === '#') {
      const code = ref[1] === 'x' || ref[1] === 'X' ? parseInt(ref.slice(2), 16) : parseInt(ref.slice(1), 10)
      return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : match
    }
    return NAMED_ENTITIES[ref.toLowerCase()] ?? match
  })
}

/**
 * Turn status HTML into plain text: breaks become newlines, paragraphs are
 * separated by a blank line, remaining tags are dropped
 */
export function htmlToPlainText(html: string): string {
  const withBreaks = html
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/p>\s*<p[^>]*>/gi, '\n\n')
  return decodeHtmlEntities(withBreaks.replace(/<[^>]+>/g, '')).trim()
}

// ==================== Post Adapters ====================

function adaptMediaType(raw: string): MediaType {
  switch (raw) {
    case 'image':
    case 'video':
    case 'gifv':
    case 'audio':
      return raw
    default:
      return 'unknown'
  }
}

function adaptMastodonMedia(media: MastodonMedia): IMediaAttachment[] {
  if (!media.url) return []
  return [
    {
      url: media.url,
      previewUrl: media.preview_url ?? undefined,
      mediaType: adaptMediaType(media.type),
      altText: media.description ?? undefined,
    },
  ]
}

function parseDate(raw: string): Date {
  const date = new Date(raw)
  return Number.isNaN(date.getTime()) ? new Date() : date
}

function adaptStatusBody(status: MastodonStatusBody): IPost {
  return {
    id: uuidv4(),
    networkId: status.id,
    network: 'mastodon',
    authorHandle: status.account.acct || status.account.username,
    authorName: status.account.display_name,
    authorAvatar: status.account.avatar || undefined,
    content: htmlToPlainText(status.content),
    contentRaw: status.content,
    createdAt: parseDate(status.created_at),
    url: status.url ?? undefined,
    isRepost: false,
    likeCount: status.favourites_count,
    repostCount: status.reblogs_count,
    replyCount: status.replies_count,
    liked: status.favourited ?? false,
    reposted: status.reblogged ?? false,
    replyToId: status.in_reply_to_id ?? undefined,
    media: status.media_attachments.flatMap(adaptMastodonMedia),
  }
}

/**
 * Convert a status to a post; a boost is unwrapped to the boosted status and
 * tagged with the booster's display name
 */
export function adaptMastodonStatus(status: MastodonStatus): IPost {
  if (status.reblog) {
    return {
      ...adaptStatusBody(status.reblog),
      isRepost: true,
      repostAuthor: status.account.display_name || status.account.username,
    }
  }
  return adaptStatusBody(status)
}

// ==================== Account Adapters ====================

export function adaptMastodonAccount(account: MastodonAccount, instance: string): IAccount {
  return {
    id: uuidv4(),
    network: 'mastodon',
    displayName: account.display_name || account.username,
    handle: account.username,
    server: instance,
    isDefault: false,
    avatarUrl: account.avatar || undefined,
    createdAt: new Date(),
  }
}

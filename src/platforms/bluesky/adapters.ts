/**
 * Bluesky type adapters - convert XRPC views to the unified post model
 */

import { v4 as uuidv4 } from 'uuid'
import type { IAccount, IMediaAttachment, IPost } from '../types'
import {
  REASON_REPOST,
  type EmbedView,
  type FeedViewPost,
  type PostView,
  type ThreadNode,
} from './types'

/**
 * Record key: the last path segment of an at:// URI
 */
export function recordKey(uri: string): string {
  const segments = uri.split('/')
  return segments[segments.length - 1] || uri
}

export function postPermalink(handle: string, uri: string): string {
  return `https://bsky.app/profile/${handle}/post/${recordKey(uri)}`
}

function parseDate(...candidates: Array<string | undefined>): Date {
  for (const raw of candidates) {
    if (!raw) continue
    const date = new Date(raw)
    if (!Number.isNaN(date.getTime())) return date
  }
  return new Date()
}

function adaptEmbedMedia(embed: EmbedView | null | undefined): IMediaAttachment[] {
  const images = embed?.images ?? embed?.media?.images ?? []
  return images.map(image => ({
    url: image.fullsize,
    previewUrl: image.thumb,
    mediaType: 'image' as const,
    altText: image.alt || undefined,
  }))
}

/**
 * Convert a post view; the resulting post always carries cid and uri
 */
export function adaptPostView(view: PostView): IPost {
  return {
    id: uuidv4(),
    networkId: recordKey(view.uri),
    network: 'bluesky',
    authorHandle: view.author.handle,
    authorName: view.author.displayName ?? '',
    authorAvatar: view.author.avatar ?? undefined,
    content: view.record.text,
    createdAt: parseDate(view.record.createdAt, view.indexedAt),
    url: postPermalink(view.author.handle, view.uri),
    isRepost: false,
    likeCount: view.likeCount,
    repostCount: view.repostCount,
    replyCount: view.replyCount,
    liked: Boolean(view.viewer?.like),
    reposted: Boolean(view.viewer?.repost),
    replyToId: view.record.reply?.parent.uri,
    media: adaptEmbedMedia(view.embed),
    cid: view.cid,
    uri: view.uri,
  }
}

/**
 * Convert a timeline item, tagging reposts with the reposter's name
 */
export function adaptFeedViewPost(item: FeedViewPost): IPost {
  const post = adaptPostView(item.post)
  const by = item.reason?.by
  if (item.reason?.$type === REASON_REPOST && by) {
    return { ...post, isRepost: true, repostAuthor: by.displayName || by.handle }
  }
  return post
}

/**
 * Flatten a nested thread into a pre-order reply list, root excluded.
 * Nodes without a post (not found, blocked) are skipped along with their subtree.
 */
export function flattenThread(root: ThreadNode): IPost[] {
  const replies: IPost[] = []

  const visit = (node: ThreadNode) => {
    for (const child of node.replies ?? []) {
      if (!child.post) continue
      replies.push(adaptPostView(child.post))
      visit(child)
    }
  }

  visit(root)
  return replies
}

export function adaptBlueskyProfile(
  profile: { handle: string; displayName?: string | null; avatar?: string | null },
  pdsUrl: string
): IAccount {
  return {
    id: uuidv4(),
    network: 'bluesky',
    displayName: profile.displayName || profile.handle,
    handle: profile.handle,
    server: pdsUrl,
    isDefault: false,
    avatarUrl: profile.avatar ?? undefined,
    createdAt: new Date(),
  }
}

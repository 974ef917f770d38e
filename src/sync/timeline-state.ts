/**
 * Presentation state driven by worker results
 */

import { platformName, type IAccount, type IPost, type PlatformType, type ReplyItem } from '@/platforms/types'
import type { InteractionResultType, SyncResult } from './commands'

export interface TimelineState {
  posts: IPost[]
  replies: ReplyItem[]
  status: string
  /** Set while the last status was a progress message */
  loading: boolean
  loadingReplies: boolean
}

export const initialTimelineState: TimelineState = {
  posts: [],
  replies: [],
  status: '',
  loading: false,
  loadingReplies: false,
}

function toggle(post: IPost, result: InteractionResultType): IPost {
  switch (result) {
    case 'liked':
      return post.liked ? post : { ...post, liked: true, likeCount: post.likeCount + 1 }
    case 'unliked':
      return post.liked ? { ...post, liked: false, likeCount: Math.max(0, post.likeCount - 1) } : post
    case 'reposted':
      return post.reposted ? post : { ...post, reposted: true, repostCount: post.repostCount + 1 }
    case 'unreposted':
      return post.reposted ? { ...post, reposted: false, repostCount: Math.max(0, post.repostCount - 1) } : post
  }
}

const INTERACTION_STATUS: Record<InteractionResultType, string> = {
  liked: '✓ Liked',
  unliked: '✓ Unliked',
  reposted: '✓ Reposted',
  unreposted: '✓ Repost undone',
}

function applyInteraction(state: TimelineState, postId: string, result: InteractionResultType): TimelineState {
  return {
    ...state,
    status: INTERACTION_STATUS[result],
    loading: false,
    posts: state.posts.map(post => (post.networkId === postId ? toggle(post, result) : post)),
    replies: state.replies.map(item =>
      item.post.networkId === postId ? { ...item, post: toggle(item.post, result) } : item
    ),
  }
}

function isProgress(message: string): boolean {
  return message.includes('...')
}

export function applyResult(state: TimelineState, result: SyncResult): TimelineState {
  switch (result.type) {
    case 'timeline-refreshed':
      return {
        ...state,
        posts: result.posts,
        status: `Loaded ${result.posts.length} posts`,
        loading: false,
      }

    case 'context-fetched':
      return { ...state, replies: result.replies, loadingReplies: false }

    case 'liked':
    case 'unliked':
    case 'reposted':
    case 'unreposted':
      return applyInteraction(state, result.postId, result.type)

    case 'posted':
      return { ...state, status: `Posted to ${result.posts.length} account(s)` }

    case 'error':
      return { ...state, status: `Error: ${result.message}`, loading: false, loadingReplies: false }

    case 'status':
      return { ...state, status: result.message, loading: isProgress(result.message) }
  }
}

/**
 * State for opening a post's detail view before its replies arrive
 */
export function beginLoadingReplies(state: TimelineState): TimelineState {
  return { ...state, replies: [], loadingReplies: true }
}

// ==================== Selection helpers ====================

export type TimelineFilter = 'all' | PlatformType

const FILTER_ORDER: TimelineFilter[] = ['all', 'mastodon', 'bluesky']

export function nextFilter(filter: TimelineFilter): TimelineFilter {
  const index = FILTER_ORDER.indexOf(filter)
  return FILTER_ORDER[(index + 1) % FILTER_ORDER.length] ?? 'all'
}

export function filterName(filter: TimelineFilter): string {
  return filter === 'all' ? 'All' : platformName(filter)
}

export function filterPosts(posts: IPost[], filter: TimelineFilter): IPost[] {
  return filter === 'all' ? posts : posts.filter(post => post.network === filter)
}

/**
 * Case-insensitive match on content, handle and display name
 */
export function searchPosts(posts: IPost[], query: string): IPost[] {
  const needle = query.trim().toLowerCase()
  if (!needle) return posts
  return posts.filter(
    post =>
      post.content.toLowerCase().includes(needle) ||
      post.authorHandle.toLowerCase().includes(needle) ||
      post.authorName.toLowerCase().includes(needle)
  )
}

/**
 * The account used to act on a post: the first configured one on its network
 */
export function findAccountForPost(accounts: IAccount[], post: IPost): IAccount | undefined {
  return accounts.find(account => account.network === post.network)
}

/**
 * Accounts a new post goes out from, given the networks ticked in the composer
 */
export function accountsForNetworks(accounts: IAccount[], networks: PlatformType[]): IAccount[] {
  return accounts.filter(account => networks.includes(account.network))
}

/**
 * Messages exchanged between the UI loop and the sync worker
 */

import type { IAccount, IPost, ReplyItem } from '@/platforms/types'

// ==================== Commands (UI → worker) ====================

export type InteractionType = 'like' | 'unlike' | 'repost' | 'unrepost'

export type SyncCommand =
  | { type: 'refresh-timeline'; accounts: IAccount[] }
  | { type: 'fetch-conversation'; post: IPost; account: IAccount }
  | { type: InteractionType; post: IPost; account: IAccount }
  | { type: 'submit-post'; content: string; accounts: IAccount[]; replyTo?: IPost; scheduledId?: string }
  | { type: 'shutdown' }

export type InteractionCommand = Extract<SyncCommand, { type: InteractionType }>

export type SubmitPostCommand = Extract<SyncCommand, { type: 'submit-post' }>

// ==================== Results (worker → UI) ====================

export type InteractionResultType = 'liked' | 'unliked' | 'reposted' | 'unreposted'

export type SyncResult =
  | { type: 'timeline-refreshed'; posts: IPost[] }
  | { type: 'context-fetched'; postId: string; replies: ReplyItem[] }
  | { type: InteractionResultType; postId: string }
  | { type: 'posted'; posts: IPost[] }
  | { type: 'error'; message: string }
  | { type: 'status'; message: string }

export const INTERACTION_RESULTS: Record<InteractionType, InteractionResultType> = {
  like: 'liked',
  unlike: 'unliked',
  repost: 'reposted',
  unrepost: 'unreposted',
}

const INTERACTION_VERBS: Record<InteractionType, string> = {
  like: 'Like',
  unlike: 'Unlike',
  repost: 'Repost',
  unrepost: 'Unrepost',
}

export function interactionVerb(type: InteractionType): string {
  return INTERACTION_VERBS[type]
}

export function isInteractionCommand(command: SyncCommand): command is InteractionCommand {
  return Object.hasOwn(INTERACTION_RESULTS, command.type)
}

// ==================== Builders ====================

export function refreshTimeline(accounts: IAccount[]): SyncCommand {
  return { type: 'refresh-timeline', accounts }
}

export function fetchConversation(post: IPost, account: IAccount): SyncCommand {
  return { type: 'fetch-conversation', post, account }
}

export function interact(type: InteractionType, post: IPost, account: IAccount): SyncCommand {
  return { type, post, account }
}

export function submitPost(content: string, accounts: IAccount[]): SyncCommand {
  return { type: 'submit-post', content, accounts }
}

export function submitReply(content: string, accounts: IAccount[], replyTo: IPost): SyncCommand {
  return { type: 'submit-post', content, accounts, replyTo }
}

/**
 * Send a scheduled post; the worker reports how it went through settleScheduledPost
 */
export function submitScheduledPost(content: string, accounts: IAccount[], scheduledId: string): SyncCommand {
  return { type: 'submit-post', content, accounts, scheduledId }
}

/**
 * Rebuild a threaded conversation from a flat reply list
 */

import type { IPost, ReplyItem } from '@/platforms/types'

export const MAX_REPLY_DEPTH = 64

/**
 * A reply may name its parent by at:// URI or by native id, so both count
 */
function parentKeys(post: IPost): string[] {
  return post.uri ? [post.uri, post.networkId] : [post.networkId]
}

/**
 * Order replies for indented display: pre-order, stable with respect to the
 * input, direct replies at depth 0. A reply is emitted at most once and
 * nesting stops at maxDepth, so a malformed cyclic graph still terminates.
 */
export function buildReplyTree(root: IPost, replies: IPost[], maxDepth: number = MAX_REPLY_DEPTH): ReplyItem[] {
  const result: ReplyItem[] = []
  const emitted = new Set<IPost>()

  const addReplies = (keys: string[], depth: number) => {
    if (depth >= maxDepth) return
    for (const reply of replies) {
      if (emitted.has(reply) || reply.replyToId === undefined) continue
      if (!keys.includes(reply.replyToId)) continue

      emitted.add(reply)
      result.push({ post: reply, depth })
      addReplies(parentKeys(reply), depth + 1)
    }
  }

  addReplies(parentKeys(root), 0)
  return result
}

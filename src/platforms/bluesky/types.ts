/**
 * AT Protocol (Bluesky) XRPC wire types
 */

import { z } from 'zod'

export const DEFAULT_PDS_URL = 'https://bsky.social'

export const COLLECTIONS = {
  post: 'app.bsky.feed.post',
  like: 'app.bsky.feed.like',
  repost: 'app.bsky.feed.repost',
} as const

export type Collection = (typeof COLLECTIONS)[keyof typeof COLLECTIONS]

export const REASON_REPOST = 'app.bsky.feed.defs#reasonRepost'

// ==================== Shared Pieces ====================

export const strongRefSchema = z.object({
  uri: z.string(),
  cid: z.string(),
})

export const actorSchema = z.object({
  did: z.string(),
  handle: z.string(),
  displayName: z.string().nullish(),
  avatar: z.string().nullish(),
})

const embedImageSchema = z.object({
  thumb: z.string().optional(),
  fullsize: z.string(),
  alt: z.string().nullish(),
})

export const embedSchema = z.object({
  $type: z.string().optional(),
  images: z.array(embedImageSchema).optional(),
  media: z.object({ images: z.array(embedImageSchema).optional() }).optional(),
})

export const postRecordSchema = z.object({
  text: z.string().default(''),
  createdAt: z.string().optional(),
  reply: z
    .object({
      root: strongRefSchema,
      parent: strongRefSchema,
    })
    .optional(),
})

export const postViewSchema = z.object({
  uri: z.string(),
  cid: z.string(),
  author: actorSchema,
  record: postRecordSchema,
  replyCount: z.number().default(0),
  repostCount: z.number().default(0),
  likeCount: z.number().default(0),
  indexedAt: z.string().optional(),
  embed: embedSchema.nullish(),
  viewer: z
    .object({
      like: z.string().optional(),
      repost: z.string().optional(),
    })
    .nullish(),
})

export type StrongRef = z.infer<typeof strongRefSchema>
export type PostView = z.infer<typeof postViewSchema>
export type EmbedView = z.infer<typeof embedSchema>

// ==================== Endpoints ====================

export const createSessionResponseSchema = z.object({
  accessJwt: z.string(),
  did: z.string(),
  handle: z.string().optional(),
})

export const feedViewPostSchema = z.object({
  post: postViewSchema,
  reason: z
    .object({
      $type: z.string(),
      by: actorSchema.optional(),
    })
    .nullish(),
})

export const getTimelineResponseSchema = z.object({
  feed: z.array(feedViewPostSchema),
  cursor: z.string().optional(),
})

export type FeedViewPost = z.infer<typeof feedViewPostSchema>

/**
 * Thread nodes nest replies; not-found and blocked nodes have no post
 */
export interface ThreadNode {
  post?: PostView
  replies?: ThreadNode[]
}

export const threadNodeSchema: z.ZodType<ThreadNode, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    post: postViewSchema.optional(),
    replies: z.array(threadNodeSchema).optional(),
  })
)

export const getPostThreadResponseSchema = z.object({
  thread: threadNodeSchema,
})

export const getPostsResponseSchema = z.object({
  posts: z.array(postViewSchema),
})

export const createRecordResponseSchema = strongRefSchema

export const listRecordsResponseSchema = z.object({
  records: z.array(
    z.object({
      uri: z.string(),
      value: z.object({
        subject: z.object({ uri: z.string() }).optional(),
      }),
    })
  ),
  cursor: z.string().optional(),
})

export const profileResponseSchema = actorSchema

export interface CreateRecordRequest<T> {
  repo: string
  collection: Collection
  record: T
}

export interface PostRecord {
  $type: typeof COLLECTIONS.post
  text: string
  createdAt: string
  reply?: { root: StrongRef; parent: StrongRef }
}

export interface SubjectRecord {
  $type: typeof COLLECTIONS.like | typeof COLLECTIONS.repost
  subject: StrongRef
  createdAt: string
}

export interface DeleteRecordRequest {
  repo: string
  collection: Collection
  rkey: string
}

/**
 * Mastodon REST wire types
 */

import { z } from 'zod'

export const mastodonAccountSchema = z.object({
  id: z.string(),
  username: z.string(),
  acct: z.string().default(''),
  display_name: z.string().default(''),
  avatar: z.string().default(''),
})

export const mastodonMediaSchema = z.object({
  // null while the server is still processing the upload
  url: z.string().nullish(),
  preview_url: z.string().nullish(),
  type: z.string(),
  description: z.string().nullish(),
})

const statusFields = {
  id: z.string(),
  created_at: z.string(),
  content: z.string().default(''),
  url: z.string().nullish(),
  account: mastodonAccountSchema,
  favourites_count: z.number().default(0),
  reblogs_count: z.number().default(0),
  replies_count: z.number().default(0),
  favourited: z.boolean().nullish(),
  reblogged: z.boolean().nullish(),
  in_reply_to_id: z.string().nullish(),
  media_attachments: z.array(mastodonMediaSchema).default([]),
}

// A boost wraps the original status one level deep
export const mastodonStatusSchema = z.object({
  ...statusFields,
  reblog: z.object(statusFields).nullish(),
})

export const mastodonContextSchema = z.object({
  ancestors: z.array(mastodonStatusSchema),
  descendants: z.array(mastodonStatusSchema),
})

export type MastodonAccount = z.infer<typeof mastodonAccountSchema>
export type MastodonMedia = z.infer<typeof mastodonMediaSchema>
export type MastodonStatus = z.infer<typeof mastodonStatusSchema>
export type MastodonStatusBody = Omit<MastodonStatus, 'reblog'>

export interface PostStatusRequest {
  status: string
  visibility?: 'public' | 'unlisted' | 'private' | 'direct'
  in_reply_to_id?: string
}

/**
 * Mastodon platform client implementation
 */

import { z } from 'zod'
import type { IAccount, IPlatformClient, IPost } from '../types'
import { HttpClient, normalizeBaseUrl, type HttpClientOptions } from '../http'
import { adaptMastodonAccount, adaptMastodonStatus } from './adapters'
import {
  mastodonAccountSchema,
  mastodonContextSchema,
  mastodonStatusSchema,
  type PostStatusRequest,
} from './types'

export class MastodonPlatformClient implements IPlatformClient {
  readonly type = 'mastodon' as const
  private readonly instance: string
  private readonly http: HttpClient

  constructor(instance: string, accessToken: string, options: Omit<HttpClientOptions, 'token'> = {}) {
    this.instance = normalizeBaseUrl(instance)
    this.http = new HttpClient(`${this.instance}/api/v1`, { ...options, token: accessToken })
  }

  async timeline(limit: number): Promise<IPost[]> {
    const statuses = await this.http.get(
      `/timelines/home?limit=${limit}`,
      z.array(mastodonStatusSchema),
      'Failed to fetch timeline'
    )
    return statuses.map(adaptMastodonStatus)
  }

  /**
   * Only descendants are returned; ancestors are not shown
   */
  async getContext(post: IPost): Promise<IPost[]> {
    const context = await this.http.get(
      `/statuses/${encodeURIComponent(post.networkId)}/context`,
      mastodonContextSchema,
      'Failed to fetch context'
    )
    return context.descendants.map(adaptMastodonStatus)
  }

  async post(content: string): Promise<IPost> {
    return this.submitStatus({ status: content, visibility: 'public' }, 'Failed to post status')
  }

  async reply(content: string, target: IPost): Promise<IPost> {
    return this.submitStatus(
      { status: content, visibility: 'public', in_reply_to_id: target.networkId },
      'Failed to post reply'
    )
  }

  async like(post: IPost): Promise<void> {
    await this.statusAction(post, 'favourite', 'Failed to like post')
  }

  async unlike(post: IPost): Promise<void> {
    await this.statusAction(post, 'unfavourite', 'Failed to unlike post')
  }

  async repost(post: IPost): Promise<void> {
    await this.statusAction(post, 'reblog', 'Failed to repost')
  }

  async unrepost(post: IPost): Promise<void> {
    await this.statusAction(post, 'unreblog', 'Failed to unrepost')
  }

  async verifyCredentials(): Promise<IAccount> {
    const account = await this.http.get(
      '/accounts/verify_credentials',
      mastodonAccountSchema,
      'Failed to verify credentials'
    )
    return adaptMastodonAccount(account, this.instance)
  }

  private async submitStatus(request: PostStatusRequest, context: string): Promise<IPost> {
    const status = await this.http.post('/statuses', request, mastodonStatusSchema, context)
    return adaptMastodonStatus(status)
  }

  private async statusAction(
    post: IPost,
    action: 'favourite' | 'unfavourite' | 'reblog' | 'unreblog',
    context: string
  ): Promise<void> {
    await this.http.postIgnoringBody(`/statuses/${encodeURIComponent(post.networkId)}/${action}`, undefined, context)
  }
}

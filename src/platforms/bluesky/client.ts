/**
 * Bluesky platform client implementation
 * Writes go through the generic repository record endpoints scoped to the session DID
 */

import { v4 as uuidv4 } from 'uuid'
import type { IAccount, IPlatformClient, IPost } from '../types'
import { HttpClient, normalizeBaseUrl, type HttpClientOptions } from '../http'
import { PreconditionError } from '../errors'
import { createSession, type BlueskySession } from './auth'
import { adaptBlueskyProfile, adaptFeedViewPost, flattenThread, recordKey } from './adapters'
import {
  COLLECTIONS,
  DEFAULT_PDS_URL,
  createRecordResponseSchema,
  getPostThreadResponseSchema,
  getPostsResponseSchema,
  getTimelineResponseSchema,
  listRecordsResponseSchema,
  profileResponseSchema,
  type Collection,
  type CreateRecordRequest,
  type DeleteRecordRequest,
  type PostRecord,
  type StrongRef,
  type SubjectRecord,
} from './types'

const LIST_RECORDS_LIMIT = 100

function timestamp(): string {
  return new Date().toISOString()
}

/**
 * The content-addressed reference needed to point a like, repost or reply at a post
 */
function requireStrongRef(post: IPost, action: string): StrongRef {
  if (!post.cid) {
    throw new PreconditionError(`Post missing CID for ${action}`)
  }
  if (!post.uri) {
    throw new PreconditionError(`Post missing URI for ${action}`)
  }
  return { uri: post.uri, cid: post.cid }
}

function requireUri(post: IPost, action: string): string {
  if (!post.uri) {
    throw new PreconditionError(`Post missing URI for ${action}`)
  }
  return post.uri
}

export class BlueskyPlatformClient implements IPlatformClient {
  readonly type = 'bluesky' as const
  private readonly pdsUrl: string
  private readonly session: BlueskySession
  private readonly http: HttpClient

  constructor(pdsUrl: string, session: BlueskySession, options: Omit<HttpClientOptions, 'token'> = {}) {
    this.pdsUrl = normalizeBaseUrl(pdsUrl || DEFAULT_PDS_URL)
    this.session = session
    this.http = new HttpClient(`${this.pdsUrl}/xrpc`, { ...options, token: session.accessJwt })
  }

  /**
   * Log in with a handle and app password, falling back to the default PDS
   */
  static async login(
    handle: string,
    appPassword: string,
    pdsUrl: string = DEFAULT_PDS_URL,
    options: Omit<HttpClientOptions, 'token'> = {}
  ): Promise<BlueskyPlatformClient> {
    const pds = pdsUrl.trim() || DEFAULT_PDS_URL
    const session = await createSession(handle, appPassword, pds, options)
    return new BlueskyPlatformClient(pds, session, options)
  }

  async timeline(limit: number): Promise<IPost[]> {
    const response = await this.http.get(
      `/app.bsky.feed.getTimeline?limit=${limit}`,
      getTimelineResponseSchema,
      'Failed to fetch timeline'
    )
    return response.feed.map(adaptFeedViewPost)
  }

  async getContext(post: IPost): Promise<IPost[]> {
    const uri = requireUri(post, 'context')
    const response = await this.http.get(
      `/app.bsky.feed.getPostThread?uri=${encodeURIComponent(uri)}`,
      getPostThreadResponseSchema,
      'Failed to fetch context'
    )
    return flattenThread(response.thread)
  }

  async post(content: string): Promise<IPost> {
    const record: PostRecord = { $type: COLLECTIONS.post, text: content, createdAt: timestamp() }
    return this.createPostRecord(record, 'Failed to post')
  }

  /**
   * Reply to a post. The parent record is read to find the thread root;
   * a parent that is not itself a reply is the root.
   */
  async reply(content: string, target: IPost): Promise<IPost> {
    const parent = requireStrongRef(target, 'reply')
    const response = await this.http.get(
      `/app.bsky.feed.getPosts?uris=${encodeURIComponent(parent.uri)}`,
      getPostsResponseSchema,
      'Failed to load reply target'
    )
    const root = response.posts[0]?.record.reply?.root ?? parent

    const record: PostRecord = {
      $type: COLLECTIONS.post,
      text: content,
      createdAt: timestamp(),
      reply: { root, parent },
    }
    return this.createPostRecord(record, 'Failed to post reply')
  }

  async like(post: IPost): Promise<void> {
    await this.createSubjectRecord(COLLECTIONS.like, requireStrongRef(post, 'like'), 'Failed to like post')
  }

  async unlike(post: IPost): Promise<void> {
    await this.deleteSubjectRecord(COLLECTIONS.like, requireUri(post, 'unlike'), 'Failed to unlike post')
  }

  async repost(post: IPost): Promise<void> {
    await this.createSubjectRecord(COLLECTIONS.repost, requireStrongRef(post, 'repost'), 'Failed to repost')
  }

  async unrepost(post: IPost): Promise<void> {
    await this.deleteSubjectRecord(COLLECTIONS.repost, requireUri(post, 'unrepost'), 'Failed to unrepost')
  }

  async verifyCredentials(): Promise<IAccount> {
    const profile = await this.http.get(
      `/app.bsky.actor.getProfile?actor=${encodeURIComponent(this.session.did)}`,
      profileResponseSchema,
      'Failed to get profile'
    )
    return adaptBlueskyProfile(profile, this.pdsUrl)
  }

  // ==================== Repository Records ====================

  private async createPostRecord(record: PostRecord, context: string): Promise<IPost> {
    const request: CreateRecordRequest<PostRecord> = {
      repo: this.session.did,
      collection: COLLECTIONS.post,
      record,
    }
    const created = await this.http.post(
      '/com.atproto.repo.createRecord',
      request,
      createRecordResponseSchema,
      context
    )

    return {
      id: uuidv4(),
      networkId: recordKey(created.uri),
      network: 'bluesky',
      authorHandle: this.session.handle ?? this.session.did,
      authorName: '',
      content: record.text,
      createdAt: new Date(record.createdAt),
      isRepost: false,
      likeCount: 0,
      repostCount: 0,
      replyCount: 0,
      liked: false,
      reposted: false,
      replyToId: record.reply?.parent.uri,
      media: [],
      cid: created.cid,
      uri: created.uri,
    }
  }

  private async createSubjectRecord(
    collection: typeof COLLECTIONS.like | typeof COLLECTIONS.repost,
    subject: StrongRef,
    context: string
  ): Promise<void> {
    const request: CreateRecordRequest<SubjectRecord> = {
      repo: this.session.did,
      collection,
      record: { $type: collection, subject, createdAt: timestamp() },
    }
    await this.http.post('/com.atproto.repo.createRecord', request, createRecordResponseSchema, context)
  }

  /**
   * There is no direct undo: find our own record pointing at the subject and
   * delete it by key. No matching record means it is already gone.
   */
  private async deleteSubjectRecord(collection: Collection, subjectUri: string, context: string): Promise<void> {
    const params = new URLSearchParams({
      repo: this.session.did,
      collection,
      limit: String(LIST_RECORDS_LIMIT),
    })
    const listed = await this.http.get(
      `/com.atproto.repo.listRecords?${params.toString()}`,
      listRecordsResponseSchema,
      context
    )

    const match = listed.records.find(record => record.value.subject?.uri === subjectUri)
    if (!match) return

    const request: DeleteRecordRequest = {
      repo: this.session.did,
      collection,
      rkey: recordKey(match.uri),
    }
    await this.http.postIgnoringBody('/com.atproto.repo.deleteRecord', request, context)
  }
}

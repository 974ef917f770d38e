/**
 * Sync worker
 *
 * Owns every network call. The UI sends commands through a bounded queue and
 * polls results from another; the worker handles one command at a time, in
 * order, until it receives shutdown.
 */

import { fullHandle, platformName, type IAccount, type IPlatformClient, type IPost } from '@/platforms/types'
import { CredentialError, errorMessage } from '@/platforms/errors'
import { createPlatformClient, type ClientOptions } from '@/platforms/factory'
import type { SecretStore } from '@/store/secrets'
import { silentLogger, type Logger } from '@/helpers/logger'
import { BoundedQueue } from './queue'
import { buildReplyTree } from './reply-tree'
import {
  INTERACTION_RESULTS,
  interactionVerb,
  isInteractionCommand,
  type InteractionCommand,
  type SubmitPostCommand,
  type SyncCommand,
  type SyncResult,
} from './commands'

export const DEFAULT_QUEUE_CAPACITY = 32
export const DEFAULT_POST_LIMIT = 50

export type ClientFactory = (account: IAccount, secret: string, options: ClientOptions) => Promise<IPlatformClient>

export interface WorkerDeps {
  secrets: SecretStore
  logger?: Logger
  postLimit?: number
  queueCapacity?: number
  clientOptions?: ClientOptions
  createClient?: ClientFactory
  /** Called after an account was used successfully */
  touchAccount?: (account: IAccount) => Promise<void>
  /** Called once a scheduled post was sent; error is set when any account failed */
  settleScheduledPost?: (id: string, error?: string) => Promise<void>
}

export interface WorkerHandle {
  /** Queue a command, waiting while the command queue is full */
  send(command: SyncCommand): Promise<void>
  /** Every result available right now */
  poll(): SyncResult[]
  /** Wait for the next result; undefined once the worker stopped and results ran out */
  next(): Promise<SyncResult | undefined>
  shutdown(): Promise<void>
  readonly done: Promise<void>
}

class SyncWorker {
  private readonly logger: Logger
  private readonly postLimit: number
  private readonly createClient: ClientFactory
  private readonly clientOptions: ClientOptions

  constructor(
    private readonly deps: WorkerDeps,
    private readonly commands: BoundedQueue<SyncCommand>,
    private readonly results: BoundedQueue<SyncResult>
  ) {
    this.logger = (deps.logger ?? silentLogger).child({ component: 'worker' })
    this.postLimit = deps.postLimit ?? DEFAULT_POST_LIMIT
    this.createClient = deps.createClient ?? createPlatformClient
    this.clientOptions = deps.clientOptions ?? {}
  }

  async run(): Promise<void> {
    this.logger.info('Worker started')
    try {
      for (;;) {
        const command = await this.commands.take()
        if (command === undefined || command.type === 'shutdown') break

        try {
          await this.handle(command)
        } catch (error) {
          this.logger.error(`Command ${command.type} failed`, error)
          await this.emit({ type: 'error', message: errorMessage(error) })
        }
      }
    } finally {
      this.commands.close()
      this.results.close()
      this.logger.info('Worker stopped')
    }
  }

  private async handle(command: Exclude<SyncCommand, { type: 'shutdown' }>): Promise<void> {
    if (isInteractionCommand(command)) {
      return this.handleInteraction(command)
    }
    switch (command.type) {
      case 'refresh-timeline':
        return this.handleRefresh(command.accounts)
      case 'fetch-conversation':
        return this.handleFetchConversation(command.post, command.account)
      case 'submit-post':
        return this.handlePost(command)
    }
  }

  private emit(result: SyncResult): Promise<void> {
    return this.results.put(result)
  }

  private async touch(account: IAccount): Promise<void> {
    if (!this.deps.touchAccount) return
    try {
      await this.deps.touchAccount(account)
    } catch (error) {
      this.logger.warn(`Failed to mark account as used: ${errorMessage(error)}`, { account: fullHandle(account) })
    }
  }

  /**
   * Resolve a client, reading the secret fresh every time
   */
  private async clientFor(account: IAccount): Promise<IPlatformClient> {
    const secret = await this.deps.secrets.getCredentials(account)
    if (secret === null) {
      throw new CredentialError(`No credentials for ${fullHandle(account)}`)
    }
    return this.createClient(account, secret, this.clientOptions)
  }

  private async settle(id: string, error?: string): Promise<void> {
    if (!this.deps.settleScheduledPost) return
    try {
      await this.deps.settleScheduledPost(id, error)
    } catch (settleError) {
      this.logger.warn(`Failed to record scheduled post outcome: ${errorMessage(settleError)}`, { scheduled: id })
    }
  }

  // ==================== Handlers ====================

  private async handleRefresh(accounts: IAccount[]): Promise<void> {
    await this.emit({ type: 'status', message: 'Refreshing...' })

    if (accounts.length === 0) {
      await this.emit({ type: 'error', message: 'No accounts configured' })
      return
    }

    const posts: IPost[] = []
    const errors: string[] = []

    for (const account of accounts) {
      const handle = fullHandle(account)
      const log = this.logger.child({ account: handle })

      let secret: string | null
      try {
        secret = await this.deps.secrets.getCredentials(account)
      } catch (error) {
        log.warn('Could not read credentials')
        errors.push(`Auth error for ${handle}: ${errorMessage(error)}`)
        continue
      }
      if (secret === null) {
        errors.push(`No credentials for ${handle}`)
        continue
      }

      try {
        const client = await this.createClient(account, secret, this.clientOptions)
        const fetched = await client.timeline(this.postLimit)
        log.debug(`Fetched ${fetched.length} posts`)
        posts.push(...fetched)
        await this.touch(account)
      } catch (error) {
        log.error('Timeline fetch failed', error)
        errors.push(`${handle}: ${errorMessage(error)}`)
      }
    }

    // Array.prototype.sort is stable, so equal timestamps keep fetch order
    posts.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())

    if (posts.length === 0 && errors.length > 0) {
      await this.emit({ type: 'error', message: errors.join('; ') })
      return
    }

    await this.emit({ type: 'timeline-refreshed', posts })
    if (errors.length > 0) {
      await this.emit({ type: 'status', message: `Partial refresh: ${errors.join('; ')}` })
    }
  }

  private async handleFetchConversation(post: IPost, account: IAccount): Promise<void> {
    try {
      const client = await this.clientFor(account)
      const context = await client.getContext(post)
      const replies = buildReplyTree(post, context)
      await this.emit({ type: 'context-fetched', postId: post.networkId, replies })
    } catch (error) {
      // The detail view keeps showing the post without replies
      this.logger.warn(`Failed to fetch conversation: ${errorMessage(error)}`, {
        account: fullHandle(account),
        post: post.networkId,
      })
    }
  }

  private async handleInteraction(command: InteractionCommand): Promise<void> {
    const { post, account } = command

    let client: IPlatformClient
    try {
      client = await this.clientFor(account)
    } catch (error) {
      await this.emit({ type: 'error', message: errorMessage(error) })
      return
    }

    try {
      switch (command.type) {
        case 'like':
          await client.like(post)
          break
        case 'unlike':
          await client.unlike(post)
          break
        case 'repost':
          await client.repost(post)
          break
        case 'unrepost':
          await client.unrepost(post)
          break
      }
    } catch (error) {
      this.logger.warn(`${interactionVerb(command.type)} failed`, { account: fullHandle(account), post: post.networkId })
      await this.emit({ type: 'error', message: `${interactionVerb(command.type)} failed: ${errorMessage(error)}` })
      return
    }

    await this.emit({ type: INTERACTION_RESULTS[command.type], postId: post.networkId })
  }

  private async handlePost(command: SubmitPostCommand): Promise<void> {
    const { content, accounts, replyTo, scheduledId } = command

    await this.emit({
      type: 'status',
      message: replyTo ? 'Replying...' : `Posting... (to ${accounts.length} accounts)`,
    })

    const posted: IPost[] = []
    const errors: string[] = []

    for (const account of accounts) {
      const network = platformName(account.network)

      let secret: string | null
      try {
        secret = await this.deps.secrets.getCredentials(account)
      } catch (error) {
        errors.push(`${network}: ${errorMessage(error)}`)
        continue
      }
      if (secret === null) {
        errors.push(`No credentials for ${network} (${fullHandle(account)})`)
        continue
      }

      try {
        const client = await this.createClient(account, secret, this.clientOptions)
        const post =
          replyTo && replyTo.network === account.network
            ? await client.reply(content, replyTo)
            : await client.post(content)
        posted.push(post)
        await this.touch(account)
      } catch (error) {
        this.logger.error('Post failed', error, { account: fullHandle(account) })
        errors.push(`${network}: ${errorMessage(error)}`)
      }
    }

    if (scheduledId !== undefined) {
      await this.settle(scheduledId, errors.length > 0 ? errors.join('; ') : undefined)
    }

    if (posted.length > 0) {
      await this.emit({ type: 'posted', posts: posted })
    }

    if (errors.length === 0) {
      await this.emit({ type: 'status', message: replyTo ? 'Replied successfully!' : 'Posted successfully!' })
    } else {
      await this.emit({ type: 'error', message: errors.join('; ') })
    }
  }
}

/**
 * Start the worker loop and return the handle the UI drives it with
 */
export function spawnWorker(deps: WorkerDeps): WorkerHandle {
  const capacity = deps.queueCapacity ?? DEFAULT_QUEUE_CAPACITY
  const commands = new BoundedQueue<SyncCommand>(capacity)
  const results = new BoundedQueue<SyncResult>(capacity)
  const worker = new SyncWorker(deps, commands, results)
  const done = worker.run()

  return {
    send: command => commands.put(command),
    poll: () => results.drain(),
    next: () => results.take(),
    async shutdown() {
      if (!commands.isClosed) {
        await commands.put({ type: 'shutdown' })
      }
      await done
    },
    done,
  }
}

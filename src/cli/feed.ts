/**
 * CLI tool to post, read and schedule without the terminal UI
 *
 *   npm run feed -- post "hello" --to mastodon,bluesky
 *   npm run feed -- timeline [network] --limit 20
 *   npm run feed -- schedule "in 30m" "hello later" [--to bluesky]
 *   npm run feed -- scheduled [all]
 *   npm run feed -- cancel <id>
 */

import { pathToFileURL } from 'url'
import config from '@/helpers/env'
import { createLogger, type Logger } from '@/helpers/logger'
import { errorMessage } from '@/platforms/errors'
import { createPlatformClient, type ClientOptions } from '@/platforms/factory'
import {
  fullHandle,
  parsePlatformType,
  platformIcon,
  platformName,
  PLATFORM_TYPES,
  scheduledStatusIcon,
  type IAccount,
  type IScheduledPost,
  type PlatformType,
} from '@/platforms/types'
import { Database } from '@/store/db'
import { FileSecretStore, type SecretStore } from '@/store/secrets'
import { submitPost } from '@/sync/commands'
import { formatScheduledTime, parseScheduleTime, timeUntil } from '@/sync/schedule'
import { spawnWorker, type ClientFactory } from '@/sync/worker'
import { UsageError } from './accounts'
import { postHeader, postStats, preview } from './format'

export const FEED_USAGE = `Usage:
  feed post <content> [--to mastodon,bluesky]
  feed timeline [network] [--limit N]
  feed schedule <when> <content> [--to mastodon,bluesky]
  feed scheduled [all]
  feed cancel <id>`

export const DEFAULT_TIMELINE_LIMIT = 20

const ADD_ACCOUNT_HINT = 'Add one with: npm run accounts -- add <network> ...'
const OPTION_ALIASES: Partial<Record<string, string>> = { '-t': '--to', '-l': '--limit' }

export interface FeedContext {
  db: Database
  secrets: SecretStore
  logger: Logger
  clientOptions?: ClientOptions
  createClient?: ClientFactory
  out?: (line: string) => void
  now?: () => Date
}

interface ParsedArgs {
  positional: string[]
  options: Map<string, string>
}

function parseArgs(args: string[]): ParsedArgs {
  const positional: string[] = []
  const options = new Map<string, string>()
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? ''
    const name = OPTION_ALIASES[arg] ?? arg
    if (name === '--to' || name === '--limit') {
      const value = args[i + 1]
      if (value === undefined) throw new UsageError(`${name} needs a value\n${FEED_USAGE}`)
      options.set(name, value)
      i++
    } else {
      positional.push(arg)
    }
  }
  return { positional, options }
}

/**
 * Networks named in a comma-separated list, in order and without repeats
 */
export function parseNetworkList(raw: string): PlatformType[] {
  const networks: PlatformType[] = []
  for (const name of raw.split(',').map(part => part.trim()).filter(Boolean)) {
    const network = parsePlatformType(name)
    if (!network) throw new UsageError(`Unknown network "${name}"`)
    if (!networks.includes(network)) networks.push(network)
  }
  if (networks.length === 0) throw new UsageError(`No networks given\n${FEED_USAGE}`)
  return networks
}

async function networksWithAccounts(db: Database): Promise<PlatformType[]> {
  const configured: PlatformType[] = []
  for (const network of PLATFORM_TYPES) {
    if (await db.getPostingAccount(network)) configured.push(network)
  }
  if (configured.length === 0) throw new UsageError(`No accounts configured. ${ADD_ACCOUNT_HINT}`)
  return configured
}

async function postingAccounts(db: Database, networks: PlatformType[]): Promise<IAccount[]> {
  const accounts: IAccount[] = []
  for (const network of networks) {
    const account = await db.getPostingAccount(network)
    if (!account) throw new UsageError(`No ${platformName(network)} account configured. ${ADD_ACCOUNT_HINT}`)
    accounts.push(account)
  }
  return accounts
}

function parseLimit(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_TIMELINE_LIMIT
  const limit = Number(raw)
  if (!Number.isInteger(limit) || limit < 1) throw new UsageError(`Invalid limit "${raw}"`)
  return limit
}

function shortId(post: IScheduledPost): string {
  return post.id.slice(0, 8)
}

// ==================== Commands ====================

/**
 * Post through the sync worker, the same path the UI uses
 */
async function postNow(ctx: FeedContext, out: (line: string) => void, args: ParsedArgs): Promise<number> {
  const [content] = args.positional
  if (!content?.trim()) throw new UsageError(`Missing post content\n${FEED_USAGE}`)

  const to = args.options.get('--to')
  const networks = to === undefined ? await networksWithAccounts(ctx.db) : parseNetworkList(to)
  const accounts = await postingAccounts(ctx.db, networks)

  const worker = spawnWorker({
    secrets: ctx.secrets,
    logger: ctx.logger,
    clientOptions: ctx.clientOptions,
    createClient: ctx.createClient,
    touchAccount: account => ctx.db.updateAccountLastUsed(account.id),
  })
  await worker.send(submitPost(content, accounts))
  await worker.shutdown()

  let failed = false
  for (const result of worker.poll()) {
    switch (result.type) {
      case 'posted':
        for (const post of result.posts) {
          out(`✓ ${platformIcon(post.network)} Posted: ${post.url ?? platformName(post.network)}`)
        }
        break
      case 'error':
        out(`❌ ${result.message}`)
        failed = true
        break
      case 'status':
        out(result.message)
        break
      default:
        break
    }
  }
  return failed ? 1 : 0
}

async function showTimeline(ctx: FeedContext, out: (line: string) => void, args: ParsedArgs): Promise<number> {
  const [rawNetwork] = args.positional
  const limit = parseLimit(args.options.get('--limit'))
  const explicit = rawNetwork === undefined ? null : parsePlatformType(rawNetwork)
  if (rawNetwork !== undefined && !explicit) throw new UsageError(`Unknown network "${rawNetwork}"`)

  const createClient = ctx.createClient ?? createPlatformClient
  const now = ctx.now?.()
  let shown = 0

  for (const network of explicit ? [explicit] : PLATFORM_TYPES) {
    const account = await ctx.db.getPostingAccount(network)
    if (!account) {
      if (explicit) throw new UsageError(`No ${platformName(network)} account configured. ${ADD_ACCOUNT_HINT}`)
      continue
    }
    shown++

    const secret = await ctx.secrets.getCredentials(account)
    if (secret === null) {
      out(`No credentials for ${fullHandle(account)}`)
      continue
    }

    const client = await createClient(account, secret, ctx.clientOptions ?? {})
    const posts = await client.timeline(limit)
    await ctx.db.updateAccountLastUsed(account.id)

    out('')
    out(`${platformIcon(network)} ${platformName(network)} Timeline (${fullHandle(account)})`)
    out('─'.repeat(60))
    for (const post of posts) {
      out('')
      out(postHeader(post, now))
      out(post.content)
      out(postStats(post))
    }
  }

  if (shown === 0) throw new UsageError(`No accounts configured. ${ADD_ACCOUNT_HINT}`)
  return 0
}

async function schedulePost(ctx: FeedContext, out: (line: string) => void, args: ParsedArgs): Promise<number> {
  const [when, content] = args.positional
  if (!when || !content?.trim()) throw new UsageError(`Missing time or content\n${FEED_USAGE}`)

  const now = ctx.now?.() ?? new Date()
  const scheduledFor = parseScheduleTime(when, now)
  if (scheduledFor.getTime() <= now.getTime()) {
    throw new UsageError(`${formatScheduledTime(scheduledFor)} is in the past`)
  }

  const to = args.options.get('--to')
  const networks = to === undefined ? await networksWithAccounts(ctx.db) : parseNetworkList(to)
  const post = await ctx.db.saveScheduledPost({ content, networks, scheduledFor })

  ctx.logger.info('Post scheduled', { id: post.id, at: scheduledFor.toISOString() })
  out(`📅 Scheduled [${shortId(post)}] for ${formatScheduledTime(scheduledFor)} (in ${timeUntil(scheduledFor, now)})`)
  return 0
}

async function listScheduled(ctx: FeedContext, out: (line: string) => void, args: ParsedArgs): Promise<number> {
  const all = args.positional[0] === 'all'
  const posts = all ? await ctx.db.getScheduledPosts() : await ctx.db.getPendingScheduledPosts()
  if (posts.length === 0) {
    out(all ? 'No scheduled posts.' : 'No pending scheduled posts.')
    return 0
  }

  const now = ctx.now?.() ?? new Date()
  for (const post of posts) {
    const due = post.status === 'pending' ? ` (in ${timeUntil(post.scheduledFor, now)})` : ''
    out(
      `${scheduledStatusIcon(post.status)} [${shortId(post)}] ${formatScheduledTime(post.scheduledFor)}${due} → ${post.networks.join(',')}`
    )
    out(`    ${preview(post.content, 70)}`)
    if (post.error) out(`    ${post.error}`)
  }
  return 0
}

async function cancelScheduled(ctx: FeedContext, out: (line: string) => void, args: ParsedArgs): Promise<number> {
  const [prefix] = args.positional
  if (!prefix) throw new UsageError(`Missing scheduled post id\n${FEED_USAGE}`)

  const matches = (await ctx.db.getPendingScheduledPosts()).filter(post => post.id.startsWith(prefix))
  const [match] = matches
  if (!match) throw new UsageError(`No pending scheduled post matches "${prefix}"`)
  if (matches.length > 1) throw new UsageError(`"${prefix}" matches ${matches.length} scheduled posts`)

  await ctx.db.cancelScheduledPost(match.id)
  out(`🚫 Cancelled [${shortId(match)}]`)
  return 0
}

/**
 * Run one feed command; returns the process exit code
 */
export async function runFeedCommand(argv: string[], ctx: FeedContext): Promise<number> {
  const out = ctx.out ?? ((line: string) => console.log(line))
  const [command, ...rest] = argv
  const args = parseArgs(rest)

  switch (command) {
    case 'post':
      return postNow(ctx, out, args)
    case 'timeline':
    case 'tl':
      return showTimeline(ctx, out, args)
    case 'schedule':
      return schedulePost(ctx, out, args)
    case 'scheduled':
      return listScheduled(ctx, out, args)
    case 'cancel':
      return cancelScheduled(ctx, out, args)
    case undefined:
      out(FEED_USAGE)
      return 0
    default:
      throw new UsageError(`Unknown command "${command}"\n${FEED_USAGE}`)
  }
}

async function main(): Promise<number> {
  const logger = createLogger(config.TWINFEED_LOG_FILE, 'info').child({ component: 'feed' })
  const db = await Database.open(config.TWINFEED_DB_URL)
  try {
    return await runFeedCommand(process.argv.slice(2), {
      db,
      secrets: new FileSecretStore(config.TWINFEED_CREDENTIALS_PATH),
      logger,
      clientOptions: { timeoutMs: config.TWINFEED_REQUEST_TIMEOUT_MS },
    })
  } finally {
    db.close()
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main()
    .then(code => {
      process.exitCode = code
    })
    .catch(error => {
      console.error(`❌ ${errorMessage(error)}`)
      process.exitCode = 1
    })
}

/**
 * CLI tool to manage configured accounts
 *
 *   npm run accounts -- list
 *   npm run accounts -- add mastodon <server> <token>
 *   npm run accounts -- add bluesky <handle> <app-password> [pds-url]
 *   npm run accounts -- remove <id|handle>
 *   npm run accounts -- default <id|handle>
 */

import { pathToFileURL } from 'url'
import config from '@/helpers/env'
import { createLogger, type Logger } from '@/helpers/logger'
import { errorMessage } from '@/platforms/errors'
import { createPlatformClient, type ClientOptions } from '@/platforms/factory'
import { DEFAULT_PDS_URL } from '@/platforms/bluesky/types'
import {
  fullHandle,
  parsePlatformType,
  platformIcon,
  platformName,
  type IAccount,
  type PlatformType,
} from '@/platforms/types'
import { Database } from '@/store/db'
import { FileSecretStore, type SecretStore } from '@/store/secrets'
import type { ClientFactory } from '@/sync/worker'
import { relativeTime } from './format'

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export const USAGE = `Usage:
  accounts list
  accounts add mastodon <server> <token>
  accounts add bluesky <handle> <app-password> [pds-url]
  accounts remove <id|handle>
  accounts default <id|handle>`

export interface AccountsContext {
  db: Database
  secrets: SecretStore
  logger: Logger
  clientOptions?: ClientOptions
  createClient?: ClientFactory
  out?: (line: string) => void
}

function draftAccount(network: PlatformType, handle: string, server: string): IAccount {
  return {
    id: 'unsaved',
    network,
    displayName: handle,
    handle,
    server,
    isDefault: false,
    createdAt: new Date(),
  }
}

/**
 * Match an account by id or by handle (with or without the leading @)
 */
export async function findAccount(db: Database, key: string): Promise<IAccount> {
  const accounts = await db.getAccounts()
  const bare = key.replace(/^@/, '')
  const match =
    accounts.find(account => account.id === key) ??
    accounts.find(account => account.handle === bare || fullHandle(account) === `@${bare}`)
  if (!match) {
    throw new UsageError(`No account matches "${key}"`)
  }
  return match
}

async function addAccount(ctx: AccountsContext, args: string[]): Promise<IAccount> {
  const [rawNetwork, identity, secret, pds] = args
  const network = rawNetwork ? parsePlatformType(rawNetwork) : null
  if (!network || !identity || !secret) {
    throw new UsageError(USAGE)
  }

  const server = network === 'bluesky' ? (pds ?? DEFAULT_PDS_URL) : identity
  const handle = network === 'bluesky' ? identity : ''
  const createClient = ctx.createClient ?? createPlatformClient

  const client = await createClient(draftAccount(network, handle, server), secret, ctx.clientOptions ?? {})
  const profile = await client.verifyCredentials()

  const existing = await ctx.db.getAccounts()
  const account = await ctx.db.insertAccount({
    network,
    displayName: profile.displayName,
    handle: profile.handle,
    server: profile.server,
    avatarUrl: profile.avatarUrl,
    isDefault: existing.length === 0,
  })
  await ctx.secrets.storeCredentials(account, secret)

  ctx.logger.info('Account added', { account: fullHandle(account), id: account.id })
  return account
}

function describe(account: IAccount): string {
  const marker = account.isDefault ? '★' : ' '
  const lastUsed = account.lastUsedAt ? `last used ${relativeTime(account.lastUsedAt)}` : 'never used'
  return `  ${marker} ${platformIcon(account.network)} ${account.displayName} ${fullHandle(account)}  (${lastUsed})\n      id: ${account.id}`
}

/**
 * Run one accounts command; returns the process exit code
 */
export async function runAccountsCommand(argv: string[], ctx: AccountsContext): Promise<number> {
  const out = ctx.out ?? ((line: string) => console.log(line))
  const [command, ...args] = argv

  switch (command) {
    case 'list':
    case undefined: {
      const accounts = await ctx.db.getAccounts()
      if (accounts.length === 0) {
        out('No accounts configured.')
        out(USAGE)
        return 0
      }
      let lastNetwork: PlatformType | null = null
      for (const account of accounts) {
        if (account.network !== lastNetwork) {
          out(`══════ ${platformName(account.network)} ══════`)
          lastNetwork = account.network
        }
        out(describe(account))
      }
      return 0
    }

    case 'add': {
      const account = await addAccount(ctx, args)
      out(`✓ Added ${platformName(account.network)} account ${fullHandle(account)}${account.isDefault ? ' (default)' : ''}`)
      return 0
    }

    case 'remove': {
      const [key] = args
      if (!key) throw new UsageError(USAGE)
      const account = await findAccount(ctx.db, key)
      await ctx.secrets.deleteCredentials(account)
      await ctx.db.deleteAccount(account.id)
      ctx.logger.info('Account removed', { account: fullHandle(account), id: account.id })
      out(`✓ Removed ${fullHandle(account)}`)
      return 0
    }

    case 'default': {
      const [key] = args
      if (!key) throw new UsageError(USAGE)
      const account = await findAccount(ctx.db, key)
      await ctx.db.setDefaultAccount(account.id)
      out(`✓ ${fullHandle(account)} is now the default account`)
      return 0
    }

    default:
      throw new UsageError(`Unknown command "${command}"\n${USAGE}`)
  }
}

async function main(): Promise<number> {
  const logger = createLogger(config.TWINFEED_LOG_FILE, 'info').child({ component: 'accounts' })
  const db = await Database.open(config.TWINFEED_DB_URL)
  try {
    return await runAccountsCommand(process.argv.slice(2), {
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

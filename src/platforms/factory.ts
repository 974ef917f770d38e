/**
 * Platform client factory
 * Resolves an account to the client that services its network
 */

import type { IAccount, IPlatformClient } from './types'
import type { HttpClientOptions } from './http'
import { MastodonPlatformClient } from './mastodon/client'
import { BlueskyPlatformClient } from './bluesky/client'

export type ClientOptions = Omit<HttpClientOptions, 'token'>

/**
 * Create a platform client for an account. Bluesky logs in here; the secret
 * is an access token for Mastodon and an app password for Bluesky.
 */
export async function createPlatformClient(
  account: IAccount,
  secret: string,
  options: ClientOptions = {}
): Promise<IPlatformClient> {
  switch (account.network) {
    case 'mastodon':
      return new MastodonPlatformClient(account.server, secret, options)

    case 'bluesky':
      return BlueskyPlatformClient.login(account.handle, secret, account.server, options)

    default: {
      const unknown: never = account.network
      throw new Error(`Unknown platform type: ${String(unknown)}`)
    }
  }
}

/**
 * Credential storage. Mastodon accounts keep an access token,
 * Bluesky accounts an app password.
 */

import * as fs from 'fs'
import * as path from 'path'
import { z } from 'zod'
import { credentialKey, type IAccount } from '@/platforms/types'
import { CredentialError, errorMessage } from '@/platforms/errors'

type AccountRef = Pick<IAccount, 'network' | 'id'>

export interface SecretStore {
  /**
   * Resolves to null when no secret is stored for the account
   */
  getCredentials(account: AccountRef): Promise<string | null>
  storeCredentials(account: AccountRef, secret: string): Promise<void>
  deleteCredentials(account: AccountRef): Promise<void>
}

const secretsFileSchema = z.record(z.string())

/**
 * Secrets kept as a JSON map in a file readable only by the owner
 */
export class FileSecretStore implements SecretStore {
  constructor(private readonly filePath: string) {}

  async getCredentials(account: AccountRef): Promise<string | null> {
    const secrets = this.load()
    return secrets[credentialKey(account)] ?? null
  }

  async storeCredentials(account: AccountRef, secret: string): Promise<void> {
    const secrets = this.load()
    secrets[credentialKey(account)] = secret
    this.save(secrets)
  }

  async deleteCredentials(account: AccountRef): Promise<void> {
    const secrets = this.load()
    const key = credentialKey(account)
    if (!(key in secrets)) return
    delete secrets[key]
    this.save(secrets)
  }

  private load(): Record<string, string> {
    if (!fs.existsSync(this.filePath)) {
      return {}
    }
    try {
      const raw = fs.readFileSync(this.filePath, 'utf-8')
      return secretsFileSchema.parse(JSON.parse(raw))
    } catch (error) {
      throw new CredentialError(`Failed to read credentials: ${errorMessage(error)}`, { cause: error })
    }
  }

  private save(secrets: Record<string, string>): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true })
      fs.writeFileSync(this.filePath, JSON.stringify(secrets, null, 2), { mode: 0o600 })
    } catch (error) {
      throw new CredentialError(`Failed to store credentials: ${errorMessage(error)}`, { cause: error })
    }
  }
}

/**
 * In-process store, used by tests and one-off scripts
 */
export class MemorySecretStore implements SecretStore {
  private readonly secrets = new Map<string, string>()

  async getCredentials(account: AccountRef): Promise<string | null> {
    return this.secrets.get(credentialKey(account)) ?? null
  }

  async storeCredentials(account: AccountRef, secret: string): Promise<void> {
    this.secrets.set(credentialKey(account), secret)
  }

  async deleteCredentials(account: AccountRef): Promise<void> {
    this.secrets.delete(credentialKey(account))
  }
}

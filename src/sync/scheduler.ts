/**
 * Hands scheduled posts to the worker once they are due
 */

import { platformName, type IAccount, type PlatformType } from '@/platforms/types'
import type { Database } from '@/store/db'
import { silentLogger, type Logger } from '@/helpers/logger'
import { submitScheduledPost, type SyncCommand } from './commands'

export const DEFAULT_SCHEDULE_CHECK_SECS = 30

export interface SchedulerDeps {
  db: Database
  send: (command: SyncCommand) => Promise<void>
  logger?: Logger
}

/**
 * Send every due post through the worker; returns how many were handed over.
 *
 * A post is claimed (pending to posting) before it is queued, so a later check
 * never sends it twice. The worker settles it as posted or failed.
 */
export async function dispatchDueScheduledPosts(deps: SchedulerDeps, now: Date = new Date()): Promise<number> {
  const logger = (deps.logger ?? silentLogger).child({ component: 'scheduler' })
  const due = await deps.db.getDueScheduledPosts(now)
  let sent = 0

  for (const post of due) {
    const accounts: IAccount[] = []
    const missing: PlatformType[] = []
    for (const network of post.networks) {
      const account = await deps.db.getPostingAccount(network)
      if (account) {
        accounts.push(account)
      } else {
        missing.push(network)
      }
    }

    if (accounts.length === 0) {
      const reason =
        missing.length > 0 ? `No account for ${missing.map(platformName).join(', ')}` : 'No networks selected'
      logger.warn(`Scheduled post ${post.id} skipped: ${reason}`)
      await deps.db.updateScheduledPostStatus(post.id, 'failed', reason)
      continue
    }

    if (!(await deps.db.claimScheduledPost(post.id))) continue
    try {
      await deps.send(submitScheduledPost(post.content, accounts, post.id))
    } catch (error) {
      await deps.db.updateScheduledPostStatus(post.id, 'pending')
      throw error
    }
    logger.info(`Scheduled post ${post.id} queued`, { accounts: accounts.length })
    sent++
  }

  return sent
}

/**
 * Check for due posts now and then every intervalSecs; returns a stop function
 */
export function startScheduler(deps: SchedulerDeps, intervalSecs: number = DEFAULT_SCHEDULE_CHECK_SECS): () => void {
  const logger = (deps.logger ?? silentLogger).child({ component: 'scheduler' })
  let running = false

  const check = () => {
    if (running) return
    running = true
    void dispatchDueScheduledPosts(deps)
      .catch(error => {
        logger.error('Scheduled post check failed', error)
      })
      .finally(() => {
        running = false
      })
  }

  check()
  const timer = setInterval(check, intervalSecs * 1000)
  return () => clearInterval(timer)
}

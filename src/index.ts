import config from '@/helpers/env'
import { createLogger, isLogLevel } from '@/helpers/logger'
import { errorMessage } from '@/platforms/errors'
import { Database } from '@/store/db'
import { FileSecretStore } from '@/store/secrets'
import { spawnWorker } from '@/sync/worker'
import { startScheduler } from '@/sync/scheduler'
import { renderApp } from '@/cli/ui/App'

// Cached posts and finished scheduled posts older than this are dropped at startup
const CACHE_MAX_AGE_HOURS = 24 * 7

void (async () => {
  const logger = createLogger(
    config.TWINFEED_LOG_FILE,
    isLogLevel(config.TWINFEED_LOG_LEVEL) ? config.TWINFEED_LOG_LEVEL : 'info'
  )
  logger.info('Starting twinfeed', { db: config.TWINFEED_DB_URL })

  let db: Database
  try {
    db = await Database.open(config.TWINFEED_DB_URL)
  } catch (error) {
    console.error(`❌ Could not open database ${config.TWINFEED_DB_URL}: ${errorMessage(error)}`)
    process.exitCode = 1
    return
  }

  const removed = await db.clearOldCache(CACHE_MAX_AGE_HOURS)
  if (removed > 0) {
    logger.debug(`Dropped ${removed} stale cached posts`)
  }
  const finished = await db.clearOldScheduledPosts(CACHE_MAX_AGE_HOURS)
  if (finished > 0) {
    logger.debug(`Dropped ${finished} finished scheduled posts`)
  }

  const accounts = await db.getAccounts()
  const initialPosts = await db.getCachedPosts(null, config.TWINFEED_POST_LIMIT)

  const worker = spawnWorker({
    secrets: new FileSecretStore(config.TWINFEED_CREDENTIALS_PATH),
    logger,
    postLimit: config.TWINFEED_POST_LIMIT,
    queueCapacity: config.TWINFEED_QUEUE_CAPACITY,
    clientOptions: { timeoutMs: config.TWINFEED_REQUEST_TIMEOUT_MS },
    touchAccount: account => db.updateAccountLastUsed(account.id),
    settleScheduledPost: (id, error) => db.updateScheduledPostStatus(id, error ? 'failed' : 'posted', error),
  })

  worker.done.catch(error => {
    logger.error('Worker stopped unexpectedly', error)
  })

  const stopScheduler = startScheduler({ db, send: worker.send, logger }, config.TWINFEED_SCHEDULE_CHECK_SECS)

  const app = renderApp({
    worker,
    db,
    logger,
    accounts,
    initialPosts,
    refreshIntervalSecs: config.TWINFEED_REFRESH_INTERVAL_SECS,
  })

  await app.waitUntilExit()
  stopScheduler()
  db.close()
  logger.info('Exited')
})().catch(error => {
  console.error(`❌ ${errorMessage(error)}`)
  process.exitCode = 1
})

import * as dotenv from 'dotenv'
import { cleanEnv, str, num } from 'envalid'
import { cwd } from 'process'
import { resolve, join } from 'path'
import * as os from 'os'

dotenv.config({ path: resolve(cwd(), '.env') })

const DATA_DIR = join(os.homedir(), '.twinfeed')

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  return cleanEnv(env, {
    TWINFEED_DB_URL: str({ default: `file:${join(DATA_DIR, 'twinfeed.db')}` }), // libSQL URL for accounts and post cache
    TWINFEED_CREDENTIALS_PATH: str({ default: join(DATA_DIR, 'credentials.json') }),
    TWINFEED_LOG_FILE: str({ default: join(DATA_DIR, 'twinfeed.log') }),
    TWINFEED_LOG_LEVEL: str({ choices: ['debug', 'info', 'warn', 'error'], default: 'info' }),
    TWINFEED_POST_LIMIT: num({ default: 50 }), // Posts fetched per account on refresh
    TWINFEED_QUEUE_CAPACITY: num({ default: 32 }), // Command and result queue size
    TWINFEED_REQUEST_TIMEOUT_MS: num({ default: 30000 }),
    TWINFEED_REFRESH_INTERVAL_SECS: num({ default: 0 }), // 0 = manual refresh only
    TWINFEED_SCHEDULE_CHECK_SECS: num({ default: 30 }), // How often due scheduled posts are sent
  })
}

export type Config = ReturnType<typeof loadConfig>

// eslint-disable-next-line node/no-process-env
export default loadConfig()

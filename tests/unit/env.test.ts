import { describe, it, expect } from 'vitest'
import * as os from 'os'
import * as path from 'path'
import { loadConfig } from '../../src/helpers/env'

describe('loadConfig', () => {
  it('should default to files under the data directory', () => {
    const dataDir = path.join(os.homedir(), '.twinfeed')
    const config = loadConfig({})

    expect(config.TWINFEED_DB_URL).toBe(`file:${path.join(dataDir, 'twinfeed.db')}`)
    expect(config.TWINFEED_CREDENTIALS_PATH).toBe(path.join(dataDir, 'credentials.json'))
    expect(config.TWINFEED_LOG_FILE).toBe(path.join(dataDir, 'twinfeed.log'))
  })

  it('should default the tuning knobs', () => {
    const config = loadConfig({})

    expect(config.TWINFEED_LOG_LEVEL).toBe('info')
    expect(config.TWINFEED_POST_LIMIT).toBe(50)
    expect(config.TWINFEED_QUEUE_CAPACITY).toBe(32)
    expect(config.TWINFEED_REQUEST_TIMEOUT_MS).toBe(30000)
    expect(config.TWINFEED_REFRESH_INTERVAL_SECS).toBe(0)
    expect(config.TWINFEED_SCHEDULE_CHECK_SECS).toBe(30)
  })

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      TWINFEED_DB_URL: ':memory:',
      TWINFEED_LOG_LEVEL: 'debug',
      TWINFEED_POST_LIMIT: '20',
      TWINFEED_REFRESH_INTERVAL_SECS: '120',
    })

    expect(config.TWINFEED_DB_URL).toBe(':memory:')
    expect(config.TWINFEED_LOG_LEVEL).toBe('debug')
    expect(config.TWINFEED_POST_LIMIT).toBe(20)
    expect(config.TWINFEED_REFRESH_INTERVAL_SECS).toBe(120)
  })
})

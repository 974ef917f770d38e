import { afterEach, describe, it, expect } from 'vitest'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { Logger, fileSink, isLogLevel } from '../../src/helpers/logger'

const LINE = /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] /

function capture(level: 'debug' | 'info' | 'warn' | 'error' = 'info') {
  const lines: string[] = []
  const logger = new Logger(line => lines.push(line), level)
  return { logger, lines, messages: () => lines.map(line => line.replace(LINE, '')) }
}

describe('Logger', () => {
  it('should stamp each line with the time and level', () => {
    const { logger, lines } = capture()
    logger.info('Worker started')
    expect(lines[0]).toMatch(LINE)
    expect(lines[0]?.endsWith('INFO Worker started')).toBe(true)
  })

  it('should drop lines below the configured level', () => {
    const { logger, messages } = capture('warn')
    logger.debug('noise')
    logger.info('chatter')
    logger.warn('careful')
    expect(messages()).toEqual(['WARN careful'])
  })

  it('should carry child context onto every line', () => {
    const { logger, messages } = capture()
    const child = logger.child({ component: 'worker' }).child({ account: '@alice@social.example' })

    child.info('Fetched 3 posts', { count: 3, skipped: undefined })

    expect(messages()).toEqual(['INFO Fetched 3 posts component=worker account=@alice@social.example count=3'])
  })

  it('should append the error name and message', () => {
    const { logger, messages } = capture()
    logger.error('Post failed', new TypeError('bad input'), { account: 'bob' })
    logger.error('Odd failure', 'plain string')
    logger.error('No detail')

    expect(messages()).toEqual([
      'ERROR Post failed: TypeError: bad input account=bob',
      'ERROR Odd failure: plain string',
      'ERROR No detail',
    ])
  })
})

describe('isLogLevel', () => {
  it('should accept only known levels', () => {
    expect(isLogLevel('debug')).toBe(true)
    expect(isLogLevel('verbose')).toBe(false)
    expect(isLogLevel('toString')).toBe(false)
  })
})

describe('fileSink', () => {
  let dir: string | undefined

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true })
  })

  it('should create the directory and append lines', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'twinfeed-log-'))
    const file = path.join(dir, 'logs', 'twinfeed.log')
    const sink = fileSink(file)

    sink('first')
    sink('second')

    expect(fs.readFileSync(file, 'utf-8')).toBe('first\nsecond\n')
  })
})

/**
 * Parsing and describing the times posts are scheduled for
 *
 * Accepted forms:
 *   in 5m, in 2h, in 1d, in 30 minutes, in 2 hours   relative to now
 *   15:00, 15:30:10, 3pm, 3:30pm                      today, or tomorrow once passed
 *   2030-01-15 14:30, 2030-01-15T14:30:00             local time
 *   2030-01-15T14:30:00Z, 2030-01-15T14:30:00+01:00   with an explicit offset
 */

const SECOND = 1000
const MINUTE = 60 * SECOND
const HOUR = 60 * MINUTE
const DAY = 24 * HOUR
const WEEK = 7 * DAY

const SHORT_UNITS: Partial<Record<string, number>> = {
  s: SECOND,
  m: MINUTE,
  h: HOUR,
  d: DAY,
  w: WEEK,
}

const LONG_UNITS: Partial<Record<string, number>> = {
  second: SECOND,
  sec: SECOND,
  minute: MINUTE,
  min: MINUTE,
  hour: HOUR,
  hr: HOUR,
  day: DAY,
  week: WEEK,
}

const ISO_WITH_OFFSET = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/
const LOCAL_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})[ t](\d{1,2}):(\d{2})(?::(\d{2}))?$/
const TIME_24H = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/
const TIME_12H = /^(\d{1,2})(?::(\d{2}))?(am|pm)$/

const FORMATS_HELP = `Supported formats:
  - Relative: 'in 5m', 'in 2h', 'in 1d', 'in 30 minutes'
  - Time today: '15:00', '3pm', '15:30'
  - Date+time: 'YYYY-MM-DD 15:00'`

export class ScheduleParseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ScheduleParseError'
  }
}

/**
 * Local date from its parts, or null when a part is out of range (Feb 30th, 25:00)
 */
function localDate(year: number, month: number, day: number, hour: number, minute: number, second: number): Date | null {
  const date = new Date(year, month - 1, day, hour, minute, second)
  const matches =
    date.getFullYear() === year &&
    date.getMonth() === month - 1 &&
    date.getDate() === day &&
    date.getHours() === hour &&
    date.getMinutes() === minute
  return matches ? date : null
}

function parseRelative(input: string, now: Date): Date {
  const short = /^(\d+)([smhdw])$/.exec(input)
  const shortUnit = short?.[2]
  if (short && shortUnit) {
    return new Date(now.getTime() + Number(short[1]) * (SHORT_UNITS[shortUnit] ?? 0))
  }

  const long = /^(\d+)\s+([a-z]+)$/.exec(input)
  const rawUnit = long?.[2]
  if (long && rawUnit) {
    const unit = LONG_UNITS[rawUnit.replace(/s$/, '')]
    if (unit === undefined) {
      throw new ScheduleParseError(`Unknown time unit: ${rawUnit}`)
    }
    return new Date(now.getTime() + Number(long[1]) * unit)
  }

  throw new ScheduleParseError(
    `Could not parse relative time: '${input}'\nExamples: '5m', '2h', '1d', '30 minutes', '2 hours'`
  )
}

/**
 * Hour, minute and second of a bare time of day
 */
function parseTimeOfDay(input: string): [number, number, number] | null {
  const h24 = TIME_24H.exec(input)
  if (h24) {
    const hour = Number(h24[1])
    const minute = Number(h24[2])
    const second = Number(h24[3] ?? 0)
    return hour < 24 && minute < 60 && second < 60 ? [hour, minute, second] : null
  }

  const h12 = TIME_12H.exec(input.replace(/\s+/g, ''))
  if (h12) {
    const hour = Number(h12[1])
    const minute = Number(h12[2] ?? 0)
    if (hour < 1 || hour > 12 || minute >= 60) return null
    const base = hour === 12 ? 0 : hour
    return [h12[3] === 'pm' ? base + 12 : base, minute, 0]
  }

  return null
}

/**
 * Turn user input into the instant a post should go out
 */
export function parseScheduleTime(raw: string, now: Date = new Date()): Date {
  const trimmed = raw.trim()
  const input = trimmed.toLowerCase()

  if (input.startsWith('in ')) {
    return parseRelative(input.slice(3).trim(), now)
  }

  const upper = trimmed.toUpperCase()
  if (ISO_WITH_OFFSET.test(upper)) {
    const date = new Date(upper)
    if (!Number.isNaN(date.getTime())) return date
  }

  const dateTime = LOCAL_DATE_TIME.exec(input)
  if (dateTime) {
    const [, year, month, day, hour, minute, second] = dateTime
    const date = localDate(Number(year), Number(month), Number(day), Number(hour), Number(minute), Number(second ?? 0))
    if (date) return date
  }

  const time = parseTimeOfDay(input)
  if (time) {
    const [hour, minute, second] = time
    const today = new Date(now.getFullYear(), now.getMonth(), now.getDate(), hour, minute, second)
    if (today.getTime() > now.getTime()) return today
    return new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1, hour, minute, second)
  }

  throw new ScheduleParseError(`Could not parse schedule time: '${trimmed}'\n${FORMATS_HELP}`)
}

/**
 * Time left before a scheduled post goes out: "now", "45s", "5m", "2h 30m", "1d 3h"
 */
export function timeUntil(date: Date, now: Date = new Date()): string {
  const seconds = Math.floor((date.getTime() - now.getTime()) / SECOND)
  if (seconds <= 0) return 'now'
  if (seconds < 60) return `${seconds}s`
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m`
  if (seconds < 86400) {
    const hours = Math.floor(seconds / 3600)
    const minutes = Math.floor((seconds % 3600) / 60)
    return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`
  }
  const days = Math.floor(seconds / 86400)
  const hours = Math.floor((seconds % 86400) / 3600)
  return hours > 0 ? `${days}d ${hours}h` : `${days}d`
}

/**
 * "2030-01-15 13:30 UTC"
 */
export function formatScheduledTime(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`
}

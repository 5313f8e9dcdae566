/**
 * Date/Time Helpers
 *
 * The model works with *naive* date-times: luxon DateTime values pinned to the
 * `utc` zone whose fields are read as a wall clock. Whether that wall clock is
 * local to a calendar or is the canonical UTC storage value depends on where
 * the value sits (see timezone/normalizer.ts).
 */

import { DateTime } from 'luxon'
import { InvalidEventError } from '../errors.js'

/** Naive wall-clock date-time (luxon DateTime fixed to the utc zone) */
export type LocalDateTime = DateTime

/** Naive calendar date (midnight, utc zone) */
export type LocalDate = DateTime

export interface TimeOfDay {
  hour: number
  minute: number
  second: number
}

const NAIVE = { zone: 'utc' } as const

const DATE_FORMAT = 'yyyy-MM-dd'
const TIME_FORMAT = 'HH:mm'
const DATE_TIME_FORMAT = "yyyy-MM-dd'T'HH:mm"
const DATE_TIME_SECONDS_FORMAT = "yyyy-MM-dd'T'HH:mm:ss"

// ─── Parsing ───

export function parseDate(text: string): LocalDate {
  const parsed = DateTime.fromFormat(text.trim(), DATE_FORMAT, NAIVE)
  if (!parsed.isValid) {
    throw new InvalidEventError(`Invalid date format: ${text}. Expected format: YYYY-MM-DD`)
  }
  return parsed
}

export function parseDateTime(text: string): LocalDateTime {
  const trimmed = text.trim()
  const parsed = DateTime.fromFormat(trimmed, DATE_TIME_FORMAT, NAIVE)
  if (parsed.isValid) return parsed

  const withSeconds = DateTime.fromFormat(trimmed, DATE_TIME_SECONDS_FORMAT, NAIVE)
  if (withSeconds.isValid) return withSeconds

  throw new InvalidEventError(
    `Invalid date time format: ${text}. Expected format: YYYY-MM-DDThh:mm or YYYY-MM-DDThh:mm:ss`,
  )
}

export function parseTime(text: string): TimeOfDay {
  const match = text.trim().match(/^(\d{2}):(\d{2})(?::(\d{2}))?$/)
  if (!match) {
    throw new InvalidEventError(`Invalid time format: ${text}. Expected format: HH:MM`)
  }
  const hour = Number(match[1])
  const minute = Number(match[2])
  const second = match[3] !== undefined ? Number(match[3]) : 0
  if (hour > 23 || minute > 59 || second > 59) {
    throw new InvalidEventError(`Invalid time: ${text}`)
  }
  return { hour, minute, second }
}

/**
 * Build a naive date-time from its parts (month is 1-based).
 */
export function localDateTime(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
): LocalDateTime {
  return DateTime.fromObject({ year, month, day, hour, minute, second }, NAIVE)
}

export function localDate(year: number, month: number, day: number): LocalDate {
  return DateTime.fromObject({ year, month, day }, NAIVE)
}

// ─── Arithmetic ───

export function toDate(value: LocalDateTime): LocalDate {
  return value.startOf('day')
}

export function atTime(date: LocalDate, time: TimeOfDay): LocalDateTime {
  return date.set({ ...time, millisecond: 0 })
}

export function startOfDay(date: LocalDate): LocalDateTime {
  return date.startOf('day')
}

/** Last second of the day (23:59:59), the bound all-day events use */
export function endOfDay(date: LocalDate): LocalDateTime {
  return date.set({ hour: 23, minute: 59, second: 59, millisecond: 0 })
}

export function timeOf(value: LocalDateTime): TimeOfDay {
  return { hour: value.hour, minute: value.minute, second: value.second }
}

/** Whole days from `from` to `to` (negative when `to` is earlier) */
export function daysBetween(from: LocalDate, to: LocalDate): number {
  return Math.round(to.startOf('day').diff(from.startOf('day'), 'days').days)
}

export function sameDate(a: LocalDate, b: LocalDate): boolean {
  return formatDate(a) === formatDate(b)
}

// ─── Formatting ───

export function formatDate(value: LocalDate): string {
  return value.toFormat(DATE_FORMAT)
}

export function formatTime(value: LocalDateTime): string {
  return value.toFormat(TIME_FORMAT)
}

export function formatDateTime(value: LocalDateTime): string {
  return value.toFormat(DATE_TIME_FORMAT)
}

/**
 * Weekday codes for recurrence patterns.
 *
 * One letter per day: M T W R F S U (Monday through Sunday). Values follow
 * luxon's ISO numbering, 1 = Monday ... 7 = Sunday.
 */

import { InvalidEventError } from '../errors.js'

export type Weekday = 1 | 2 | 3 | 4 | 5 | 6 | 7

const CODE_TO_WEEKDAY: Record<string, Weekday> = {
  M: 1,
  T: 2,
  W: 3,
  R: 4,
  F: 5,
  S: 6,
  U: 7,
}

const WEEK: ReadonlyArray<[Weekday, string]> = [
  [1, 'M'],
  [2, 'T'],
  [3, 'W'],
  [4, 'R'],
  [5, 'F'],
  [6, 'S'],
  [7, 'U'],
]

/**
 * Parse a code string such as "MWF" into a weekday set.
 * Case-insensitive; repeated letters collapse.
 */
export function parseWeekdays(codes: string): Set<Weekday> {
  if (!codes || !codes.trim()) {
    throw new InvalidEventError('Weekdays string cannot be empty')
  }

  const days = new Set<Weekday>()
  for (const char of codes.trim().toUpperCase()) {
    const day = CODE_TO_WEEKDAY[char]
    if (day === undefined) {
      throw new InvalidEventError(`Invalid weekday character: ${char}`)
    }
    days.add(day)
  }
  return days
}

/** Inverse of parseWeekdays, in Monday-first order */
export function formatWeekdays(days: ReadonlySet<Weekday>): string {
  return WEEK.filter(([day]) => days.has(day))
    .map(([, code]) => code)
    .join('')
}

export function isWeekday(value: number): value is Weekday {
  return Number.isInteger(value) && value >= 1 && value <= 7
}

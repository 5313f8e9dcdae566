/**
 * Command Parser
 *
 * Turns one line of text into a typed Command. Keywords are matched
 * case-sensitively. Subjects and calendar names may be wrapped in single or
 * double quotes to include spaces; runs of whitespace outside quotes count
 * as a single space.
 */

import { endOfDay, parseDate, parseDateTime, startOfDay, stripQuotes, type LocalDateTime } from '@caldesk/core'
import { CommandSyntaxError, type CalendarProperty, type Command, type RepeatRule } from './types.js'

const QUOTED_OR_WORD = `("[^"]+"|'[^']+'|[^\\s"']+)`
const DATE = '(\\d{4}-\\d{2}-\\d{2})'
const DATE_TIME = '(\\d{4}-\\d{2}-\\d{2}T\\d{2}:\\d{2}(?::\\d{2})?)'
const DATE_OR_DATE_TIME = '(\\d{4}-\\d{2}-\\d{2}(?:T\\d{2}:\\d{2}(?::\\d{2})?)?)'
const REST = '(.+)'

function pattern(source: string): RegExp {
  return new RegExp(`^${source}$`)
}

interface CommandPattern {
  pattern: RegExp
  build: (match: RegExpMatchArray) => Command
}

const PATTERNS: readonly CommandPattern[] = [
  // ─── Calendars ───
  {
    pattern: pattern(`create calendar --name ${QUOTED_OR_WORD} --timezone (\\S+)`),
    build: (m) => ({ kind: 'createCalendar', name: m[1], timezone: m[2] }),
  },
  {
    pattern: pattern(`edit calendar --name ${QUOTED_OR_WORD} --property (\\w+) ${REST}`),
    build: (m) => ({
      kind: 'editCalendar',
      name: stripQuotes(m[1]),
      property: calendarProperty(m[2]),
      value: stripQuotes(m[3]),
    }),
  },
  {
    pattern: pattern(`use calendar --name ${QUOTED_OR_WORD}`),
    build: (m) => ({ kind: 'useCalendar', name: stripQuotes(m[1]) }),
  },

  // ─── Events ───
  {
    pattern: pattern(
      `create event (--autoDecline )?${QUOTED_OR_WORD} (?:from ${DATE_TIME} to ${DATE_TIME}|on ${DATE})` +
        `(?: repeats ([A-Za-z]+) (?:for (\\d+) times|until ${DATE}))?` +
        `(?: desc "([^"]*)")?(?: at "([^"]*)")?( private)?`,
    ),
    build: buildCreateEvent,
  },
  {
    pattern: pattern(`edit event (\\w+) ${QUOTED_OR_WORD} from ${DATE_TIME} with ${REST}`),
    build: (m) => ({
      kind: 'editEvent',
      property: m[1],
      subject: stripQuotes(m[2]),
      start: parseDateTime(m[3]),
      end: null,
      value: stripQuotes(m[4]),
    }),
  },
  {
    pattern: pattern(`edit event (\\w+) ${QUOTED_OR_WORD} from ${DATE_TIME} to ${DATE_TIME} with ${REST}`),
    build: (m) => ({
      kind: 'editEvent',
      property: m[1],
      subject: stripQuotes(m[2]),
      start: parseDateTime(m[3]),
      end: parseDateTime(m[4]),
      value: stripQuotes(m[5]),
    }),
  },
  {
    pattern: pattern(`edit events (\\w+) ${QUOTED_OR_WORD} from ${DATE_TIME} with ${REST}`),
    build: (m) => ({
      kind: 'editEventsFrom',
      property: m[1],
      subject: stripQuotes(m[2]),
      start: parseDateTime(m[3]),
      value: stripQuotes(m[4]),
    }),
  },
  {
    pattern: pattern(`edit events (\\w+) ${QUOTED_OR_WORD} with ${REST}`),
    build: (m) => ({
      kind: 'editAllEvents',
      property: m[1],
      subject: stripQuotes(m[2]),
      value: stripQuotes(m[3]),
    }),
  },

  // ─── Queries ───
  {
    pattern: pattern(`print events on ${DATE}`),
    build: (m) => ({ kind: 'printOn', date: parseDate(m[1]) }),
  },
  {
    pattern: pattern(`print events from ${DATE_OR_DATE_TIME} to ${DATE_OR_DATE_TIME}`),
    build: buildPrintRange,
  },
  {
    pattern: pattern(`show status on ${DATE_TIME}`),
    build: (m) => ({ kind: 'showStatus', at: parseDateTime(m[1]) }),
  },
  {
    pattern: pattern('show calendar'),
    build: () => ({ kind: 'showCalendar' }),
  },

  // ─── Copy ───
  {
    pattern: pattern(`copy event ${QUOTED_OR_WORD} on ${DATE_TIME} --target ${QUOTED_OR_WORD} to ${DATE_TIME}`),
    build: (m) => ({
      kind: 'copyEvent',
      subject: stripQuotes(m[1]),
      start: parseDateTime(m[2]),
      target: stripQuotes(m[3]),
      targetStart: parseDateTime(m[4]),
    }),
  },
  {
    pattern: pattern(`copy events on ${DATE} --target ${QUOTED_OR_WORD} to ${DATE}`),
    build: (m) => ({
      kind: 'copyEventsOn',
      date: parseDate(m[1]),
      target: stripQuotes(m[2]),
      targetDate: parseDate(m[3]),
    }),
  },
  {
    pattern: pattern(
      `copy events between ${DATE} and ${DATE} --target ${QUOTED_OR_WORD} to ${DATE}`,
    ),
    build: (m) => ({
      kind: 'copyEventsBetween',
      from: parseDate(m[1]),
      to: parseDate(m[2]),
      target: stripQuotes(m[3]),
      targetStart: parseDate(m[4]),
    }),
  },

  // ─── Files ───
  {
    pattern: pattern(`export cal ${REST}`),
    build: (m) => ({ kind: 'exportCalendar', file: stripQuotes(m[1]) }),
  },
  {
    pattern: pattern(`import cal ${REST}`),
    build: (m) => ({ kind: 'importCalendar', file: stripQuotes(m[1]) }),
  },
  {
    pattern: pattern('exit'),
    build: () => ({ kind: 'exit' }),
  },
]

/**
 * Parse one command line.
 *
 * @throws CommandSyntaxError when no command form matches
 * @throws InvalidEventError when a date or time does not exist
 */
export function parseCommand(line: string): Command {
  const normalized = collapseWhitespace(line)
  if (!normalized) {
    throw new CommandSyntaxError('Empty command')
  }

  for (const { pattern, build } of PATTERNS) {
    const match = normalized.match(pattern)
    if (match) return build(match)
  }
  throw new CommandSyntaxError(`Unknown command: ${normalized}`)
}

/**
 * Trim and collapse whitespace runs that sit outside quotes.
 */
export function collapseWhitespace(line: string): string {
  let result = ''
  let quote: string | null = null
  let pendingSpace = false

  for (const char of line.trim()) {
    if (quote === null && /\s/.test(char)) {
      pendingSpace = true
      continue
    }
    if (pendingSpace) {
      result += ' '
      pendingSpace = false
    }
    if (quote === null && (char === '"' || char === "'")) {
      quote = char
    } else if (char === quote) {
      quote = null
    }
    result += char
  }
  return result
}

function buildCreateEvent(m: RegExpMatchArray): Command {
  const fromText = optional(m, 3)
  const toText = optional(m, 4)
  const onText = optional(m, 5)

  const timing =
    fromText !== undefined && toText !== undefined
      ? { kind: 'timed' as const, start: parseDateTime(fromText), end: parseDateTime(toText) }
      : { kind: 'allDay' as const, date: parseDate(onText ?? '') }

  return {
    kind: 'createEvent',
    subject: stripQuotes(m[2]),
    timing,
    repeat: repeatRule(m),
    description: optional(m, 9) ?? '',
    location: optional(m, 10) ?? '',
    isPublic: optional(m, 11) === undefined,
    autoDecline: optional(m, 1) === undefined ? null : true,
  }
}

/**
 * Two plain dates select whole days. A date-time on either side selects an
 * instant range; a plain date there stands for the start (from) or end (to)
 * of that day.
 */
function buildPrintRange(m: RegExpMatchArray): Command {
  const [fromText, toText] = [m[1], m[2]]
  if (!hasTime(fromText) && !hasTime(toText)) {
    return { kind: 'printRange', from: parseDate(fromText), to: parseDate(toText) }
  }
  return {
    kind: 'printBetween',
    from: rangeBound(fromText, startOfDay),
    to: rangeBound(toText, endOfDay),
  }
}

function hasTime(text: string): boolean {
  return text.includes('T')
}

function rangeBound(text: string, ofDay: (date: LocalDateTime) => LocalDateTime): LocalDateTime {
  return hasTime(text) ? parseDateTime(text) : ofDay(parseDate(text))
}

function repeatRule(m: RegExpMatchArray): RepeatRule | null {
  const weekdays = optional(m, 6)
  if (weekdays === undefined) return null

  const count = optional(m, 7)
  if (count !== undefined) {
    return { weekdays, termination: { kind: 'count', count: Number(count) } }
  }
  return { weekdays, termination: { kind: 'until', until: parseDate(optional(m, 8) ?? '') } }
}

function calendarProperty(name: string): CalendarProperty {
  const property = name.toLowerCase()
  if (property === 'name' || property === 'timezone') return property
  throw new CommandSyntaxError(`Invalid property '${name}' for calendar edit`)
}

/** Capture group that may not have participated in the match */
function optional(match: RegExpMatchArray, index: number): string | undefined {
  const value: string | undefined = match[index]
  return value
}

/**
 * Cross-Calendar Copy
 *
 * Copies events from a source calendar (the active one unless named) into a
 * target calendar. A single copy lands at an explicit target-local start and
 * keeps its duration. Day and range copies shift each event's source-local
 * wall clock by the distance between the source and target dates, then
 * translate it into the target zone. Range copies skip conflicting events
 * and report them in the summary.
 */

import { EventNotFoundError } from '../errors.js'
import type { CalendarEvent } from '../events/event.js'
import { buildConverter } from '../timezone/normalizer.js'
import { daysBetween, formatDateTime, toDate, type LocalDate, type LocalDateTime } from '../utils/datetime.js'
import type { Calendar } from './calendar.js'
import type { CalendarManager } from './manager.js'
import type { CopySummary } from './types.js'

export interface CopyEventOptions {
  subject: string
  /** Start of the source event, in the source calendar's local time */
  start: LocalDateTime
  target: string
  /** Start of the copy, in the target calendar's local time */
  targetStart: LocalDateTime
  /** Source calendar name (default: the active calendar) */
  source?: string
}

export interface CopyDayOptions {
  date: LocalDate
  target: string
  targetDate: LocalDate
  source?: string
}

export interface CopyRangeOptions {
  from: LocalDate
  to: LocalDate
  target: string
  targetStart: LocalDate
  source?: string
}

/**
 * Copy one event to an explicit start in another calendar.
 *
 * @throws EventNotFoundError when no source event matches
 * @throws CalendarNotFoundError when either calendar is unknown
 * @throws ConflictingEventError when the copy overlaps an event in the target
 */
export function copyEvent(manager: CalendarManager, options: CopyEventOptions): CalendarEvent {
  const target = manager.getCalendar(options.target)
  const source = resolveSource(manager, options.source)
  const found = source.findEvent(options.subject, options.start)
  if (!found) {
    throw new EventNotFoundError(
      `Event not found: ${options.subject} at ${formatDateTime(options.start)}`,
    )
  }

  const copy = found.duplicate(
    options.targetStart,
    options.targetStart.plus({ milliseconds: found.durationMillis() }),
  )
  manager.executeOnCalendar(target.name, (calendar) => calendar.addEvent(copy, true))
  return copy
}

/**
 * Copy every event on a source date to a target date.
 */
export function copyEventsOnDate(manager: CalendarManager, options: CopyDayOptions): CopySummary {
  return copyEventsBetween(manager, {
    from: options.date,
    to: options.date,
    target: options.target,
    targetStart: options.targetDate,
    source: options.source,
  })
}

/**
 * Copy every event touching [from, to] so the range starts at `targetStart`.
 */
export function copyEventsBetween(manager: CalendarManager, options: CopyRangeOptions): CopySummary {
  const source = resolveSource(manager, options.source)
  const target = manager.getCalendar(options.target)
  const events = source.getEventsInRange(options.from, options.to)
  const offset = daysBetween(options.from, options.targetStart)
  const convert = buildConverter(source.timezone, target.timezone)

  const summary: CopySummary = { target: target.name, copied: 0, skipped: 0, total: events.length }

  for (const event of events) {
    const local = source.toLocal(event)
    const copy = local.allDay && local.date
      ? local.duplicate(
          local.start.plus({ days: offset }),
          local.end.plus({ days: offset }),
          toDate(local.date.plus({ days: offset })),
        )
      : local.duplicate(
          convert(local.start.plus({ days: offset })),
          convert(local.end.plus({ days: offset })),
        )

    const added = manager.executeOnCalendar(target.name, (calendar) => calendar.addEvent(copy, false))
    if (added) summary.copied++
    else summary.skipped++
  }

  return summary
}

function resolveSource(manager: CalendarManager, name: string | undefined): Calendar {
  return name === undefined ? manager.getActiveCalendar() : manager.getCalendar(name)
}

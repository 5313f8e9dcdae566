/**
 * Recurring Event
 *
 * A template that expands into a bounded, ordered list of concrete
 * occurrences: one per matching weekday, starting from the template's first
 * date, until the occurrence count is reached or the until-date is passed.
 *
 * Expansion is pure. Occurrence ids are derived from the series id and the
 * occurrence date, so expanding the same template twice yields equal events.
 */

import { randomUUID } from 'node:crypto'
import { InvalidEventError } from '../errors.js'
import {
  atTime,
  endOfDay,
  formatDate,
  startOfDay,
  timeOf,
  toDate,
  type LocalDate,
  type LocalDateTime,
} from '../utils/datetime.js'
import { CalendarEvent } from './event.js'
import { formatWeekdays, isWeekday, type Weekday } from './weekdays.js'
import type { EventDetails, Termination } from './types.js'

interface RecurringEventInit extends Required<EventDetails> {
  id: string
  subject: string
  start: LocalDateTime
  end: LocalDateTime
  allDay: boolean
  weekdays: ReadonlySet<Weekday>
  termination: Termination
}

export class RecurringEvent {
  readonly id: string
  readonly subject: string
  /** First-occurrence start (template time of day) */
  readonly start: LocalDateTime
  /** First-occurrence end (template duration) */
  readonly end: LocalDateTime
  readonly description: string
  readonly location: string
  readonly isPublic: boolean
  readonly allDay: boolean
  readonly weekdays: ReadonlySet<Weekday>
  readonly termination: Termination

  constructor(init: RecurringEventInit) {
    this.id = init.id
    this.subject = init.subject
    this.start = init.start
    this.end = init.end
    this.description = init.description
    this.location = init.location
    this.isPublic = init.isPublic
    this.allDay = init.allDay
    this.weekdays = new Set(init.weekdays)
    this.termination = init.termination
  }

  get occurrenceCount(): number | null {
    return this.termination.kind === 'count' ? this.termination.count : null
  }

  get untilDate(): LocalDate | null {
    return this.termination.kind === 'until' ? this.termination.until : null
  }

  get weekdayCodes(): string {
    return formatWeekdays(this.weekdays)
  }

  /**
   * Every occurrence of the series, in date order.
   */
  expandOccurrences(): CalendarEvent[] {
    const occurrences: CalendarEvent[] = []
    const { termination } = this
    let day = toDate(this.start)

    while (true) {
      if (termination.kind === 'count' && occurrences.length >= termination.count) break
      if (termination.kind === 'until' && day.toMillis() > termination.until.toMillis()) break

      const weekday = day.weekday
      if (isWeekday(weekday) && this.weekdays.has(weekday)) {
        occurrences.push(this.occurrenceOn(day))
      }
      day = day.plus({ days: 1 })
    }

    return occurrences
  }

  /**
   * Occurrences whose date falls within [from, to] (inclusive).
   */
  occurrencesBetween(from: LocalDate, to: LocalDate): CalendarEvent[] {
    const first = toDate(from).toMillis()
    const last = toDate(to).toMillis()
    if (first > last) {
      throw new InvalidEventError('Start date cannot be after end date')
    }
    return this.expandOccurrences().filter((occurrence) => {
      const day = toDate(occurrence.start).toMillis()
      return day >= first && day <= last
    })
  }

  private occurrenceOn(day: LocalDate): CalendarEvent {
    const base = {
      id: `${this.id}:${formatDate(day)}`,
      seriesId: this.id,
      subject: this.subject,
      description: this.description,
      location: this.location,
      isPublic: this.isPublic,
    }

    if (this.allDay) {
      return new CalendarEvent({
        ...base,
        start: startOfDay(day),
        end: endOfDay(day),
        allDay: true,
        date: day,
      })
    }

    const start = atTime(day, timeOf(this.start))
    return new CalendarEvent({
      ...base,
      start,
      end: start.plus({ milliseconds: this.end.toMillis() - this.start.toMillis() }),
    })
  }
}

/**
 * Builder for RecurringEvent. Exactly one of `occurrences` or `until` must be
 * set before `build()`.
 */
export class RecurringEventBuilder {
  private readonly subject: string
  private readonly start: LocalDateTime
  private readonly end: LocalDateTime
  private readonly weekdays: ReadonlySet<Weekday>

  private details: Required<EventDetails> = { description: '', location: '', isPublic: true }
  private allDayFlag = false
  private count: number | null = null
  private untilDate: LocalDate | null = null
  private id: string | null = null

  constructor(
    subject: string,
    start: LocalDateTime,
    end: LocalDateTime,
    weekdays: Iterable<Weekday>,
  ) {
    this.subject = subject
    this.start = start
    this.end = end
    this.weekdays = new Set(weekdays)
  }

  description(description: string): this {
    this.details.description = description
    return this
  }

  location(location: string): this {
    this.details.location = location
    return this
  }

  isPublic(isPublic: boolean): this {
    this.details.isPublic = isPublic
    return this
  }

  allDay(allDay: boolean): this {
    this.allDayFlag = allDay
    return this
  }

  occurrences(count: number): this {
    this.count = count
    return this
  }

  until(date: LocalDate): this {
    this.untilDate = toDate(date)
    return this
  }

  seriesId(id: string): this {
    this.id = id
    return this
  }

  build(): RecurringEvent {
    const termination = this.validate()
    const start = this.allDayFlag ? startOfDay(this.start) : this.start
    const end = this.allDayFlag ? endOfDay(this.start) : this.end

    return new RecurringEvent({
      ...this.details,
      id: this.id ?? randomUUID(),
      subject: this.subject,
      start,
      end,
      allDay: this.allDayFlag,
      weekdays: this.weekdays,
      termination,
    })
  }

  private validate(): Termination {
    if (!this.subject || !this.subject.trim()) {
      throw new InvalidEventError('Event subject cannot be empty')
    }
    if (!this.start.isValid || (!this.allDayFlag && !this.end.isValid)) {
      throw new InvalidEventError('Recurring event start and end must be valid date-times')
    }
    if (!this.allDayFlag && this.end.toMillis() < this.start.toMillis()) {
      throw new InvalidEventError('End date/time must not be before start date/time')
    }
    if (this.weekdays.size === 0) {
      throw new InvalidEventError('Repeat days cannot be empty')
    }

    if (this.count !== null && this.untilDate !== null) {
      throw new InvalidEventError('Cannot specify both an occurrence count and an until date')
    }
    if (this.count !== null) {
      if (!Number.isInteger(this.count) || this.count < 1) {
        throw new InvalidEventError('Occurrence count must be a positive integer')
      }
      return { kind: 'count', count: this.count }
    }
    if (this.untilDate !== null) {
      const first = firstMatchingDate(toDate(this.start), this.weekdays)
      if (first.toMillis() > this.untilDate.toMillis()) {
        throw new InvalidEventError(
          `Until date ${formatDate(this.untilDate)} is before the first occurrence on ${formatDate(first)}`,
        )
      }
      return { kind: 'until', until: this.untilDate }
    }
    throw new InvalidEventError('Must specify either an occurrence count or an until date')
  }
}

/** First date on or after `from` whose weekday is in the set (within a week) */
function firstMatchingDate(from: LocalDate, weekdays: ReadonlySet<Weekday>): LocalDate {
  let day = from
  for (let i = 0; i < 7; i++) {
    const weekday = day.weekday
    if (isWeekday(weekday) && weekdays.has(weekday)) return day
    day = day.plus({ days: 1 })
  }
  return from
}

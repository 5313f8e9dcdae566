/**
 * Calendar Event
 *
 * The atomic schedulable unit: a named interval (or all-day date) with
 * descriptive metadata. Instants are naive date-times; factory-built events
 * carry local wall-clock times until a Calendar normalizes them to UTC.
 */

import { randomUUID } from 'node:crypto'
import { InvalidEventError } from '../errors.js'
import {
  endOfDay,
  formatDate,
  formatDateTime,
  sameDate,
  startOfDay,
  toDate,
  type LocalDate,
  type LocalDateTime,
} from '../utils/datetime.js'
import type { EventDetails, EventSnapshot } from './types.js'

export interface CalendarEventInit extends EventDetails {
  /** Defaults to a fresh UUID */
  id?: string
  /** Owning recurring series, for occurrences */
  seriesId?: string | null
  subject: string
  start: LocalDateTime
  end: LocalDateTime
  allDay?: boolean
  /** Plain (local) date of an all-day event */
  date?: LocalDate | null
}

export class CalendarEvent {
  readonly id: string
  readonly seriesId: string | null

  private _subject: string
  private _start: LocalDateTime
  private _end: LocalDateTime
  private _description: string
  private _location: string
  private _isPublic: boolean
  private _allDay: boolean
  private _date: LocalDate | null

  constructor(init: CalendarEventInit) {
    validateSubject(init.subject)
    validateInterval(init.start, init.end)

    this.id = init.id ?? randomUUID()
    this.seriesId = init.seriesId ?? null
    this._subject = init.subject
    this._start = init.start
    this._end = init.end
    this._description = init.description ?? ''
    this._location = init.location ?? ''
    this._isPublic = init.isPublic ?? true
    this._allDay = init.allDay ?? false
    this._date = this._allDay ? (init.date ?? toDate(init.start)) : null
  }

  // ─── Accessors ───

  get subject(): string {
    return this._subject
  }

  get start(): LocalDateTime {
    return this._start
  }

  get end(): LocalDateTime {
    return this._end
  }

  get description(): string {
    return this._description
  }

  get location(): string {
    return this._location
  }

  get isPublic(): boolean {
    return this._isPublic
  }

  get allDay(): boolean {
    return this._allDay
  }

  get date(): LocalDate | null {
    return this._date
  }

  get isRecurring(): boolean {
    return this.seriesId !== null
  }

  // ─── Mutation ───

  setSubject(subject: string): void {
    validateSubject(subject)
    this._subject = subject
  }

  setDescription(description: string): void {
    this._description = description
  }

  setLocation(location: string): void {
    this._location = location
  }

  setPublic(isPublic: boolean): void {
    this._isPublic = isPublic
  }

  /**
   * Replace both bounds at once. An all-day event given explicit times
   * becomes a timed event.
   */
  setTimes(start: LocalDateTime, end: LocalDateTime): void {
    validateInterval(start, end)
    this._start = start
    this._end = end
    this._allDay = false
    this._date = null
  }

  setStart(start: LocalDateTime): void {
    this.setTimes(start, this._end)
  }

  setEnd(end: LocalDateTime): void {
    this.setTimes(this._start, end)
  }

  // ─── Queries ───

  /**
   * Two events conflict iff their closed intervals intersect:
   * start1 <= end2 && start2 <= end1.
   */
  conflictsWith(other: CalendarEvent): boolean {
    return (
      this._start.toMillis() <= other._end.toMillis() &&
      other._start.toMillis() <= this._end.toMillis()
    )
  }

  /** True when `instant` lies within [start, end] */
  covers(instant: LocalDateTime): boolean {
    const t = instant.toMillis()
    return this._start.toMillis() <= t && t <= this._end.toMillis()
  }

  spansMultipleDays(): boolean {
    return !sameDate(this._start, this._end)
  }

  durationMillis(): number {
    return this._end.toMillis() - this._start.toMillis()
  }

  // ─── Copies ───

  /**
   * Same identity and metadata with different instants. Used to move an
   * event between local and UTC representations.
   */
  withTimes(start: LocalDateTime, end: LocalDateTime): CalendarEvent {
    return new CalendarEvent({
      ...this.details(),
      id: this.id,
      seriesId: this.seriesId,
      subject: this._subject,
      start,
      end,
      allDay: this._allDay,
      date: this._date,
    })
  }

  /**
   * A new, independent event (fresh id, no series) with the given bounds.
   */
  duplicate(start: LocalDateTime, end: LocalDateTime, allDayDate?: LocalDate): CalendarEvent {
    return new CalendarEvent({
      ...this.details(),
      subject: this._subject,
      start,
      end,
      allDay: allDayDate !== undefined,
      date: allDayDate ?? null,
    })
  }

  details(): Required<EventDetails> {
    return {
      description: this._description,
      location: this._location,
      isPublic: this._isPublic,
    }
  }

  snapshot(): EventSnapshot {
    return {
      id: this.id,
      seriesId: this.seriesId,
      subject: this._subject,
      start: formatDateTime(this._start),
      end: formatDateTime(this._end),
      allDay: this._allDay,
      date: this._date ? formatDate(this._date) : null,
      description: this._description,
      location: this._location,
      isPublic: this._isPublic,
    }
  }

  toString(): string {
    const when = this._allDay && this._date
      ? `${formatDate(this._date)} (all day)`
      : `${formatDateTime(this._start)} - ${formatDateTime(this._end)}`
    return `${this._subject} @ ${when}`
  }
}

// ─── Factories ───

export function createTimedEvent(
  subject: string,
  start: LocalDateTime,
  end: LocalDateTime,
  details: EventDetails = {},
): CalendarEvent {
  return new CalendarEvent({ ...details, subject, start, end })
}

/**
 * All-day event spanning date@00:00:00 to date@23:59:59.
 */
export function createAllDayEvent(
  subject: string,
  date: LocalDate,
  details: EventDetails = {},
): CalendarEvent {
  const day = toDate(date)
  return new CalendarEvent({
    ...details,
    subject,
    start: startOfDay(day),
    end: endOfDay(day),
    allDay: true,
    date: day,
  })
}

// ─── Validation ───

function validateSubject(subject: string): void {
  if (!subject || !subject.trim()) {
    throw new InvalidEventError('Event subject cannot be empty')
  }
}

function validateInterval(start: LocalDateTime, end: LocalDateTime): void {
  if (!start.isValid || !end.isValid) {
    throw new InvalidEventError('Event start and end must be valid date-times')
  }
  if (end.toMillis() < start.toMillis()) {
    throw new InvalidEventError('End date/time must not be before start date/time')
  }
}

/**
 * Calendar
 *
 * Aggregate owning the events and recurring series of one named,
 * timezone-tagged calendar. Callers speak in the calendar's local wall-clock
 * time; events are stored as UTC and converted on the way in and out.
 *
 * Insertion is conflict-checked against every stored event. Queries and bulk
 * edits are linear scans over the stored collection.
 */

import {
  ConflictingEventError,
  EventNotFoundError,
  InvalidEventError,
  InvalidTimezoneError,
  isCalendarError,
} from '../errors.js'
import { CalendarEvent, createAllDayEvent, createTimedEvent } from '../events/event.js'
import { applyPropertyUpdate } from '../events/property-updater.js'
import { RecurringEvent, RecurringEventBuilder } from '../events/recurring.js'
import { parseWeekdays, type Weekday } from '../events/weekdays.js'
import type { EventDetails } from '../events/types.js'
import { CsvExporter } from '../export/csv.js'
import type { EventExporter, EventImporter, ImportSummary } from '../export/types.js'
import { convertFromUTC, convertToUTC, isValidTimezone } from '../timezone/normalizer.js'
import { toDate, type LocalDate, type LocalDateTime } from '../utils/datetime.js'
import type { EventUpdate, RecurringEventInput } from './types.js'

export interface CalendarOptions {
  /** Used by exportToCSV/importFromCSV. Defaults to CsvExporter. */
  csv?: EventExporter & EventImporter
}

export class Calendar {
  private _name: string
  private _timezone: string
  private events: CalendarEvent[] = []
  private recurringEvents: RecurringEvent[] = []
  private eventsById: Map<string, CalendarEvent> = new Map()
  private recurringById: Map<string, RecurringEvent> = new Map()
  private csv: EventExporter & EventImporter

  constructor(name: string, timezone: string, options: CalendarOptions = {}) {
    if (!isValidTimezone(timezone)) {
      throw new InvalidTimezoneError(timezone)
    }
    this._name = name
    this._timezone = timezone
    this.csv = options.csv ?? new CsvExporter()
  }

  get name(): string {
    return this._name
  }

  get timezone(): string {
    return this._timezone
  }

  /** Registry bookkeeping lives in CalendarManager.renameCalendar */
  rename(name: string): void {
    this._name = name
  }

  // ─── Insertion ───

  /**
   * Insert an event given in local time.
   *
   * @returns true when inserted, false on conflict without auto-decline
   * @throws ConflictingEventError on conflict with auto-decline
   */
  addEvent(event: CalendarEvent, autoDecline: boolean): boolean {
    const stored = this.toStored(event)

    if (this.findConflict(stored)) {
      if (autoDecline) {
        throw new ConflictingEventError(
          `Event '${event.subject}' conflicts with an existing event`,
        )
      }
      return false
    }

    this.insert(stored)
    return true
  }

  /**
   * Insert a recurring series and all of its occurrences, or nothing.
   *
   * @throws InvalidEventError when occurrences of the series overlap each other
   * @throws ConflictingEventError on conflict with auto-decline
   */
  addRecurringEvent(recurring: RecurringEvent, autoDecline: boolean): boolean {
    if (this.recurringById.has(recurring.id)) {
      throw new InvalidEventError(`Recurring event '${recurring.subject}' is already in this calendar`)
    }

    const occurrences = recurring.expandOccurrences().map((occurrence) => this.toStored(occurrence))

    for (let i = 1; i < occurrences.length; i++) {
      if (occurrences[i - 1].conflictsWith(occurrences[i])) {
        throw new InvalidEventError(
          `Occurrences of recurring event '${recurring.subject}' overlap each other`,
        )
      }
    }

    for (const occurrence of occurrences) {
      if (this.findConflict(occurrence)) {
        if (autoDecline) {
          throw new ConflictingEventError(
            `Cannot add recurring event '${recurring.subject}' due to conflict with an existing event`,
          )
        }
        return false
      }
    }

    this.recurringEvents.push(recurring)
    this.recurringById.set(recurring.id, recurring)
    for (const occurrence of occurrences) {
      this.insert(occurrence)
    }
    return true
  }

  createEvent(
    subject: string,
    start: LocalDateTime,
    end: LocalDateTime,
    details: EventDetails = {},
    autoDecline = false,
  ): boolean {
    return this.addEvent(createTimedEvent(subject, start, end, details), autoDecline)
  }

  createAllDayEvent(
    subject: string,
    date: LocalDate,
    details: EventDetails = {},
    autoDecline = false,
  ): boolean {
    return this.addEvent(createAllDayEvent(subject, date, details), autoDecline)
  }

  createRecurringEvent(input: RecurringEventInput, autoDecline = false): boolean {
    const weekdays: Iterable<Weekday> =
      typeof input.weekdays === 'string' ? parseWeekdays(input.weekdays) : input.weekdays
    const allDay = input.allDay ?? false
    const end = input.end ?? input.start

    const builder = new RecurringEventBuilder(input.subject, input.start, end, weekdays)
      .description(input.description ?? '')
      .location(input.location ?? '')
      .isPublic(input.isPublic ?? true)
      .allDay(allDay)

    if (input.termination.kind === 'count') {
      builder.occurrences(input.termination.count)
    } else {
      builder.until(input.termination.until)
    }

    return this.addRecurringEvent(builder.build(), autoDecline)
  }

  // ─── Lookup ───

  /**
   * Exact subject and local start match. When several stored events share
   * both, the earliest inserted wins; see findEvents.
   */
  findEvent(subject: string, start: LocalDateTime): CalendarEvent | null {
    return this.findEvents(subject, start)[0] ?? null
  }

  findEvents(subject: string, start: LocalDateTime): CalendarEvent[] {
    const utcStart = convertToUTC(start, this._timezone).toMillis()
    return this.events.filter(
      (event) => event.subject === subject && event.start.toMillis() === utcStart,
    )
  }

  getEventById(id: string): CalendarEvent | null {
    return this.eventsById.get(id) ?? null
  }

  getRecurringEventById(id: string): RecurringEvent | null {
    return this.recurringById.get(id) ?? null
  }

  /** Stored events (UTC), in insertion order */
  getAllEvents(): CalendarEvent[] {
    return [...this.events]
  }

  getAllRecurringEvents(): RecurringEvent[] {
    return [...this.recurringEvents]
  }

  getSeriesEvents(seriesId: string): CalendarEvent[] {
    return this.events.filter((event) => event.seriesId === seriesId)
  }

  // ─── Editing ───

  /**
   * Edit one event found by subject and local start. When `end` is given the
   * event's local end must match as well.
   *
   * @returns false when no event matches or the update is rejected
   */
  editSingleEvent(
    subject: string,
    start: LocalDateTime,
    property: string,
    value: string,
    end?: LocalDateTime,
  ): boolean {
    const utcEnd = end ? convertToUTC(end, this._timezone).toMillis() : null
    const event = this.findEvents(subject, start).find(
      (candidate) => utcEnd === null || candidate.end.toMillis() === utcEnd,
    )
    if (!event) {
      return false
    }
    return this.updateEventProperty(event, property, value)
  }

  /**
   * Replace the bounds (local time) and optionally the subject and details of
   * the event with `id`. The event keeps its id and series. On conflict with
   * any other stored event the original is left in place.
   *
   * @returns The stored (UTC) replacement
   * @throws EventNotFoundError when no event has `id`
   * @throws ConflictingEventError when the new bounds overlap another event
   */
  updateEvent(id: string, start: LocalDateTime, end: LocalDateTime, update: EventUpdate = {}): CalendarEvent {
    const existing = this.eventsById.get(id)
    if (!existing) {
      throw new EventNotFoundError(`Event not found: ${id}`)
    }

    const replacement = this.toStored(
      new CalendarEvent({
        id: existing.id,
        seriesId: existing.seriesId,
        subject: update.subject ?? existing.subject,
        start,
        end,
        description: update.description ?? existing.description,
        location: update.location ?? existing.location,
        isPublic: update.isPublic ?? existing.isPublic,
      }),
    )

    const conflict = this.events.find(
      (other) => other.id !== id && replacement.conflictsWith(other),
    )
    if (conflict) {
      throw new ConflictingEventError(
        `Updated event '${replacement.subject}' conflicts with '${conflict.subject}'`,
      )
    }

    this.events = this.events.map((event) => (event.id === id ? replacement : event))
    this.eventsById.set(id, replacement)
    return replacement
  }

  /**
   * Update every event with `subject` starting at or after `start`.
   *
   * @returns Number of events updated
   */
  editEventsFromDate(subject: string, start: LocalDateTime, property: string, value: string): number {
    const from = convertToUTC(start, this._timezone).toMillis()
    const matching = this.events.filter(
      (event) => event.subject === subject && event.start.toMillis() >= from,
    )
    return this.updateAll(matching, property, value)
  }

  /**
   * @returns Number of events updated
   */
  editAllEvents(subject: string, property: string, value: string): number {
    const matching = this.events.filter((event) => event.subject === subject)
    return this.updateAll(matching, property, value)
  }

  /**
   * Update every occurrence of a series, optionally only those starting at
   * or after a local date-time.
   */
  editSeries(seriesId: string, property: string, value: string, from?: LocalDateTime): number {
    const threshold = from ? convertToUTC(from, this._timezone).toMillis() : Number.NEGATIVE_INFINITY
    const matching = this.events.filter(
      (event) => event.seriesId === seriesId && event.start.toMillis() >= threshold,
    )
    return this.updateAll(matching, property, value)
  }

  private updateAll(events: CalendarEvent[], property: string, value: string): number {
    let count = 0
    for (const event of events) {
      if (this.updateEventProperty(event, property, value)) {
        count++
      }
    }
    return count
  }

  private updateEventProperty(event: CalendarEvent, property: string, value: string): boolean {
    try {
      applyPropertyUpdate(event, property, value, this._timezone)
      return true
    } catch (err) {
      if (err instanceof InvalidEventError) {
        return false
      }
      throw err
    }
  }

  // ─── Queries ───

  /**
   * Events touching a local date, ordered by start.
   */
  getEventsOnDate(date: LocalDate): CalendarEvent[] {
    return this.getEventsInRange(date, date)
  }

  /**
   * Events touching any local date in [from, to], ordered by start.
   * All-day events match on their date; timed events when their local
   * interval overlaps the range.
   */
  getEventsInRange(from: LocalDate, to: LocalDate): CalendarEvent[] {
    const first = toDate(from).toMillis()
    const last = toDate(to).toMillis()
    if (first > last) {
      throw new InvalidEventError('Start date cannot be after end date')
    }

    return this.events
      .filter((event) => {
        const [startDay, endDay] = this.localDays(event)
        return startDay <= last && endDay >= first
      })
      .sort(byStart)
  }

  /**
   * Events whose interval overlaps the local date-time range [from, to]
   * (inclusive), ordered by start.
   */
  getEventsBetween(from: LocalDateTime, to: LocalDateTime): CalendarEvent[] {
    if (from.toMillis() > to.toMillis()) {
      throw new InvalidEventError('Start date/time cannot be after end date/time')
    }
    const first = convertToUTC(from, this._timezone).toMillis()
    const last = convertToUTC(to, this._timezone).toMillis()
    return this.events
      .filter((event) => event.start.toMillis() <= last && first <= event.end.toMillis())
      .sort(byStart)
  }

  /**
   * True when a local date-time falls within any stored event (inclusive).
   */
  isBusy(at: LocalDateTime): boolean {
    const utc = convertToUTC(at, this._timezone)
    return this.events.some((event) => event.covers(utc))
  }

  /**
   * The event with its instants expressed in this calendar's local time.
   */
  toLocal(event: CalendarEvent): CalendarEvent {
    return event.withTimes(
      convertFromUTC(event.start, this._timezone),
      convertFromUTC(event.end, this._timezone),
    )
  }

  // ─── Timezone ───

  /**
   * Retag the calendar with a new zone. Stored instants are rewritten so each
   * event keeps its local wall-clock time (all-day events keep their date).
   */
  setTimezone(timezone: string): void {
    if (!isValidTimezone(timezone)) {
      throw new InvalidTimezoneError(timezone)
    }
    if (timezone === this._timezone) {
      return
    }

    const previous = this._timezone
    this.events = this.events.map((event) =>
      event.withTimes(
        convertToUTC(convertFromUTC(event.start, previous), timezone),
        convertToUTC(convertFromUTC(event.end, previous), timezone),
      ),
    )
    this.eventsById = new Map(this.events.map((event) => [event.id, event]))
    this._timezone = timezone
  }

  // ─── Export / import ───

  async exportData(filePath: string, exporter: EventExporter): Promise<string> {
    if (!filePath.trim()) {
      throw new Error('File path cannot be empty')
    }
    return exporter.export(filePath, this.getAllEvents(), this._timezone)
  }

  async exportToCSV(filePath: string): Promise<string> {
    return this.exportData(filePath, this.csv)
  }

  /**
   * Add events read from a CSV file. Conflicting rows are skipped and counted.
   */
  async importFromCSV(filePath: string, autoDecline = false): Promise<ImportSummary> {
    const imported = await this.csv.importEvents(filePath)
    const summary: ImportSummary = { imported: 0, skipped: 0, total: imported.length }

    for (const event of imported) {
      let added = false
      try {
        added = this.addEvent(event, autoDecline)
      } catch (err) {
        if (!isCalendarError(err) || err.kind !== 'ConflictingEvent') throw err
      }
      if (added) summary.imported++
      else summary.skipped++
    }

    return summary
  }

  toString(): string {
    return this._name
  }

  // ─── Internals ───

  private toStored(event: CalendarEvent): CalendarEvent {
    return event.withTimes(
      convertToUTC(event.start, this._timezone),
      convertToUTC(event.end, this._timezone),
    )
  }

  private insert(event: CalendarEvent): void {
    this.events.push(event)
    this.eventsById.set(event.id, event)
  }

  private findConflict(candidate: CalendarEvent): CalendarEvent | undefined {
    return this.events.find((existing) => candidate.conflictsWith(existing))
  }

  /** [first, last] local day of an event, as epoch millis of midnight */
  private localDays(event: CalendarEvent): [number, number] {
    if (event.allDay && event.date) {
      const day = event.date.toMillis()
      return [day, day]
    }
    return [
      toDate(convertFromUTC(event.start, this._timezone)).toMillis(),
      toDate(convertFromUTC(event.end, this._timezone)).toMillis(),
    ]
  }
}

function byStart(a: CalendarEvent, b: CalendarEvent): number {
  return a.start.toMillis() - b.start.toMillis()
}

/**
 * Calendar Manager
 *
 * Registry of named calendars with a single "active" pointer. Owns name
 * validation (character set, length, uniqueness within this registry) and
 * routes operations on non-active calendars through executeOnCalendar.
 */

import { CalendarNotFoundError, InvalidTimezoneError } from '../errors.js'
import { isValidTimezone } from '../timezone/normalizer.js'
import { Calendar, type CalendarOptions } from './calendar.js'
import { CalendarNameValidator } from './name-validator.js'
import type { CalendarOperation } from './types.js'

export const DEFAULT_TIMEZONE = 'America/New_York'

export interface CalendarManagerOptions extends CalendarOptions {
  /** Zone for createCalendarWithDefaultTimezone (default: America/New_York) */
  defaultTimezone?: string
}

export class CalendarManager {
  private calendars: Map<string, Calendar> = new Map()
  private activeName: string | null = null
  private readonly nameValidator: CalendarNameValidator
  private readonly defaultTimezone: string
  private readonly calendarOptions: CalendarOptions

  constructor(options: CalendarManagerOptions = {}) {
    const { defaultTimezone, ...calendarOptions } = options
    this.defaultTimezone = defaultTimezone ?? DEFAULT_TIMEZONE
    if (!isValidTimezone(this.defaultTimezone)) {
      throw new InvalidTimezoneError(this.defaultTimezone)
    }
    this.calendarOptions = calendarOptions
    this.nameValidator = new CalendarNameValidator((name) => this.calendars.has(name))
  }

  // ─── Creation ───

  /**
   * Register a new calendar. The first calendar registered becomes active.
   *
   * @throws InvalidTimezoneError, InvalidCalendarNameError, DuplicateCalendarError
   */
  createCalendar(name: string, timezone: string): Calendar {
    if (!isValidTimezone(timezone)) {
      throw new InvalidTimezoneError(timezone)
    }
    const validName = this.nameValidator.validate(name)

    const calendar = new Calendar(validName, timezone, this.calendarOptions)
    this.calendars.set(validName, calendar)
    if (this.activeName === null) {
      this.activeName = validName
    }
    return calendar
  }

  createCalendarWithDefaultTimezone(name: string): Calendar {
    return this.createCalendar(name, this.defaultTimezone)
  }

  getDefaultTimezone(): string {
    return this.defaultTimezone
  }

  // ─── Lookup ───

  getCalendar(name: string): Calendar {
    const calendar = this.calendars.get(name)
    if (!calendar) {
      throw new CalendarNotFoundError(`Calendar not found: ${name}`)
    }
    return calendar
  }

  hasCalendar(name: string): boolean {
    return this.calendars.has(name)
  }

  getCalendarNames(): string[] {
    return [...this.calendars.keys()]
  }

  getCalendarCount(): number {
    return this.calendars.size
  }

  // ─── Active calendar ───

  getActiveCalendar(): Calendar {
    if (this.activeName === null) {
      throw new CalendarNotFoundError('No active calendar set')
    }
    return this.getCalendar(this.activeName)
  }

  getActiveCalendarName(): string | null {
    return this.activeName
  }

  setActiveCalendar(name: string): void {
    if (!this.calendars.has(name)) {
      throw new CalendarNotFoundError(`Calendar not found: ${name}`)
    }
    this.activeName = name
  }

  // ─── Operations ───

  /**
   * Run `operation` against the named calendar. Errors the operation throws
   * propagate unchanged.
   */
  executeOnCalendar<T>(name: string, operation: CalendarOperation<T>): T {
    return operation(this.getCalendar(name))
  }

  /**
   * Change a calendar's zone. Events keep their local wall-clock times.
   */
  editCalendarTimezone(name: string, timezone: string): void {
    if (!isValidTimezone(timezone)) {
      throw new InvalidTimezoneError(timezone)
    }
    this.getCalendar(name).setTimezone(timezone)
  }

  /**
   * Re-register a calendar under a new name. The active pointer follows.
   */
  renameCalendar(oldName: string, newName: string): Calendar {
    const calendar = this.getCalendar(oldName)
    const validName = this.nameValidator.validate(newName, oldName)
    if (validName === oldName) {
      return calendar
    }

    this.calendars.delete(oldName)
    this.calendars.set(validName, calendar)
    calendar.rename(validName)

    if (this.activeName === oldName) {
      this.activeName = validName
    }
    return calendar
  }

  /**
   * Drop a calendar. If it was active, the earliest remaining calendar
   * becomes active (or none).
   */
  removeCalendar(name: string): void {
    if (!this.calendars.delete(name)) {
      throw new CalendarNotFoundError(`Calendar not found: ${name}`)
    }

    if (this.activeName === name) {
      const next = this.calendars.keys().next()
      this.activeName = next.done ? null : next.value
    }
  }
}

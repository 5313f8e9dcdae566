/**
 * Calendar Types
 */

import type { EventDetails, Termination } from '../events/types.js'
import type { Weekday } from '../events/weekdays.js'
import type { LocalDateTime } from '../utils/datetime.js'
import type { Calendar } from './calendar.js'

/**
 * Input for Calendar.createRecurringEvent, in the calendar's local time.
 */
export interface RecurringEventInput extends EventDetails {
  subject: string
  /** First occurrence start; for all-day series only the date is used */
  start: LocalDateTime
  /** First occurrence end; omitted for all-day series */
  end?: LocalDateTime
  /** Weekday code string ("MWF") or weekday numbers */
  weekdays: string | Iterable<Weekday>
  termination: Termination
  allDay?: boolean
}

/**
 * Optional replacement fields for Calendar.updateEvent. Omitted fields keep
 * the event's current values.
 */
export interface EventUpdate extends EventDetails {
  subject?: string
}

/**
 * Operation run against a calendar looked up by name.
 */
export type CalendarOperation<T> = (calendar: Calendar) => T

/**
 * Outcome of a cross-calendar copy. Conflicting events are skipped, not fatal.
 */
export interface CopySummary {
  target: string
  copied: number
  skipped: number
  total: number
}

/**
 * Calendar System
 *
 * Named, timezone-tagged calendars, the manager that registers them, and
 * copying between them.
 */

// Types
export type { RecurringEventInput, EventUpdate, CalendarOperation, CopySummary } from './types.js'

// Implementation
export { Calendar } from './calendar.js'
export type { CalendarOptions } from './calendar.js'
export { CalendarManager, DEFAULT_TIMEZONE } from './manager.js'
export type { CalendarManagerOptions } from './manager.js'
export { CalendarNameValidator, MAX_CALENDAR_NAME_LENGTH, stripQuotes } from './name-validator.js'
export { copyEvent, copyEventsOnDate, copyEventsBetween } from './copy.js'
export type { CopyEventOptions, CopyDayOptions, CopyRangeOptions } from './copy.js'

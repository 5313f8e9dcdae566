/**
 * Calendar Errors
 *
 * Typed failures raised by the calendar model. Every error carries a `kind`
 * discriminant so the command layer can render or branch without
 * `instanceof` chains.
 */

export type CalendarErrorKind =
  | 'InvalidEvent'
  | 'ConflictingEvent'
  | 'EventNotFound'
  | 'CalendarNotFound'
  | 'DuplicateCalendar'
  | 'InvalidTimezone'
  | 'InvalidCalendarName'

export class CalendarError extends Error {
  readonly kind: CalendarErrorKind

  constructor(kind: CalendarErrorKind, message: string) {
    super(message)
    this.name = `${kind}Error`
    this.kind = kind
  }
}

/** Malformed event parameters, property values or recurrence bounds */
export class InvalidEventError extends CalendarError {
  constructor(message: string) {
    super('InvalidEvent', message)
  }
}

/** Insertion overlaps an existing event and auto-decline was requested */
export class ConflictingEventError extends CalendarError {
  constructor(message = 'Event conflicts with an existing event') {
    super('ConflictingEvent', message)
  }
}

export class EventNotFoundError extends CalendarError {
  constructor(message: string) {
    super('EventNotFound', message)
  }
}

export class CalendarNotFoundError extends CalendarError {
  constructor(message: string) {
    super('CalendarNotFound', message)
  }
}

export class DuplicateCalendarError extends CalendarError {
  constructor(name: string) {
    super('DuplicateCalendar', `Calendar with name '${name}' already exists`)
  }
}

export class InvalidTimezoneError extends CalendarError {
  constructor(zone: string) {
    super('InvalidTimezone', `Invalid timezone: ${zone}`)
  }
}

export class InvalidCalendarNameError extends CalendarError {
  constructor(message: string) {
    super('InvalidCalendarName', message)
  }
}

export function isCalendarError(err: unknown): err is CalendarError {
  return err instanceof CalendarError
}

/**
 * Render any thrown value as a single-line message.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Command Types
 *
 * One variant per command form. The parser produces these; the executor
 * dispatches on `kind` with an exhaustive switch.
 */

import type { LocalDate, LocalDateTime, Termination } from '@caldesk/core'

export type CalendarProperty = 'name' | 'timezone'

export type EventTiming =
  | { kind: 'timed'; start: LocalDateTime; end: LocalDateTime }
  | { kind: 'allDay'; date: LocalDate }

export interface RepeatRule {
  /** Weekday code string, e.g. "MWF" */
  weekdays: string
  termination: Termination
}

export type Command =
  | { kind: 'createCalendar'; name: string; timezone: string }
  | { kind: 'editCalendar'; name: string; property: CalendarProperty; value: string }
  | { kind: 'useCalendar'; name: string }
  | {
      kind: 'createEvent'
      subject: string
      timing: EventTiming
      repeat: RepeatRule | null
      description: string
      location: string
      isPublic: boolean
      /** null when the command omits --autoDecline (config default applies) */
      autoDecline: boolean | null
    }
  | {
      kind: 'editEvent'
      property: string
      subject: string
      start: LocalDateTime
      /** When given, the event's end must match too */
      end: LocalDateTime | null
      value: string
    }
  | { kind: 'editEventsFrom'; property: string; subject: string; start: LocalDateTime; value: string }
  | { kind: 'editAllEvents'; property: string; subject: string; value: string }
  | { kind: 'printOn'; date: LocalDate }
  | { kind: 'printRange'; from: LocalDate; to: LocalDate }
  | { kind: 'printBetween'; from: LocalDateTime; to: LocalDateTime }
  | { kind: 'showStatus'; at: LocalDateTime }
  | { kind: 'showCalendar' }
  | { kind: 'copyEvent'; subject: string; start: LocalDateTime; target: string; targetStart: LocalDateTime }
  | { kind: 'copyEventsOn'; date: LocalDate; target: string; targetDate: LocalDate }
  | { kind: 'copyEventsBetween'; from: LocalDate; to: LocalDate; target: string; targetStart: LocalDate }
  | { kind: 'exportCalendar'; file: string }
  | { kind: 'importCalendar'; file: string }
  | { kind: 'exit' }

export type CommandKind = Command['kind']

export interface CommandResult {
  output: string
  /** false when the command failed (syntax error or typed model error) */
  ok: boolean
  exit: boolean
}

export class CommandSyntaxError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CommandSyntaxError'
  }
}

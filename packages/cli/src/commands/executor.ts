/**
 * Command Executor
 *
 * Runs parsed commands against a CalendarManager and renders the outcome as
 * a message. Model errors and syntax errors become `Error: <message>` with
 * `ok: false`; a conflict on a create without --autoDecline is reported but
 * is not a failure.
 */

import * as path from 'node:path'
import {
  copyEvent,
  copyEventsBetween,
  copyEventsOnDate,
  errorMessage,
  formatDate,
  formatDateTime,
  type CalendarManager,
  type CopySummary,
} from '@caldesk/core'
import { formatEventList } from './format.js'
import { parseCommand } from './parser.js'
import type { Command, CommandResult } from './types.js'

export interface CommandExecutorOptions {
  /** Used when a create command omits --autoDecline (default: false) */
  autoDecline?: boolean
  /** Base for relative export/import paths (default: cwd) */
  exportDirectory?: string
}

type CreateEventCommand = Extract<Command, { kind: 'createEvent' }>

export class CommandExecutor {
  private readonly manager: CalendarManager
  private readonly autoDecline: boolean
  private readonly exportDirectory: string

  constructor(manager: CalendarManager, options: CommandExecutorOptions = {}) {
    this.manager = manager
    this.autoDecline = options.autoDecline ?? false
    this.exportDirectory = options.exportDirectory ?? '.'
  }

  /**
   * Parse and run one line. Never rejects for command-level failures.
   */
  async execute(line: string): Promise<CommandResult> {
    let command: Command
    try {
      command = parseCommand(line)
    } catch (err) {
      return { output: `Error: ${errorMessage(err)}`, ok: false, exit: false }
    }

    try {
      const output = await this.run(command)
      return { output, ok: true, exit: command.kind === 'exit' }
    } catch (err) {
      return { output: `Error: ${errorMessage(err)}`, ok: false, exit: false }
    }
  }

  async run(command: Command): Promise<string> {
    switch (command.kind) {
      case 'createCalendar': {
        const calendar = this.manager.createCalendar(command.name, command.timezone)
        return `Calendar '${calendar.name}' created successfully with timezone ${calendar.timezone}`
      }

      case 'editCalendar':
        if (command.property === 'timezone') {
          this.manager.editCalendarTimezone(command.name, command.value)
          return `Timezone updated to ${command.value} for calendar '${command.name}'`
        } else {
          const calendar = this.manager.renameCalendar(command.name, command.value)
          return `Calendar name updated from '${command.name}' to '${calendar.name}'`
        }

      case 'useCalendar':
        this.manager.setActiveCalendar(command.name)
        return `Now using calendar: '${command.name}'`

      case 'createEvent':
        return this.createEvent(command)

      case 'editEvent': {
        const edited = this.manager
          .getActiveCalendar()
          .editSingleEvent(
            command.subject,
            command.start,
            command.property,
            command.value,
            command.end ?? undefined,
          )
        return edited
          ? `Successfully edited event '${command.subject}'.`
          : `Failed to edit event '${command.subject}' at ${formatDateTime(command.start)}.`
      }

      case 'editEventsFrom': {
        const count = this.manager
          .getActiveCalendar()
          .editEventsFromDate(command.subject, command.start, command.property, command.value)
        return editedCount(count)
      }

      case 'editAllEvents': {
        const count = this.manager
          .getActiveCalendar()
          .editAllEvents(command.subject, command.property, command.value)
        return editedCount(count)
      }

      case 'printOn': {
        const calendar = this.manager.getActiveCalendar()
        const events = calendar.getEventsOnDate(command.date)
        const day = formatDate(command.date)
        return events.length === 0
          ? `No events on ${day}`
          : formatEventList(calendar, `Events on ${day}:`, events)
      }

      case 'printRange': {
        const calendar = this.manager.getActiveCalendar()
        const events = calendar.getEventsInRange(command.from, command.to)
        const range = `${formatDate(command.from)} to ${formatDate(command.to)}`
        return events.length === 0
          ? `No events from ${range}`
          : formatEventList(calendar, `Events from ${range}:`, events)
      }

      case 'printBetween': {
        const calendar = this.manager.getActiveCalendar()
        const events = calendar.getEventsBetween(command.from, command.to)
        const range = `${formatDateTime(command.from)} to ${formatDateTime(command.to)}`
        return events.length === 0
          ? `No events from ${range}`
          : formatEventList(calendar, `Events from ${range}:`, events)
      }

      case 'showStatus': {
        const busy = this.manager.getActiveCalendar().isBusy(command.at)
        return `Status on ${formatDateTime(command.at)}: ${busy ? 'Busy' : 'Available'}`
      }

      case 'showCalendar':
        return this.describeCalendars()

      case 'copyEvent':
        copyEvent(this.manager, {
          subject: command.subject,
          start: command.start,
          target: command.target,
          targetStart: command.targetStart,
        })
        return `Event '${command.subject}' copied successfully to calendar '${command.target}'.`

      case 'copyEventsOn': {
        const summary = copyEventsOnDate(this.manager, {
          date: command.date,
          target: command.target,
          targetDate: command.targetDate,
        })
        return copySummary(summary, `on ${formatDate(command.date)}`)
      }

      case 'copyEventsBetween': {
        const summary = copyEventsBetween(this.manager, {
          from: command.from,
          to: command.to,
          target: command.target,
          targetStart: command.targetStart,
        })
        return copySummary(summary, `between ${formatDate(command.from)} and ${formatDate(command.to)}`)
      }

      case 'exportCalendar': {
        const written = await this.manager
          .getActiveCalendar()
          .exportToCSV(this.resolveFile(command.file))
        return `Calendar exported successfully to: ${written}`
      }

      case 'importCalendar': {
        const summary = await this.manager
          .getActiveCalendar()
          .importFromCSV(this.resolveFile(command.file), this.autoDecline)
        if (summary.total === 0) return 'No events found in the CSV file'
        return `Imported ${summary.imported} of ${summary.total} events (${summary.skipped} skipped due to conflicts)`
      }

      case 'exit':
        return 'Exiting...'

      default: {
        const unreachable: never = command
        throw new Error(`Unhandled command: ${JSON.stringify(unreachable)}`)
      }
    }
  }

  private createEvent(command: CreateEventCommand): string {
    const calendar = this.manager.getActiveCalendar()
    const autoDecline = command.autoDecline ?? this.autoDecline
    const details = {
      description: command.description,
      location: command.location,
      isPublic: command.isPublic,
    }

    let added: boolean
    if (command.repeat) {
      const { timing } = command
      added = calendar.createRecurringEvent(
        {
          ...details,
          subject: command.subject,
          start: timing.kind === 'timed' ? timing.start : timing.date,
          end: timing.kind === 'timed' ? timing.end : undefined,
          weekdays: command.repeat.weekdays,
          termination: command.repeat.termination,
          allDay: timing.kind === 'allDay',
        },
        autoDecline,
      )
    } else if (command.timing.kind === 'timed') {
      added = calendar.createEvent(
        command.subject,
        command.timing.start,
        command.timing.end,
        details,
        autoDecline,
      )
    } else {
      added = calendar.createAllDayEvent(command.subject, command.timing.date, details, autoDecline)
    }

    if (!added) {
      return `Failed to create event '${command.subject}' due to a conflict with an existing event`
    }
    return command.repeat
      ? `Recurring event '${command.subject}' created successfully`
      : `Event '${command.subject}' created successfully`
  }

  private describeCalendars(): string {
    const active = this.manager.getActiveCalendarName()
    if (active === null) {
      return 'No active calendar'
    }
    const lines = [`Active calendar: ${active}`, 'Available calendars:']
    for (const name of this.manager.getCalendarNames()) {
      const calendar = this.manager.getCalendar(name)
      lines.push(`  ${name} (${calendar.timezone})${name === active ? ' (active)' : ''}`)
    }
    return lines.join('\n')
  }

  private resolveFile(file: string): string {
    return path.resolve(this.exportDirectory, file)
  }
}

function editedCount(count: number): string {
  return count === 0 ? 'No matching events found to edit' : `Successfully edited ${count} events`
}

function copySummary(summary: CopySummary, scope: string): string {
  if (summary.total === 0) {
    return `No events found ${scope} to copy.`
  }
  if (summary.copied === summary.total) {
    return `Successfully copied ${summary.copied} events to calendar '${summary.target}'.`
  }
  if (summary.copied === 0) {
    return `Failed to copy any events to calendar '${summary.target}'.`
  }
  return `Copied ${summary.copied} out of ${summary.total} events to calendar '${summary.target}'.`
}

/**
 * Session bootstrap: a manager with the configured default calendar active,
 * and an executor bound to it.
 */

import { CalendarManager, type AppConfig } from '@caldesk/core'
import { CommandExecutor } from './commands/executor.js'

export interface Session {
  manager: CalendarManager
  executor: CommandExecutor
}

export type SessionConfig = Pick<
  AppConfig,
  'defaultTimezone' | 'defaultCalendar' | 'exportDirectory' | 'autoDecline'
>

export function createSession(config: SessionConfig): Session {
  const manager = new CalendarManager({ defaultTimezone: config.defaultTimezone })
  manager.createCalendarWithDefaultTimezone(config.defaultCalendar)

  const executor = new CommandExecutor(manager, {
    autoDecline: config.autoDecline,
    exportDirectory: config.exportDirectory,
  })
  return { manager, executor }
}

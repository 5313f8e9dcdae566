/**
 * Export/Import Collaborator Types
 */

import type { CalendarEvent } from '../events/event.js'

/**
 * Writes a calendar's events to a file.
 */
export interface EventExporter {
  /**
   * @param filePath - Destination; parent directories are created
   * @param events - Events as a Calendar stores them (UTC)
   * @param timezone - Zone the written dates and times are expressed in
   * @returns The path written
   */
  export(filePath: string, events: readonly CalendarEvent[], timezone: string): Promise<string>
}

/**
 * Reads events back from a file. Returned events carry local wall-clock
 * times, ready for Calendar.addEvent.
 */
export interface EventImporter {
  importEvents(filePath: string): Promise<CalendarEvent[]>
}

export interface ImportSummary {
  imported: number
  skipped: number
  total: number
}

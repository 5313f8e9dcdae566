/**
 * CSV Exporter
 *
 * One schema for both directions:
 *
 *   Subject,Start Date,Start Time,End Date,End Time,All Day,Description,Location,Public
 *
 * Dates are yyyy-MM-dd and times HH:mm, in the calendar's zone. Booleans are
 * `true`/`false`. Fields containing a comma, quote, CR or LF are wrapped in
 * double quotes with embedded quotes doubled. Rows end with "\n".
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { z } from 'zod'
import { InvalidEventError } from '../errors.js'
import { CalendarEvent, createAllDayEvent, createTimedEvent } from '../events/event.js'
import { convertFromUTC } from '../timezone/normalizer.js'
import {
  formatDate,
  formatTime,
  parseDate,
  parseDateTime,
} from '../utils/datetime.js'
import type { EventExporter, EventImporter } from './types.js'

export const CSV_HEADER = [
  'Subject',
  'Start Date',
  'Start Time',
  'End Date',
  'End Time',
  'All Day',
  'Description',
  'Location',
  'Public',
] as const

const BOOLEAN = z.enum(['true', 'false']).transform((value) => value === 'true')

const csvRowSchema = z.object({
  subject: z.string().trim().min(1, 'Subject is required'),
  startDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Start Date must be YYYY-MM-DD'),
  startTime: z.string().regex(/^\d{2}:\d{2}$/, 'Start Time must be HH:MM'),
  endDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'End Date must be YYYY-MM-DD'),
  endTime: z.string().regex(/^\d{2}:\d{2}$/, 'End Time must be HH:MM'),
  allDay: BOOLEAN,
  description: z.string(),
  location: z.string(),
  isPublic: BOOLEAN,
})

export type CsvRow = z.infer<typeof csvRowSchema>

// ─── Field encoding ───

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

/**
 * Split CSV text into records of raw fields. Quoted fields may contain
 * commas, doubled quotes and line breaks.
 */
export function parseCsv(text: string): string[][] {
  const records: string[][] = []
  let record: string[] = []
  let field = ''
  let inQuotes = false
  let i = 0

  while (i < text.length) {
    const char = text[i]

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"'
          i += 2
          continue
        }
        inQuotes = false
      } else {
        field += char
      }
      i++
      continue
    }

    if (char === '"') {
      inQuotes = true
    } else if (char === ',') {
      record.push(field)
      field = ''
    } else if (char === '\n' || char === '\r') {
      record.push(field)
      records.push(record)
      record = []
      field = ''
      if (char === '\r' && text[i + 1] === '\n') i++
    } else {
      field += char
    }
    i++
  }

  if (field !== '' || record.length > 0) {
    record.push(field)
    records.push(record)
  }

  return records
}

// ─── Exporter ───

export class CsvExporter implements EventExporter, EventImporter {
  async export(
    filePath: string,
    events: readonly CalendarEvent[],
    timezone: string,
  ): Promise<string> {
    if (!filePath.trim()) {
      throw new Error('File path cannot be empty')
    }

    await mkdir(dirname(filePath), { recursive: true })
    await writeFile(filePath, this.format(events, timezone), 'utf-8')
    return filePath
  }

  /**
   * Render events (stored UTC) as CSV text in `timezone`, ordered by start.
   */
  format(events: readonly CalendarEvent[], timezone: string): string {
    const sorted = [...events].sort((a, b) => a.start.toMillis() - b.start.toMillis())
    const lines = [CSV_HEADER.join(',')]
    for (const event of sorted) {
      lines.push(this.formatRow(event, timezone))
    }
    return lines.map((line) => `${line}\n`).join('')
  }

  formatRow(event: CalendarEvent, timezone: string): string {
    const start = convertFromUTC(event.start, timezone)
    const end = convertFromUTC(event.end, timezone)
    const startDate = event.allDay && event.date ? event.date : start
    const endDate = event.allDay && event.date ? event.date : end

    return [
      escapeCsvField(event.subject),
      formatDate(startDate),
      event.allDay ? '00:00' : formatTime(start),
      formatDate(endDate),
      event.allDay ? '23:59' : formatTime(end),
      String(event.allDay),
      escapeCsvField(event.description),
      escapeCsvField(event.location),
      String(event.isPublic),
    ].join(',')
  }

  // ─── Importer ───

  async importEvents(filePath: string): Promise<CalendarEvent[]> {
    const text = await readFile(filePath, 'utf-8')
    return this.parse(text, filePath)
  }

  /**
   * Parse CSV text into events with local wall-clock times.
   */
  parse(text: string, source = 'CSV input'): CalendarEvent[] {
    const [header, ...rows] = parseCsv(text)
    if (!header || header.join(',') !== CSV_HEADER.join(',')) {
      throw new Error(`Invalid CSV format in ${source}: unexpected header`)
    }

    return rows
      .filter((fields) => !(fields.length === 1 && fields[0] === ''))
      .map((fields, index) => this.toEvent(fields, index + 2))
  }

  private toEvent(fields: string[], lineNumber: number): CalendarEvent {
    const parsed = csvRowSchema.safeParse({
      subject: fields[0],
      startDate: fields[1],
      startTime: fields[2],
      endDate: fields[3],
      endTime: fields[4],
      allDay: fields[5],
      description: fields[6] ?? '',
      location: fields[7] ?? '',
      isPublic: fields[8],
    })

    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const detail = issue ? `${issue.path.join('.')}: ${issue.message}` : 'malformed row'
      throw new InvalidEventError(`Invalid CSV row ${lineNumber}: ${detail}`)
    }

    const row = parsed.data
    const details = {
      description: row.description,
      location: row.location,
      isPublic: row.isPublic,
    }

    if (row.allDay) {
      return createAllDayEvent(row.subject, parseDate(row.startDate), details)
    }
    return createTimedEvent(
      row.subject,
      parseDateTime(`${row.startDate}T${row.startTime}`),
      parseDateTime(`${row.endDate}T${row.endTime}`),
      details,
    )
  }
}

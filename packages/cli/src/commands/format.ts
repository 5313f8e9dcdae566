/**
 * Event display lines, in a calendar's local time.
 */

import { formatDate, formatTime, type Calendar, type CalendarEvent } from '@caldesk/core'

export function formatEventLine(calendar: Calendar, event: CalendarEvent): string {
  const local = calendar.toLocal(event)

  let when: string
  if (local.allDay && local.date) {
    when = `${formatDate(local.date)} (all day)`
  } else {
    when = `${formatDate(local.start)} ${formatTime(local.start)} to ${formatDate(local.end)} ${formatTime(local.end)}`
  }

  let line = `- ${local.subject}: ${when}`
  if (local.location) line += ` at ${local.location}`
  if (!local.isPublic) line += ' [private]'
  return line
}

export function formatEventList(calendar: Calendar, heading: string, events: CalendarEvent[]): string {
  return [heading, ...events.map((event) => formatEventLine(calendar, event))].join('\n')
}

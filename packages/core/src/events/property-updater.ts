/**
 * Event Property Updater
 *
 * Resolves a user-supplied property name to an EventProperty and applies a
 * string value to an event. Time values are interpreted in the owning
 * calendar's zone, while the event itself stores UTC.
 */

import { InvalidEventError } from '../errors.js'
import { convertFromUTC, convertToUTC } from '../timezone/normalizer.js'
import { atTime, parseDateTime, parseTime, toDate, type LocalDateTime } from '../utils/datetime.js'
import type { CalendarEvent } from './event.js'
import type { EventProperty } from './types.js'

const PROPERTY_ALIASES = new Map<string, EventProperty>([
  ['subject', 'subject'],
  ['name', 'subject'],
  ['description', 'description'],
  ['location', 'location'],
  ['start', 'start'],
  ['starttime', 'start'],
  ['startdatetime', 'start'],
  ['end', 'end'],
  ['endtime', 'end'],
  ['enddatetime', 'end'],
  ['visibility', 'visibility'],
  ['ispublic', 'visibility'],
  ['public', 'visibility'],
  ['private', 'private'],
])

export function resolveProperty(name: string): EventProperty | null {
  return PROPERTY_ALIASES.get(name.trim().toLowerCase()) ?? null
}

/**
 * Apply `value` to `property` of an event stored in UTC, reading times as
 * wall clock in `zone`. Throws InvalidEventError for unknown properties or
 * unusable values; the event is left untouched in that case.
 */
export function applyPropertyUpdate(
  event: CalendarEvent,
  property: string,
  value: string,
  zone: string,
): void {
  const resolved = resolveProperty(property)
  if (!resolved) {
    throw new InvalidEventError(`Unknown event property: ${property}`)
  }

  switch (resolved) {
    case 'subject':
      event.setSubject(value)
      return
    case 'description':
      event.setDescription(value)
      return
    case 'location':
      event.setLocation(value)
      return
    case 'start': {
      const localStart = convertFromUTC(event.start, zone)
      event.setStart(convertToUTC(parseTimeValue(value, localStart), zone))
      return
    }
    case 'end': {
      const localEnd = convertFromUTC(event.end, zone)
      event.setEnd(convertToUTC(parseTimeValue(value, localEnd), zone))
      return
    }
    case 'visibility':
      event.setPublic(isOneOf(value, 'public', 'true'))
      return
    case 'private':
      event.setPublic(!isOneOf(value, 'private', 'true'))
      return
    default: {
      const unreachable: never = resolved
      throw new InvalidEventError(`Unhandled event property: ${String(unreachable)}`)
    }
  }
}

/**
 * A full date-time, or a bare time-of-day applied to `current`'s date.
 */
function parseTimeValue(value: string, current: LocalDateTime): LocalDateTime {
  if (value.includes('T')) {
    return parseDateTime(value)
  }
  return atTime(toDate(current), parseTime(value))
}

function isOneOf(value: string, ...accepted: string[]): boolean {
  const normalized = value.trim().toLowerCase()
  return accepted.includes(normalized)
}

/**
 * Time Normalizer
 *
 * Single source of truth for timezone validity and conversion. Calendars
 * store every instant as a naive UTC wall clock; these functions move values
 * between that canonical form and a zone's local wall clock.
 *
 * @module timezone/normalizer
 */

import { IANAZone } from 'luxon'
import { InvalidTimezoneError } from '../errors.js'
import type { LocalDateTime } from '../utils/datetime.js'

/** Maps a wall clock in one zone to the same instant's wall clock in another */
export type TimezoneConverter = (value: LocalDateTime) => LocalDateTime

export const UTC_ZONE = 'UTC'

export function isValidTimezone(zone: string): boolean {
  if (!zone || !zone.trim()) return false
  return IANAZone.isValidZone(zone)
}

function requireZone(zone: string): void {
  if (!isValidTimezone(zone)) {
    throw new InvalidTimezoneError(zone)
  }
}

/**
 * Interpret `local` as wall-clock time in `zone`; return the UTC wall clock.
 */
export function convertToUTC(local: LocalDateTime, zone: string): LocalDateTime {
  requireZone(zone)
  return local
    .setZone(zone, { keepLocalTime: true })
    .setZone('utc')
}

/**
 * Interpret `utc` as a UTC wall clock; return the wall clock in `zone`.
 */
export function convertFromUTC(utc: LocalDateTime, zone: string): LocalDateTime {
  requireZone(zone)
  return utc
    .setZone('utc', { keepLocalTime: true })
    .setZone(zone)
    .setZone('utc', { keepLocalTime: true })
}

/**
 * Compose a converter from `fromZone` local time to `toZone` local time.
 * Both zones are validated up front, not on first use.
 */
export function buildConverter(fromZone: string, toZone: string): TimezoneConverter {
  requireZone(fromZone)
  requireZone(toZone)
  return (value) => convertFromUTC(convertToUTC(value, fromZone), toZone)
}

export function listTimezones(): string[] {
  return Intl.supportedValuesOf('timeZone')
}

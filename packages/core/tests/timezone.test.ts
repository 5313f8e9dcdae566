import { describe, it, expect } from 'vitest'

import {
  buildConverter,
  convertFromUTC,
  convertToUTC,
  isValidTimezone,
  listTimezones,
} from '../src/timezone/index.js'
import { InvalidTimezoneError } from '../src/errors.js'
import { formatDateTime, localDateTime } from '../src/utils/datetime.js'

describe('isValidTimezone', () => {
  it('accepts IANA zone ids', () => {
    expect(isValidTimezone('America/New_York')).toBe(true)
    expect(isValidTimezone('Asia/Kolkata')).toBe(true)
    expect(isValidTimezone('UTC')).toBe(true)
  })

  it('rejects unknown and blank ids', () => {
    expect(isValidTimezone('Mars/Olympus_Mons')).toBe(false)
    expect(isValidTimezone('')).toBe(false)
    expect(isValidTimezone('   ')).toBe(false)
  })
})

describe('convertToUTC / convertFromUTC', () => {
  it('converts a daylight-saving wall clock to UTC', () => {
    const utc = convertToUTC(localDateTime(2024, 3, 11, 18, 0), 'America/New_York')
    expect(formatDateTime(utc)).toBe('2024-03-11T22:00')
  })

  it('converts a standard-time wall clock to UTC', () => {
    const utc = convertToUTC(localDateTime(2024, 1, 15, 9, 0), 'America/New_York')
    expect(formatDateTime(utc)).toBe('2024-01-15T14:00')
  })

  it('converts UTC to a zone with a half-hour offset', () => {
    const local = convertFromUTC(localDateTime(2024, 3, 11, 22, 0), 'Asia/Kolkata')
    expect(formatDateTime(local)).toBe('2024-03-12T03:30')
  })

  it('round-trips local -> UTC -> local', () => {
    const local = localDateTime(2024, 7, 4, 12, 45)
    for (const zone of ['America/New_York', 'Europe/Berlin', 'Asia/Kolkata', 'UTC']) {
      const back = convertFromUTC(convertToUTC(local, zone), zone)
      expect(back.toMillis()).toBe(local.toMillis())
    }
  })

  it('throws InvalidTimezoneError for unknown zones', () => {
    expect(() => convertToUTC(localDateTime(2024, 1, 1), 'Nowhere/City')).toThrow(InvalidTimezoneError)
    expect(() => convertFromUTC(localDateTime(2024, 1, 1), '')).toThrow(InvalidTimezoneError)
  })
})

describe('buildConverter', () => {
  it('maps a wall clock between zones', () => {
    const toKolkata = buildConverter('America/New_York', 'Asia/Kolkata')
    expect(formatDateTime(toKolkata(localDateTime(2024, 3, 11, 18, 0)))).toBe('2024-03-12T03:30')
  })

  it('is the identity for the same zone', () => {
    const same = buildConverter('Europe/Berlin', 'Europe/Berlin')
    const value = localDateTime(2024, 5, 1, 8, 30)
    expect(same(value).toMillis()).toBe(value.toMillis())
  })

  it('validates both zones up front', () => {
    expect(() => buildConverter('Bad/Zone', 'UTC')).toThrow(InvalidTimezoneError)
    expect(() => buildConverter('UTC', 'Bad/Zone')).toThrow(InvalidTimezoneError)
  })
})

describe('listTimezones', () => {
  it('includes common zones', () => {
    const zones = listTimezones()
    expect(zones).toContain('America/New_York')
    expect(zones).toContain('Asia/Kolkata')
  })
})

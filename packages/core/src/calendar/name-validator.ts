/**
 * Calendar Name Validator
 *
 * Letters, digits and underscores only, at most 100 characters. Surrounding
 * single or double quotes are stripped first. Uniqueness is checked against
 * the names the owning CalendarManager has registered, not a global set.
 */

import { DuplicateCalendarError, InvalidCalendarNameError } from '../errors.js'

export const MAX_CALENDAR_NAME_LENGTH = 100

const VALID_NAME = /^[\p{L}\p{N}_]+$/u

export class CalendarNameValidator {
  private readonly isTaken: (name: string) => boolean

  constructor(isTaken: (name: string) => boolean) {
    this.isTaken = isTaken
  }

  /**
   * Normalize and validate a proposed name. `current` is the name being
   * replaced on a rename and does not count as taken.
   *
   * @returns The name with surrounding quotes removed
   */
  validate(name: string, current?: string): string {
    const normalized = stripQuotes(name.trim())

    if (!normalized) {
      throw new InvalidCalendarNameError('Calendar name cannot be empty')
    }
    if (normalized.length > MAX_CALENDAR_NAME_LENGTH) {
      throw new InvalidCalendarNameError(
        `Calendar name cannot exceed ${MAX_CALENDAR_NAME_LENGTH} characters`,
      )
    }
    if (!VALID_NAME.test(normalized)) {
      throw new InvalidCalendarNameError(
        `Invalid calendar name '${normalized}': use letters, digits and underscores only`,
      )
    }
    if (normalized !== current && this.isTaken(normalized)) {
      throw new DuplicateCalendarError(normalized)
    }

    return normalized
  }
}

export function stripQuotes(value: string): string {
  if (value.length >= 2) {
    const first = value[0]
    const last = value[value.length - 1]
    if ((first === '"' || first === "'") && first === last) {
      return value.slice(1, -1)
    }
  }
  return value
}

/**
 * Event Types
 */

import type { LocalDate } from '../utils/datetime.js'

/** Optional descriptive fields shared by single and recurring events */
export interface EventDetails {
  description?: string
  location?: string
  /** Defaults to true */
  isPublic?: boolean
}

/**
 * How a recurring series ends: after a number of occurrences, or on the
 * last matching weekday not after a date.
 */
export type Termination =
  | { kind: 'count'; count: number }
  | { kind: 'until'; until: LocalDate }

/**
 * Plain, serializable view of an event (date-times as yyyy-MM-ddTHH:mm).
 */
export interface EventSnapshot {
  id: string
  seriesId: string | null
  subject: string
  start: string
  end: string
  allDay: boolean
  date: string | null
  description: string
  location: string
  isPublic: boolean
}

/**
 * Property names accepted by edit operations, after alias resolution.
 */
export type EventProperty =
  | 'subject'
  | 'description'
  | 'location'
  | 'start'
  | 'end'
  | 'visibility'
  | 'private'

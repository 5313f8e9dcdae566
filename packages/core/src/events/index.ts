export { CalendarEvent, createTimedEvent, createAllDayEvent } from './event.js'
export type { CalendarEventInit } from './event.js'
export { RecurringEvent, RecurringEventBuilder } from './recurring.js'
export { applyPropertyUpdate, resolveProperty } from './property-updater.js'
export { parseWeekdays, formatWeekdays, isWeekday } from './weekdays.js'
export type { Weekday } from './weekdays.js'
export type { EventDetails, EventSnapshot, EventProperty, Termination } from './types.js'

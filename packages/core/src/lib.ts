// Public API for consumption by other packages (cli)

export {
  CalendarError,
  InvalidEventError,
  ConflictingEventError,
  EventNotFoundError,
  CalendarNotFoundError,
  DuplicateCalendarError,
  InvalidTimezoneError,
  InvalidCalendarNameError,
  isCalendarError,
  errorMessage,
} from './errors.js'
export type { CalendarErrorKind } from './errors.js'

export * from './timezone/index.js'
export * from './events/index.js'
export * from './calendar/index.js'
export * from './export/index.js'

export {
  parseDate,
  parseDateTime,
  parseTime,
  localDate,
  localDateTime,
  toDate,
  atTime,
  startOfDay,
  endOfDay,
  daysBetween,
  sameDate,
  formatDate,
  formatTime,
  formatDateTime,
} from './utils/datetime.js'
export type { LocalDate, LocalDateTime, TimeOfDay } from './utils/datetime.js'

export { loadConfig, findAppDir, APP_DIR_NAME } from './config.js'
export type { AppConfig } from './config.js'

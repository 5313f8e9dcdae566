export {
  isValidTimezone,
  convertToUTC,
  convertFromUTC,
  buildConverter,
  listTimezones,
  UTC_ZONE,
} from './normalizer.js'
export type { TimezoneConverter } from './normalizer.js'

export { CsvExporter, CSV_HEADER, escapeCsvField, parseCsv } from './csv.js'
export type { CsvRow } from './csv.js'
export type { EventExporter, EventImporter, ImportSummary } from './types.js'

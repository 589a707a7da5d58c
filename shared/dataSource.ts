/**
 * Data Source Infrastructure
 *
 * Defines the providers whose exports can be ingested and the file formats
 * each one produces. Every canonical record carries the provider it came from.
 */

// Supported data sources
export const DATA_SOURCES = {
  FITBIT: 'fitbit',
  OURA: 'oura',
  APPLE_HEALTH: 'apple_health',
  CRONOMETER: 'cronometer',
  GARMIN: 'garmin',
} as const;

export type DataSource = typeof DATA_SOURCES[keyof typeof DATA_SOURCES];

// All valid data sources as an array (for validation)
export const ALL_DATA_SOURCES: DataSource[] = Object.values(DATA_SOURCES);

// Display names for logs and reports
export const DATA_SOURCE_DISPLAY_NAMES: Record<DataSource, string> = {
  fitbit: 'Fitbit',
  oura: 'Oura Ring',
  apple_health: 'Apple Health',
  cronometer: 'Cronometer',
  garmin: 'Garmin Connect',
};

/**
 * Structural envelopes an export can arrive in.
 * - delimited_text: CSV with a header row
 * - nested_structured: JSON key/value tree
 * - tagged_markup: XML
 */
export const FILE_FORMATS = {
  DELIMITED_TEXT: 'delimited_text',
  NESTED_STRUCTURED: 'nested_structured',
  TAGGED_MARKUP: 'tagged_markup',
} as const;

export type FileFormat = typeof FILE_FORMATS[keyof typeof FILE_FORMATS];

// Which formats each source exports
export const DATA_SOURCE_FORMATS: Record<DataSource, FileFormat[]> = {
  fitbit: ['delimited_text', 'nested_structured'],
  oura: ['nested_structured'],
  apple_health: ['tagged_markup'],
  cronometer: ['delimited_text'],
  garmin: ['delimited_text'],
};

export function isDataSource(value: string): value is DataSource {
  return ALL_DATA_SOURCES.some((source) => source === value);
}

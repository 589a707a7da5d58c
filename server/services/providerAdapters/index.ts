import { DATA_SOURCE_FORMATS, type DataSource, type FileFormat } from "@shared/dataSource";
import { UnsupportedFormatError } from "@shared/domain/errors";
import { delimitedTextAdapter } from "./delimitedTextAdapter";
import { nestedStructuredAdapter } from "./nestedStructuredAdapter";
import { taggedMarkupAdapter } from "./taggedMarkupAdapter";
import type { ParseOutcome, ProviderAdapter, RawFile } from "./types";

export type { ParseOutcome, ProviderAdapter, RawFile, RawRecord } from "./types";

export const PROVIDER_ADAPTERS: Record<FileFormat, ProviderAdapter> = {
  delimited_text: delimitedTextAdapter,
  nested_structured: nestedStructuredAdapter,
  tagged_markup: taggedMarkupAdapter,
};

/** Sniff the structural envelope from the first non-whitespace character. */
export function detectFileFormat(content: string): FileFormat {
  const firstChar = content.replace(/^\uFEFF/, '').trimStart().charAt(0);
  if (firstChar === '<') return 'tagged_markup';
  if (firstChar === '{' || firstChar === '[') return 'nested_structured';
  return 'delimited_text';
}

/**
 * Parse a raw export for the declared provider. Throws UnsupportedFormatError
 * for an empty file or an envelope the provider never exports.
 */
export function parseProviderFile(file: RawFile, provider: DataSource): ParseOutcome {
  if (file.content.trim() === '') {
    throw new UnsupportedFormatError(`${file.name}: file is empty`);
  }
  const format = detectFileFormat(file.content);
  if (!DATA_SOURCE_FORMATS[provider].includes(format)) {
    throw new UnsupportedFormatError(`${file.name}: ${provider} does not export ${format} files`);
  }
  return PROVIDER_ADAPTERS[format].parse(file, provider);
}

/**
 * Guess the provider of an export from its name and content signatures.
 * Returns null when nothing matches.
 */
export function detectProvider(file: RawFile): DataSource | null {
  const head = file.content.slice(0, 4096);
  const format = detectFileFormat(head);

  if (format === 'tagged_markup') {
    return /<HealthData\b/.test(head) ? 'apple_health' : null;
  }

  if (format === 'nested_structured') {
    if (/"(bedtime_start|daily_activity|daily_sleep)"/.test(head)) return 'oura';
    if (/"(dateTime|dateOfSleep|nutritionalValues)"/.test(head)) return 'fitbit';
    return null;
  }

  const headerLine = head.split(/\r?\n/, 1)[0].toLowerCase();
  if (/\bmetric\b/.test(headerLine) && /\bvalue\b/.test(headerLine)) return 'garmin';
  if (/protein \(g\)|energy \(kcal\)/.test(headerLine)) return 'cronometer';
  if (/sleep_log_entry_id|overall_score|calories burned|average_value|rmssd/.test(headerLine) || /^fitbit|sleep_score/i.test(file.name)) {
    return 'fitbit';
  }
  return null;
}

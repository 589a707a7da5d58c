import { XMLParser, XMLValidator } from "fast-xml-parser";
import type { DataSource } from "@shared/dataSource";
import { UnsupportedFormatError, type PartialIngestionWarning } from "@shared/domain/errors";
import { parseTimestamp, resolveInstant } from "../../utils/timestampParser";
import { malformedRow, type ParseOutcome, type ProviderAdapter, type RawFile, type RawRecord } from "./types";

const SLEEP_ANALYSIS_TYPE = 'HKCategoryTypeIdentifierSleepAnalysis';

// Quantity types whose "%" unit carries a 0-1 fraction (0.97 for 97%)
const FRACTION_PERCENT_TYPES = new Set([
  'HKQuantityTypeIdentifierOxygenSaturation',
  'HKQuantityTypeIdentifierBodyFatPercentage',
]);

function unitHintFor(type: string, unit: string | undefined): string | null {
  if (unit === '%' && FRACTION_PERCENT_TYPES.has(type)) {
    return 'fraction';
  }
  return unit ?? null;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  parseAttributeValue: false,
  isArray: (name) => name === 'Record',
});

type MarkupElement = Record<string, unknown>;

function isElement(value: unknown): value is MarkupElement {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function attribute(element: MarkupElement, name: string): string | undefined {
  const value = element[name];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function durationSeconds(start: string, end: string): number | null {
  const parsedStart = parseTimestamp(start);
  const parsedEnd = parseTimestamp(end);
  if (!parsedStart || !parsedEnd) {
    return null;
  }
  const startInstant = resolveInstant(parsedStart, { timezone: 'UTC' });
  const endInstant = resolveInstant(parsedEnd, { timezone: 'UTC' });
  if (!startInstant || !endInstant || endInstant < startInstant) {
    return null;
  }
  return (endInstant.getTime() - startInstant.getTime()) / 1000;
}

/**
 * Tagged markup (Apple Health export.xml): a <HealthData> root holding
 * <Record type unit value startDate endDate> elements. Sleep analysis
 * records are categories, so their value becomes the segment duration.
 */
export const taggedMarkupAdapter: ProviderAdapter = {
  format: 'tagged_markup',

  parse(file: RawFile, provider: DataSource): ParseOutcome {
    const validation = XMLValidator.validate(file.content);
    if (validation !== true) {
      throw new UnsupportedFormatError(`${file.name}: malformed markup (${validation.err.msg})`);
    }

    const document: unknown = parser.parse(file.content);
    const root = isElement(document) ? document.HealthData : undefined;
    if (!isElement(root)) {
      throw new UnsupportedFormatError(`${file.name}: missing <HealthData> root element`);
    }

    const elements = Array.isArray(root.Record) ? root.Record : [];
    const records: RawRecord[] = [];
    const warnings: PartialIngestionWarning[] = [];

    elements.forEach((element: unknown, index: number) => {
      const location = `${file.name}:Record[${index}]`;
      if (!isElement(element)) {
        warnings.push(malformedRow(location, 'Record element without attributes'));
        return;
      }

      const type = attribute(element, 'type');
      const startDate = attribute(element, 'startDate');
      const value = attribute(element, 'value');
      if (!type || !startDate || !value) {
        warnings.push(malformedRow(location, 'Record missing type, startDate or value'));
        return;
      }

      const metadata: Record<string, unknown> = {};
      const sourceName = attribute(element, 'sourceName');
      if (sourceName) {
        metadata.sourceName = sourceName;
      }

      if (type === SLEEP_ANALYSIS_TYPE) {
        const endDate = attribute(element, 'endDate');
        const seconds = endDate ? durationSeconds(startDate, endDate) : null;
        if (seconds === null) {
          warnings.push(malformedRow(location, 'Sleep record with unusable startDate/endDate'));
          return;
        }
        records.push({
          provider,
          fieldName: `${type}:${value}`,
          rawValue: seconds,
          unitHint: 's',
          timestampRaw: startDate,
          location,
          metadata,
        });
        return;
      }

      records.push({
        provider,
        fieldName: type,
        rawValue: value,
        unitHint: unitHintFor(type, attribute(element, 'unit')),
        timestampRaw: startDate,
        location,
        metadata,
      });
    });

    return { format: 'tagged_markup', records, warnings };
  },
};

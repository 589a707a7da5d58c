import Papa, { type ParseError } from "papaparse";
import type { DataSource } from "@shared/dataSource";
import { UnsupportedFormatError, type PartialIngestionWarning } from "@shared/domain/errors";
import { malformedRow, type ParseOutcome, type ProviderAdapter, type RawFile, type RawRecord } from "./types";

type CsvRow = Record<string, string | undefined>;

const TIMESTAMP_COLUMNS = ['timestamp', 'date', 'datetime', 'day', 'start'];
const HEADER_UNIT = /^(.*?)\s*\(([^)]+)\)$/;

function findColumn(fields: string[], candidates: string[]): string | undefined {
  return candidates
    .map((candidate) => fields.find((field) => field.toLowerCase() === candidate))
    .find((field): field is string => field !== undefined);
}

/** "Protein (g)" -> { fieldName: "Protein", unit: "g" } */
function splitHeaderUnit(header: string): { fieldName: string; unit: string | null } {
  const match = HEADER_UNIT.exec(header);
  return match ? { fieldName: match[1], unit: match[2].trim() } : { fieldName: header, unit: null };
}

function rowErrors(errors: ParseError[]): Map<number, string> {
  const byRow = new Map<number, string>();
  for (const error of errors) {
    if (typeof error.row === 'number' && !byRow.has(error.row)) {
      byRow.set(error.row, error.message);
    }
  }
  return byRow;
}

/**
 * Delimited text (CSV with a header row). Two layouts:
 * - wide: one timestamp column, every other column is a field ("Protein (g)")
 * - long: Timestamp,Metric,Value[,Unit], one field per row
 */
export const delimitedTextAdapter: ProviderAdapter = {
  format: 'delimited_text',

  parse(file: RawFile, provider: DataSource): ParseOutcome {
    const result = Papa.parse<CsvRow>(file.content, {
      header: true,
      skipEmptyLines: true,
      transformHeader: (header) => header.trim(),
    });

    const fields = result.meta.fields ?? [];
    const timestampColumn = findColumn(fields, TIMESTAMP_COLUMNS);
    if (fields.length < 2 || !timestampColumn) {
      throw new UnsupportedFormatError(`${file.name}: no header row with a timestamp column`);
    }

    const metricColumn = findColumn(fields, ['metric']);
    const valueColumn = findColumn(fields, ['value']);
    const unitColumn = findColumn(fields, ['unit']);
    const isLongLayout = metricColumn !== undefined && valueColumn !== undefined;

    const malformed = rowErrors(result.errors);
    const records: RawRecord[] = [];
    const warnings: PartialIngestionWarning[] = [];

    result.data.forEach((row, index) => {
      // +2: one for the header line, one for 1-based numbering
      const location = `${file.name}:row ${index + 2}`;
      const parseError = malformed.get(index);
      if (parseError) {
        warnings.push(malformedRow(location, parseError));
        return;
      }

      const timestampRaw = row[timestampColumn]?.trim();
      if (!timestampRaw) {
        warnings.push(malformedRow(location, `Missing ${timestampColumn}`));
        return;
      }

      if (isLongLayout) {
        const fieldName = row[metricColumn]?.trim();
        const rawValue = row[valueColumn]?.trim();
        if (!fieldName || !rawValue) {
          warnings.push(malformedRow(location, 'Missing metric name or value'));
          return;
        }
        records.push({
          provider,
          fieldName,
          rawValue,
          unitHint: unitColumn ? row[unitColumn]?.trim() || null : null,
          timestampRaw,
          location,
        });
        return;
      }

      for (const header of fields) {
        if (header === timestampColumn) continue;
        const cell = row[header]?.trim();
        if (!cell) continue;
        const { fieldName, unit } = splitHeaderUnit(header);
        records.push({ provider, fieldName, rawValue: cell, unitHint: unit, timestampRaw, location });
      }
    });

    return { format: 'delimited_text', records, warnings };
  },
};

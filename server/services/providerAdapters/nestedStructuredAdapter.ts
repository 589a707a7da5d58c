import type { DataSource } from "@shared/dataSource";
import { UnsupportedFormatError, type PartialIngestionWarning } from "@shared/domain/errors";
import { malformedRow, type ParseOutcome, type ProviderAdapter, type RawFile, type RawRecord } from "./types";

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is string | number {
  return typeof value === 'number' || (typeof value === 'string' && value.trim() !== '');
}

// Fitbit Takeout names per-metric files "<metric>-YYYY-MM-DD.json"
const FITBIT_FILE_NAME = /^([a-z_]+)-\d{4}-\d{2}(?:-\d{2})?\.json$/i;

const FITBIT_SLEEP_STAGES = ['deep', 'light', 'rem', 'wake'] as const;

// Nutrients read from food log entries; calories are intake, not expenditure
const FITBIT_FOOD_NUTRIENTS = ['protein', 'carbs', 'fat', 'fiber', 'sodium'] as const;

// Oura export collections and the field that timestamps each entry
const OURA_TIMESTAMP_FIELDS = ['timestamp', 'bedtime_start', 'day'];

// Oura sleep periods carry their UTC offset in minutes
const OURA_OFFSET_FIELD = 'timezone';

function parseFitbitSleepLog(entries: unknown[], file: RawFile, provider: DataSource): ParseOutcome {
  const records: RawRecord[] = [];
  const warnings: PartialIngestionWarning[] = [];

  entries.forEach((entry, index) => {
    const location = `${file.name}:[${index}]`;
    if (!isJsonObject(entry) || typeof entry.startTime !== 'string' || typeof entry.endTime !== 'string') {
      warnings.push(malformedRow(location, 'Sleep log entry without startTime/endTime'));
      return;
    }

    const timestampRaw = entry.startTime;
    const metadata: JsonObject = { logId: entry.logId, dateOfSleep: entry.dateOfSleep };
    const push = (fieldName: string, rawValue: string | number, unitHint: string | null) => {
      records.push({ provider, fieldName, rawValue, unitHint, timestampRaw, location, metadata });
    };

    push('sleep.startTime', entry.startTime, null);
    push('sleep.endTime', entry.endTime, null);
    if (isScalar(entry.minutesAsleep)) {
      push('sleep.minutesAsleep', entry.minutesAsleep, 'min');
    }

    const levels = isJsonObject(entry.levels) ? entry.levels : {};
    const summary = isJsonObject(levels.summary) ? levels.summary : {};
    for (const stage of FITBIT_SLEEP_STAGES) {
      const stageSummary = summary[stage];
      if (isJsonObject(stageSummary) && isScalar(stageSummary.minutes)) {
        push(`sleep.${stage}`, stageSummary.minutes, 'min');
      }
    }
  });

  return { format: 'nested_structured', records, warnings };
}

/**
 * Food log entries are meals; they are summed into one total per logDate and
 * nutrient, since every meal of a day shares the same local-date key.
 */
function parseFitbitFoodLog(entries: unknown[], file: RawFile, provider: DataSource): ParseOutcome {
  const totals = new Map<string, { sums: Map<string, number>; meals: number }>();
  const warnings: PartialIngestionWarning[] = [];

  entries.forEach((entry, index) => {
    const location = `${file.name}:[${index}]`;
    if (!isJsonObject(entry) || typeof entry.logDate !== 'string' || !isJsonObject(entry.nutritionalValues)) {
      warnings.push(malformedRow(location, 'Food log entry without logDate/nutritionalValues'));
      return;
    }
    const nutrition = entry.nutritionalValues;
    const amounts = new Map<string, number>();
    for (const nutrient of FITBIT_FOOD_NUTRIENTS) {
      const value = nutrition[nutrient];
      if (value === undefined || value === null) continue;
      const amount = isScalar(value) ? Number(value) : NaN;
      if (!Number.isFinite(amount)) {
        warnings.push(malformedRow(location, `Food log ${nutrient} is not numeric`));
        return;
      }
      amounts.set(nutrient, amount);
    }

    const day = totals.get(entry.logDate) ?? { sums: new Map<string, number>(), meals: 0 };
    for (const [nutrient, amount] of amounts) {
      day.sums.set(nutrient, (day.sums.get(nutrient) ?? 0) + amount);
    }
    day.meals++;
    totals.set(entry.logDate, day);
  });

  const records: RawRecord[] = [];
  for (const [logDate, day] of totals) {
    for (const [nutrient, total] of day.sums) {
      records.push({
        provider,
        fieldName: `food.${nutrient}`,
        rawValue: total,
        unitHint: null,
        timestampRaw: logDate,
        location: `${file.name}:${logDate}`,
        metadata: { mealEntries: day.meals },
      });
    }
  }

  return { format: 'nested_structured', records, warnings };
}

/**
 * Extract the sample value from a Takeout entry. Plain numbers and strings
 * pass through; heart rate carries {bpm, confidence}; resting heart rate
 * carries {date, value, error} where a zero value means no reading.
 */
function fitbitEntryValue(value: unknown): { rawValue: string | number; metadata?: JsonObject } | null {
  if (isScalar(value)) {
    return { rawValue: value };
  }
  if (!isJsonObject(value)) {
    return null;
  }
  if (isScalar(value.bpm)) {
    return { rawValue: value.bpm, metadata: { confidence: value.confidence } };
  }
  if (isScalar(value.value)) {
    return { rawValue: value.value };
  }
  return null;
}

function parseFitbitTakeout(document: unknown, file: RawFile, provider: DataSource): ParseOutcome {
  if (!Array.isArray(document)) {
    throw new UnsupportedFormatError(`${file.name}: expected a Fitbit Takeout array`);
  }

  if (document.some((entry) => isJsonObject(entry) && 'dateOfSleep' in entry)) {
    return parseFitbitSleepLog(document, file, provider);
  }
  if (document.some((entry) => isJsonObject(entry) && 'nutritionalValues' in entry)) {
    return parseFitbitFoodLog(document, file, provider);
  }

  const nameMatch = FITBIT_FILE_NAME.exec(file.name);
  if (!nameMatch) {
    throw new UnsupportedFormatError(`${file.name}: cannot tell which Fitbit metric this file holds`);
  }
  const fieldName = nameMatch[1].toLowerCase();

  const records: RawRecord[] = [];
  const warnings: PartialIngestionWarning[] = [];

  document.forEach((entry, index) => {
    const location = `${file.name}:[${index}]`;
    if (!isJsonObject(entry) || typeof entry.dateTime !== 'string') {
      warnings.push(malformedRow(location, 'Entry without dateTime'));
      return;
    }
    const extracted = fitbitEntryValue(entry.value);
    if (!extracted) {
      warnings.push(malformedRow(location, 'Entry without a usable value'));
      return;
    }
    if (fieldName === 'resting_heart_rate' && Number(extracted.rawValue) === 0) {
      return;
    }
    records.push({
      provider,
      fieldName,
      rawValue: extracted.rawValue,
      unitHint: null,
      timestampRaw: entry.dateTime,
      location,
      metadata: extracted.metadata,
    });
  });

  return { format: 'nested_structured', records, warnings };
}

function parseOuraExport(document: unknown, file: RawFile, provider: DataSource): ParseOutcome {
  if (!isJsonObject(document)) {
    throw new UnsupportedFormatError(`${file.name}: expected an Oura export object`);
  }

  const collections = Object.entries(document).filter(
    (entry): entry is [string, unknown[]] => Array.isArray(entry[1])
  );
  if (collections.length === 0) {
    throw new UnsupportedFormatError(`${file.name}: Oura export has no data collections`);
  }

  const records: RawRecord[] = [];
  const warnings: PartialIngestionWarning[] = [];

  for (const [collection, entries] of collections) {
    entries.forEach((entry, index) => {
      const location = `${file.name}:${collection}[${index}]`;
      if (!isJsonObject(entry)) {
        warnings.push(malformedRow(location, 'Entry is not an object'));
        return;
      }
      const timestampField = OURA_TIMESTAMP_FIELDS.find((field) => typeof entry[field] === 'string');
      const timestampRaw = timestampField ? entry[timestampField] : undefined;
      if (typeof timestampRaw !== 'string') {
        warnings.push(malformedRow(location, 'Entry has no timestamp, bedtime_start or day'));
        return;
      }
      const metadata: JsonObject | undefined = typeof entry.id === 'string' ? { sourceId: entry.id } : undefined;
      const offset = entry[OURA_OFFSET_FIELD];
      const utcOffsetMinutes = typeof offset === 'number' && Number.isInteger(offset) ? offset : undefined;

      for (const [key, value] of Object.entries(entry)) {
        if (key === timestampField || key === 'id' || key === OURA_OFFSET_FIELD || !isScalar(value)) continue;
        records.push({
          provider,
          fieldName: `${collection}.${key}`,
          rawValue: value,
          unitHint: null,
          timestampRaw,
          utcOffsetMinutes,
          location,
          metadata,
        });
      }
      // bedtime_start is both the anchor and a value of its own
      if (timestampField === 'bedtime_start') {
        records.push({
          provider,
          fieldName: `${collection}.bedtime_start`,
          rawValue: timestampRaw,
          unitHint: null,
          timestampRaw,
          utcOffsetMinutes,
          location,
          metadata,
        });
      }
    });
  }

  return { format: 'nested_structured', records, warnings };
}

/** Nested structured exports (JSON). */
export const nestedStructuredAdapter: ProviderAdapter = {
  format: 'nested_structured',

  parse(file: RawFile, provider: DataSource): ParseOutcome {
    let document: unknown;
    try {
      document = JSON.parse(file.content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new UnsupportedFormatError(`${file.name}: not valid JSON (${reason})`);
    }

    switch (provider) {
      case 'fitbit':
        return parseFitbitTakeout(document, file, provider);
      case 'oura':
        return parseOuraExport(document, file, provider);
      default:
        throw new UnsupportedFormatError(`${file.name}: ${provider} does not export structured JSON`);
    }
  },
};

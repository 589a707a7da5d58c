/**
 * Canonical Mapper
 *
 * Translates provider RawRecords into canonical metric records: metric name,
 * canonical unit and UTC instant. The mapping table is versioned JSON loaded
 * once at startup and frozen.
 */

import { z } from "zod";
import { getCanonicalUnit, type MetricType } from "@shared/metrics";
import type { DataSource } from "@shared/dataSource";
import { metricTypeSchema, dataSourceSchema } from "@shared/schema";
import { SchemaMismatchError, UnitConversionError } from "@shared/domain/errors";
import { convertUnit, normalizeUnit } from "@shared/domain/units";
import mappingDocument from "../config/canonicalMappings.json";
import { clockOffsetSeconds, parseTimestamp, resolveInstant } from "../utils/timestampParser";
import { createLogger } from "../utils/logger";
import type { RawRecord } from "./providerAdapters";

const logger = createLogger('CanonicalMapper');

/**
 * How a raw timestamp becomes recordedAt (and, for clock_time, the value).
 * - instant: value is a measurement taken at the timestamp
 * - clock_time: value is itself a time of day, stored as seconds from local midnight
 * - local_date: date-only rows, anchored at local midnight
 */
const timePolicySchema = z.enum(['instant', 'clock_time', 'local_date']);
export type TimePolicy = z.infer<typeof timePolicySchema>;

/**
 * sample: one reading among many for the day
 * daily: the provider's own total for the day, which replaces its samples
 */
const granularitySchema = z.enum(['sample', 'daily']);
export type Granularity = z.infer<typeof granularitySchema>;

const mappingEntrySchema = z.object({
  provider: dataSourceSchema,
  fieldName: z.string().min(1),
  metricType: metricTypeSchema,
  acceptedUnits: z.array(z.string()),
  defaultUnit: z.string().nullable(),
  timePolicy: timePolicySchema,
  granularity: granularitySchema.default('sample'),
});

const mappingTableSchema = z.object({
  version: z.string().min(1),
  mappings: z.array(mappingEntrySchema).min(1),
});

export interface CanonicalMapping {
  readonly provider: DataSource;
  readonly fieldName: string;
  readonly metricType: MetricType;
  readonly acceptedUnits: readonly string[];
  readonly defaultUnit: string | null;
  readonly timePolicy: TimePolicy;
  readonly granularity: Granularity;
}

export interface CanonicalMappingTable {
  readonly version: string;
  lookup(provider: DataSource, fieldName: string): CanonicalMapping | undefined;
  entries(): readonly CanonicalMapping[];
}

function mappingKey(provider: DataSource, fieldName: string): string {
  return `${provider}::${fieldName}`;
}

/**
 * Validate and freeze a mapping document. Throws on schema errors, on
 * duplicate (provider, fieldName) keys and on a second daily field for the
 * same provider and metric.
 */
export function loadCanonicalMappings(source: unknown): CanonicalMappingTable {
  const parsed = mappingTableSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid canonical mapping table: ${issues.join('; ')}`);
  }

  const byKey = new Map<string, CanonicalMapping>();
  const dailyFields = new Map<string, string>();
  for (const entry of parsed.data.mappings) {
    const key = mappingKey(entry.provider, entry.fieldName);
    if (byKey.has(key)) {
      throw new Error(`Duplicate canonical mapping for ${entry.provider} field "${entry.fieldName}"`);
    }
    if (entry.granularity === 'daily') {
      const dailyKey = `${entry.provider}::${entry.metricType}`;
      const other = dailyFields.get(dailyKey);
      if (other !== undefined) {
        throw new Error(
          `${entry.provider} fields "${other}" and "${entry.fieldName}" are both daily ${entry.metricType} totals`
        );
      }
      dailyFields.set(dailyKey, entry.fieldName);
    }
    byKey.set(key, Object.freeze({ ...entry, acceptedUnits: Object.freeze([...entry.acceptedUnits]) }));
  }

  const frozenEntries = Object.freeze([...byKey.values()]);
  const version = parsed.data.version;

  return Object.freeze({
    version,
    lookup: (provider: DataSource, fieldName: string) => byKey.get(mappingKey(provider, fieldName)),
    entries: () => frozenEntries,
  });
}

let defaultTable: CanonicalMappingTable | null = null;

export function getCanonicalMappings(): CanonicalMappingTable {
  if (!defaultTable) {
    defaultTable = loadCanonicalMappings(mappingDocument);
    logger.info(`Loaded canonical mapping table v${defaultTable.version} (${defaultTable.entries().length} fields)`);
  }
  return defaultTable;
}

export interface MappingContext {
  userId: string;
  sourceFileHash: string;
  timezone: string; // user's profile timezone, used when the export carries no offset
}

export interface CanonicalRecordDraft {
  userId: string;
  metricType: MetricType;
  value: number;
  unit: string;
  recordedAt: Date;
  sourceProvider: DataSource;
  sourceFileHash: string;
  metadata: Record<string, unknown> | null;
}

// Physiologically implausible samples are rejected rather than stored
const PLAUSIBLE_RANGES: Partial<Record<MetricType, [number, number]>> = {
  heart_rate: [25, 250],
  resting_heart_rate: [25, 200],
  spo2: [50, 100],
  steps: [0, 100_000],
};

const GROUPED_THOUSANDS = /^-?\d{1,3}(,\d{3})+(\.\d+)?$/;

function parseNumericValue(rawValue: string | number, fieldName: string): number {
  if (typeof rawValue === 'number') {
    if (!Number.isFinite(rawValue)) {
      throw new SchemaMismatchError(`Non-finite value for ${fieldName}`);
    }
    return rawValue;
  }
  const trimmed = rawValue.trim();
  const text = GROUPED_THOUSANDS.test(trimmed) ? trimmed.replace(/,/g, '') : trimmed;
  const value = text === '' ? NaN : Number(text);
  if (!Number.isFinite(value)) {
    throw new SchemaMismatchError(`Value "${rawValue}" for ${fieldName} is not numeric`);
  }
  return value;
}

function resolveSourceUnit(mapping: CanonicalMapping, unitHint: string | null): string {
  if (unitHint && unitHint.trim() !== '') {
    const unit = normalizeUnit(unitHint);
    const accepted = mapping.acceptedUnits.some((candidate) => normalizeUnit(candidate) === unit);
    if (mapping.acceptedUnits.length > 0 && !accepted) {
      throw new UnitConversionError(unitHint, mapping.acceptedUnits.join(' or '), mapping.metricType);
    }
    return unitHint;
  }
  if (mapping.defaultUnit) {
    return mapping.defaultUnit;
  }
  if (mapping.acceptedUnits.length === 1) {
    return mapping.acceptedUnits[0];
  }
  throw new SchemaMismatchError(
    `No unit given for ${mapping.fieldName}; expected one of ${mapping.acceptedUnits.join(', ')}`
  );
}

function checkPlausible(metricType: MetricType, value: number, fieldName: string): void {
  const range = PLAUSIBLE_RANGES[metricType];
  const [min, max] = range ?? [0, Number.POSITIVE_INFINITY];
  if (value < min || value > max) {
    throw new SchemaMismatchError(`Value ${value} for ${fieldName} is outside the plausible range`);
  }
}

/**
 * Map one raw record. Returns null for fields the table does not know.
 * Throws SchemaMismatchError or UnitConversionError for records that cannot
 * be canonicalized; callers count those as warnings.
 */
export function mapRawRecord(
  raw: RawRecord,
  context: MappingContext,
  table: CanonicalMappingTable = getCanonicalMappings()
): CanonicalRecordDraft | null {
  const mapping = table.lookup(raw.provider, raw.fieldName);
  if (!mapping) {
    logger.debug(`Dropping unmapped ${raw.provider} field "${raw.fieldName}"`, { location: raw.location });
    return null;
  }

  const parsedTimestamp = parseTimestamp(raw.timestampRaw);
  const recordedAt = parsedTimestamp
    ? resolveInstant(
        parsedTimestamp,
        { utcOffsetMinutes: raw.utcOffsetMinutes, timezone: context.timezone },
        mapping.timePolicy === 'local_date'
      )
    : null;
  if (!recordedAt) {
    throw new SchemaMismatchError(`Unparseable timestamp "${raw.timestampRaw}" for ${raw.fieldName}`);
  }

  const canonicalUnit = getCanonicalUnit(mapping.metricType);
  let value: number;

  if (mapping.timePolicy === 'clock_time') {
    const clock = typeof raw.rawValue === 'string' ? parseTimestamp(raw.rawValue) : null;
    if (!clock) {
      throw new SchemaMismatchError(`Value "${raw.rawValue}" for ${raw.fieldName} is not a time of day`);
    }
    value = clockOffsetSeconds(clock.wallClock);
  } else {
    const sourceValue = parseNumericValue(raw.rawValue, raw.fieldName);
    const sourceUnit = resolveSourceUnit(mapping, raw.unitHint);
    value = convertUnit(sourceValue, sourceUnit, canonicalUnit, mapping.metricType);
    checkPlausible(mapping.metricType, value, raw.fieldName);
  }

  const metadata: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(raw.metadata ?? {})) {
    if (entry !== undefined) metadata[key] = entry;
  }
  metadata.sourceField = raw.fieldName;
  if (mapping.granularity === 'daily') {
    metadata.granularity = 'daily';
  }
  if (raw.unitHint && normalizeUnit(raw.unitHint) !== canonicalUnit) {
    metadata.sourceUnit = raw.unitHint;
  }

  return {
    userId: context.userId,
    metricType: mapping.metricType,
    value,
    unit: canonicalUnit,
    recordedAt,
    sourceProvider: raw.provider,
    sourceFileHash: context.sourceFileHash,
    metadata,
  };
}

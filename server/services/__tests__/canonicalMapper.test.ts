import { describe, it, expect } from 'vitest';
import { SchemaMismatchError, UnitConversionError } from '@shared/domain/errors';
import { getCanonicalMappings, loadCanonicalMappings, mapRawRecord, type MappingContext } from '../canonicalMapper';
import type { RawRecord } from '../providerAdapters';

const context: MappingContext = { userId: 'user-1', sourceFileHash: 'hash-1', timezone: 'UTC' };

function raw(overrides: Partial<RawRecord> & Pick<RawRecord, 'provider' | 'fieldName' | 'rawValue'>): RawRecord {
  return {
    unitHint: null,
    timestampRaw: '2024-03-01T07:00:00Z',
    location: 'test.csv:row 2',
    ...overrides,
  };
}

describe('loadCanonicalMappings', () => {
  it('loads the bundled table and freezes it', () => {
    const table = getCanonicalMappings();
    expect(table.version).toBe('2024.4');
    expect(Object.isFrozen(table.entries())).toBe(true);
    expect(table.lookup('garmin', 'Steps')?.metricType).toBe('steps');
    expect(table.lookup('garmin', 'Floors')).toBeUndefined();
  });

  it('rejects duplicate provider fields', () => {
    const entry = { provider: 'garmin', fieldName: 'Steps', metricType: 'steps', acceptedUnits: ['count'], defaultUnit: 'count', timePolicy: 'instant' };
    expect(() => loadCanonicalMappings({ version: '1', mappings: [entry, entry] })).toThrow(/Duplicate canonical mapping/);
  });

  it('allows one daily field per provider and metric', () => {
    const entry = { provider: 'fitbit', metricType: 'sleep_deep', acceptedUnits: ['min'], defaultUnit: 'min', timePolicy: 'instant', granularity: 'daily' };
    expect(() => loadCanonicalMappings({
      version: '1',
      mappings: [{ ...entry, fieldName: 'sleep.deep' }, { ...entry, fieldName: 'deep_sleep_in_minutes' }],
    })).toThrow('fitbit fields "sleep.deep" and "deep_sleep_in_minutes" are both daily sleep_deep totals');

    const table = loadCanonicalMappings({
      version: '1',
      mappings: [{ ...entry, fieldName: 'sleep.deep' }, { ...entry, fieldName: 'deep_sleep_in_minutes', granularity: 'sample' }],
    });
    expect(table.lookup('fitbit', 'deep_sleep_in_minutes')?.granularity).toBe('sample');
  });

  it('treats entries without a granularity as samples', () => {
    const entry = { provider: 'garmin', fieldName: 'Steps', metricType: 'steps', acceptedUnits: ['count'], defaultUnit: 'count', timePolicy: 'instant' };
    expect(loadCanonicalMappings({ version: '1', mappings: [entry] }).lookup('garmin', 'Steps')?.granularity).toBe('sample');
  });

  it('rejects unknown metric types', () => {
    const entry = { provider: 'garmin', fieldName: 'Floors', metricType: 'floors', acceptedUnits: [], defaultUnit: null, timePolicy: 'instant' };
    expect(() => loadCanonicalMappings({ version: '1', mappings: [entry] })).toThrow(/Invalid canonical mapping table/);
  });
});

describe('mapRawRecord', () => {
  it('converts to the canonical unit and records the source unit', () => {
    const record = mapRawRecord(raw({ provider: 'garmin', fieldName: 'Distance', rawValue: '5.2', unitHint: 'km' }), context);

    expect(record).toMatchObject({
      userId: 'user-1',
      metricType: 'distance',
      unit: 'm',
      recordedAt: new Date('2024-03-01T07:00:00.000Z'),
      sourceProvider: 'garmin',
      sourceFileHash: 'hash-1',
      metadata: { sourceField: 'Distance', sourceUnit: 'km' },
    });
    expect(record?.value).toBeCloseTo(5200, 6);
  });

  it('uses the default unit when the export gives none', () => {
    const record = mapRawRecord(raw({ provider: 'fitbit', fieldName: 'distance', rawValue: '12345' }), context);
    expect(record?.value).toBe(123.45);
    expect(record?.metadata).toEqual({ sourceField: 'distance' });
  });

  it('returns null for fields the table does not know', () => {
    expect(mapRawRecord(raw({ provider: 'cronometer', fieldName: 'Energy', rawValue: '2150', unitHint: 'kcal' }), context)).toBeNull();
  });

  it('treats a missing unit with several candidates as a schema mismatch', () => {
    expect(() => mapRawRecord(raw({ provider: 'garmin', fieldName: 'Distance', rawValue: '5.2' }), context))
      .toThrow(SchemaMismatchError);
  });

  it('throws UnitConversionError for a unit with no path to the canonical one', () => {
    expect(() => mapRawRecord(raw({ provider: 'garmin', fieldName: 'HRV', rawValue: '45', unitHint: 'kg' }), context))
      .toThrow(UnitConversionError);
  });

  it('rejects a unit hint outside the accepted units even when it converts', () => {
    expect(() => mapRawRecord(raw({ provider: 'garmin', fieldName: 'Distance', rawValue: '300', unitHint: 'ft' }), context))
      .toThrow('Cannot convert ft to km or mi or m for distance');
  });

  it('compares unit hints after alias normalisation', () => {
    const record = mapRawRecord(raw({ provider: 'garmin', fieldName: 'Steps', rawValue: '100', unitHint: 'Steps' }), context);
    expect(record?.value).toBe(100);
    expect(record?.metadata).toEqual({ sourceField: 'Steps' });
  });

  it('converts Apple oxygen saturation fractions to percent', () => {
    const record = mapRawRecord(
      raw({ provider: 'apple_health', fieldName: 'HKQuantityTypeIdentifierOxygenSaturation', rawValue: '0.97', unitHint: 'fraction' }),
      context
    );
    expect(record?.metricType).toBe('spo2');
    expect(record?.value).toBe(97);
    expect(record?.unit).toBe('%');
  });

  it('parses grouped thousands and rejects non-numeric values', () => {
    expect(mapRawRecord(raw({ provider: 'garmin', fieldName: 'Steps', rawValue: '1,234' }), context)?.value).toBe(1234);
    expect(() => mapRawRecord(raw({ provider: 'garmin', fieldName: 'Steps', rawValue: 'lots' }), context))
      .toThrow(SchemaMismatchError);
  });

  it('rejects implausible samples', () => {
    expect(() => mapRawRecord(raw({ provider: 'garmin', fieldName: 'Avg Heart Rate', rawValue: '300', unitHint: 'bpm' }), context))
      .toThrow(/plausible range/);
  });

  it('rejects unparseable timestamps', () => {
    expect(() => mapRawRecord(raw({ provider: 'garmin', fieldName: 'Steps', rawValue: '100', timestampRaw: 'yesterday' }), context))
      .toThrow(SchemaMismatchError);
  });

  it('stores clock times as seconds from local midnight', () => {
    const record = mapRawRecord(raw({
      provider: 'fitbit',
      fieldName: 'sleep.startTime',
      rawValue: '2024-03-01T23:10:00.000',
      timestampRaw: '2024-03-01T23:10:00.000',
    }), context);

    expect(record?.metricType).toBe('sleep_onset');
    expect(record?.value).toBe(-3000);
    expect(record?.unit).toBe('clock_s');
    expect(record?.recordedAt.toISOString()).toBe('2024-03-01T23:10:00.000Z');
  });

  it('anchors date-only rows at midnight in the profile timezone', () => {
    const record = mapRawRecord(
      raw({ provider: 'cronometer', fieldName: 'Protein', rawValue: '142.5', unitHint: 'g', timestampRaw: '2024-03-01' }),
      { ...context, timezone: 'America/New_York' }
    );

    expect(record?.value).toBe(142.5);
    expect(record?.recordedAt.toISOString()).toBe('2024-03-01T05:00:00.000Z');
    expect(record?.metadata).toEqual({ sourceField: 'Protein', granularity: 'daily' });
  });

  it('applies the adapter-declared offset when the timestamp has none', () => {
    const record = mapRawRecord(
      raw({ provider: 'fitbit', fieldName: 'steps', rawValue: '12', timestampRaw: '03/01/24 00:01:00', utcOffsetMinutes: 60 }),
      context
    );
    expect(record?.recordedAt.toISOString()).toBe('2024-02-29T23:01:00.000Z');
  });
});

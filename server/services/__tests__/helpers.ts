import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { addDays, format, parseISO } from 'date-fns';
import type { InsertInsightResult } from '@shared/schema';
import { getCanonicalUnit, type MetricType } from '@shared/metrics';
import type { DataSource } from '@shared/dataSource';
import type { IStorage } from '../../storage';
import type { RawFile } from '../providerAdapters';

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export function loadFixture(name: string): RawFile {
  return { name, content: readFileSync(fixturePath(name), 'utf8') };
}

/** Consecutive dates starting at `start`, one per value. */
export function datedValues(start: string, values: readonly number[]): Array<[string, number]> {
  return values.map((value, index) => [format(addDays(parseISO(start), index), 'yyyy-MM-dd'), value]);
}

/** One record per entry, recorded at `time` UTC on the given date. */
export async function seedDaily(
  storage: IStorage,
  userId: string,
  metricType: MetricType,
  entries: ReadonlyArray<readonly [string, number]>,
  options: { provider?: DataSource; time?: string } = {}
): Promise<void> {
  await storage.upsertMetricRecords(entries.map(([date, value]) => ({
    userId,
    metricType,
    value,
    unit: getCanonicalUnit(metricType),
    recordedAt: new Date(`${date}T${options.time ?? '08:00:00'}Z`),
    sourceProvider: options.provider ?? 'garmin',
    sourceFileHash: 'test-hash',
    metadata: null,
  })));
}

export function insightResult(overrides: Partial<InsertInsightResult> & Pick<InsertInsightResult, 'ruleId'>): InsertInsightResult {
  return {
    userId: 'user-1',
    windowStart: '2024-01-01',
    windowEnd: '2024-02-29',
    lagDays: 0,
    effectSize: 0.5,
    confidence: 0.95,
    sampleCount: 40,
    renderedText: `${overrides.ruleId} finding`,
    computedAt: new Date('2024-03-01T06:00:00Z'),
    ...overrides,
  };
}

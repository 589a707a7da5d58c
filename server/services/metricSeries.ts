import { isDailyTotal, type CanonicalMetricRecord } from "@shared/schema";
import type { MetricType } from "@shared/metrics";
import type { DataSource } from "@shared/dataSource";
import type { DateRange, IStorage } from "../storage";

export interface MetricPoint {
  readonly recordedAt: Date;
  readonly value: number;
  readonly provider: DataSource;
  /** The provider's own total for the local day rather than one sample of it. */
  readonly dailyTotal: boolean;
}

/**
 * Read-only, time-ordered view of one user's records for one metric. Points
 * from different providers may share a timestamp; points from one provider
 * never do. Never stored.
 */
export interface MetricSeries {
  readonly userId: string;
  readonly metricType: MetricType;
  readonly points: readonly MetricPoint[];
}

export function buildMetricSeries(
  userId: string,
  metricType: MetricType,
  records: readonly CanonicalMetricRecord[]
): MetricSeries {
  const seen = new Set<string>();
  const points: MetricPoint[] = [];

  for (const record of records) {
    if (record.userId !== userId || record.metricType !== metricType) {
      throw new Error(`Record ${record.id} does not belong to series ${userId}/${metricType}`);
    }
    const key = `${record.recordedAt.getTime()}|${record.sourceProvider}`;
    if (seen.has(key)) {
      throw new Error(`Duplicate ${record.sourceProvider} sample at ${record.recordedAt.toISOString()} in ${metricType}`);
    }
    seen.add(key);
    points.push(Object.freeze({
      recordedAt: record.recordedAt,
      value: record.value,
      provider: record.sourceProvider,
      dailyTotal: isDailyTotal(record.metadata),
    }));
  }

  points.sort((a, b) => a.recordedAt.getTime() - b.recordedAt.getTime() || a.provider.localeCompare(b.provider));
  return Object.freeze({ userId, metricType, points: Object.freeze(points) });
}

export async function fetchMetricSeries(
  storage: IStorage,
  userId: string,
  metricType: MetricType,
  range: DateRange
): Promise<MetricSeries> {
  const records = await storage.fetchSeries(userId, metricType, range);
  return buildMetricSeries(userId, metricType, records);
}

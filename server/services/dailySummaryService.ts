/**
 * Daily summaries, anomaly flags and weekly reports
 *
 * All three read canonical series through IStorage and bucket them into the
 * user's local calendar days with the same provider policy the insight engine
 * uses. Date arguments are local YYYY-MM-DD strings and ranges are inclusive.
 */

import { format, parseISO, startOfWeek } from "date-fns";
import { formatInTimeZone, fromZonedTime } from "date-fns-tz";
import { METRIC_REGISTRY, type MetricType } from "@shared/metrics";
import { getEngineConfig } from "../config/engineConfig";
import { storage as defaultStorage, type IStorage } from "../storage";
import { createLogger } from "../utils/logger";
import {
  dailyValues,
  enumerateDates,
  shiftDate,
  type DatedValue,
  type ProviderPolicy,
} from "./dailyAggregator";
import { fetchMetricSeries } from "./metricSeries";
import { mean, sampleStdDev } from "./statisticsEngine";

const logger = createLogger('DailySummary');

export const SUMMARY_METRICS: readonly MetricType[] = [
  'steps', 'distance', 'calories', 'active_minutes',
  'sleep_duration', 'sleep_deep', 'sleep_light', 'sleep_rem', 'sleep_awake',
  'sleep_onset', 'sleep_end', 'sleep_score',
  'resting_heart_rate', 'hrv', 'spo2', 'weight',
  'protein', 'carbohydrate', 'fat', 'fiber', 'sodium',
];

// A day is 100% complete when all six are present
export const COMPLETENESS_METRICS: readonly MetricType[] = [
  'calories', 'steps', 'sleep_duration', 'resting_heart_rate', 'hrv', 'sleep_score',
];

export const ANOMALY_METRICS: readonly MetricType[] = [
  'resting_heart_rate', 'hrv', 'sleep_duration', 'steps',
];

export const ANOMALY_BASELINE_DAYS = 28;
const MIN_BASELINE_DAYS = 5;

export interface LocalDateRange {
  start: string;
  end: string;
}

export interface SummaryOptions {
  storage?: IStorage;
  timezone?: string;
  providerPolicy?: ProviderPolicy;
}

export interface DailySummary {
  date: string;
  values: Partial<Record<MetricType, number>>;
  dataCompleteness: number; // 0-100
}

export interface MetricAnomaly {
  date: string;
  metricType: MetricType;
  value: number;
  baselineMean: number;
  baselineStdDev: number;
  zScore: number;
  direction: 'high' | 'low';
}

export interface WeeklyReport {
  weekStart: string;
  weekEnd: string;
  daysWithData: number;
  averages: Partial<Record<MetricType, number>>;
  totals: Partial<Record<MetricType, number>>;
  bests: {
    bestSleepScore: number | null;
    highestHrv: number | null;
    mostSteps: number | null;
  };
}

interface ResolvedContext {
  storage: IStorage;
  timezone: string;
  providerPolicy?: ProviderPolicy;
}

async function resolveContext(userId: string, options: SummaryOptions): Promise<ResolvedContext> {
  const storage = options.storage ?? defaultStorage;
  let timezone = options.timezone;
  if (!timezone) {
    const profile = await storage.getUserProfile(userId);
    timezone = profile?.timezone ?? getEngineConfig().DEFAULT_TIMEZONE;
  }
  return { storage, timezone, providerPolicy: options.providerPolicy };
}

function assertDateRange(range: LocalDateRange): void {
  if (range.end < range.start) {
    throw new Error(`Date range ends (${range.end}) before it starts (${range.start})`);
  }
}

async function loadDailyValues(
  context: ResolvedContext,
  userId: string,
  metricType: MetricType,
  range: LocalDateRange
): Promise<DatedValue[]> {
  const utcRange = {
    start: fromZonedTime(`${range.start}T00:00:00`, context.timezone),
    end: fromZonedTime(`${shiftDate(range.end, 1)}T00:00:00`, context.timezone),
  };
  const series = await fetchMetricSeries(context.storage, userId, metricType, utcRange);
  return dailyValues(series, context.timezone, context.providerPolicy)
    .filter((day) => day.date >= range.start && day.date <= range.end);
}

function completeness(values: Partial<Record<MetricType, number>>): number {
  const filled = COMPLETENESS_METRICS.filter((metricType) => values[metricType] !== undefined).length;
  return Math.floor((filled / COMPLETENESS_METRICS.length) * 100);
}

/** One summary per local date in the range, including days with no data. */
export async function buildDailySummaries(
  userId: string,
  range: LocalDateRange,
  options: SummaryOptions = {}
): Promise<DailySummary[]> {
  assertDateRange(range);
  const context = await resolveContext(userId, options);

  const summaries = new Map<string, DailySummary>(
    enumerateDates(range.start, range.end).map((date) => [date, { date, values: {}, dataCompleteness: 0 }])
  );

  for (const metricType of SUMMARY_METRICS) {
    for (const day of await loadDailyValues(context, userId, metricType, range)) {
      const summary = summaries.get(day.date);
      if (summary) {
        summary.values[metricType] = day.value;
      }
    }
  }

  for (const summary of summaries.values()) {
    summary.dataCompleteness = completeness(summary.values);
  }
  return [...summaries.values()];
}

/**
 * Flag days whose value sits at least `zThreshold` standard deviations from
 * the mean of the preceding 28 days. Days whose baseline has fewer than five
 * values, or no spread, are not judged.
 */
export async function detectAnomalies(
  userId: string,
  range: LocalDateRange,
  zThreshold = 2,
  options: SummaryOptions = {}
): Promise<MetricAnomaly[]> {
  assertDateRange(range);
  if (!(zThreshold > 0)) {
    throw new Error(`zThreshold must be positive, got ${zThreshold}`);
  }
  const context = await resolveContext(userId, options);
  const anomalies: MetricAnomaly[] = [];

  for (const metricType of ANOMALY_METRICS) {
    const daily = await loadDailyValues(context, userId, metricType, {
      start: shiftDate(range.start, -ANOMALY_BASELINE_DAYS),
      end: range.end,
    });

    for (const day of daily) {
      if (day.date < range.start) continue;

      const baselineStart = shiftDate(day.date, -ANOMALY_BASELINE_DAYS);
      const baseline = daily
        .filter((other) => other.date >= baselineStart && other.date < day.date)
        .map((other) => other.value);
      if (baseline.length < MIN_BASELINE_DAYS) continue;

      const baselineStdDev = sampleStdDev(baseline);
      if (baselineStdDev === null || baselineStdDev === 0) continue;

      const baselineMean = mean(baseline);
      const zScore = (day.value - baselineMean) / baselineStdDev;
      if (Math.abs(zScore) >= zThreshold) {
        anomalies.push({
          date: day.date,
          metricType,
          value: day.value,
          baselineMean,
          baselineStdDev,
          zScore,
          direction: zScore > 0 ? 'high' : 'low',
        });
      }
    }
  }

  logger.debug(`Found ${anomalies.length} anomalies for user ${userId}`, { ...range, zThreshold });
  return anomalies.sort((a, b) => a.date.localeCompare(b.date) || a.metricType.localeCompare(b.metricType));
}

function maxOf(summaries: readonly DailySummary[], metricType: MetricType): number | null {
  const values = summaries.flatMap((summary) => {
    const value = summary.values[metricType];
    return value === undefined ? [] : [value];
  });
  return values.length > 0 ? Math.max(...values) : null;
}

/** Monday-to-Sunday report. `weekStart` defaults to the Monday of the current local week. */
export async function generateWeeklyReport(
  userId: string,
  weekStart?: string,
  options: SummaryOptions & { now?: Date } = {}
): Promise<WeeklyReport> {
  const context = await resolveContext(userId, options);
  const start = weekStart ?? format(
    startOfWeek(parseISO(formatInTimeZone(options.now ?? new Date(), context.timezone, 'yyyy-MM-dd')), { weekStartsOn: 1 }),
    'yyyy-MM-dd'
  );
  const end = shiftDate(start, 6);

  const summaries = await buildDailySummaries(userId, { start, end }, { ...options, timezone: context.timezone });
  const withData = summaries.filter((summary) => Object.keys(summary.values).length > 0);

  const averages: Partial<Record<MetricType, number>> = {};
  const totals: Partial<Record<MetricType, number>> = {};
  for (const metricType of SUMMARY_METRICS) {
    const values = withData.flatMap((summary) => {
      const value = summary.values[metricType];
      return value === undefined ? [] : [value];
    });
    if (values.length === 0) continue;
    averages[metricType] = mean(values);
    if (METRIC_REGISTRY[metricType].additive) {
      totals[metricType] = values.reduce((sum, value) => sum + value, 0);
    }
  }

  return {
    weekStart: start,
    weekEnd: end,
    daysWithData: withData.length,
    averages,
    totals,
    bests: {
      bestSleepScore: maxOf(withData, 'sleep_score'),
      highestHrv: maxOf(withData, 'hrv'),
      mostSteps: maxOf(withData, 'steps'),
    },
  };
}

/**
 * Statistics Engine
 *
 * Pure functions over daily aggregates: trailing rolling windows, lagged
 * Pearson correlation with a Fisher-z confidence, the acute:chronic workload
 * ratio and time-of-day consistency.
 */

import { isAdditiveMetric } from "@shared/metrics";
import { InsufficientDataError } from "@shared/domain/errors";
import { dailyValues, enumerateDates, shiftDate, type DatedValue, type ProviderPolicy } from "./dailyAggregator";
import type { MetricSeries } from "./metricSeries";

export type RollingStat = 'mean' | 'stddev' | 'sum' | 'count';

export interface RollingOptions {
  timezone: string;
  providerPolicy?: ProviderPolicy;
}

export function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Sample (n-1) standard deviation; null below two values. */
export function sampleStdDev(values: readonly number[]): number | null {
  if (values.length < 2) {
    return null;
  }
  const avg = mean(values);
  const squared = values.reduce((sum, value) => sum + (value - avg) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

function applyStat(stat: RollingStat, values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  switch (stat) {
    case 'count':
      return values.length;
    case 'sum':
      return values.reduce((sum, value) => sum + value, 0);
    case 'mean':
      return mean(values);
    case 'stddev':
      return sampleStdDev(values);
  }
}

/**
 * Right-aligned trailing windows over calendar days, one output per day of the
 * series span that has enough values for the stat. Missing days contribute
 * nothing, unless `additive`, in which case days inside the span count as zero.
 */
export function rollingDaily(
  daily: readonly DatedValue[],
  windowDays: number,
  stat: RollingStat,
  additive: boolean
): DatedValue[] {
  if (!Number.isInteger(windowDays) || windowDays < 1) {
    throw new RangeError(`windowDays must be a positive integer, got ${windowDays}`);
  }
  if (daily.length === 0) {
    return [];
  }

  const sorted = [...daily].sort((a, b) => a.date.localeCompare(b.date));
  const byDate = new Map(sorted.map((entry) => [entry.date, entry.value]));
  const dates = enumerateDates(sorted[0].date, sorted[sorted.length - 1].date);
  const output: DatedValue[] = [];

  dates.forEach((date, index) => {
    const windowValues: number[] = [];
    for (let j = Math.max(0, index - windowDays + 1); j <= index; j++) {
      const value = byDate.get(dates[j]);
      if (value !== undefined) {
        windowValues.push(value);
      } else if (additive) {
        windowValues.push(0);
      }
    }
    const value = applyStat(stat, windowValues);
    if (value !== null) {
      output.push({ date, value });
    }
  });

  return output;
}

export function rolling(
  series: MetricSeries,
  windowDays: number,
  stat: RollingStat,
  options: RollingOptions
): DatedValue[] {
  const daily = dailyValues(series, options.timezone, options.providerPolicy);
  return rollingDaily(daily, windowDays, stat, isAdditiveMetric(series.metricType));
}

/**
 * Pearson correlation of two equal-length samples. Throws InsufficientDataError
 * below two pairs or when either side has no variance.
 */
export function pearsonCorrelation(x: readonly number[], y: readonly number[]): number {
  if (x.length !== y.length) {
    throw new RangeError(`Sample lengths differ (${x.length} vs ${y.length})`);
  }
  const n = x.length;
  if (n < 2) {
    throw new InsufficientDataError(`Need at least 2 paired samples, got ${n}`, n);
  }

  const meanX = mean(x);
  const meanY = mean(y);
  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  for (let i = 0; i < n; i++) {
    const dx = x[i] - meanX;
    const dy = y[i] - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }

  if (varianceX === 0 || varianceY === 0) {
    throw new InsufficientDataError('One of the series has zero variance', n);
  }
  const r = covariance / Math.sqrt(varianceX * varianceY);
  return Math.max(-1, Math.min(1, r));
}

export interface LaggedCorrelation {
  coefficient: number;
  sampleCount: number;
  lagDays: number;
  windowStart: string;
  windowEnd: string;
}

/**
 * Pearson correlation of A at day d with B at day d + lagDays, for effect days
 * in the trailing window of `windowDays` ending at `windowEnd` (default: the
 * last day of B).
 */
export function laggedCorrelation(
  seriesA: readonly DatedValue[],
  seriesB: readonly DatedValue[],
  lagDays: number,
  windowDays: number,
  windowEnd?: string
): LaggedCorrelation {
  if (!Number.isInteger(lagDays) || lagDays < 0) {
    throw new RangeError(`lagDays must be a non-negative integer, got ${lagDays}`);
  }
  const lastB = seriesB.reduce<string | undefined>(
    (latest, entry) => (latest === undefined || entry.date > latest ? entry.date : latest),
    undefined
  );
  const end = windowEnd ?? lastB;
  if (end === undefined) {
    throw new InsufficientDataError('Effect series is empty', 0);
  }
  const start = shiftDate(end, -(windowDays - 1));

  const aByDate = new Map(seriesA.map((entry) => [entry.date, entry.value]));
  const xs: number[] = [];
  const ys: number[] = [];
  for (const entry of seriesB) {
    if (entry.date < start || entry.date > end) continue;
    const predicate = aByDate.get(shiftDate(entry.date, -lagDays));
    if (predicate === undefined) continue;
    xs.push(predicate);
    ys.push(entry.value);
  }

  return {
    coefficient: pearsonCorrelation(xs, ys),
    sampleCount: xs.length,
    lagDays,
    windowStart: start,
    windowEnd: end,
  };
}

/**
 * Standard normal CDF via the Abramowitz & Stegun 7.1.26 erf approximation
 * (absolute error below 1.5e-7).
 */
export function normalCDF(x: number): number {
  const a1 = 0.254829592;
  const a2 = -0.284496736;
  const a3 = 1.421413741;
  const a4 = -1.453152027;
  const a5 = 1.061405429;
  const p = 0.3275911;
  const sign = x < 0 ? -1 : 1;
  const z = Math.abs(x) / Math.SQRT2;
  const t = 1.0 / (1.0 + p * z);
  const erf = 1.0 - ((((a5 * t + a4) * t + a3) * t + a2) * t + a1) * t * Math.exp(-z * z);
  return 0.5 * (1.0 + sign * erf);
}

const MAX_ABS_R = 1 - 1e-12;

/**
 * Two-sided confidence that r differs from zero, from the Fisher transform:
 * 2 * Phi(atanh|r| * sqrt(n - 3)) - 1. Zero for n <= 3.
 */
export function correlationConfidence(r: number, sampleCount: number): number {
  if (sampleCount <= 3 || !Number.isFinite(r)) {
    return 0;
  }
  const z = Math.atanh(Math.min(Math.abs(r), MAX_ABS_R)) * Math.sqrt(sampleCount - 3);
  return Math.max(0, Math.min(1, 2 * normalCDF(z) - 1));
}

export type WorkloadBand = 'detraining' | 'sweet_spot' | 'elevated_risk' | 'high_risk';

export interface WorkloadRatio {
  acuteLoad: number; // last 7 days
  chronicWeeklyAverage: number; // last 28 days / 4
  ratio: number;
  band: WorkloadBand;
}

export function classifyWorkloadRatio(ratio: number): WorkloadBand {
  if (ratio < 0.8) return 'detraining';
  if (ratio <= 1.3) return 'sweet_spot';
  if (ratio <= 1.5) return 'elevated_risk';
  return 'high_risk';
}

/**
 * Acute:chronic workload ratio ending at `endDate`. Days without data count
 * as zero load.
 */
export function acuteChronicWorkloadRatio(daily: readonly DatedValue[], endDate: string): WorkloadRatio {
  const byDate = new Map(daily.map((entry) => [entry.date, entry.value]));
  const loadOver = (days: number) =>
    enumerateDates(shiftDate(endDate, -(days - 1)), endDate)
      .reduce((sum, date) => sum + (byDate.get(date) ?? 0), 0);

  const acuteLoad = loadOver(7);
  const chronicWeeklyAverage = loadOver(28) / 4;
  if (chronicWeeklyAverage === 0) {
    throw new InsufficientDataError('No load recorded in the chronic window', 0);
  }
  const ratio = acuteLoad / chronicWeeklyAverage;
  return { acuteLoad, chronicWeeklyAverage, ratio, band: classifyWorkloadRatio(ratio) };
}

export interface TimeOfDayConsistency {
  meanOffsetSeconds: number;
  stdDevMinutes: number;
  consistent: boolean;
}

/**
 * Spread of clock-time offsets (seconds from local midnight, as stored for
 * sleep onset and wake). Consistent when the sample standard deviation is
 * under the threshold.
 */
export function timeOfDayConsistency(
  clockOffsetsSeconds: readonly number[],
  thresholdMinutes = 30
): TimeOfDayConsistency {
  const stdDevSeconds = sampleStdDev(clockOffsetsSeconds);
  if (stdDevSeconds === null) {
    throw new InsufficientDataError('Need at least 2 nights to measure consistency', clockOffsetsSeconds.length);
  }
  const stdDevMinutes = stdDevSeconds / 60;
  return {
    meanOffsetSeconds: mean(clockOffsetsSeconds),
    stdDevMinutes,
    consistent: stdDevMinutes < thresholdMinutes,
  };
}

import { addDays, differenceInCalendarDays, format, parseISO } from "date-fns";
import { formatInTimeZone } from "date-fns-tz";
import type { DataSource } from "@shared/dataSource";
import { METRIC_REGISTRY } from "@shared/metrics";
import type { MetricSeries } from "./metricSeries";

/** One calendar day's value, keyed by local date (YYYY-MM-DD). */
export interface DatedValue {
  date: string;
  value: number;
}

/**
 * How samples from several providers for the same day are reconciled.
 * - average: mean of each provider's daily value
 * - preferred: the first provider in the list that has data for the day,
 *   falling back to the average of the others
 */
export type ProviderPolicy =
  | { kind: 'average' }
  | { kind: 'preferred'; order: readonly DataSource[] };

export const DEFAULT_PROVIDER_POLICY: ProviderPolicy = { kind: 'average' };

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

interface ProviderDay {
  totals: number[];
  samples: number[];
}

/**
 * Collapse a series into one value per local calendar day. Each provider's
 * samples are first summed or averaged according to the metric, then the
 * provider values are reconciled by the policy. A provider's own daily total
 * replaces its intraday samples for that day.
 */
export function dailyValues(
  series: MetricSeries,
  timezone: string,
  policy: ProviderPolicy = DEFAULT_PROVIDER_POLICY
): DatedValue[] {
  const aggregation = METRIC_REGISTRY[series.metricType].aggregation;
  const byDay = new Map<string, Map<DataSource, ProviderDay>>();

  for (const point of series.points) {
    const date = formatInTimeZone(point.recordedAt, timezone, 'yyyy-MM-dd');
    let providers = byDay.get(date);
    if (!providers) {
      providers = new Map();
      byDay.set(date, providers);
    }
    const providerDay = providers.get(point.provider) ?? { totals: [], samples: [] };
    (point.dailyTotal ? providerDay.totals : providerDay.samples).push(point.value);
    providers.set(point.provider, providerDay);
  }

  const result: DatedValue[] = [];
  for (const [date, providers] of byDay) {
    const providerValues = new Map<DataSource, number>();
    for (const [provider, providerDay] of providers) {
      const samples = providerDay.totals.length > 0 ? providerDay.totals : providerDay.samples;
      providerValues.set(
        provider,
        aggregation === 'sum' ? samples.reduce((sum, value) => sum + value, 0) : mean(samples)
      );
    }

    const preferred = policy.kind === 'preferred'
      ? policy.order.find((provider) => providerValues.has(provider))
      : undefined;
    const preferredValue = preferred !== undefined ? providerValues.get(preferred) : undefined;
    result.push({ date, value: preferredValue ?? mean([...providerValues.values()]) });
  }

  return result.sort((a, b) => a.date.localeCompare(b.date));
}

export function shiftDate(date: string, days: number): string {
  return format(addDays(parseISO(date), days), 'yyyy-MM-dd');
}

export function daysBetween(from: string, to: string): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from));
}

/** Every date from `start` to `end`, inclusive. */
export function enumerateDates(start: string, end: string): string[] {
  const span = daysBetween(start, end);
  const dates: string[] = [];
  for (let offset = 0; offset <= span; offset++) {
    dates.push(shiftDate(start, offset));
  }
  return dates;
}

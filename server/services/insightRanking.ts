/**
 * Insight Ranking & Selection
 *
 * Orders insight results by confidence (descending), then by window recency.
 * De-duplication keeps one result per rule per overlapping window: the
 * highest-confidence one. An optional diversity cap limits how many results
 * share a metric category, so a feed is not five sleep insights in a row.
 */

import type { InsightResult } from "@shared/schema";
import { METRIC_REGISTRY, type MetricCategory } from "@shared/metrics";
import type { InsightRule } from "../config/insightRules";

export interface SelectionOptions {
  maxTotal?: number;
  maxPerCategory?: number;
  categoryOf?: (result: InsightResult) => MetricCategory | undefined;
}

type RankableResult = Pick<InsightResult, 'ruleId' | 'confidence' | 'windowStart' | 'windowEnd'>;

export function compareInsightResults(a: RankableResult, b: RankableResult): number {
  if (b.confidence !== a.confidence) {
    return b.confidence - a.confidence;
  }
  // YYYY-MM-DD compares lexically; later windows first
  if (a.windowEnd !== b.windowEnd) {
    return a.windowEnd < b.windowEnd ? 1 : -1;
  }
  return a.ruleId.localeCompare(b.ruleId);
}

export function windowsOverlap(a: RankableResult, b: RankableResult): boolean {
  return a.windowStart <= b.windowEnd && b.windowStart <= a.windowEnd;
}

/** Rank and de-duplicate. Stable for equal keys. */
export function rankInsightResults<T extends RankableResult>(results: readonly T[]): T[] {
  const sorted = [...results].sort(compareInsightResults);
  const kept: T[] = [];
  for (const result of sorted) {
    const duplicate = kept.some((other) => other.ruleId === result.ruleId && windowsOverlap(other, result));
    if (!duplicate) {
      kept.push(result);
    }
  }
  return kept;
}

/** Category of a result's effect metric, looked up through its rule. */
export function effectCategoryResolver(
  rules: readonly InsightRule[]
): (result: InsightResult) => MetricCategory | undefined {
  const byId = new Map(rules.map((rule) => [rule.ruleId, METRIC_REGISTRY[rule.effectMetric].category]));
  return (result) => byId.get(result.ruleId);
}

/**
 * Apply total and per-category caps to an already-ranked list.
 * Results whose category is unknown are never capped by category.
 */
export function selectTopInsights(
  ranked: readonly InsightResult[],
  options: SelectionOptions = {}
): InsightResult[] {
  const { maxTotal = Number.POSITIVE_INFINITY, maxPerCategory, categoryOf } = options;
  const selected: InsightResult[] = [];
  const categoryCounts = new Map<MetricCategory, number>();

  for (const result of ranked) {
    if (selected.length >= maxTotal) {
      break;
    }
    const category = categoryOf?.(result);
    if (category !== undefined && maxPerCategory !== undefined) {
      const currentCount = categoryCounts.get(category) ?? 0;
      if (currentCount >= maxPerCategory) {
        continue;
      }
      categoryCounts.set(category, currentCount + 1);
    }
    selected.push(result);
  }

  return selected;
}

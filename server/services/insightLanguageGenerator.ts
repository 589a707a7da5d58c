/**
 * Natural Language Generation for Insights
 *
 * Fills a rule's template with everyday wording for the effect found:
 * magnitude (small, moderate, strong), direction and lag.
 */

import { getMetricDisplayName } from "@shared/metrics";
import type { InsightRule } from "../config/insightRules";

/**
 * Convert effect size to natural language magnitude
 *
 * @param effectSize - Correlation coefficient (sign ignored)
 */
export function describeEffectMagnitude(effectSize: number): string {
  const absEffect = Math.abs(effectSize);

  if (absEffect >= 0.60) {
    return 'strong';
  } else if (absEffect >= 0.45) {
    return 'moderate to strong';
  } else if (absEffect >= 0.35) {
    return 'moderate';
  } else if (absEffect >= 0.25) {
    return 'small to moderate';
  } else {
    return 'small';
  }
}

export function describeDirection(effectSize: number): 'higher' | 'lower' {
  return effectSize >= 0 ? 'higher' : 'lower';
}

export function describeLag(lagDays: number): string {
  if (lagDays === 0) return 'the same day';
  if (lagDays === 1) return 'the next day';
  return `${lagDays} days later`;
}

export interface InsightFinding {
  effectSize: number;
  lagDays: number;
  confidence: number; // 0.0-1.0
  sampleCount: number;
}

/**
 * Render a rule's template. Unknown placeholders are left as written so a
 * typo in a template shows up in the output rather than vanishing.
 */
export function renderInsightText(rule: InsightRule, finding: InsightFinding): string {
  const values: Record<string, string> = {
    predicate: getMetricDisplayName(rule.predicateMetric).toLowerCase(),
    effect: getMetricDisplayName(rule.effectMetric).toLowerCase(),
    direction: describeDirection(finding.effectSize),
    magnitude: describeEffectMagnitude(finding.effectSize),
    lagPhrase: describeLag(finding.lagDays),
    r: finding.effectSize.toFixed(2),
    confidence: String(Math.round(finding.confidence * 100)),
    n: String(finding.sampleCount),
  };

  return rule.template.replace(/\{(\w+)\}/g, (placeholder: string, key: string) => values[key] ?? placeholder);
}

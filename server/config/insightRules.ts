import { z } from "zod";
import { metricTypeSchema } from "@shared/schema";

/**
 * Correlation rules evaluated each insight cycle. Each rule pairs a behaviour
 * (predicate) with an outcome (effect) and searches lags 0..maxLagDays.
 *
 * Template placeholders: {predicate} {effect} {direction} {magnitude}
 * {lagPhrase} {r} {confidence} {n}
 */

const insightRuleSchema = z.object({
  ruleId: z.string().regex(/^[a-z0-9_]+$/),
  predicateMetric: metricTypeSchema,
  effectMetric: metricTypeSchema,
  windowDays: z.number().int().min(7).max(365),
  maxLagDays: z.number().int().min(0).max(14),
  minSamples: z.number().int().min(4), // Fisher confidence is zero at n <= 3
  significanceThreshold: z.number().gt(0).lt(1),
  template: z.string().min(1),
  smoothingDays: z.number().int().min(1).default(1),
  predicateStat: z.enum(['mean', 'sum']).default('mean'),
  effectStat: z.enum(['mean', 'sum']).default('mean'),
}).refine(
  (rule) => rule.predicateMetric !== rule.effectMetric || rule.maxLagDays > 0,
  { message: 'A metric can only be correlated with itself at a lag' }
);

export type InsightRuleInput = z.input<typeof insightRuleSchema>;
export type InsightRule = Readonly<z.infer<typeof insightRuleSchema>>;

export function parseInsightRules(input: readonly unknown[]): readonly InsightRule[] {
  const rules = input.map((rule, index) => {
    const parsed = insightRuleSchema.safeParse(rule);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'rule'}: ${issue.message}`);
      throw new Error(`Invalid insight rule at index ${index}: ${issues.join('; ')}`);
    }
    return Object.freeze(parsed.data);
  });

  const seen = new Set<string>();
  for (const rule of rules) {
    if (seen.has(rule.ruleId)) {
      throw new Error(`Duplicate insight rule id "${rule.ruleId}"`);
    }
    seen.add(rule.ruleId);
  }
  return Object.freeze(rules);
}

const RULE_DEFINITIONS: InsightRuleInput[] = [
  {
    ruleId: 'bedtime_resting_hr',
    predicateMetric: 'sleep_onset',
    effectMetric: 'resting_heart_rate',
    windowDays: 60,
    maxLagDays: 1,
    minSamples: 14,
    significanceThreshold: 0.9,
    template: 'Later bedtimes go with {direction} {effect} {lagPhrase} ({magnitude} link, r = {r}, {confidence}% confidence over {n} nights).',
  },
  {
    ruleId: 'steps_sleep_duration',
    predicateMetric: 'steps',
    effectMetric: 'sleep_duration',
    windowDays: 60,
    maxLagDays: 1,
    minSamples: 14,
    significanceThreshold: 0.9,
    template: 'More {predicate} goes with {direction} {effect} {lagPhrase} ({magnitude} link, r = {r}, {confidence}% confidence over {n} days).',
  },
  {
    ruleId: 'sleep_duration_hrv',
    predicateMetric: 'sleep_duration',
    effectMetric: 'hrv',
    windowDays: 60,
    maxLagDays: 1,
    minSamples: 14,
    significanceThreshold: 0.9,
    template: 'Longer sleep goes with {direction} {effect} {lagPhrase} ({magnitude} link, r = {r}, {confidence}% confidence over {n} nights).',
  },
  {
    ruleId: 'protein_deep_sleep',
    predicateMetric: 'protein',
    effectMetric: 'sleep_deep',
    windowDays: 60,
    maxLagDays: 1,
    minSamples: 14,
    significanceThreshold: 0.9,
    template: 'Higher {predicate} intake goes with {direction} {effect} {lagPhrase} ({magnitude} link, r = {r}, {confidence}% confidence over {n} days).',
  },
  {
    ruleId: 'active_time_resting_hr',
    predicateMetric: 'active_minutes',
    effectMetric: 'resting_heart_rate',
    windowDays: 90,
    maxLagDays: 3,
    minSamples: 21,
    significanceThreshold: 0.9,
    smoothingDays: 3,
    predicateStat: 'sum',
    template: 'More {predicate} over three days goes with {direction} {effect} {lagPhrase} ({magnitude} link, r = {r}, {confidence}% confidence over {n} days).',
  },
  {
    ruleId: 'calories_hrv',
    predicateMetric: 'calories',
    effectMetric: 'hrv',
    windowDays: 60,
    maxLagDays: 2,
    minSamples: 14,
    significanceThreshold: 0.9,
    template: 'Higher {predicate} burned goes with {direction} {effect} {lagPhrase} ({magnitude} link, r = {r}, {confidence}% confidence over {n} days).',
  },
];

export const INSIGHT_RULES: readonly InsightRule[] = parseInsightRules(RULE_DEFINITIONS);

export function getInsightRule(ruleId: string): InsightRule | undefined {
  return INSIGHT_RULES.find((rule) => rule.ruleId === ruleId);
}

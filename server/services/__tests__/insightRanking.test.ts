import { describe, it, expect } from 'vitest';
import type { InsightResult } from '@shared/schema';
import type { MetricCategory } from '@shared/metrics';
import { INSIGHT_RULES, getInsightRule, parseInsightRules } from '../../config/insightRules';
import { MemStorage } from '../../memStorage';
import { queryInsightFeed } from '../insightFeed';
import { describeDirection, describeEffectMagnitude, describeLag, renderInsightText } from '../insightLanguageGenerator';
import {
  compareInsightResults,
  effectCategoryResolver,
  rankInsightResults,
  selectTopInsights,
  windowsOverlap,
} from '../insightRanking';
import { insightResult } from './helpers';

function stored(id: string, overrides: Partial<InsightResult> & Pick<InsightResult, 'ruleId'>): InsightResult {
  return { ...insightResult(overrides), id };
}

describe('rankInsightResults', () => {
  it('orders by confidence, then recency, then rule id', () => {
    const sameWindowA = stored('a', { ruleId: 'rule_a', confidence: 0.9 });
    const sameWindowB = stored('b', { ruleId: 'rule_b', confidence: 0.9 });
    const newer = stored('c', { ruleId: 'rule_c', confidence: 0.9, windowStart: '2024-01-10', windowEnd: '2024-03-10' });

    expect(compareInsightResults(sameWindowA, sameWindowB)).toBeLessThan(0);
    expect(rankInsightResults([sameWindowB, sameWindowA, newer]).map((result) => result.id)).toEqual(['c', 'a', 'b']);
  });

  it('keeps only the most confident result per rule among overlapping windows', () => {
    const results = [
      stored('a', { ruleId: 'r1', confidence: 0.95 }),
      stored('b', { ruleId: 'r2', confidence: 0.99 }),
      stored('c', { ruleId: 'r3', confidence: 0.95, windowStart: '2024-01-10', windowEnd: '2024-03-10' }),
      stored('d', { ruleId: 'r1', confidence: 0.91, windowStart: '2024-02-01', windowEnd: '2024-03-30' }),
      stored('e', { ruleId: 'r1', confidence: 0.9, windowStart: '2023-01-01', windowEnd: '2023-02-28' }),
    ];

    expect(rankInsightResults(results).map((result) => result.id)).toEqual(['b', 'c', 'a', 'e']);
  });

  it('treats windows sharing a day as overlapping', () => {
    const january = { ruleId: 'r1', confidence: 0.9, windowStart: '2024-01-01', windowEnd: '2024-01-31' };
    expect(windowsOverlap(january, { ...january, windowStart: '2024-01-31', windowEnd: '2024-02-28' })).toBe(true);
    expect(windowsOverlap(january, { ...january, windowStart: '2024-02-01', windowEnd: '2024-02-28' })).toBe(false);
  });
});

describe('selectTopInsights', () => {
  const categories: Record<string, MetricCategory> = { sleep_1: 'sleep', sleep_2: 'sleep', heart_1: 'heart' };
  const ranked = ['sleep_1', 'sleep_2', 'heart_1', 'other_1', 'other_2']
    .map((ruleId) => stored(ruleId, { ruleId }));

  it('caps each category and the total', () => {
    const selected = selectTopInsights(ranked, {
      maxTotal: 3,
      maxPerCategory: 1,
      categoryOf: (result) => categories[result.ruleId],
    });
    expect(selected.map((result) => result.ruleId)).toEqual(['sleep_1', 'heart_1', 'other_1']);
  });

  it('passes everything through without caps', () => {
    expect(selectTopInsights(ranked)).toHaveLength(5);
  });

  it('resolves categories from the effect metric of each rule', () => {
    const categoryOf = effectCategoryResolver(INSIGHT_RULES);
    expect(categoryOf(stored('x', { ruleId: 'steps_sleep_duration' }))).toBe('sleep');
    expect(categoryOf(stored('y', { ruleId: 'calories_hrv' }))).toBe('heart');
    expect(categoryOf(stored('z', { ruleId: 'retired_rule' }))).toBeUndefined();
  });
});

describe('queryInsightFeed', () => {
  async function seededStorage(): Promise<MemStorage> {
    const storage = new MemStorage();
    const confidences: Array<[string, number]> = [
      ['steps_sleep_duration', 0.97],
      ['sleep_duration_hrv', 0.96],
      ['protein_deep_sleep', 0.95],
      ['calories_hrv', 0.93],
      ['bedtime_resting_hr', 0.92],
    ];
    await storage.replaceInsightResults(
      'user-1',
      confidences.map(([ruleId]) => ruleId),
      confidences.map(([ruleId, confidence]) => insightResult({ ruleId, confidence }))
    );
    return storage;
  }

  it('returns every current insight in rank order', async () => {
    const feed = await queryInsightFeed('user-1', { storage: await seededStorage() });
    expect(feed.map((result) => result.ruleId)).toEqual([
      'steps_sleep_duration',
      'sleep_duration_hrv',
      'protein_deep_sleep',
      'calories_hrv',
      'bedtime_resting_hr',
    ]);
  });

  it('applies the limit and category cap', async () => {
    const storage = await seededStorage();
    expect((await queryInsightFeed('user-1', { storage, limit: 3 })).map((result) => result.ruleId))
      .toEqual(['steps_sleep_duration', 'sleep_duration_hrv', 'protein_deep_sleep']);
    expect((await queryInsightFeed('user-1', { storage, maxPerCategory: 1 })).map((result) => result.ruleId))
      .toEqual(['steps_sleep_duration', 'sleep_duration_hrv']);
  });

  it('is empty for a user without results', async () => {
    expect(await queryInsightFeed('user-2', { storage: await seededStorage() })).toEqual([]);
  });
});

describe('insight language', () => {
  it('describes magnitude, direction and lag', () => {
    expect([0.6, -0.5, 0.35, 0.25, 0.1].map(describeEffectMagnitude))
      .toEqual(['strong', 'moderate to strong', 'moderate', 'small to moderate', 'small']);
    expect(describeDirection(-0.3)).toBe('lower');
    expect(describeDirection(0)).toBe('higher');
    expect([0, 1, 3].map(describeLag)).toEqual(['the same day', 'the next day', '3 days later']);
  });

  it('renders a rule template', () => {
    const rule = getInsightRule('bedtime_resting_hr');
    expect(rule).toBeDefined();
    if (!rule) return;

    expect(renderInsightText(rule, { effectSize: 0.52, lagDays: 1, confidence: 0.934, sampleCount: 42 })).toBe(
      'Later bedtimes go with higher resting heart rate the next day (moderate to strong link, r = 0.52, 93% confidence over 42 nights).'
    );
  });

  it('leaves unknown placeholders in place', () => {
    const [rule] = parseInsightRules([{
      ruleId: 'typo_rule',
      predicateMetric: 'steps',
      effectMetric: 'hrv',
      windowDays: 30,
      maxLagDays: 0,
      minSamples: 10,
      significanceThreshold: 0.9,
      template: '{predicte} moved {effect} by r = {r}',
    }]);

    expect(renderInsightText(rule, { effectSize: -0.3, lagDays: 0, confidence: 0.95, sampleCount: 30 }))
      .toBe('{predicte} moved hrv by r = -0.30');
  });
});

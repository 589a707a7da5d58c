/**
 * Correlation/Insight Engine
 *
 * One evaluation cycle for one user: read a snapshot of every series the
 * rules need, then evaluate each rule across lags 0..maxLagDays and keep the
 * strongest significant lag. The cycle runs under an execution budget and
 * stops at the next checkpoint when its AbortSignal fires.
 *
 * Outcomes:
 * - completed: every rule's results replace the previous ones
 * - timed_out: rules finished before the budget ran out are written; the
 *   rule in progress and the rest keep their previous results
 * - cancelled: nothing is written
 */

import { setImmediate as yieldToEventLoop } from "timers/promises";
import { formatInTimeZone } from "date-fns-tz";
import { subDays } from "date-fns";
import type { InsertInsightResult } from "@shared/schema";
import { isAdditiveMetric, type MetricType } from "@shared/metrics";
import { CancellationError, InsufficientDataError, TimeoutError } from "@shared/domain/errors";
import { INSIGHT_RULES, type InsightRule } from "../config/insightRules";
import { getEngineConfig } from "../config/engineConfig";
import type { IStorage } from "../storage";
import { createLogger } from "../utils/logger";
import { dailyValues, type DatedValue, type ProviderPolicy } from "./dailyAggregator";
import { fetchMetricSeries } from "./metricSeries";
import { correlationConfidence, laggedCorrelation, rollingDaily, type LaggedCorrelation } from "./statisticsEngine";
import { renderInsightText } from "./insightLanguageGenerator";

const logger = createLogger('InsightEngine');

export type EvaluationStatus = 'completed' | 'timed_out' | 'cancelled';

export interface InsightEvaluationOptions {
  storage: IStorage;
  rules?: readonly InsightRule[];
  budgetMs?: number;
  signal?: AbortSignal;
  timezone?: string;
  providerPolicy?: ProviderPolicy;
  now?: Date;
  clock?: () => number; // monotonic milliseconds
  onRuleEvaluated?: (ruleId: string, result: InsertInsightResult | null) => void;
}

export interface InsightEvaluationOutcome {
  userId: string;
  status: EvaluationStatus;
  results: InsertInsightResult[];
  completedRuleIds: string[];
  elapsedMs: number;
}

/** Unit of work for one user's cycle. Single use. */
export class InsightEvaluationTask {
  private readonly rules: readonly InsightRule[];
  private readonly budgetMs: number;
  private readonly clock: () => number;
  private deadline = 0;
  private started = false;

  constructor(
    readonly userId: string,
    private readonly options: InsightEvaluationOptions
  ) {
    this.rules = options.rules ?? INSIGHT_RULES;
    this.budgetMs = options.budgetMs ?? getEngineConfig().INSIGHT_BUDGET_MS;
    this.clock = options.clock ?? (() => performance.now());
  }

  private checkpoint(): void {
    if (this.options.signal?.aborted) {
      throw new CancellationError(`Evaluation for user ${this.userId} was cancelled`);
    }
    if (this.clock() > this.deadline) {
      throw new TimeoutError(this.budgetMs);
    }
  }

  async run(): Promise<InsightEvaluationOutcome> {
    if (this.started) {
      throw new Error('InsightEvaluationTask instances are single use');
    }
    this.started = true;

    const startedAt = this.clock();
    this.deadline = startedAt + this.budgetMs;
    const now = this.options.now ?? new Date();
    const completedRuleIds: string[] = [];
    const results: InsertInsightResult[] = [];

    const finish = (status: EvaluationStatus): InsightEvaluationOutcome => ({
      userId: this.userId,
      status,
      results: status === 'cancelled' ? [] : results,
      completedRuleIds: status === 'cancelled' ? [] : completedRuleIds,
      elapsedMs: this.clock() - startedAt,
    });

    try {
      const timezone = this.options.timezone ?? await this.resolveTimezone();
      const windowEnd = formatInTimeZone(now, timezone, 'yyyy-MM-dd');
      const daily = await this.readSnapshot(now, timezone);

      for (const rule of this.rules) {
        this.checkpoint();
        const result = this.evaluateRule(rule, daily, windowEnd, now);
        completedRuleIds.push(rule.ruleId);
        if (result) {
          results.push(result);
        }
        this.options.onRuleEvaluated?.(rule.ruleId, result);
        await yieldToEventLoop();
      }
    } catch (error) {
      if (error instanceof CancellationError) {
        logger.info(`Cycle for user ${this.userId} cancelled after ${completedRuleIds.length} rules; nothing written`);
        return finish('cancelled');
      }
      if (error instanceof TimeoutError) {
        logger.warn(`Cycle for user ${this.userId} hit its ${this.budgetMs}ms budget after ${completedRuleIds.length} rules`);
        await this.options.storage.replaceInsightResults(this.userId, completedRuleIds, results);
        return finish('timed_out');
      }
      throw error;
    }

    await this.options.storage.replaceInsightResults(this.userId, completedRuleIds, results);
    logger.info(`Cycle for user ${this.userId} produced ${results.length} insights from ${completedRuleIds.length} rules`);
    return finish('completed');
  }

  private async resolveTimezone(): Promise<string> {
    const profile = await this.options.storage.getUserProfile(this.userId);
    return profile?.timezone ?? getEngineConfig().DEFAULT_TIMEZONE;
  }

  /** Read every metric the rules need once, before any rule runs. */
  private async readSnapshot(now: Date, timezone: string): Promise<Map<MetricType, DatedValue[]>> {
    const lookbackDays = Math.max(
      0,
      ...this.rules.map((rule) => rule.windowDays + rule.maxLagDays + rule.smoothingDays)
    ) + 1;
    const range = { start: subDays(now, lookbackDays), end: now };

    const metrics = new Set<MetricType>();
    for (const rule of this.rules) {
      metrics.add(rule.predicateMetric);
      metrics.add(rule.effectMetric);
    }

    const daily = new Map<MetricType, DatedValue[]>();
    for (const metricType of metrics) {
      this.checkpoint();
      const series = await fetchMetricSeries(this.options.storage, this.userId, metricType, range);
      daily.set(metricType, dailyValues(series, timezone, this.options.providerPolicy));
    }
    return daily;
  }

  private evaluateRule(
    rule: InsightRule,
    daily: Map<MetricType, DatedValue[]>,
    windowEnd: string,
    now: Date
  ): InsertInsightResult | null {
    const predicate = rollingDaily(
      daily.get(rule.predicateMetric) ?? [],
      rule.smoothingDays,
      rule.predicateStat,
      isAdditiveMetric(rule.predicateMetric)
    );
    const effect = rollingDaily(
      daily.get(rule.effectMetric) ?? [],
      rule.smoothingDays,
      rule.effectStat,
      isAdditiveMetric(rule.effectMetric)
    );

    let best: (LaggedCorrelation & { confidence: number }) | null = null;
    for (let lag = 0; lag <= rule.maxLagDays; lag++) {
      this.checkpoint();
      if (lag === 0 && rule.predicateMetric === rule.effectMetric) continue;

      let correlation: LaggedCorrelation;
      try {
        correlation = laggedCorrelation(predicate, effect, lag, rule.windowDays, windowEnd);
      } catch (error) {
        if (error instanceof InsufficientDataError) continue;
        throw error;
      }

      if (correlation.sampleCount < rule.minSamples) continue;
      const confidence = correlationConfidence(correlation.coefficient, correlation.sampleCount);
      if (confidence < rule.significanceThreshold) continue;

      if (!best || Math.abs(correlation.coefficient) > Math.abs(best.coefficient)) {
        best = { ...correlation, confidence };
      }
    }

    if (!best) {
      logger.debug(`Rule ${rule.ruleId} produced no significant lag for user ${this.userId}`);
      return null;
    }

    return {
      ruleId: rule.ruleId,
      userId: this.userId,
      windowStart: best.windowStart,
      windowEnd: best.windowEnd,
      lagDays: best.lagDays,
      effectSize: best.coefficient,
      confidence: best.confidence,
      sampleCount: best.sampleCount,
      renderedText: renderInsightText(rule, {
        effectSize: best.coefficient,
        lagDays: best.lagDays,
        confidence: best.confidence,
        sampleCount: best.sampleCount,
      }),
      computedAt: now,
    };
  }
}

export function evaluateUserInsights(
  userId: string,
  options: InsightEvaluationOptions
): Promise<InsightEvaluationOutcome> {
  return new InsightEvaluationTask(userId, options).run();
}

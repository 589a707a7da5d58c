/**
 * Timezone-aware insights scheduler
 *
 * Ticks on a cron expression (hourly by default) and starts a user's
 * evaluation cycle when it is INSIGHT_RUN_HOUR in the user's timezone.
 * On start, a catch-up pass runs cycles for users who are past the run hour
 * and have no results computed today.
 *
 * At most one cycle runs per user. Each running cycle holds an
 * AbortController so it can be cancelled (user deletion, shutdown).
 */

import cron, { type ScheduledTask } from 'node-cron';
import { formatInTimeZone } from 'date-fns-tz';
import type { UserProfile } from '@shared/schema';
import { getEngineConfig } from '../config/engineConfig';
import { storage as defaultStorage, type IStorage } from '../storage';
import { createLogger } from '../utils/logger';
import {
  evaluateUserInsights,
  type InsightEvaluationOptions,
  type InsightEvaluationOutcome,
} from './insightEngine';

const logger = createLogger('InsightsScheduler');

const STARTUP_CATCH_UP_DELAY_MS = 10_000;

export type EvaluateFn = (userId: string, options: InsightEvaluationOptions) => Promise<InsightEvaluationOutcome>;

export interface InsightsSchedulerOptions {
  storage?: IStorage;
  runHour?: number;
  cronExpression?: string;
  budgetMs?: number;
  evaluate?: EvaluateFn;
}

export interface SchedulerRunSummary {
  eligible: number;
  completed: number;
  timedOut: number;
  cancelled: number;
  skipped: number;
  failed: number;
}

interface InFlightEvaluation {
  controller: AbortController;
  done: Promise<void>;
}

function localHour(timezone: string, at: Date): number | null {
  try {
    return Number.parseInt(formatInTimeZone(at, timezone, 'HH'), 10);
  } catch (error) {
    logger.error(`Invalid timezone: ${timezone}`, error);
    return null;
  }
}

export class InsightsScheduler {
  private readonly storage: IStorage;
  private readonly runHour: number;
  private readonly cronExpression: string;
  private readonly budgetMs: number | undefined;
  private readonly evaluate: EvaluateFn;
  private readonly inFlight = new Map<string, InFlightEvaluation>();
  private readonly deletions = new Map<string, number>();
  private cronTask: ScheduledTask | null = null;
  private catchUpTimer: NodeJS.Timeout | null = null;

  constructor(options: InsightsSchedulerOptions = {}) {
    const config = getEngineConfig();
    this.storage = options.storage ?? defaultStorage;
    this.runHour = options.runHour ?? config.INSIGHT_RUN_HOUR;
    this.cronExpression = options.cronExpression ?? config.INSIGHT_CRON;
    this.budgetMs = options.budgetMs;
    this.evaluate = options.evaluate ?? evaluateUserInsights;
  }

  isDue(timezone: string, now: Date): boolean {
    return localHour(timezone, now) === this.runHour;
  }

  private async needsCatchUp(profile: UserProfile, now: Date): Promise<boolean> {
    const hour = localHour(profile.timezone, now);
    if (hour === null || hour < this.runHour) {
      return false;
    }
    const today = formatInTimeZone(now, profile.timezone, 'yyyy-MM-dd');
    const results = await this.storage.getInsightResults(profile.userId);
    return !results.some((result) =>
      formatInTimeZone(result.computedAt, profile.timezone, 'yyyy-MM-dd') === today
    );
  }

  /**
   * One scheduler tick. Normal mode picks users whose local hour is the run
   * hour; catch-up mode picks users past it with nothing computed today.
   */
  async processInsightsGeneration(now: Date = new Date(), catchUpMode = false): Promise<SchedulerRunSummary> {
    const summary: SchedulerRunSummary = { eligible: 0, completed: 0, timedOut: 0, cancelled: 0, skipped: 0, failed: 0 };
    const startTime = Date.now();

    let profiles: UserProfile[];
    try {
      profiles = await this.storage.listUserProfiles();
    } catch (error) {
      logger.error('Could not list users for insight generation', error);
      return summary;
    }

    const eligible: UserProfile[] = [];
    for (const profile of profiles) {
      if (catchUpMode) {
        try {
          if (await this.needsCatchUp(profile, now)) {
            eligible.push(profile);
          }
        } catch (error) {
          logger.warn(`Could not check existing insights for user ${profile.userId}, assuming eligible`, {
            reason: error instanceof Error ? error.message : String(error),
          });
          eligible.push(profile);
        }
      } else if (this.isDue(profile.timezone, now)) {
        eligible.push(profile);
      }
    }

    summary.eligible = eligible.length;
    if (eligible.length === 0) {
      logger.debug(`No users eligible (catchUp: ${catchUpMode})`);
      return summary;
    }

    for (const profile of eligible) {
      let outcome: InsightEvaluationOutcome | null;
      try {
        outcome = await this.runForUser(profile.userId, profile.timezone, now);
      } catch (error) {
        logger.error(`Error generating insights for user ${profile.userId}`, error);
        summary.failed++;
        continue;
      }

      if (!outcome) {
        summary.skipped++;
      } else if (outcome.status === 'completed') {
        summary.completed++;
      } else if (outcome.status === 'timed_out') {
        summary.timedOut++;
      } else {
        summary.cancelled++;
      }
    }

    logger.info(`Insight generation pass complete in ${Date.now() - startTime}ms`, { ...summary, catchUpMode });
    return summary;
  }

  /**
   * Run one user's cycle now. Resolves to null when a cycle for the user is
   * already running or the user is being deleted.
   */
  async runForUser(userId: string, timezone?: string, now: Date = new Date()): Promise<InsightEvaluationOutcome | null> {
    if (this.deletions.has(userId)) {
      logger.info(`User ${userId} is being deleted, skipping insights`);
      return null;
    }
    if (this.inFlight.has(userId)) {
      logger.info(`Insights already generating for user ${userId}, skipping`);
      return null;
    }

    const controller = new AbortController();
    const evaluation = this.evaluate(userId, {
      storage: this.storage,
      budgetMs: this.budgetMs,
      signal: controller.signal,
      timezone,
      now,
    });
    const done = evaluation.then(() => undefined, () => undefined);
    this.inFlight.set(userId, { controller, done });

    try {
      return await evaluation;
    } finally {
      this.inFlight.delete(userId);
    }
  }

  isEvaluating(userId: string): boolean {
    return this.inFlight.has(userId);
  }

  /**
   * Abort the user's running cycle, if any, and wait for it to settle.
   * Resolves to false when nothing was running.
   */
  async cancelUserEvaluation(userId: string): Promise<boolean> {
    const running = this.inFlight.get(userId);
    if (!running) {
      return false;
    }
    running.controller.abort();
    await running.done;
    logger.info(`Cancelled insight evaluation for user ${userId}`);
    return true;
  }

  /**
   * Keep new cycles for the user from starting until `removal` settles.
   */
  async withUserDeletion<T>(userId: string, removal: () => Promise<T>): Promise<T> {
    this.deletions.set(userId, (this.deletions.get(userId) ?? 0) + 1);
    try {
      return await removal();
    } finally {
      const remaining = (this.deletions.get(userId) ?? 1) - 1;
      if (remaining > 0) {
        this.deletions.set(userId, remaining);
      } else {
        this.deletions.delete(userId);
      }
    }
  }

  start(): void {
    if (this.cronTask) {
      logger.warn('Scheduler already running');
      return;
    }

    this.cronTask = cron.schedule(this.cronExpression, () => {
      this.processInsightsGeneration().catch((error) => {
        logger.error('Scheduled insight generation failed', error);
      });
    });
    logger.info(`Timezone-aware insights scheduler started (${this.cronExpression}, run hour ${this.runHour})`);

    this.catchUpTimer = setTimeout(() => {
      this.catchUpTimer = null;
      logger.info('Running startup catch-up check for missed insights');
      this.processInsightsGeneration(new Date(), true).catch((error) => {
        logger.error('Startup catch-up failed', error);
      });
    }, STARTUP_CATCH_UP_DELAY_MS);
  }

  /** Stop ticking and abort every running cycle. */
  async stop(): Promise<void> {
    if (this.catchUpTimer) {
      clearTimeout(this.catchUpTimer);
      this.catchUpTimer = null;
    }
    if (this.cronTask) {
      this.cronTask.stop();
      this.cronTask = null;
      logger.info('Scheduler stopped');
    }
    await Promise.all([...this.inFlight.keys()].map((userId) => this.cancelUserEvaluation(userId)));
  }
}

let defaultScheduler: InsightsScheduler | null = null;

export function getInsightsScheduler(): InsightsScheduler {
  if (!defaultScheduler) {
    defaultScheduler = new InsightsScheduler();
  }
  return defaultScheduler;
}

export function startInsightsScheduler(): void {
  getInsightsScheduler().start();
}

export function stopInsightsScheduler(): Promise<void> {
  return getInsightsScheduler().stop();
}

/** Manually run a scheduler pass. */
export function triggerInsightsGenerationCheck(catchUp = false): Promise<SchedulerRunSummary> {
  logger.info(`Manual trigger requested (catchUp: ${catchUp})`);
  return getInsightsScheduler().processInsightsGeneration(new Date(), catchUp);
}

export function cancelUserEvaluation(userId: string): Promise<boolean> {
  return getInsightsScheduler().cancelUserEvaluation(userId);
}

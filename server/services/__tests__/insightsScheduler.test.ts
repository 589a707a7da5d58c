import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MemStorage } from '../../memStorage';
import type { EvaluationStatus, InsightEvaluationOutcome } from '../insightEngine';
import { InsightsScheduler, type EvaluateFn } from '../insightsScheduler';
import { deleteUserData } from '../userDataService';
import { insightResult, seedDaily } from './helpers';

function outcome(userId: string, status: EvaluationStatus): InsightEvaluationOutcome {
  return { userId, status, results: [], completedRuleIds: [], elapsedMs: 0 };
}

/** An evaluation that only settles once its signal is aborted. */
const waitForAbort: EvaluateFn = (userId, options) => new Promise((resolve) => {
  options.signal?.addEventListener('abort', () => resolve(outcome(userId, 'cancelled')));
});

describe('InsightsScheduler', () => {
  let storage: MemStorage;

  beforeEach(async () => {
    storage = new MemStorage();
    await storage.upsertUserProfile('user-ny', 'America/New_York');
    await storage.upsertUserProfile('user-tokyo', 'Asia/Tokyo');
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('is due at the run hour in the user timezone', () => {
    const scheduler = new InsightsScheduler({ storage, runHour: 6 });
    expect(scheduler.isDue('America/New_York', new Date('2024-03-01T11:00:00Z'))).toBe(true);
    expect(scheduler.isDue('America/New_York', new Date('2024-03-01T12:00:00Z'))).toBe(false);
    expect(scheduler.isDue('Not/AZone', new Date('2024-03-01T11:00:00Z'))).toBe(false);
  });

  it('evaluates users whose local run hour has come', async () => {
    const evaluate = vi.fn<EvaluateFn>(async (userId) => outcome(userId, 'completed'));
    const scheduler = new InsightsScheduler({ storage, runHour: 6, budgetMs: 5000, evaluate });
    const now = new Date('2024-03-01T11:00:00Z');

    const summary = await scheduler.processInsightsGeneration(now);

    expect(summary).toEqual({ eligible: 1, completed: 1, timedOut: 0, cancelled: 0, skipped: 0, failed: 0 });
    expect(evaluate).toHaveBeenCalledTimes(1);
    expect(evaluate.mock.calls[0][0]).toBe('user-ny');
    expect(evaluate.mock.calls[0][1]).toMatchObject({ storage, budgetMs: 5000, timezone: 'America/New_York', now });
  });

  it('catches up users past the run hour with nothing computed today', async () => {
    await storage.upsertUserProfile('user-berlin', 'Europe/Berlin');
    await storage.replaceInsightResults('user-berlin', ['steps_hrv'], [
      insightResult({ ruleId: 'steps_hrv', userId: 'user-berlin', computedAt: new Date('2024-03-01T06:00:00Z') }),
    ]);
    const evaluate = vi.fn<EvaluateFn>(async (userId) => outcome(userId, 'completed'));
    const scheduler = new InsightsScheduler({ storage, runHour: 6, evaluate });

    // New York 10:00, Tokyo 00:00 next day, Berlin 16:00 with results from this morning
    const summary = await scheduler.processInsightsGeneration(new Date('2024-03-01T15:00:00Z'), true);

    expect(summary.eligible).toBe(1);
    expect(evaluate.mock.calls.map(([userId]) => userId)).toEqual(['user-ny']);
  });

  it('counts each outcome', async () => {
    const utcStorage = new MemStorage();
    for (const userId of ['a', 'b', 'c', 'd']) {
      await utcStorage.upsertUserProfile(userId, 'UTC');
    }
    const statuses: Record<string, EvaluationStatus> = { a: 'completed', b: 'timed_out', c: 'cancelled' };
    const evaluate: EvaluateFn = async (userId) => {
      const status = statuses[userId];
      if (!status) throw new Error('storage unavailable');
      return outcome(userId, status);
    };
    const scheduler = new InsightsScheduler({ storage: utcStorage, runHour: 6, evaluate });

    expect(await scheduler.processInsightsGeneration(new Date('2024-03-01T06:30:00Z'))).toEqual({
      eligible: 4, completed: 1, timedOut: 1, cancelled: 1, skipped: 0, failed: 1,
    });
  });

  it('runs at most one cycle per user and cancels on request', async () => {
    const scheduler = new InsightsScheduler({ storage, runHour: 6, evaluate: waitForAbort });

    const first = scheduler.runForUser('user-ny');
    expect(scheduler.isEvaluating('user-ny')).toBe(true);
    expect(await scheduler.runForUser('user-ny')).toBeNull();

    expect(await scheduler.cancelUserEvaluation('user-ny')).toBe(true);
    expect((await first)?.status).toBe('cancelled');
    expect(scheduler.isEvaluating('user-ny')).toBe(false);
    expect(await scheduler.cancelUserEvaluation('user-ny')).toBe(false);
  });

  it('cancels running cycles on stop', async () => {
    const scheduler = new InsightsScheduler({ storage, runHour: 6, evaluate: waitForAbort });
    const running = scheduler.runForUser('user-tokyo');

    await scheduler.stop();

    expect((await running)?.status).toBe('cancelled');
  });

  it('runs a catch-up pass shortly after starting', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-01T15:20:00Z'));
    const evaluate = vi.fn<EvaluateFn>(async (userId) => outcome(userId, 'completed'));
    const scheduler = new InsightsScheduler({ storage, runHour: 6, evaluate });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(10_000);
    await vi.waitFor(() => expect(evaluate).toHaveBeenCalledTimes(1));
    await scheduler.stop();

    expect(evaluate.mock.calls[0][0]).toBe('user-ny');
  });

  it('skips the catch-up pass when stopped first', async () => {
    vi.useFakeTimers();
    const evaluate = vi.fn<EvaluateFn>(async (userId) => outcome(userId, 'completed'));
    const scheduler = new InsightsScheduler({ storage, runHour: 6, evaluate });

    scheduler.start();
    await scheduler.stop();
    await vi.advanceTimersByTimeAsync(20_000);

    expect(evaluate).not.toHaveBeenCalled();
  });
});

describe('deleteUserData', () => {
  it('cancels a running cycle before removing the user', async () => {
    const storage = new MemStorage();
    await storage.upsertUserProfile('user-1', 'UTC');
    await seedDaily(storage, 'user-1', 'steps', [['2024-03-01', 8000]]);
    await seedDaily(storage, 'user-2', 'steps', [['2024-03-01', 9000]]);
    const scheduler = new InsightsScheduler({ storage, runHour: 6, evaluate: waitForAbort });
    const running = scheduler.runForUser('user-1');

    await deleteUserData('user-1', { storage, scheduler });

    expect((await running)?.status).toBe('cancelled');
    expect(await storage.getUserProfile('user-1')).toBeUndefined();
    const range = { start: new Date('2024-01-01T00:00:00Z'), end: new Date('2025-01-01T00:00:00Z') };
    expect(await storage.fetchSeries('user-1', 'steps', range)).toEqual([]);
    expect(await storage.fetchSeries('user-2', 'steps', range)).toHaveLength(1);
  });

  it('deletes when nothing is running', async () => {
    const storage = new MemStorage();
    await storage.upsertUserProfile('user-1', 'UTC');
    const scheduler = new InsightsScheduler({ storage, runHour: 6 });
    const cancel = vi.spyOn(scheduler, 'cancelUserEvaluation');

    await deleteUserData('user-1', { storage, scheduler });

    expect(cancel).toHaveBeenCalledWith('user-1');
    expect(await storage.getUserProfile('user-1')).toBeUndefined();
  });

  it('starts no cycle for the user until the delete has finished', async () => {
    const storage = new MemStorage();
    await storage.upsertUserProfile('user-1', 'UTC');
    await storage.upsertUserProfile('user-2', 'UTC');
    let releaseDelete: () => void = () => undefined;
    const deleteGate = new Promise<void>((resolve) => {
      releaseDelete = resolve;
    });
    const removeUser = storage.deleteUserData.bind(storage);
    vi.spyOn(storage, 'deleteUserData').mockImplementation(async (userId) => {
      await deleteGate;
      await removeUser(userId);
    });
    const evaluate = vi.fn<EvaluateFn>(async (userId) => outcome(userId, 'completed'));
    const scheduler = new InsightsScheduler({ storage, runHour: 6, evaluate });

    const deletion = deleteUserData('user-1', { storage, scheduler });

    expect(await scheduler.runForUser('user-1')).toBeNull();
    expect((await scheduler.runForUser('user-2'))?.status).toBe('completed');
    expect(evaluate).toHaveBeenCalledTimes(1);

    releaseDelete();
    await deletion;

    expect(await storage.getUserProfile('user-1')).toBeUndefined();
    expect((await scheduler.runForUser('user-1'))?.status).toBe('completed');
    expect(evaluate).toHaveBeenCalledTimes(2);
  });
});

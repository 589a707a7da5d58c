import { describe, it, expect, beforeEach } from 'vitest';
import { MemStorage } from '../../memStorage';
import { buildDailySummaries, detectAnomalies, generateWeeklyReport } from '../dailySummaryService';
import { datedValues, seedDaily } from './helpers';

describe('daily summary service', () => {
  let storage: MemStorage;

  beforeEach(async () => {
    storage = new MemStorage();
    await storage.upsertUserProfile('user-1', 'UTC');
  });

  describe('buildDailySummaries', () => {
    beforeEach(async () => {
      await seedDaily(storage, 'user-1', 'steps', [['2024-03-01', 8000], ['2024-03-02', 6000]]);
      await seedDaily(storage, 'user-1', 'steps', [['2024-03-02', 1000]], { time: '20:00:00' });
      await seedDaily(storage, 'user-1', 'calories', [['2024-03-01', 2200]]);
      await seedDaily(storage, 'user-1', 'sleep_duration', [['2024-03-01', 27000]]);
      await seedDaily(storage, 'user-1', 'resting_heart_rate', [['2024-03-01', 58]]);
      await seedDaily(storage, 'user-1', 'hrv', [['2024-03-01', 45], ['2024-03-02', 50]]);
      await seedDaily(storage, 'user-1', 'sleep_score', [['2024-03-01', 80]]);
    });

    it('returns one summary per day with its completeness', async () => {
      const summaries = await buildDailySummaries('user-1', { start: '2024-03-01', end: '2024-03-03' }, { storage });

      expect(summaries).toEqual([
        {
          date: '2024-03-01',
          values: { steps: 8000, calories: 2200, sleep_duration: 27000, sleep_score: 80, resting_heart_rate: 58, hrv: 45 },
          dataCompleteness: 100,
        },
        { date: '2024-03-02', values: { steps: 7000, hrv: 50 }, dataCompleteness: 33 },
        { date: '2024-03-03', values: {}, dataCompleteness: 0 },
      ]);
    });

    it('buckets by the local calendar day', async () => {
      await seedDaily(storage, 'user-1', 'steps', [['2024-03-04', 500]], { time: '03:00:00' });

      const [summary] = await buildDailySummaries(
        'user-1',
        { start: '2024-03-03', end: '2024-03-03' },
        { storage, timezone: 'America/New_York' }
      );

      expect(summary.values).toEqual({ steps: 500 });
    });

    it('rejects a reversed range', async () => {
      await expect(buildDailySummaries('user-1', { start: '2024-03-02', end: '2024-03-01' }, { storage }))
        .rejects.toThrow('before it starts');
    });
  });

  describe('detectAnomalies', () => {
    const range = { start: '2024-03-05', end: '2024-03-11' };

    beforeEach(async () => {
      const alternating = (low: number, high: number) => Array.from({ length: 10 }, (_, index) => (index % 2 === 0 ? low : high));
      await seedDaily(storage, 'user-1', 'resting_heart_rate', datedValues('2024-03-01', [...alternating(60, 62), 70]));
      await seedDaily(storage, 'user-1', 'steps', datedValues('2024-03-01', [...alternating(8000, 9000), 1000]));
      // No spread in the baseline, so the jump is not judged
      await seedDaily(storage, 'user-1', 'hrv', datedValues('2024-03-01', [...Array<number>(10).fill(50), 80]));
    });

    it('flags days far from the trailing baseline', async () => {
      const anomalies = await detectAnomalies('user-1', range, 2, { storage });

      expect(anomalies.map((anomaly) => [anomaly.date, anomaly.metricType, anomaly.direction])).toEqual([
        ['2024-03-11', 'resting_heart_rate', 'high'],
        ['2024-03-11', 'steps', 'low'],
      ]);

      const [restingHeartRate] = anomalies;
      expect(restingHeartRate.value).toBe(70);
      expect(restingHeartRate.baselineMean).toBe(61);
      expect(restingHeartRate.baselineStdDev).toBeCloseTo(1.05409, 5);
      expect(restingHeartRate.zScore).toBeCloseTo(8.538, 3);
    });

    it('respects the threshold', async () => {
      const anomalies = await detectAnomalies('user-1', range, 10, { storage });
      expect(anomalies.map((anomaly) => anomaly.metricType)).toEqual(['steps']);
      expect(anomalies[0].zScore).toBeCloseTo(-14.23, 2);
    });

    it('needs five baseline days', async () => {
      expect(await detectAnomalies('user-1', { start: '2024-03-02', end: '2024-03-05' }, 0.5, { storage })).toEqual([]);
    });

    it('rejects a non-positive threshold', async () => {
      await expect(detectAnomalies('user-1', range, 0, { storage })).rejects.toThrow('zThreshold must be positive');
    });
  });

  describe('generateWeeklyReport', () => {
    beforeEach(async () => {
      await seedDaily(storage, 'user-1', 'steps', [
        ['2024-03-04', 10000],
        ['2024-03-05', 8000],
        ['2024-03-06', 12000],
        ['2024-03-11', 99999],
      ]);
      await seedDaily(storage, 'user-1', 'hrv', [['2024-03-04', 40], ['2024-03-05', 50]]);
      await seedDaily(storage, 'user-1', 'sleep_score', [['2024-03-06', 85]]);
    });

    it('summarises a Monday-to-Sunday week', async () => {
      expect(await generateWeeklyReport('user-1', '2024-03-04', { storage })).toEqual({
        weekStart: '2024-03-04',
        weekEnd: '2024-03-10',
        daysWithData: 3,
        averages: { steps: 10000, hrv: 45, sleep_score: 85 },
        totals: { steps: 30000 },
        bests: { bestSleepScore: 85, highestHrv: 50, mostSteps: 12000 },
      });
    });

    it('defaults to the current local week', async () => {
      const thursday = new Date('2024-03-07T12:00:00Z');
      expect((await generateWeeklyReport('user-1', undefined, { storage, now: thursday })).weekStart).toBe('2024-03-04');

      // Already Monday the 11th at UTC+14
      await storage.upsertUserProfile('user-1', 'Pacific/Kiritimati');
      const sunday = new Date('2024-03-10T12:00:00Z');
      expect((await generateWeeklyReport('user-1', undefined, { storage, now: sunday })).weekStart).toBe('2024-03-11');
    });

    it('reports an empty week without bests', async () => {
      const report = await generateWeeklyReport('user-1', '2024-02-05', { storage });
      expect(report.daysWithData).toBe(0);
      expect(report.averages).toEqual({});
      expect(report.bests).toEqual({ bestSleepScore: null, highestHrv: null, mostSteps: null });
    });
  });
});

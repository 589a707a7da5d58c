import { randomUUID } from "crypto";
import {
  isDailyTotal,
  type CanonicalMetricRecord,
  type InsertCanonicalMetricRecord,
  type IngestionJob,
  type InsertIngestionJob,
  type InsightResult,
  type InsertInsightResult,
  type UserProfile,
} from "@shared/schema";
import type { MetricType } from "@shared/metrics";
import { StorageError } from "@shared/domain/errors";
import type { DateRange, IngestionJobUpdate, IStorage } from "./storage";

function recordKey(record: { userId: string; metricType: string; recordedAt: Date; sourceProvider: string }): string {
  return `${record.userId}|${record.metricType}|${record.recordedAt.toISOString()}|${record.sourceProvider}`;
}

/**
 * In-process IStorage used by tests and the CLI's dry-run mode. Every batch
 * is applied synchronously, so a batch is never observed half-written.
 */
export class MemStorage implements IStorage {
  private records = new Map<string, CanonicalMetricRecord>();
  private jobs = new Map<string, IngestionJob>();
  private results = new Map<string, InsightResult[]>();
  private profiles = new Map<string, UserProfile>();

  async upsertMetricRecords(records: InsertCanonicalMetricRecord[]): Promise<number> {
    const now = new Date();
    for (const record of records) {
      const key = recordKey(record);
      const existing = this.records.get(key);
      // A daily total keeps its key against an intraday sample written at the same instant
      if (existing && isDailyTotal(existing.metadata) && !isDailyTotal(record.metadata)) {
        continue;
      }
      this.records.set(key, {
        id: existing?.id ?? record.id ?? randomUUID(),
        userId: record.userId,
        metricType: record.metricType,
        value: record.value,
        unit: record.unit,
        recordedAt: record.recordedAt,
        sourceProvider: record.sourceProvider,
        sourceFileHash: record.sourceFileHash,
        metadata: record.metadata ?? null,
        createdAt: existing?.createdAt ?? now,
        updatedAt: now,
      });
    }
    return records.length;
  }

  async fetchSeries(userId: string, metricType: MetricType, range: DateRange): Promise<CanonicalMetricRecord[]> {
    return [...this.records.values()]
      .filter((record) =>
        record.userId === userId &&
        record.metricType === metricType &&
        record.recordedAt >= range.start &&
        record.recordedAt < range.end
      )
      .sort((a, b) =>
        a.recordedAt.getTime() - b.recordedAt.getTime() || a.sourceProvider.localeCompare(b.sourceProvider)
      );
  }

  async createIngestionJob(job: InsertIngestionJob): Promise<IngestionJob> {
    if (this.jobs.has(job.id)) {
      throw new StorageError(`Ingestion job ${job.id} already exists`);
    }
    const now = new Date();
    const created: IngestionJob = {
      id: job.id,
      userId: job.userId,
      rawFileRef: job.rawFileRef,
      provider: job.provider,
      state: job.state ?? 'queued',
      attempts: job.attempts ?? 0,
      persistedCount: job.persistedCount ?? 0,
      warningCount: job.warningCount ?? 0,
      droppedCount: job.droppedCount ?? 0,
      errorLog: job.errorLog ?? [],
      lastErrorCode: job.lastErrorCode ?? null,
      retryable: job.retryable ?? false,
      createdAt: now,
      updatedAt: now,
      completedAt: job.completedAt ?? null,
    };
    this.jobs.set(job.id, created);
    return { ...created };
  }

  async getIngestionJob(id: string): Promise<IngestionJob | undefined> {
    const job = this.jobs.get(id);
    return job ? { ...job } : undefined;
  }

  async updateIngestionJob(id: string, data: IngestionJobUpdate): Promise<IngestionJob> {
    const existing = this.jobs.get(id);
    if (!existing) {
      throw new StorageError(`Ingestion job ${id} not found`);
    }
    const updated: IngestionJob = {
      ...existing,
      rawFileRef: data.rawFileRef ?? existing.rawFileRef,
      provider: data.provider ?? existing.provider,
      state: data.state ?? existing.state,
      attempts: data.attempts ?? existing.attempts,
      persistedCount: data.persistedCount ?? existing.persistedCount,
      warningCount: data.warningCount ?? existing.warningCount,
      droppedCount: data.droppedCount ?? existing.droppedCount,
      errorLog: data.errorLog ?? existing.errorLog,
      lastErrorCode: data.lastErrorCode !== undefined ? data.lastErrorCode : existing.lastErrorCode,
      retryable: data.retryable ?? existing.retryable,
      completedAt: data.completedAt !== undefined ? data.completedAt : existing.completedAt,
      updatedAt: new Date(),
    };
    this.jobs.set(id, updated);
    return { ...updated };
  }

  async replaceInsightResults(userId: string, ruleIds: string[], results: InsertInsightResult[]): Promise<void> {
    const replaced = new Set(ruleIds);
    const kept = (this.results.get(userId) ?? []).filter((result) => !replaced.has(result.ruleId));
    const inserted: InsightResult[] = results.map((result) => ({
      id: result.id ?? randomUUID(),
      ruleId: result.ruleId,
      userId: result.userId,
      windowStart: result.windowStart,
      windowEnd: result.windowEnd,
      lagDays: result.lagDays,
      effectSize: result.effectSize,
      confidence: result.confidence,
      sampleCount: result.sampleCount,
      renderedText: result.renderedText,
      computedAt: result.computedAt,
    }));
    this.results.set(userId, [...kept, ...inserted]);
  }

  async getInsightResults(userId: string): Promise<InsightResult[]> {
    return (this.results.get(userId) ?? []).map((result) => ({ ...result }));
  }

  async getUserProfile(userId: string): Promise<UserProfile | undefined> {
    const profile = this.profiles.get(userId);
    return profile ? { ...profile } : undefined;
  }

  async listUserProfiles(): Promise<UserProfile[]> {
    return [...this.profiles.values()].map((profile) => ({ ...profile }));
  }

  async upsertUserProfile(userId: string, timezone: string): Promise<UserProfile> {
    const now = new Date();
    const existing = this.profiles.get(userId);
    const profile: UserProfile = {
      userId,
      timezone,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };
    this.profiles.set(userId, profile);
    return { ...profile };
  }

  async deleteUserData(userId: string): Promise<void> {
    for (const [key, record] of this.records) {
      if (record.userId === userId) this.records.delete(key);
    }
    for (const [id, job] of this.jobs) {
      if (job.userId === userId) this.jobs.delete(id);
    }
    this.results.delete(userId);
    this.profiles.delete(userId);
  }
}

import {
  canonicalMetricRecords,
  ingestionJobs,
  insightResults,
  userProfiles,
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
import { getDb } from "./db";
import { and, asc, eq, gte, inArray, lt, sql } from "drizzle-orm";

/** Half-open time range [start, end). */
export interface DateRange {
  start: Date;
  end: Date;
}

export type IngestionJobUpdate = Partial<Omit<InsertIngestionJob, 'id' | 'userId' | 'createdAt'>>;

// Postgres caps bind parameters per statement; keep each insert well under it
const UPSERT_CHUNK_SIZE = 500;

// Interface for storage operations
export interface IStorage {
  // Canonical metric records
  upsertMetricRecords(records: InsertCanonicalMetricRecord[]): Promise<number>;
  fetchSeries(userId: string, metricType: MetricType, range: DateRange): Promise<CanonicalMetricRecord[]>;

  // Ingestion jobs
  createIngestionJob(job: InsertIngestionJob): Promise<IngestionJob>;
  getIngestionJob(id: string): Promise<IngestionJob | undefined>;
  updateIngestionJob(id: string, data: IngestionJobUpdate): Promise<IngestionJob>;

  // Insight results
  replaceInsightResults(userId: string, ruleIds: string[], results: InsertInsightResult[]): Promise<void>;
  getInsightResults(userId: string): Promise<InsightResult[]>;

  // User profiles
  getUserProfile(userId: string): Promise<UserProfile | undefined>;
  listUserProfiles(): Promise<UserProfile[]>;
  upsertUserProfile(userId: string, timezone: string): Promise<UserProfile>;

  deleteUserData(userId: string): Promise<void>;
}

async function withStorageErrors<T>(operation: string, run: () => PromiseLike<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof StorageError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new StorageError(`${operation} failed: ${reason}`, error);
  }
}

/**
 * Order a batch by its natural key. Concurrent transactions that lock
 * overlapping keys in the same order wait on each other instead of deadlocking.
 */
export function orderByNaturalKey(records: readonly InsertCanonicalMetricRecord[]): InsertCanonicalMetricRecord[] {
  return [...records].sort((a, b) =>
    a.userId.localeCompare(b.userId)
    || a.metricType.localeCompare(b.metricType)
    || a.recordedAt.getTime() - b.recordedAt.getTime()
    || a.sourceProvider.localeCompare(b.sourceProvider)
  );
}

export class DatabaseStorage implements IStorage {
  /**
   * Upsert a batch keyed by (userId, metricType, recordedAt, sourceProvider).
   * The whole batch commits or none of it does. Callers must not pass two
   * records with the same key in one batch. A stored daily total is not
   * replaced by an intraday sample.
   */
  async upsertMetricRecords(records: InsertCanonicalMetricRecord[]): Promise<number> {
    if (records.length === 0) {
      return 0;
    }
    const ordered = orderByNaturalKey(records);
    return withStorageErrors('upsertMetricRecords', async () => {
      const db = getDb();
      await db.transaction(async (tx) => {
        for (let i = 0; i < ordered.length; i += UPSERT_CHUNK_SIZE) {
          await tx
            .insert(canonicalMetricRecords)
            .values(ordered.slice(i, i + UPSERT_CHUNK_SIZE))
            .onConflictDoUpdate({
              target: [
                canonicalMetricRecords.userId,
                canonicalMetricRecords.metricType,
                canonicalMetricRecords.recordedAt,
                canonicalMetricRecords.sourceProvider,
              ],
              set: {
                value: sql`excluded.value`,
                unit: sql`excluded.unit`,
                sourceFileHash: sql`excluded.source_file_hash`,
                metadata: sql`excluded.metadata`,
                updatedAt: new Date(),
              },
              // A daily total keeps its key against an intraday sample written at the same instant
              setWhere: sql`canonical_metric_records.metadata->>'granularity' IS DISTINCT FROM 'daily'
                OR excluded.metadata->>'granularity' = 'daily'`,
            });
        }
      });
      return records.length;
    });
  }

  async fetchSeries(userId: string, metricType: MetricType, range: DateRange): Promise<CanonicalMetricRecord[]> {
    return withStorageErrors('fetchSeries', () =>
      getDb()
        .select()
        .from(canonicalMetricRecords)
        .where(
          and(
            eq(canonicalMetricRecords.userId, userId),
            eq(canonicalMetricRecords.metricType, metricType),
            gte(canonicalMetricRecords.recordedAt, range.start),
            lt(canonicalMetricRecords.recordedAt, range.end)
          )
        )
        .orderBy(asc(canonicalMetricRecords.recordedAt), asc(canonicalMetricRecords.sourceProvider))
    );
  }

  async createIngestionJob(job: InsertIngestionJob): Promise<IngestionJob> {
    return withStorageErrors('createIngestionJob', async () => {
      const [created] = await getDb().insert(ingestionJobs).values(job).returning();
      return created;
    });
  }

  async getIngestionJob(id: string): Promise<IngestionJob | undefined> {
    return withStorageErrors('getIngestionJob', async () => {
      const [job] = await getDb().select().from(ingestionJobs).where(eq(ingestionJobs.id, id));
      return job;
    });
  }

  async updateIngestionJob(id: string, data: IngestionJobUpdate): Promise<IngestionJob> {
    return withStorageErrors('updateIngestionJob', async () => {
      const [job] = await getDb()
        .update(ingestionJobs)
        .set({ ...data, updatedAt: new Date() })
        .where(eq(ingestionJobs.id, id))
        .returning();
      if (!job) {
        throw new StorageError(`Ingestion job ${id} not found`);
      }
      return job;
    });
  }

  /**
   * Supersede the stored results of the given rules with a new set, in one
   * transaction. Rules not listed keep their previous results.
   */
  async replaceInsightResults(userId: string, ruleIds: string[], results: InsertInsightResult[]): Promise<void> {
    if (ruleIds.length === 0) {
      return;
    }
    await withStorageErrors('replaceInsightResults', () =>
      getDb().transaction(async (tx) => {
        await tx
          .delete(insightResults)
          .where(and(eq(insightResults.userId, userId), inArray(insightResults.ruleId, ruleIds)));
        if (results.length > 0) {
          await tx.insert(insightResults).values(results);
        }
      })
    );
  }

  async getInsightResults(userId: string): Promise<InsightResult[]> {
    return withStorageErrors('getInsightResults', () =>
      getDb().select().from(insightResults).where(eq(insightResults.userId, userId))
    );
  }

  async getUserProfile(userId: string): Promise<UserProfile | undefined> {
    return withStorageErrors('getUserProfile', async () => {
      const [profile] = await getDb().select().from(userProfiles).where(eq(userProfiles.userId, userId));
      return profile;
    });
  }

  async listUserProfiles(): Promise<UserProfile[]> {
    return withStorageErrors('listUserProfiles', () => getDb().select().from(userProfiles));
  }

  async upsertUserProfile(userId: string, timezone: string): Promise<UserProfile> {
    return withStorageErrors('upsertUserProfile', async () => {
      const [profile] = await getDb()
        .insert(userProfiles)
        .values({ userId, timezone })
        .onConflictDoUpdate({
          target: userProfiles.userId,
          set: {
            timezone,
            updatedAt: new Date(),
          },
        })
        .returning();
      return profile;
    });
  }

  async deleteUserData(userId: string): Promise<void> {
    // Delete all user data in a transaction for atomicity
    await withStorageErrors('deleteUserData', () =>
      getDb().transaction(async (tx) => {
        await tx.delete(insightResults).where(eq(insightResults.userId, userId));
        await tx.delete(ingestionJobs).where(eq(ingestionJobs.userId, userId));
        await tx.delete(canonicalMetricRecords).where(eq(canonicalMetricRecords.userId, userId));
        await tx.delete(userProfiles).where(eq(userProfiles.userId, userId));
      })
    );
  }
}

export const storage = new DatabaseStorage();

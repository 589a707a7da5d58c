/**
 * Ingestion Pipeline
 *
 * Runs one uploaded export through parse -> canonicalize -> persist and records
 * the outcome on its IngestionJob. Stateless per invocation: any number of jobs
 * may execute concurrently, and persistence is a keyed upsert so overlapping
 * files converge on one value per natural key.
 *
 * The worker dispatcher drives it through three calls:
 * - enqueueIngestionJob: create (or re-queue) a job
 * - executeIngestionJob: run a queued job to completed/failed
 * - reportIngestionJob: read back the outcome and retry advice
 */

import { createHash } from "crypto";
import { readFile } from "fs/promises";
import { basename } from "path";
import {
  insertCanonicalMetricRecordSchema,
  insertIngestionJobSchema,
  type IngestionJob,
  type IngestionJobState,
  type InsertCanonicalMetricRecord,
  type UserProfile,
} from "@shared/schema";
import type { DataSource } from "@shared/dataSource";
import {
  HealthEngineError,
  SchemaMismatchError,
  UnitConversionError,
  UnsupportedFormatError,
  StorageError,
  toPartialIngestionWarning,
  type PartialIngestionWarning,
} from "@shared/domain/errors";
import { getEngineConfig } from "../config/engineConfig";
import { storage as defaultStorage, type IngestionJobUpdate, type IStorage } from "../storage";
import { createLogger } from "../utils/logger";
import { mapRawRecord, type CanonicalMappingTable, type CanonicalRecordDraft } from "./canonicalMapper";
import { assertTransition, isTerminalState } from "./ingestionJobState";
import { parseProviderFile, type RawFile } from "./providerAdapters";

const logger = createLogger('IngestionPipeline');

// Warnings beyond this many are counted but not copied into the job's errorLog
const MAX_LOGGED_WARNINGS = 50;

export interface IngestionJobInput {
  jobId: string;
  userId: string;
  rawFileRef: string;
  declaredProvider: DataSource;
}

export interface IngestionJobReport {
  jobId: string;
  finalState: IngestionJobState;
  attempts: number;
  persistedCount: number;
  warningCount: number;
  droppedCount: number;
  errorLog: string[];
  retryable: boolean;
  nextRetryDelayMs: number | null;
  surfaceToUser: boolean;
}

export interface IngestionExecution extends IngestionJobReport {
  warnings: PartialIngestionWarning[];
}

export type RawFileReader = (rawFileRef: string) => Promise<RawFile>;

export interface IngestionPipelineOptions {
  storage?: IStorage;
  readRawFile?: RawFileReader;
  mappings?: CanonicalMappingTable;
  maxAttempts?: number;
  backoffBaseMs?: number;
  defaultTimezone?: string;
}

export async function readRawFileFromDisk(rawFileRef: string): Promise<RawFile> {
  try {
    const content = await readFile(rawFileRef, 'utf8');
    return { name: basename(rawFileRef), content };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new UnsupportedFormatError(`Cannot read ${rawFileRef}: ${reason}`);
  }
}

function hashContent(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

function naturalKey(record: CanonicalRecordDraft): string {
  return `${record.userId}|${record.metricType}|${record.recordedAt.getTime()}|${record.sourceProvider}`;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

function formatWarning(warning: PartialIngestionWarning): string {
  return `${warning.kind} at ${warning.location}: ${warning.message}`;
}

export class IngestionPipeline {
  private readonly storage: IStorage;
  private readonly readRawFile: RawFileReader;
  private readonly mappings: CanonicalMappingTable | undefined;
  private readonly maxAttempts: number;
  private readonly backoffBaseMs: number;
  private readonly defaultTimezone: string;

  constructor(options: IngestionPipelineOptions = {}) {
    const needsConfig = options.maxAttempts === undefined
      || options.backoffBaseMs === undefined
      || options.defaultTimezone === undefined;
    const config = needsConfig ? getEngineConfig() : null;

    this.storage = options.storage ?? defaultStorage;
    this.readRawFile = options.readRawFile ?? readRawFileFromDisk;
    this.mappings = options.mappings;
    this.maxAttempts = options.maxAttempts ?? config?.INGESTION_MAX_ATTEMPTS ?? 3;
    this.backoffBaseMs = options.backoffBaseMs ?? config?.INGESTION_BACKOFF_BASE_MS ?? 30_000;
    this.defaultTimezone = options.defaultTimezone ?? config?.DEFAULT_TIMEZONE ?? 'UTC';
  }

  /**
   * Create a queued job. Re-enqueueing an existing job re-queues it when it is
   * completed (re-run) or failed with attempts left; otherwise the job is
   * returned unchanged.
   */
  async enqueue(input: IngestionJobInput): Promise<IngestionJob> {
    const existing = await this.storage.getIngestionJob(input.jobId);
    if (!existing) {
      const newJob = {
        id: input.jobId,
        userId: input.userId,
        rawFileRef: input.rawFileRef,
        provider: input.declaredProvider,
        state: 'queued' as const,
      };
      const validation = insertIngestionJobSchema.safeParse(newJob);
      if (!validation.success) {
        const fields = validation.error.issues.map((issue) => issue.path.join('.')).join(', ');
        throw new SchemaMismatchError(`Invalid ingestion job input: ${fields}`);
      }
      await this.ensureUserProfile(input.userId);
      const job = await this.storage.createIngestionJob(newJob);
      logger.info(`Queued job ${job.id} (${input.declaredProvider}, ${input.rawFileRef})`);
      return job;
    }

    if (!isTerminalState(existing.state)) {
      return existing;
    }

    if (existing.state === 'completed') {
      assertTransition(existing.state, 'queued');
      return this.storage.updateIngestionJob(existing.id, {
        state: 'queued',
        attempts: 0,
        errorLog: [],
        lastErrorCode: null,
        retryable: false,
        completedAt: null,
      });
    }

    if (existing.retryable && existing.attempts < this.maxAttempts) {
      assertTransition(existing.state, 'queued');
      return this.storage.updateIngestionJob(existing.id, { state: 'queued', completedAt: null });
    }

    logger.warn(`Job ${existing.id} is permanently failed; not re-queueing`);
    return existing;
  }

  /** Run a queued job to a terminal state and return its outcome. */
  async execute(jobId: string): Promise<IngestionExecution> {
    const job = await this.storage.getIngestionJob(jobId);
    if (!job) {
      throw new StorageError(`Ingestion job ${jobId} not found`);
    }

    const attempts = job.attempts + 1;
    let state = job.state;
    const moveTo = async (next: IngestionJobState, data: IngestionJobUpdate = {}): Promise<IngestionJob> => {
      assertTransition(state, next);
      const updated = await this.storage.updateIngestionJob(jobId, { ...data, state: next });
      state = next;
      return updated;
    };

    await moveTo('parsing', { attempts });
    logger.info(`Executing job ${jobId} (attempt ${attempts}/${this.maxAttempts})`);

    const warnings: PartialIngestionWarning[] = [];
    let droppedCount = 0;

    try {
      const file = await this.readRawFile(job.rawFileRef);
      const sourceFileHash = hashContent(file.content);
      const outcome = parseProviderFile(file, job.provider);
      warnings.push(...outcome.warnings);

      await moveTo('canonicalizing');
      const profile = await this.ensureUserProfile(job.userId);
      const context = { userId: job.userId, sourceFileHash, timezone: profile.timezone };

      // Later occurrences of a natural key replace earlier ones within a file
      const byKey = new Map<string, CanonicalRecordDraft>();
      for (const raw of outcome.records) {
        try {
          const record = mapRawRecord(raw, context, this.mappings);
          if (record === null) {
            droppedCount++;
            continue;
          }
          const validation = insertCanonicalMetricRecordSchema.safeParse(record);
          if (!validation.success) {
            const fields = validation.error.issues.map((issue) => issue.path.join('.')).join(', ');
            throw new SchemaMismatchError(`Canonical record failed validation: ${fields}`);
          }
          const key = naturalKey(record);
          byKey.delete(key);
          byKey.set(key, record);
        } catch (error) {
          if (error instanceof SchemaMismatchError || error instanceof UnitConversionError) {
            warnings.push(toPartialIngestionWarning(error, raw.location));
            continue;
          }
          throw error;
        }
      }

      await moveTo('persisting', { warningCount: warnings.length, droppedCount });
      const records: InsertCanonicalMetricRecord[] = [...byKey.values()];
      if (records.length === 0) {
        throw new SchemaMismatchError(`No canonical records could be produced from ${file.name}`);
      }
      const persistedCount = await this.storage.upsertMetricRecords(records);

      const completed = await moveTo('completed', {
        persistedCount,
        warningCount: warnings.length,
        droppedCount,
        errorLog: warnings.slice(0, MAX_LOGGED_WARNINGS).map(formatWarning),
        lastErrorCode: null,
        retryable: false,
        completedAt: new Date(),
      });
      logger.info(
        `Job ${jobId} completed: ${persistedCount} persisted, ${warnings.length} warnings, ${droppedCount} dropped`
      );
      return { ...this.buildReport(completed), warnings };
    } catch (error) {
      const retryable = error instanceof HealthEngineError ? error.retryable : true;
      const lastErrorCode = error instanceof HealthEngineError ? error.code : null;
      logger.error(`Job ${jobId} failed on attempt ${attempts}`, error);

      const failed = await moveTo('failed', {
        persistedCount: 0,
        warningCount: warnings.length,
        droppedCount,
        errorLog: [
          describeError(error),
          ...warnings.slice(0, MAX_LOGGED_WARNINGS).map(formatWarning),
        ],
        lastErrorCode,
        retryable,
        completedAt: new Date(),
      });
      return { ...this.buildReport(failed), warnings };
    }
  }

  async report(jobId: string): Promise<IngestionJobReport> {
    const job = await this.storage.getIngestionJob(jobId);
    if (!job) {
      throw new StorageError(`Ingestion job ${jobId} not found`);
    }
    return this.buildReport(job);
  }

  /** Exponential backoff: base, 2x base, 4x base, ... */
  retryDelayMs(attempts: number): number {
    return this.backoffBaseMs * 2 ** Math.max(0, attempts - 1);
  }

  private buildReport(job: IngestionJob): IngestionJobReport {
    const failed = job.state === 'failed';
    const canRetry = failed && job.retryable && job.attempts < this.maxAttempts;
    return {
      jobId: job.id,
      finalState: job.state,
      attempts: job.attempts,
      persistedCount: job.persistedCount,
      warningCount: job.warningCount,
      droppedCount: job.droppedCount,
      errorLog: job.errorLog,
      retryable: canRetry,
      nextRetryDelayMs: canRetry ? this.retryDelayMs(job.attempts) : null,
      surfaceToUser: failed && !canRetry,
    };
  }

  private async ensureUserProfile(userId: string): Promise<UserProfile> {
    const profile = await this.storage.getUserProfile(userId);
    return profile ?? this.storage.upsertUserProfile(userId, this.defaultTimezone);
  }
}

let defaultPipeline: IngestionPipeline | null = null;

function getDefaultPipeline(): IngestionPipeline {
  if (!defaultPipeline) {
    defaultPipeline = new IngestionPipeline();
  }
  return defaultPipeline;
}

export function enqueueIngestionJob(input: IngestionJobInput): Promise<IngestionJob> {
  return getDefaultPipeline().enqueue(input);
}

export function executeIngestionJob(jobId: string): Promise<IngestionExecution> {
  return getDefaultPipeline().execute(jobId);
}

export function reportIngestionJob(jobId: string): Promise<IngestionJobReport> {
  return getDefaultPipeline().report(jobId);
}

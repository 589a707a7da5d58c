import { sql } from "drizzle-orm";
import {
  boolean,
  doublePrecision,
  index,
  integer,
  jsonb,
  pgEnum,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  varchar,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";
import { isMetricType, type MetricType } from "./metrics";
import { isDataSource, type DataSource } from "./dataSource";
import type { HealthEngineErrorCode } from "./domain/errors";

// Ingestion job enums
export const ingestionJobStateEnum = pgEnum("ingestion_job_state", [
  "queued",
  "parsing",
  "canonicalizing",
  "persisting",
  "completed",
  "failed",
]);

export type IngestionJobState = typeof ingestionJobStateEnum.enumValues[number];

// User profiles - only what the engine needs (default timezone for exports without offsets)
export const userProfiles = pgTable("user_profiles", {
  userId: varchar("user_id").primaryKey(),
  timezone: text("timezone").notNull().default("UTC"), // IANA timezone string (e.g., 'Europe/Berlin')
  createdAt: timestamp("created_at").defaultNow(),
  updatedAt: timestamp("updated_at").defaultNow(),
});

// Canonical metric records - one normalized sample from one provider
export const canonicalMetricRecords = pgTable("canonical_metric_records", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  userId: varchar("user_id").notNull().references(() => userProfiles.userId, { onDelete: "cascade" }),
  metricType: text("metric_type").$type<MetricType>().notNull(),
  value: doublePrecision("value").notNull(), // In the metric's canonical unit
  unit: text("unit").notNull(),
  recordedAt: timestamp("recorded_at", { withTimezone: true }).notNull(), // UTC instant
  sourceProvider: text("source_provider").$type<DataSource>().notNull(),
  sourceFileHash: text("source_file_hash").notNull(), // sha256 of the raw export
  metadata: jsonb("metadata").$type<Record<string, unknown>>(),
  createdAt: timestamp("created_at").defaultNow(),
  updatedAt: timestamp("updated_at").defaultNow(),
}, (table) => [
  uniqueIndex("canonical_metric_records_natural_key_idx").on(
    table.userId,
    table.metricType,
    table.recordedAt,
    table.sourceProvider
  ),
  index("idx_canonical_metric_records_user_type_time").on(table.userId, table.metricType, table.recordedAt),
]);

// Ingestion jobs - one uploaded export moving through the pipeline
export const ingestionJobs = pgTable("ingestion_jobs", {
  id: varchar("id").primaryKey(),
  userId: varchar("user_id").notNull().references(() => userProfiles.userId, { onDelete: "cascade" }),
  rawFileRef: text("raw_file_ref").notNull(),
  provider: text("provider").$type<DataSource>().notNull(),
  state: ingestionJobStateEnum("state").notNull().default("queued"),
  attempts: integer("attempts").notNull().default(0),
  persistedCount: integer("persisted_count").notNull().default(0),
  warningCount: integer("warning_count").notNull().default(0),
  droppedCount: integer("dropped_count").notNull().default(0),
  errorLog: jsonb("error_log").$type<string[]>().notNull().default([]),
  lastErrorCode: text("last_error_code").$type<HealthEngineErrorCode>(),
  retryable: boolean("retryable").notNull().default(false),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
  completedAt: timestamp("completed_at"),
}, (table) => [
  index("idx_ingestion_jobs_user_state").on(table.userId, table.state),
]);

// Insight results - current findings per rule, superseded each evaluation cycle
export const insightResults = pgTable("insight_results", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  ruleId: text("rule_id").notNull(),
  userId: varchar("user_id").notNull().references(() => userProfiles.userId, { onDelete: "cascade" }),
  windowStart: text("window_start").notNull(), // YYYY-MM-DD
  windowEnd: text("window_end").notNull(), // YYYY-MM-DD
  lagDays: integer("lag_days").notNull(),
  effectSize: doublePrecision("effect_size").notNull(), // Pearson r at the selected lag
  confidence: doublePrecision("confidence").notNull(), // 0.0-1.0
  sampleCount: integer("sample_count").notNull(),
  renderedText: text("rendered_text").notNull(),
  computedAt: timestamp("computed_at").notNull(),
}, (table) => [
  uniqueIndex("insight_results_rule_user_window_idx").on(table.ruleId, table.userId, table.windowStart, table.windowEnd),
  index("idx_insight_results_user").on(table.userId),
]);

export const metricTypeSchema = z.custom<MetricType>(
  (value) => typeof value === "string" && isMetricType(value),
  { message: "Unknown metric type" }
);

export const dataSourceSchema = z.custom<DataSource>(
  (value) => typeof value === "string" && isDataSource(value),
  { message: "Unknown data source" }
);

export const insertCanonicalMetricRecordSchema = createInsertSchema(canonicalMetricRecords, {
  userId: z.string().min(1),
  metricType: metricTypeSchema,
  sourceProvider: dataSourceSchema,
  value: z.number().finite(),
}).omit({
  id: true,
  createdAt: true,
  updatedAt: true,
});

export const insertIngestionJobSchema = createInsertSchema(ingestionJobs, {
  id: z.string().min(1),
  userId: z.string().min(1),
  rawFileRef: z.string().min(1),
  provider: dataSourceSchema,
}).omit({
  createdAt: true,
  updatedAt: true,
  completedAt: true,
});

/** Records a provider wrote as its own total for the local day. */
export function isDailyTotal(metadata: Record<string, unknown> | null | undefined): boolean {
  return metadata?.granularity === 'daily';
}

export type UserProfile = typeof userProfiles.$inferSelect;
export type InsertUserProfile = typeof userProfiles.$inferInsert;
export type CanonicalMetricRecord = typeof canonicalMetricRecords.$inferSelect;
export type InsertCanonicalMetricRecord = typeof canonicalMetricRecords.$inferInsert;
export type IngestionJob = typeof ingestionJobs.$inferSelect;
export type InsertIngestionJob = typeof ingestionJobs.$inferInsert;
export type InsightResult = typeof insightResults.$inferSelect;
export type InsertInsightResult = typeof insightResults.$inferInsert;

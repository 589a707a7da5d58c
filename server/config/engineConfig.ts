import { z } from "zod";

const engineConfigSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  DEFAULT_TIMEZONE: z.string().min(1).default('UTC'),
  INGESTION_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  INGESTION_BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(30_000),
  INSIGHT_BUDGET_MS: z.coerce.number().int().min(1).default(60_000),
  INSIGHT_RUN_HOUR: z.coerce.number().int().min(0).max(23).default(6), // local hour
  INSIGHT_CRON: z.string().default('0 * * * *'),
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;

/**
 * Reads engine settings from the environment. Throws with the offending
 * variable names when a value is present but invalid.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = engineConfigSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`Invalid engine configuration: ${fields}`);
  }
  return parsed.data;
}

let cachedConfig: EngineConfig | null = null;

export function getEngineConfig(): EngineConfig {
  if (!cachedConfig) {
    cachedConfig = loadEngineConfig();
  }
  return cachedConfig;
}

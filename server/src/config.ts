import { z } from 'zod';
import { DEFAULT_MODEL } from './lib/anthropic.js';
import { readFeatureFlags, type FeatureFlags } from './lib/feature-flags.js';

/** Fatal start-up problem: nothing may be claimed once this is raised. */
export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1),
  ANTHROPIC_API_KEY: z.string().min(1),
  ANTHROPIC_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  MAX_TOKENS: positiveInt(8192),
  CANDIDATE_TABLE: z.string().regex(/^[a-z_][a-z0-9_]*$/).default('candidates'),
  CLAIM_WINDOW_DAYS: positiveInt(3),
  BATCH_SIZE: positiveInt(25),
  WORKERS: positiveInt(4),
  POLL_INTERVAL_MS: positiveInt(60_000),
  CYCLE_INTERVAL_S: positiveInt(300),
  MAX_TAXONOMY_CATEGORIES: positiveInt(2),
  DB_MAX_ATTEMPTS: positiveInt(3),
  DB_RETRY_BASE_MS: positiveInt(500),
  TAXONOMY_PATH: z.string().min(1).optional(),
  PORT: z.coerce.number().int().min(1).max(65_535).optional(),
});

export interface AppConfig {
  supabaseUrl: string;
  anthropicModel: string;
  maxTokens: number;
  candidateTable: string;
  windowDays: number;
  batchSize: number;
  workers: number;
  pollIntervalMs: number;
  cycleIntervalS: number;
  maxTaxonomyCategories: number;
  dbMaxAttempts: number;
  dbRetryBaseMs: number;
  taxonomyPath?: string;
  port?: number;
  flags: FeatureFlags;
}

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    out[key] = value === undefined || value.trim() === '' ? undefined : value;
  }
  return out;
}

/**
 * Validates the environment once at start-up. Credentials are checked here
 * but not copied into the returned config; the clients read them lazily.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration (${issues.join('; ')})`, issues);
  }
  const e = parsed.data;
  return {
    supabaseUrl: e.SUPABASE_URL,
    anthropicModel: e.ANTHROPIC_MODEL,
    maxTokens: e.MAX_TOKENS,
    candidateTable: e.CANDIDATE_TABLE,
    windowDays: e.CLAIM_WINDOW_DAYS,
    batchSize: e.BATCH_SIZE,
    workers: e.WORKERS,
    pollIntervalMs: e.POLL_INTERVAL_MS,
    cycleIntervalS: e.CYCLE_INTERVAL_S,
    maxTaxonomyCategories: e.MAX_TAXONOMY_CATEGORIES,
    dbMaxAttempts: e.DB_MAX_ATTEMPTS,
    dbRetryBaseMs: e.DB_RETRY_BASE_MS,
    taxonomyPath: e.TAXONOMY_PATH,
    port: e.PORT,
    flags: readFeatureFlags(env),
  };
}

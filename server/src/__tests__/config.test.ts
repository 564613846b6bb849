import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../config.js';
import { DEFAULT_MODEL } from '../lib/anthropic.js';

const required = {
  SUPABASE_URL: 'https://example.supabase.co',
  SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
  ANTHROPIC_API_KEY: 'test-key',
};

function configError(env: NodeJS.ProcessEnv): ConfigError {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig(required)).toEqual({
      supabaseUrl: 'https://example.supabase.co',
      anthropicModel: DEFAULT_MODEL,
      maxTokens: 8192,
      candidateTable: 'candidates',
      windowDays: 3,
      batchSize: 25,
      workers: 4,
      pollIntervalMs: 60_000,
      cycleIntervalS: 300,
      maxTaxonomyCategories: 2,
      dbMaxAttempts: 3,
      dbRetryBaseMs: 500,
      taxonomyPath: undefined,
      port: undefined,
      flags: { taxonomyContext: true, computedExperience: true },
    });
  });

  it('reads overrides and treats blank values as unset', () => {
    const config = loadConfig({
      ...required,
      BATCH_SIZE: '10',
      WORKERS: '  ',
      PORT: '8080',
      CANDIDATE_TABLE: 'resume_records',
      FF_TAXONOMY_CONTEXT: 'false',
      FF_COMPUTED_EXPERIENCE: '1',
    });
    expect(config.batchSize).toBe(10);
    expect(config.workers).toBe(4);
    expect(config.port).toBe(8080);
    expect(config.candidateTable).toBe('resume_records');
    expect(config.flags).toEqual({ taxonomyContext: false, computedExperience: true });
  });

  it('lists every missing credential', () => {
    const error = configError({});
    expect(error.issues).toEqual([
      'SUPABASE_URL: Required',
      'SUPABASE_SERVICE_ROLE_KEY: Required',
      'ANTHROPIC_API_KEY: Required',
    ]);
    expect(error.message).toContain('Invalid configuration');
  });

  it('rejects unsafe table names and bad numbers', () => {
    const error = configError({ ...required, CANDIDATE_TABLE: 'candidates; drop', BATCH_SIZE: '-1' });
    expect(error.issues.map((issue) => issue.split(':')[0])).toEqual(['CANDIDATE_TABLE', 'BATCH_SIZE']);
  });
});

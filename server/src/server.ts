import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import logger from './lib/logger.js';
import { captureError } from './lib/sentry.js';
import { getPipelineMetrics } from './lib/pipeline-metrics.js';
import type { JobTracker } from './batch/job-tracker.js';
import type { CandidateStore } from './store/candidate-store.js';

export interface OpsAppOptions {
  store: Pick<CandidateStore, 'ping'>;
  tracker: JobTracker;
  isShuttingDown?: () => boolean;
  startedAt?: number;
  env?: NodeJS.ProcessEnv;
}

/**
 * Liveness, readiness and metrics for a continuously running extractor.
 */
export function createOpsApp(options: OpsAppOptions): Hono {
  const app = new Hono();
  const env = options.env ?? process.env;
  const startedAt = options.startedAt ?? Date.now();
  const isShuttingDown = options.isShuttingDown ?? (() => false);
  const isProduction = env.NODE_ENV === 'production';

  app.use('*', async (c, next) => {
    await next();
    c.header('Cache-Control', 'no-store');
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
  });

  app.get('/health', (c) => {
    return c.json({
      status: isShuttingDown() ? 'draining' : 'ok',
      shutting_down: isShuttingDown(),
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/ready', async (c) => {
    const dbOk = await options.store.ping();
    const llmKeyPresent = Boolean(env.ANTHROPIC_API_KEY);
    const ready = !isShuttingDown() && dbOk && llmKeyPresent;
    return c.json({
      ready,
      shutting_down: isShuttingDown(),
      db_ok: dbOk,
      llm_key_ok: llmKeyPresent,
      timestamp: new Date().toISOString(),
    }, ready ? 200 : 503);
  });

  app.get('/metrics', (c) => {
    const metricsKey = env.METRICS_KEY;
    if (metricsKey) {
      if (c.req.header('Authorization') !== `Bearer ${metricsKey}`) {
        return c.json({ error: 'Unauthorized' }, 401);
      }
    } else if (isProduction) {
      return c.json({ error: 'Not found' }, 404);
    }

    const metrics = getPipelineMetrics();
    return c.json({
      uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
      shutting_down: isShuttingDown(),
      in_flight_jobs: options.tracker.list().map((job) => ({
        job_id: job.jobId,
        status: job.status,
        members: job.memberIds.length,
        submitted_at: job.submittedAt.toISOString(),
        last_checked_at: job.lastCheckedAt ? job.lastCheckedAt.toISOString() : null,
      })),
      records: {
        succeeded: metrics.counters.records_succeeded,
        failed: metrics.counters.records_failed,
      },
      last_cycle_at: metrics.last_cycle_at,
      pipeline_runtime: metrics,
    });
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    captureError(err, { path: c.req.path, method: c.req.method });
    logger.error({ err }, 'Unhandled ops endpoint error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}

export type OpsServer = ReturnType<typeof serve>;

export function startOpsServer(app: Hono, port: number): OpsServer {
  return serve({ fetch: app.fetch, port }, (info) => {
    logger.info({ port: info.port }, 'Ops endpoint listening');
  });
}

import { beforeEach, describe, it, expect } from 'vitest';
import { JobTracker } from '../batch/job-tracker.js';
import { recordJobOutcome, resetPipelineMetricsForTest } from '../lib/pipeline-metrics.js';
import { createOpsApp, type OpsAppOptions } from '../server.js';

function createApp(overrides: Partial<OpsAppOptions> = {}) {
  return createOpsApp({
    store: { ping: async () => true },
    tracker: new JobTracker(),
    env: { ANTHROPIC_API_KEY: 'test-key', NODE_ENV: 'test' },
    ...overrides,
  });
}

beforeEach(() => {
  resetPipelineMetricsForTest();
});

describe('ops endpoints', () => {
  it('returns no-store and security headers on /health', async () => {
    const res = await createApp().request('http://test/health');
    expect(res.status).toBe(200);
    expect(res.headers.get('cache-control')).toBe('no-store');
    expect(res.headers.get('x-content-type-options')).toBe('nosniff');
    expect(res.headers.get('x-frame-options')).toBe('DENY');
    expect(res.headers.get('referrer-policy')).toBe('no-referrer');
    const body: unknown = await res.json();
    expect(body).toMatchObject({ status: 'ok', shutting_down: false });
  });

  it('reports draining while shutting down', async () => {
    const app = createApp({ isShuttingDown: () => true });

    const health: unknown = await (await app.request('http://test/health')).json();
    expect(health).toMatchObject({ status: 'draining', shutting_down: true });

    const ready = await app.request('http://test/ready');
    expect(ready.status).toBe(503);
  });

  it('is ready when the store answers and the model key is set', async () => {
    const res = await createApp().request('http://test/ready');
    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ ready: true, db_ok: true, llm_key_ok: true });
  });

  it('is not ready when the store is unreachable', async () => {
    const res = await createApp({ store: { ping: async () => false } }).request('http://test/ready');
    expect(res.status).toBe(503);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ ready: false, db_ok: false, llm_key_ok: true });
  });

  it('is not ready without a model key', async () => {
    const res = await createApp({ env: {} }).request('http://test/ready');
    expect(res.status).toBe(503);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ ready: false, db_ok: true, llm_key_ok: false });
  });

  it('requires the bearer key on /metrics when one is configured', async () => {
    const tracker = new JobTracker();
    tracker.register('batch_1', [1, 2], new Date('2024-06-15T12:00:00Z'));
    recordJobOutcome({ status: 'completed', succeeded: 3, failed: 1 });
    const app = createApp({ tracker, env: { METRICS_KEY: 'test-secret' } });

    expect((await app.request('http://test/metrics')).status).toBe(401);
    expect((await app.request('http://test/metrics', { headers: { Authorization: 'Bearer wrong' } })).status).toBe(401);

    const res = await app.request('http://test/metrics', { headers: { Authorization: 'Bearer test-secret' } });
    expect(res.status).toBe(200);
    expect(res.headers.get('cache-control')).toBe('no-store');
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      shutting_down: false,
      in_flight_jobs: [{
        job_id: 'batch_1',
        status: 'queued',
        members: 2,
        submitted_at: '2024-06-15T12:00:00.000Z',
        last_checked_at: null,
      }],
      records: { succeeded: 3, failed: 1 },
      last_cycle_at: null,
    });
  });

  it('hides /metrics in production without a key', async () => {
    const res = await createApp({ env: { NODE_ENV: 'production' } }).request('http://test/metrics');
    expect(res.status).toBe(404);
  });

  it('serves /metrics openly outside production without a key', async () => {
    const res = await createApp().request('http://test/metrics');
    expect(res.status).toBe(200);
  });

  it('returns JSON for unknown paths', async () => {
    const res = await createApp().request('http://test/api/anything');
    expect(res.status).toBe(404);
    const body: unknown = await res.json();
    expect(body).toEqual({ error: 'Not found' });
  });

  it('turns handler failures into a 500', async () => {
    const app = createApp({
      store: {
        ping: async () => {
          throw new Error('probe exploded');
        },
      },
    });
    const res = await app.request('http://test/ready');
    expect(res.status).toBe(500);
    const body: unknown = await res.json();
    expect(body).toEqual({ error: 'Internal server error' });
  });
});

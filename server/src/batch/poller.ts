import { sleep } from '../lib/sleep.js';
import { recordJobOutcome } from '../lib/pipeline-metrics.js';
import type { PipelineContext } from '../pipeline/context.js';
import type { BatchSummary, ResultProcessor } from '../pipeline/result-processor.js';
import { isTerminalStatus, type BatchClient, type BatchResultItem } from './batch-client.js';
import type { JobTracker, TrackedJob } from './job-tracker.js';

export interface PollerOptions {
  intervalMs: number;
  onSummary?: (summary: BatchSummary) => void;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Drives tracked jobs to completion. Every tick checks each job by id;
 * in-flight jobs are left for the next tick, terminal ones are processed
 * and dropped from the tracker.
 */
export class BatchPoller {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private activeTick: Promise<BatchSummary[]> | null = null;
  /** Jobs whose terminal handling is underway, so overlapping checks don't process twice. */
  private readonly settling = new Set<string>();

  constructor(
    private readonly client: BatchClient,
    private readonly tracker: JobTracker,
    private readonly processor: ResultProcessor,
    private readonly ctx: PipelineContext,
    private readonly options: PollerOptions,
  ) {}

  /**
   * One status check for one job. Resolves to the summary once the job is
   * terminal and handled, or null while it is still in flight.
   */
  async checkJob(jobId: string): Promise<BatchSummary | null> {
    const job = this.tracker.get(jobId);
    if (!job || this.settling.has(jobId)) return null;
    const log = this.ctx.logger.child({ jobId });

    try {
      const report = await this.client.getStatus(jobId);
      job.lastCheckedAt = this.ctx.now();
      job.checkFailures = 0;
      if (report.status !== job.status) {
        log.info({ from: job.status, to: report.status, counts: report.counts }, 'Batch job status changed');
        job.status = report.status;
      }
    } catch (err) {
      job.checkFailures += 1;
      log.warn({ error: errorMessage(err), failures: job.checkFailures }, 'Batch status check failed; keeping job');
      return null;
    }

    if (!isTerminalStatus(job.status)) {
      log.debug({ status: job.status }, 'Batch job still in flight');
      return null;
    }

    this.settling.add(jobId);
    try {
      const summary = await this.settle(job);
      if (summary) {
        this.tracker.remove(jobId);
        recordJobOutcome(summary, this.ctx.now().getTime() - job.submittedAt.getTime());
        this.options.onSummary?.(summary);
      }
      return summary;
    } finally {
      this.settling.delete(jobId);
    }
  }

  private async settle(job: TrackedJob): Promise<BatchSummary | null> {
    if (job.status !== 'completed') {
      return this.processor.failJob(job, job.status, this.ctx);
    }
    let items: BatchResultItem[];
    try {
      items = await this.client.fetchOutput(job.jobId);
    } catch (err) {
      this.ctx.logger.warn({ jobId: job.jobId, error: errorMessage(err) }, 'Fetching batch output failed; will retry');
      return null;
    }
    return this.processor.processItems(job, items, this.ctx);
  }

  /** Checks every tracked job once; jobs are independent of each other. */
  async pollOnce(): Promise<BatchSummary[]> {
    const jobs = this.tracker.list();
    const results = await Promise.all(jobs.map((job) => this.checkJob(job.jobId)));
    return results.filter((summary): summary is BatchSummary => summary !== null);
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.ctx.logger.info({ intervalMs: this.options.intervalMs }, 'Batch poller started');
    this.schedule(0);
  }

  private schedule(delayMs: number): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.activeTick = this.pollOnce();
      void this.activeTick
        .catch((err: unknown) => {
          this.ctx.logger.error({ error: errorMessage(err) }, 'Batch poll tick failed');
          return [];
        })
        .finally(() => {
          this.activeTick = null;
          this.schedule(this.options.intervalMs);
        });
    }, delayMs);
  }

  /** Stops rescheduling and waits for a tick already underway. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.activeTick) {
      await this.activeTick.catch(() => []);
    }
    this.ctx.logger.info({ inFlight: this.tracker.size }, 'Batch poller stopped');
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Polls a single job until it is terminal and handled. */
  async waitFor(jobId: string, wait: (ms: number) => Promise<void> = sleep): Promise<BatchSummary> {
    for (;;) {
      if (!this.tracker.has(jobId)) {
        throw new Error(`Batch job ${jobId} is not tracked`);
      }
      const summary = await this.checkJob(jobId);
      if (summary) return summary;
      await wait(this.options.intervalMs);
    }
  }
}

import type { AppConfig } from '../config.js';
import { createCompletion, type CompletionRequest } from '../lib/anthropic.js';
import { recordCycle, recordJobOutcome, recordJobSubmitted } from '../lib/pipeline-metrics.js';
import { sleep } from '../lib/sleep.js';
import { captureError } from '../lib/sentry.js';
import { isTerminalStatus, type BatchClient, type BatchStatusReport } from '../batch/batch-client.js';
import { parseItemId } from '../batch/item-id.js';
import { JobTracker, type TrackedJob } from '../batch/job-tracker.js';
import { BatchPoller } from '../batch/poller.js';
import { BatchSubmissionError, BatchSubmitter } from '../batch/submitter.js';
import { buildExtractionPrompt } from '../extraction/prompt-builder.js';
import type { TaxonomyMatcher } from '../extraction/taxonomy.js';
import type { CandidateStore } from '../store/candidate-store.js';
import { PersistenceWriter } from '../store/persistence-writer.js';
import type { PipelineContext } from './context.js';
import { ResultProcessor, type BatchSummary, type RecordOutcome } from './result-processor.js';
import { claimRecords, selectWork } from './work-queue.js';

export type PipelineSettings = Pick<
  AppConfig,
  | 'anthropicModel'
  | 'maxTokens'
  | 'windowDays'
  | 'batchSize'
  | 'workers'
  | 'pollIntervalMs'
  | 'cycleIntervalS'
  | 'maxTaxonomyCategories'
  | 'dbMaxAttempts'
  | 'dbRetryBaseMs'
  | 'flags'
>;

export interface PipelineDeps {
  settings: PipelineSettings;
  store: CandidateStore;
  client: BatchClient;
  ctx: PipelineContext;
  /** Null disables taxonomy context regardless of the flag. */
  taxonomy: TaxonomyMatcher | null;
  completion?: (request: CompletionRequest) => Promise<string>;
  wait?: (ms: number) => Promise<void>;
  onSummary?: (summary: BatchSummary) => void;
}

export interface ContinuousHandle {
  stop(): Promise<void>;
}

/**
 * Wires selection, claiming, submission, polling and result handling for one
 * run. Every stage receives the run's context.
 */
export class ExtractionPipeline {
  readonly tracker = new JobTracker();
  readonly poller: BatchPoller;
  readonly processor: ResultProcessor;
  private readonly submitter: BatchSubmitter;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly completion: (request: CompletionRequest) => Promise<string>;

  constructor(private readonly deps: PipelineDeps) {
    const { settings } = deps;
    const taxonomy = settings.flags.taxonomyContext ? deps.taxonomy : null;
    this.wait = deps.wait ?? sleep;
    this.completion = deps.completion ?? createCompletion;
    const writer = new PersistenceWriter(deps.store, {
      maxAttempts: settings.dbMaxAttempts,
      baseDelayMs: settings.dbRetryBaseMs,
      logger: deps.ctx.logger,
    });
    this.processor = new ResultProcessor({
      writer,
      workers: settings.workers,
      computedExperience: settings.flags.computedExperience,
    });
    this.submitter = new BatchSubmitter(deps.client, this.tracker, {
      workers: settings.workers,
      maxTaxonomyCategories: settings.maxTaxonomyCategories,
      taxonomy,
    });
    this.poller = new BatchPoller(deps.client, this.tracker, this.processor, deps.ctx, {
      intervalMs: settings.pollIntervalMs,
      onSummary: deps.onSummary,
    });
  }

  private get ctx(): PipelineContext {
    return this.deps.ctx;
  }

  /** Select, claim and submit one job. Null when nothing was submitted. */
  async runCycle(): Promise<TrackedJob | null> {
    const { settings, store } = this.deps;
    recordCycle(this.ctx.now());
    const work = await selectWork(store, this.ctx, {
      windowDays: settings.windowDays,
      batchSize: settings.batchSize,
    });
    if (work.length === 0) {
      this.ctx.logger.info('No claimable records this cycle');
      return null;
    }

    const claims = await claimRecords(store, this.ctx, work, {
      workers: settings.workers,
      maxAttempts: settings.dbMaxAttempts,
      baseDelayMs: settings.dbRetryBaseMs,
    });
    try {
      const job = await this.submitter.submit(claims.claimed, this.ctx);
      if (job) recordJobSubmitted();
      return job;
    } catch (err) {
      if (!(err instanceof BatchSubmissionError)) throw err;
      captureError(err, { runId: this.ctx.runId, memberIds: err.memberIds });
      const summary: BatchSummary = {
        jobId: null,
        status: 'failed',
        total: err.memberIds.length,
        succeeded: 0,
        failed: err.memberIds.length,
        failedIds: [...err.memberIds],
      };
      recordJobOutcome(summary);
      this.deps.onSummary?.(summary);
      return null;
    }
  }

  /** One cycle, then poll that job until it is terminal. */
  async runOnce(): Promise<BatchSummary | null> {
    const job = await this.runCycle();
    if (!job) return null;
    return this.poller.waitFor(job.jobId, this.wait);
  }

  /**
   * Submits a job every `cycleIntervalS` seconds while the poller runs on its
   * own schedule. Jobs from earlier cycles stay tracked until terminal.
   */
  startContinuous(): ContinuousHandle {
    const intervalMs = this.deps.settings.cycleIntervalS * 1000;
    let timer: ReturnType<typeof setTimeout> | null = null;
    let stopped = false;
    let activeCycle: Promise<void> | null = null;

    const tick = () => {
      timer = null;
      activeCycle = this.runCycle()
        .then(() => undefined)
        .catch((err: unknown) => {
          captureError(err, { runId: this.ctx.runId });
          this.ctx.logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Submission cycle failed');
        })
        .finally(() => {
          activeCycle = null;
          if (!stopped) timer = setTimeout(tick, intervalMs);
        });
    };

    this.poller.start();
    this.ctx.logger.info({ intervalS: this.deps.settings.cycleIntervalS }, 'Continuous mode started');
    tick();

    return {
      stop: async () => {
        stopped = true;
        if (timer) clearTimeout(timer);
        if (activeCycle) await activeCycle;
        await this.poller.stop();
      },
    };
  }

  /**
   * Processes one record outside any batch: direct model call, then the same
   * parse, merge, validate and persist path. No claim is taken.
   */
  async processSingleRecord(recordId: number): Promise<RecordOutcome> {
    const { settings, store } = this.deps;
    const log = this.ctx.logger.child({ recordId });
    const record = await store.getById(recordId);
    const rawText = record?.rawText?.trim() ?? '';
    if (!record || !rawText) {
      log.error({ found: Boolean(record) }, 'Record not found or has no resume text');
      return { recordId, ok: false, message: record ? 'Record has no resume text' : 'Record not found' };
    }

    const taxonomy = settings.flags.taxonomyContext ? this.deps.taxonomy : null;
    const taxonomyContext = taxonomy?.match(rawText, settings.maxTaxonomyCategories, { recordId }).context ?? '';
    const prompt = buildExtractionPrompt(rawText, taxonomyContext);

    let body: string;
    try {
      body = await this.completion({
        model: settings.anthropicModel,
        maxTokens: settings.maxTokens,
        system: prompt.system,
        prompt: prompt.user,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error({ error: message }, 'Model call failed');
      return { recordId, ok: false, message };
    }
    return this.processor.processRecord(recordId, body, this.ctx);
  }

  /**
   * Picks up a job submitted by an earlier process. Member ids come from the
   * result item ids, so a job that never completed reports no members.
   */
  async resumeJob(jobId: string): Promise<BatchSummary> {
    const { client } = this.deps;
    const log = this.ctx.logger.child({ jobId });
    let report: BatchStatusReport | null = null;
    while (!report || !isTerminalStatus(report.status)) {
      if (report) await this.wait(this.deps.settings.pollIntervalMs);
      try {
        report = await client.getStatus(jobId);
        log.info({ status: report.status, counts: report.counts }, 'Checked batch job');
      } catch (err) {
        log.warn({ error: err instanceof Error ? err.message : String(err) }, 'Batch status check failed; retrying');
        report = null;
        await this.wait(this.deps.settings.pollIntervalMs);
      }
    }

    if (report.status !== 'completed') {
      const summary = this.processor.failJob({ jobId, memberIds: [] }, report.status, this.ctx);
      recordJobOutcome(summary);
      return summary;
    }

    const items = await client.fetchOutput(jobId);
    const memberIds = [...new Set(
      items.map((item) => parseItemId(item.itemId)).filter((id): id is number => id !== null),
    )];
    const summary = await this.processor.processItems({ jobId, memberIds }, items, this.ctx);
    recordJobOutcome(summary);
    return summary;
  }
}

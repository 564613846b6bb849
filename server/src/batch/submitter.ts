import { createConcurrencyLimiter } from '../lib/concurrency.js';
import { buildExtractionPrompt } from '../extraction/prompt-builder.js';
import type { PhrasingCatalog } from '../extraction/phrasings.js';
import type { TaxonomyMatcher } from '../extraction/taxonomy.js';
import type { PipelineContext } from '../pipeline/context.js';
import type { ClaimedRecord } from '../pipeline/work-queue.js';
import type { BatchClient, BatchRequestItem } from './batch-client.js';
import { buildItemId } from './item-id.js';
import type { JobTracker, TrackedJob } from './job-tracker.js';

export interface SubmitterOptions {
  workers: number;
  maxTaxonomyCategories: number;
  /** Null turns taxonomy context off. */
  taxonomy: TaxonomyMatcher | null;
  catalog?: PhrasingCatalog;
}

export class BatchSubmissionError extends Error {
  constructor(message: string, readonly memberIds: readonly number[], options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BatchSubmissionError';
  }
}

/**
 * Turns claimed records into one batch job and hands it to the tracker. It
 * returns as soon as the service accepts the job.
 */
export class BatchSubmitter {
  constructor(
    private readonly client: BatchClient,
    private readonly tracker: JobTracker,
    private readonly options: SubmitterOptions,
  ) {}

  async prepareItems(records: readonly ClaimedRecord[], ctx: PipelineContext): Promise<BatchRequestItem[]> {
    const limit = createConcurrencyLimiter(this.options.workers);
    const { taxonomy, maxTaxonomyCategories, catalog } = this.options;
    return Promise.all(records.map((record) => limit(async () => {
      const match = taxonomy?.match(record.rawText, maxTaxonomyCategories, { recordId: record.id });
      if (match && match.selected.length === 0) {
        ctx.logger.debug({ recordId: record.id }, 'Prompt built without taxonomy context');
      }
      const prompt = buildExtractionPrompt(record.rawText, match?.context ?? '', catalog);
      return { itemId: buildItemId(record.id), system: prompt.system, prompt: prompt.user };
    })));
  }

  /** Null when there is nothing to submit. Throws {@link BatchSubmissionError} when the service rejects the job. */
  async submit(records: readonly ClaimedRecord[], ctx: PipelineContext): Promise<TrackedJob | null> {
    if (records.length === 0) {
      ctx.logger.info('No claimed records to submit');
      return null;
    }
    const memberIds = records.map((record) => record.id);
    const items = await this.prepareItems(records, ctx);

    let jobId: string;
    try {
      jobId = await this.client.submit(items);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      ctx.logger.error({ error: message, memberIds }, 'Batch submission failed');
      throw new BatchSubmissionError(`Batch submission failed: ${message}`, memberIds, { cause: err });
    }

    const job = this.tracker.register(jobId, memberIds, ctx.now());
    ctx.logger.info({ jobId, members: memberIds.length }, 'Submitted batch job');
    return job;
  }
}

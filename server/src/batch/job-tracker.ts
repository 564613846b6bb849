import type { BatchStatus } from './batch-client.js';

export interface TrackedJob {
  jobId: string;
  /** Fixed at submission. */
  readonly memberIds: readonly number[];
  status: BatchStatus;
  submittedAt: Date;
  lastCheckedAt: Date | null;
  /** Consecutive status checks that failed to reach the service. */
  checkFailures: number;
}

/**
 * In-flight batch jobs keyed by external id. Any number of jobs may be
 * tracked at once; nothing here assumes a single active job.
 */
export class JobTracker {
  private readonly jobs = new Map<string, TrackedJob>();

  register(jobId: string, memberIds: readonly number[], submittedAt: Date = new Date()): TrackedJob {
    const job: TrackedJob = {
      jobId,
      memberIds: [...memberIds],
      status: 'queued',
      submittedAt,
      lastCheckedAt: null,
      checkFailures: 0,
    };
    this.jobs.set(jobId, job);
    return job;
  }

  get(jobId: string): TrackedJob | undefined {
    return this.jobs.get(jobId);
  }

  has(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  list(): TrackedJob[] {
    return [...this.jobs.values()];
  }

  remove(jobId: string): boolean {
    return this.jobs.delete(jobId);
  }

  get size(): number {
    return this.jobs.size;
  }
}

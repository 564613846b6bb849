const DURATION_BUCKETS_S = [60, 300, 900, 1800, 3600, 7200, 21600, 86400];

interface PipelineCounters {
  cycles: number;
  jobs_submitted: number;
  jobs_completed: number;
  jobs_failed: number;
  jobs_expired: number;
  records_succeeded: number;
  records_failed: number;
}

export interface JobOutcomeMetric {
  status: string;
  succeeded: number;
  failed: number;
}

const counters: PipelineCounters = {
  cycles: 0,
  jobs_submitted: 0,
  jobs_completed: 0,
  jobs_failed: 0,
  jobs_expired: 0,
  records_succeeded: 0,
  records_failed: 0,
};

let lastCycleAt: Date | null = null;
let durationCount = 0;
let durationSumS = 0;
const durationHistogram = new Array<number>(DURATION_BUCKETS_S.length + 1).fill(0);

function observeDuration(seconds: number): void {
  durationCount += 1;
  durationSumS += seconds;
  const idx = DURATION_BUCKETS_S.findIndex((limit) => seconds <= limit);
  const bucketIndex = idx >= 0 ? idx : DURATION_BUCKETS_S.length;
  durationHistogram[bucketIndex] += 1;
}

export function recordCycle(at: Date = new Date()): void {
  counters.cycles += 1;
  lastCycleAt = at;
}

export function recordJobSubmitted(): void {
  counters.jobs_submitted += 1;
}

/** Counts a terminal job and its records. `durationMs` is submission to terminal status. */
export function recordJobOutcome(outcome: JobOutcomeMetric, durationMs?: number): void {
  if (outcome.status === 'completed') counters.jobs_completed += 1;
  else if (outcome.status === 'expired') counters.jobs_expired += 1;
  else counters.jobs_failed += 1;
  counters.records_succeeded += outcome.succeeded;
  counters.records_failed += outcome.failed;
  if (durationMs !== undefined && durationMs >= 0) observeDuration(durationMs / 1000);
}

export function getPipelineMetrics() {
  return {
    counters: { ...counters },
    last_cycle_at: lastCycleAt ? lastCycleAt.toISOString() : null,
    job_duration: {
      count: durationCount,
      avg_s: durationCount > 0 ? Math.round((durationSumS / durationCount) * 100) / 100 : 0,
      buckets_s: DURATION_BUCKETS_S,
      histogram: [...durationHistogram],
    },
  };
}

export function resetPipelineMetricsForTest(): void {
  counters.cycles = 0;
  counters.jobs_submitted = 0;
  counters.jobs_completed = 0;
  counters.jobs_failed = 0;
  counters.jobs_expired = 0;
  counters.records_succeeded = 0;
  counters.records_failed = 0;
  lastCycleAt = null;
  durationCount = 0;
  durationSumS = 0;
  durationHistogram.fill(0);
}

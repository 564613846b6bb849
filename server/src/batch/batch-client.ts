/**
 * Asynchronous LLM batch service. One job covers many records; the service
 * drives the job through its lifecycle and exposes per-item outcomes once it
 * reaches a terminal status.
 */

export type BatchStatus = 'queued' | 'validating' | 'in_progress' | 'completed' | 'failed' | 'expired';

export const TERMINAL_STATUSES: ReadonlySet<BatchStatus> = new Set(['completed', 'failed', 'expired']);

export function isTerminalStatus(status: BatchStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export interface BatchRequestItem {
  itemId: string;
  system: string;
  prompt: string;
}

export interface BatchRequestCounts {
  processing: number;
  succeeded: number;
  errored: number;
  canceled: number;
  expired: number;
}

export interface BatchStatusReport {
  jobId: string;
  status: BatchStatus;
  counts: BatchRequestCounts;
}

export interface BatchResultItem {
  itemId: string;
  /** HTTP-style status for this item. Anything outside 2xx is a per-record failure. */
  statusCode: number;
  body: string;
  error?: string;
}

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

export interface BatchClient {
  /** Uploads every item as one job and returns its external id without waiting. */
  submit(items: BatchRequestItem[]): Promise<string>;
  getStatus(jobId: string): Promise<BatchStatusReport>;
  /** Only meaningful once the job is `completed`. */
  fetchOutput(jobId: string): Promise<BatchResultItem[]>;
}

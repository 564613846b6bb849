import type Anthropic from '@anthropic-ai/sdk';
import { extractResponseText, getAnthropicClient } from '../lib/anthropic.js';
import { withRetry } from '../lib/retry.js';
import type {
  BatchClient,
  BatchRequestCounts,
  BatchRequestItem,
  BatchResultItem,
  BatchStatus,
  BatchStatusReport,
} from './batch-client.js';

/** Fields of a batch job the status mapping reads. */
export interface VendorBatch {
  id: string;
  processing_status: string;
  request_counts: BatchRequestCounts;
}

/** One line of the results stream, narrowed to what the item mapping reads. */
export interface VendorResultLine {
  custom_id: string;
  result: {
    type: string;
    message?: Pick<Anthropic.Message, 'content'>;
    error?: { error?: { type?: string; message?: string } };
  };
}

const ERROR_STATUS: Record<string, number> = {
  invalid_request_error: 400,
  authentication_error: 401,
  permission_error: 403,
  not_found_error: 404,
  request_too_large: 413,
  rate_limit_error: 429,
  api_error: 500,
  overloaded_error: 529,
};

export const EXPIRED_ITEM_STATUS = 408;
export const CANCELED_ITEM_STATUS = 499;

export function mapVendorStatus(batch: VendorBatch): BatchStatus {
  if (batch.processing_status !== 'ended') return 'in_progress';
  const { succeeded, errored, canceled, expired } = batch.request_counts;
  if (expired > 0 && succeeded + errored + canceled === 0) return 'expired';
  if (succeeded + errored === 0) return 'failed';
  return 'completed';
}

export function mapResultLine(line: VendorResultLine): BatchResultItem {
  const { result } = line;
  switch (result.type) {
    case 'succeeded':
      return {
        itemId: line.custom_id,
        statusCode: 200,
        body: result.message ? extractResponseText(result.message) : '',
      };
    case 'errored': {
      const type = result.error?.error?.type ?? 'api_error';
      return {
        itemId: line.custom_id,
        statusCode: ERROR_STATUS[type] ?? 500,
        body: '',
        error: result.error?.error?.message ?? type,
      };
    }
    case 'expired':
      return { itemId: line.custom_id, statusCode: EXPIRED_ITEM_STATUS, body: '', error: 'expired' };
    default:
      return { itemId: line.custom_id, statusCode: CANCELED_ITEM_STATUS, body: '', error: result.type };
  }
}

export interface AnthropicBatchOptions {
  model: string;
  maxTokens: number;
}

/** Message Batches adapter. Jobs are queued on submit and report `ended` when terminal. */
export class AnthropicBatchClient implements BatchClient {
  constructor(
    private readonly options: AnthropicBatchOptions,
    private readonly client: () => Anthropic = getAnthropicClient,
  ) {}

  async submit(items: BatchRequestItem[]): Promise<string> {
    const batch = await withRetry(() => this.client().messages.batches.create({
      requests: items.map((item) => ({
        custom_id: item.itemId,
        params: {
          model: this.options.model,
          max_tokens: this.options.maxTokens,
          system: item.system,
          messages: [{ role: 'user' as const, content: item.prompt }],
        },
      })),
    }), { maxAttempts: 3, baseDelay: 2000 });
    return batch.id;
  }

  async getStatus(jobId: string): Promise<BatchStatusReport> {
    const batch: VendorBatch = await withRetry(() => this.client().messages.batches.retrieve(jobId));
    return { jobId, status: mapVendorStatus(batch), counts: { ...batch.request_counts } };
  }

  async fetchOutput(jobId: string): Promise<BatchResultItem[]> {
    const items: BatchResultItem[] = [];
    const stream = await withRetry(() => this.client().messages.batches.results(jobId));
    for await (const line of stream) {
      items.push(mapResultLine(line));
    }
    return items;
  }
}

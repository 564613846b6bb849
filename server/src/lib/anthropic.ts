import Anthropic from '@anthropic-ai/sdk';
import { withRetry } from './retry.js';

let anthropicClient: Anthropic | null = null;

/**
 * Lazily create the Anthropic client so modules can be imported in test/dev
 * environments even when Anthropic credentials are not configured.
 */
export function getAnthropicClient(): Anthropic {
  const apiKey = process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new Error('ANTHROPIC_API_KEY environment variable is required');
  }
  if (!anthropicClient) {
    // Retries are handled by withRetry so backoff policy lives in one place.
    anthropicClient = new Anthropic({ apiKey, maxRetries: 0 });
  }
  return anthropicClient;
}

export const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';

/**
 * Extract the text content from the first text block in an Anthropic API response.
 * Returns an empty string if no text block is found.
 */
export function extractResponseText(response: Pick<Anthropic.Message, 'content'>): string {
  const firstBlock = response.content.find((block) => block.type === 'text');
  return firstBlock?.type === 'text' ? firstBlock.text : '';
}

export interface CompletionRequest {
  model: string;
  maxTokens: number;
  system: string;
  prompt: string;
}

/** Single synchronous completion, used when one record is processed outside a batch. */
export async function createCompletion(request: CompletionRequest): Promise<string> {
  const client = getAnthropicClient();
  const response = await withRetry(() => client.messages.create({
    model: request.model,
    max_tokens: request.maxTokens,
    system: request.system,
    messages: [{ role: 'user', content: request.prompt }],
  }), { maxAttempts: 3, baseDelay: 2000 });
  return extractResponseText(response);
}

export type StoreErrorKind =
  | 'deadlock'
  | 'timeout'
  | 'network'
  | 'auth'
  | 'syntax'
  | 'constraint'
  | 'unknown';

const RETRYABLE_KINDS: ReadonlySet<StoreErrorKind> = new Set(['deadlock', 'timeout', 'network']);

const CODE_KINDS: Record<string, StoreErrorKind> = {
  '40P01': 'deadlock',
  '40001': 'deadlock',
  '57014': 'timeout',
  '55P03': 'timeout',
  '28P01': 'auth',
  '28000': 'auth',
  '42501': 'auth',
  PGRST301: 'auth',
  PGRST302: 'auth',
  '42601': 'syntax',
  '42703': 'syntax',
  '42P01': 'syntax',
  PGRST204: 'syntax',
  PGRST200: 'syntax',
  '23505': 'constraint',
  '23502': 'constraint',
  '23503': 'constraint',
  '23514': 'constraint',
  '22001': 'constraint',
};

const NETWORK_PATTERNS = [
  'fetch failed',
  'network error',
  'socket hang up',
  'econnreset',
  'econnrefused',
  'etimedout',
  'enotfound',
  'eai_again',
];

/** A failure reported by the relational store, classified for the retry policy. */
export class StoreError extends Error {
  readonly retryable: boolean;

  constructor(
    message: string,
    readonly kind: StoreErrorKind,
    readonly code: string | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StoreError';
    this.retryable = RETRYABLE_KINDS.has(kind);
  }
}

function stringProp(value: unknown, key: string): string | null {
  if (typeof value !== 'object' || value === null) return null;
  const prop: unknown = Reflect.get(value, key);
  return typeof prop === 'string' && prop ? prop : null;
}

export function classifyStoreErrorKind(code: string | null, message: string): StoreErrorKind {
  const known = code ? CODE_KINDS[code] : undefined;
  if (known) return known;
  const lower = message.toLowerCase();
  if (lower.includes('deadlock')) return 'deadlock';
  if (lower.includes('statement timeout') || lower.includes('canceling statement') || lower.includes('lock timeout')) {
    return 'timeout';
  }
  if (NETWORK_PATTERNS.some((pattern) => lower.includes(pattern))) return 'network';
  if (lower.includes('jwt') || lower.includes('invalid api key') || lower.includes('permission denied')) return 'auth';
  return 'unknown';
}

/**
 * Wraps a PostgREST error object, a thrown fetch failure or anything else
 * the store hands back into a StoreError.
 */
export function toStoreError(error: unknown, operation: string): StoreError {
  if (error instanceof StoreError) return error;
  const code = stringProp(error, 'code');
  const message = stringProp(error, 'message') ?? String(error);
  const detail = stringProp(error, 'details');
  const details = detail ? ` (${detail})` : '';
  const kind = classifyStoreErrorKind(code, `${message}${details}`);
  return new StoreError(`${operation} failed: ${message}${details}`, kind, code, { cause: error });
}

export function isRetryableStoreError(error: unknown): boolean {
  return error instanceof StoreError && error.retryable;
}

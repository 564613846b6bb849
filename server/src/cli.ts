import { parseArgs } from 'node:util';
import { z } from 'zod';
import type { AppConfig } from './config.js';

export const USAGE = `Usage: candidate-extract [options]

Claims unprocessed resume records, extracts candidate attributes through an
LLM batch job and writes them back to the candidate table.

Options:
  --batch-size <n>       Records per batch job
  --workers <n>          Concurrent workers for claiming, prompts and writes
  --continuous           Submit a job every interval while polling in the background
  --interval <s>         Seconds between submission cycles in continuous mode
  --poll-interval <ms>   Milliseconds between batch status checks
  --window-days <n>      Only select records that became ready in the last n days
  --record-id <id>       Process a single record directly, without a batch or claim
  --check-batch <jobId>  Resume polling an existing batch job and process its results
  --port <n>             Serve /health, /ready and /metrics in continuous mode
  -h, --help             Show this help`;

export type RunMode =
  | { kind: 'once' }
  | { kind: 'continuous' }
  | { kind: 'single'; recordId: number }
  | { kind: 'check-batch'; jobId: string };

export interface CliOptions {
  mode: RunMode;
  help: boolean;
  overrides: Partial<Pick<AppConfig, 'batchSize' | 'workers' | 'cycleIntervalS' | 'pollIntervalMs' | 'windowDays' | 'port'>>;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const optionalPositive = z.coerce.number().int().positive().optional();

const ArgsSchema = z.object({
  'batch-size': optionalPositive,
  workers: optionalPositive,
  continuous: z.boolean().default(false),
  interval: optionalPositive,
  'poll-interval': optionalPositive,
  'window-days': optionalPositive,
  'record-id': optionalPositive,
  'check-batch': z.string().trim().min(1).optional(),
  port: z.coerce.number().int().min(1).max(65_535).optional(),
  help: z.boolean().default(false),
}).refine(
  (args) => [args.continuous, args['record-id'] !== undefined, args['check-batch'] !== undefined].filter(Boolean).length <= 1,
  { message: '--continuous, --record-id and --check-batch cannot be combined' },
);

export function parseCliArgs(argv: string[]): CliOptions {
  let values: Record<string, string | boolean | undefined>;
  try {
    ({ values } = parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        'batch-size': { type: 'string' },
        workers: { type: 'string' },
        continuous: { type: 'boolean' },
        interval: { type: 'string' },
        'poll-interval': { type: 'string' },
        'window-days': { type: 'string' },
        'record-id': { type: 'string' },
        'check-batch': { type: 'string' },
        port: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    }));
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }

  const parsed = ArgsSchema.safeParse(values);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `--${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new CliUsageError(detail);
  }
  const args = parsed.data;

  let mode: RunMode = { kind: 'once' };
  if (args.continuous) mode = { kind: 'continuous' };
  else if (args['record-id'] !== undefined) mode = { kind: 'single', recordId: args['record-id'] };
  else if (args['check-batch'] !== undefined) mode = { kind: 'check-batch', jobId: args['check-batch'] };

  const overrides: CliOptions['overrides'] = {};
  if (args['batch-size'] !== undefined) overrides.batchSize = args['batch-size'];
  if (args.workers !== undefined) overrides.workers = args.workers;
  if (args.interval !== undefined) overrides.cycleIntervalS = args.interval;
  if (args['poll-interval'] !== undefined) overrides.pollIntervalMs = args['poll-interval'];
  if (args['window-days'] !== undefined) overrides.windowDays = args['window-days'];
  if (args.port !== undefined) overrides.port = args.port;

  return { mode, help: args.help, overrides };
}

export function applyOverrides(config: AppConfig, overrides: CliOptions['overrides']): AppConfig {
  return { ...config, ...overrides };
}

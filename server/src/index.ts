#!/usr/bin/env node
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import logger from './lib/logger.js';
import { initSentry, captureError, flushSentry } from './lib/sentry.js';
import { ConfigError, loadConfig, type AppConfig } from './config.js';
import { applyOverrides, CliUsageError, parseCliArgs, USAGE, type CliOptions } from './cli.js';
import { AnthropicBatchClient } from './batch/anthropic-batch-client.js';
import { getTaxonomyMatcher } from './extraction/taxonomy.js';
import { createPipelineContext } from './pipeline/context.js';
import { ExtractionPipeline } from './pipeline/run.js';
import type { BatchSummary, RecordOutcome } from './pipeline/result-processor.js';
import { SupabaseCandidateStore } from './store/supabase-candidate-store.js';
import { toColumnName } from './extraction/fields.js';
import { createOpsApp, startOpsServer, type OpsServer } from './server.js';

type Write = (line: string) => void;

const stdout: Write = (line) => {
  process.stdout.write(`${line}\n`);
};

export function formatSummary(summary: BatchSummary): string {
  const lines = [
    `Batch ${summary.jobId ?? '(not submitted)'}: ${summary.status}`,
    `  total:     ${summary.total}`,
    `  succeeded: ${summary.succeeded}`,
    `  failed:    ${summary.failed}`,
  ];
  if (summary.failedIds.length > 0) {
    lines.push(`  failed ids: ${summary.failedIds.join(', ')}`);
  }
  return lines.join('\n');
}

export function formatRecordReport(outcome: RecordOutcome): string {
  const lines = [`Record ${outcome.recordId}: ${outcome.ok ? 'ok' : 'failed'} (${outcome.message})`];
  for (const [field, value] of outcome.fields?.knownEntries() ?? []) {
    lines.push(`  ${toColumnName(field)}: ${value}`);
  }
  for (const issue of outcome.issues ?? []) {
    lines.push(`  ! ${toColumnName(issue.field)} ${issue.action}: ${issue.from} -> ${issue.to ?? 'NULL'}`);
  }
  const missing = outcome.diagnostics?.missingKeyFields ?? [];
  if (missing.length > 0) {
    lines.push(`  missing key fields: ${missing.map(toColumnName).join(', ')}`);
  }
  return lines.join('\n');
}

function waitForShutdownSignal(): Promise<string> {
  return new Promise((resolve) => {
    const onSignal = (signal: string) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

function closeServer(server: OpsServer): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve());
  });
}

/** Runs the CLI and resolves to the process exit code. */
export async function main(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  write: Write = stdout,
): Promise<number> {
  let cli: CliOptions;
  try {
    cli = parseCliArgs(argv);
  } catch (err) {
    if (!(err instanceof CliUsageError)) throw err;
    write(`${err.message}\n\n${USAGE}`);
    return 2;
  }
  if (cli.help) {
    write(USAGE);
    return 0;
  }

  initSentry();
  let config: AppConfig;
  try {
    config = applyOverrides(loadConfig(env), cli.overrides);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    logger.error({ issues: err.issues }, 'Configuration invalid; nothing was claimed');
    return 1;
  }

  const ctx = createPipelineContext();
  const store = new SupabaseCandidateStore(config.candidateTable);
  const pipeline = new ExtractionPipeline({
    settings: config,
    store,
    client: new AnthropicBatchClient({ model: config.anthropicModel, maxTokens: config.maxTokens }),
    ctx,
    taxonomy: config.flags.taxonomyContext ? getTaxonomyMatcher(config.taxonomyPath) : null,
    onSummary: (summary) => write(formatSummary(summary)),
  });
  ctx.logger.info({ mode: cli.mode.kind, batchSize: config.batchSize, workers: config.workers }, 'Extraction run starting');

  try {
    switch (cli.mode.kind) {
      case 'single': {
        const outcome = await pipeline.processSingleRecord(cli.mode.recordId);
        write(formatRecordReport(outcome));
        return outcome.ok ? 0 : 1;
      }
      case 'check-batch': {
        const summary = await pipeline.resumeJob(cli.mode.jobId);
        write(formatSummary(summary));
        return 0;
      }
      case 'continuous': {
        let shuttingDown = false;
        const handle = pipeline.startContinuous();
        const port = config.port;
        const server = port === undefined
          ? null
          : startOpsServer(createOpsApp({ store, tracker: pipeline.tracker, isShuttingDown: () => shuttingDown }), port);
        const signal = await waitForShutdownSignal();
        shuttingDown = true;
        ctx.logger.info({ signal, inFlight: pipeline.tracker.size }, 'Shutdown requested');
        await handle.stop();
        if (server) await closeServer(server);
        return 0;
      }
      case 'once': {
        const summary = await pipeline.runOnce();
        if (!summary) write('No batch job submitted');
        return 0;
      }
    }
  } catch (err) {
    captureError(err, { runId: ctx.runId, mode: cli.mode.kind });
    ctx.logger.error({ err }, 'Extraction run failed');
    return 1;
  } finally {
    await flushSentry(2000);
  }
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  process.on('unhandledRejection', (reason) => {
    captureError(reason, { source: 'unhandledRejection' });
    logger.error({ reason }, 'Unhandled promise rejection');
  });
  void main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.error({ err }, 'Fatal error');
      process.exitCode = 1;
    });
}

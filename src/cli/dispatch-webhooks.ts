#!/usr/bin/env node
/**
 * Dispatch due webhook events once and exit.
 *
 * Usage:
 *   dispatch-webhooks [--limit 100] [--timeout 10] [--verbose]
 *
 * Meant for cron or any other external scheduler. Exits 1 when at least one
 * delivery attempt failed, 2 when the run itself could not happen.
 */

import { parseArgs } from 'util';
import { config } from '../config/index.js';
import { closeDatabase, initializeDatabase } from '../config/database.js';
import { errorMessage, InputError } from '../errors.js';
import { DispatchRunner } from '../services/dispatch-runner.js';
import { DispatchSummary } from '../types/webhook.js';

export interface DispatchCommandOptions {
  limit: number;
  timeoutSeconds: number;
  verbose: boolean;
}

export interface BatchRunner {
  runOnce(limit: number, timeoutSeconds: number): Promise<DispatchSummary>;
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new InputError(`--${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function parseCommandOptions(argv: string[]): DispatchCommandOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      limit: { type: 'string' },
      timeout: { type: 'string' },
      verbose: { type: 'boolean', default: false },
    },
    strict: true,
  });

  return {
    limit: parsePositiveInt('limit', values.limit, config.webhook.batchLimit),
    timeoutSeconds: parsePositiveInt('timeout', values.timeout, config.webhook.timeoutSeconds),
    verbose: values.verbose ?? false,
  };
}

/**
 * Run one batch and report. Resolves to the process exit code.
 */
export async function runDispatchCommand(
  argv: string[],
  runner: BatchRunner,
  out: (line: string) => void = console.log
): Promise<number> {
  let options: DispatchCommandOptions;
  try {
    options = parseCommandOptions(argv);
  } catch (error) {
    out(`Invalid options: ${errorMessage(error)}`);
    return 2;
  }

  if (options.verbose) {
    out(`Dispatching up to ${options.limit} pending webhook events...`);
  }

  let results: DispatchSummary;
  try {
    results = await runner.runOnce(options.limit, options.timeoutSeconds);
  } catch (error) {
    out(`Webhook dispatch failed: ${errorMessage(error)}`);
    return 2;
  }

  out('Webhook dispatch complete:');
  out(`  Processed: ${results.processed}`);
  out(`  Delivered: ${results.delivered}`);
  out(`  Failed: ${results.failed}`);
  out(`  Skipped: ${results.skipped}`);

  return results.failed > 0 ? 1 : 0;
}

async function main(): Promise<void> {
  initializeDatabase();
  try {
    process.exitCode = await runDispatchCommand(process.argv.slice(2), new DispatchRunner());
  } finally {
    closeDatabase();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('[DispatchWebhooks] Fatal error:', error);
    process.exitCode = 2;
  });
}

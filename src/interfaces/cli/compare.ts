#!/usr/bin/env node
/**
 * Compare CLI — Entry Point
 * Layer: Entry Point (CLI)
 *
 * npm run compare -- -i pairs.csv --directions-key … --routes-key … [-o out.csv]
 *
 * I parse flags, resolve the ComparisonService from the container and print a
 * short report when it's done. Exit codes: 0 when the run completes (even if
 * some rows failed), 2 for bad usage, 1 for any other fatal error (input not
 * found or not understood, output not writable).
 */
import { container } from '@core/container';
import { logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { ComparisonService } from '@application/services/ComparisonService';
import { DIFF_FIELDS } from '@shared/constants';
import { AppError, ValidationError } from '@shared/errors/AppError';
import type { RunResult } from '@shared/types';

import { parseCliArgs, USAGE } from './args';
import { writeSampleInput } from './sample';

// eslint-disable-next-line no-console
const log = console.log;

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = (ms / 1000).toFixed(1);
  if (ms < 60_000) return `${seconds}s`;
  const minutes = Math.floor(ms / 60_000);
  const remainingSec = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m ${remainingSec}s`;
}

function formatNumber(n: number): string {
  return n.toLocaleString();
}

function formatStat(value: number | null): string {
  return value === null ? '—' : value.toFixed(2);
}

function printReport(result: RunResult): void {
  const { summary } = result;
  log('');
  log('  ✓ Comparison complete');
  log(`    Rows:              ${formatNumber(summary.totalRows)}`);
  log(`    Both providers OK: ${formatNumber(summary.bothSucceeded)}`);
  log(`    Invalid geohashes: ${formatNumber(summary.rowErrors)}`);
  log(`    Directions failed: ${formatNumber(summary.directionsFailures)}`);
  log(`    Routes failed:     ${formatNumber(summary.routesFailures)}`);
  log(`    Duration:          ${formatDuration(result.durationMs)}`);
  log('');
  for (const field of DIFF_FIELDS) {
    const stats = summary.diffs[field];
    log(
      `    ${field.padEnd(22)} n=${stats.count}  mean=${formatStat(stats.mean)}  median=${formatStat(stats.median)}  max=${formatStat(stats.max)}`,
    );
  }
  log('');
  log(`  CSV:      ${result.csvPath}`);
  log(`  Workbook: ${result.workbookPath}`);
  log('');
}

async function main(): Promise<void> {
  const command = parseCliArgs(process.argv.slice(2));

  switch (command.kind) {
    case 'help':
      log(USAGE);
      return;
    case 'create-sample': {
      const target = await writeSampleInput(command.inputPath);
      log(`Sample input written to ${target}`);
      return;
    }
    case 'compare': {
      log('');
      log(`  Input: ${command.request.inputPath}`);
      const service = container.resolve<ComparisonService>(TOKENS.ComparisonService);
      printReport(await service.run(command.request));
    }
  }
}

main().catch((err: unknown) => {
  if (err instanceof ValidationError) {
    // eslint-disable-next-line no-console
    console.error(`Error: ${err.message}\n\n${USAGE}`);
    process.exitCode = err.exitCode;
    return;
  }
  if (err instanceof AppError && err.isOperational) {
    logger.error({ code: err.code }, err.message);
    process.exitCode = err.exitCode;
    return;
  }
  logger.error({ err }, 'Comparison failed');
  process.exitCode = 1;
});
